// service-collector.ts - Automatic-start services
import { Logger } from '../common/logger';
import { buildFinding } from '../detection/classifier';
import { ServiceSource } from '../monitoring/sources';
import { FindingOf } from '../types';
import { BaseCollector, CollectContext } from './base-collector';

export class ServiceCollector extends BaseCollector<'Service'> {
  readonly category = 'Service' as const;
  private source: ServiceSource;

  constructor(source: ServiceSource, logger: Logger) {
    super(logger);
    this.source = source;
  }

  protected async gather(context: CollectContext): Promise<FindingOf<'Service'>[]> {
    const services = await this.source.listAutoStartServices(context);

    return services.map(service => buildFinding('Service', service.display_name || service.name, {
      name: service.name,
      display_name: service.display_name,
      state: service.state,
      start_mode: service.start_mode,
      binary_path: service.binary_path,
      publisher: service.publisher,
    }));
  }
}
