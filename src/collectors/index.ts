// index.ts - The closed set of domain collectors
import { Logger } from '../common/logger';
import { DiagnosticSources } from '../monitoring/sources';
import { DiskCollector } from './disk-collector';
import { DriverCollector } from './driver-collector';
import { ProcessCollector, ProcessCollectorOptions } from './process-collector';
import { ServiceCollector } from './service-collector';
import { StartupCollector } from './startup-collector';
import { TaskCollector } from './task-collector';

export type DomainCollector =
  | StartupCollector
  | ServiceCollector
  | ProcessCollector
  | DiskCollector
  | DriverCollector
  | TaskCollector;

export type CollectorOptions = ProcessCollectorOptions;

export function createCollectors(sources: DiagnosticSources, logger: Logger, options: CollectorOptions = {}): DomainCollector[] {
  return [
    new StartupCollector(sources.startup, logger.child('startup')),
    new ServiceCollector(sources.services, logger.child('services')),
    new ProcessCollector(sources.processes, logger.child('processes'), options),
    new DiskCollector(sources.disks, logger.child('disks')),
    new DriverCollector(sources.drivers, logger.child('drivers')),
    new TaskCollector(sources.tasks, logger.child('tasks')),
  ];
}

export { BaseCollector } from './base-collector';
export type { Collector, CollectContext } from './base-collector';
export { StartupCollector, ServiceCollector, ProcessCollector, DiskCollector, DriverCollector, TaskCollector };
