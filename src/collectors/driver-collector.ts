// driver-collector.ts - Plug-and-Play devices with problems or unsigned drivers
import { Logger } from '../common/logger';
import { buildFinding } from '../detection/classifier';
import { DriverSource, RawDevice } from '../monitoring/sources';
import { FindingOf } from '../types';
import { BaseCollector, CollectContext } from './base-collector';

/** Healthy signed devices are not reported; an unreadable code or signature is. */
export function isReportableDevice(device: RawDevice): boolean {
  if (device.error_code !== 0) return true;
  if (device.is_signed !== true) return true;
  return device.status !== '' && device.status.toUpperCase() !== 'OK';
}

export class DriverCollector extends BaseCollector<'Driver'> {
  readonly category = 'Driver' as const;
  private source: DriverSource;

  constructor(source: DriverSource, logger: Logger) {
    super(logger);
    this.source = source;
  }

  protected async gather(context: CollectContext): Promise<FindingOf<'Driver'>[]> {
    const devices = await this.source.listDevices(context);

    return devices.filter(isReportableDevice).map(device => buildFinding('Driver', device.name, {
      name: device.name,
      device_id: device.device_id,
      status: device.status,
      error_code: device.error_code,
      is_signed: device.is_signed,
      driver_version: device.driver_version,
      provider: device.provider,
    }));
  }
}
