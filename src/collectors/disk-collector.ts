// disk-collector.ts - Fixed drives: free space, failure prediction, temp footprint
import { Logger } from '../common/logger';
import { buildFinding } from '../detection/classifier';
import { DiskSource, RawDiskState, RawVolume } from '../monitoring/sources';
import { DiskMetrics, FindingOf } from '../types';
import { BaseCollector, CollectContext } from './base-collector';

/**
 * Failure prediction is keyed by physical disk instance name, which begins
 * with the disk's PnP device id. No map, no statuses, or no matching
 * instance all leave the answer Unknown.
 */
export function failurePredictedFor(drive: string, state: RawDiskState): boolean | null {
  if (state.failure_predictions === null || state.drive_map === null) return null;

  const disks = state.drive_map
    .filter(m => m.drive.toUpperCase() === drive.toUpperCase())
    .map(m => m.pnp_device_id.toLowerCase())
    .filter(id => id !== '');
  if (disks.length === 0) return null;

  const statuses = state.failure_predictions
    .filter(p => disks.some(id => p.instance_name.toLowerCase().startsWith(id)));
  if (statuses.length === 0) return null;

  return statuses.some(p => p.predict_failure);
}

export function tempBytesFor(drive: string, state: RawDiskState): number | null {
  const locations = state.temp_locations.filter(l => l.drive !== null && l.drive.toUpperCase() === drive.toUpperCase());
  let total = 0;
  for (const location of locations) {
    if (location.bytes === null) return null;
    total += location.bytes;
  }
  return total;
}

export function diskMetrics(volume: RawVolume, state: RawDiskState): DiskMetrics {
  return {
    drive: volume.drive,
    total_bytes: volume.size_bytes,
    free_bytes: volume.free_bytes,
    free_percent: volume.size_bytes > 0 ? (volume.free_bytes / volume.size_bytes) * 100 : null,
    failure_predicted: failurePredictedFor(volume.drive, state),
    temp_bytes: tempBytesFor(volume.drive, state),
  };
}

export class DiskCollector extends BaseCollector<'Disk'> {
  readonly category = 'Disk' as const;
  private source: DiskSource;

  constructor(source: DiskSource, logger: Logger) {
    super(logger);
    this.source = source;
  }

  protected async gather(context: CollectContext): Promise<FindingOf<'Disk'>[]> {
    const state = await this.source.readDiskState(context);

    if (state.failure_predictions === null) {
      this.logger.info('Drive failure prediction not available', { elevated: context.elevated });
    }

    return state.volumes.map(volume => buildFinding('Disk', volume.drive, diskMetrics(volume, state)));
  }
}
