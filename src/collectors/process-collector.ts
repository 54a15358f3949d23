// process-collector.ts - Two-point CPU sampling over the running-process table
import { Logger } from '../common/logger';
import { sleep } from '../common/abort';
import { buildFinding } from '../detection/classifier';
import { ProcessSnapshot, ProcessSource } from '../monitoring/sources';
import { FindingOf, ProcessMetrics } from '../types';
import { BaseCollector, CollectContext } from './base-collector';

export const DEFAULT_SAMPLE_WINDOW_MS = 2000;
export const DEFAULT_TOP_PROCESSES = 20;

export interface ProcessCollectorOptions {
  sampleWindowMs?: number;
  topN?: number;
}

const MIB = 1024 * 1024;

/** Ranking weight: one CPU percent counts as much as 100 MiB of working set. */
export function resourceWeight(m: Pick<ProcessMetrics, 'cpu_percent' | 'memory_bytes'>): number {
  return (m.cpu_percent ?? 0) + (m.memory_bytes ?? 0) / MIB / 100;
}

/**
 * CPU percent is the CPU-time delta over the wall-clock delta, on a per-core
 * scale (a process saturating two cores reads 200). Processes missing from
 * the first snapshot, or whose CPU time was unreadable, get null.
 */
export function computeProcessMetrics(first: ProcessSnapshot, second: ProcessSnapshot): ProcessMetrics[] {
  const wallSeconds = (second.taken_at_ms - first.taken_at_ms) / 1000;
  const before = new Map(first.processes.map(p => [p.pid, p]));

  return second.processes.map(proc => {
    const earlier = before.get(proc.pid);
    let cpu: number | null = null;

    if (
      wallSeconds > 0
      && earlier !== undefined
      && earlier.name === proc.name
      && earlier.cpu_seconds !== null
      && proc.cpu_seconds !== null
    ) {
      const delta = Math.max(0, proc.cpu_seconds - earlier.cpu_seconds);
      cpu = Math.round((delta / wallSeconds) * 1000) / 10;
    }

    return {
      pid: proc.pid,
      name: proc.name,
      cpu_percent: cpu,
      memory_bytes: proc.working_set_bytes,
      disk_read_bytes: proc.read_bytes,
      disk_write_bytes: proc.write_bytes,
    };
  });
}

export function topByResourceWeight(metrics: ProcessMetrics[], topN: number): ProcessMetrics[] {
  return metrics
    .map((m, index) => ({ m, index, weight: resourceWeight(m) }))
    .sort((a, b) => b.weight - a.weight || a.index - b.index)
    .slice(0, topN)
    .map(entry => entry.m);
}

export class ProcessCollector extends BaseCollector<'Process'> {
  readonly category = 'Process' as const;
  private source: ProcessSource;
  private sampleWindowMs: number;
  private topN: number;

  constructor(source: ProcessSource, logger: Logger, options: ProcessCollectorOptions = {}) {
    super(logger);
    this.source = source;
    this.sampleWindowMs = options.sampleWindowMs ?? DEFAULT_SAMPLE_WINDOW_MS;
    this.topN = options.topN ?? DEFAULT_TOP_PROCESSES;
  }

  protected async gather(context: CollectContext): Promise<FindingOf<'Process'>[]> {
    const first = await this.source.sampleProcesses(context);
    await sleep(this.sampleWindowMs, context.signal);
    const second = await this.source.sampleProcesses(context);

    const metrics = computeProcessMetrics(first, second);
    this.logger.debug('Process snapshots taken', {
      processes: metrics.length,
      window_ms: second.taken_at_ms - first.taken_at_ms,
    });

    return topByResourceWeight(metrics, this.topN)
      .map(m => buildFinding('Process', `${m.name} (PID ${m.pid})`, m));
  }
}
