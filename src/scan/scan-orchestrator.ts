// scan-orchestrator.ts - Runs the selected collectors concurrently and builds the ScanResult
import * as os from 'os';
import { Logger } from '../common/logger';
import { CollectorTimeoutError, ScanCancelledError, ScanStateError, errorMessage, failureKindOf } from '../common/errors';
import { Collector } from '../collectors/base-collector';
import { CATEGORIES, Category, CollectorResult, ScanMode, ScanResult } from '../types';
import { buildSummary } from './aggregator';

export type ScanState = 'idle' | 'running' | 'completed' | 'failed';

export const DEFAULT_QUICK_CATEGORIES: readonly Category[] = ['Startup', 'Process'];

// Device and task instrumentation queries are slow on most machines
export const DEFAULT_TIMEOUTS_MS: Readonly<Record<Category, number>> = {
  Startup: 30000,
  Service: 30000,
  Process: 45000,
  Disk: 30000,
  Driver: 90000,
  ScheduledTask: 90000,
};

export interface ScanOptions {
  mode: ScanMode;
  elevated: boolean;
  quickCategories?: readonly Category[];
  timeoutsMs?: Partial<Record<Category, number>>;
}

export interface OrchestratorOptions {
  hostname?: string;
  now?: () => Date;
}

export function selectCategories(mode: ScanMode, quickCategories: readonly Category[] = DEFAULT_QUICK_CATEGORIES): Category[] {
  if (mode === 'full') return [...CATEGORIES];
  return CATEGORIES.filter(c => quickCategories.includes(c));
}

/**
 * One orchestrator drives one scan: idle -> running -> completed, or failed
 * when the scan cannot be set up. A collector's own failure never fails the
 * scan; it shows up as a `failure` on that category's result.
 */
export class ScanOrchestrator {
  private logger: Logger;
  private collectors = new Map<Category, Collector>();
  private controller = new AbortController();
  private state: ScanState = 'idle';
  private hostname: string;
  private now: () => Date;

  constructor(collectors: readonly Collector[], logger: Logger, options: OrchestratorOptions = {}) {
    this.logger = logger;
    for (const collector of collectors) {
      this.collectors.set(collector.category, collector);
    }
    this.hostname = options.hostname ?? os.hostname();
    this.now = options.now ?? (() => new Date());
  }

  getState(): ScanState {
    return this.state;
  }

  /** Abort every outstanding collector; the scan still completes with 'cancelled' failures. */
  cancel(reason = 'Scan cancelled'): void {
    if (this.controller.signal.aborted) return;
    this.logger.warn('Cancelling scan', { state: this.state });
    this.controller.abort(new ScanCancelledError(reason));
  }

  async run(options: ScanOptions): Promise<ScanResult> {
    if (this.state !== 'idle') {
      throw new ScanStateError(`Scan already ${this.state}; create a new orchestrator for another scan`);
    }
    this.state = 'running';

    try {
      const categories = selectCategories(options.mode, options.quickCategories);
      if (categories.length === 0) {
        throw new ScanStateError(`No categories selected for a ${options.mode} scan`);
      }

      const missing = categories.filter(c => !this.collectors.has(c));
      if (missing.length > 0) {
        throw new ScanStateError(`No collector registered for: ${missing.join(', ')}`);
      }

      const startedAt = this.now();
      this.logger.startOperation('scan', { mode: options.mode, categories, elevated: options.elevated });

      const results = await Promise.all(categories.map(category =>
        this.runCollector(category, options)));

      const completedAt = this.now();
      const perCategory: Partial<Record<Category, CollectorResult>> = {};
      for (const result of results) {
        perCategory[result.category] = result;
      }

      const summary = buildSummary(results);
      const scan: ScanResult = {
        mode: options.mode,
        timestamp: startedAt.toISOString(),
        started_at: startedAt.toISOString(),
        completed_at: completedAt.toISOString(),
        duration_ms: completedAt.getTime() - startedAt.getTime(),
        elevated: options.elevated,
        hostname: this.hostname,
        per_category: perCategory,
        summary,
      };

      this.state = 'completed';
      this.logger.endOperation('scan', true, {
        duration_ms: scan.duration_ms,
        counts: summary.counts_by_severity,
        not_evaluated: summary.not_evaluated,
      });
      return scan;
    } catch (error) {
      this.state = 'failed';
      this.logger.error('Scan failed', error);
      throw error;
    }
  }

  private async runCollector(category: Category, options: ScanOptions): Promise<CollectorResult> {
    const collector = this.collectors.get(category);
    if (!collector) {
      throw new ScanStateError(`No collector registered for: ${category}`);
    }

    const timeoutMs = options.timeoutsMs?.[category] ?? DEFAULT_TIMEOUTS_MS[category];
    const scanSignal = this.controller.signal;
    const controller = new AbortController();
    const onScanAbort = (): void => controller.abort(scanSignal.reason);

    if (scanSignal.aborted) {
      onScanAbort();
    } else {
      scanSignal.addEventListener('abort', onScanAbort, { once: true });
    }

    const timer = setTimeout(() => {
      this.logger.warn(`${category} collector timed out`, { timeout_ms: timeoutMs });
      controller.abort(new CollectorTimeoutError(category, timeoutMs));
    }, timeoutMs);

    const started = Date.now();
    try {
      return await collector.collect({ signal: controller.signal, elevated: options.elevated });
    } catch (error) {
      // Collectors report failures on the result; this only catches a broken one
      this.logger.error(`${category} collector threw`, error);
      return {
        category,
        findings: [],
        failure: { kind: failureKindOf(error), message: errorMessage(error) },
        duration_ms: Date.now() - started,
      };
    } finally {
      clearTimeout(timer);
      scanSignal.removeEventListener('abort', onScanAbort);
    }
  }
}
