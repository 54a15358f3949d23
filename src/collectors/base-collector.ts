// base-collector.ts - Shared collect() contract and failure containment
import { Logger } from '../common/logger';
import { abortable, abortReason } from '../common/abort';
import { errorMessage, failureKindOf } from '../common/errors';
import { Category, CollectorFailure, CollectorResult, FindingOf } from '../types';

export interface CollectContext {
  signal: AbortSignal;
  /** Read-only; decides which queries are attempted, never how results are classified */
  elevated: boolean;
}

export interface Collector<C extends Category = Category> {
  readonly category: C;
  collect(context: CollectContext): Promise<CollectorResult<C>>;
}

/**
 * Runs `gather` and turns every error into a `failure` on the result. An
 * aborted signal wins over whatever the source was doing at the time, so a
 * hung query still ends as a timeout or cancellation.
 */
export abstract class BaseCollector<C extends Category> implements Collector<C> {
  abstract readonly category: C;
  protected logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger;
  }

  protected abstract gather(context: CollectContext): Promise<FindingOf<C>[]>;

  async collect(context: CollectContext): Promise<CollectorResult<C>> {
    const started = Date.now();

    try {
      if (context.signal.aborted) {
        throw abortReason(context.signal);
      }

      const findings = await abortable(this.gather(context), context.signal);
      const duration = Date.now() - started;
      this.logger.debug(`${this.category} collector finished`, { findings: findings.length, duration_ms: duration });
      return { category: this.category, findings, duration_ms: duration };
    } catch (error) {
      const cause = context.signal.aborted ? abortReason(context.signal) : error;
      const failure: CollectorFailure = { kind: failureKindOf(cause), message: errorMessage(cause) };
      const duration = Date.now() - started;

      this.logger.warn(`${this.category} collector failed (${failure.kind})`, { duration_ms: duration }, error);
      return { category: this.category, findings: [], failure, duration_ms: duration };
    }
  }
}
