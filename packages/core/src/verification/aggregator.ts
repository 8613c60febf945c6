import { EventEmitter } from 'eventemitter3';
import { CostTracker } from '../router/cost.js';
import { withTimeout } from '../router/retry.js';
import { Semaphore } from '../concurrency/semaphore.js';
import type { AdapterFactory } from './adapter.js';
import { AdapterError, InvalidInputError } from './errors.js';
import { DEFAULT_JUDGES } from './judges.js';
import type { JudgeOutcome, Verdict, VerificationReport } from './types.js';

/** Share of judges that must verify an answer for it to count as verified. */
export const AGREEMENT_THRESHOLD = 0.7;

// ---------------------------------------------------------------------------
// Events
// ---------------------------------------------------------------------------

export interface JudgeStartEvent {
  judgeId: string;
  index: number;
  total: number;
}

export interface JudgeCompleteEvent {
  judgeId: string;
  index: number;
  verdict: Verdict;
  durationMs: number;
}

export interface JudgeErrorEvent {
  judgeId: string;
  index: number;
  error: Error;
  durationMs: number;
}

export interface VerificationEvents {
  'judge:start': (event: JudgeStartEvent) => void;
  'judge:complete': (event: JudgeCompleteEvent) => void;
  'judge:error': (event: JudgeErrorEvent) => void;
  'verification:complete': (report: VerificationReport) => void;
}

// ---------------------------------------------------------------------------
// Aggregator
// ---------------------------------------------------------------------------

export interface VerificationAggregatorOptions {
  adapterFactory: AdapterFactory;
  /** Judges used when `verify` is called without a list. */
  defaultJudges?: readonly string[];
  /** Per-judge deadline in milliseconds; 0 or absent means none. */
  timeoutMs?: number;
  /** Cap on simultaneous judge calls; 0 or absent means one per judge. */
  maxConcurrency?: number;
}

export interface VerifyOptions {
  abortSignal?: AbortSignal;
}

/**
 * Fans one (query, response) pair out to several judges at once and reduces
 * their verdicts to a single report. Judge failures are folded into the
 * report; only an empty judge list is rejected.
 */
export class VerificationAggregator extends EventEmitter<VerificationEvents> {
  private readonly adapterFactory: AdapterFactory;
  private readonly defaultJudges: readonly string[];
  private readonly timeoutMs: number;
  private readonly maxConcurrency: number;

  constructor(options: VerificationAggregatorOptions) {
    super();
    this.adapterFactory = options.adapterFactory;
    this.defaultJudges = options.defaultJudges ?? DEFAULT_JUDGES;
    this.timeoutMs = options.timeoutMs ?? 0;
    this.maxConcurrency = options.maxConcurrency ?? 0;
  }

  async verify(
    query: string,
    response: string,
    models: readonly string[] = this.defaultJudges,
    options: VerifyOptions = {},
  ): Promise<VerificationReport> {
    if (models.length === 0) {
      throw new InvalidInputError('at least one judge model is required');
    }

    const costTracker = new CostTracker();
    const semaphore = this.maxConcurrency > 0 ? new Semaphore(this.maxConcurrency) : null;

    const settled = await Promise.allSettled(
      models.map((judgeId, index) => {
        const run = () => this.runJudge(judgeId, index, models.length, query, response, {
          abortSignal: options.abortSignal,
          costTracker,
        });
        return semaphore ? semaphore.run(run) : run();
      }),
    );

    let agreement = 0;
    const feedback: string[] = [];
    const details: JudgeOutcome[] = [];

    // allSettled preserves input order, so index i is always models[i]
    settled.forEach((outcome, i) => {
      const judgeId = models[i];
      if (outcome.status === 'rejected') {
        const message = describeError(outcome.reason);
        feedback.push(`${judgeId}: Error - ${message}`);
        details.push({ sourceId: judgeId, error: message });
        return;
      }
      if (outcome.value.verified) agreement++;
      feedback.push(`${judgeId}: ${outcome.value.feedback}`);
      details.push(outcome.value);
    });

    const agreementRatio = agreement / models.length;
    const report: VerificationReport = {
      originalResponse: response,
      agreementRatio,
      verified: agreementRatio >= AGREEMENT_THRESHOLD,
      feedback,
      details,
      models: [...models],
      usage: costTracker.totals(),
    };

    this.notify(() => this.emit('verification:complete', report));
    return report;
  }

  /**
   * Runs one judge under its own abort signal, linked to the caller's and
   * fired when the deadline passes. Settles only once the adapter call has,
   * so a concurrency slot is never handed on while a timed-out call still
   * runs. Adapters must settle promptly once their signal aborts.
   */
  private async runJudge(
    judgeId: string,
    index: number,
    total: number,
    query: string,
    response: string,
    context: { abortSignal?: AbortSignal; costTracker: CostTracker },
  ): Promise<Verdict> {
    const startTime = Date.now();
    this.notify(() => this.emit('judge:start', { judgeId, index, total }));

    const controller = new AbortController();
    const abortJudge = () => controller.abort();
    if (context.abortSignal?.aborted) controller.abort();
    context.abortSignal?.addEventListener('abort', abortJudge, { once: true });

    let call: Promise<Verdict> | undefined;
    try {
      const adapter = this.adapterFactory(judgeId);
      call = adapter.verify(query, response, {
        abortSignal: controller.signal,
        costTracker: context.costTracker,
      });
      const verdict = await withTimeout(call, this.timeoutMs, controller.signal);
      this.notify(() => this.emit('judge:complete', { judgeId, index, verdict, durationMs: Date.now() - startTime }));
      return verdict;
    } catch (err) {
      controller.abort();
      if (call) await Promise.allSettled([call]);
      const error = err instanceof AdapterError ? err : new AdapterError(judgeId, err);
      this.notify(() => this.emit('judge:error', { judgeId, index, error, durationMs: Date.now() - startTime }));
      throw error;
    } finally {
      context.abortSignal?.removeEventListener('abort', abortJudge);
    }
  }

  /** Emits an event; a throwing listener never changes a judge's outcome. */
  private notify(emit: () => boolean): void {
    try {
      emit();
    } catch {
      // Listener failures are non-fatal, like the verification they observe
    }
  }
}

function describeError(reason: unknown): string {
  return reason instanceof Error ? reason.message : String(reason);
}
