import type {
  AccumulatedOutputs,
  DomainProfile,
  Modality,
  OutputField,
  ReviewVerdict,
  RevisionGuidance,
  StageFailed,
  StageFailure,
  StageKind,
  StageOutcome,
  StageOutputs,
  StageResult,
  StageSuccess,
} from './types/index.js';
import { toStageFailure } from './errors.js';

/**
 * What a stage gets to see. `inputs` holds only the fields the stage declared
 * in `reads`; processors never receive the live session state.
 */
export interface StageContext {
  sessionId: string;
  goal: string;
  dataFileRef?: string;
  modality: Modality;
  inputs: Readonly<AccumulatedOutputs>;
  draft?: string;                  // review, revise, cite
  review?: ReviewVerdict;          // revise
  feedback?: RevisionGuidance;     // draft on a revision attempt
  attempt: number;
  domain?: DomainProfile;
  artifactDir: string;             // <outputDir>/<sessionId>/stages/<stage>
  signal: AbortSignal;
}

export interface StageProcessor<K extends StageKind> {
  readonly kind: K;
  readonly reads: readonly OutputField[];
  invoke(context: StageContext): Promise<StageOutcome<StageOutputs[K]>>;
}

export type StageProcessors = { [K in StageKind]: StageProcessor<K> };

export interface RunnerOptions {
  retries: number;
  timeoutMs: number;
  retryDelayMs: number;
  onRetry?: (attempt: number, failure: StageFailure) => void;
}

function copyField<F extends OutputField>(target: AccumulatedOutputs, source: AccumulatedOutputs, field: F): void {
  target[field] = source[field];
}

export function pickInputs(outputs: AccumulatedOutputs, reads: readonly OutputField[]): Readonly<AccumulatedOutputs> {
  const picked: AccumulatedOutputs = {};
  for (const field of reads) {
    if (outputs[field] !== undefined) {
      copyField(picked, outputs, field);
    }
  }
  return Object.freeze(picked);
}

function cancelledFailure(signal: AbortSignal): StageFailure {
  const reason: unknown = signal.reason;
  return { kind: 'cancelled', detail: reason instanceof Error ? reason.message : 'Cancelled' };
}

function wait(ms: number, signal: AbortSignal): Promise<void> {
  if (ms <= 0) return Promise.resolve();
  return new Promise(resolve => {
    const timer = setTimeout(done, ms);
    function done() {
      clearTimeout(timer);
      signal.removeEventListener('abort', done);
      resolve();
    }
    signal.addEventListener('abort', done, { once: true });
  });
}

/**
 * One attempt: the processor races the stage timeout and the session signal.
 * A processor that ignores its signal is abandoned, not awaited.
 */
async function attemptOnce<K extends StageKind>(
  processor: StageProcessor<K>,
  context: StageContext,
  timeoutMs: number
): Promise<StageOutcome<StageOutputs[K]>> {
  const controller = new AbortController();
  const forwardAbort = () => controller.abort(context.signal.reason);
  context.signal.addEventListener('abort', forwardAbort, { once: true });

  let timer: ReturnType<typeof setTimeout> | undefined;
  const interrupted = new Promise<StageOutcome<StageOutputs[K]>>(resolve => {
    timer = setTimeout(() => {
      controller.abort(new Error(`Stage ${processor.kind} timed out after ${timeoutMs}ms`));
      resolve({ ok: false, failure: { kind: 'transient', detail: `Stage ${processor.kind} timed out after ${timeoutMs}ms` } });
    }, timeoutMs);
    controller.signal.addEventListener('abort', () => {
      if (context.signal.aborted) {
        resolve({ ok: false, failure: cancelledFailure(context.signal) });
      }
    }, { once: true });
  });

  const running = processor
    .invoke({ ...context, signal: controller.signal })
    .catch((error: unknown): StageOutcome<StageOutputs[K]> => ({ ok: false, failure: toStageFailure(error) }));

  try {
    return await Promise.race([running, interrupted]);
  } finally {
    clearTimeout(timer);
    context.signal.removeEventListener('abort', forwardAbort);
  }
}

/**
 * Run a stage with the timeout and bounded-retry policy. Transient failures are
 * retried with the same context; permanent ones and cancellation return at once.
 * The returned result is frozen.
 */
export async function invokeStage<K extends StageKind>(
  processor: StageProcessor<K>,
  context: StageContext,
  options: RunnerOptions
): Promise<StageResult<K>> {
  const maxAttempts = Math.max(0, options.retries) + 1;
  let attempts = 0;
  let failure: StageFailure = { kind: 'permanent', detail: 'Stage did not run' };

  while (attempts < maxAttempts) {
    if (context.signal.aborted) {
      failure = cancelledFailure(context.signal);
      break;
    }

    attempts++;
    const outcome = await attemptOnce(processor, context, options.timeoutMs);

    if (outcome.ok) {
      if (context.signal.aborted) {
        failure = cancelledFailure(context.signal);
        break;
      }
      const success: StageSuccess<K> = {
        stage: processor.kind,
        ok: true,
        payload: outcome.payload,
        attempts,
        timestamp: new Date().toISOString(),
      };
      return Object.freeze(success);
    }

    failure = context.signal.aborted ? cancelledFailure(context.signal) : outcome.failure;
    if (failure.kind !== 'transient' || attempts >= maxAttempts) {
      break;
    }

    console.error(`[Stage] ${processor.kind} attempt ${attempts}/${maxAttempts} failed (${failure.detail}), retrying`);
    options.onRetry?.(attempts, failure);
    await wait(options.retryDelayMs * 2 ** (attempts - 1), context.signal);
  }

  const failed: StageFailed<K> = {
    stage: processor.kind,
    ok: false,
    failure: Object.freeze({ ...failure }),
    attempts,
    timestamp: new Date().toISOString(),
  };
  return Object.freeze(failed);
}
