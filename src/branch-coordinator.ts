import type {
  BranchStage,
  ExecutionPlan,
  Modality,
  PlannedBranch,
  PlannedStep,
  StageFailed,
  StageFailure,
  StageResult,
} from './types/index.js';
import type { IntentSignal } from './intent.js';

/** The revision phase covers up to maxAttempts + 1 draft/review rounds. */
export const REVISION_WEIGHT = 3;

export function classifyModality(dataFileRef: string | undefined, intent: IntentSignal): Modality {
  if (!dataFileRef) return 'literature';
  return intent.literatureIntent ? 'hybrid' : 'data';
}

function branchesFor(modality: Modality): PlannedBranch[] {
  switch (modality) {
    case 'literature':
      return [{ stage: 'literature', weight: 1 }];
    case 'data':
      return [{ stage: 'analysis', weight: 1 }];
    case 'hybrid':
      return [{ stage: 'literature', weight: 1 }, { stage: 'analysis', weight: 1 }];
  }
}

/**
 * Derive the frozen plan: one branch group (joined before synthesis), then the
 * sequential steps.
 */
export function buildExecutionPlan(modality: Modality): ExecutionPlan {
  const branches = branchesFor(modality).map(b => Object.freeze(b));
  const steps: PlannedStep[] = [
    { step: 'synthesis', weight: 1 },
    { step: 'outline', weight: 1 },
    { step: 'revision', weight: REVISION_WEIGHT },
    { step: 'cite', weight: 1 },
  ];
  const sequence = steps.map(s => Object.freeze(s));

  const totalWeight = [...branches, ...sequence].reduce((sum, item) => sum + item.weight, 0);

  return Object.freeze({
    modality,
    fanOut: branches.length > 1,
    branches: Object.freeze(branches),
    sequence: Object.freeze(sequence),
    totalWeight,
  });
}

export type BranchResult = StageResult<'literature'> | StageResult<'analysis'>;

type FailedBranch = StageFailed<'literature'> | StageFailed<'analysis'>;

export type BranchResolution =
  | { kind: 'continue'; survivors: BranchStage[] }
  | { kind: 'degraded'; survivors: BranchStage[]; failed: BranchStage[]; note: string }
  | { kind: 'fatal'; failure: StageFailure; detail: string };

/**
 * Decide what the join barrier lets through. A fan-out group survives the
 * loss of one branch; a single-branch plan does not. Cancellation is always fatal.
 */
export function resolveBranchOutcome(plan: ExecutionPlan, results: readonly BranchResult[]): BranchResolution {
  const survivors: BranchStage[] = [];
  const failed: FailedBranch[] = [];
  for (const result of results) {
    if (result.ok) survivors.push(result.stage);
    else failed.push(result);
  }

  const describe = (r: FailedBranch) => `${r.stage}: ${r.failure.detail}`;

  const cancelled = failed.find(r => r.failure.kind === 'cancelled');
  if (cancelled) {
    return { kind: 'fatal', failure: cancelled.failure, detail: cancelled.failure.detail };
  }

  const [firstFailure] = failed;
  if (survivors.length === 0) {
    if (!firstFailure) {
      return { kind: 'fatal', failure: { kind: 'permanent', detail: 'No branch produced a result' }, detail: 'No branch produced a result' };
    }
    return { kind: 'fatal', failure: firstFailure.failure, detail: failed.map(describe).join('; ') };
  }

  if (!firstFailure) {
    return { kind: 'continue', survivors };
  }

  if (!plan.fanOut) {
    return { kind: 'fatal', failure: firstFailure.failure, detail: describe(firstFailure) };
  }

  return {
    kind: 'degraded',
    survivors,
    failed: failed.map(r => r.stage),
    note: `Branch failed (${failed.map(describe).join('; ')}). Continuing with ${survivors.join(', ')} only.`,
  };
}
