import type {
  DraftVersion,
  ReviewVerdict,
  RevisionDecision,
  RevisionGuidance,
  RevisionState,
  StageFailure,
  StageResult,
} from './types/index.js';
import { StateInvariantError } from './errors.js';

export interface RevisionLoopOptions {
  threshold: number;
  maxAttempts: number;
}

/**
 * Bounded accept/revise/reject machine around one manuscript.
 *
 *   drafting -> reviewing -> accepted
 *                         -> revising -> drafting   (attempt < max)
 *                         -> exhausted              (attempt == max)
 *
 * At most maxAttempts + 1 drafts are ever produced.
 */
export class RevisionLoopController {
  private state: RevisionState;

  constructor(private readonly options: RevisionLoopOptions) {
    if (!Number.isInteger(options.maxAttempts) || options.maxAttempts < 0) {
      throw new StateInvariantError(`maxAttempts must be a non-negative integer, got ${options.maxAttempts}`);
    }
    this.state = { state: 'drafting', attempt: 0, maxAttempts: options.maxAttempts };
  }

  get current(): Readonly<RevisionState> {
    return { ...this.state };
  }

  get terminal(): boolean {
    return this.state.state === 'accepted' || this.state.state === 'exhausted';
  }

  draftProduced(version: number): void {
    this.expect('drafting');
    this.state = { ...this.state, state: 'reviewing', currentVersion: version, decision: undefined };
  }

  reviewed(score: number): RevisionDecision {
    this.expect('reviewing');
    if (score >= this.options.threshold) {
      this.state = { ...this.state, state: 'accepted', decision: 'accept', selectedVersion: this.state.currentVersion };
      return 'accept';
    }
    if (this.state.attempt < this.state.maxAttempts) {
      this.state = { ...this.state, state: 'revising', decision: 'revise' };
      return 'revise';
    }
    this.state = { ...this.state, state: 'exhausted', decision: 'reject' };
    return 'reject';
  }

  revised(): void {
    this.expect('revising');
    this.state = { ...this.state, state: 'drafting', attempt: this.state.attempt + 1 };
  }

  selected(version: number): void {
    if (!this.terminal) {
      throw new StateInvariantError(`Cannot select a final draft while ${this.state.state}`);
    }
    this.state = { ...this.state, selectedVersion: version };
  }

  private expect(state: RevisionState['state']): void {
    if (this.state.state !== state) {
      throw new StateInvariantError(`Revision loop is ${this.state.state}, expected ${state}`);
    }
  }
}

/**
 * Highest score wins; ties go to the earliest attempt, then the lowest version.
 */
export function selectFinalDraft(versions: readonly DraftVersion[]): DraftVersion | undefined {
  let best: DraftVersion | undefined;
  for (const candidate of versions) {
    if (
      !best ||
      candidate.score > best.score ||
      (candidate.score === best.score && candidate.attempt < best.attempt) ||
      (candidate.score === best.score && candidate.attempt === best.attempt && candidate.version < best.version)
    ) {
      best = candidate;
    }
  }
  return best;
}

export interface RevisionSteps {
  draft(attempt: number, feedback?: RevisionGuidance): Promise<StageResult<'draft'>>;
  review(content: string, attempt: number): Promise<StageResult<'review'>>;
  revise(content: string, review: ReviewVerdict, attempt: number): Promise<StageResult<'revise'>>;
  recordDraft(draft: DraftVersion): Promise<void>;
  recordState(state: RevisionState): Promise<void>;
  onDecision?(decision: RevisionDecision, draft: DraftVersion): void;
}

export type RevisionOutcome =
  | { ok: true; state: RevisionState; selected: DraftVersion; drafts: DraftVersion[] }
  | { ok: false; state: RevisionState; stage: 'draft' | 'review' | 'revise'; failure: StageFailure; drafts: DraftVersion[] };

/**
 * Drive the loop to a terminal state. A failed draft or review ends the loop
 * with that failure. A failed revise step falls back to the review's own feedback.
 */
export async function runRevisionLoop(
  controller: RevisionLoopController,
  steps: RevisionSteps,
  firstVersion = 1
): Promise<RevisionOutcome> {
  const drafts: DraftVersion[] = [];
  let feedback: RevisionGuidance | undefined;
  let nextVersion = firstVersion;

  await steps.recordState(controller.current);

  while (!controller.terminal) {
    const attempt = controller.current.attempt;

    const drafted = await steps.draft(attempt, feedback);
    if (!drafted.ok) {
      return { ok: false, state: controller.current, stage: 'draft', failure: drafted.failure, drafts };
    }

    const version = nextVersion++;
    controller.draftProduced(version);
    await steps.recordState(controller.current);

    const reviewed = await steps.review(drafted.payload.content, attempt);
    if (!reviewed.ok) {
      return { ok: false, state: controller.current, stage: 'review', failure: reviewed.failure, drafts };
    }

    const draft: DraftVersion = Object.freeze({
      version,
      attempt,
      content: drafted.payload.content,
      score: reviewed.payload.score,
      feedback: reviewed.payload.feedback,
      timestamp: new Date().toISOString(),
    });
    await steps.recordDraft(draft);
    drafts.push(draft);

    const decision = controller.reviewed(reviewed.payload.score);
    steps.onDecision?.(decision, draft);

    if (decision === 'revise') {
      const revised = await steps.revise(draft.content, reviewed.payload, attempt);
      if (revised.ok) {
        feedback = revised.payload;
      } else {
        if (revised.failure.kind === 'cancelled') {
          return { ok: false, state: controller.current, stage: 'revise', failure: revised.failure, drafts };
        }
        console.error(`[Revision] revise step failed (${revised.failure.detail}), using review feedback`);
        feedback = { feedback: reviewed.payload.feedback, focus: reviewed.payload.issues };
      }
      controller.revised();
    }
    await steps.recordState(controller.current);
  }

  const final = controller.current.state === 'accepted'
    ? drafts[drafts.length - 1]
    : selectFinalDraft(drafts);
  if (!final) {
    throw new StateInvariantError('Revision loop ended without a draft');
  }
  controller.selected(final.version);
  await steps.recordState(controller.current);

  return { ok: true, state: controller.current, selected: final, drafts };
}
