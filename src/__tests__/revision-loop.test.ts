import { describe, it, expect } from 'vitest';
import { StateInvariantError } from '../errors.js';
import { RevisionLoopController, runRevisionLoop, selectFinalDraft } from '../revision-loop.js';
import type { RevisionSteps } from '../revision-loop.js';
import type {
  DraftVersion,
  FailureKind,
  RevisionDecision,
  RevisionGuidance,
  RevisionLoopState,
  StageKind,
  StageOutputs,
  StageResult,
} from '../types/index.js';

function ok<K extends StageKind>(stage: K, payload: StageOutputs[K]): StageResult<K> {
  return { stage, ok: true, payload, attempts: 1, timestamp: '2026-01-01T00:00:00.000Z' };
}

function failed<K extends StageKind>(stage: K, kind: FailureKind, detail: string): StageResult<K> {
  return { stage, ok: false, failure: { kind, detail }, attempts: 1, timestamp: '2026-01-01T00:00:00.000Z' };
}

interface Script {
  scores: number[];
  revise?: (attempt: number) => StageResult<'revise'>;
  review?: (index: number) => StageResult<'review'> | undefined;
}

function scripted(script: Script) {
  const feedbackSeen: Array<RevisionGuidance | undefined> = [];
  const decisions: RevisionDecision[] = [];
  const states: RevisionLoopState[] = [];
  const recorded: DraftVersion[] = [];
  let reviews = 0;
  let reviseCalls = 0;

  const steps: RevisionSteps = {
    async draft(attempt, feedback) {
      feedbackSeen.push(feedback);
      return ok('draft', { content: `draft for attempt ${attempt}` });
    },
    async review() {
      const index = reviews++;
      const override = script.review?.(index);
      if (override) return override;
      const score = script.scores[Math.min(index, script.scores.length - 1)] ?? 1;
      return ok('review', { score, feedback: `feedback ${index}`, issues: [`issue ${index}`] });
    },
    async revise(_content, _review, attempt) {
      reviseCalls++;
      return script.revise ? script.revise(attempt) : ok('revise', { feedback: `revise ${attempt}`, focus: ['evidence'] });
    },
    async recordDraft(draft) {
      recorded.push(draft);
    },
    async recordState(state) {
      states.push(state.state);
    },
    onDecision(decision) {
      decisions.push(decision);
    },
  };

  return { steps, feedbackSeen, decisions, states, recorded, reviseCalls: () => reviseCalls };
}

describe('runRevisionLoop', () => {
  it('accepts the first draft that meets the threshold', async () => {
    const run = scripted({ scores: [8] });
    const controller = new RevisionLoopController({ threshold: 7, maxAttempts: 2 });

    const outcome = await runRevisionLoop(controller, run.steps);

    expect(outcome.ok).toBe(true);
    if (outcome.ok) {
      expect(outcome.selected.version).toBe(1);
      expect(outcome.state).toMatchObject({ state: 'accepted', decision: 'accept', selectedVersion: 1 });
    }
    expect(run.reviseCalls()).toBe(0);
    expect(run.states).toEqual(['drafting', 'reviewing', 'accepted', 'accepted']);
  });

  it('selects the best draft when revisions run out', async () => {
    const run = scripted({ scores: [5, 6, 6] });
    const controller = new RevisionLoopController({ threshold: 7, maxAttempts: 2 });

    const outcome = await runRevisionLoop(controller, run.steps);

    expect(run.decisions).toEqual(['revise', 'revise', 'reject']);
    expect(run.recorded.map(d => [d.version, d.attempt, d.score])).toEqual([[1, 0, 5], [2, 1, 6], [3, 2, 6]]);
    expect(outcome.ok).toBe(true);
    if (outcome.ok) {
      // Tie between v2 and v3 goes to the earlier attempt
      expect(outcome.selected.version).toBe(2);
      expect(outcome.state).toMatchObject({ state: 'exhausted', decision: 'reject', attempt: 2, selectedVersion: 2 });
    }
  });

  it('never produces more than maxAttempts + 1 drafts', async () => {
    const run = scripted({ scores: [1] });
    const controller = new RevisionLoopController({ threshold: 7, maxAttempts: 3 });

    await runRevisionLoop(controller, run.steps);

    expect(run.recorded).toHaveLength(4);
    expect(run.reviseCalls()).toBe(3);
  });

  it('hands revise guidance to the next draft', async () => {
    const run = scripted({ scores: [4, 9] });
    const controller = new RevisionLoopController({ threshold: 7, maxAttempts: 2 });

    await runRevisionLoop(controller, run.steps);

    expect(run.feedbackSeen).toEqual([undefined, { feedback: 'revise 0', focus: ['evidence'] }]);
  });

  it('falls back to the review feedback when revise fails', async () => {
    const run = scripted({ scores: [4, 9], revise: () => failed('revise', 'permanent', 'model refused') });
    const controller = new RevisionLoopController({ threshold: 7, maxAttempts: 2 });

    const outcome = await runRevisionLoop(controller, run.steps);

    expect(outcome.ok).toBe(true);
    expect(run.feedbackSeen[1]).toEqual({ feedback: 'feedback 0', focus: ['issue 0'] });
  });

  it('stops when revise is cancelled', async () => {
    const run = scripted({ scores: [4], revise: () => failed('revise', 'cancelled', 'Cancelled') });
    const controller = new RevisionLoopController({ threshold: 7, maxAttempts: 2 });

    const outcome = await runRevisionLoop(controller, run.steps);

    expect(outcome).toMatchObject({ ok: false, stage: 'revise', failure: { kind: 'cancelled' } });
  });

  it('does not version a draft whose review failed', async () => {
    const run = scripted({
      scores: [4],
      review: index => (index === 1 ? failed('review', 'permanent', 'reviewer down') : undefined),
    });
    const controller = new RevisionLoopController({ threshold: 7, maxAttempts: 2 });

    const outcome = await runRevisionLoop(controller, run.steps);

    expect(outcome).toMatchObject({ ok: false, stage: 'review', failure: { detail: 'reviewer down' } });
    expect(run.recorded.map(d => d.version)).toEqual([1]);
  });

  it('continues version numbers from an earlier phase', async () => {
    const run = scripted({ scores: [3, 8] });
    const controller = new RevisionLoopController({ threshold: 7, maxAttempts: 1 });

    const outcome = await runRevisionLoop(controller, run.steps, 4);

    expect(run.recorded.map(d => d.version)).toEqual([4, 5]);
    expect(outcome.ok && outcome.selected.version).toBe(5);
  });
});

describe('RevisionLoopController', () => {
  it('rejects a negative or fractional attempt bound', () => {
    expect(() => new RevisionLoopController({ threshold: 7, maxAttempts: -1 })).toThrow(StateInvariantError);
    expect(() => new RevisionLoopController({ threshold: 7, maxAttempts: 0.5 })).toThrow(StateInvariantError);
  });

  it('rejects out-of-order calls', () => {
    const controller = new RevisionLoopController({ threshold: 7, maxAttempts: 1 });

    expect(() => controller.reviewed(9)).toThrow('Revision loop is drafting, expected reviewing');
    expect(() => controller.selected(1)).toThrow('Cannot select a final draft while drafting');
  });

  it('rejects immediately with no revisions allowed', () => {
    const controller = new RevisionLoopController({ threshold: 7, maxAttempts: 0 });
    controller.draftProduced(1);

    expect(controller.reviewed(6.9)).toBe('reject');
    expect(controller.current.state).toBe('exhausted');
  });
});

describe('selectFinalDraft', () => {
  const version = (v: number, attempt: number, score: number): DraftVersion => ({
    version: v, attempt, score, content: '', feedback: '', timestamp: '2026-01-01T00:00:00.000Z',
  });

  it('prefers the highest score', () => {
    expect(selectFinalDraft([version(1, 0, 4), version(2, 1, 7.5), version(3, 2, 6)])?.version).toBe(2);
  });

  it('breaks ties by attempt, then version', () => {
    expect(selectFinalDraft([version(3, 1, 6), version(2, 1, 6), version(4, 2, 6)])?.version).toBe(2);
  });

  it('returns undefined for no drafts', () => {
    expect(selectFinalDraft([])).toBeUndefined();
  });
});
