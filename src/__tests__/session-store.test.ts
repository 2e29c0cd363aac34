import { describe, it, expect, beforeEach } from 'vitest';
import { buildExecutionPlan } from '../branch-coordinator.js';
import { IllegalTransitionError, StateInvariantError } from '../errors.js';
import { SessionStore } from '../session-store.js';
import type { AnyStageResult, DraftVersion } from '../types/index.js';

const literature: AnyStageResult = {
  stage: 'literature',
  ok: true,
  payload: { summary: 'Prior work', sources: ['https://a.example'] },
  attempts: 1,
  timestamp: '2026-01-01T00:00:00.000Z',
};

const analysis: AnyStageResult = {
  stage: 'analysis',
  ok: true,
  payload: { summary: 'Data', points: [] },
  attempts: 1,
  timestamp: '2026-01-01T00:00:00.000Z',
};

const failedOutline: AnyStageResult = {
  stage: 'outline',
  ok: false,
  failure: { kind: 'permanent', detail: 'no structure' },
  attempts: 1,
  timestamp: '2026-01-01T00:00:00.000Z',
};

function draft(version: number): DraftVersion {
  return { version, attempt: version - 1, content: `v${version}`, score: 5, feedback: '', timestamp: '2026-01-01T00:00:00.000Z' };
}

describe('SessionStore', () => {
  let store: SessionStore;

  beforeEach(() => {
    store = new SessionStore();
    store.create({
      id: 's1',
      goal: 'Urban heat islands',
      workflowKind: 'enhanced',
      status: 'pending',
      createdAt: '2026-01-01T00:00:00.000Z',
      artifacts: [],
    });
  });

  it('rejects duplicate sessions', () => {
    expect(() => store.create({
      id: 's1', goal: 'again', workflowKind: 'simple', status: 'pending', createdAt: '', artifacts: [],
    })).toThrow('Session s1 already exists');
  });

  it('moves pending -> running -> completed and stamps completion', async () => {
    await store.transition('s1', 'running');
    await store.transition('s1', 'completed');

    const { session } = store.get('s1');
    expect(session.status).toBe('completed');
    expect(session.completedAt).toBeDefined();
  });

  it('refuses to skip running or leave a terminal state', async () => {
    await expect(store.transition('s1', 'completed')).rejects.toBeInstanceOf(IllegalTransitionError);

    await store.transition('s1', 'running');
    await store.transition('s1', 'failed', 'boom');
    await expect(store.transition('s1', 'running')).rejects.toThrow('Session s1: illegal status transition failed -> running');
    expect(store.get('s1').session.error).toBe('boom');
  });

  it('accumulates successful outputs and records every result', async () => {
    await Promise.all([store.apply('s1', literature), store.apply('s1', analysis), store.apply('s1', failedOutline)]);

    const state = store.get('s1');
    expect(state.stageResults.map(r => r.stage)).toEqual(['literature', 'analysis', 'outline']);
    expect(state.outputs.literature?.sources).toEqual(['https://a.example']);
    expect(state.outputs.analysis?.summary).toBe('Data');
    expect(state.outputs.outline).toBeUndefined();
  });

  it('keeps draft versions consecutive', async () => {
    await store.appendDraftVersion('s1', draft(1));
    await expect(store.appendDraftVersion('s1', draft(3))).rejects.toBeInstanceOf(StateInvariantError);

    // The chain survives the rejected mutation
    await store.appendDraftVersion('s1', draft(2));
    expect(store.get('s1').drafts.map(d => d.version)).toEqual([1, 2]);
  });

  it('bounds the revision attempt', async () => {
    await expect(store.setRevisionState('s1', { state: 'drafting', attempt: 3, maxAttempts: 2 }))
      .rejects.toThrow('Session s1: revision attempt 3 exceeds max 2');
  });

  it('sets the plan once and records its modality', async () => {
    await store.setPlan('s1', buildExecutionPlan('hybrid'));

    expect(store.get('s1').session.modality).toBe('hybrid');
    await expect(store.setPlan('s1', buildExecutionPlan('data'))).rejects.toThrow('execution plan already set');
  });

  it('hands out frozen snapshots that later writes do not touch', async () => {
    const before = store.snapshot('s1');
    await store.addDegradationNote('s1', 'analysis dropped');

    expect(before.degradationNotes).toEqual([]);
    expect(Object.isFrozen(before.session)).toBe(true);
    expect(store.snapshot('s1').degradationNotes).toEqual(['analysis dropped']);
  });

  it('lists copies of the sessions', () => {
    const [listed] = store.list();
    expect(listed?.id).toBe('s1');
  });

  it('throws for unknown sessions', () => {
    expect(() => store.get('nope')).toThrow('Unknown session: nope');
    expect(store.has('nope')).toBe(false);
  });
});
