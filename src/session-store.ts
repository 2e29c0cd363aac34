import type {
  AccumulatedOutputs,
  AnyStageResult,
  DraftVersion,
  ExecutionPlan,
  RevisionState,
  Session,
  SessionState,
  SessionStatus,
} from './types/index.js';
import { IllegalTransitionError, StateInvariantError } from './errors.js';

const ALLOWED_TRANSITIONS: Record<SessionStatus, readonly SessionStatus[]> = {
  pending: ['running'],
  running: ['completed', 'failed'],
  completed: [],
  failed: [],
};

export function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

/**
 * Where each successful stage lands in the accumulated outputs.
 * draft, review and revise feed the revision loop instead.
 */
function accumulate(outputs: AccumulatedOutputs, result: AnyStageResult): void {
  if (!result.ok) return;
  switch (result.stage) {
    case 'literature':
      outputs.literature = result.payload;
      break;
    case 'analysis':
      outputs.analysis = result.payload;
      break;
    case 'synthesis':
      outputs.synthesis = result.payload;
      break;
    case 'outline':
      outputs.outline = result.payload;
      break;
    case 'cite':
      outputs.citations = result.payload;
      break;
    case 'draft':
    case 'review':
    case 'revise':
      break;
  }
}

/**
 * Single source of truth for session state. Every mutation for a session runs
 * on that session's promise chain, so parallel branch results are applied one
 * at a time; different sessions never wait on each other.
 */
export class SessionStore {
  private readonly states = new Map<string, SessionState>();
  private readonly locks = new Map<string, Promise<unknown>>();

  create(session: Session): void {
    if (this.states.has(session.id)) {
      throw new StateInvariantError(`Session ${session.id} already exists`);
    }
    if (session.status !== 'pending') {
      throw new StateInvariantError(`Session ${session.id} must start as pending, got ${session.status}`);
    }
    this.states.set(session.id, {
      session: { ...session, artifacts: [...session.artifacts] },
      outputs: {},
      stageResults: [],
      drafts: [],
      degradationNotes: [],
    });
  }

  has(sessionId: string): boolean {
    return this.states.has(sessionId);
  }

  /** Live state for in-process reads. Use snapshot() for anything that leaves the process. */
  get(sessionId: string): Readonly<SessionState> {
    return this.require(sessionId);
  }

  list(): Session[] {
    return [...this.states.values()].map(state => structuredClone(state.session));
  }

  apply(sessionId: string, result: AnyStageResult): Promise<void> {
    return this.withLock(sessionId, state => {
      state.stageResults.push(result);
      accumulate(state.outputs, result);
    });
  }

  appendDraftVersion(sessionId: string, draft: DraftVersion): Promise<void> {
    return this.withLock(sessionId, state => {
      const last = state.drafts[state.drafts.length - 1];
      const expected = last ? last.version + 1 : 1;
      if (draft.version !== expected) {
        throw new StateInvariantError(
          `Session ${sessionId}: draft version ${draft.version} out of sequence, expected ${expected}`
        );
      }
      state.drafts.push(Object.freeze({ ...draft }));
    });
  }

  setRevisionState(sessionId: string, revision: RevisionState): Promise<void> {
    return this.withLock(sessionId, state => {
      if (revision.attempt > revision.maxAttempts) {
        throw new StateInvariantError(
          `Session ${sessionId}: revision attempt ${revision.attempt} exceeds max ${revision.maxAttempts}`
        );
      }
      state.revision = { ...revision };
    });
  }

  setPlan(sessionId: string, plan: ExecutionPlan): Promise<void> {
    return this.withLock(sessionId, state => {
      if (state.plan) {
        throw new StateInvariantError(`Session ${sessionId}: execution plan already set`);
      }
      state.plan = plan;
      state.session.modality = plan.modality;
    });
  }

  setDomain(sessionId: string, domain: Session['domain']): Promise<void> {
    return this.withLock(sessionId, state => {
      state.session.domain = domain;
    });
  }

  addDegradationNote(sessionId: string, note: string): Promise<void> {
    return this.withLock(sessionId, state => {
      state.degradationNotes.push(note);
    });
  }

  setArtifacts(sessionId: string, artifacts: readonly string[], content?: string): Promise<void> {
    return this.withLock(sessionId, state => {
      state.session.artifacts = [...artifacts];
      if (content !== undefined) state.session.content = content;
    });
  }

  transition(sessionId: string, to: SessionStatus, error?: string): Promise<void> {
    return this.withLock(sessionId, state => {
      const from = state.session.status;
      if (!ALLOWED_TRANSITIONS[from].includes(to)) {
        throw new IllegalTransitionError(sessionId, from, to);
      }
      state.session.status = to;
      if (to === 'completed' || to === 'failed') {
        state.session.completedAt = new Date().toISOString();
      }
      if (error !== undefined) state.session.error = error;
    });
  }

  /**
   * Deep-frozen copy, safe to hand to observers and serializers.
   */
  snapshot(sessionId: string): SessionState {
    return deepFreeze(structuredClone(this.require(sessionId)));
  }

  private require(sessionId: string): SessionState {
    const state = this.states.get(sessionId);
    if (!state) {
      throw new StateInvariantError(`Unknown session: ${sessionId}`);
    }
    return state;
  }

  private withLock(sessionId: string, mutate: (state: SessionState) => void): Promise<void> {
    const state = this.require(sessionId);
    const previous = this.locks.get(sessionId) ?? Promise.resolve();
    const next = previous.then(() => mutate(state));
    // Keep the chain alive after a rejected mutation; the caller still sees the rejection.
    const tail = next.catch(() => undefined);
    this.locks.set(sessionId, tail);
    void tail.then(() => {
      if (this.locks.get(sessionId) === tail) this.locks.delete(sessionId);
    });
    return next;
  }
}
