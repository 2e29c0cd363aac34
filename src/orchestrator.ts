import { resolveSessionConfig } from './config.js';
import type { OrchestratorConfig, SessionOverrides } from './config.js';
import { llmConfigFor } from './config.js';
import { buildExecutionPlan, classifyModality, resolveBranchOutcome } from './branch-coordinator.js';
import type { BranchResult } from './branch-coordinator.js';
import { detectDomain, getDomainProfile } from './domains.js';
import { SessionCancelledError, SessionValidationError, StageFailureError, errorMessage, toStageFailure } from './errors.js';
import { KeywordIntentClassifier, LLMIntentClassifier } from './intent.js';
import type { IntentClassifier, IntentSignal } from './intent.js';
import { ProgressEmitter } from './progress-emitter.js';
import type { EventPage } from './progress-emitter.js';
import { RevisionLoopController, runRevisionLoop } from './revision-loop.js';
import { SessionStore } from './session-store.js';
import { invokeStage, pickInputs } from './stage-runner.js';
import type { StageContext, StageProcessors } from './stage-runner.js';
import { createDefaultProcessors } from './stages/index.js';
import { ArtifactStore } from './storage/artifact-store.js';
import { SessionRegistry } from './storage/session-registry.js';
import type { SessionMetadata } from './storage/session-registry.js';
import { isResolvableDataFile } from './storage/uploads.js';
import type {
  AnyStageResult,
  BranchStage,
  DomainProfile,
  ExecutionPlan,
  LogLevel,
  Modality,
  ResearchDomain,
  RevisionDecision,
  SessionState,
  SessionStatus,
  StageKind,
  StageResult,
  WorkflowKind,
} from './types/index.js';

export interface SessionRequest {
  goal: string;
  workflowKind?: WorkflowKind;
  dataFileRef?: string;
  domain?: ResearchDomain;
  overrides?: SessionOverrides;
}

export interface SessionResult {
  success: boolean;
  sessionId: string;
  status: SessionStatus;
  modality?: Modality;
  content: string;
  artifacts: string[];
  error?: string;
  selectedVersion?: number;
  revisionDecision?: RevisionDecision;
  degradationNotes: string[];
}

export interface SessionSummary {
  sessionId: string;
  goal: string;
  status: SessionStatus;
  workflowKind: WorkflowKind;
  modality?: Modality;
  createdAt: string;
  completedAt?: string;
  artifacts: string[];
}

export interface OrchestratorDeps {
  store?: SessionStore;
  emitter?: ProgressEmitter;
  artifacts?: ArtifactStore;
  /** null disables the on-disk session index */
  registry?: SessionRegistry | null;
  processors?: (config: OrchestratorConfig) => StageProcessors;
  intent?: (config: OrchestratorConfig) => IntentClassifier;
  fileExists?: (ref: string) => boolean;
  generateId?: () => string;
}

interface SessionRun {
  id: string;
  goal: string;
  dataFileRef?: string;
  workflowKind: WorkflowKind;
  config: OrchestratorConfig;
  processors: StageProcessors;
  modality: Modality;
  domain?: DomainProfile;
  signal: AbortSignal;
}

type StageExtras = Partial<Pick<StageContext, 'draft' | 'review' | 'feedback' | 'attempt'>>;

export function generateSessionId(): string {
  return `session-${Date.now()}-${Math.random().toString(36).slice(2, 8)}`;
}

function defaultIntentClassifier(config: OrchestratorConfig): IntentClassifier {
  const llm = llmConfigFor(config, 'analysis');
  return llm ? new LLMIntentClassifier(llm) : new KeywordIntentClassifier();
}

/**
 * Weighted progress over the plan. Percentages only ever move forward.
 */
class ProgressTracker {
  private done = 0;

  constructor(private readonly plan: ExecutionPlan) {}

  advance(weight: number): number {
    this.done = Math.min(this.plan.totalWeight, this.done + weight);
    return this.percentage(this.done);
  }

  peek(extra: number): number {
    return this.percentage(Math.min(this.plan.totalWeight, this.done + extra));
  }

  private percentage(weight: number): number {
    // Planning itself counts as the first 5%.
    return Math.round(5 + (weight / this.plan.totalWeight) * 95);
  }
}

/**
 * Drives research sessions end to end:
 * validate, classify, branch phase with join, synthesis, outline,
 * revision loop, citations, artifacts. Every session ends completed or failed.
 */
export class ResearchOrchestrator {
  readonly store: SessionStore;
  readonly emitter: ProgressEmitter;
  readonly artifacts: ArtifactStore;
  private readonly registry: SessionRegistry | null;
  private readonly processorFactory: (config: OrchestratorConfig) => StageProcessors;
  private readonly intentFactory: (config: OrchestratorConfig) => IntentClassifier;
  private readonly fileExists: (ref: string) => boolean;
  private readonly generateId: () => string;
  private readonly controllers = new Map<string, AbortController>();
  private readonly running = new Map<string, Promise<void>>();

  constructor(private readonly config: OrchestratorConfig, deps: OrchestratorDeps = {}) {
    this.store = deps.store ?? new SessionStore();
    this.emitter = deps.emitter ?? new ProgressEmitter();
    this.artifacts = deps.artifacts ?? new ArtifactStore(config.outputDir);
    this.registry = deps.registry === undefined ? new SessionRegistry(config.outputDir) : deps.registry;
    this.processorFactory = deps.processors ?? createDefaultProcessors;
    this.intentFactory = deps.intent ?? defaultIntentClassifier;
    this.fileExists = deps.fileExists ?? isResolvableDataFile;
    this.generateId = deps.generateId ?? generateSessionId;
  }

  /**
   * Run a session and wait for its terminal state.
   */
  async submit(request: SessionRequest): Promise<SessionResult> {
    const sessionId = this.start(request);
    await this.running.get(sessionId);
    return this.result(sessionId);
  }

  /**
   * Create a session and run it in the background. Returns the session id at once.
   */
  start(request: SessionRequest): string {
    const id = this.generateId();
    this.store.create({
      id,
      goal: request.goal,
      dataFileRef: request.dataFileRef,
      workflowKind: request.workflowKind ?? 'enhanced',
      domain: request.domain,
      status: 'pending',
      createdAt: new Date().toISOString(),
      artifacts: [],
    });
    this.emitter.publish(id, {
      type: 'progress', percentage: 0, message: 'Session queued', phase: 'pending', timestamp: new Date().toISOString(),
    });

    const controller = new AbortController();
    this.controllers.set(id, controller);

    const task = this.run(id, request, controller.signal)
      .catch((error: unknown) => console.error(`[Orchestrator] ${id} run crashed:`, error))
      .finally(() => {
        this.controllers.delete(id);
        this.running.delete(id);
      });
    this.running.set(id, task);
    return id;
  }

  /**
   * Abort in-flight stages. The session ends failed with detail "Cancelled".
   */
  cancel(sessionId: string): boolean {
    const controller = this.controllers.get(sessionId);
    if (!controller || controller.signal.aborted) return false;
    const status = this.store.get(sessionId).session.status;
    if (status !== 'pending' && status !== 'running') return false;
    console.error(`[Orchestrator] ${sessionId} cancellation requested`);
    controller.abort(new SessionCancelledError(sessionId));
    return true;
  }

  cancelAll(): number {
    let cancelled = 0;
    for (const id of [...this.controllers.keys()]) {
      if (this.cancel(id)) cancelled++;
    }
    return cancelled;
  }

  isActive(sessionId: string): boolean {
    return this.running.has(sessionId);
  }

  /** Resolves once every background session has reached a terminal state. */
  async whenIdle(): Promise<void> {
    while (this.running.size > 0) {
      await Promise.all([...this.running.values()]);
    }
  }

  result(sessionId: string): SessionResult {
    const state = this.store.snapshot(sessionId);
    const { session } = state;
    return {
      success: session.status === 'completed',
      sessionId,
      status: session.status,
      modality: session.modality,
      content: session.content ?? '',
      artifacts: [...session.artifacts],
      error: session.error,
      selectedVersion: state.revision?.selectedVersion,
      revisionDecision: state.revision?.decision,
      degradationNotes: [...state.degradationNotes],
    };
  }

  snapshot(sessionId: string): SessionState {
    return this.store.snapshot(sessionId);
  }

  events(sessionId: string, cursor?: number): EventPage {
    return this.emitter.read(sessionId, cursor);
  }

  /** Finished sessions from earlier runs of the server, if the registry has them. */
  lookup(sessionId: string): SessionMetadata | undefined {
    return this.registry?.getById(sessionId);
  }

  /**
   * Sessions known to this process first (newest first), then older ones from the registry.
   */
  listSessions(limit = 20, search?: string): SessionSummary[] {
    const needle = search?.toLowerCase();
    const matches = (goal: string) => !needle || goal.toLowerCase().includes(needle);

    const live: SessionSummary[] = this.store.list()
      .filter(s => matches(s.goal))
      .sort((a, b) => b.createdAt.localeCompare(a.createdAt))
      .map(s => ({
        sessionId: s.id,
        goal: s.goal,
        status: s.status,
        workflowKind: s.workflowKind,
        modality: s.modality,
        createdAt: s.createdAt,
        completedAt: s.completedAt,
        artifacts: s.artifacts,
      }));
    const seen = new Set(live.map(s => s.sessionId));
    const stored = (needle ? this.registry?.search(needle) : this.registry?.getAll(limit)) ?? [];
    const older: SessionSummary[] = stored
      .filter(s => !seen.has(s.sessionId))
      .map(s => ({
        sessionId: s.sessionId,
        goal: s.goal,
        status: s.status,
        workflowKind: s.workflowKind,
        modality: s.modality,
        createdAt: s.createdAt,
        completedAt: s.completedAt,
        artifacts: s.artifacts,
      }));
    return [...live, ...older].slice(0, limit);
  }

  /**
   * Serve an artifact recorded in a completed session's artifact list.
   */
  async readArtifact(sessionId: string, name: string): Promise<string> {
    let status: SessionStatus | undefined;
    let listed: readonly string[] = [];
    if (this.store.has(sessionId)) {
      const { session } = this.store.get(sessionId);
      status = session.status;
      listed = session.artifacts;
    } else {
      const entry = this.registry?.getById(sessionId);
      status = entry?.status;
      listed = entry?.artifacts ?? [];
    }

    if (status !== 'completed') {
      throw new SessionValidationError(`Session ${sessionId} has no completed artifacts`);
    }
    if (!listed.includes(name)) {
      throw new SessionValidationError(`Artifact ${name} is not recorded for session ${sessionId}`);
    }
    return this.artifacts.read(sessionId, name);
  }

  // ==================== SESSION LIFECYCLE ====================

  private log(sessionId: string, level: LogLevel, message: string, terminal?: boolean): void {
    console.error(`[Orchestrator] ${sessionId} ${level}: ${message}`);
    this.emitter.publish(sessionId, { type: 'log', level, message, timestamp: new Date().toISOString(), terminal });
  }

  private progress(sessionId: string, percentage: number, message: string, phase: string, terminal?: boolean): void {
    this.emitter.publish(sessionId, {
      type: 'progress', percentage, message, phase, timestamp: new Date().toISOString(), terminal,
    });
  }

  private async run(id: string, request: SessionRequest, signal: AbortSignal): Promise<void> {
    try {
      await this.store.transition(id, 'running');
      this.progress(id, 1, 'Validating request', 'validate');

      const session = await this.prepare(id, request, signal);
      const plan = buildExecutionPlan(session.modality);
      await this.store.setPlan(id, plan);
      const tracker = new ProgressTracker(plan);
      this.progress(id, 5, `Plan ready: ${plan.branches.map(b => b.stage).join(' + ')}`, 'plan');

      await this.runBranchPhase(session, plan, tracker);

      for (const step of plan.sequence) {
        switch (step.step) {
          case 'synthesis': {
            const result = await this.runStage(session, 'synthesis');
            await this.recordOrThrow(id, result);
            break;
          }
          case 'outline': {
            const result = await this.runStage(session, 'outline');
            await this.recordOrThrow(id, result);
            break;
          }
          case 'revision':
            await this.runRevision(session, tracker, step.weight);
            break;
          case 'cite': {
            const selected = this.selectedDraft(id);
            const result = await this.runStage(session, 'cite', { draft: selected });
            await this.recordOrThrow(id, result);
            break;
          }
        }
        if (step.step !== 'revision') {
          this.progress(id, tracker.advance(step.weight), `${step.step} complete`, step.step);
        }
      }

      await this.finalize(session);
    } catch (error) {
      await this.fail(id, error, signal);
    }
  }

  private async prepare(id: string, request: SessionRequest, signal: AbortSignal): Promise<SessionRun> {
    const goal = request.goal.trim();
    if (!goal) {
      throw new SessionValidationError('Goal must not be empty');
    }
    if (request.dataFileRef !== undefined && !this.fileExists(request.dataFileRef)) {
      throw new SessionValidationError(`Data file not found: ${request.dataFileRef}`);
    }

    const workflowKind = request.workflowKind ?? 'enhanced';
    const config = resolveSessionConfig(this.config, workflowKind, request.overrides);

    let domain: DomainProfile | undefined;
    if (workflowKind === 'domain' || request.domain) {
      const detected = request.domain ?? detectDomain(goal, request.dataFileRef);
      domain = getDomainProfile(detected);
      await this.store.setDomain(id, detected);
      this.log(id, 'info', `Domain: ${detected}`);
    }

    const intent: IntentSignal = request.dataFileRef
      ? await this.intentFactory(config).classify(goal, request.dataFileRef, signal)
      : { literatureIntent: true, reason: 'no data file' };
    const modality = classifyModality(request.dataFileRef, intent);
    this.log(id, 'info', `Modality: ${modality} (${intent.reason})`);

    return {
      id,
      goal,
      dataFileRef: request.dataFileRef,
      workflowKind,
      config,
      processors: this.processorFactory(config),
      modality,
      domain,
      signal,
    };
  }

  private runBranch(session: SessionRun, stage: BranchStage): Promise<BranchResult> {
    return stage === 'literature' ? this.runStage(session, 'literature') : this.runStage(session, 'analysis');
  }

  /**
   * Fan out, apply results as they land, then report them in plan order once
   * the join barrier is passed.
   */
  private async runBranchPhase(session: SessionRun, plan: ExecutionPlan, tracker: ProgressTracker): Promise<void> {
    const { id } = session;
    if (plan.fanOut) {
      this.log(id, 'info', `Running ${plan.branches.map(b => b.stage).join(' and ')} in parallel`);
    }

    const results = await Promise.all(
      plan.branches.map(async branch => {
        const result = await this.runBranch(session, branch.stage);
        await this.store.apply(id, result);
        return result;
      })
    );

    plan.branches.forEach((branch, index) => {
      const result = results[index];
      const message = result?.ok ? `${branch.stage} complete` : `${branch.stage} failed`;
      this.progress(id, tracker.advance(branch.weight), message, branch.stage);
    });

    const resolution = resolveBranchOutcome(plan, results);
    switch (resolution.kind) {
      case 'fatal':
        throw new StageFailureError(resolution.detail, resolution.failure.kind);
      case 'degraded':
        await this.store.addDegradationNote(id, resolution.note);
        this.log(id, 'warning', resolution.note);
        break;
      case 'continue':
        break;
    }
  }

  private async runRevision(session: SessionRun, tracker: ProgressTracker, weight: number): Promise<void> {
    const { id, config } = session;
    const rounds = config.maxRevisionAttempts + 1;
    const loop = new RevisionLoopController({
      threshold: config.acceptanceThreshold,
      maxAttempts: config.maxRevisionAttempts,
    });
    let previousDraft: string | undefined;
    let reviewed = 0;

    const outcome = await runRevisionLoop(loop, {
      draft: async (attempt, feedback) => {
        const result = await this.runStage(session, 'draft', {
          attempt,
          feedback,
          draft: feedback ? previousDraft : undefined,
        });
        await this.store.apply(id, result);
        if (result.ok) previousDraft = result.payload.content;
        return result;
      },
      review: async (content, attempt) => {
        const result = await this.runStage(session, 'review', { draft: content, attempt });
        await this.store.apply(id, result);
        return result;
      },
      revise: async (content, review, attempt) => {
        const result = await this.runStage(session, 'revise', { draft: content, review, attempt });
        await this.store.apply(id, result);
        return result;
      },
      recordDraft: draft => this.store.appendDraftVersion(id, draft),
      recordState: state => this.store.setRevisionState(id, state),
      onDecision: (decision, draft) => {
        reviewed++;
        this.log(id, decision === 'accept' ? 'success' : 'info',
          `Draft v${draft.version} scored ${draft.score}/10, decision: ${decision}`);
        this.progress(id, tracker.peek((weight * reviewed) / rounds), `Draft v${draft.version} reviewed`, 'revision');
      },
    }, this.store.get(id).drafts.length + 1);

    if (!outcome.ok) {
      throw new StageFailureError(`${outcome.stage}: ${outcome.failure.detail}`, outcome.failure.kind, outcome.stage);
    }

    const exhausted = outcome.state.state === 'exhausted';
    this.log(id, exhausted ? 'warning' : 'success', exhausted
      ? `Revision limit reached, using best draft v${outcome.selected.version} (score ${outcome.selected.score})`
      : `Draft v${outcome.selected.version} accepted`);
    this.progress(id, tracker.advance(weight), 'Revision complete', 'revision');
  }

  private selectedDraft(sessionId: string): string {
    const state = this.store.get(sessionId);
    const version = state.revision?.selectedVersion;
    const draft = state.drafts.find(d => d.version === version);
    if (!draft) {
      throw new StageFailureError('No selected draft to cite', 'permanent', 'cite');
    }
    return draft.content;
  }

  private async runStage<K extends StageKind>(session: SessionRun, kind: K, extras: StageExtras = {}): Promise<StageResult<K>> {
    const processor = session.processors[kind];
    const context: StageContext = {
      sessionId: session.id,
      goal: session.goal,
      dataFileRef: session.dataFileRef,
      modality: session.modality,
      inputs: pickInputs(this.store.get(session.id).outputs, processor.reads),
      attempt: extras.attempt ?? 0,
      draft: extras.draft,
      review: extras.review,
      feedback: extras.feedback,
      domain: session.domain,
      artifactDir: this.artifacts.stageDir(session.id, kind),
      signal: session.signal,
    };

    this.log(session.id, 'info', `Running ${kind}`);
    const result = await invokeStage(processor, context, {
      retries: session.config.stageRetries,
      timeoutMs: session.config.stageTimeoutMs,
      retryDelayMs: session.config.retryDelayMs,
      onRetry: (attempt, failure) => this.log(session.id, 'warning', `${kind} attempt ${attempt} failed (${failure.detail}), retrying`),
    });
    if (!result.ok) {
      this.log(session.id, 'error', `${kind} failed after ${result.attempts} attempt(s): ${result.failure.detail}`);
    }
    return result;
  }

  private async recordOrThrow(sessionId: string, result: AnyStageResult): Promise<void> {
    await this.store.apply(sessionId, result);
    if (!result.ok) {
      throw new StageFailureError(`${result.stage}: ${result.failure.detail}`, result.failure.kind, result.stage);
    }
  }

  private async finalize(session: SessionRun): Promise<void> {
    const { id } = session;
    if (session.signal.aborted) {
      throw new SessionCancelledError(id);
    }
    // Publishing is not interruptible.
    this.controllers.delete(id);

    const state = this.store.get(id);
    const draft = state.drafts.find(d => d.version === state.revision?.selectedVersion);
    const citations = state.outputs.citations;
    if (!draft || !citations) {
      throw new StageFailureError('Nothing to publish: missing selected draft or citations', 'permanent');
    }

    const content = `${draft.content.trim()}\n\n${citations.markdown}`;
    const names: string[] = [];
    const write = async (name: string, text: string) => {
      await this.artifacts.write(id, name, text);
      names.push(name);
    };

    await write('report.md', content);
    await write('references.md', citations.markdown);
    for (const version of state.drafts) {
      await write(`draft-v${version.version}.md`, version.content);
    }

    await this.store.setArtifacts(id, names, content);
    await this.store.transition(id, 'completed');
    if (await this.persistSession(id)) {
      names.push('session.json');
    }

    this.log(id, 'success', `Report ready: ${names.length} artifacts`);
    this.progress(id, 100, 'Research complete', 'complete', true);
  }

  private async fail(id: string, error: unknown, signal: AbortSignal): Promise<void> {
    const detail = signal.aborted ? 'Cancelled' : toStageFailure(error).detail;
    try {
      await this.store.transition(id, 'failed', detail);
      await this.persistSession(id);
    } catch (secondary) {
      console.error(`[Orchestrator] ${id} could not record failure:`, errorMessage(secondary));
    }
    this.log(id, 'error', `Session failed: ${detail}`, true);
  }

  /**
   * session.json and the registry entry. The session is already terminal here,
   * so a write error is reported, not propagated. A completed session lists
   * session.json only once it is on disk.
   */
  private async persistSession(id: string): Promise<boolean> {
    try {
      await this.artifacts.write(id, 'session.json', JSON.stringify(this.store.snapshot(id), null, 2));
    } catch (error) {
      this.log(id, 'warning', `Could not persist session record: ${errorMessage(error)}`);
      this.register(id);
      return false;
    }
    if (this.store.get(id).session.status === 'completed') {
      await this.store.setArtifacts(id, [...this.store.get(id).session.artifacts, 'session.json']);
    }
    this.register(id);
    return true;
  }

  private register(id: string): void {
    const snapshot = this.store.snapshot(id);
    const { session } = snapshot;
    const selected = snapshot.drafts.find(d => d.version === snapshot.revision?.selectedVersion);
    try {
      this.registry?.register({
        sessionId: id,
        goal: session.goal,
        status: session.status,
        workflowKind: session.workflowKind,
        modality: session.modality,
        createdAt: session.createdAt,
        completedAt: session.completedAt,
        dir: this.artifacts.sessionDir(id),
        artifacts: session.artifacts,
        selectedVersion: selected?.version,
        score: selected?.score,
        error: session.error,
      });
    } catch (error) {
      this.log(id, 'warning', `Could not update session registry: ${errorMessage(error)}`);
    }
  }
}
