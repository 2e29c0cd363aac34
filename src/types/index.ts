export type Modality = 'literature' | 'data' | 'hybrid';

export type SessionStatus = 'pending' | 'running' | 'completed' | 'failed';

export type WorkflowKind = 'simple' | 'enhanced' | 'domain';

export type FailureKind = 'transient' | 'permanent' | 'cancelled';

export type ResearchDomain = 'business' | 'academic' | 'technical' | 'scientific' | 'policy' | 'general';

// ==================== STAGE PAYLOADS ====================

/**
 * A claim that can be traced back to where it came from
 * (a URL for literature, the data file for analysis).
 */
export interface SourcedPoint {
  claim: string;
  source: string;
}

export interface LiteratureFindings {
  summary: string;
  sources: string[];
}

export interface ColumnProfile {
  name: string;
  numeric: boolean;
  count: number;      // Non-empty cells
  min?: number;
  max?: number;
  mean?: number;
}

export interface DataProfile {
  rowCount: number;
  columns: ColumnProfile[];
}

export interface AnalysisReport {
  summary: string;
  profile?: DataProfile;
  points: SourcedPoint[];
}

export interface SynthesisResult {
  points: SourcedPoint[];
}

export interface OutlineSection {
  heading: string;
  pointIndices: number[];  // Indices into SynthesisResult.points
}

export interface Outline {
  title: string;
  sections: OutlineSection[];
}

export interface DraftContent {
  content: string;
}

/**
 * Output of the scoring oracle. Score is on a 1-10 scale.
 */
export interface ReviewVerdict {
  score: number;
  feedback: string;
  issues: string[];
}

export interface RevisionGuidance {
  feedback: string;
  focus: string[];
}

export interface CitationList {
  references: string[];
  markdown: string;
}

/**
 * Closed set of stage variants and what each one produces.
 */
export interface StageOutputs {
  literature: LiteratureFindings;
  analysis: AnalysisReport;
  synthesis: SynthesisResult;
  outline: Outline;
  draft: DraftContent;
  review: ReviewVerdict;
  revise: RevisionGuidance;
  cite: CitationList;
}

export type StageKind = keyof StageOutputs;

export type BranchStage = 'literature' | 'analysis';

export const STAGE_KINDS = [
  'literature',
  'analysis',
  'synthesis',
  'outline',
  'draft',
  'review',
  'revise',
  'cite',
] as const satisfies readonly StageKind[];

// ==================== SESSION STATE ====================

/**
 * Typed accumulation of stage contributions. Each stage writes at most one field.
 */
export interface AccumulatedOutputs {
  literature?: LiteratureFindings;
  analysis?: AnalysisReport;
  synthesis?: SynthesisResult;
  outline?: Outline;
  citations?: CitationList;
}

export type OutputField = keyof AccumulatedOutputs;

export interface StageFailure {
  kind: FailureKind;
  detail: string;
}

export type StageOutcome<T> =
  | { ok: true; payload: T }
  | { ok: false; failure: StageFailure };

export interface StageSuccess<K extends StageKind> {
  readonly stage: K;
  readonly ok: true;
  readonly payload: StageOutputs[K];
  readonly attempts: number;
  readonly timestamp: string;
}

export interface StageFailed<K extends StageKind> {
  readonly stage: K;
  readonly ok: false;
  readonly failure: StageFailure;
  readonly attempts: number;
  readonly timestamp: string;
}

export type StageResult<K extends StageKind> = StageSuccess<K> | StageFailed<K>;

/**
 * Any recorded stage result, discriminated by `stage` so the payload narrows.
 */
export type AnyStageResult = { [K in StageKind]: StageResult<K> }[StageKind];

export interface DraftVersion {
  readonly version: number;   // Session-wide, starts at 1, never reused
  readonly attempt: number;   // Revision attempt that produced it (0 = first draft)
  readonly content: string;
  readonly score: number;
  readonly feedback: string;
  readonly timestamp: string;
}

export type RevisionDecision = 'accept' | 'revise' | 'reject';

export type RevisionLoopState = 'drafting' | 'reviewing' | 'revising' | 'accepted' | 'exhausted';

export interface RevisionState {
  state: RevisionLoopState;
  attempt: number;
  maxAttempts: number;
  currentVersion?: number;
  decision?: RevisionDecision;
  selectedVersion?: number;
}

export interface Session {
  id: string;
  goal: string;
  dataFileRef?: string;
  workflowKind: WorkflowKind;
  modality?: Modality;
  domain?: ResearchDomain;
  status: SessionStatus;
  createdAt: string;
  completedAt?: string;
  artifacts: string[];
  content?: string;
  error?: string;
}

export interface SessionState {
  session: Session;
  outputs: AccumulatedOutputs;
  stageResults: AnyStageResult[];
  drafts: DraftVersion[];
  degradationNotes: string[];
  revision?: RevisionState;
  plan?: ExecutionPlan;
}

// ==================== EXECUTION PLAN ====================

export interface PlannedBranch {
  stage: BranchStage;
  weight: number;
}

export type SequentialStep = 'synthesis' | 'outline' | 'revision' | 'cite';

export interface PlannedStep {
  step: SequentialStep;
  weight: number;
}

/**
 * Derived once per session. Branch stages form one group that is joined
 * before the sequential steps start.
 */
export interface ExecutionPlan {
  readonly modality: Modality;
  readonly fanOut: boolean;
  readonly branches: readonly PlannedBranch[];
  readonly sequence: readonly PlannedStep[];
  readonly totalWeight: number;
}

// ==================== PROGRESS EVENTS ====================

export type LogLevel = 'info' | 'success' | 'warning' | 'error';

export type ProgressEvent =
  | { type: 'log'; level: LogLevel; message: string; timestamp: string; terminal?: boolean }
  | { type: 'progress'; percentage: number; message: string; phase: string; timestamp: string; terminal?: boolean };

export type RecordedEvent = ProgressEvent & { seq: number };

// ==================== DOMAINS ====================

export interface DomainProfile {
  domain: ResearchDomain;
  writingStyle: string;
  citationRequirements: string;
  qualityCriteria: string[];
  analysisFocus: string[];
}
