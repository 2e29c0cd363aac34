import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import type { OrchestratorConfig } from './config.js';
import { errorMessage } from './errors.js';
import type { ResearchOrchestrator, SessionRequest } from './orchestrator.js';
import { saveUpload } from './storage/uploads.js';

export type ToolResult = {
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
};

function json(value: unknown): ToolResult {
  return { content: [{ type: 'text', text: JSON.stringify(value, null, 2) }] };
}

function failure(error: string, message: string): ToolResult {
  return { ...json({ error, message }), isError: true };
}

const sessionInput = z.object({
  goal: z.string().describe('What the report should answer. Example: "Impact of remote work on urban housing prices"'),
  workflow_kind: z
    .enum(['simple', 'enhanced', 'domain'])
    .optional()
    .describe('simple = one draft, no revision; enhanced (default) = review and revise until accepted or out of attempts; domain = enhanced plus domain-specific writing guidance'),
  data_file_ref: z
    .string()
    .optional()
    .describe('Path returned by upload_data_file. With a data file the session runs data analysis, alone or alongside a literature review.'),
  domain: z
    .enum(['business', 'academic', 'technical', 'scientific', 'policy', 'general'])
    .optional()
    .describe('Force a domain profile instead of detecting it from the goal'),
  acceptance_threshold: z.number().min(1).max(10).optional().describe('Review score (1-10) a draft needs to be accepted. Default: 7'),
  max_revisions: z.number().int().min(0).max(5).optional().describe('Revision rounds after the first draft. Default: 2'),
  budget_tier: z.enum(['economy', 'balanced', 'premium']).optional().describe('Model cost/quality tier for this session'),
});

export type SessionInput = z.infer<typeof sessionInput>;

export function toSessionRequest(input: SessionInput): SessionRequest {
  return {
    goal: input.goal,
    workflowKind: input.workflow_kind,
    dataFileRef: input.data_file_ref,
    domain: input.domain,
    overrides: {
      acceptanceThreshold: input.acceptance_threshold,
      maxRevisionAttempts: input.max_revisions,
      budgetTier: input.budget_tier,
    },
  };
}

/**
 * Tool bodies, independent of the MCP transport.
 */
export function createToolHandlers(orchestrator: ResearchOrchestrator, config: OrchestratorConfig) {
  return {
    startResearch(input: SessionInput): ToolResult {
      const sessionId = orchestrator.start(toSessionRequest(input));
      const { session } = orchestrator.snapshot(sessionId);
      return json({
        session_id: sessionId,
        status: session.status,
        modality: session.modality,
        message: 'Research started. Poll check_research_status with this session_id.',
      });
    },

    async runResearch(input: SessionInput): Promise<ToolResult> {
      const result = await orchestrator.submit(toSessionRequest(input));
      const body = {
        success: result.success,
        session_id: result.sessionId,
        status: result.status,
        modality: result.modality,
        content: result.content,
        artifacts: result.artifacts,
        selected_version: result.selectedVersion,
        revision_decision: result.revisionDecision,
        degradation_notes: result.degradationNotes,
        error: result.error,
      };
      return result.success ? json(body) : { ...json(body), isError: true };
    },

    checkStatus({ session_id, cursor }: { session_id: string; cursor?: number }): ToolResult {
      if (!orchestrator.store.has(session_id)) {
        const stored = orchestrator.lookup(session_id);
        if (!stored) {
          return failure('Session not found', `No session with ID "${session_id}".`);
        }
        return json({ session_id, status: stored.status, artifacts: stored.artifacts, error: stored.error, events: [], next_cursor: 0 });
      }

      const state = orchestrator.snapshot(session_id);
      const page = orchestrator.events(session_id, cursor);
      const terminal = state.session.status === 'completed' || state.session.status === 'failed';
      return json({
        session_id,
        status: state.session.status,
        modality: state.session.modality,
        domain: state.session.domain,
        progress: orchestrator.emitter.lastProgress(session_id),
        revision: state.revision,
        drafts: state.drafts.map(d => ({ version: d.version, attempt: d.attempt, score: d.score })),
        degradation_notes: state.degradationNotes,
        events: page.events,
        next_cursor: page.nextCursor,
        result: terminal ? orchestrator.result(session_id) : undefined,
      });
    },

    cancelResearch({ session_id }: { session_id: string }): ToolResult {
      const success = orchestrator.cancel(session_id);
      return json({
        success,
        message: success ? 'Cancellation requested' : 'Session is not running',
      });
    },

    async uploadDataFile({ file_name, content_base64 }: { file_name: string; content_base64: string }): Promise<ToolResult> {
      const bytes = Buffer.from(content_base64, 'base64');
      const result = await saveUpload(config.uploadDir, file_name, bytes);
      return result.success
        ? json({ success: true, file_path: result.filePath })
        : { ...json({ success: false, error: result.error }), isError: true };
    },

    async getArtifact({ session_id, artifact_name }: { session_id: string; artifact_name: string }): Promise<ToolResult> {
      try {
        const text = await orchestrator.readArtifact(session_id, artifact_name);
        return { content: [{ type: 'text', text }] };
      } catch (error) {
        return failure('Artifact unavailable', errorMessage(error));
      }
    },

    listSessions({ limit, search }: { limit?: number; search?: string }): ToolResult {
      const sessions = orchestrator.listSessions(limit ?? 20, search);
      return json({ count: sessions.length, sessions });
    },
  };
}

export type ToolHandlers = ReturnType<typeof createToolHandlers>;

export function registerResearchTools(server: McpServer, handlers: ToolHandlers): void {
  server.registerTool(
    'start_research',
    {
      title: 'Start Research Report (async)',
      description: `Starts a research session in the background and returns a session_id immediately.

The session runs literature discovery and/or data analysis, synthesizes the findings, plans an outline,
drafts the report, reviews it (score 1-10) and revises until the draft is accepted or the revision limit
is reached, then formats the references.

Poll check_research_status with the session_id to follow progress.`,
      inputSchema: sessionInput.shape,
    },
    async (input) => handlers.startResearch(input)
  );

  server.registerTool(
    'run_research',
    {
      title: 'Run Research Report (blocking)',
      description: `Runs a research session and waits for it to finish. Can take several minutes;
prefer start_research + check_research_status with clients that time out tool calls.`,
      inputSchema: sessionInput.shape,
    },
    async (input) => handlers.runResearch(input)
  );

  server.registerTool(
    'check_research_status',
    {
      title: 'Check Research Session Status',
      description: `Returns the session status, the progress and log events since \`cursor\`, and the result once
the session is completed or failed. Pass back next_cursor on the next call to receive only new events.`,
      inputSchema: {
        session_id: z.string().describe('The session_id returned from start_research'),
        cursor: z.number().int().min(0).optional().describe('next_cursor from the previous call. Default: 0 (all events)'),
      },
    },
    async (input) => handlers.checkStatus(input)
  );

  server.registerTool(
    'cancel_research',
    {
      title: 'Cancel Research Session',
      description: 'Cancels a running session. It ends as failed with detail "Cancelled"; drafts already produced are kept.',
      inputSchema: {
        session_id: z.string().describe('The session_id to cancel'),
      },
    },
    async (input) => handlers.cancelResearch(input)
  );

  server.registerTool(
    'upload_data_file',
    {
      title: 'Upload Data File',
      description: 'Stores a data file (CSV recommended) and returns the file_path to pass as data_file_ref.',
      inputSchema: {
        file_name: z.string().min(1).describe('Original file name, e.g. "sales-2024.csv"'),
        content_base64: z.string().min(1).describe('File content, base64 encoded'),
      },
    },
    async (input) => handlers.uploadDataFile(input)
  );

  server.registerTool(
    'get_artifact',
    {
      title: 'Read Session Artifact',
      description: 'Reads an artifact of a completed session: report.md, references.md, draft-vN.md or session.json.',
      inputSchema: {
        session_id: z.string().describe('The session_id'),
        artifact_name: z.string().describe('Artifact name from the session result, e.g. "report.md"'),
      },
    },
    async (input) => handlers.getArtifact(input)
  );

  server.registerTool(
    'list_sessions',
    {
      title: 'List Research Sessions',
      description: 'Lists recent research sessions, newest first.',
      inputSchema: {
        limit: z.number().int().min(1).max(100).optional().describe('Maximum sessions to return. Default: 20'),
        search: z.string().optional().describe('Only sessions whose goal contains this text'),
      },
    },
    async (input) => handlers.listSessions(input)
  );
}
