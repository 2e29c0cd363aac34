import { existsSync, readFileSync, writeFileSync, mkdirSync } from 'fs';
import { join } from 'path';
import { z } from 'zod';
import type { Modality, SessionStatus, WorkflowKind } from '../types/index.js';

const MAX_ENTRIES = 100;

const sessionMetadataSchema = z.object({
  sessionId: z.string(),
  goal: z.string(),
  status: z.enum(['pending', 'running', 'completed', 'failed']),
  workflowKind: z.enum(['simple', 'enhanced', 'domain']),
  modality: z.enum(['literature', 'data', 'hybrid']).optional(),
  createdAt: z.string(),
  completedAt: z.string().optional(),
  dir: z.string(),               // Session artifact directory
  artifacts: z.array(z.string()),
  selectedVersion: z.number().optional(),
  score: z.number().optional(),
  error: z.string().optional(),
});

const registrySchema = z.object({
  sessions: z.array(sessionMetadataSchema),
  lastUpdated: z.string(),
});

export interface SessionMetadata {
  sessionId: string;
  goal: string;
  status: SessionStatus;
  workflowKind: WorkflowKind;
  modality?: Modality;
  createdAt: string;
  completedAt?: string;
  dir: string;
  artifacts: string[];
  selectedVersion?: number;
  score?: number;
  error?: string;
}

type Registry = z.infer<typeof registrySchema>;

/**
 * JSON index of finished sessions, most recent first, kept at <dir>/session-registry.json.
 */
export class SessionRegistry {
  private readonly file: string;

  constructor(private readonly dir: string) {
    this.file = join(dir, 'session-registry.json');
  }

  private ensureDir(): void {
    if (!existsSync(this.dir)) {
      mkdirSync(this.dir, { recursive: true });
    }
  }

  load(): Registry {
    if (!existsSync(this.file)) {
      return { sessions: [], lastUpdated: new Date().toISOString() };
    }

    try {
      return registrySchema.parse(JSON.parse(readFileSync(this.file, 'utf-8')));
    } catch (error) {
      console.error('[Registry] Unreadable registry, starting fresh:', error instanceof Error ? error.message : error);
      return { sessions: [], lastUpdated: new Date().toISOString() };
    }
  }

  private save(registry: Registry): void {
    this.ensureDir();
    registry.lastUpdated = new Date().toISOString();
    writeFileSync(this.file, JSON.stringify(registry, null, 2));
  }

  register(metadata: SessionMetadata): void {
    const registry = this.load();

    const existing = registry.sessions.findIndex(s => s.sessionId === metadata.sessionId);
    if (existing >= 0) {
      registry.sessions.splice(existing, 1);
    }
    registry.sessions.unshift(metadata);

    if (registry.sessions.length > MAX_ENTRIES) {
      registry.sessions = registry.sessions.slice(0, MAX_ENTRIES);
    }

    this.save(registry);
  }

  getAll(limit: number = 20): SessionMetadata[] {
    return this.load().sessions.slice(0, limit);
  }

  getById(sessionId: string): SessionMetadata | undefined {
    return this.load().sessions.find(s => s.sessionId === sessionId);
  }

  search(term: string): SessionMetadata[] {
    const needle = term.toLowerCase();
    return this.load().sessions.filter(s => s.goal.toLowerCase().includes(needle));
  }
}
