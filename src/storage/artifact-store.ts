import { mkdir, readFile, writeFile } from 'fs/promises';
import { join, resolve, sep } from 'path';
import { SessionValidationError } from '../errors.js';
import type { StageKind } from '../types/index.js';

const SESSION_ID_PATTERN = /^[A-Za-z0-9_-]+$/;

export function assertArtifactName(name: string): void {
  if (!name || name === '.' || name.includes('/') || name.includes('\\') || name.includes('..') || name.includes('\0')) {
    throw new SessionValidationError(`Invalid artifact name: ${name}`);
  }
}

function assertSessionId(sessionId: string): void {
  if (!SESSION_ID_PATTERN.test(sessionId)) {
    throw new SessionValidationError(`Invalid session id: ${sessionId}`);
  }
}

/**
 * Session-scoped files under <outputDir>/<sessionId>/. Nothing is ever shared
 * between sessions.
 */
export class ArtifactStore {
  private readonly root: string;

  constructor(outputDir: string) {
    this.root = resolve(outputDir);
  }

  sessionDir(sessionId: string): string {
    assertSessionId(sessionId);
    return join(this.root, sessionId);
  }

  stageDir(sessionId: string, stage: StageKind): string {
    return join(this.sessionDir(sessionId), 'stages', stage);
  }

  pathFor(sessionId: string, name: string): string {
    assertArtifactName(name);
    const dir = this.sessionDir(sessionId);
    const path = join(dir, name);
    if (!path.startsWith(dir + sep)) {
      throw new SessionValidationError(`Invalid artifact name: ${name}`);
    }
    return path;
  }

  async write(sessionId: string, name: string, content: string): Promise<string> {
    const path = this.pathFor(sessionId, name);
    await mkdir(this.sessionDir(sessionId), { recursive: true });
    await writeFile(path, content, 'utf-8');
    return path;
  }

  async read(sessionId: string, name: string): Promise<string> {
    return readFile(this.pathFor(sessionId, name), 'utf-8');
  }
}
