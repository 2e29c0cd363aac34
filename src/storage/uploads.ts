import { existsSync, statSync } from 'fs';
import { mkdir, writeFile } from 'fs/promises';
import { basename, join } from 'path';

export interface UploadResult {
  success: boolean;
  filePath?: string;
  error?: string;
}

export const MAX_UPLOAD_BYTES = 50 * 1024 * 1024;

function safeName(fileName: string): string {
  const base = basename(fileName.replace(/\\/g, '/'));
  const cleaned = base.replace(/[^A-Za-z0-9._-]/g, '_').replace(/^\.+/, '');
  return cleaned || 'upload';
}

/**
 * Store uploaded bytes as <uploadDir>/<timestamp>-<name>. The returned path is
 * what sessions take as their data file reference.
 */
export async function saveUpload(uploadDir: string, fileName: string, bytes: Uint8Array): Promise<UploadResult> {
  if (bytes.byteLength === 0) {
    return { success: false, error: 'Uploaded file is empty' };
  }
  if (bytes.byteLength > MAX_UPLOAD_BYTES) {
    return { success: false, error: `Uploaded file exceeds ${MAX_UPLOAD_BYTES} bytes` };
  }

  try {
    await mkdir(uploadDir, { recursive: true });
    const filePath = join(uploadDir, `${Date.now()}-${safeName(fileName)}`);
    await writeFile(filePath, bytes);
    console.error(`[Upload] Saved ${bytes.byteLength} bytes to ${filePath}`);
    return { success: true, filePath };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error('[Upload] Failed:', message);
    return { success: false, error: message };
  }
}

export function isResolvableDataFile(ref: string): boolean {
  return existsSync(ref) && statSync(ref).isFile();
}
