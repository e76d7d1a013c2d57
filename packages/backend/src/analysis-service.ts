import fs from 'node:fs';
import path from 'node:path';
import {
  analyzeCrashLog,
  selectPrimaryLog,
  unpackLogArchive,
  type AnalyzeOptions,
  type CrashReport,
} from '@dumplens/parser';

export const ACCEPTED_EXTENSIONS = ['.txt', '.log', '.zip'];

// Upload ids are UUIDs; anything else never names a stored file.
const UPLOAD_ID_RE = /^[0-9a-f-]+$/i;

export function isAcceptedFile(fileName: string): boolean {
  return ACCEPTED_EXTENSIONS.includes(path.extname(fileName).toLowerCase());
}

/**
 * Locate a stored upload by id, whatever extension it was saved with.
 */
export function findUpload(uploadDir: string, id: string): string | undefined {
  if (!UPLOAD_ID_RE.test(id)) return undefined;
  for (const ext of ACCEPTED_EXTENSIONS) {
    const candidate = path.join(uploadDir, `${id}${ext}`);
    if (fs.existsSync(candidate)) return candidate;
  }
  return undefined;
}

/**
 * Log text of an uploaded file. Zip archives are unpacked and their
 * primary log selected.
 */
export async function readLogText(filePath: string): Promise<string> {
  if (path.extname(filePath).toLowerCase() === '.zip') {
    const archive = await unpackLogArchive(filePath);
    return selectPrimaryLog(archive);
  }
  return fs.promises.readFile(filePath, 'utf-8');
}

export async function analyzeUpload(filePath: string, options: AnalyzeOptions): Promise<CrashReport> {
  const log = await readLogText(filePath);
  return analyzeCrashLog(log, options);
}

/**
 * Pasted log text from a request body: either a text/plain body or a JSON
 * object with a `log` string.
 */
export function readLogBody(body: unknown): string | undefined {
  if (typeof body === 'string') return body;
  if (body && typeof body === 'object' && 'log' in body && typeof body.log === 'string') {
    return body.log;
  }
  return undefined;
}
