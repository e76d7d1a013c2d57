import type { CrashContext } from './types.js';

// Crashpad writes the minidump to logcat at FATAL level, one chunk per line:
// 01-15 10:00:00.123  4321  4321 F crashpad: -----BEGIN CRASHPAD MINIDUMP-----
// 01-15 10:00:00.124  4321  4321 F crashpad: TURNUAZPpwAMAAAA...
const PAYLOAD_LINE_RE = /F crashpad: ([^$\n]+)/g;
export const PAYLOAD_MARKER = 'F crashpad:';
export const BEGIN_SENTINEL = '-----BEGIN CRASHPAD MINIDUMP-----';
export const END_SENTINEL = '-----END CRASHPAD MINIDUMP-----';

const TIMESTAMP_RE = /(\d{2}-\d{2} \d{2}:\d{2}:\d{2}\.\d{3})/;
const PROCESS_ID_RE = /(\d+)\s+\d+\s+F crashpad:/;

const CONTEXT_LINE_COUNT = 5;

/**
 * Collect the payload chunks from every crashpad line, in file order, and
 * normalize them into one encoded string.
 * Returns undefined when the log carries no payload.
 */
export function extractCrashpadPayload(log: string): string | undefined {
  const chunks: string[] = [];
  for (const match of log.matchAll(PAYLOAD_LINE_RE)) {
    chunks.push(match[1]);
  }
  if (chunks.length === 0) return undefined;

  const payload = chunks
    .join('')
    .split(BEGIN_SENTINEL).join('')
    .split(END_SENTINEL).join('')
    .trim();

  return payload || undefined;
}

/**
 * Pull the crash time, the crashing process id and the log lines leading up
 * to the first crashpad line. Independent of whether a payload decodes.
 */
export function extractCrashContext(log: string): CrashContext {
  const timestamp = log.match(TIMESTAMP_RE)?.[1];

  const pidMatch = log.match(PROCESS_ID_RE);
  const processId = pidMatch ? parseInt(pidMatch[1], 10) : undefined;

  const lines = log.split('\n');
  const markerIndex = lines.findIndex((line) => line.includes(PAYLOAD_MARKER));
  const contextLines = markerIndex > 0
    ? lines
      .slice(Math.max(0, markerIndex - CONTEXT_LINE_COUNT), markerIndex)
      .filter((line) => line.trim() !== '')
    : [];

  return { timestamp, processId, contextLines };
}
