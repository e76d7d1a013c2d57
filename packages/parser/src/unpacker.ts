import { open, type Entry } from 'yauzl-promise';
import type { LogArchive, LogArchiveEntry } from './types.js';

/**
 * Read every text log (.txt / .log) out of a zip archive, in archive order.
 */
export async function unpackLogArchive(zipPath: string): Promise<LogArchive> {
  const zipFile = await open(zipPath);
  const entries: LogArchiveEntry[] = [];

  try {
    for await (const entry of zipFile) {
      const fileName = entry.filename;

      // Skip directories
      if (fileName.endsWith('/')) continue;
      if (!isTextLogFile(fileName)) continue;

      const buffer = await readEntry(entry);
      entries.push({ fileName, content: buffer.toString('utf-8') });
    }
  } finally {
    await zipFile.close();
  }

  if (entries.length === 0) {
    throw new Error(`No text log file found in ${zipPath}`);
  }

  return { entries };
}

/**
 * Read a zip entry into a Buffer.
 */
async function readEntry(entry: Entry): Promise<Buffer> {
  const stream = await entry.openReadStream();
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
  }
  return Buffer.concat(chunks);
}

export function isTextLogFile(fileName: string): boolean {
  return /\.(txt|log)$/i.test(fileName);
}

/**
 * Check if a filename is the main bugreport text file.
 * Matches: bugreport-DEVICE-DATE.txt or bugreport.txt at any nesting level.
 */
export function isMainBugreportFile(fileName: string): boolean {
  const base = fileName.split('/').pop() ?? '';
  return /^bugreport.*\.txt$/.test(base) && !base.includes('mini');
}

/**
 * The log text to analyze: the main bugreport file when the archive is a
 * bugreport, otherwise every text entry joined in archive order.
 */
export function selectPrimaryLog(archive: LogArchive): string {
  const main = archive.entries.find((e) => isMainBugreportFile(e.fileName));
  if (main) return main.content;
  return archive.entries.map((e) => e.content).join('\n');
}
