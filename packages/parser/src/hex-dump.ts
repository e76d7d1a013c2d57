export const DEFAULT_HEX_DUMP_BYTES = 256;

const BYTES_PER_LINE = 16;

/**
 * Hex dump of the leading bytes, 16 per line:
 * `0000: 4d 44 4d 50 ...`
 */
export function formatHexDump(data: Buffer, limit = DEFAULT_HEX_DUMP_BYTES): string[] {
  const lines: string[] = [];
  const end = Math.min(data.length, Math.max(0, limit));

  for (let offset = 0; offset < end; offset += BYTES_PER_LINE) {
    const chunk = data.subarray(offset, Math.min(offset + BYTES_PER_LINE, end));
    const bytes = [...chunk].map((b) => b.toString(16).padStart(2, '0')).join(' ');
    lines.push(`${offset.toString(16).padStart(4, '0')}: ${bytes}`);
  }

  return lines;
}
