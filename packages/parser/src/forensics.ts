import { ByteReader } from './byte-reader.js';
import { isPrintable } from './printable.js';
import type { ForensicFindings, KeywordHit, RepeatingPattern } from './types.js';

// ============================================================
// Constants
// ============================================================

export const DEFAULT_MIN_STRING_LENGTH = 4;
export const COMPRESSED_ENTROPY_THRESHOLD = 7.0;

const PATTERN_MIN_LENGTH = 2;
const PATTERN_MAX_LENGTH = 4;

const ADDR32_MIN = 0x10000000;
const ADDR32_MAX = 0xffffffff;
const ADDR64_MIN = 0x100000000n;
const ADDR64_MAX = 0x7fffffffffffn;

const KEYWORD_CONTEXT_BYTES = 10;

// Output order of keyword hits follows this list.
export const CRASH_KEYWORDS = [
  'SIGSEGV', 'SIGABRT', 'SIGBUS', 'SIGFPE', 'SIGILL',
  'segfault', 'abort', 'crash', 'exception', 'fault',
  'stack', 'heap', 'memory', 'null', 'access',
  'libandroid', 'libc.so', 'libm.so', 'liblog.so',
] as const;

// ============================================================
// Entropy
// ============================================================

/**
 * Shannon entropy in bits per byte (0 for an empty buffer, at most 8).
 */
export function calculateEntropy(data: Buffer): number {
  if (data.length === 0) return 0;

  const freq = new Uint32Array(256);
  for (const byte of data) {
    freq[byte]++;
  }

  let entropy = 0;
  for (const count of freq) {
    if (count === 0) continue;
    const p = count / data.length;
    entropy -= p * Math.log2(p);
  }
  return entropy;
}

export function isLikelyCompressed(entropyBits: number): boolean {
  return entropyBits >= COMPRESSED_ENTROPY_THRESHOLD;
}

// ============================================================
// Repeating byte patterns
// ============================================================

/**
 * Count every overlapping 2-, 3- and 4-byte window and keep the ones seen
 * more than once, most frequent first, longer patterns first on ties.
 */
export function findRepeatingPatterns(data: Buffer): RepeatingPattern[] {
  const counts = new Map<string, RepeatingPattern>();

  for (let length = PATTERN_MIN_LENGTH; length <= PATTERN_MAX_LENGTH; length++) {
    for (let i = 0; i + length <= data.length; i++) {
      const pattern = data.toString('hex', i, i + length);
      const existing = counts.get(pattern);
      if (existing) {
        existing.count++;
      } else {
        counts.set(pattern, { pattern, length, count: 1 });
      }
    }
  }

  return [...counts.values()]
    .filter((p) => p.count > 1)
    .sort((a, b) => b.count - a.count || b.length - a.length);
}

// ============================================================
// Printable strings
// ============================================================

/**
 * Runs of printable ASCII at least `minLength` long, in buffer order.
 * A run is never empty, whatever `minLength` says.
 */
export function extractStrings(data: Buffer, minLength = DEFAULT_MIN_STRING_LENGTH): string[] {
  const threshold = Math.max(1, minLength);
  const strings: string[] = [];
  let runStart = 0;

  for (let i = 0; i <= data.length; i++) {
    if (i < data.length && isPrintable(data[i])) continue;
    if (i - runStart >= threshold) {
      strings.push(data.toString('ascii', runStart, i));
    }
    runStart = i + 1;
  }

  return strings;
}

// ============================================================
// Candidate addresses
// ============================================================

/**
 * At every 4-byte aligned offset, read a 32-bit and (where 8 bytes remain)
 * a 64-bit little-endian value and keep those inside the plausible user
 * address ranges. The two reads are independent of each other.
 */
export function findCandidateAddresses(data: Buffer): number[] {
  const reader = new ByteReader(data);
  const found = new Set<number>();

  for (let offset = 0; offset + 4 <= data.length; offset += 4) {
    reader.seek(offset);
    const addr32 = reader.readUint32();
    if (addr32 !== undefined && addr32 >= ADDR32_MIN && addr32 <= ADDR32_MAX) {
      found.add(addr32);
    }

    reader.seek(offset);
    const addr64 = reader.readUint64();
    if (addr64 !== undefined && addr64 >= ADDR64_MIN && addr64 <= ADDR64_MAX) {
      // Upper bound is below 2^53, so the value is exact as a number
      found.add(Number(addr64));
    }
  }

  return [...found];
}

// ============================================================
// Crash keywords
// ============================================================

/**
 * First occurrence of each crash keyword with 10 bytes of context either
 * side, clamped to the buffer.
 */
export function searchCrashKeywords(data: Buffer): KeywordHit[] {
  const hits: KeywordHit[] = [];

  for (const keyword of CRASH_KEYWORDS) {
    const needle = Buffer.from(keyword, 'ascii');
    const byteOffset = data.indexOf(needle);
    if (byteOffset === -1) continue;

    const context = data.subarray(
      Math.max(0, byteOffset - KEYWORD_CONTEXT_BYTES),
      byteOffset + needle.length + KEYWORD_CONTEXT_BYTES,
    );
    hits.push({
      keyword,
      byteOffset,
      contextHex: context.toString('hex'),
      contextText: context.toString('utf8'),
    });
  }

  return hits;
}

// ============================================================
// Combined
// ============================================================

export function emptyFindings(): ForensicFindings {
  return {
    entropyBits: 0,
    repeatingPatterns: [],
    printableStrings: [],
    candidateAddresses: [],
    keywordHits: [],
  };
}

export function analyzeBinary(
  data: Buffer,
  minStringLength = DEFAULT_MIN_STRING_LENGTH,
): ForensicFindings {
  return {
    entropyBits: calculateEntropy(data),
    repeatingPatterns: findRepeatingPatterns(data),
    printableStrings: extractStrings(data, minStringLength),
    candidateAddresses: findCandidateAddresses(data),
    keywordHits: searchCrashKeywords(data),
  };
}
