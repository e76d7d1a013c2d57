import { isPrintable } from './printable.js';
import type {
  CharacterClassStat,
  DecodeAttempt,
  DecodeOutcome,
  DecodeStrategyName,
  RawAnalysis,
  RepeatingSubstring,
} from './types.js';

// ============================================================
// Byte decoding strategies
// ============================================================

const BASE64_NON_ALPHABET_RE = /[^A-Za-z0-9+/=]/g;
const HEX_NON_DIGIT_RE = /[^0-9A-Fa-f]/g;

/**
 * Base64 after dropping everything outside the alphabet.
 *
 * Decoding is lenient about padding: an `=` that cannot finish a quad is
 * skipped, and the first quad that padding does finish ends the data, so
 * anything after it (a second dump, a stray `=`) is ignored. Only an
 * unpadded partial quad at the very end is an error.
 */
export function decodeBase64(encoded: string): DecodeOutcome {
  const clean = encoded.replace(BASE64_NON_ALPHABET_RE, '');
  if (!clean) return { ok: false, reason: 'no base64 characters' };

  let data = '';
  let pads = 0;
  let terminated = false;
  for (const ch of clean) {
    if (ch !== '=') {
      data += ch;
      pads = 0;
      continue;
    }
    const quadPos = data.length % 4;
    pads++;
    if (quadPos >= 2 && quadPos + pads >= 4) {
      terminated = true;
      break;
    }
  }

  if (!terminated) {
    const quadPos = data.length % 4;
    if (quadPos === 1) {
      return {
        ok: false,
        reason: `number of base64 data characters (${data.length}) cannot be 1 more than a multiple of 4`,
      };
    }
    if (quadPos !== 0) return { ok: false, reason: 'incorrect base64 padding' };
  }

  // Buffer accepts the unpadded 2- or 3-character final quad.
  const buffer = Buffer.from(data, 'base64');
  if (buffer.length === 0) return { ok: false, reason: 'base64 decoded to zero bytes' };
  return { ok: true, buffer };
}

/**
 * Hexadecimal after dropping every non-hex-digit character.
 */
export function decodeHex(encoded: string): DecodeOutcome {
  const clean = encoded.replace(HEX_NON_DIGIT_RE, '');
  if (!clean) return { ok: false, reason: 'no hex digits' };
  if (clean.length % 2 !== 0) return { ok: false, reason: `odd number of hex digits (${clean.length})` };
  return { ok: true, buffer: Buffer.from(clean, 'hex') };
}

interface DecodeStrategy {
  name: Exclude<DecodeStrategyName, 'raw'>;
  decode: (encoded: string) => DecodeOutcome;
}

// Tried in order; the first to produce bytes wins.
export const DECODE_STRATEGIES: readonly DecodeStrategy[] = [
  { name: 'base64', decode: decodeBase64 },
  { name: 'hex', decode: decodeHex },
];

export type PayloadDecodeResult =
  | {
    kind: 'binary';
    strategy: Exclude<DecodeStrategyName, 'raw'>;
    buffer: Buffer;
    attempts: DecodeAttempt[];
  }
  | {
    kind: 'raw';
    strategy: 'raw';
    rawAnalysis: RawAnalysis;
    attempts: DecodeAttempt[];
  };

function runStrategy(strategy: DecodeStrategy, encoded: string): DecodeOutcome {
  try {
    return strategy.decode(encoded);
  } catch (err) {
    return { ok: false, reason: err instanceof Error ? err.message : String(err) };
  }
}

/**
 * Decode a crashpad payload, falling back to structural analysis of the
 * text itself when no strategy yields bytes.
 */
export function decodePayload(encoded: string): PayloadDecodeResult {
  const attempts: DecodeAttempt[] = [];

  for (const strategy of DECODE_STRATEGIES) {
    const outcome = runStrategy(strategy, encoded);
    if (outcome.ok) {
      attempts.push({ strategy: strategy.name, status: 'decoded', decodedSize: outcome.buffer.length });
      return { kind: 'binary', strategy: strategy.name, buffer: outcome.buffer, attempts };
    }
    attempts.push({ strategy: strategy.name, status: 'declined', reason: outcome.reason });
  }

  attempts.push({ strategy: 'raw', status: 'decoded' });
  return { kind: 'raw', strategy: 'raw', rawAnalysis: analyzeRawText(encoded), attempts };
}

// ============================================================
// Raw text analysis
// ============================================================

const PREVIEW_LENGTH = 100;
const SUBSTRING_MIN_LENGTH = 3;
const SUBSTRING_MAX_LENGTH = 10;

const DIGIT_RE = /\p{Nd}/u;
const LETTER_RE = /[A-Za-z]/;
const SPECIAL_RE = /[^A-Za-z0-9\s]/;
const ALNUM_RE = /^[\p{L}\p{N}]+$/u;

function classStat(count: number, total: number): CharacterClassStat {
  return { count, percentage: total === 0 ? 0 : (count / total) * 100 };
}

/**
 * Alphanumeric substrings of 3 to 10 characters that occur more than once
 * (overlapping), most frequent first, longer first on ties.
 */
export function findRepeatingSubstrings(text: string): RepeatingSubstring[] {
  const chars = Array.from(text);
  const counts = new Map<string, RepeatingSubstring>();

  for (let length = SUBSTRING_MIN_LENGTH; length <= SUBSTRING_MAX_LENGTH; length++) {
    for (let i = 0; i + length <= chars.length; i++) {
      const value = chars.slice(i, i + length).join('');
      if (!ALNUM_RE.test(value)) continue;
      const existing = counts.get(value);
      if (existing) {
        existing.count++;
      } else {
        counts.set(value, { value, count: 1 });
      }
    }
  }

  return [...counts.values()]
    .filter((s) => s.count > 1)
    .sort((a, b) => b.count - a.count || Array.from(b.value).length - Array.from(a.value).length);
}

/**
 * Character-class distribution and repeating substrings of text that did
 * not decode to bytes.
 */
export function analyzeRawText(text: string): RawAnalysis {
  const chars = Array.from(text);
  let printable = 0;
  let digits = 0;
  let letters = 0;
  let special = 0;

  for (const ch of chars) {
    const code = ch.codePointAt(0) ?? 0;
    if (isPrintable(code)) printable++;
    if (DIGIT_RE.test(ch)) digits++;
    if (LETTER_RE.test(ch)) letters++;
    if (SPECIAL_RE.test(ch)) special++;
  }

  const total = chars.length;
  return {
    length: total,
    head: chars.slice(0, PREVIEW_LENGTH).join(''),
    tail: chars.slice(-PREVIEW_LENGTH).join(''),
    distribution: {
      printable: classStat(printable, total),
      digits: classStat(digits, total),
      letters: classStat(letters, total),
      special: classStat(special, total),
    },
    repeatingSubstrings: findRepeatingSubstrings(text),
  };
}
