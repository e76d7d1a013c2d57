// ============================================================
// Container Signatures
// ============================================================

export type ContainerSignature =
  | 'minidump'
  | 'elf'
  | 'zip_archive'
  | 'png'
  | 'gif'
  | 'jpeg'
  | 'unknown';

// ============================================================
// Minidump Header
// ============================================================

/**
 * Fields of the fixed minidump header that follow the `MDMP` magic.
 * A field is absent when the buffer ended before it could be read.
 */
export interface MinidumpHeader {
  version?: number;
  streamCount?: number;
  streamDirectoryOffset?: number;  // byte offset from buffer start
}

// ============================================================
// Decoding
// ============================================================

export type DecodeStrategyName = 'base64' | 'hex' | 'raw';

export type DecodeOutcome =
  | { ok: true; buffer: Buffer }
  | { ok: false; reason: string };

export interface DecodeAttempt {
  strategy: DecodeStrategyName;
  status: 'decoded' | 'declined';
  reason?: string;
  decodedSize?: number;
}

export interface DecodingSummary {
  strategy: DecodeStrategyName | null;   // null when no payload was found
  decodedSize?: number;
  attempts: DecodeAttempt[];
}

// ============================================================
// Raw (undecoded) text analysis
// ============================================================

export interface CharacterClassStat {
  count: number;
  percentage: number;   // 0-100
}

export interface CharacterDistribution {
  printable: CharacterClassStat;
  digits: CharacterClassStat;
  letters: CharacterClassStat;
  special: CharacterClassStat;
}

export interface RepeatingSubstring {
  value: string;
  count: number;
}

export interface RawAnalysis {
  length: number;
  head: string;         // first 100 characters
  tail: string;         // last 100 characters
  distribution: CharacterDistribution;
  repeatingSubstrings: RepeatingSubstring[];
}

// ============================================================
// Binary forensics
// ============================================================

export interface RepeatingPattern {
  pattern: string;      // lowercase hex of the pattern bytes
  length: number;       // pattern length in bytes
  count: number;
}

export interface KeywordHit {
  keyword: string;
  byteOffset: number;   // first occurrence
  contextHex: string;
  contextText: string;
}

export interface ForensicFindings {
  entropyBits: number;  // 0..8
  repeatingPatterns: RepeatingPattern[];
  printableStrings: string[];
  candidateAddresses: number[];
  keywordHits: KeywordHit[];
}

// ============================================================
// Crash Report
// ============================================================

export interface PayloadSummary {
  found: boolean;
  encodedLength: number;
}

export interface CrashContext {
  timestamp?: string;     // "MM-DD HH:mm:ss.SSS"
  processId?: number;
  contextLines: string[]; // up to 5 lines before the first crashpad line
}

export interface CrashReport {
  timestamp?: string;
  processId?: number;
  contextLines: string[];
  payload: PayloadSummary;
  decoding: DecodingSummary;
  signature: ContainerSignature;
  formatDescription: string;
  header?: MinidumpHeader;
  findings: ForensicFindings;
  likelyCompressed: boolean;
  hexDump: string[];
  rawAnalysis?: RawAnalysis;
}

export interface AnalyzeOptions {
  hexDumpBytes?: number;
  minStringLength?: number;
}

// ============================================================
// Log archives
// ============================================================

export interface LogArchiveEntry {
  fileName: string;
  content: string;
}

export interface LogArchive {
  entries: LogArchiveEntry[];
}
