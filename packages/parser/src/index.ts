export * from './types.js';
export { analyzeCrashLog } from './report.js';
export {
  extractCrashpadPayload,
  extractCrashContext,
  PAYLOAD_MARKER,
  BEGIN_SENTINEL,
  END_SENTINEL,
} from './extractor.js';
export {
  decodePayload,
  decodeBase64,
  decodeHex,
  analyzeRawText,
  findRepeatingSubstrings,
  DECODE_STRATEGIES,
} from './decoder.js';
export type { PayloadDecodeResult } from './decoder.js';
export { sniffFormat, describeSignature } from './format-sniffer.js';
export { parseMinidumpHeader } from './minidump-header.js';
export { ByteReader } from './byte-reader.js';
export {
  analyzeBinary,
  calculateEntropy,
  findRepeatingPatterns,
  extractStrings,
  findCandidateAddresses,
  searchCrashKeywords,
  isLikelyCompressed,
  CRASH_KEYWORDS,
  COMPRESSED_ENTROPY_THRESHOLD,
  DEFAULT_MIN_STRING_LENGTH,
} from './forensics.js';
export { formatHexDump, DEFAULT_HEX_DUMP_BYTES } from './hex-dump.js';
export { isPrintable } from './printable.js';
export { unpackLogArchive, selectPrimaryLog, isMainBugreportFile, isTextLogFile } from './unpacker.js';
