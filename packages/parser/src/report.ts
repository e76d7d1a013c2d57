import { decodePayload } from './decoder.js';
import { extractCrashContext, extractCrashpadPayload } from './extractor.js';
import { describeSignature, sniffFormat } from './format-sniffer.js';
import {
  DEFAULT_MIN_STRING_LENGTH,
  analyzeBinary,
  emptyFindings,
  isLikelyCompressed,
} from './forensics.js';
import { DEFAULT_HEX_DUMP_BYTES, formatHexDump } from './hex-dump.js';
import { parseMinidumpHeader } from './minidump-header.js';
import type { AnalyzeOptions, CrashReport } from './types.js';

/**
 * Run the full pipeline over one captured log: extract the crashpad
 * payload, decode it, identify the container and collect forensic findings.
 * Never throws; a log without a payload yields a sparse report.
 */
export function analyzeCrashLog(log: string, options: AnalyzeOptions = {}): CrashReport {
  const hexDumpBytes = options.hexDumpBytes ?? DEFAULT_HEX_DUMP_BYTES;
  const minStringLength = options.minStringLength ?? DEFAULT_MIN_STRING_LENGTH;

  const context = extractCrashContext(log);
  const base = {
    timestamp: context.timestamp,
    processId: context.processId,
    contextLines: context.contextLines,
  };

  const encoded = extractCrashpadPayload(log);
  if (encoded === undefined) {
    return {
      ...base,
      payload: { found: false, encodedLength: 0 },
      decoding: { strategy: null, attempts: [] },
      signature: 'unknown',
      formatDescription: describeSignature('unknown'),
      findings: emptyFindings(),
      likelyCompressed: false,
      hexDump: [],
    };
  }

  const payload = { found: true, encodedLength: encoded.length };
  const decoded = decodePayload(encoded);

  if (decoded.kind === 'raw') {
    return {
      ...base,
      payload,
      decoding: { strategy: decoded.strategy, attempts: decoded.attempts },
      signature: 'unknown',
      formatDescription: describeSignature('unknown'),
      findings: emptyFindings(),
      likelyCompressed: false,
      hexDump: [],
      rawAnalysis: decoded.rawAnalysis,
    };
  }

  const { buffer } = decoded;
  const signature = sniffFormat(buffer);
  const findings = analyzeBinary(buffer, minStringLength);

  return {
    ...base,
    payload,
    decoding: {
      strategy: decoded.strategy,
      decodedSize: buffer.length,
      attempts: decoded.attempts,
    },
    signature,
    formatDescription: describeSignature(signature),
    header: signature === 'minidump' ? parseMinidumpHeader(buffer) : undefined,
    findings,
    likelyCompressed: isLikelyCompressed(findings.entropyBits),
    hexDump: formatHexDump(buffer, hexDumpBytes),
  };
}
