import { describe, it, expect } from 'vitest';
import { analyzeCrashLog } from '../src/report.js';

const MINIDUMP = Buffer.concat([
  Buffer.from([
    0x4d, 0x44, 0x4d, 0x50,
    0x93, 0xa7, 0x00, 0x00,
    0x03, 0x00, 0x00, 0x00,
    0x20, 0x00, 0x00, 0x00,
  ]),
  Buffer.alloc(16),
  Buffer.from('SIGSEGV at libc.so', 'ascii'),
]);

function crashLog(payload: string, chunkSize = 20): string {
  const lines = [
    '01-15 10:00:00.100  4321  4321 I ActivityManager: Start proc 4321:com.example.desktop/u0a210',
    '01-15 10:00:00.200  4321  4388 E libc    : Fatal signal 11 (SIGSEGV), code 1 (SEGV_MAPERR)',
    '01-15 10:00:00.300  4321  4321 F crashpad: -----BEGIN CRASHPAD MINIDUMP-----',
  ];
  for (let i = 0; i < payload.length; i += chunkSize) {
    lines.push(`01-15 10:00:00.301  4321  4321 F crashpad: ${payload.slice(i, i + chunkSize)}`);
  }
  lines.push('01-15 10:00:00.400  4321  4321 F crashpad: -----END CRASHPAD MINIDUMP-----');
  lines.push('01-15 10:00:00.500  1000  1050 I ActivityManager: Process com.example.desktop (pid 4321) has died');
  return lines.join('\n');
}

describe('analyzeCrashLog', () => {
  it('should decode and analyze a base64 minidump', () => {
    const report = analyzeCrashLog(crashLog(MINIDUMP.toString('base64')));

    expect(report.timestamp).toBe('01-15 10:00:00.100');
    expect(report.processId).toBe(4321);
    expect(report.contextLines).toHaveLength(2);
    expect(report.payload).toEqual({ found: true, encodedLength: 68 });
    expect(report.decoding.strategy).toBe('base64');
    expect(report.decoding.decodedSize).toBe(50);
    expect(report.signature).toBe('minidump');
    expect(report.formatDescription).toBe('Windows Minidump');
    expect(report.header).toEqual({ version: 0xa793, streamCount: 3, streamDirectoryOffset: 0x20 });
    expect(report.rawAnalysis).toBeUndefined();
  });

  it('should run forensics on minidump buffers too', () => {
    const { findings, hexDump } = analyzeCrashLog(crashLog(MINIDUMP.toString('base64')));

    expect(findings.printableStrings).toEqual(['MDMP', 'SIGSEGV at libc.so']);
    expect(findings.keywordHits.map((h) => h.keyword)).toEqual(['SIGSEGV', 'libc.so']);
    expect(findings.keywordHits[0].byteOffset).toBe(32);
    expect(findings.keywordHits[1].byteOffset).toBe(43);
    expect([...findings.candidateAddresses].sort((a, b) => a - b)).toEqual([
      0x20564745,
      0x2e636269,
      0x504d444d,
      0x53474953,
      0x6c207461,
      0x30000a793,
      0x2000000003,
    ]);
    expect(hexDump).toHaveLength(4);
    expect(hexDump[0]).toBe('0000: 4d 44 4d 50 93 a7 00 00 03 00 00 00 20 00 00 00');
  });

  it('should honor analysis options', () => {
    const report = analyzeCrashLog(crashLog(MINIDUMP.toString('base64')), {
      hexDumpBytes: 16,
      minStringLength: 20,
    });
    expect(report.hexDump).toEqual(['0000: 4d 44 4d 50 93 a7 00 00 03 00 00 00 20 00 00 00']);
    expect(report.findings.printableStrings).toEqual([]);
  });

  it('should decode a hex payload and omit truncated header fields', () => {
    const report = analyzeCrashLog(crashLog('4d 44 4d 50 01'));
    expect(report.decoding.strategy).toBe('hex');
    expect(report.decoding.attempts.map((a) => a.status)).toEqual(['declined', 'decoded']);
    expect(report.signature).toBe('minidump');
    expect(report.header).toEqual({});
  });

  it('should analyze the first dump when two are logged back to back', () => {
    const dump = 'TURNUAEAAAACAAAAIAAAAA==';
    const report = analyzeCrashLog(crashLog(dump + dump));
    expect(report.payload).toEqual({ found: true, encodedLength: 48 });
    expect(report.decoding.strategy).toBe('base64');
    expect(report.decoding.decodedSize).toBe(16);
    expect(report.signature).toBe('minidump');
    expect(report.header).toEqual({ version: 1, streamCount: 2, streamDirectoryOffset: 32 });
  });

  it('should leave the header out for other containers', () => {
    const elf = Buffer.from([0x7f, 0x45, 0x4c, 0x46, 0x02, 0x01, 0x01, 0x00]);
    const report = analyzeCrashLog(crashLog(elf.toString('base64')));
    expect(report.signature).toBe('elf');
    expect(report.header).toBeUndefined();
  });

  it('should fall back to raw analysis when the payload does not decode', () => {
    const report = analyzeCrashLog(crashLog('xyz xyz xyz'));
    expect(report.decoding.strategy).toBe('raw');
    expect(report.signature).toBe('unknown');
    expect(report.rawAnalysis?.repeatingSubstrings).toEqual([{ value: 'xyz', count: 3 }]);
    expect(report.findings.entropyBits).toBe(0);
    expect(report.hexDump).toEqual([]);
  });

  it('should produce a sparse report for logs without a payload', () => {
    const report = analyzeCrashLog('01-15 10:00:00.100  1000  1001 I Tag: all quiet');
    expect(report.timestamp).toBe('01-15 10:00:00.100');
    expect(report.processId).toBeUndefined();
    expect(report.payload).toEqual({ found: false, encodedLength: 0 });
    expect(report.decoding).toEqual({ strategy: null, attempts: [] });
    expect(report.signature).toBe('unknown');
    expect(report.findings).toEqual({
      entropyBits: 0,
      repeatingPatterns: [],
      printableStrings: [],
      candidateAddresses: [],
      keywordHits: [],
    });
    expect(report.likelyCompressed).toBe(false);
  });

  it('should not throw on empty input', () => {
    expect(() => analyzeCrashLog('')).not.toThrow();
  });

  it('should be identical across runs on the same input', () => {
    const log = crashLog(MINIDUMP.toString('base64'));
    expect(analyzeCrashLog(log)).toEqual(analyzeCrashLog(log));
  });
});
