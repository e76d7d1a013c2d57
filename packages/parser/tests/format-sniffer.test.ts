import { describe, it, expect } from 'vitest';
import { sniffFormat, describeSignature } from '../src/format-sniffer.js';

function bytes(...values: number[]): Buffer {
  return Buffer.from(values);
}

describe('sniffFormat', () => {
  it('should detect a minidump', () => {
    const data = bytes(0x4d, 0x44, 0x4d, 0x50, 0x01, 0x00, 0x00, 0x00, 0x02, 0x00, 0x00, 0x00, 0x10, 0x00, 0x00, 0x00);
    expect(sniffFormat(data)).toBe('minidump');
  });

  it('should detect a zip from a 2-byte buffer', () => {
    expect(sniffFormat(bytes(0x50, 0x4b))).toBe('zip_archive');
  });

  it('should detect both ELF forms', () => {
    expect(sniffFormat(bytes(0x7f, 0x45, 0x4c, 0x46, 0x02, 0x01))).toBe('elf');
    expect(sniffFormat(Buffer.from('ELF header', 'ascii'))).toBe('elf');
  });

  it('should detect image formats', () => {
    expect(sniffFormat(bytes(0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a))).toBe('png');
    expect(sniffFormat(Buffer.from('GIF89a', 'ascii'))).toBe('gif');
    expect(sniffFormat(bytes(0xff, 0xd8, 0xff, 0xe0))).toBe('jpeg');
  });

  it('should return unknown for unmatched or too-short prefixes', () => {
    expect(sniffFormat(Buffer.from('MD', 'ascii'))).toBe('unknown');
    expect(sniffFormat(bytes(0x50))).toBe('unknown');
    expect(sniffFormat(bytes(0xff, 0xd8))).toBe('unknown');
    expect(sniffFormat(bytes(0x00, 0x01, 0x02, 0x03))).toBe('unknown');
    expect(sniffFormat(Buffer.alloc(0))).toBe('unknown');
  });
});

describe('describeSignature', () => {
  it('should describe each signature', () => {
    expect(describeSignature('minidump')).toBe('Windows Minidump');
    expect(describeSignature('zip_archive')).toBe('ZIP/APK archive');
    expect(describeSignature('unknown')).toBe('Unknown binary format');
  });
});
