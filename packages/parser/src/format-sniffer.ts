import type { ContainerSignature } from './types.js';

interface SignatureRule {
  prefix: Buffer;
  signature: ContainerSignature;
}

// Checked in order, first match wins. The 4-byte ELF magic precedes the
// bare "ELF" form.
const SIGNATURE_RULES: SignatureRule[] = [
  { prefix: Buffer.from([0x4d, 0x44, 0x4d, 0x50]), signature: 'minidump' },
  { prefix: Buffer.from([0x7f, 0x45, 0x4c, 0x46]), signature: 'elf' },
  { prefix: Buffer.from('ELF', 'ascii'), signature: 'elf' },
  { prefix: Buffer.from([0x50, 0x4b]), signature: 'zip_archive' },
  { prefix: Buffer.from([0x89, 0x50, 0x4e, 0x47]), signature: 'png' },
  { prefix: Buffer.from('GIF8', 'ascii'), signature: 'gif' },
  { prefix: Buffer.from([0xff, 0xd8, 0xff]), signature: 'jpeg' },
];

const SIGNATURE_DESCRIPTIONS: Record<ContainerSignature, string> = {
  minidump: 'Windows Minidump',
  elf: 'ELF executable',
  zip_archive: 'ZIP/APK archive',
  png: 'PNG image',
  gif: 'GIF image',
  jpeg: 'JPEG image',
  unknown: 'Unknown binary format',
};

function startsWith(data: Buffer, prefix: Buffer): boolean {
  if (data.length < prefix.length) return false;
  return data.subarray(0, prefix.length).equals(prefix);
}

/**
 * Classify a decoded buffer by its leading bytes.
 */
export function sniffFormat(data: Buffer): ContainerSignature {
  const rule = SIGNATURE_RULES.find((r) => startsWith(data, r.prefix));
  return rule?.signature ?? 'unknown';
}

export function describeSignature(signature: ContainerSignature): string {
  return SIGNATURE_DESCRIPTIONS[signature];
}
