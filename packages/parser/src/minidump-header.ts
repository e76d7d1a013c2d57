import { ByteReader } from './byte-reader.js';
import type { MinidumpHeader } from './types.js';

const HEADER_FIELDS_OFFSET = 4;  // past the "MDMP" magic

/**
 * Read version, stream count and stream directory offset from a buffer
 * already identified as a minidump. Fields the buffer is too short for are
 * left out. The stream directory itself is not walked.
 */
export function parseMinidumpHeader(data: Buffer): MinidumpHeader {
  const reader = new ByteReader(data);
  reader.seek(HEADER_FIELDS_OFFSET);

  const header: MinidumpHeader = {};

  const version = reader.readUint32();
  if (version !== undefined) header.version = version;

  const streamCount = reader.readUint32();
  if (streamCount !== undefined) header.streamCount = streamCount;

  const streamDirectoryOffset = reader.readUint32();
  if (streamDirectoryOffset !== undefined) header.streamDirectoryOffset = streamDirectoryOffset;

  return header;
}
