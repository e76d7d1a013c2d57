/**
 * Little-endian cursor over a byte buffer. Every read is bounds-checked:
 * a read that would run past the end returns undefined and leaves the
 * cursor where it was.
 */
export class ByteReader {
  private pos = 0;

  constructor(private readonly data: Buffer) {}

  seek(position: number): void {
    this.pos = position;
  }

  readUint32(): number | undefined {
    if (this.pos + 4 > this.data.length) return undefined;
    const value = this.data.readUInt32LE(this.pos);
    this.pos += 4;
    return value;
  }

  readUint64(): bigint | undefined {
    if (this.pos + 8 > this.data.length) return undefined;
    const value = this.data.readBigUInt64LE(this.pos);
    this.pos += 8;
    return value;
  }
}
