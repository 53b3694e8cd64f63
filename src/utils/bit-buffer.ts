/** Growable MSB-first bit buffer. */
export class BitBuffer {
  private bytes = new Uint8Array(64);
  private bitLength = 0;

  get length(): number {
    return this.bitLength;
  }

  push(bit: boolean): void {
    const byte = this.bitLength >> 3;
    if (byte >= this.bytes.length) {
      const grown = new Uint8Array(this.bytes.length * 2);
      grown.set(this.bytes);
      this.bytes = grown;
    }
    if (bit) {
      this.bytes[byte] |= 0x80 >> (this.bitLength & 7);
    }
    this.bitLength++;
  }

  extend(bits: Iterable<boolean>): void {
    for (const bit of bits) {
      this.push(bit);
    }
  }

  /** Used bytes; the last byte is zero padded. */
  toBytes(): Uint8Array {
    return this.bytes.slice(0, Math.ceil(this.bitLength / 8));
  }
}

export function readBit(data: Uint8Array, index: number): boolean {
  const byte = data[index >> 3];
  return byte !== undefined && (byte & (0x80 >> (index & 7))) !== 0;
}
