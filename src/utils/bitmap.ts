/** 1 bit per pixel image, MSB-first, rows padded to whole bytes. */
export class Bitmap {
  readonly bytesPerRow: number;
  readonly data: Uint8Array;

  constructor(
    readonly width: number,
    readonly height: number,
  ) {
    this.bytesPerRow = Math.ceil(width / 8);
    this.data = new Uint8Array(this.bytesPerRow * height);
  }

  setPixel(x: number, y: number, on: boolean): void {
    if (x < 0 || y < 0 || x >= this.width || y >= this.height) {
      return;
    }
    const index = y * this.bytesPerRow + (x >> 3);
    const mask = 0x80 >> (x & 7);
    this.data[index] = on ? this.data[index] | mask : this.data[index] & ~mask;
  }

  getPixel(x: number, y: number): boolean {
    if (x < 0 || y < 0 || x >= this.width || y >= this.height) {
      return false;
    }
    return (this.data[y * this.bytesPerRow + (x >> 3)] & (0x80 >> (x & 7))) !== 0;
  }
}
