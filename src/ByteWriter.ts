import { toHex } from './helpers';

/**
 * Growable byte buffer for encoding.
 * Capacity doubles as needed; `toUint8Array` returns the written bytes only.
 */
export class ByteWriter {
  private _data: Uint8Array;
  private _length: number;

  private constructor(data: Uint8Array) {
    this._data = data;
    this._length = 0;
  }

  /** Allocate a writer with optional initial byte capacity. */
  static alloc(initialByteCapacity = 256): ByteWriter {
    return new ByteWriter(new Uint8Array(Math.max(1, initialByteCapacity)));
  }

  /** Number of bytes written. */
  get length(): number {
    return this._length;
  }

  writeByte(byte: number): void {
    this.ensureCapacity(this._length + 1);
    this._data[this._length++] = byte;
  }

  writeBytes(bytes: Uint8Array): void {
    this.ensureCapacity(this._length + bytes.length);
    this._data.set(bytes, this._length);
    this._length += bytes.length;
  }

  /** Write an ASCII string (digits, sign, markers) one byte per character. */
  writeAscii(text: string): void {
    this.ensureCapacity(this._length + text.length);
    for (let i = 0; i < text.length; i++) {
      this._data[this._length++] = text.charCodeAt(i);
    }
  }

  /** Return a compact copy of the written bytes. */
  toUint8Array(): Uint8Array {
    return this._data.slice(0, this._length);
  }

  /** Return hex string representation. */
  toHex(): string {
    return toHex(this.toUint8Array());
  }

  private ensureCapacity(bytesNeeded: number): void {
    if (bytesNeeded <= this._data.length) return;
    let newSize = this._data.length;
    while (newSize < bytesNeeded) {
      newSize *= 2;
    }
    const newData = new Uint8Array(newSize);
    newData.set(this._data.subarray(0, this._length));
    this._data = newData;
  }
}
