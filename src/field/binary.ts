// src/field/binary.ts
import { UnexpectedEndOfInputError } from "./errors.js";

export class BinaryReader {
  private offset = 0;

  public constructor(private readonly buf: Buffer) {}

  public remaining(): number {
    return this.buf.length - this.offset;
  }

  public readU16LE(): number {
    this.ensure(2);
    const v = this.buf.readUInt16LE(this.offset);
    this.offset += 2;
    return v;
  }

  public readBytes(n: number): Buffer {
    if (!Number.isInteger(n) || n < 0) throw new RangeError(`Invalid read length: ${n}`);
    this.ensure(n);
    const out = this.buf.subarray(this.offset, this.offset + n);
    this.offset += n;
    return out;
  }

  private ensure(n: number): void {
    if (this.offset + n > this.buf.length) {
      throw new UnexpectedEndOfInputError(n, this.remaining());
    }
  }
}

export class BinaryWriter {
  private readonly chunks: Buffer[] = [];

  public writeU8(v: number): void {
    if (!Number.isInteger(v) || v < 0 || v > 0xff) throw new RangeError(`U8 out of range: ${v}`);
    const b = Buffer.alloc(1);
    b.writeUInt8(v, 0);
    this.chunks.push(b);
  }

  public writeU16LE(v: number): void {
    if (!Number.isInteger(v) || v < 0 || v > 0xffff) {
      throw new RangeError(`U16 out of range: ${v}`);
    }
    const b = Buffer.alloc(2);
    b.writeUInt16LE(v, 0);
    this.chunks.push(b);
  }

  public writeBytes(bytes: Uint8Array): void {
    this.chunks.push(Buffer.from(bytes));
  }

  public toBuffer(): Buffer {
    return Buffer.concat(this.chunks);
  }
}
