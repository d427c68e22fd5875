/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Buffer utilities for reading/writing binary data (little-endian)
 */

import { FormatError } from '@objkit/data';

/**
 * Writer for building binary buffers
 */
export class BufferWriter {
  private chunks: Uint8Array[] = [];
  private currentChunk: Uint8Array;
  private view: DataView;
  private offset: number = 0;
  private totalSize: number = 0;
  private readonly encoder = new TextEncoder();

  constructor(initialSize: number = 64 * 1024) {
    this.currentChunk = new Uint8Array(initialSize);
    this.view = new DataView(this.currentChunk.buffer);
  }

  private ensureCapacity(bytes: number): void {
    if (this.offset + bytes > this.currentChunk.length) {
      // Save current chunk and create new one
      this.chunks.push(this.currentChunk.subarray(0, this.offset));
      this.totalSize += this.offset;

      const newSize = Math.max(bytes, this.currentChunk.length);
      this.currentChunk = new Uint8Array(newSize);
      this.view = new DataView(this.currentChunk.buffer);
      this.offset = 0;
    }
  }

  writeUint8(value: number): void {
    this.ensureCapacity(1);
    this.currentChunk[this.offset++] = value;
  }

  writeUint32(value: number): void {
    this.ensureCapacity(4);
    this.view.setUint32(this.offset, value, true);
    this.offset += 4;
  }

  writeInt32(value: number): void {
    this.ensureCapacity(4);
    this.view.setInt32(this.offset, value, true);
    this.offset += 4;
  }

  writeFloat32(value: number): void {
    this.ensureCapacity(4);
    this.view.setFloat32(this.offset, value, true);
    this.offset += 4;
  }

  writeBytes(data: Uint8Array): void {
    this.ensureCapacity(data.length);
    this.currentChunk.set(data, this.offset);
    this.offset += data.length;
  }

  writeTypedArray(arr: Int32Array | Float32Array): void {
    const bytes = new Uint8Array(arr.buffer, arr.byteOffset, arr.byteLength);
    this.writeBytes(bytes);
  }

  /** uint32 byte length + UTF-8 bytes */
  writeString(str: string): void {
    const bytes = this.encoder.encode(str);
    this.writeUint32(bytes.length);
    this.writeBytes(bytes);
  }

  /** Build final buffer */
  build(): Uint8Array {
    // Include current chunk
    this.chunks.push(this.currentChunk.subarray(0, this.offset));
    this.totalSize += this.offset;

    // Concatenate all chunks
    const result = new Uint8Array(this.totalSize);
    let pos = 0;
    for (const chunk of this.chunks) {
      result.set(chunk, pos);
      pos += chunk.length;
    }

    return result;
  }
}

/**
 * Reader for parsing binary buffers. Reading past the end throws a
 * FormatError naming the field being read.
 */
export class BufferReader {
  private view: DataView;
  private bytes: Uint8Array;
  private offset: number = 0;
  private readonly decoder = new TextDecoder('utf-8', { fatal: true });

  constructor(bytes: Uint8Array) {
    this.bytes = bytes;
    this.view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  }

  get remaining(): number {
    return this.bytes.length - this.offset;
  }

  private need(length: number, what: string): void {
    if (length > this.remaining) {
      throw new FormatError(
        `binary dump ends at byte ${this.bytes.length} while reading ${what} (${length} bytes needed at ${this.offset})`
      );
    }
  }

  readUint8(what: string): number {
    this.need(1, what);
    return this.bytes[this.offset++];
  }

  readUint32(what: string): number {
    this.need(4, what);
    const value = this.view.getUint32(this.offset, true);
    this.offset += 4;
    return value;
  }

  readInt32(what: string): number {
    this.need(4, what);
    const value = this.view.getInt32(this.offset, true);
    this.offset += 4;
    return value;
  }

  readFloat32(what: string): number {
    this.need(4, what);
    const value = this.view.getFloat32(this.offset, true);
    this.offset += 4;
    return value;
  }

  readBytes(length: number, what: string): Uint8Array {
    this.need(length, what);
    // copy, so typed arrays built on the result start at offset 0 (Buffer#slice is a view)
    const slice = new Uint8Array(this.bytes.subarray(this.offset, this.offset + length));
    this.offset += length;
    return slice;
  }

  readInt32Array(length: number, what: string): Int32Array {
    const bytes = this.readBytes(length * 4, what);
    return new Int32Array(bytes.buffer, bytes.byteOffset, length);
  }

  readFloat32Array(length: number, what: string): Float32Array {
    const bytes = this.readBytes(length * 4, what);
    return new Float32Array(bytes.buffer, bytes.byteOffset, length);
  }

  readString(what: string): string {
    const length = this.readUint32(what);
    const bytes = this.readBytes(length, what);
    try {
      return this.decoder.decode(bytes);
    } catch (error) {
      throw new FormatError(`${what} is not valid UTF-8: ${error instanceof Error ? error.message : String(error)}`);
    }
  }
}
