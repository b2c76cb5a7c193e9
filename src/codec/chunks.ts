import { ConfigError, DecodeError, MalformedFrameError } from '../errors.js';
import { base64Decode, base64Encode, concatBytes } from '../crypto/utils.js';
import { compress, decompress } from './compression.js';
import { decodeChunk, encodeChunk } from './frame.js';
import {
  CHUNK_HEADER_SIZE,
  MAX_CHUNK_COUNT,
  MAX_CHUNK_SIZE,
  MIN_CHUNK_SIZE,
  type Chunk,
} from './types.js';

/**
 * Check a frame size (header included) against the 16-bit wire limits
 */
export function validateChunkSize(chunkSize: number): void {
  if (!Number.isInteger(chunkSize)) {
    throw new ConfigError('INVALID_CHUNK_SIZE', `Chunk size must be an integer, got ${chunkSize}`);
  }
  if (chunkSize < MIN_CHUNK_SIZE) {
    throw new ConfigError(
      'CHUNK_SIZE_TOO_SMALL',
      `Chunk size too small: ${chunkSize} < ${MIN_CHUNK_SIZE}`
    );
  }
  if (chunkSize > MAX_CHUNK_SIZE) {
    throw new ConfigError(
      'CHUNK_SIZE_TOO_LARGE',
      `Chunk size too large: ${chunkSize} > ${MAX_CHUNK_SIZE}`
    );
  }
}

/**
 * Compress data and cut it into chunks that fit frames of chunkSize bytes
 */
export function split(data: Uint8Array, chunkSize: number): Chunk[] {
  validateChunkSize(chunkSize);

  const window = chunkSize - CHUNK_HEADER_SIZE;
  const compressed = compress(data);

  if (compressed.length === 0) {
    return [{ index: 0, totalCount: 1, payloadSize: 0, payload: new Uint8Array(0) }];
  }

  const totalCount = window === 0 ? Infinity : Math.ceil(compressed.length / window);
  if (totalCount > MAX_CHUNK_COUNT) {
    throw new ConfigError(
      'PAYLOAD_TOO_LARGE',
      `${compressed.length} compressed bytes do not fit in ${MAX_CHUNK_COUNT} chunks of size ${chunkSize}`
    );
  }

  const chunks: Chunk[] = [];
  for (let index = 0; index < totalCount; index++) {
    const payload = compressed.slice(index * window, (index + 1) * window);
    chunks.push({ index, totalCount, payloadSize: payload.length, payload });
  }
  return chunks;
}

/**
 * Reassembly buffer for one message.
 *
 * The first accepted frame fixes the chunk count for the lifetime of the
 * buffer. Frames may arrive in any order and any number of times; the first
 * payload seen for an index is kept.
 */
export class Chunks {
  private count = 0;
  private chunkPayloadSize = 0;
  private slots: (Uint8Array | undefined)[] = [];
  private filled = 0;

  /**
   * Build a fully populated buffer from raw data, ready to serialize
   */
  static fromData(data: Uint8Array, chunkSize: number): Chunks {
    const chunks = new Chunks();
    const pieces = split(data, chunkSize);

    chunks.count = pieces.length;
    chunks.chunkPayloadSize = chunkSize - CHUNK_HEADER_SIZE;
    chunks.slots = pieces.map((piece) => piece.payload);
    chunks.filled = pieces.length;

    return chunks;
  }

  /**
   * Accept one base64 frame.
   *
   * @returns true if the frame filled an empty slot, false for a duplicate
   * @throws MalformedFrameError; the buffer is left unchanged
   */
  readChunk(frame: string): boolean {
    let bytes: Uint8Array;
    try {
      bytes = base64Decode(frame.trim());
    } catch {
      throw new MalformedFrameError('MALFORMED_FRAME', 'Frame is not valid base64');
    }

    const chunk = decodeChunk(bytes);
    const started = this.slots.length > 0;
    const count = started ? this.count : chunk.totalCount;

    if (started && chunk.totalCount !== this.count) {
      throw new MalformedFrameError(
        'COUNT_MISMATCH',
        `Frame declares ${chunk.totalCount} chunks, buffer expects ${this.count}`
      );
    }

    if (chunk.index >= count) {
      throw new MalformedFrameError(
        'CHUNK_INDEX_OUT_OF_RANGE',
        `Chunk index ${chunk.index} out of range for ${count} chunks`
      );
    }

    if (!started) {
      this.count = count;
      this.chunkPayloadSize = bytes.length - CHUNK_HEADER_SIZE;
      this.slots = new Array<Uint8Array | undefined>(count).fill(undefined);
    }

    if (this.slots[chunk.index] !== undefined) {
      return false;
    }

    this.slots[chunk.index] = chunk.payload;
    this.filled++;
    return true;
  }

  /**
   * True once every index in [0, count) holds a payload
   */
  isComplete(): boolean {
    return this.count > 0 && this.filled === this.count;
  }

  /**
   * Concatenate the chunks in index order and decompress
   */
  data(): Uint8Array {
    const parts: Uint8Array[] = [];
    for (const slot of this.slots) {
      if (slot === undefined) break;
      parts.push(slot);
    }

    if (this.count === 0 || parts.length !== this.count) {
      throw new DecodeError(
        'INCOMPLETE_MESSAGE',
        `Missing chunks: got ${this.filled}, expected ${this.count}`
      );
    }

    return decompress(concatBytes(...parts));
  }

  /**
   * Render held chunks as base64 frames in index order. Every frame is padded
   * to the same size so a display loop can show them uniformly.
   */
  serialize(): string[] {
    const frameSize = this.chunkPayloadSize + CHUNK_HEADER_SIZE;
    const frames: string[] = [];

    this.slots.forEach((payload, index) => {
      if (payload === undefined) return;
      const frame = encodeChunk(
        { index, totalCount: this.count, payloadSize: payload.length, payload },
        frameSize
      );
      frames.push(base64Encode(frame));
    });

    return frames;
  }

  /**
   * Chunk count fixed by the first frame (0 while empty)
   */
  getCount(): number {
    return this.count;
  }

  getChunkPayloadSize(): number {
    return this.chunkPayloadSize;
  }

  receivedCount(): number {
    return this.filled;
  }

  /**
   * Indices still to be scanned, ascending
   */
  missingIndices(): number[] {
    const missing: number[] = [];
    this.slots.forEach((payload, index) => {
      if (payload === undefined) missing.push(index);
    });
    return missing;
  }
}
