import { describe, it, expect } from 'vitest';
import {
  Chunks,
  compress,
  split,
  validateChunkSize,
} from '../src/codec/index.js';
import { base64Decode, bytesToHex, concatBytes, secureRandomBytes } from '../src/crypto/index.js';
import { CompressionError, ConfigError, DecodeError, MalformedFrameError } from '../src/errors.js';
import { catchError, rawFrame } from './helpers.js';

/**
 * Deterministic Fisher-Yates shuffle (LCG-driven)
 */
function shuffle<T>(items: T[], seed: number): T[] {
  const result = [...items];
  let state = seed;
  for (let i = result.length - 1; i > 0; i--) {
    state = (Math.imul(state, 1103515245) + 12345) >>> 0;
    const j = state % (i + 1);
    [result[i], result[j]] = [result[j], result[i]];
  }
  return result;
}

function reassemble(frames: string[]): Chunks {
  const chunks = new Chunks();
  for (const frame of frames) {
    chunks.readChunk(frame);
  }
  return chunks;
}

describe('Chunk size limits', () => {
  it('should reject chunk size 5', () => {
    const error = catchError(() => validateChunkSize(5), ConfigError);
    expect(error.code).toBe('CHUNK_SIZE_TOO_SMALL');
  });

  it('should reject chunk size 65536', () => {
    const error = catchError(() => validateChunkSize(65536), ConfigError);
    expect(error.code).toBe('CHUNK_SIZE_TOO_LARGE');
  });

  it('should accept chunk sizes 6 and 65535', () => {
    expect(() => validateChunkSize(6)).not.toThrow();
    expect(() => validateChunkSize(65535)).not.toThrow();
  });

  it('should reject non-integer chunk sizes', () => {
    const error = catchError(() => validateChunkSize(100.5), ConfigError);
    expect(error.code).toBe('INVALID_CHUNK_SIZE');
  });

  it('should reject a header-only chunk size when there is data to carry', () => {
    const error = catchError(() => split(new Uint8Array([1]), 6), ConfigError);
    expect(error.code).toBe('PAYLOAD_TOO_LARGE');
  });

  it('should split with the largest chunk size', () => {
    const frames = Chunks.fromData(secureRandomBytes(100), 65535).serialize();
    expect(frames).toHaveLength(1);
    expect(base64Decode(frames[0]).length).toBe(65535);
  });
});

describe('split', () => {
  it('should cut the compressed data into windows of chunkSize - 6 bytes', () => {
    const data = secureRandomBytes(400);
    const chunks = split(data, 192);

    expect(chunks).toHaveLength(3);
    chunks.forEach((chunk, index) => {
      expect(chunk.index).toBe(index);
      expect(chunk.totalCount).toBe(3);
      expect(chunk.payloadSize).toBe(chunk.payload.length);
    });
    expect(chunks[0].payloadSize).toBe(186);
    expect(chunks[1].payloadSize).toBe(186);
    expect(chunks[2].payloadSize).toBeLessThanOrEqual(186);

    const joined = concatBytes(...chunks.map((chunk) => chunk.payload));
    expect(bytesToHex(joined)).toBe(bytesToHex(compress(data)));
  });

  it('should produce a single chunk for small data', () => {
    const chunks = split(new TextEncoder().encode('hello'), 192);
    expect(chunks).toHaveLength(1);
    expect(chunks[0].totalCount).toBe(1);
  });

  it('should produce a single chunk for empty data', () => {
    const chunks = split(new Uint8Array(0), 192);
    expect(chunks).toHaveLength(1);
    expect(chunks[0].index).toBe(0);
    expect(chunks[0].totalCount).toBe(1);
  });

  it('should validate the chunk size', () => {
    const error = catchError(() => split(new Uint8Array(1), 5), ConfigError);
    expect(error.code).toBe('CHUNK_SIZE_TOO_SMALL');
  });
});

describe('Chunks', () => {
  describe('serialize', () => {
    it('should emit fixed-size frames with headers', () => {
      const frames = Chunks.fromData(secureRandomBytes(400), 192).serialize();

      expect(frames).toHaveLength(3);
      frames.forEach((frame, index) => {
        const bytes = base64Decode(frame);
        expect(bytes.length).toBe(192);
        expect(bytes[0] | (bytes[1] << 8)).toBe(index);
        expect(bytes[2] | (bytes[3] << 8)).toBe(3);
      });
      const first = base64Decode(frames[0]);
      expect(first[4] | (first[5] << 8)).toBe(186);
    });

    it('should be repeatable', () => {
      const chunks = Chunks.fromData(secureRandomBytes(400), 192);
      expect(chunks.serialize()).toEqual(chunks.serialize());
    });

    it('should reproduce the sender frames from a reassembled buffer', () => {
      const frames = Chunks.fromData(secureRandomBytes(400), 192).serialize();
      const received = reassemble(shuffle(frames, 7));
      expect(received.serialize()).toEqual(frames);
    });

    it('should report sizes of a populated buffer', () => {
      const chunks = Chunks.fromData(secureRandomBytes(400), 192);
      expect(chunks.getCount()).toBe(3);
      expect(chunks.getChunkPayloadSize()).toBe(186);
      expect(chunks.receivedCount()).toBe(3);
      expect(chunks.isComplete()).toBe(true);
    });
  });

  describe('round trip', () => {
    it('should reassemble frames in order', () => {
      const data = secureRandomBytes(1000);
      const chunks = reassemble(Chunks.fromData(data, 192).serialize());

      expect(chunks.isComplete()).toBe(true);
      expect(bytesToHex(chunks.data())).toBe(bytesToHex(data));
    });

    it('should reassemble frames in any order', () => {
      const data = secureRandomBytes(1500);
      const frames = Chunks.fromData(data, 100).serialize();
      expect(frames.length).toBeGreaterThan(10);

      const orders = [
        [...frames].reverse(),
        [...frames.slice(5), ...frames.slice(0, 5)],
        shuffle(frames, 1),
        shuffle(frames, 42),
        shuffle(frames, 2024),
      ];

      for (const order of orders) {
        const chunks = reassemble(order);
        expect(chunks.isComplete()).toBe(true);
        expect(bytesToHex(chunks.data())).toBe(bytesToHex(data));
      }
    });

    it('should round-trip across chunk sizes', () => {
      const data = secureRandomBytes(700);
      for (const chunkSize of [7, 16, 64, 192, 1000, 65535]) {
        const frames = Chunks.fromData(data, chunkSize).serialize();
        const chunks = reassemble(shuffle(frames, chunkSize));
        expect(bytesToHex(chunks.data())).toBe(bytesToHex(data));
      }
    });

    it('should round-trip empty data', () => {
      const frames = Chunks.fromData(new Uint8Array(0), 192).serialize();
      expect(frames).toHaveLength(1);

      const chunks = reassemble(frames);
      expect(chunks.isComplete()).toBe(true);
      expect(chunks.data().length).toBe(0);
    });

    it('should accept frames with surrounding whitespace', () => {
      const data = secureRandomBytes(50);
      const frames = Chunks.fromData(data, 192).serialize().map((frame) => ` ${frame}\n`);
      expect(bytesToHex(reassemble(frames).data())).toBe(bytesToHex(data));
    });
  });

  describe('readChunk', () => {
    it('should report duplicates without changing state', () => {
      const frames = Chunks.fromData(secureRandomBytes(400), 192).serialize();
      const chunks = new Chunks();

      expect(chunks.readChunk(frames[1])).toBe(true);
      expect(chunks.readChunk(frames[1])).toBe(false);
      expect(chunks.receivedCount()).toBe(1);
      expect(chunks.missingIndices()).toEqual([0, 2]);
    });

    it('should keep the first payload for an index', () => {
      const chunks = new Chunks();

      expect(chunks.readChunk(rawFrame([0, 0, 2, 0, 1, 0], [0xaa]))).toBe(true);
      expect(chunks.readChunk(rawFrame([0, 0, 2, 0, 1, 0], [0xbb]))).toBe(false);

      const [frame] = chunks.serialize();
      expect(Array.from(base64Decode(frame))).toEqual([0, 0, 2, 0, 1, 0, 0xaa]);
    });

    it('should fix the count from the first frame', () => {
      const chunks = new Chunks();
      expect(chunks.getCount()).toBe(0);

      chunks.readChunk(rawFrame([2, 0, 5, 0, 0, 0]));

      expect(chunks.getCount()).toBe(5);
      expect(chunks.getChunkPayloadSize()).toBe(0);
      expect(chunks.missingIndices()).toEqual([0, 1, 3, 4]);
    });

    it('should reject an index beyond the declared count', () => {
      const chunks = new Chunks();
      const error = catchError(() => chunks.readChunk(rawFrame([5, 0, 3, 0, 0, 0])), MalformedFrameError);

      expect(error.code).toBe('CHUNK_INDEX_OUT_OF_RANGE');
      expect(chunks.getCount()).toBe(0);
      expect(chunks.receivedCount()).toBe(0);
    });

    it('should reject an index equal to the fixed count', () => {
      const chunks = new Chunks();
      chunks.readChunk(rawFrame([0, 0, 3, 0, 0, 0]));

      const error = catchError(() => chunks.readChunk(rawFrame([3, 0, 3, 0, 0, 0])), MalformedFrameError);
      expect(error.code).toBe('CHUNK_INDEX_OUT_OF_RANGE');
      expect(chunks.receivedCount()).toBe(1);
    });

    it('should reject a frame announcing zero chunks', () => {
      const chunks = new Chunks();
      const error = catchError(() => chunks.readChunk(rawFrame([0, 0, 0, 0, 0, 0])), MalformedFrameError);
      expect(error.code).toBe('CHUNK_INDEX_OUT_OF_RANGE');
    });

    it('should reject a frame whose count disagrees with the first frame', () => {
      const frames = Chunks.fromData(secureRandomBytes(400), 192).serialize();
      const chunks = new Chunks();
      chunks.readChunk(frames[0]);

      const error = catchError(() => chunks.readChunk(rawFrame([1, 0, 4, 0, 0, 0])), MalformedFrameError);

      expect(error.code).toBe('COUNT_MISMATCH');
      expect(chunks.getCount()).toBe(3);
      expect(chunks.receivedCount()).toBe(1);
    });

    it('should reject text that is not base64', () => {
      const chunks = new Chunks();
      const error = catchError(() => chunks.readChunk('not base64!!'), MalformedFrameError);
      expect(error.code).toBe('MALFORMED_FRAME');
      expect(chunks.getCount()).toBe(0);
    });

    it('should reject a frame shorter than the header', () => {
      const chunks = new Chunks();
      const error = catchError(() => chunks.readChunk(rawFrame([0, 0, 1, 0])), MalformedFrameError);
      expect(error.code).toBe('MALFORMED_FRAME');
    });

    it('should reject an empty frame', () => {
      const error = catchError(() => new Chunks().readChunk(''), MalformedFrameError);
      expect(error.code).toBe('MALFORMED_FRAME');
    });

    it('should reject a payloadSize larger than the frame', () => {
      const chunks = new Chunks();
      const error = catchError(
        () => chunks.readChunk(rawFrame([0, 0, 1, 0, 9, 0], [1, 2])),
        MalformedFrameError
      );
      expect(error.code).toBe('MALFORMED_FRAME');
      expect(chunks.getCount()).toBe(0);
    });
  });

  describe('isComplete', () => {
    it('should be false for an empty buffer', () => {
      expect(new Chunks().isComplete()).toBe(false);
    });

    it('should turn true only when the last distinct chunk arrives', () => {
      const data = secureRandomBytes(400);
      const frames = Chunks.fromData(data, 192).serialize();
      expect(frames).toHaveLength(3);

      const chunks = new Chunks();
      chunks.readChunk(frames[0]);
      expect(chunks.isComplete()).toBe(false);
      chunks.readChunk(frames[2]);
      expect(chunks.isComplete()).toBe(false);
      chunks.readChunk(frames[2]);
      expect(chunks.isComplete()).toBe(false);
      expect(chunks.missingIndices()).toEqual([1]);

      chunks.readChunk(frames[1]);
      expect(chunks.isComplete()).toBe(true);
      expect(chunks.missingIndices()).toEqual([]);
      expect(bytesToHex(chunks.data())).toBe(bytesToHex(data));
    });

    it('should count an empty payload as received', () => {
      const chunks = new Chunks();
      chunks.readChunk(rawFrame([0, 0, 1, 0, 0, 0]));
      expect(chunks.isComplete()).toBe(true);
    });
  });

  describe('data', () => {
    it('should throw on an empty buffer', () => {
      const error = catchError(() => new Chunks().data(), DecodeError);
      expect(error.code).toBe('INCOMPLETE_MESSAGE');
    });

    it('should throw while chunks are missing', () => {
      const frames = Chunks.fromData(secureRandomBytes(400), 192).serialize();
      const chunks = reassemble([frames[0], frames[2]]);

      const error = catchError(() => chunks.data(), DecodeError);
      expect(error.code).toBe('INCOMPLETE_MESSAGE');
      expect(error.message).toBe('Missing chunks: got 2, expected 3');
    });

    it('should surface corrupt compressed payloads', () => {
      const chunks = reassemble([rawFrame([0, 0, 1, 0, 3, 0], [1, 2, 3])]);
      expect(chunks.isComplete()).toBe(true);

      const error = catchError(() => chunks.data(), CompressionError);
      expect(error.code).toBe('DECOMPRESS_FAILED');
    });
  });
});
