import { MalformedFrameError } from '../errors.js';
import { CHUNK_HEADER_SIZE, type Chunk } from './types.js';

/**
 * Encode a chunk to its binary frame
 *
 * Binary layout (6 + payload bytes, little-endian):
 * [0-1]  index        (2 bytes)
 * [2-3]  totalCount   (2 bytes)
 * [4-5]  payloadSize  (2 bytes)
 * [6+]   payload, zero-padded up to frameSize when given
 */
export function encodeChunk(chunk: Chunk, frameSize?: number): Uint8Array {
  const { index, totalCount, payloadSize, payload } = chunk;

  if (payload.length !== payloadSize) {
    throw new Error(`Payload size mismatch: ${payload.length} != ${payloadSize}`);
  }

  const length = Math.max(CHUNK_HEADER_SIZE + payloadSize, frameSize ?? 0);
  const buffer = new Uint8Array(length);

  buffer[0] = index & 0xff;
  buffer[1] = (index >> 8) & 0xff;
  buffer[2] = totalCount & 0xff;
  buffer[3] = (totalCount >> 8) & 0xff;
  buffer[4] = payloadSize & 0xff;
  buffer[5] = (payloadSize >> 8) & 0xff;

  buffer.set(payload, CHUNK_HEADER_SIZE);

  return buffer;
}

/**
 * Decode a binary frame. Trailing padding past payloadSize is dropped.
 */
export function decodeChunk(frame: Uint8Array): Chunk {
  if (frame.length < CHUNK_HEADER_SIZE) {
    throw new MalformedFrameError(
      'MALFORMED_FRAME',
      `Frame too short: ${frame.length} < ${CHUNK_HEADER_SIZE}`
    );
  }

  const index = frame[0] | (frame[1] << 8);
  const totalCount = frame[2] | (frame[3] << 8);
  const payloadSize = frame[4] | (frame[5] << 8);

  if (CHUNK_HEADER_SIZE + payloadSize > frame.length) {
    throw new MalformedFrameError(
      'MALFORMED_FRAME',
      `Frame declares ${payloadSize} payload bytes but carries ${frame.length - CHUNK_HEADER_SIZE}`
    );
  }

  return {
    index,
    totalCount,
    payloadSize,
    payload: frame.slice(CHUNK_HEADER_SIZE, CHUNK_HEADER_SIZE + payloadSize),
  };
}
