/**
 * Protocol version
 */
export const PROTOCOL_VERSION = 0x01;

/**
 * Instance id size: a compressed secp256k1 public key
 */
export const INSTANCE_ID_SIZE = 33;

/**
 * Envelope header: version(1) + instanceId(33)
 */
export const ENVELOPE_HEADER_SIZE = 1 + INSTANCE_ID_SIZE;

/**
 * Operation record header: opCode(2) + size(4), big-endian
 */
export const OPERATION_HEADER_SIZE = 6;

/**
 * Chunk header: index(2) + count(2) + payloadSize(2), little-endian
 */
export const CHUNK_HEADER_SIZE = 6;

/**
 * Smallest and largest frame sizes, header included
 */
export const MIN_CHUNK_SIZE = CHUNK_HEADER_SIZE;
export const MAX_CHUNK_SIZE = 0xffff;

/**
 * Default frame size, tuned for dense but reliably scanned QR codes
 */
export const DEFAULT_CHUNK_SIZE = 192;

/**
 * Chunk indices and counts are 16-bit
 */
export const MAX_CHUNK_COUNT = 0xffff;

/**
 * Largest operation body a 32-bit size field can describe
 */
export const MAX_OPERATION_SIZE = 0xffffffff;

/**
 * One addressed piece of a compressed envelope
 */
export interface Chunk {
  index: number;        // 0-based position (2 bytes)
  totalCount: number;   // Chunks in the message (2 bytes)
  payloadSize: number;  // Bytes carried (2 bytes)
  payload: Uint8Array;
}
