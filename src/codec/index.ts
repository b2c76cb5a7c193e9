export {
  PROTOCOL_VERSION,
  INSTANCE_ID_SIZE,
  ENVELOPE_HEADER_SIZE,
  OPERATION_HEADER_SIZE,
  CHUNK_HEADER_SIZE,
  MIN_CHUNK_SIZE,
  MAX_CHUNK_SIZE,
  DEFAULT_CHUNK_SIZE,
  MAX_CHUNK_COUNT,
  MAX_OPERATION_SIZE,
  type Chunk,
} from './types.js';

export { compress, decompress } from './compression.js';

export { encodeChunk, decodeChunk } from './frame.js';

export { Chunks, split, validateChunkSize } from './chunks.js';

export {
  type EnvelopeHeader,
  encodeEnvelope,
  decodeEnvelopeHeader,
  decodeOperations,
} from './envelope.js';
