// Protocol context
export { AirGap, MessageBuilder } from './airgap.js';
export { FrameReceiver } from './receiver.js';

// Types
export type {
  AirGapConfig,
  Encryptor,
  Decryptor,
  EncryptorDecryptor,
  OpPayload,
  Message,
  ReceiveProgress,
  MessageHandler,
  Unsubscribe,
} from './types.js';

// Errors
export {
  AirGapError,
  ConfigError,
  MalformedFrameError,
  CompressionError,
  EncryptionError,
  DecryptionError,
  ProtocolError,
  DecodeError,
  type ConfigErrorCode,
  type MalformedFrameErrorCode,
  type ProtocolErrorCode,
  type DecodeErrorCode,
} from './errors.js';

// Codec
export {
  PROTOCOL_VERSION,
  INSTANCE_ID_SIZE,
  CHUNK_HEADER_SIZE,
  MIN_CHUNK_SIZE,
  MAX_CHUNK_SIZE,
  DEFAULT_CHUNK_SIZE,
  Chunks,
  split,
  compress,
  decompress,
  type Chunk,
} from './codec/index.js';

// Crypto (session key agreement stays in ./crypto/index.js)
export {
  AesGcmCipher,
  type AesGcmCipherOptions,
  generateInstanceKeyPair,
  deriveInstanceKeyPair,
  isValidInstanceId,
  type InstanceKeyPair,
  bytesToHex,
  hexToBytes,
  base64Encode,
  base64Decode,
} from './crypto/index.js';
