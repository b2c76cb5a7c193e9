export {
  DOMAIN_SEPARATOR,
  secureRandomBytes,
  concatBytes,
  bytesEqual,
  hexToBytes,
  bytesToHex,
  base64Encode,
  base64Decode,
} from './utils.js';

export {
  type InstanceKeyPair,
  generateInstanceKeyPair,
  deriveInstanceKeyPair,
  isValidInstanceId,
  deriveSessionKey,
  createSessionCipher,
} from './keys.js';

export {
  NONCE_SIZE,
  TAG_SIZE,
  KEY_SIZE,
  type AesGcmCipherOptions,
  AesGcmCipher,
} from './encryption.js';
