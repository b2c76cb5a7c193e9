import { gcm } from '@noble/ciphers/aes';
import type { EncryptorDecryptor } from '../types.js';
import { secureRandomBytes, concatBytes } from './utils.js';

/**
 * AES-GCM nonce size in bytes (96 bits = 12 bytes)
 */
export const NONCE_SIZE = 12;

/**
 * AES-GCM authentication tag size in bytes (128 bits = 16 bytes)
 */
export const TAG_SIZE = 16;

/**
 * AES-256 key size in bytes
 */
export const KEY_SIZE = 32;

export interface AesGcmCipherOptions {
  /** Additional authenticated data bound to every ciphertext */
  associatedData?: Uint8Array;
  /**
   * Reuse one nonce for every encryption. Makes frame sets reproducible;
   * only safe when each key encrypts a single message.
   */
  fixedNonce?: Uint8Array;
}

/**
 * AES-256-GCM capability for sealing air-gap envelopes.
 *
 * Output layout: [nonce (12 bytes)][ciphertext][tag (16 bytes)]
 */
export class AesGcmCipher implements EncryptorDecryptor {
  private readonly key: Uint8Array;
  private readonly associatedData?: Uint8Array;
  private readonly fixedNonce?: Uint8Array;

  constructor(key: Uint8Array, options: AesGcmCipherOptions = {}) {
    if (key.length !== KEY_SIZE) {
      throw new Error(`Invalid key length: expected ${KEY_SIZE} bytes for AES-256`);
    }
    if (options.fixedNonce && options.fixedNonce.length !== NONCE_SIZE) {
      throw new Error(`Invalid nonce length: expected ${NONCE_SIZE} bytes`);
    }

    this.key = key.slice();
    this.associatedData = options.associatedData?.slice();
    this.fixedNonce = options.fixedNonce?.slice();
  }

  encrypt(plaintext: Uint8Array): Uint8Array {
    const nonce = this.fixedNonce ?? secureRandomBytes(NONCE_SIZE);
    const ciphertext = gcm(this.key, nonce, this.associatedData).encrypt(plaintext);
    return concatBytes(nonce, ciphertext);
  }

  /**
   * @throws Error if the buffer is too short or the tag does not verify
   */
  decrypt(sealed: Uint8Array): Uint8Array {
    if (sealed.length < NONCE_SIZE + TAG_SIZE) {
      throw new Error('Buffer too short to contain valid encrypted data');
    }

    const nonce = sealed.subarray(0, NONCE_SIZE);
    const ciphertext = sealed.subarray(NONCE_SIZE);

    return gcm(this.key, nonce, this.associatedData).decrypt(ciphertext);
  }
}
