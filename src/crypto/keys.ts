import { secp256k1 } from '@noble/curves/secp256k1';
import { hkdf } from '@noble/hashes/hkdf';
import { sha256 } from '@noble/hashes/sha256';
import { INSTANCE_ID_SIZE } from '../codec/types.js';
import { AesGcmCipher, KEY_SIZE, type AesGcmCipherOptions } from './encryption.js';
import { DOMAIN_SEPARATOR, hexToBytes } from './utils.js';

/**
 * Device keypair whose compressed public key doubles as the instance id
 */
export interface InstanceKeyPair {
  privateKey: Uint8Array;  // 32 bytes (secp256k1 scalar)
  instanceId: Uint8Array;  // 33 bytes (compressed secp256k1 point)
}

/**
 * Generate a fresh random instance keypair
 */
export function generateInstanceKeyPair(): InstanceKeyPair {
  const privateKey = secp256k1.utils.randomPrivateKey();
  return {
    privateKey,
    instanceId: secp256k1.getPublicKey(privateKey, true),
  };
}

/**
 * Derive an instance keypair from a 32-byte seed (hex string or bytes).
 * The same seed always yields the same instance id.
 */
export function deriveInstanceKeyPair(seed: Uint8Array | string): InstanceKeyPair {
  const seedBytes = typeof seed === 'string' ? hexToBytes(seed) : seed;

  if (seedBytes.length !== 32) {
    throw new Error(`Invalid seed length: expected 32 bytes, got ${seedBytes.length}`);
  }

  const privateKey = hkdf(
    sha256,
    seedBytes,
    new Uint8Array(0), // salt
    new TextEncoder().encode(DOMAIN_SEPARATOR + '-instance'),
    32
  );

  return {
    privateKey,
    instanceId: secp256k1.getPublicKey(privateKey, true),
  };
}

/**
 * Check that bytes are a 33-byte compressed point on secp256k1
 */
export function isValidInstanceId(instanceId: Uint8Array): boolean {
  if (instanceId.length !== INSTANCE_ID_SIZE) return false;
  try {
    secp256k1.ProjectivePoint.fromHex(instanceId);
    return true;
  } catch {
    return false;
  }
}

/**
 * Compute the symmetric session key shared by two paired devices.
 * ECDH on secp256k1, then HKDF-SHA256 over the shared x coordinate.
 * Local helper only: exchanging instance ids is left to the application.
 */
export function deriveSessionKey(
  ourPrivateKey: Uint8Array,
  theirInstanceId: Uint8Array
): Uint8Array {
  if (!isValidInstanceId(theirInstanceId)) {
    throw new Error('Invalid peer instance id: expected a 33-byte compressed secp256k1 key');
  }

  const shared = secp256k1.getSharedSecret(ourPrivateKey, theirInstanceId, true);

  return hkdf(
    sha256,
    shared.subarray(1),
    new Uint8Array(0),
    new TextEncoder().encode(DOMAIN_SEPARATOR + '-session'),
    KEY_SIZE
  );
}

/**
 * AES-256-GCM capability keyed for one pair of devices
 */
export function createSessionCipher(
  ourPrivateKey: Uint8Array,
  theirInstanceId: Uint8Array,
  options?: AesGcmCipherOptions
): AesGcmCipher {
  return new AesGcmCipher(deriveSessionKey(ourPrivateKey, theirInstanceId), options);
}
