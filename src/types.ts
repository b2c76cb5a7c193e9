/**
 * Encrypts a marshaled envelope. Throws on failure.
 */
export interface Encryptor {
  encrypt(data: Uint8Array): Uint8Array;
}

/**
 * Decrypts a reassembled envelope. Throws on failure.
 */
export interface Decryptor {
  decrypt(data: Uint8Array): Uint8Array;
}

/**
 * Session security capability for both directions
 */
export type EncryptorDecryptor = Encryptor & Decryptor;

/**
 * Configuration for an AirGap protocol context
 */
export interface AirGapConfig {
  /** Paired device identifier, exactly 33 bytes (compressed public key) */
  instanceId: Uint8Array;
  /** Protocol version, 0-255 (defaults to PROTOCOL_VERSION) */
  version?: number;
  /** Frame size in bytes including the 6-byte header, 6-65535 (defaults to 192) */
  chunkSize?: number;
  /** Encryption capability; envelopes travel in the clear when omitted */
  cipher?: EncryptorDecryptor;
}

/**
 * One typed unit of application data
 */
export interface OpPayload {
  readonly opCode: number;   // 16-bit, application-defined
  readonly size: number;     // 32-bit, always data.length
  readonly data: Uint8Array;
}

/**
 * Decoded envelope
 */
export interface Message {
  version: number;
  instanceId: Uint8Array;
  operations: readonly OpPayload[];
}

/**
 * Reassembly status after a frame was pushed
 */
export interface ReceiveProgress {
  /** False when the frame was a duplicate of an index already held */
  added: boolean;
  /** Distinct chunks held so far */
  received: number;
  /** Chunk count announced by the first accepted frame (0 before any) */
  total: number;
  complete: boolean;
}

/**
 * Callback for fully reassembled messages
 */
export type MessageHandler = (message: Message) => void;

/**
 * Unsubscribe function returned by watch methods
 */
export type Unsubscribe = () => void;
