/**
 * Base class for every failure raised by the air-gap codec.
 * `code` is stable and meant for programmatic handling (re-scan, abort, re-key).
 */
export abstract class AirGapError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export type ConfigErrorCode =
  | 'CHUNK_SIZE_TOO_SMALL'
  | 'CHUNK_SIZE_TOO_LARGE'
  | 'INVALID_CHUNK_SIZE'
  | 'INVALID_INSTANCE_ID'
  | 'INVALID_VERSION'
  | 'INVALID_OPERATION'
  | 'PAYLOAD_TOO_LARGE';

/**
 * Bad settings, detected when they are supplied.
 */
export class ConfigError extends AirGapError {
  override readonly name = 'ConfigError';

  constructor(
    public readonly code: ConfigErrorCode,
    message: string
  ) {
    super(message);
  }
}

export type MalformedFrameErrorCode =
  | 'MALFORMED_FRAME'
  | 'CHUNK_INDEX_OUT_OF_RANGE'
  | 'COUNT_MISMATCH';

/**
 * A scanned frame that cannot be accepted into a reassembly buffer.
 */
export class MalformedFrameError extends AirGapError {
  override readonly name = 'MalformedFrameError';

  constructor(
    public readonly code: MalformedFrameErrorCode,
    message: string
  ) {
    super(message);
  }
}

export class CompressionError extends AirGapError {
  override readonly name = 'CompressionError';

  constructor(
    public readonly code: 'COMPRESS_FAILED' | 'DECOMPRESS_FAILED',
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export class EncryptionError extends AirGapError {
  override readonly name = 'EncryptionError';
  readonly code = 'ENCRYPTION_FAILED';
}

export class DecryptionError extends AirGapError {
  override readonly name = 'DecryptionError';
  readonly code = 'DECRYPTION_FAILED';
}

export type ProtocolErrorCode =
  | 'VERSION_TOO_OLD'
  | 'VERSION_TOO_NEW'
  | 'INSTANCE_MISMATCH';

/**
 * The envelope is well formed but was produced for another version or device.
 */
export class ProtocolError extends AirGapError {
  override readonly name = 'ProtocolError';

  constructor(
    public readonly code: ProtocolErrorCode,
    message: string
  ) {
    super(message);
  }
}

export type DecodeErrorCode =
  | 'TRUNCATED_ENVELOPE'
  | 'TRUNCATED_OPERATION'
  | 'INCOMPLETE_MESSAGE';

export class DecodeError extends AirGapError {
  override readonly name = 'DecodeError';

  constructor(
    public readonly code: DecodeErrorCode,
    message: string
  ) {
    super(message);
  }
}
