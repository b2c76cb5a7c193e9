import {
  Chunks,
  DEFAULT_CHUNK_SIZE,
  INSTANCE_ID_SIZE,
  MAX_OPERATION_SIZE,
  PROTOCOL_VERSION,
  decodeEnvelopeHeader,
  decodeOperations,
  encodeEnvelope,
  validateChunkSize,
} from './codec/index.js';
import { bytesEqual, bytesToHex } from './crypto/utils.js';
import {
  AirGapError,
  ConfigError,
  DecodeError,
  DecryptionError,
  EncryptionError,
  ProtocolError,
} from './errors.js';
import { FrameReceiver } from './receiver.js';
import type {
  AirGapConfig,
  EncryptorDecryptor,
  Encryptor,
  Message,
  OpPayload,
} from './types.js';

function validateVersion(version: number): void {
  if (!Number.isInteger(version) || version < 0 || version > 0xff) {
    throw new ConfigError('INVALID_VERSION', `Version must be an integer in [0, 255], got ${version}`);
  }
}

function validateInstanceId(instanceId: Uint8Array): void {
  if (!(instanceId instanceof Uint8Array) || instanceId.length !== INSTANCE_ID_SIZE) {
    throw new ConfigError(
      'INVALID_INSTANCE_ID',
      `Instance id must be ${INSTANCE_ID_SIZE} bytes`
    );
  }
}

export interface MessageBuilderState {
  version: number;
  instanceId: Uint8Array;
  chunkSize: number;
  encryptor?: Encryptor;
  operations: readonly OpPayload[];
}

/**
 * Immutable envelope under construction. Every addOperation call returns a
 * new builder, so one builder can safely seed several messages.
 */
export class MessageBuilder {
  private readonly state: MessageBuilderState;

  /** @internal created through AirGap.createMessage() */
  constructor(state: MessageBuilderState) {
    this.state = state;
  }

  addOperation(opCode: number, data: Uint8Array): MessageBuilder {
    if (!Number.isInteger(opCode) || opCode < 0 || opCode > 0xffff) {
      throw new ConfigError('INVALID_OPERATION', `Operation code must fit in 16 bits, got ${opCode}`);
    }
    if (data.length > MAX_OPERATION_SIZE) {
      throw new ConfigError('INVALID_OPERATION', `Operation data too large: ${data.length} bytes`);
    }

    const op: OpPayload = Object.freeze({ opCode, size: data.length, data: data.slice() });

    return new MessageBuilder({
      ...this.state,
      operations: Object.freeze([...this.state.operations, op]),
    });
  }

  /**
   * Copies of the operations added so far
   */
  get operations(): readonly OpPayload[] {
    return this.state.operations.map((op) => ({ ...op, data: op.data.slice() }));
  }

  /**
   * Snapshot as a plain Message value
   */
  build(): Message {
    return {
      version: this.state.version,
      instanceId: this.state.instanceId.slice(),
      operations: this.operations,
    };
  }

  /**
   * Serialize the envelope, encrypted when a cipher is bound
   */
  marshal(): Uint8Array {
    const envelope = encodeEnvelope({
      version: this.state.version,
      instanceId: this.state.instanceId,
      operations: this.state.operations,
    });
    const { encryptor } = this.state;

    if (!encryptor) {
      return envelope;
    }

    try {
      return encryptor.encrypt(envelope);
    } catch (error) {
      if (error instanceof AirGapError) throw error;
      throw new EncryptionError('Cannot encrypt message', { cause: error });
    }
  }

  /**
   * Marshal, compress and split into base64 frames ready for display.
   * With a randomized cipher each call yields different frames.
   */
  marshalChunks(): string[] {
    return Chunks.fromData(this.marshal(), this.state.chunkSize).serialize();
  }
}

/**
 * Protocol context shared by the two paired devices
 */
export class AirGap {
  private version: number;
  private chunkSize: number;
  private readonly instanceId: Uint8Array;
  private cipher?: EncryptorDecryptor;

  constructor(config: AirGapConfig) {
    validateInstanceId(config.instanceId);
    const version = config.version ?? PROTOCOL_VERSION;
    validateVersion(version);
    const chunkSize = config.chunkSize ?? DEFAULT_CHUNK_SIZE;
    validateChunkSize(chunkSize);

    this.instanceId = config.instanceId.slice();
    this.version = version;
    this.chunkSize = chunkSize;
    this.cipher = config.cipher;
  }

  getVersion(): number {
    return this.version;
  }

  setVersion(version: number): this {
    validateVersion(version);
    this.version = version;
    return this;
  }

  getChunkSize(): number {
    return this.chunkSize;
  }

  setChunkSize(chunkSize: number): this {
    validateChunkSize(chunkSize);
    this.chunkSize = chunkSize;
    return this;
  }

  getInstanceId(): Uint8Array {
    return this.instanceId.slice();
  }

  /**
   * Bind an encryption capability, or clear it with undefined
   */
  setCipher(cipher: EncryptorDecryptor | undefined): this {
    this.cipher = cipher;
    return this;
  }

  /**
   * Start a new message with the current settings
   */
  createMessage(): MessageBuilder {
    return new MessageBuilder({
      version: this.version,
      instanceId: this.instanceId,
      chunkSize: this.chunkSize,
      encryptor: this.cipher,
      operations: Object.freeze([]),
    });
  }

  /**
   * Start a scan session for one incoming message
   */
  createReceiver(): FrameReceiver {
    return new FrameReceiver(this);
  }

  /**
   * Decrypt and decode a reassembled envelope
   */
  unmarshal(data: Uint8Array): Message {
    const envelope = this.decryptEnvelope(data);
    const header = decodeEnvelopeHeader(envelope);

    if (header.version < this.version) {
      throw new ProtocolError(
        'VERSION_TOO_OLD',
        `Message version ${header.version} is older than supported version ${this.version}`
      );
    }

    if (header.version > this.version) {
      throw new ProtocolError(
        'VERSION_TOO_NEW',
        `Message version ${header.version} is newer than supported version ${this.version}`
      );
    }

    if (!bytesEqual(header.instanceId, this.instanceId)) {
      throw new ProtocolError(
        'INSTANCE_MISMATCH',
        `Message belongs to instance ${bytesToHex(header.instanceId)}`
      );
    }

    return {
      version: header.version,
      instanceId: header.instanceId,
      operations: decodeOperations(envelope),
    };
  }

  /**
   * Reassemble a full set of frames (any order, duplicates allowed) and decode
   */
  unmarshalChunks(frames: Iterable<string>): Message {
    const chunks = new Chunks();
    for (const frame of frames) {
      chunks.readChunk(frame);
    }

    if (!chunks.isComplete()) {
      throw new DecodeError(
        'INCOMPLETE_MESSAGE',
        `Missing chunks: ${chunks.missingIndices().join(', ') || 'no frames given'}`
      );
    }

    return this.unmarshal(chunks.data());
  }

  private decryptEnvelope(data: Uint8Array): Uint8Array {
    if (!this.cipher) {
      return data;
    }

    try {
      return this.cipher.decrypt(data);
    } catch (error) {
      if (error instanceof AirGapError) throw error;
      throw new DecryptionError('Cannot decrypt message', { cause: error });
    }
  }
}
