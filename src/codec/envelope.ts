import { DecodeError } from '../errors.js';
import type { Message, OpPayload } from '../types.js';
import {
  ENVELOPE_HEADER_SIZE,
  INSTANCE_ID_SIZE,
  OPERATION_HEADER_SIZE,
} from './types.js';

/**
 * Version and instance id read from the front of an envelope
 */
export interface EnvelopeHeader {
  version: number;
  instanceId: Uint8Array;
}

/**
 * Encode an envelope to binary format
 *
 * Binary layout (34 + records bytes):
 * [0]      version      (1 byte)
 * [1-33]   instanceId   (33 bytes)
 * [34+]    records, back to back:
 *          opCode (2 bytes, big-endian)
 *          size   (4 bytes, big-endian)
 *          data   (size bytes)
 */
export function encodeEnvelope(message: Message): Uint8Array {
  const { version, instanceId, operations } = message;

  if (instanceId.length !== INSTANCE_ID_SIZE) {
    throw new Error(`Invalid instanceId length: ${instanceId.length} != ${INSTANCE_ID_SIZE}`);
  }

  const bodySize = operations.reduce((acc, op) => acc + OPERATION_HEADER_SIZE + op.size, 0);
  const buffer = new Uint8Array(ENVELOPE_HEADER_SIZE + bodySize);
  const view = new DataView(buffer.buffer);

  buffer[0] = version;
  buffer.set(instanceId, 1);

  let offset = ENVELOPE_HEADER_SIZE;
  for (const op of operations) {
    view.setUint16(offset, op.opCode);
    view.setUint32(offset + 2, op.size);
    buffer.set(op.data, offset + OPERATION_HEADER_SIZE);
    offset += OPERATION_HEADER_SIZE + op.size;
  }

  return buffer;
}

/**
 * Read the fixed envelope header without touching the records
 */
export function decodeEnvelopeHeader(data: Uint8Array): EnvelopeHeader {
  if (data.length < ENVELOPE_HEADER_SIZE) {
    throw new DecodeError(
      'TRUNCATED_ENVELOPE',
      `Envelope too short: ${data.length} < ${ENVELOPE_HEADER_SIZE}`
    );
  }

  return {
    version: data[0],
    instanceId: data.slice(1, ENVELOPE_HEADER_SIZE),
  };
}

/**
 * Walk the operation records that follow the envelope header
 */
export function decodeOperations(data: Uint8Array): OpPayload[] {
  const view = new DataView(data.buffer, data.byteOffset, data.byteLength);
  const operations: OpPayload[] = [];

  let offset = ENVELOPE_HEADER_SIZE;
  while (offset < data.length) {
    const remaining = data.length - offset;
    if (remaining < OPERATION_HEADER_SIZE) {
      throw new DecodeError(
        'TRUNCATED_OPERATION',
        `Operation header at offset ${offset} needs ${OPERATION_HEADER_SIZE} bytes, ${remaining} left`
      );
    }

    const opCode = view.getUint16(offset);
    const size = view.getUint32(offset + 2);
    const start = offset + OPERATION_HEADER_SIZE;

    if (size > data.length - start) {
      throw new DecodeError(
        'TRUNCATED_OPERATION',
        `Operation at offset ${offset} declares ${size} bytes, ${data.length - start} left`
      );
    }

    operations.push({ opCode, size, data: data.slice(start, start + size) });
    offset = start + size;
  }

  return operations;
}
