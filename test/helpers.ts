import { expect } from 'vitest';
import { INSTANCE_ID_SIZE } from '../src/codec/index.js';

/**
 * Run fn, assert it threw an instance of ErrorClass, and return the error
 */
export function catchError<T extends Error>(
  fn: () => unknown,
  ErrorClass: new (...args: never[]) => T
): T {
  try {
    fn();
  } catch (error) {
    expect(error).toBeInstanceOf(ErrorClass);
    if (error instanceof ErrorClass) {
      return error;
    }
  }
  throw new Error(`Expected ${ErrorClass.name} to be thrown`);
}

/**
 * Deterministic 33-byte instance id; only the length matters to the codec
 */
export function testInstanceId(fill: number = 0x02): Uint8Array {
  const id = new Uint8Array(INSTANCE_ID_SIZE).fill(fill);
  id[0] = 0x02;
  return id;
}

/**
 * Base64 text of a raw frame built by hand
 */
export function rawFrame(header: number[], payload: number[] = []): string {
  return Buffer.from([...header, ...payload]).toString('base64');
}

export function utf8(text: string): Uint8Array {
  return new TextEncoder().encode(text);
}
