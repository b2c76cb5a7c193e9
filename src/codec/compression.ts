import { constants, gunzipSync, gzipSync } from 'node:zlib';
import { CompressionError } from '../errors.js';

/**
 * Gzip at best compression. The container carries its own end marker and
 * CRC, so no external length is needed to decompress.
 */
export function compress(data: Uint8Array): Uint8Array {
  try {
    return new Uint8Array(gzipSync(data, { level: constants.Z_BEST_COMPRESSION }));
  } catch (error) {
    throw new CompressionError('COMPRESS_FAILED', 'Cannot compress data', { cause: error });
  }
}

export function decompress(data: Uint8Array): Uint8Array {
  try {
    return new Uint8Array(gunzipSync(data));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new CompressionError('DECOMPRESS_FAILED', `Cannot decompress data: ${reason}`, {
      cause: error,
    });
  }
}
