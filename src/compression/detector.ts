/**
 * Compression format detection for corpus files
 *
 * Detects gzip from magic bytes. Everything else is treated as
 * uncompressed, whatever the file is called.
 */

import type { CompressionDetection } from "../types";

const GZIP_MAGIC_FIRST_BYTE = 0x1f;
const GZIP_MAGIC_SECOND_BYTE = 0x8b;

const GZIP_MAGIC_BYTES = new Uint8Array([GZIP_MAGIC_FIRST_BYTE, GZIP_MAGIC_SECOND_BYTE]);

/**
 * Compression format detector
 *
 * @example Detection from magic bytes
 * ```typescript
 * const detection = CompressionDetector.fromMagicBytes(new Uint8Array([0x1f, 0x8b, 0x08]));
 * console.log(detection.format); // 'gzip'
 * ```
 */
export class CompressionDetector {
  /**
   * Detect compression format from the leading bytes of a file
   *
   * An empty or short buffer is reported as uncompressed with full
   * confidence: there is nothing to decompress.
   */
  static fromMagicBytes(bytes: Uint8Array): CompressionDetection {
    const matches =
      bytes.length >= GZIP_MAGIC_BYTES.length &&
      GZIP_MAGIC_BYTES.every((byte, index) => bytes[index] === byte);

    if (matches) {
      return {
        format: "gzip",
        confidence: 1.0,
        magicBytes: bytes.slice(0, GZIP_MAGIC_BYTES.length),
        detectionMethod: "magic-bytes",
      };
    }

    return {
      format: "none",
      confidence: bytes.length >= GZIP_MAGIC_BYTES.length ? 0.9 : 1.0,
      detectionMethod: "magic-bytes",
    };
  }
}
