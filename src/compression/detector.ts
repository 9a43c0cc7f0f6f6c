/**
 * Compression format detection from file extensions and magic bytes
 */

import { CompressionError } from "../errors";
import type { CompressionFormat } from "../types";

const GZIP_MAGIC = [0x1f, 0x8b] as const;
const GZIP_EXTENSIONS = [".gz", ".gzip", ".bgz"] as const;

/**
 * Result of inspecting the leading bytes of a file
 */
export interface CompressionDetection {
  readonly format: CompressionFormat;
  /** True when the first gzip member carries a BGZF `BC` extra subfield */
  readonly blockCompressed: boolean;
}

/**
 * Compression format detector
 *
 * @example
 * ```typescript
 * CompressionDetector.fromExtension("cohort.hap.gz"); // "gzip"
 *
 * const head = await readByteRange("cohort.hap.gz", 0, 18);
 * CompressionDetector.fromMagicBytes(head).blockCompressed; // true for bgzip output
 * ```
 */
export class CompressionDetector {
  /**
   * Detect compression format from a file path
   *
   * @throws {CompressionError} If the path is empty
   */
  static fromExtension(filePath: string): CompressionFormat {
    if (filePath.length === 0) {
      throw new CompressionError("File path must not be empty", "none", "detect");
    }

    const normalizedPath = filePath.toLowerCase().replace(/\\/g, "/");
    return GZIP_EXTENSIONS.some((ext) => normalizedPath.endsWith(ext)) ? "gzip" : "none";
  }

  /**
   * Detect compression format and BGZF framing from leading bytes
   *
   * Eighteen bytes are enough to see a complete BGZF block header.
   */
  static fromMagicBytes(bytes: Uint8Array): CompressionDetection {
    const isGzip = bytes.length >= 2 && bytes[0] === GZIP_MAGIC[0] && bytes[1] === GZIP_MAGIC[1];
    if (!isGzip) {
      return { format: "none", blockCompressed: false };
    }

    const blockCompressed =
      bytes.length >= 18 &&
      bytes[2] === 0x08 &&
      ((bytes[3] ?? 0) & 0x04) !== 0 &&
      bytes[10] === 6 &&
      bytes[11] === 0 &&
      bytes[12] === 0x42 &&
      bytes[13] === 0x43 &&
      bytes[14] === 2 &&
      bytes[15] === 0;

    return { format: "gzip", blockCompressed };
  }
}
