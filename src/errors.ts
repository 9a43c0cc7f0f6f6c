/**
 * Error handling for haplotype file parsing, validation and indexing
 *
 * Every failure raised by this library is a {@link HapkitError}. Structural
 * and schema errors carry the offending line number so callers can point
 * users at the exact place in the file.
 */

import type { LineType } from "./types";

/**
 * Base error class for all hapkit errors
 */
export class HapkitError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly lineNumber?: number,
    public readonly context?: string
  ) {
    super(message);
    this.name = "HapkitError";
  }

  /**
   * Create a user-friendly error message with context
   */
  override toString(): string {
    let msg = `${this.name}: ${this.message}`;
    if (this.lineNumber !== undefined) {
      msg += ` (line ${this.lineNumber})`;
    }
    if (this.context !== undefined && this.context !== "") {
      msg += `\nContext: ${this.context}`;
    }
    return msg;
  }
}

/**
 * Validation errors for invalid options, records or cross-record state
 */
export class ValidationError extends HapkitError {
  constructor(message: string, lineNumber?: number, context?: string, code = "VALIDATION_ERROR") {
    super(message, code, lineNumber, context);
    this.name = "ValidationError";
  }
}

/**
 * Parsing errors for format-specific issues
 */
export class ParseError extends HapkitError {
  constructor(
    message: string,
    public readonly format: string,
    lineNumber?: number,
    context?: string,
    code = "PARSE_ERROR"
  ) {
    super(message, code, lineNumber, context);
    this.name = "ParseError";
  }
}

// =============================================================================
// RECORD CODEC ERRORS
// =============================================================================

/**
 * A data or declaration line has the wrong number of columns, an unknown type
 * symbol, or a mandatory column that cannot be read
 */
export class MalformedLineError extends ParseError {
  constructor(
    message: string,
    public readonly lineType?: LineType,
    lineNumber?: number,
    context?: string,
    code = "MALFORMED_LINE"
  ) {
    super(message, "HAP", lineNumber, context, code);
    this.name = "MalformedLineError";
  }
}

/**
 * A data line carries more extra columns than its line type declares, or a
 * record to be written has an extra field the schema does not know
 */
export class UndeclaredFieldError extends MalformedLineError {
  constructor(
    message: string,
    lineType: LineType,
    public readonly undeclared: readonly string[],
    lineNumber?: number,
    context?: string
  ) {
    super(message, lineType, lineNumber, context, "UNDECLARED_FIELD");
    this.name = "UndeclaredFieldError";
  }
}

/**
 * An extra field value cannot be read or written under its declared format tag
 */
export class TypeCoercionError extends ParseError {
  constructor(
    message: string,
    public readonly fieldName: string,
    public readonly formatTag: string,
    public readonly value: string,
    lineNumber?: number,
    context?: string
  ) {
    super(message, "HAP", lineNumber, context, "TYPE_COERCION");
    this.name = "TypeCoercionError";
  }
}

// =============================================================================
// SCHEMA ERRORS
// =============================================================================

/**
 * The same extra field name was declared twice for one line type
 */
export class DuplicateFieldError extends ValidationError {
  constructor(
    public readonly lineType: LineType,
    public readonly fieldName: string,
    lineNumber?: number
  ) {
    super(
      `Extra field '${fieldName}' is already declared for ${lineType} lines`,
      lineNumber,
      `#${lineType}\t${fieldName}`,
      "DUPLICATE_FIELD"
    );
    this.name = "DuplicateFieldError";
  }
}

/**
 * A schema registry was modified after it had been frozen
 */
export class SchemaFrozenError extends ValidationError {
  constructor(public readonly fieldName: string) {
    super(
      `Cannot declare '${fieldName}': schema is frozen once data lines are read or written`,
      undefined,
      undefined,
      "SCHEMA_FROZEN"
    );
    this.name = "SchemaFrozenError";
  }
}

// =============================================================================
// CROSS-RECORD ERRORS
// =============================================================================

/**
 * Two haplotype lines share one ID
 */
export class DuplicateHaplotypeError extends ValidationError {
  constructor(
    public readonly haplotypeId: string,
    public readonly firstLineNumber?: number,
    lineNumber?: number
  ) {
    super(
      `Haplotype ID '${haplotypeId}' is not unique` +
        (firstLineNumber !== undefined ? ` (first defined on line ${firstLineNumber})` : ""),
      lineNumber,
      undefined,
      "DUPLICATE_HAPLOTYPE"
    );
    this.name = "DuplicateHaplotypeError";
  }
}

/**
 * A variant that names a haplotype missing from the record set
 */
export interface DanglingReference {
  readonly variantId: string;
  readonly haplotypeId: string;
  readonly lineNumber?: number;
}

/**
 * One or more variants reference haplotypes that do not exist in the record set
 *
 * Whole-file validation collects every dangling reference before raising;
 * streaming validation raises on the first.
 */
export class DanglingVariantError extends ValidationError {
  constructor(public readonly references: readonly DanglingReference[]) {
    const first = references[0];
    const listed = references
      .slice(0, 5)
      .map((ref) => `${ref.variantId} -> ${ref.haplotypeId}`)
      .join(", ");
    const more = references.length > 5 ? `, and ${references.length - 5} more` : "";
    super(
      `${references.length} variant(s) reference unknown haplotypes: ${listed}${more}`,
      first?.lineNumber,
      undefined,
      "DANGLING_VARIANT"
    );
    this.name = "DanglingVariantError";
  }
}

/**
 * Records are not in index order, so region queries would be incomplete
 */
export class UnsortedFileError extends ValidationError {
  constructor(
    message: string,
    lineNumber?: number,
    public readonly line?: string
  ) {
    super(message, lineNumber, line, "UNSORTED_FILE");
    this.name = "UnsortedFileError";
  }
}

/**
 * A haplotype ID equals a chromosome name, which makes the two contig
 * namespaces of an indexed file ambiguous
 */
export class HaplotypeIdCollisionError extends ValidationError {
  constructor(
    public readonly collidingName: string,
    lineNumber?: number
  ) {
    super(
      `'${collidingName}' is used both as a haplotype ID and as a chromosome name`,
      lineNumber,
      undefined,
      "HAPLOTYPE_ID_COLLISION"
    );
    this.name = "HaplotypeIdCollisionError";
  }
}

// =============================================================================
// REGION AND INDEX ERRORS
// =============================================================================

/**
 * A region string or interval that cannot be queried
 */
export class RegionError extends ValidationError {
  constructor(
    message: string,
    public readonly region: string
  ) {
    super(message, undefined, `Region: ${region}`, "REGION_ERROR");
    this.name = "RegionError";
  }
}

/**
 * A region index file that cannot be decoded
 */
export class IndexFormatError extends ParseError {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly byteOffset?: number
  ) {
    super(
      message,
      "HTI",
      undefined,
      byteOffset !== undefined ? `${filePath} at byte ${byteOffset}` : filePath,
      "INDEX_FORMAT"
    );
    this.name = "IndexFormatError";
  }
}

// =============================================================================
// I/O ERRORS
// =============================================================================

/**
 * Compression/decompression errors with detailed context
 */
export class CompressionError extends HapkitError {
  constructor(
    message: string,
    public readonly format: "gzip" | "bgzf" | "none",
    public readonly operation: "detect" | "decompress" | "stream" | "validate" | "compress",
    public readonly bytesProcessed?: number,
    context?: string
  ) {
    super(message, "COMPRESSION_ERROR", undefined, context);
    this.name = "CompressionError";
  }

  /**
   * Create compression error from system error
   */
  static fromSystemError(
    format: CompressionError["format"],
    operation: CompressionError["operation"],
    systemError: unknown,
    bytesProcessed?: number
  ): CompressionError {
    const errorMessage = systemError instanceof Error ? systemError.message : String(systemError);
    const suggestion = CompressionError.getSuggestionForCompressionError(format, errorMessage);

    return new CompressionError(
      `${operation} operation failed for ${format}: ${errorMessage}${suggestion !== undefined ? `. ${suggestion}` : ""}`,
      format,
      operation,
      bytesProcessed,
      `System error: ${errorMessage}`
    );
  }

  private static getSuggestionForCompressionError(
    format: CompressionError["format"],
    errorMessage: string
  ): string | undefined {
    const msg = errorMessage.toLowerCase();

    if (msg.includes("magic") || msg.includes("header")) {
      return `File may be corrupted or not actually ${format} compressed`;
    }
    if (msg.includes("truncated") || msg.includes("unexpected end")) {
      return "File appears to be truncated or incomplete";
    }
    if (msg.includes("crc") || msg.includes("checksum")) {
      return "Data integrity check failed - file may be corrupted";
    }
    if (format === "gzip" && msg.includes("incorrect header")) {
      return "Compress the file with bgzip so it can be indexed";
    }

    return undefined;
  }

  override toString(): string {
    let msg = super.toString();

    if (this.bytesProcessed !== undefined) {
      msg += `\nBytes processed: ${this.bytesProcessed}`;
    }

    return msg;
  }
}

/**
 * File I/O errors with the failing path and operation
 */
export class FileError extends HapkitError {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly operation: "read" | "write" | "stat" | "open" | "close" | "seek",
    public readonly systemError?: unknown,
    context?: string
  ) {
    super(message, "FILE_ERROR", undefined, context);
    this.name = "FileError";
  }

  /**
   * Create file error with system error context
   */
  static fromSystemError(
    operation: FileError["operation"],
    filePath: string,
    systemError: unknown
  ): FileError {
    const errorMessage = systemError instanceof Error ? systemError.message : String(systemError);
    const suggestion = FileError.getSuggestionForSystemError(errorMessage);

    return new FileError(
      `${operation} operation failed: ${errorMessage}${suggestion !== undefined ? `. ${suggestion}` : ""}`,
      filePath,
      operation,
      systemError,
      `System error: ${errorMessage}`
    );
  }

  private static getSuggestionForSystemError(errorMessage: string): string | undefined {
    const msg = errorMessage.toLowerCase();

    if (msg.includes("enoent") || msg.includes("no such file")) {
      return "Check that the file path is correct and the file exists";
    }
    if (msg.includes("eacces") || msg.includes("permission denied")) {
      return "Check file permissions or run with appropriate privileges";
    }
    if (msg.includes("eisdir") || msg.includes("is a directory")) {
      return "Path points to a directory, not a file";
    }
    if (msg.includes("emfile") || msg.includes("too many open files")) {
      return "Close unused file handles or increase system limits";
    }
    if (msg.includes("enospc") || msg.includes("no space left")) {
      return "Free up disk space or use a different location";
    }

    return undefined;
  }

  override toString(): string {
    let msg = super.toString();

    if (this.systemError instanceof Error) {
      msg += `\nSystem Error: ${this.systemError.name}: ${this.systemError.message}`;
    }

    return msg;
  }
}

/**
 * Stream processing errors
 */
export class StreamError extends HapkitError {
  constructor(
    message: string,
    public readonly operation: "read" | "write" | "transform",
    public readonly bytesProcessed?: number
  ) {
    super(message, "STREAM_ERROR");
    this.name = "StreamError";
  }
}

/**
 * Buffer errors for overlong lines
 */
export class BufferError extends HapkitError {
  constructor(
    message: string,
    public readonly bufferSize: number,
    public readonly operation: "overflow" | "allocate"
  ) {
    super(message, "BUFFER_ERROR");
    this.name = "BufferError";
  }
}
