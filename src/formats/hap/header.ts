/**
 * Header lines of a `.hap` file
 *
 * Lines starting with `#H\t` or `#V\t` declare extra fields:
 *
 * ```text
 * #H	beta	.2f	Effect size
 * ```
 *
 * Every other `#` line is a comment, kept verbatim. The header is the
 * contiguous block of `#` lines before the first data line.
 */

import { MalformedLineError, ValidationError } from "../../errors";
import type { FieldDeclaration, HapHeader, LineType } from "../../types";
import { SchemaRegistry } from "./schema";

/**
 * True when the line declares an extra field
 */
export function isDeclarationLine(line: string): boolean {
  return line.startsWith("#H\t") || line.startsWith("#V\t");
}

/**
 * Render one declaration as a header line
 */
export function formatDeclaration(declaration: FieldDeclaration): string {
  return `#${declaration.lineType}\t${declaration.name}\t${declaration.format.tag}\t${declaration.description}`;
}

/**
 * Render header comments followed by every declaration of the registry
 *
 * @throws {ValidationError} If a comment is not a single `#` line, or looks like a declaration
 */
export function formatHeaderLines(comments: readonly string[], registry: SchemaRegistry): string[] {
  for (const comment of comments) {
    if (!comment.startsWith("#") || /[\n\r]/.test(comment)) {
      throw new ValidationError(
        "Header comments must be single lines starting with '#'",
        undefined,
        comment,
        "INVALID_COMMENT"
      );
    }
    if (isDeclarationLine(comment)) {
      throw new ValidationError(
        "Header comments cannot take the form of a field declaration; declare the field in the schema instead",
        undefined,
        comment,
        "INVALID_COMMENT"
      );
    }
  }

  return [...comments, ...registry.declarations().map(formatDeclaration)];
}

/**
 * Accumulates header lines until the first data line
 *
 * @example
 * ```typescript
 * const builder = new HeaderBuilder();
 * builder.addLine("# cohort A", 1);
 * builder.addLine("#H\tbeta\t.2f\tEffect size", 2);
 * const { header, registry } = builder.finish();
 * ```
 */
export class HeaderBuilder {
  private readonly comments: string[] = [];
  private readonly registry = new SchemaRegistry();

  /**
   * @throws {MalformedLineError} If a declaration line has too few columns
   * @throws {DuplicateFieldError} If a field is declared twice for one line type
   */
  addLine(line: string, lineNumber?: number): void {
    if (!isDeclarationLine(line)) {
      this.comments.push(line);
      return;
    }

    const columns = line.slice(1).split("\t");
    const [symbol, name, formatTag] = columns;
    const lineType: LineType = symbol === "H" ? "H" : "V";
    if (name === undefined || formatTag === undefined || columns.length < 4) {
      throw new MalformedLineError(
        `Declaration must have 4 columns (#${lineType}, name, format, description), got ${columns.length}`,
        lineType,
        lineNumber,
        line
      );
    }

    try {
      this.registry.declare(lineType, name, formatTag, columns.slice(3).join("\t"), lineNumber);
    } catch (error) {
      if (error instanceof ValidationError && error.code === "INVALID_FORMAT_TAG") {
        throw new MalformedLineError(error.message, lineType, lineNumber, line);
      }
      throw error;
    }
  }

  /**
   * Freeze the collected declarations and return the header
   */
  finish(): { header: HapHeader; registry: SchemaRegistry } {
    this.registry.freeze();
    return {
      header: {
        comments: [...this.comments],
        declarations: this.registry.declarations(),
      },
      registry: this.registry,
    };
  }
}
