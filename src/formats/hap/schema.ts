/**
 * Registry of extra field declarations per line type
 *
 * A registry is filled from header declarations (or by a caller before
 * writing) and frozen before the first data line is read or written. Field
 * order inside a line type is declaration order, which is also the column
 * order of the extra fields on data lines.
 */

import { DuplicateFieldError, SchemaFrozenError, ValidationError } from "../../errors";
import type {
  FieldDeclaration,
  FieldDeclarationInput,
  FormatTag,
  LineType,
} from "../../types";
import { parseFormatTag } from "./format-tags";

const FIELD_NAME_PATTERN = /^[^\s#]+$/;

export class SchemaRegistry {
  private readonly byLineType: Record<LineType, FieldDeclaration[]> = { H: [], V: [] };
  private readonly ordered: FieldDeclaration[] = [];
  private frozen = false;

  /**
   * Build a frozen registry from caller-side declarations
   *
   * @example
   * ```typescript
   * const schema = SchemaRegistry.fromDeclarations([
   *   { lineType: "H", name: "beta", formatTag: ".2f", description: "Effect size" },
   * ]);
   * ```
   */
  static fromDeclarations(
    declarations: readonly (FieldDeclarationInput | FieldDeclaration)[]
  ): SchemaRegistry {
    const registry = new SchemaRegistry();
    for (const declaration of declarations) {
      const format = "format" in declaration ? declaration.format : declaration.formatTag;
      registry.declare(declaration.lineType, declaration.name, format, declaration.description);
    }
    return registry.freeze();
  }

  get isFrozen(): boolean {
    return this.frozen;
  }

  /**
   * Declare an extra field
   *
   * @throws {SchemaFrozenError} If the registry is frozen
   * @throws {DuplicateFieldError} If the name is already declared for the line type
   * @throws {ValidationError} If the name, description or format tag is invalid
   */
  declare(
    lineType: LineType,
    name: string,
    format: string | FormatTag,
    description = "",
    lineNumber?: number
  ): FieldDeclaration {
    if (this.frozen) {
      throw new SchemaFrozenError(name);
    }
    if (!FIELD_NAME_PATTERN.test(name)) {
      throw new ValidationError(
        `Invalid field name '${name}': names must be non-empty and contain no whitespace or '#'`,
        lineNumber,
        undefined,
        "INVALID_FIELD_NAME"
      );
    }
    if (/[\n\r]/.test(description)) {
      throw new ValidationError(
        `Description of field '${name}' must be a single line`,
        lineNumber,
        undefined,
        "INVALID_FIELD_DESCRIPTION"
      );
    }
    if (this.field(lineType, name) !== undefined) {
      throw new DuplicateFieldError(lineType, name, lineNumber);
    }

    const declaration: FieldDeclaration = Object.freeze({
      lineType,
      name,
      format: typeof format === "string" ? parseFormatTag(format) : format,
      description,
    });
    this.byLineType[lineType].push(declaration);
    this.ordered.push(declaration);
    return declaration;
  }

  /**
   * Ordered extra fields of one line type
   */
  fieldsFor(lineType: LineType): readonly FieldDeclaration[] {
    return this.byLineType[lineType];
  }

  field(lineType: LineType, name: string): FieldDeclaration | undefined {
    return this.byLineType[lineType].find((declaration) => declaration.name === name);
  }

  /**
   * All declarations in the order they were made
   */
  declarations(): readonly FieldDeclaration[] {
    return this.ordered;
  }

  freeze(): this {
    this.frozen = true;
    return this;
  }

  /**
   * Same fields, in the same order, with the same format tags
   *
   * Descriptions are documentation and do not take part in the comparison.
   */
  equals(other: SchemaRegistry): boolean {
    return (["H", "V"] as const).every((lineType) => {
      const mine = this.fieldsFor(lineType);
      const theirs = other.fieldsFor(lineType);
      return (
        mine.length === theirs.length &&
        mine.every((field, i) => {
          const counterpart = theirs[i];
          return (
            counterpart !== undefined &&
            counterpart.name === field.name &&
            counterpart.format.tag === field.format.tag
          );
        })
      );
    });
  }
}
