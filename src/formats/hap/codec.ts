/**
 * Conversion between data lines and records under a schema
 *
 * Column layout (tab separated, positions are non-negative integers):
 *
 * ```text
 * H  chromosome  start  end  id             [H extras...]
 * V  haplotypeId start  end  id  allele     [V extras...]
 * ```
 */

import { MalformedLineError, UndeclaredFieldError } from "../../errors";
import type { ExtraValue, HapRecord, Haplotype, LineType, Variant } from "../../types";
import { formatValue, parseValue } from "./format-tags";
import type { SchemaRegistry } from "./schema";

/** Mandatory columns after the type symbol */
export const MANDATORY_COLUMNS: Readonly<Record<LineType, number>> = { H: 4, V: 5 };

const POSITION_PATTERN = /^\d+$/;
const FORBIDDEN_CHARS = /[\t\n\r]/;

export class HapCodec {
  constructor(private readonly registry: SchemaRegistry) {}

  /**
   * Parse one data line
   *
   * @param lineNumber - Used in errors, and attached to the record when `attachLineNumber` is set
   * @throws {MalformedLineError} If the symbol is unknown, columns are missing or a mandatory column is unreadable
   * @throws {UndeclaredFieldError} If the line has more columns than declared
   * @throws {TypeCoercionError} If an extra column does not fit its format tag
   */
  parseLine(line: string, lineNumber?: number, attachLineNumber = false): HapRecord {
    const columns = line.split("\t");
    const symbol = columns[0] ?? "";
    if (symbol !== "H" && symbol !== "V") {
      throw new MalformedLineError(
        `Unknown line type '${symbol}': data lines start with H or V`,
        undefined,
        lineNumber,
        line
      );
    }

    const fields = this.registry.fieldsFor(symbol);
    const mandatory = MANDATORY_COLUMNS[symbol];
    const expected = 1 + mandatory + fields.length;
    if (columns.length < expected) {
      throw new MalformedLineError(
        `${symbol} line has ${columns.length - 1} columns, expected ${mandatory} mandatory and ${fields.length} declared extra`,
        symbol,
        lineNumber,
        line
      );
    }
    if (columns.length > expected) {
      const surplus = columns.slice(expected);
      throw new UndeclaredFieldError(
        `${symbol} line has ${surplus.length} undeclared extra column(s)`,
        symbol,
        surplus,
        lineNumber,
        line
      );
    }

    const text = (index: number, name: string): string => {
      const value = columns[index] ?? "";
      if (value === "") {
        throw new MalformedLineError(`Empty ${name} column`, symbol, lineNumber, line);
      }
      return value;
    };
    const start = parsePosition(columns[2] ?? "", "start", symbol, lineNumber, line);
    const end = parsePosition(columns[3] ?? "", "end", symbol, lineNumber, line);
    if (end < start) {
      throw new MalformedLineError(
        `End position ${end} is before start position ${start}`,
        symbol,
        lineNumber,
        line
      );
    }

    const extras = Object.fromEntries(
      fields.map((field, i) => [field.name, parseValue(columns[1 + mandatory + i] ?? "", field, lineNumber)])
    );
    const location = attachLineNumber && lineNumber !== undefined ? { lineNumber } : {};

    if (symbol === "H") {
      return {
        type: "H",
        chromosome: text(1, "chromosome"),
        start,
        end,
        id: text(4, "haplotype ID"),
        extras,
        ...location,
      };
    }
    return {
      type: "V",
      haplotypeId: text(1, "haplotype ID"),
      start,
      end,
      id: text(4, "variant ID"),
      allele: text(5, "allele"),
      extras,
      ...location,
    };
  }

  /**
   * Render one record as a data line, without the line terminator
   *
   * @throws {MalformedLineError} If a mandatory column is invalid or a declared extra is missing
   * @throws {UndeclaredFieldError} If the record carries an extra the schema does not declare
   * @throws {TypeCoercionError} If an extra value does not fit its format tag
   */
  formatRecord(record: HapRecord): string {
    const fields = this.registry.fieldsFor(record.type);
    const lineNumber = record.lineNumber;

    const undeclared = Object.keys(record.extras).filter(
      (name) => !fields.some((field) => field.name === name)
    );
    if (undeclared.length > 0) {
      throw new UndeclaredFieldError(
        `${record.type} record '${record.id}' has undeclared extra field(s): ${undeclared.join(", ")}`,
        record.type,
        undeclared,
        lineNumber
      );
    }

    const mandatory =
      record.type === "H"
        ? [record.chromosome, ...positions(record), record.id]
        : [record.haplotypeId, ...positions(record), record.id, record.allele];
    for (const column of mandatory) {
      if (column === "" || FORBIDDEN_CHARS.test(column)) {
        throw new MalformedLineError(
          `${record.type} record '${record.id}' has an empty column or one containing a tab or line break`,
          record.type,
          lineNumber
        );
      }
    }

    const extras = fields.map((field) => {
      const value: ExtraValue | undefined = record.extras[field.name];
      if (value === undefined) {
        throw new MalformedLineError(
          `${record.type} record '${record.id}' is missing declared extra field '${field.name}'`,
          record.type,
          lineNumber
        );
      }
      return formatValue(value, field, lineNumber);
    });

    return [record.type, ...mandatory, ...extras].join("\t");
  }
}

function positions(record: Haplotype | Variant): [string, string] {
  const { start, end } = record;
  if (!Number.isSafeInteger(start) || !Number.isSafeInteger(end) || start < 0 || end < start) {
    throw new MalformedLineError(
      `${record.type} record '${record.id}' has invalid positions ${start}-${end}`,
      record.type,
      record.lineNumber
    );
  }
  return [String(start), String(end)];
}

function parsePosition(
  text: string,
  name: string,
  lineType: LineType,
  lineNumber: number | undefined,
  line: string
): number {
  const value = Number(text);
  if (!POSITION_PATTERN.test(text) || !Number.isSafeInteger(value)) {
    throw new MalformedLineError(
      `Invalid ${name} position '${text}': expected a non-negative integer`,
      lineType,
      lineNumber,
      line
    );
  }
  return value;
}
