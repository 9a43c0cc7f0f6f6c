/**
 * Cross-record validation: unique haplotype IDs, variant references, and
 * the ordering required for region indexing
 */

import {
  type DanglingReference,
  DanglingVariantError,
  DuplicateHaplotypeError,
  HaplotypeIdCollisionError,
  UnsortedFileError,
} from "../../errors";
import type { HapRecord } from "../../types";

/**
 * When unresolved variant references are reported
 *
 * - `deferred`: collect every dangling reference and raise once at the end
 * - `streaming`: raise on the first variant whose haplotype has not been seen
 */
export type ReferenceCheckMode = "deferred" | "streaming";

export interface HapValidatorOptions {
  referenceCheck?: ReferenceCheckMode;
  /** Require index order and reject haplotype IDs equal to chromosome names */
  requireSorted?: boolean;
}

export interface ValidationSummary {
  readonly haplotypes: number;
  readonly variants: number;
}

/**
 * Column that groups a record for indexing: chromosome for haplotypes,
 * haplotype ID for variants
 */
export function recordContig(record: HapRecord): string {
  return record.type === "H" ? record.chromosome : record.haplotypeId;
}

/**
 * Index order: haplotypes before variants, then contig by code unit,
 * then start, then end
 */
export function compareRecords(a: HapRecord, b: HapRecord): number {
  if (a.type !== b.type) {
    return a.type === "H" ? -1 : 1;
  }
  const contigA = recordContig(a);
  const contigB = recordContig(b);
  if (contigA !== contigB) {
    return contigA < contigB ? -1 : 1;
  }
  return a.start - b.start || a.end - b.end;
}

/**
 * Incremental validator fed one record at a time
 *
 * @example
 * ```typescript
 * const validator = new HapValidator({ referenceCheck: "deferred" });
 * for (const record of records) validator.observe(record);
 * validator.finish(); // throws DanglingVariantError listing every bad reference
 * ```
 */
export class HapValidator {
  private readonly haplotypeLines = new Map<string, number | undefined>();
  private readonly chromosomes = new Set<string>();
  private readonly pending: DanglingReference[] = [];
  private readonly referenceCheck: ReferenceCheckMode;
  private readonly requireSorted: boolean;
  private previous: HapRecord | undefined;
  private variantCount = 0;

  constructor(options: HapValidatorOptions = {}) {
    this.referenceCheck = options.referenceCheck ?? "deferred";
    this.requireSorted = options.requireSorted ?? false;
  }

  /**
   * @param lineNumber - Source line, when the record came from a file
   * @param line - Source text, included in ordering errors
   */
  observe(record: HapRecord, lineNumber = record.lineNumber, line?: string): void {
    if (this.requireSorted) {
      this.checkOrder(record, lineNumber, line);
    }

    if (record.type === "H") {
      if (this.haplotypeLines.has(record.id)) {
        throw new DuplicateHaplotypeError(record.id, this.haplotypeLines.get(record.id), lineNumber);
      }
      if (this.requireSorted) {
        if (this.haplotypeLines.has(record.chromosome) || record.chromosome === record.id) {
          throw new HaplotypeIdCollisionError(record.chromosome, lineNumber);
        }
        if (this.chromosomes.has(record.id)) {
          throw new HaplotypeIdCollisionError(record.id, lineNumber);
        }
        this.chromosomes.add(record.chromosome);
      }
      this.haplotypeLines.set(record.id, lineNumber);
      return;
    }

    this.variantCount++;
    if (!this.haplotypeLines.has(record.haplotypeId)) {
      const reference: DanglingReference = {
        variantId: record.id,
        haplotypeId: record.haplotypeId,
        ...(lineNumber !== undefined ? { lineNumber } : {}),
      };
      if (this.referenceCheck === "streaming") {
        throw new DanglingVariantError([reference]);
      }
      this.pending.push(reference);
    }
  }

  /**
   * Resolve deferred references
   *
   * @throws {DanglingVariantError} Listing every variant whose haplotype never appeared
   */
  finish(): ValidationSummary {
    const dangling = this.pending.filter((ref) => !this.haplotypeLines.has(ref.haplotypeId));
    if (dangling.length > 0) {
      throw new DanglingVariantError(dangling);
    }
    return { haplotypes: this.haplotypeLines.size, variants: this.variantCount };
  }

  private checkOrder(record: HapRecord, lineNumber: number | undefined, line: string | undefined): void {
    const previous = this.previous;
    this.previous = record;
    if (previous === undefined || compareRecords(previous, record) <= 0) {
      return;
    }
    const where = lineNumber !== undefined ? `line ${lineNumber}` : `record '${record.id}'`;
    throw new UnsortedFileError(
      `Records are not sorted at ${where}: expected H lines before V lines, each ordered by contig, start and end`,
      lineNumber,
      line
    );
  }
}

/**
 * Validate a complete record set in one pass
 *
 * @throws {DuplicateHaplotypeError | DanglingVariantError | UnsortedFileError | HaplotypeIdCollisionError}
 */
export function validateRecords(
  records: Iterable<HapRecord>,
  options: HapValidatorOptions = {}
): ValidationSummary {
  const validator = new HapValidator(options);
  for (const record of records) {
    validator.observe(record);
  }
  return validator.finish();
}

/**
 * Check that records can be indexed as written, in their current order
 */
export function checkIndexReadiness(records: Iterable<HapRecord>): ValidationSummary {
  return validateRecords(records, { referenceCheck: "streaming", requireSorted: true });
}
