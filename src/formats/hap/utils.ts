/**
 * Helpers for working with `.hap` text and record collections
 */

import { splitLines } from "../../io/stream-utils";
import type { HapRecord, Haplotype, HaplotypeWithVariants, Variant } from "../../types";
import { MANDATORY_COLUMNS } from "./codec";
import { isDeclarationLine } from "./header";
import { compareRecords } from "./validator";

/**
 * Guess whether text is `.hap` content
 *
 * Looks at the first data line, or at the header declarations when the text
 * has no data lines.
 */
export function detectHapFormat(text: string): boolean {
  let sawDeclaration = false;
  for (const line of splitLines(text)) {
    if (line.trim() === "") continue;
    if (line.startsWith("#")) {
      sawDeclaration ||= isDeclarationLine(line);
      continue;
    }
    const columns = line.split("\t");
    const symbol = columns[0];
    if (symbol !== "H" && symbol !== "V") return false;
    return columns.length > MANDATORY_COLUMNS[symbol];
  }
  return sawDeclaration;
}

/**
 * Count data lines by type without parsing them
 */
export function countHapRecords(text: string): { haplotypes: number; variants: number } {
  let haplotypes = 0;
  let variants = 0;
  for (const line of splitLines(text)) {
    if (line.startsWith("H\t")) haplotypes++;
    else if (line.startsWith("V\t")) variants++;
  }
  return { haplotypes, variants };
}

/**
 * Copy of the records in index order; ties keep their input order
 */
export function sortRecords<T extends HapRecord>(records: readonly T[]): T[] {
  return [...records].sort(compareRecords);
}

/**
 * Attach to each haplotype the variants that reference it, in input order
 *
 * Variants whose haplotype is absent are returned separately.
 */
export function groupVariants(
  haplotypes: readonly Haplotype[],
  variants: readonly Variant[]
): { grouped: HaplotypeWithVariants[]; orphans: Variant[] } {
  const byHaplotype = new Map<string, Variant[]>(haplotypes.map((h) => [h.id, []]));
  const orphans: Variant[] = [];
  for (const variant of variants) {
    const bucket = byHaplotype.get(variant.haplotypeId);
    if (bucket === undefined) {
      orphans.push(variant);
    } else {
      bucket.push(variant);
    }
  }
  return {
    grouped: haplotypes.map((h) => ({ ...h, variants: byHaplotype.get(h.id) ?? [] })),
    orphans,
  };
}

export const HapUtils = {
  detectHapFormat,
  countHapRecords,
  sortRecords,
  groupVariants,
} as const;
