/**
 * Writing, reading and querying a `.hap` file
 *
 * Run with `npx tsx examples/basic-usage.ts`.
 */

import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import {
  HapkitError,
  type Haplotype,
  IndexedHapReader,
  readHapFile,
  sortRecords,
  type Variant,
  writeHapFile,
} from "../src";

const SCHEMA = [
  { lineType: "H", name: "beta", formatTag: ".2f", description: "Effect size" },
  { lineType: "V", name: "score", formatTag: "d", description: "Allele quality" },
] as const;

function simulate(): { haplotypes: Haplotype[]; variants: Variant[] } {
  const haplotypes: Haplotype[] = [];
  const variants: Variant[] = [];
  for (let i = 0; i < 20; i++) {
    const id = `hap${i}`;
    const start = 1000 + i * 250;
    haplotypes.push({
      type: "H",
      chromosome: i % 2 === 0 ? "chr19" : "chr21",
      start,
      end: start + 400,
      id,
      extras: { beta: (i - 10) / 8 },
    });
    variants.push({
      type: "V",
      haplotypeId: id,
      start: start + 10,
      end: start + 11,
      id: `rs${1000 + i}`,
      allele: i % 3 === 0 ? "C" : "T",
      extras: { score: 20 + i },
    });
  }
  return { haplotypes, variants };
}

// ============================================================================
// Example 1: Plain text, each haplotype followed by its variants
// ============================================================================

async function example1_plainText(dir: string): Promise<void> {
  console.log("\n=== Example 1: Plain text ===\n");

  const path = join(dir, "cohort.hap");
  const summary = await writeHapFile(path, SCHEMA, simulate(), { comments: ["# simulated cohort"] });
  console.log(`Wrote ${summary.haplotypes} haplotypes and ${summary.variants} variants`);

  const { header, haplotypes } = await readHapFile(path, { haplotypeIds: ["hap3", "hap4"] });
  console.log(`Declared fields: ${header.declarations.map((d) => `${d.name}:${d.format.tag}`).join(", ")}`);
  for (const haplotype of haplotypes) {
    console.log(`  ${haplotype.id} ${haplotype.chromosome}:${haplotype.start}-${haplotype.end} beta=${haplotype.extras["beta"]}`);
  }
}

// ============================================================================
// Example 2: BGZF output with a region index
// ============================================================================

async function example2_regionQueries(dir: string): Promise<void> {
  console.log("\n=== Example 2: Region queries ===\n");

  const { haplotypes, variants } = simulate();
  const path = join(dir, "cohort.hap.gz");
  await writeHapFile(
    path,
    SCHEMA,
    { haplotypes: sortRecords(haplotypes), variants: sortRecords(variants) },
    { indexable: true }
  );

  const reader = await IndexedHapReader.open(path, { persist: true });
  console.log(`Indexed contigs: ${reader.contigs.length}`);

  for await (const record of reader.query("chr19:2,000-3,000")) {
    console.log(`  ${record.type} ${record.id} ${record.start}-${record.end}`);
  }

  for await (const haplotype of reader.fetchHaplotypes("chr21:1000-2000")) {
    console.log(`  ${haplotype.id}: ${haplotype.variants.map((v) => `${v.id}=${v.allele}`).join(", ")}`);
  }
}

async function main(): Promise<void> {
  const dir = await mkdtemp(join(tmpdir(), "hapkit-example-"));
  try {
    await example1_plainText(dir);
    await example2_regionQueries(dir);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}

main().catch((error: unknown) => {
  console.error(error instanceof HapkitError ? error.toString() : error);
  process.exitCode = 1;
});
