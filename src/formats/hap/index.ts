/**
 * `.hap` haplotype file format
 *
 * @module hap
 */

export { HapCodec, MANDATORY_COLUMNS } from "./codec";
export {
  DEFAULT_FLOAT_PRECISION,
  formatFixed,
  formatValue,
  MAX_FLOAT_PRECISION,
  parseFormatTag,
  parseValue,
} from "./format-tags";
export { formatDeclaration, formatHeaderLines, HeaderBuilder, isDeclarationLine } from "./header";
export { deserializeHapIndex, IndexedHapReader, readHapIndex } from "./index-reader";
export { buildHapIndex, serializeHapIndex, writeHapIndex } from "./index-writer";
export { HapParser, parseHapString, readHapFile } from "./parser";
export { formatRegion, parseRegion, validateRegion } from "./region";
export { SchemaRegistry } from "./schema";
export {
  type ContigIndex,
  DEFAULT_WINDOW_SIZE,
  type FetchHaplotypesOptions,
  type HapIndex,
  type HapIndexOptions,
  type HapParserOptions,
  type HapRecordSet,
  type HapWriterOptions,
  INDEX_EXTENSION,
  type IndexedReaderOptions,
  PROGRESS_INTERVAL,
  type SchemaInput,
  type WriteSummary,
} from "./types";
export { countHapRecords, detectHapFormat, groupVariants, HapUtils, sortRecords } from "./utils";
export {
  checkIndexReadiness,
  compareRecords,
  HapValidator,
  type HapValidatorOptions,
  recordContig,
  type ReferenceCheckMode,
  validateRecords,
  type ValidationSummary,
} from "./validator";
export { type HapRecordCollections, type HapWriteInput, HapWriter, writeHapFile } from "./writer";
