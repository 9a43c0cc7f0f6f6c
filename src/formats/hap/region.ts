/**
 * Region strings
 *
 * `chr1:10,000-20,000` is the closed interval 10000-20000 on `chr1`. A bare
 * contig name (`chr1`, or a haplotype ID) covers the whole contig. Contig
 * names may themselves contain `:`; only a trailing `:start-end` part with
 * digits is read as coordinates.
 */

import { RegionError } from "../../errors";
import type { HapRegion } from "../../types";

const COORDINATES_PATTERN = /^(\d[\d,]*)-(\d[\d,]*)$/;

/**
 * @throws {RegionError} If the contig is empty or the interval is inverted or out of range
 */
export function parseRegion(region: string): HapRegion {
  const separator = region.lastIndexOf(":");
  const match = separator === -1 ? null : COORDINATES_PATTERN.exec(region.slice(separator + 1));

  if (match === null) {
    return validateRegion({ contig: region, start: 0, end: Number.MAX_SAFE_INTEGER }, region);
  }

  const start = Number((match[1] ?? "").replaceAll(",", ""));
  const end = Number((match[2] ?? "").replaceAll(",", ""));
  return validateRegion({ contig: region.slice(0, separator), start, end }, region);
}

/**
 * @throws {RegionError} If the region cannot be queried
 */
export function validateRegion(region: HapRegion, source = formatRegion(region)): HapRegion {
  if (region.contig === "" || /[\t\n\r]/.test(region.contig)) {
    throw new RegionError("Region needs a contig name without tabs or line breaks", source);
  }
  if (
    !Number.isSafeInteger(region.start) ||
    !Number.isSafeInteger(region.end) ||
    region.start < 0
  ) {
    throw new RegionError("Region coordinates must be non-negative integers", source);
  }
  if (region.start > region.end) {
    throw new RegionError(`Region start ${region.start} is after end ${region.end}`, source);
  }
  return region;
}

export function formatRegion(region: HapRegion): string {
  return `${region.contig}:${region.start}-${region.end}`;
}
