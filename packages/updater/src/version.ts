import { ValidationError } from "@pyvm/core";

const VERSION_PATTERN = /^\d+\.\d+(\.\d+)*$/;
const LEADING_VERSION_PATTERN = /^\d+(\.\d+)+/;

export interface Version {
  raw: string;
  parts: number[];
}

export type Ordering = -1 | 0 | 1;

/**
 * True for dotted non-negative integers with at least two components,
 * e.g. "3.11" or "3.11.5".
 */
export function validateVersionString(version: string): boolean {
  return VERSION_PATTERN.test(version);
}

/**
 * Parse a dotted version string into its integer components.
 * Throws ValidationError if the string is not e.g. "3.11" or "3.11.5".
 */
export function parseVersion(version: string): Version {
  if (!validateVersionString(version)) {
    throw new ValidationError(`Invalid version string: "${version}"`);
  }
  return { raw: version, parts: version.split(".").map(Number) };
}

/** Compare digit strings by numeric value without converting to number. */
function compareComponents(a: string, b: string): Ordering {
  const left = a.replace(/^0+(?=\d)/, "");
  const right = b.replace(/^0+(?=\d)/, "");
  if (left.length !== right.length) return left.length > right.length ? 1 : -1;
  if (left === right) return 0;
  return left > right ? 1 : -1;
}

/**
 * Compare two version strings component by component.
 * Missing trailing components count as zero, so "3.11" equals "3.11.0".
 * Returns -1 if a < b, 0 if a === b, 1 if a > b.
 */
export function compareVersions(a: string, b: string): Ordering {
  const aParts = parseVersion(a).raw.split(".");
  const bParts = parseVersion(b).raw.split(".");
  const length = Math.max(aParts.length, bParts.length);

  for (let i = 0; i < length; i++) {
    const order = compareComponents(aParts[i] ?? "0", bParts[i] ?? "0");
    if (order !== 0) return order;
  }
  return 0;
}

/**
 * Returns true if the latest version is newer than the current version.
 */
export function isNewerVersion(current: string, latest: string): boolean {
  return compareVersions(latest, current) === 1;
}

/** The `major.minor` channel of a version, e.g. "3.12" for "3.12.1". */
export function toChannel(version: string): string {
  const [major, minor] = parseVersion(version).raw.split(".");
  return `${major}.${minor}`;
}

/**
 * Strip pre-release or build suffixes from an interpreter version,
 * e.g. "3.13.0rc1" → "3.13.0". Returns null if nothing numeric leads.
 */
export function normalizeInterpreterVersion(version: string): string | null {
  const match = LEADING_VERSION_PATTERN.exec(version.trim());
  return match ? match[0] : null;
}
