/**
 * Total order over firmware version strings.
 *
 * Dot-separated non-negative integers compare numerically, component by
 * component, with missing trailing components treated as zero ("6.6" == "6.6.0").
 * Anything else ("bad", "2024-11-19", "6.6.51-rc1") ranks below every parseable
 * version; among themselves such strings order by plain string comparison and are
 * equal only when identical.
 */

const VERSION_RE = /^\d+(\.\d+)*$/;

/** Integer tuple for "6.6.51", or null when the string is not dot-separated integers */
export function parseVersion(version: string): number[] | null {
  const trimmed = version.trim();
  if (!VERSION_RE.test(trimmed)) return null;
  return trimmed.split(".").map((part) => Number.parseInt(part, 10));
}

export function compareVersions(a: string, b: string): -1 | 0 | 1 {
  const pa = parseVersion(a);
  const pb = parseVersion(b);

  if (pa === null && pb === null) {
    if (a === b) return 0;
    return a < b ? -1 : 1;
  }
  if (pa === null) return -1;
  if (pb === null) return 1;

  const len = Math.max(pa.length, pb.length);
  for (let i = 0; i < len; i++) {
    const x = pa[i] ?? 0;
    const y = pb[i] ?? 0;
    if (x !== y) return x > y ? 1 : -1;
  }
  return 0;
}

/** a is strictly newer than b */
export function isNewer(a: string, b: string): boolean {
  return compareVersions(a, b) > 0;
}

export function versionsEqual(a: string, b: string): boolean {
  return compareVersions(a, b) === 0;
}

/** Strip a leading "v"/"V" from a release tag ("v6.6.51" -> "6.6.51") */
export function normalizeTag(tag: string): string {
  return tag.trim().replace(/^[vV](?=\d)/, "");
}
