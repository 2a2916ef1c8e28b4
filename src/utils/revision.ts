// src/utils/revision.ts

/**
 * resourceVersion values are opaque strings, but the API server hands out
 * etcd revisions, which compare as integers.
 */
export function parseRevision(value: string | undefined): bigint | undefined {
  if (value === undefined) {
    return undefined;
  }
  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed)) {
    return undefined;
  }
  return BigInt(trimmed);
}

/**
 * Negative when `a` is older than `b`, zero when equal, positive when newer.
 * Falls back to the observation timestamps when either revision is not numeric.
 */
export function compareRevisions(
  a: { revision: string; updatedAt: number },
  b: { revision: string; updatedAt: number }
): number {
  const left = parseRevision(a.revision);
  const right = parseRevision(b.revision);
  if (left !== undefined && right !== undefined) {
    return left < right ? -1 : left > right ? 1 : 0;
  }
  return a.updatedAt - b.updatedAt;
}

export function maxRevision(a: string, b: string): string {
  const left = parseRevision(a);
  const right = parseRevision(b);
  if (left === undefined) {
    return b;
  }
  if (right === undefined) {
    return a;
  }
  return left >= right ? a : b;
}
