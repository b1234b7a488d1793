/**
 * Stable ordering for authoritative ids.
 *
 * Entity ids look like "u1", "u2", "u10": a letter prefix and a numeric
 * suffix. Sort by prefix, then numerically, falling back to plain
 * string comparison for anything else.
 */
export function compareEntityId(a: string, b: string): number {
  if (a === b) return 0;

  const pa = parseEntityId(a);
  const pb = parseEntityId(b);

  if (pa && pb) {
    if (pa.prefix !== pb.prefix) return pa.prefix < pb.prefix ? -1 : 1;
    if (pa.num !== pb.num) return pa.num - pb.num;
  }

  return a < b ? -1 : 1;
}

function parseEntityId(id: string): { prefix: string; num: number } | null {
  const match = /^([a-zA-Z]+)([0-9]+)$/.exec(id);
  if (!match) return null;
  const prefix = match[1] ?? '';
  const num = Number.parseInt(match[2] ?? '', 10);
  if (!Number.isFinite(num)) return null;
  return { prefix, num };
}
