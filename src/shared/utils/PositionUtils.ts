import type { Position } from "@/shared/types/world";

/**
 * Canonical `"x,y"` key for maps and sets.
 */
export function positionKey(x: number, y: number): string {
  return `${x},${y}`;
}

export function toKey(position: Readonly<Position>): string {
  return positionKey(position.x, position.y);
}

export function parseKey(key: string): Position | undefined {
  const [xs, ys] = key.split(",");
  const x = Number(xs);
  const y = Number(ys);
  if (!Number.isInteger(x) || !Number.isInteger(y)) return undefined;
  return { x, y };
}

/**
 * Row-major ordering: smaller y first, then smaller x.
 */
export function comparePositions(
  a: Readonly<Position>,
  b: Readonly<Position>,
): number {
  return a.y - b.y || a.x - b.x;
}

export function samePosition(
  a: Readonly<Position>,
  b: Readonly<Position>,
): boolean {
  return a.x === b.x && a.y === b.y;
}

export function isPosition(value: unknown): value is Position {
  if (typeof value !== "object" || value === null) return false;
  if (!("x" in value) || !("y" in value)) return false;
  return Number.isInteger(value.x) && Number.isInteger(value.y);
}

export function distanceSquared(
  a: Readonly<Position>,
  b: Readonly<Position>,
): number {
  const dx = a.x - b.x;
  const dy = a.y - b.y;
  return dx * dx + dy * dy;
}

/**
 * Frozen, de-duplicated copy preserving first occurrence order.
 */
export function freezePositions(
  positions: Iterable<Readonly<Position>>,
): readonly Readonly<Position>[] {
  const seen = new Set<string>();
  const result: Readonly<Position>[] = [];
  for (const p of positions) {
    const key = toKey(p);
    if (seen.has(key)) continue;
    seen.add(key);
    result.push(Object.freeze({ x: p.x, y: p.y }));
  }
  return Object.freeze(result);
}
