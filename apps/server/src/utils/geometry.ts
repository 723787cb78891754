export type Position = [number, number];
export type Ring = Position[];

export const closeRing = (ring: Ring): Ring => {
  if (ring.length < 3) return ring;
  const first = ring[0];
  const last = ring[ring.length - 1];
  if (first[0] !== last[0] || first[1] !== last[1]) return [...ring, first];
  return ring;
};

// Polygons in annotations are implicitly closed; drop the repeated first point.
export const openRing = (ring: Ring): Ring => {
  if (ring.length < 2) return ring;
  const first = ring[0];
  const last = ring[ring.length - 1];
  if (first[0] === last[0] && first[1] === last[1]) return ring.slice(0, -1);
  return ring;
};

export const rectToRing = (xmin: number, ymin: number, xmax: number, ymax: number): Ring => [
  [xmin, ymin], [xmax, ymin], [xmax, ymax], [xmin, ymax],
];

/** Shoelace area; accepts open or closed rings. */
export const area = (ring: Ring): number => {
  const closed = closeRing(ring);
  let a = 0;
  for (let i = 0; i < closed.length - 1; i++) {
    const [x1, y1] = closed[i];
    const [x2, y2] = closed[i + 1];
    a += (x1 * y2 - x2 * y1);
  }
  return Math.abs(a) / 2;
};

export const clampRing = (ring: Ring, width: number, height: number): Ring =>
  ring.map(([x, y]) => [
    Math.min(Math.max(x, 0), Math.max(width - 1, 0)),
    Math.min(Math.max(y, 0), Math.max(height - 1, 0)),
  ]);

// Consecutive duplicates, e.g. frame corners collapsed by clampRing.
export const dropRepeats = (ring: Ring): Ring =>
  ring.filter((p, i) => i === 0 || p[0] !== ring[i - 1][0] || p[1] !== ring[i - 1][1]);

/** Ramer–Douglas–Peucker on a closed ring; returns a closed ring. */
export function simplify(ring: Ring, eps = 0.5): Ring {
  if (ring.length <= 3 || eps <= 0) return ring;
  const sq = (x: number) => x * x;
  function dist2(p: Position, a: Position, b: Position) {
    const [x, y] = p, [x1, y1] = a, [x2, y2] = b;
    const dx = x2 - x1, dy = y2 - y1;
    if (dx === 0 && dy === 0) return sq(x - x1) + sq(y - y1);
    const t = ((x - x1) * dx + (y - y1) * dy) / (dx * dx + dy * dy);
    const xx = x1 + t * dx, yy = y1 + t * dy;
    return sq(x - xx) + sq(y - yy);
  }
  function rdp(pts: Ring, s: number, e: number, out: number[]) {
    let maxD = 0, idx = s + 1;
    for (let i = s + 1; i < e; i++) {
      const d = dist2(pts[i], pts[s], pts[e]);
      if (d > maxD) { maxD = d; idx = i; }
    }
    if (Math.sqrt(maxD) > eps) { rdp(pts, s, idx, out); rdp(pts, idx, e, out); } else { out.push(s, e); }
  }
  const closed = closeRing(ring);
  const keep: number[] = [];
  rdp(closed, 0, closed.length - 1, keep);
  const uniq = Array.from(new Set(keep)).sort((a, b) => a - b).map(i => closed[i]);
  return closeRing(uniq);
}
