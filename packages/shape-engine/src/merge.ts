import { EmptyDrawing, type Point, type Polyline } from "@gpsart/domain";
import { distance, pointsEqual } from "./metrics.js";

type Candidate = {
  index: number;
  distance: number;
  reversed: boolean;
};

function nearestCandidate(end: Point, remaining: readonly Polyline[]): Candidate {
  let best: Candidate = { index: 0, distance: Number.POSITIVE_INFINITY, reversed: false };
  remaining.forEach((polyline, index) => {
    const toFirst = distance(end, polyline[0]);
    const toLast = distance(end, polyline[polyline.length - 1]);
    const reversed = toLast < toFirst;
    const nearest = reversed ? toLast : toFirst;
    if (nearest < best.distance) {
      best = { index, distance: nearest, reversed };
    }
  });
  return best;
}

/**
 * Chains polylines into one traversal, always continuing with the polyline
 * whose nearer endpoint is closest to the open end. Greedy, so the connector
 * total is not minimal for adversarial drawings.
 */
export function merge(polylines: readonly Polyline[]): Polyline {
  const nonEmpty = polylines.filter((polyline) => polyline.length > 0);
  if (nonEmpty.length === 0) {
    throw new EmptyDrawing();
  }
  if (nonEmpty.length === 1) {
    return nonEmpty[0];
  }

  const [first, ...others] = nonEmpty;
  const chain: Point[] = [...first];
  const remaining = [...others];

  while (remaining.length > 0) {
    const end = chain[chain.length - 1];
    const next = nearestCandidate(end, remaining);
    const [picked] = remaining.splice(next.index, 1);
    const ordered = next.reversed ? [...picked].reverse() : picked;
    for (const point of ordered) {
      if (!pointsEqual(point, chain[chain.length - 1])) {
        chain.push(point);
      }
    }
  }

  return chain;
}
