// Great-circle segments (arcs) between two points on the unit sphere

import type { CartesianVector, SphereCoordinate, SpherePoint } from "./index";
import type { GreatCircle } from "./great-circle";
import {
  add,
  chordLength,
  EPSILON,
  fromCartesian,
  isAlmostZero,
  negate,
  normalize,
  toCartesian,
  toUnitVector,
} from "./index";
import {
  greatCircleThrough,
  intersectCircles,
  isOnCircle,
  tangentAt,
} from "./great-circle";
import { InvalidArgumentError } from "./errors";

// ---------- Types ----------

export interface GreatCircleSegment {
  /** Circle the arc is part of; contains start and end */
  baseCircle: GreatCircle;
  start: SphereCoordinate;
  end: SphereCoordinate;
  /** Angular length (radians) between start and end */
  length: number;
}

// ---------- Construction ----------

/**
 * Arc from `start` to `end`. The base circle is derived from the endpoints
 * unless given, in which case both endpoints must lie on it.
 */
export function createSegment(
  start: SphereCoordinate,
  end: SphereCoordinate,
  baseCircle?: GreatCircle,
): GreatCircleSegment {
  if (baseCircle && (!isOnCircle(baseCircle, start) || !isOnCircle(baseCircle, end))) {
    throw new InvalidArgumentError(
      "Start and end have to be on the base circle",
      "baseCircle",
    );
  }
  return {
    baseCircle: baseCircle ?? greatCircleThrough(start, end),
    start,
    end,
    length: arcLength(start, end),
  };
}

/** The same arc traversed from end to start. */
export function reverseSegment(segment: GreatCircleSegment): GreatCircleSegment {
  return { ...segment, start: segment.end, end: segment.start };
}

// ---------- Measures ----------

/** Angular distance (radians) between two points, from their chord: 2·asin(c/2). */
export function arcLength(start: SpherePoint, end: SpherePoint): number {
  const chord = chordLength(toUnitVector(start), toUnitVector(end));
  // Rounding can push the chord of antipodal points past 2
  return 2 * Math.asin(Math.min(chord / 2, 1));
}

/** How far the detour start → point → end exceeds the arc length. */
function detour(segment: GreatCircleSegment, point: SpherePoint): number {
  return Math.abs(segment.length - arcLength(segment.start, point) - arcLength(point, segment.end));
}

/** True when `point` lies on the arc itself, not just on its base circle. */
export function isOnArc(segment: GreatCircleSegment, point: SpherePoint): boolean {
  return isAlmostZero(detour(segment, point));
}

/**
 * Point on the arc at equal angular distance from both ends.
 *
 * The normalized chord midpoint and its antipode both lie on the base circle
 * equidistant from the ends. The antipode is taken only when its detour is
 * smaller by more than EPSILON: for arcs close to π long, asin rounding can
 * push the true midpoint's detour past EPSILON and blur the two apart.
 */
export function segmentMidpoint(segment: GreatCircleSegment): CartesianVector {
  const candidate = normalize(add(toCartesian(segment.start), toCartesian(segment.end)));
  const antipode = negate(candidate);
  return detour(segment, antipode) + EPSILON < detour(segment, candidate) ? antipode : candidate;
}

export function segmentTangentAt(
  segment: GreatCircleSegment,
  point: SpherePoint,
  direction?: CartesianVector,
): CartesianVector {
  return tangentAt(segment.baseCircle, point, direction);
}

// ---------- Intersection ----------

/**
 * Point where two arcs cross, or null.
 *
 * Zero-length arcs and arcs on the same circle have no single crossing. The
 * base circles meet at two antipodal points; the one lying on both arcs is
 * returned.
 */
export function intersectSegments(
  a: GreatCircleSegment,
  b: GreatCircleSegment,
): SphereCoordinate | null {
  if (isAlmostZero(a.length) || isAlmostZero(b.length)) return null;

  const first = intersectCircles(a.baseCircle, b.baseCircle);
  if (!first) return null;

  for (const candidate of [first, negate(first)]) {
    if (isOnArc(a, candidate) && isOnArc(b, candidate)) {
      return fromCartesian(candidate);
    }
  }
  return null;
}
