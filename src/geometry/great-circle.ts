// Great circles: intersections of the unit sphere with planes through the origin.
// A circle is identified by its unit plane normal.

import type { CartesianVector, SphereCoordinate, SpherePoint } from "./index";
import {
  cross,
  dot,
  isAlmostZero,
  negate,
  normalize,
  toCartesian,
  toUnitVector,
  vecLength,
} from "./index";

// ---------- Types ----------

export interface GreatCircle {
  /** Unit normal of the circle's plane */
  normal: CartesianVector;
}

// ---------- Construction ----------

/**
 * Great circle through two points. The points must be neither identical nor
 * antipodal; otherwise the normal is NaN.
 */
export function greatCircleThrough(
  a: SphereCoordinate,
  b: SphereCoordinate,
): GreatCircle {
  return { normal: normalize(cross(toCartesian(a), toCartesian(b))) };
}

export function greatCircleFromNormal(normal: CartesianVector): GreatCircle {
  return { normal: normalize(normal) };
}

// ---------- Queries ----------

export function isOnCircle(circle: GreatCircle, point: SpherePoint): boolean {
  return isAlmostZero(dot(toUnitVector(point), circle.normal));
}

/**
 * Unit tangent to the circle at `point`.
 *
 * Without `direction` this is normal × point, one of the two antipodal
 * tangents. With `direction`, the tangent whose dot product with it is
 * non-negative is returned.
 */
export function tangentAt(
  circle: GreatCircle,
  point: SpherePoint,
  direction?: CartesianVector,
): CartesianVector {
  const tangent = normalize(cross(circle.normal, toUnitVector(point)));
  if (direction && dot(tangent, direction) < 0) {
    return negate(tangent);
  }
  return tangent;
}

/** True when both circles lie in the same plane (normals parallel or anti-parallel). */
export function circlesCoincide(a: GreatCircle, b: GreatCircle): boolean {
  return isAlmostZero(vecLength(cross(a.normal, b.normal)));
}

/**
 * One of the two antipodal intersection points of two great circles; the other
 * is its negation. Null when the circles coincide.
 */
export function intersectCircles(
  a: GreatCircle,
  b: GreatCircle,
): CartesianVector | null {
  const c = cross(a.normal, b.normal);
  if (isAlmostZero(vecLength(c))) return null;
  return normalize(c);
}
