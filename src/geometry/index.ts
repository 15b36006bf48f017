// Unit-sphere geometry primitives: vectors, spherical coordinates, great circles
// Consumed by anything that needs geodesic arcs or spherical areas

// ---------- Types ----------

/** [x, y, z] in Cartesian space; y is the polar axis */
export type CartesianVector = readonly [number, number, number];

/** Colatitude θ in [0, π] and longitude ϕ in [0, 2π), radians, radius 1 */
export type SphereCoordinate = { readonly theta: number; readonly phi: number };

/** Anything that names a point on the sphere */
export type SpherePoint = SphereCoordinate | CartesianVector;

// ---------- Tolerance ----------

/** Shared tolerance for every approximate comparison in this module. */
export const EPSILON = 1e-9;

const TWO_PI = 2 * Math.PI;

export function isAlmostEqual(a: number, b: number, epsilon = EPSILON): boolean {
  return Math.abs(a - b) < epsilon;
}

export function isAlmostZero(x: number): boolean {
  return isAlmostEqual(x, 0);
}

function clamp(x: number, lo: number, hi: number): number {
  return x < lo ? lo : x > hi ? hi : x;
}

// ---------- Vector algebra ----------

export function vecLength(v: CartesianVector): number {
  return Math.sqrt(v[0] * v[0] + v[1] * v[1] + v[2] * v[2]);
}

/** Unit vector in the direction of v. Non-finite for the zero vector. */
export function normalize(v: CartesianVector): CartesianVector {
  const len = vecLength(v);
  return [v[0] / len, v[1] / len, v[2] / len];
}

export function dot(a: CartesianVector, b: CartesianVector): number {
  return a[0] * b[0] + a[1] * b[1] + a[2] * b[2];
}

export function cross(a: CartesianVector, b: CartesianVector): CartesianVector {
  return [
    a[1] * b[2] - a[2] * b[1],
    a[2] * b[0] - a[0] * b[2],
    a[0] * b[1] - a[1] * b[0],
  ];
}

export function negate(v: CartesianVector): CartesianVector {
  return [-v[0], -v[1], -v[2]];
}

export function add(a: CartesianVector, b: CartesianVector): CartesianVector {
  return [a[0] + b[0], a[1] + b[1], a[2] + b[2]];
}

export function subtract(a: CartesianVector, b: CartesianVector): CartesianVector {
  return [a[0] - b[0], a[1] - b[1], a[2] - b[2]];
}

export function scale(v: CartesianVector, k: number): CartesianVector {
  return [v[0] * k, v[1] * k, v[2] * k];
}

/** Straight-line distance between two points. */
export function chordLength(a: CartesianVector, b: CartesianVector): number {
  return vecLength(subtract(a, b));
}

/** Component-wise equality within EPSILON. */
export function vecEquals(a: CartesianVector, b: CartesianVector): boolean {
  return (
    isAlmostEqual(a[0], b[0]) &&
    isAlmostEqual(a[1], b[1]) &&
    isAlmostEqual(a[2], b[2])
  );
}

/**
 * 32-bit hash over the components quantized to EPSILON, so that vectors
 * landing in the same tolerance cell hash alike.
 */
export function vecHash(v: CartesianVector): number {
  let h = 17;
  for (const c of v) {
    h = (Math.imul(h, 31) + hashNumber(Math.round(c / EPSILON))) | 0;
  }
  return h;
}

function hashNumber(n: number): number {
  // Quantized values exceed 2^32, so mix the high and low halves
  const lo = n | 0;
  const hi = Math.floor(n / 0x1_0000_0000) | 0;
  return (Math.imul(hi, 0x9e3779b1) ^ lo) | 0;
}

// ---------- Coordinate conversion ----------

/** Spherical coordinate to the unit-sphere Cartesian point. */
export function toCartesian(c: SphereCoordinate): CartesianVector {
  const sinTheta = Math.sin(c.theta);
  return [
    sinTheta * Math.sin(c.phi),
    Math.cos(c.theta),
    sinTheta * Math.cos(c.phi),
  ];
}

/**
 * Cartesian point to spherical coordinate. The input is normalized first;
 * the zero vector has no direction and yields NaN.
 */
export function fromCartesian(v: CartesianVector): SphereCoordinate {
  const [x, y, z] = normalize(v);
  // +0 folds atan2's negative zero into 0
  let phi = Math.atan2(x, z) + 0;
  if (phi < 0) phi += TWO_PI;
  // A tiny negative angle rounds to exactly 2π
  if (phi >= TWO_PI) phi -= TWO_PI;
  return { theta: Math.acos(clamp(y, -1, 1)), phi };
}

function isCartesian(p: SpherePoint): p is CartesianVector {
  return Array.isArray(p);
}

/** Unit Cartesian form of any sphere point. */
export function toUnitVector(p: SpherePoint): CartesianVector {
  return isCartesian(p) ? normalize(p) : toCartesian(p);
}

/** Coordinate equality through the Cartesian form; absorbs ϕ wrap-around and poles. */
export function coordinatesEqual(a: SphereCoordinate, b: SphereCoordinate): boolean {
  return vecEquals(toCartesian(a), toCartesian(b));
}

// ---------- Errors (re-exports) ----------

export { InvalidArgumentError } from "./errors";

// ---------- Great circles (re-exports) ----------

export {
  greatCircleThrough,
  greatCircleFromNormal,
  isOnCircle,
  tangentAt,
  intersectCircles,
  circlesCoincide,
} from "./great-circle";
export type { GreatCircle } from "./great-circle";

// ---------- Arcs (re-exports) ----------

export {
  createSegment,
  arcLength,
  segmentMidpoint,
  isOnArc,
  intersectSegments,
  segmentTangentAt,
  reverseSegment,
} from "./segment";
export type { GreatCircleSegment } from "./segment";

// ---------- Polygons (re-exports) ----------

export {
  createPolygon,
  polygonEdges,
  interiorAngles,
  polygonArea,
  polygonPerimeter,
} from "./polygon";
export type { SphericalPolygon } from "./polygon";
