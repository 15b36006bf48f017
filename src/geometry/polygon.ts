// Spherical polygons: closed cycles of geodesic edges on the unit sphere
// Area follows Girard's theorem (spherical excess over the planar angle sum).

import type { SphereCoordinate } from "./index";
import type { GreatCircleSegment } from "./segment";
import { coordinatesEqual, cross, dot, isAlmostZero, subtract, toCartesian } from "./index";
import { createSegment, segmentTangentAt } from "./segment";
import { InvalidArgumentError } from "./errors";

// ---------- Types ----------

export interface SphericalPolygon {
  /** Vertices in traversal order; the last connects back to the first */
  vertices: readonly SphereCoordinate[];
}

const FULL_SPHERE = 4 * Math.PI;

// ---------- Construction ----------

/**
 * Polygon over `vertices` in traversal order. Consecutive vertices (last and
 * first included) must be distinct, since a zero-length edge has no great
 * circle. Edges must not cross each other; that is not checked.
 */
export function createPolygon(vertices: readonly SphereCoordinate[]): SphericalPolygon {
  if (vertices.length < 3) {
    throw new InvalidArgumentError(
      `A spherical polygon needs at least 3 vertices, got ${vertices.length}`,
      "vertices",
    );
  }
  const repeated = vertices.findIndex((v, i) =>
    coordinatesEqual(v, vertices[(i + 1) % vertices.length]),
  );
  if (repeated >= 0) {
    throw new InvalidArgumentError(
      `Vertex ${repeated} coincides with the next vertex`,
      "vertices",
    );
  }
  return { vertices: [...vertices] };
}

/** Edge i runs from vertex i to vertex i+1, wrapping at the end. */
export function polygonEdges(polygon: SphericalPolygon): GreatCircleSegment[] {
  const { vertices } = polygon;
  return vertices.map((v, i) => createSegment(v, vertices[(i + 1) % vertices.length]));
}

// ---------- Angles ----------

/**
 * Angle at each vertex, swept counter-clockwise (seen from outside the
 * sphere) from the tangent toward the next vertex to the tangent toward the
 * previous one. For a counter-clockwise cycle these are the interior angles;
 * for a clockwise one they are the angles of the complementary region.
 */
export function interiorAngles(polygon: SphericalPolygon): number[] {
  const { vertices } = polygon;
  const n = vertices.length;
  const edges = polygonEdges(polygon);

  return vertices.map((vertex, i) => {
    const here = toCartesian(vertex);
    const next = toCartesian(vertices[(i + 1) % n]);
    const prev = toCartesian(vertices[(i + n - 1) % n]);

    const toNext = segmentTangentAt(edges[i], here, subtract(next, here));
    const toPrev = segmentTangentAt(edges[(i + n - 1) % n], here, subtract(prev, here));

    let angle = Math.atan2(dot(cross(toNext, toPrev), here), dot(toNext, toPrev));
    if (angle < 0) {
      angle = isAlmostZero(angle) ? 0 : angle + 2 * Math.PI;
    }
    return angle;
  });
}

// ---------- Measures ----------

/**
 * Enclosed area in steradians (radius 1).
 *
 * The cycle splits the sphere into two regions whose areas sum to 4π; the
 * smaller is reported, so vertex orientation does not matter. Edges must not
 * cross each other. Vertices on one great circle give 0 when the edges fold
 * back along it, but 2π (a hemisphere) when they run all the way around it.
 */
export function polygonArea(polygon: SphericalPolygon): number {
  const angles = interiorAngles(polygon);
  const angleSum = angles.reduce((sum, a) => sum + a, 0);
  const excess = angleSum - (angles.length - 2) * Math.PI;
  return Math.max(0, Math.min(excess, FULL_SPHERE - excess));
}

/** Total length (radians) of all edges. */
export function polygonPerimeter(polygon: SphericalPolygon): number {
  return polygonEdges(polygon).reduce((sum, edge) => sum + edge.length, 0);
}
