import {
  createSegment,
  arcLength,
  segmentMidpoint,
  isOnArc,
  intersectSegments,
  segmentTangentAt,
  reverseSegment,
  greatCircleThrough,
  greatCircleFromNormal,
  toCartesian,
  vecEquals,
  InvalidArgumentError,
} from "./index";
import type { CartesianVector, SphereCoordinate } from "./index";

const TOL = 1e-12;

function expectClose(actual: number, expected: number, tol = TOL) {
  expect(Math.abs(actual - expected)).toBeLessThan(tol);
}

function expectVecClose(actual: CartesianVector, expected: CartesianVector) {
  expect(vecEquals(actual, expected)).toBe(true);
}

// Equator arc through +z, from 315° to 45° longitude
const ARC_1_START: SphereCoordinate = { theta: Math.PI / 2, phi: 1.75 * Math.PI };
const ARC_1_END: SphereCoordinate = { theta: Math.PI / 2, phi: Math.PI / 4 };
// Meridian arc through +z, from 45° above to 45° below the equator
const ARC_2_START: SphereCoordinate = { theta: Math.PI / 4, phi: 0 };
const ARC_2_END: SphereCoordinate = { theta: 0.75 * Math.PI, phi: 0 };

const EQ_0: SphereCoordinate = { theta: Math.PI / 2, phi: 0 };
const EQ_90: SphereCoordinate = { theta: Math.PI / 2, phi: Math.PI / 2 };

const arc1 = createSegment(ARC_1_START, ARC_1_END);
const arc2 = createSegment(ARC_2_START, ARC_2_END);

// ---------- Construction ----------

describe("createSegment", () => {
  it("derives the base circle from the endpoints", () => {
    expect(arc1.baseCircle.normal).toEqual(greatCircleThrough(ARC_1_START, ARC_1_END).normal);
  });

  it("precomputes the length", () => {
    expectClose(arc1.length, Math.PI / 2);
  });

  it("keeps an explicit base circle containing both endpoints", () => {
    const equator = greatCircleFromNormal([0, 1, 0]);
    const seg = createSegment(EQ_0, EQ_90, equator);
    expect(seg.baseCircle).toBe(equator);
    expectClose(seg.length, Math.PI / 2);
  });

  it("rejects an explicit base circle missing an endpoint", () => {
    const meridian = greatCircleFromNormal([1, 0, 0]);
    expect(() => createSegment(EQ_0, EQ_90, meridian)).toThrow(InvalidArgumentError);
  });

  it("names the offending argument", () => {
    const meridian = greatCircleFromNormal([1, 0, 0]);
    try {
      createSegment(EQ_0, EQ_90, meridian);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(InvalidArgumentError);
      expect(err instanceof InvalidArgumentError && err.argument).toBe("baseCircle");
    }
  });
});

// ---------- Measures ----------

describe("arcLength", () => {
  it("measures a quarter circle as π/2", () => {
    expectClose(arcLength(EQ_0, EQ_90), Math.PI / 2);
  });

  it("is symmetric", () => {
    const a: SphereCoordinate = { theta: 0.4, phi: 5.1 };
    const b: SphereCoordinate = { theta: 2.3, phi: 1.2 };
    expectClose(arcLength(a, b), arcLength(b, a));
  });

  it("is zero for identical points", () => {
    expect(arcLength(EQ_0, EQ_0)).toBe(0);
  });

  it("is π for antipodal points", () => {
    expectClose(arcLength([0, 0, 1], [0, 0, -1]), Math.PI);
  });

  it("accepts Cartesian points of any length", () => {
    expectClose(arcLength([0, 0, 3], [2, 0, 0]), Math.PI / 2);
  });
});

describe("isOnArc", () => {
  it("accepts endpoints and interior points", () => {
    expect(isOnArc(arc1, ARC_1_START)).toBe(true);
    expect(isOnArc(arc1, ARC_1_END)).toBe(true);
    expect(isOnArc(arc1, [0, 0, 1])).toBe(true);
  });

  it("rejects points on the base circle outside the arc", () => {
    expect(isOnArc(arc1, [0, 0, -1])).toBe(false);
    expect(isOnArc(arc1, { theta: Math.PI / 2, phi: Math.PI / 2 })).toBe(false);
  });

  it("splits the length exactly for points on the arc", () => {
    const p: SphereCoordinate = { theta: Math.PI / 2, phi: 0.3 };
    expectClose(arcLength(ARC_1_START, p) + arcLength(p, ARC_1_END), arc1.length);
  });

  it("exceeds the length for points off the arc", () => {
    const p: SphereCoordinate = { theta: 1.2, phi: 0.3 };
    expect(isOnArc(arc1, p)).toBe(false);
    expect(arcLength(ARC_1_START, p) + arcLength(p, ARC_1_END)).toBeGreaterThan(arc1.length);
  });
});

describe("segmentMidpoint", () => {
  it("picks the candidate on the arc", () => {
    expectVecClose(segmentMidpoint(arc1), [0, 0, 1]);
  });

  it("is equidistant from both ends", () => {
    const seg = createSegment(EQ_0, EQ_90);
    const mid = segmentMidpoint(seg);
    expectVecClose(mid, [Math.SQRT2 / 2, 0, Math.SQRT2 / 2]);
    expectClose(arcLength(EQ_0, mid), Math.PI / 4);
    expectClose(arcLength(mid, EQ_90), Math.PI / 4);
  });

  it("lies on the arc for an off-equator segment", () => {
    const seg = createSegment({ theta: 0.5, phi: 0.2 }, { theta: 1.4, phi: 2.6 });
    const mid = segmentMidpoint(seg);
    expect(isOnArc(seg, mid)).toBe(true);
    expectClose(arcLength(seg.start, mid), seg.length / 2, 1e-9);
  });
});

describe("segmentMidpoint on nearly antipodal endpoints", () => {
  for (const gap of [1e-7, 1e-8]) {
    it(`returns the true midpoint for an arc ${gap} short of π`, () => {
      const end: SphereCoordinate = { theta: Math.PI / 2, phi: Math.PI - gap };
      const seg = createSegment(EQ_0, end);
      const mid = segmentMidpoint(seg);
      const halfway = (Math.PI - gap) / 2;
      const expected: CartesianVector = [Math.sin(halfway), 0, Math.cos(halfway)];
      expect(mid[0] * expected[0] + mid[1] * expected[1] + mid[2] * expected[2]).toBeGreaterThan(1 - 1e-12);
    });
  }
});

describe("segmentTangentAt", () => {
  it("follows the preferred direction", () => {
    const seg = createSegment(EQ_0, EQ_90);
    expectVecClose(segmentTangentAt(seg, EQ_0, [1, 0, 0]), [1, 0, 0]);
    expectVecClose(segmentTangentAt(seg, EQ_0, [-1, 0, 0]), [-1, 0, 0]);
  });
});

describe("reverseSegment", () => {
  it("swaps the endpoints and keeps the length", () => {
    const rev = reverseSegment(arc1);
    expect(rev.start).toBe(ARC_1_END);
    expect(rev.end).toBe(ARC_1_START);
    expect(rev.length).toBe(arc1.length);
  });
});

// ---------- Intersection ----------

describe("intersectSegments", () => {
  it("finds the crossing of the equator and meridian arcs", () => {
    const hit = intersectSegments(arc1, arc2);
    expect(hit).not.toBeNull();
    if (hit) expectVecClose(toCartesian(hit), [0, 0, 1]);
  });

  it("is symmetric in its arguments", () => {
    const hit = intersectSegments(arc2, arc1);
    expect(hit).not.toBeNull();
    if (hit) expectVecClose(toCartesian(hit), [0, 0, 1]);
  });

  it("returns null when only the base circles cross", () => {
    // Meridian arc on the far side, through -z
    const far = createSegment({ theta: Math.PI / 4, phi: Math.PI }, { theta: 0.75 * Math.PI, phi: Math.PI });
    expect(intersectSegments(arc1, far)).toBeNull();
  });

  it("returns null for a zero-length arc", () => {
    const point = createSegment(EQ_0, EQ_0);
    expect(intersectSegments(arc1, point)).toBeNull();
    expect(intersectSegments(point, arc1)).toBeNull();
  });

  it("returns null for an arc against itself", () => {
    expect(intersectSegments(arc1, arc1)).toBeNull();
  });

  it("returns null for arcs sharing a base circle", () => {
    expect(intersectSegments(arc1, reverseSegment(arc1))).toBeNull();
  });
});
