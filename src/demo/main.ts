// Demonstration driver: converts, bisects and intersects two arcs, then
// measures a quarter-sphere polygon.
// Run with: npm run demo [-- --digits=N]

import {
  toCartesian,
  fromCartesian,
  createSegment,
  segmentMidpoint,
  intersectSegments,
  createPolygon,
  polygonArea,
  InvalidArgumentError,
} from "../geometry/index.js";
import type { SphereCoordinate } from "../geometry/index.js";
import { formatCoordinate, formatNumber, formatVector } from "./format.js";

export interface DemoOptions {
  /** Decimal places in printed numbers */
  digits: number;
}

export const DEFAULT_DIGITS = 6;
const MAX_DIGITS = 15;

// ---------- CLI arg parsing ----------

export function parseArgs(args: readonly string[]): DemoOptions {
  const digitsArg = args.find((a) => a.startsWith("--digits="));
  if (!digitsArg) return { digits: DEFAULT_DIGITS };

  const raw = digitsArg.slice("--digits=".length);
  const digits = Number(raw);
  if (!/^\d+$/.test(raw) || digits > MAX_DIGITS) {
    throw new InvalidArgumentError(
      `--digits must be an integer from 0 to ${MAX_DIGITS}`,
      "digits",
    );
  }
  return { digits };
}

// ---------- Scenario ----------

const ARC_1: [SphereCoordinate, SphereCoordinate] = [
  { theta: Math.PI / 2, phi: 1.75 * Math.PI },
  { theta: Math.PI / 2, phi: Math.PI / 4 },
];

const ARC_2: [SphereCoordinate, SphereCoordinate] = [
  { theta: Math.PI / 4, phi: 0 },
  { theta: 0.75 * Math.PI, phi: 0 },
];

/** Quarter of the sphere: north pole down to the equator, half way round */
const QUARTER_SPHERE: SphereCoordinate[] = [
  { theta: 0, phi: 0 },
  { theta: Math.PI / 2, phi: 0 },
  { theta: Math.PI / 2, phi: Math.PI / 2 },
  { theta: Math.PI / 2, phi: Math.PI },
];

export function demoLines({ digits }: DemoOptions): string[] {
  const vec = (c: SphereCoordinate) => formatVector(toCartesian(c), digits);

  const arc1 = createSegment(ARC_1[0], ARC_1[1]);
  const arc2 = createSegment(ARC_2[0], ARC_2[1]);
  const midpoint = segmentMidpoint(arc1);
  const intersection = intersectSegments(arc1, arc2);
  const area = polygonArea(createPolygon(QUARTER_SPHERE));

  return [
    `Arc 1 start: ${vec(arc1.start)}`,
    `Arc 1 end: ${vec(arc1.end)}`,
    `Arc 2 start: ${vec(arc2.start)}`,
    `Arc 2 end: ${vec(arc2.end)}`,
    "",
    `Arc 1 midpoint: ${formatVector(midpoint, digits)}`,
    `Arc 1 midpoint: ${formatCoordinate(fromCartesian(midpoint), digits)}`,
    "",
    intersection
      ? `Arcs intersect at ${formatCoordinate(intersection, digits)} (${vec(intersection)})`
      : "Arcs do not intersect",
    "",
    `Size of quarter sphere polygon: ${formatNumber(area, digits)}`,
    `Area of whole sphere: ${formatNumber(4 * Math.PI, digits)}`,
    `Area of quarter sphere: ${formatNumber(Math.PI, digits)}`,
  ];
}

// ---------- CLI runner ----------

function main() {
  const options = parseArgs(process.argv.slice(2));
  for (const line of demoLines(options)) {
    console.log(line);
  }
}

// Run when executed directly
const isDirectExecution =
  typeof process !== "undefined" &&
  process.argv[1] &&
  (process.argv[1].endsWith("/main.ts") || process.argv[1].endsWith("/main.js"));

if (isDirectExecution) {
  try {
    main();
  } catch (err) {
    console.error("Demo failed:", err);
    process.exit(1);
  }
}
