import type { CartesianVector, SphereCoordinate } from "../geometry/index.js";

/** Fixed-point rendering that never prints a negative zero. */
export function formatNumber(n: number, digits: number): string {
  const fixed = n.toFixed(digits);
  return Object.is(Number(fixed), -0) ? fixed.slice(1) : fixed;
}

export function formatVector(v: CartesianVector, digits: number): string {
  return `Cartesian: ${v.map((c) => formatNumber(c, digits)).join("/")}`;
}

export function formatCoordinate(c: SphereCoordinate, digits: number): string {
  return `Spherical: θ=${formatNumber(c.theta, digits)} ϕ=${formatNumber(c.phi, digits)}`;
}
