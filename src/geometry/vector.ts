import { Vector3 } from "three";

// below this length a vector has no usable direction
export const DEGENERATE_LENGTH = 1e-12;

export function vec3(x: number, y: number, z: number): Vector3 {
  return new Vector3(x, y, z);
}

export function copySign(mag: number, sign: number): number {
  return mag * (sign < 0 ? -1 : 1);
}

export function clamp(val: number, low: number, high: number): number {
  if (val < low) return low;
  else if (val > high) return high;
  else return val;
}

export function isFiniteVector(v: Vector3): boolean {
  return Number.isFinite(v.x) && Number.isFinite(v.y) && Number.isFinite(v.z);
}

export function isDegenerate(v: Vector3): boolean {
  return v.length() < DEGENERATE_LENGTH;
}

/**
 * Unit vector in the direction of `v`, as a new vector.
 * A degenerate input yields (0, 0, 0) instead of NaN components, so a
 * zero-length vector can never poison the shading sums downstream.
 */
export function normalize(v: Vector3): Vector3 {
  if (isDegenerate(v)) return new Vector3(0, 0, 0);
  return v.clone().normalize();
}

/** I - 2 (I·N) N. `normal` is expected to be unit length. */
export function reflect(incident: Vector3, normal: Vector3): Vector3 {
  return incident.clone().addScaledVector(normal, -2 * incident.dot(normal));
}

/**
 * Snell's law for a unit `incident` direction crossing a surface with the
 * geometric (outward) `normal`. `etaT` is the index on the far side of the
 * surface when entering, `etaI` the index the ray travels in.
 *
 * A ray leaving the object (I·N > 0) is handled by flipping the normal and
 * swapping the indices. Returns null on total internal reflection.
 */
export function refract(
  incident: Vector3,
  normal: Vector3,
  etaT: number,
  etaI: number = 1,
): Vector3 | null {
  let cosi = -clamp(incident.dot(normal), -1, 1);
  if (cosi < 0) {
    return refract(incident, normal.clone().negate(), etaI, etaT);
  }

  let eta = etaI / etaT;
  let k = 1 - eta * eta * (1 - cosi * cosi);
  if (k < 0) return null;

  return incident
    .clone()
    .multiplyScalar(eta)
    .addScaledVector(normal, eta * cosi - Math.sqrt(k));
}

/**
 * Moves `point` by `bias` along `normal`, to the side of the surface that
 * `direction` leaves through. Used for every secondary and shadow ray origin.
 */
export function offsetOrigin(
  point: Vector3,
  direction: Vector3,
  normal: Vector3,
  bias: number,
): Vector3 {
  return point.clone().addScaledVector(normal, copySign(bias, direction.dot(normal)));
}
