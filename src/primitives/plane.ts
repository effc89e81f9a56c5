import { Vector3 } from "three";
import { SceneError } from "../errors.js";
import type { PlaneHit } from "../geometry/intersection.js";
import type { Ray } from "../geometry/ray.js";
import { isFiniteVector } from "../geometry/vector.js";
import { Material } from "../materials/material.js";
import { Primitive } from "./primitive.js";

// rays flatter than this never reach the plane
const PARALLEL_EPSILON = 1e-3;

const UP = new Vector3(0, 1, 0);

export interface PlaneOptions {
  height?: number;
  // checker cells per world unit
  scale?: number;
  colorA?: Vector3;
  colorB?: Vector3;
}

/**
 * Infinite horizontal ground plane at y = height with a procedural
 * checkerboard. It stores no per-point state: the color of a hit is derived
 * from the hit coordinates.
 */
export class Plane extends Primitive {
  readonly height: number;
  readonly scale: number;
  readonly colorA: Vector3;
  readonly colorB: Vector3;

  constructor({
    height = -4,
    scale = 0.5,
    colorA = new Vector3(0.3, 0.3, 0.3),
    colorB = new Vector3(0.3, 0.2, 0.1),
  }: PlaneOptions = {}) {
    super();

    if (!Number.isFinite(height)) {
      throw new SceneError(`plane height must be finite, got ${height}`);
    }
    if (!(scale > 0) || !Number.isFinite(scale)) {
      throw new SceneError(`checker scale must be positive, got ${scale}`);
    }
    if (!isFiniteVector(colorA) || !isFiniteVector(colorB)) {
      throw new SceneError("checker colors must be finite");
    }

    this.height = height;
    this.scale = scale;
    this.colorA = colorA.clone();
    this.colorB = colorB.clone();
  }

  colorAt(point: Vector3): Vector3 {
    let cell = Math.floor(point.x * this.scale) + Math.floor(point.z * this.scale);
    // parity of a possibly negative integer
    return ((cell % 2) + 2) % 2 === 0 ? this.colorA.clone() : this.colorB.clone();
  }

  intersect(ray: Ray, tMin: number): PlaneHit | null {
    let dy = ray.direction.y;
    if (Math.abs(dy) <= PARALLEL_EPSILON) return null;

    let t = (this.height - ray.origin.y) / dy;
    if (t <= tMin) return null;

    let point = ray.at(t);
    let frontFace = dy < 0;

    return {
      kind: "plane",
      t,
      point,
      normal: frontFace ? UP.clone() : UP.clone().negate(),
      frontFace,
      plane: this,
      color: this.colorAt(point),
    };
  }
}

/** Material standing in for a checkerboard hit: pure diffuse, no bending. */
export function checkerMaterial(color: Vector3): Material {
  return new Material(color, [1, 0, 0, 0], 1, 1);
}
