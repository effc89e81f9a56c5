import { Vector3 } from "three";
import { SceneError } from "./errors.js";
import { isFiniteVector } from "./geometry/vector.js";
import type { Material } from "./materials/material.js";
import type { Plane } from "./primitives/plane.js";
import type { Sphere } from "./primitives/sphere.js";

export class Light {
  readonly position: Vector3;

  constructor(
    position: Vector3,
    public readonly intensity: number,
  ) {
    if (!(intensity > 0) || !Number.isFinite(intensity)) {
      throw new SceneError(`light intensity must be positive, got ${intensity}`);
    }
    if (!isFiniteVector(position)) {
      throw new SceneError("light position must be finite");
    }

    this.position = position.clone();
  }
}

export class Scene {
  readonly spheres: readonly Sphere[];
  readonly lights: readonly Light[];
  readonly plane: Plane | null;

  constructor(spheres: Sphere[], lights: Light[], plane: Plane | null = null) {
    this.spheres = Object.freeze([...spheres]);
    this.lights = Object.freeze([...lights]);
    this.plane = plane;
  }

  // distinct materials, in first-use order
  materials(): Material[] {
    let seen = new Set<Material>();
    for (let s of this.spheres) seen.add(s.material);
    return [...seen];
  }
}
