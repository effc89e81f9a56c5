import { Vector3 } from "three";
import { SceneError } from "../errors.js";
import type { SphereHit } from "../geometry/intersection.js";
import type { Ray } from "../geometry/ray.js";
import { isFiniteVector } from "../geometry/vector.js";
import type { Material } from "../materials/material.js";
import { Primitive } from "./primitive.js";

export class Sphere extends Primitive {
  readonly center: Vector3;

  constructor(
    center: Vector3,
    public readonly radius: number,
    public readonly material: Material,
  ) {
    super();

    if (!(radius > 0) || !Number.isFinite(radius)) {
      throw new SceneError(`sphere radius must be positive, got ${radius}`);
    }
    if (!isFiniteVector(center)) {
      throw new SceneError("sphere center must be finite");
    }

    this.center = center.clone();
  }

  intersect(ray: Ray, tMin: number): SphereHit | null {
    let OC = ray.origin.clone().sub(this.center);

    // direction is unit length, so a == 1
    let b = ray.direction.dot(OC);
    let c = OC.dot(OC) - this.radius * this.radius;
    let delta = b * b - c;

    if (delta < 0) // No solution
      return null;

    let sqrtDelta = Math.sqrt(delta);
    let tNear = -b - sqrtDelta;
    let tFar = -b + sqrtDelta;

    let t: number;
    if (tNear > tMin) t = tNear;
    else if (tFar > tMin) t = tFar;
    else return null;

    let point = ray.at(t);
    let outward = point.clone().sub(this.center).divideScalar(this.radius);
    let frontFace = ray.direction.dot(outward) < 0;

    return {
      kind: "sphere",
      t,
      point,
      normal: frontFace ? outward : outward.negate(),
      frontFace,
      sphere: this,
      material: this.material,
    };
  }
}
