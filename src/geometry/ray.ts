import { Vector3 } from "three";
import { GeometryError } from "../errors.js";
import { isDegenerate } from "./vector.js";

export class Ray {
  readonly origin: Vector3;
  readonly direction: Vector3;

  // the direction is normalized on construction; callers may pass any non-zero vector
  constructor(origin: Vector3, direction: Vector3) {
    if (isDegenerate(direction)) {
      throw new GeometryError("ray direction has zero length");
    }

    this.origin = origin.clone();
    this.direction = direction.clone().normalize();
  }

  at(t: number): Vector3 {
    return this.origin.clone().addScaledVector(this.direction, t);
  }
}
