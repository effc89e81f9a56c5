import type { Hit } from "../geometry/intersection.js";
import type { Ray } from "../geometry/ray.js";

export abstract class Primitive {
  /** Nearest hit with t > tMin, or null when the ray misses. */
  abstract intersect(ray: Ray, tMin: number): Hit | null;
}
