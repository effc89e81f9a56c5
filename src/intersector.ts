import type { Hit } from "./geometry/intersection.js";
import type { Ray } from "./geometry/ray.js";
import type { Scene } from "./scene.js";

/**
 * Closest hit along `ray` among every sphere and the ground plane, ignoring
 * anything at t <= tMin. Brute force over the whole scene; shadow queries go
 * through here too.
 */
export function intersect(ray: Ray, scene: Scene, tMin: number): Hit | null {
  let closest: Hit | null = null;

  for (let sphere of scene.spheres) {
    let hit = sphere.intersect(ray, tMin);
    if (hit && (closest === null || hit.t < closest.t)) {
      closest = hit;
    }
  }

  if (scene.plane) {
    let hit = scene.plane.intersect(ray, tMin);
    if (hit && (closest === null || hit.t < closest.t)) {
      closest = hit;
    }
  }

  return closest;
}
