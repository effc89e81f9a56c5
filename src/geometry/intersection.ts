import { Vector3 } from "three";
import type { Material } from "../materials/material.js";
import type { Plane } from "../primitives/plane.js";
import type { Sphere } from "../primitives/sphere.js";

interface HitBase {
  t: number;
  point: Vector3;
  // unit length, always on the side the ray came from
  normal: Vector3;
  // false when the ray started inside the primitive (or under the plane)
  frontFace: boolean;
}

export interface SphereHit extends HitBase {
  kind: "sphere";
  sphere: Sphere;
  material: Material;
}

export interface PlaneHit extends HitBase {
  kind: "plane";
  plane: Plane;
  color: Vector3;
}

export type Hit = SphereHit | PlaneHit;

// the surface's outward normal, regardless of which side the ray arrived from
export function outwardNormal(hit: Hit): Vector3 {
  return hit.frontFace ? hit.normal.clone() : hit.normal.clone().negate();
}
