import { Vector3 } from "three";
import type { TraceOptions } from "./config.js";
import { outwardNormal, type Hit } from "./geometry/intersection.js";
import { Ray } from "./geometry/ray.js";
import { normalize, offsetOrigin, reflect, refract } from "./geometry/vector.js";
import { intersect } from "./intersector.js";
import type { Material } from "./materials/material.js";
import { checkerMaterial } from "./primitives/plane.js";
import type { Light, Scene } from "./scene.js";

const WHITE = new Vector3(1, 1, 1);

export type LightingSums = {
  diffuse: number;
  specular: number;
};

export function surfaceMaterial(hit: Hit): Material {
  switch (hit.kind) {
    case "sphere":
      return hit.material;
    case "plane":
      return checkerMaterial(hit.color);
  }
}

/**
 * True when something sits between `point` and `light`. The shadow ray
 * starts `originBias` off the surface, on the side facing the light.
 */
export function isShadowed(
  point: Vector3,
  normal: Vector3,
  light: Light,
  scene: Scene,
  options: TraceOptions,
): boolean {
  let toLight = light.position.clone().sub(point);
  let lightDistance = toLight.length();
  let lightDir = normalize(toLight);

  // a light sitting on the surface point has no direction to test
  if (lightDir.lengthSq() === 0) return false;

  let shadowOrigin = offsetOrigin(point, lightDir, normal, options.originBias);
  let shadowHit = intersect(new Ray(shadowOrigin, lightDir), scene, options.hitEpsilon);

  return shadowHit !== null && shadowHit.point.distanceTo(shadowOrigin) < lightDistance;
}

/**
 * Diffuse and specular sums over every light that reaches the hit point.
 * Lighting uses the normal facing the incoming ray, so the inner wall of a
 * sphere is lit only by lights inside that sphere.
 */
export function directLighting(
  hit: Hit,
  ray: Ray,
  scene: Scene,
  options: TraceOptions,
): LightingSums {
  let material = surfaceMaterial(hit);
  let viewDir = ray.direction.clone().negate();
  let sums: LightingSums = { diffuse: 0, specular: 0 };

  for (let light of scene.lights) {
    if (isShadowed(hit.point, hit.normal, light, scene, options)) continue;

    let lightDir = normalize(light.position.clone().sub(hit.point));
    let mirrored = reflect(lightDir.clone().negate(), hit.normal);

    sums.diffuse += light.intensity * Math.max(0, hit.normal.dot(lightDir));
    sums.specular +=
      light.intensity * Math.pow(Math.max(0, mirrored.dot(viewDir)), material.specularExponent);
  }

  return sums;
}

/**
 * Color seen along `ray`. Pure in (ray, scene, depth, options): nothing is
 * cached or mutated, so pixels can be traced in any order or in parallel.
 *
 * Rays past `maxDepth` and rays that miss return the background. At
 * `depth == maxDepth` the surface is shaded from direct light only.
 * Components are left unclamped.
 */
export function cast(ray: Ray, scene: Scene, depth: number, options: TraceOptions): Vector3 {
  if (depth > options.maxDepth) return options.background.clone();

  let hit = intersect(ray, scene, options.hitEpsilon);
  if (!hit) return options.background.clone();

  return shade(hit, ray, scene, depth, options);
}

export function shade(
  hit: Hit,
  ray: Ray,
  scene: Scene,
  depth: number,
  options: TraceOptions,
): Vector3 {
  let material = surfaceMaterial(hit);
  let [aDiffuse, aSpecular, aReflect, aRefract] = material.albedo;

  let reflectColor = new Vector3(0, 0, 0);
  let refractColor = new Vector3(0, 0, 0);

  if (depth < options.maxDepth) {
    let reflectDir = normalize(reflect(ray.direction, hit.normal));
    let reflectOrigin = offsetOrigin(hit.point, reflectDir, hit.normal, options.originBias);
    reflectColor = cast(new Ray(reflectOrigin, reflectDir), scene, depth + 1, options);

    // null means total internal reflection: the refracted term stays black
    let refracted = refract(ray.direction, outwardNormal(hit), material.refractiveIndex);
    if (refracted) {
      let refractDir = normalize(refracted);
      let refractOrigin = offsetOrigin(hit.point, refractDir, hit.normal, options.originBias);
      refractColor = cast(new Ray(refractOrigin, refractDir), scene, depth + 1, options);
    }
  }

  let { diffuse, specular } = directLighting(hit, ray, scene, options);

  return material.color
    .clone()
    .multiplyScalar(diffuse * aDiffuse)
    .addScaledVector(WHITE, specular * aSpecular)
    .addScaledVector(reflectColor, aReflect)
    .addScaledVector(refractColor, aRefract);
}
