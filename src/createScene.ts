import random from "random";
import { Vector3 } from "three";
import { vec3 } from "./geometry/vector.js";
import { Material } from "./materials/material.js";
import { glass, ivory, mirror, redRubber } from "./materials/presets.js";
import { Plane } from "./primitives/plane.js";
import { Sphere } from "./primitives/sphere.js";
import { Light, Scene } from "./scene.js";

// ivory, glass, rubber and mirror balls above a checkerboard, lit from three sides
export function createScene(): Scene {
  let spheres = [
    new Sphere(vec3(-3, 0, -16), 2, ivory),
    new Sphere(vec3(-1, -1.5, -12), 2, glass),
    new Sphere(vec3(1.5, -0.5, -18), 3, redRubber),
    new Sphere(vec3(7, 5, -18), 4, mirror),
  ];

  let lights = [
    new Light(vec3(-20, 20, 20), 1.5),
    new Light(vec3(30, 50, -25), 1.3),
    new Light(vec3(30, 20, 30), 1.3),
  ];

  return new Scene(spheres, lights, new Plane());
}

/**
 * Reproducible scatter of `count` spheres in front of the camera. The same
 * seed always gives the same scene.
 */
export function createRandomScene(seed: string | number, count: number = 12): Scene {
  let rng = random.clone(seed);
  let r = (min: number, max: number) => rng.float(min, max);

  let palette = [ivory, glass, redRubber, mirror];
  // a few matte materials of random color next to the presets
  for (let i = 0; i < 4; i++) {
    palette.push(new Material(new Vector3(r(0, 1), r(0, 1), r(0, 1)), [0.9, 0.1, 0, 0], r(5, 60)));
  }

  let spheres: Sphere[] = [];
  for (let i = 0; i < count; i++) {
    let radius = r(0.5, 2);
    let center = vec3(r(-8, 8), r(-4 + radius, 4), r(-30, -10));
    spheres.push(new Sphere(center, radius, palette[rng.int(0, palette.length - 1)]));
  }

  let lights = [
    new Light(vec3(-20, 20, 20), 1.5),
    new Light(vec3(r(-30, 30), r(20, 50), r(-30, 30)), r(0.5, 1.5)),
  ];

  return new Scene(spheres, lights, new Plane());
}
