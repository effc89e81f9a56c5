import { Vector3 } from "three";
import { describe, expect, it } from "vitest";
import { Ray } from "./geometry/ray.js";
import { vec3 } from "./geometry/vector.js";
import { intersect } from "./intersector.js";
import { Material } from "./materials/material.js";
import { Plane } from "./primitives/plane.js";
import { Sphere } from "./primitives/sphere.js";
import { Scene } from "./scene.js";

const matte = new Material(new Vector3(0.5, 0.5, 0.5), [1, 0, 0, 0], 1);
const EPS = 1e-3;

describe("intersect", () => {
  it("returns null for an empty scene", () => {
    expect(intersect(new Ray(vec3(0, 0, 0), vec3(0, 0, -1)), new Scene([], []), EPS)).toBeNull();
  });

  it("picks the nearest sphere whatever the scene order", () => {
    let far = new Sphere(vec3(0, 0, -10), 1, matte);
    let near = new Sphere(vec3(0, 0, -5), 1, matte);
    let hit = intersect(new Ray(vec3(0, 0, 0), vec3(0, 0, -1)), new Scene([far, near], []), EPS);

    expect(hit?.kind).toBe("sphere");
    expect(hit?.kind === "sphere" && hit.sphere).toBe(near);
    expect(hit?.t).toBeCloseTo(4, 12);
  });

  it("lets the plane win when it is closer", () => {
    let sphere = new Sphere(vec3(0, -8, -40), 1, matte);
    let scene = new Scene([sphere], [], new Plane());
    let hit = intersect(new Ray(vec3(0, 0, 0), vec3(0, -1, -5)), scene, EPS);

    expect(hit?.kind).toBe("plane");
    expect(hit?.point.z).toBeCloseTo(-20, 10);
  });

  it("lets a sphere in front of the plane win", () => {
    let sphere = new Sphere(vec3(0, -1, -5), 1, matte);
    let scene = new Scene([sphere], [], new Plane());
    let hit = intersect(new Ray(vec3(0, 0, 0), vec3(0, -1, -5)), scene, EPS);

    expect(hit?.kind).toBe("sphere");
  });

  it("is the same query for shadow rays: repeated calls agree", () => {
    let scene = new Scene([new Sphere(vec3(0, 0, -5), 1, matte)], [], new Plane());
    let ray = new Ray(vec3(0, 0, 0), vec3(0.1, -0.2, -1));

    expect(intersect(ray, scene, EPS)).toEqual(intersect(ray, scene, EPS));
  });
});
