import { Vector2 } from "three";
import { describe, expect, it } from "vitest";
import { Camera } from "./camera.js";
import { normalize, vec3 } from "./geometry/vector.js";

describe("Camera.getRay", () => {
  it("sends the center pixel of an odd-sized image straight down -Z", () => {
    let ray = new Camera(new Vector2(3, 3), Math.PI / 2).getRay(1, 1);

    expect(ray.origin).toEqual(vec3(0, 0, 0));
    expect(ray.direction.x).toBeCloseTo(0, 12);
    expect(ray.direction.y).toBeCloseTo(0, 12);
    expect(ray.direction.z).toBeCloseTo(-1, 12);
  });

  it("stretches x by the aspect ratio and puts row 0 at the top", () => {
    // tan(45deg) = 1, aspect 2
    let ray = new Camera(new Vector2(4, 2), Math.PI / 2).getRay(0, 0);
    let expected = normalize(vec3(-1.5, 0.5, -1));

    expect(ray.direction.x).toBeCloseTo(expected.x, 12);
    expect(ray.direction.y).toBeCloseTo(expected.y, 12);
    expect(ray.direction.z).toBeCloseTo(expected.z, 12);
  });

  it("narrows the spread with a smaller field of view", () => {
    let wide = new Camera(new Vector2(10, 10), Math.PI / 2).getRay(9, 5);
    let narrow = new Camera(new Vector2(10, 10), Math.PI / 6).getRay(9, 5);

    expect(narrow.direction.x).toBeLessThan(wide.direction.x);
    expect(narrow.direction.x).toBeGreaterThan(0);
  });
});
