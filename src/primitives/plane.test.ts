import { describe, expect, it } from "vitest";
import { SceneError } from "../errors.js";
import { Ray } from "../geometry/ray.js";
import { vec3 } from "../geometry/vector.js";
import { Plane, checkerMaterial } from "./plane.js";

const EPS = 1e-3;

describe("Plane", () => {
  let plane = new Plane();

  it("is hit from above with an upward normal", () => {
    let hit = plane.intersect(new Ray(vec3(0, 0, 0), vec3(1, -4, -5)), EPS);

    expect(hit).not.toBeNull();
    expect(hit?.kind).toBe("plane");
    expect(hit?.point.x).toBeCloseTo(1, 10);
    expect(hit?.point.y).toBeCloseTo(-4, 10);
    expect(hit?.point.z).toBeCloseTo(-5, 10);
    expect(hit?.normal).toEqual(vec3(0, 1, 0));
    expect(hit?.frontFace).toBe(true);
    // floor(0.5) + floor(-2.5) = -3, odd cell
    expect(hit?.color).toEqual(vec3(0.3, 0.2, 0.1));
  });

  it("is hit from below with a downward normal", () => {
    let hit = plane.intersect(new Ray(vec3(0, -10, 0), vec3(0, 1, 0)), EPS);

    expect(hit?.t).toBeCloseTo(6, 12);
    expect(hit?.normal.y).toBe(-1);
    expect(hit?.frontFace).toBe(false);
  });

  it("ignores rays that run parallel or point away", () => {
    expect(plane.intersect(new Ray(vec3(0, 0, 0), vec3(1, 0, 0)), EPS)).toBeNull();
    expect(plane.intersect(new Ray(vec3(0, 0, 0), vec3(1, 0.0005, 0)), EPS)).toBeNull();
    expect(plane.intersect(new Ray(vec3(0, 0, 0), vec3(0, 1, -1)), EPS)).toBeNull();
  });

  it("alternates colors across cells, including negative coordinates", () => {
    expect(plane.colorAt(vec3(0.5, -4, 0.5))).toEqual(plane.colorA);
    expect(plane.colorAt(vec3(2.5, -4, 0.5))).toEqual(plane.colorB);
    expect(plane.colorAt(vec3(-0.5, -4, 0.5))).toEqual(plane.colorB);
    expect(plane.colorAt(vec3(-0.5, -4, -0.5))).toEqual(plane.colorA);
  });

  it("honors a custom height and scale", () => {
    let custom = new Plane({ height: 1, scale: 1 });
    let hit = custom.intersect(new Ray(vec3(0.5, 3, 0.5), vec3(0, -1, 0)), EPS);

    expect(hit?.t).toBeCloseTo(2, 12);
    expect(custom.colorAt(vec3(1.5, 1, 0.5))).toEqual(custom.colorB);
  });

  it("rejects a non-positive checker scale", () => {
    expect(() => new Plane({ scale: 0 })).toThrow(SceneError);
  });

  it("rejects a checker color that is not finite", () => {
    expect(() => new Plane({ colorA: vec3(Number.NaN, 0, 0) })).toThrow(SceneError);
  });
});

describe("checkerMaterial", () => {
  it("is a plain diffuse surface of the given color", () => {
    let m = checkerMaterial(vec3(0.3, 0.2, 0.1));

    expect(m.albedo).toEqual([1, 0, 0, 0]);
    expect(m.refractiveIndex).toBe(1);
    expect(m.color).toEqual(vec3(0.3, 0.2, 0.1));
  });
});
