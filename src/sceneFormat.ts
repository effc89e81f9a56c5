import { Vector3 } from "three";
import { SceneError } from "./errors.js";
import { Material, type Albedo } from "./materials/material.js";
import { Plane } from "./primitives/plane.js";
import { Sphere } from "./primitives/sphere.js";
import { Light, Scene } from "./scene.js";

type Triple = [number, number, number];

export type MaterialDef = {
  color: Triple;
  albedo: [number, number, number, number];
  specularExponent: number;
  refractiveIndex: number;
};

export type SphereDef = {
  center: Triple;
  radius: number;
  // index into SceneDef.materials
  material: number;
};

export type LightDef = {
  position: Triple;
  intensity: number;
};

export type PlaneDef = {
  height: number;
  scale: number;
  colorA: Triple;
  colorB: Triple;
};

export type SceneDef = {
  materials: MaterialDef[];
  spheres: SphereDef[];
  lights: LightDef[];
  plane: PlaneDef | null;
};

function triple(v: Vector3): Triple {
  return [v.x, v.y, v.z];
}

/**
 * JSON form of a scene, the way it is shipped to render workers. Materials
 * are written once and referenced by index, so spheres that shared a
 * material still share it after deserializeScene.
 */
export function serializeScene(scene: Scene): string {
  let materials = scene.materials();
  let def: SceneDef = {
    materials: materials.map((m) => ({
      color: triple(m.color),
      albedo: [...m.albedo],
      specularExponent: m.specularExponent,
      refractiveIndex: m.refractiveIndex,
    })),
    spheres: scene.spheres.map((s) => ({
      center: triple(s.center),
      radius: s.radius,
      material: materials.indexOf(s.material),
    })),
    lights: scene.lights.map((l) => ({
      position: triple(l.position),
      intensity: l.intensity,
    })),
    plane: scene.plane
      ? {
          height: scene.plane.height,
          scale: scene.plane.scale,
          colorA: triple(scene.plane.colorA),
          colorB: triple(scene.plane.colorB),
        }
      : null,
  };

  return JSON.stringify(def);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readNumber(obj: Record<string, unknown>, key: string, where: string): number {
  let value = obj[key];
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new SceneError(`${where}.${key}: expected a finite number`);
  }
  return value;
}

function readTuple(obj: Record<string, unknown>, key: string, length: number, where: string): number[] {
  let value = obj[key];
  if (!Array.isArray(value) || value.length !== length) {
    throw new SceneError(`${where}.${key}: expected ${length} finite numbers`);
  }

  let out: number[] = [];
  for (let item of value) {
    if (typeof item !== "number" || !Number.isFinite(item)) {
      throw new SceneError(`${where}.${key}: expected ${length} finite numbers`);
    }
    out.push(item);
  }
  return out;
}

function readVector(obj: Record<string, unknown>, key: string, where: string): Vector3 {
  let [x, y, z] = readTuple(obj, key, 3, where);
  return new Vector3(x, y, z);
}

function readArray(obj: Record<string, unknown>, key: string): Record<string, unknown>[] {
  let value = obj[key];
  if (!Array.isArray(value)) {
    throw new SceneError(`${key}: expected an array`);
  }

  return value.map((item, i) => {
    if (!isRecord(item)) throw new SceneError(`${key}[${i}]: expected an object`);
    return item;
  });
}

export function deserializeScene(json: string): Scene {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (err) {
    throw new SceneError(`scene is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }

  if (!isRecord(parsed)) {
    throw new SceneError("scene: expected an object");
  }

  let materials = readArray(parsed, "materials").map((m, i) => {
    let where = `materials[${i}]`;
    let [d, s, rl, rr] = readTuple(m, "albedo", 4, where);
    let albedo: Albedo = [d, s, rl, rr];

    return new Material(
      readVector(m, "color", where),
      albedo,
      readNumber(m, "specularExponent", where),
      readNumber(m, "refractiveIndex", where),
    );
  });

  let spheres = readArray(parsed, "spheres").map((s, i) => {
    let where = `spheres[${i}]`;
    let index = readNumber(s, "material", where);
    let material = materials[index];
    if (!Number.isInteger(index) || material === undefined) {
      throw new SceneError(`${where}.material: no material at index ${index}`);
    }

    return new Sphere(readVector(s, "center", where), readNumber(s, "radius", where), material);
  });

  let lights = readArray(parsed, "lights").map((l, i) => {
    let where = `lights[${i}]`;
    return new Light(readVector(l, "position", where), readNumber(l, "intensity", where));
  });

  let plane: Plane | null = null;
  let planeDef = parsed["plane"];
  if (isRecord(planeDef)) {
    plane = new Plane({
      height: readNumber(planeDef, "height", "plane"),
      scale: readNumber(planeDef, "scale", "plane"),
      colorA: readVector(planeDef, "colorA", "plane"),
      colorB: readVector(planeDef, "colorB", "plane"),
    });
  } else if (planeDef !== null && planeDef !== undefined) {
    throw new SceneError("plane: expected an object or null");
  }

  return new Scene(spheres, lights, plane);
}
