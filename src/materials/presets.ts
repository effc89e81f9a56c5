import { Vector3 } from "three";
import { Material } from "./material.js";

export const ivory = new Material(new Vector3(0.4, 0.4, 0.3), [0.6, 0.3, 0.1, 0.0], 50);
export const glass = new Material(new Vector3(0.6, 0.7, 0.8), [0.0, 0.5, 0.1, 0.8], 125, 1.5);
export const redRubber = new Material(new Vector3(0.3, 0.1, 0.1), [0.9, 0.1, 0.0, 0.0], 10);
export const mirror = new Material(new Vector3(1.0, 1.0, 1.0), [0.0, 10.0, 0.8, 0.0], 1425);

export const presets = { ivory, glass, redRubber, mirror } as const;
export type PresetName = keyof typeof presets;
