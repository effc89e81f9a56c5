import { Vector3 } from "three";
import type { TraceOptions } from "./config.js";
import type { Tile } from "./tile.js";

// TraceOptions with the background flattened, so it survives structured clone
export type WireTraceOptions = Omit<TraceOptions, "background"> & {
  background: [number, number, number];
};

export interface IStartMessage {
  type: "scene-setup";
  workerIndex: number;
  // serializeScene() output
  scene: string;
  canvasSize: { x: number; y: number };
  fov: number;
  options: WireTraceOptions;
  tile: Tile;
}

export interface IComputationRequest {
  type: "computation-request";
  tile: Tile;
}

export interface IComputationResult {
  type: "computation-result";
  workerIndex: number;
  tile: Tile;
}

export type WorkerRequest = IStartMessage | IComputationRequest;

export function toWireOptions(options: TraceOptions): WireTraceOptions {
  let { x, y, z } = options.background;
  return {
    maxDepth: options.maxDepth,
    hitEpsilon: options.hitEpsilon,
    originBias: options.originBias,
    background: [x, y, z],
  };
}

export function fromWireOptions(options: WireTraceOptions): TraceOptions {
  let [x, y, z] = options.background;
  return { ...options, background: new Vector3(x, y, z) };
}
