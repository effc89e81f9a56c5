import { parentPort } from "node:worker_threads";
import { Vector2 } from "three";
import { Camera } from "./camera.js";
import { fromWireOptions, type IComputationResult, type WorkerRequest } from "./commonTypes.js";
import type { TraceOptions } from "./config.js";
import { renderTile } from "./renderer.js";
import type { Scene } from "./scene.js";
import { deserializeScene } from "./sceneFormat.js";
import type { Tile } from "./tile.js";

// Worker entry: holds one scene for the whole render and traces the tiles it is sent.

const ctx = parentPort;
if (!ctx) {
  throw new Error("tracer must be started as a worker thread");
}

let workerIndex: number;
let scene: Scene;
let camera: Camera;
let options: TraceOptions;

ctx.on("message", (data: WorkerRequest) => {
  let tile: Tile;

  if (data.type === "scene-setup") {
    workerIndex = data.workerIndex;
    scene = deserializeScene(data.scene);
    camera = new Camera(new Vector2(data.canvasSize.x, data.canvasSize.y), data.fov);
    options = fromWireOptions(data.options);
    tile = data.tile;
  } else {
    tile = data.tile;
  }

  let computationResult: IComputationResult = {
    type: "computation-result",
    tile: renderTile(tile, scene, camera, options),
    workerIndex,
  };

  ctx.postMessage(computationResult);
});
