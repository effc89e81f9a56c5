import { Worker } from "node:worker_threads";
import { toWireOptions, type IComputationResult, type IStartMessage } from "./commonTypes.js";
import type { RenderOptions } from "./config.js";
import { EventHandler } from "./eventHandler.js";
import { FrameBuffer } from "./frameBuffer.js";
import { createCamera } from "./renderer.js";
import type { Scene } from "./scene.js";
import { serializeScene } from "./sceneFormat.js";
import { TileManager } from "./tile.js";

export type RenderProgress = {
  tilesDone: number;
  tilesTotal: number;
  workerIndex: number;
};

export type PoolEvents = {
  "tile-complete": RenderProgress;
};

export type ParallelRenderOptions = {
  // compiled worker entry; defaults to tracer.js next to this module
  workerUrl?: URL;
  events?: EventHandler<PoolEvents>;
};

/**
 * Renders the frame on `options.workers` worker threads. Every worker gets
 * the serialized scene once, then one tile at a time until the queue is
 * empty. Resolves with the assembled frame; any worker failure rejects and
 * tears the pool down.
 */
export function renderFrameParallel(
  scene: Scene,
  options: RenderOptions,
  { workerUrl = new URL("./tracer.js", import.meta.url), events }: ParallelRenderOptions = {},
): Promise<FrameBuffer> {
  let camera = createCamera(options);
  let frame = new FrameBuffer(options.width, options.height);
  let queue = TileManager.split(camera.canvasSize, options.tileSize);
  let tilesTotal = queue.length;
  let tilesDone = 0;

  let workersCount = Math.max(1, Math.min(options.workers, tilesTotal));
  let workers: Worker[] = [];
  let sceneJSON = serializeScene(scene);
  let wireOptions = toWireOptions(options);

  return new Promise<FrameBuffer>((resolve, reject) => {
    let settled = false;

    function finish(err: Error | null) {
      if (settled) return;
      settled = true;

      Promise.all(workers.map((w) => w.terminate())).then(
        () => (err ? reject(err) : resolve(frame)),
        (terminateErr: unknown) => reject(err ?? terminateErr),
      );
    }

    function onWorkerMessage(worker: Worker, data: IComputationResult) {
      TileManager.addTile(frame, data.tile);
      tilesDone++;

      events?.fireEvent("tile-complete", {
        tilesDone,
        tilesTotal,
        workerIndex: data.workerIndex,
      });

      if (tilesDone === tilesTotal) {
        finish(null);
        return;
      }

      // assign new tile to worker and let it run again
      let next = queue.shift();
      if (next) {
        worker.postMessage({ type: "computation-request", tile: next });
      }
    }

    for (let i = 0; i < workersCount; i++) {
      let tile = queue.shift();
      if (!tile) break;

      const worker = new Worker(workerUrl);
      workers.push(worker);

      worker.on("message", (data: IComputationResult) => onWorkerMessage(worker, data));
      worker.on("error", (err) => finish(err));
      worker.on("exit", (code) => {
        if (code !== 0) finish(new Error(`render worker ${i} exited with code ${code}`));
      });

      let startMessage: IStartMessage = {
        type: "scene-setup",
        workerIndex: i,
        scene: sceneJSON,
        canvasSize: { x: camera.canvasSize.x, y: camera.canvasSize.y },
        fov: camera.fov,
        options: wireOptions,
        tile,
      };
      worker.postMessage(startMessage);
    }
  });
}
