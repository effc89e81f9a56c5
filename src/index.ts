#!/usr/bin/env node
import { parseArgs } from "node:util";
import { ConfigManager, type RenderOptions } from "./config.js";
import { createRandomScene, createScene } from "./createScene.js";
import { writePPM } from "./display.js";
import { RenderError } from "./errors.js";
import { EventHandler } from "./eventHandler.js";
import type { FrameBuffer } from "./frameBuffer.js";
import { renderFrame } from "./renderer.js";
import type { Scene } from "./scene.js";
import { renderFrameParallel, type PoolEvents } from "./workerPool.js";

const usage = `usage: sphere-tracer [options]

  --width <px>        image width (default 1024)
  --height <px>       image height (default 768)
  --fov <degrees>     vertical field of view (default 72.9)
  --depth <n>         reflection/refraction depth (default 4)
  --workers <n>       worker threads, 0 traces on the main thread (default 0)
  --scene <name>      default | random (default default)
  --seed <seed>       seed for --scene random
  --tone-mapping      exposure tone mapping and gamma on output
  --out <file>        output PPM file (default out.ppm)
`;

function numberArg(name: string, value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  let n = Number(value);
  if (Number.isNaN(n)) throw new RenderError(`--${name}: not a number: ${value}`);
  return n;
}

async function start(argv: string[]) {
  let { values } = parseArgs({
    args: argv,
    options: {
      width: { type: "string" },
      height: { type: "string" },
      fov: { type: "string" },
      depth: { type: "string" },
      workers: { type: "string" },
      scene: { type: "string", default: "default" },
      seed: { type: "string", default: "sphere-tracer" },
      "tone-mapping": { type: "boolean", default: false },
      out: { type: "string", default: "out.ppm" },
      help: { type: "boolean", short: "h", default: false },
    },
  });

  if (values.help) {
    console.log(usage);
    return;
  }

  let configManager = new ConfigManager();
  let props: Partial<RenderOptions> = {};
  let fovDegrees = numberArg("fov", values.fov);

  let width = numberArg("width", values.width);
  if (width !== undefined) props.width = width;
  let height = numberArg("height", values.height);
  if (height !== undefined) props.height = height;
  if (fovDegrees !== undefined) props.fov = (fovDegrees / 180) * Math.PI;
  let depth = numberArg("depth", values.depth);
  if (depth !== undefined) props.maxDepth = depth;
  let workers = numberArg("workers", values.workers);
  if (workers !== undefined) props.workers = workers;

  configManager.setStoreProperty(props);
  let options = configManager.options;

  let sceneName = values.scene ?? "default";
  let outPath = values.out ?? "out.ppm";

  let scene: Scene;
  if (sceneName === "default") scene = createScene();
  else if (sceneName === "random") scene = createRandomScene(values.seed ?? "sphere-tracer");
  else throw new RenderError(`--scene: unknown scene "${sceneName}"`);

  console.log(
    `rendering ${options.width}x${options.height}, ${scene.spheres.length} spheres, ` +
      `${scene.lights.length} lights, depth ${options.maxDepth}`,
  );

  let startTime = performance.now();
  let frame: FrameBuffer;

  if (options.workers > 0) {
    let events = new EventHandler<PoolEvents>();
    events.addEventListener("tile-complete", ({ tilesDone, tilesTotal, workerIndex }) => {
      console.log(`${tilesDone}/${tilesTotal} tiles  from worker: ${workerIndex}`);
    });
    frame = await renderFrameParallel(scene, options, { events });
  } else {
    frame = renderFrame(scene, options);
  }

  console.log(`traced in ${((performance.now() - startTime) / 1000).toFixed(2)}s`);

  await writePPM(outPath, frame, { toneMapping: values["tone-mapping"] ?? false });
  console.log(`wrote ${outPath}`);

  configManager.dispose();
}

start(process.argv.slice(2)).catch((err: unknown) => {
  console.error(err instanceof RenderError ? `error: ${err.message}` : err);
  process.exitCode = 1;
});
