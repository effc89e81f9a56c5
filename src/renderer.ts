import { Vector2, Vector3 } from "three";
import { Camera } from "./camera.js";
import type { RenderOptions, TraceOptions } from "./config.js";
import { FrameBuffer } from "./frameBuffer.js";
import type { Scene } from "./scene.js";
import { cast } from "./shader.js";
import { Tile, TileManager } from "./tile.js";

export function createCamera(options: RenderOptions): Camera {
  return new Camera(new Vector2(options.width, options.height), options.fov);
}

export function renderPixel(
  i: number,
  j: number,
  scene: Scene,
  camera: Camera,
  options: TraceOptions,
): Vector3 {
  return cast(camera.getRay(i, j), scene, 0, options);
}

export function renderTile(tile: Tile, scene: Scene, camera: Camera, options: TraceOptions): Tile {
  let data = TileManager.resetTileData(tile);

  for (let j = 0; j < tile.height; j++) {
    for (let i = 0; i < tile.width; i++) {
      let color = renderPixel(tile.x + i, tile.y + j, scene, camera, options);
      let index = (tile.width * j + i) * 3;

      data[index + 0] = color.x;
      data[index + 1] = color.y;
      data[index + 2] = color.z;
    }
  }

  return tile;
}

/** Traces every pixel on the calling thread. */
export function renderFrame(scene: Scene, options: RenderOptions): FrameBuffer {
  let camera = createCamera(options);
  let frame = new FrameBuffer(options.width, options.height);

  for (let tile of TileManager.split(camera.canvasSize, options.tileSize)) {
    TileManager.addTile(frame, renderTile(tile, scene, camera, options));
  }

  return frame;
}
