import { describe, expect, it } from "vitest";
import { Vector2 } from "three";
import { Camera } from "./camera.js";
import { fromWireOptions, toWireOptions } from "./commonTypes.js";
import { resolveOptions } from "./config.js";
import { createScene } from "./createScene.js";
import { createCamera, renderTile } from "./renderer.js";
import { deserializeScene, serializeScene } from "./sceneFormat.js";
import { Tile } from "./tile.js";

describe("worker wire format", () => {
  it("survives structured clone", () => {
    let options = resolveOptions({ maxDepth: 2 });
    let wire = structuredClone(toWireOptions(options));
    let back = fromWireOptions(wire);

    expect(back.maxDepth).toBe(2);
    expect(back.background).toEqual(options.background);
    expect(back.background.isVector3).toBe(true);
  });

  it("traces the same tile on a rebuilt scene as on the original", () => {
    let options = resolveOptions({ width: 8, height: 6 });
    let scene = createScene();
    let camera = createCamera(options);

    // what a worker reconstructs from its scene-setup message
    let workerScene = deserializeScene(serializeScene(scene));
    let workerCamera = new Camera(new Vector2(camera.canvasSize.x, camera.canvasSize.y), camera.fov);
    let workerOptions = fromWireOptions(structuredClone(toWireOptions(options)));

    let local = renderTile(new Tile(2, 1, 4, 4), scene, camera, options);
    let remote = renderTile(new Tile(2, 1, 4, 4), workerScene, workerCamera, workerOptions);

    expect(remote.data).toEqual(local.data);
  });
});
