import { Vector2 } from "three";
import type { FrameBuffer } from "./frameBuffer.js";

// plain data only: tiles cross worker boundaries through structured clone
export class Tile {
  readonly x: number;
  readonly y: number;
  readonly width: number;
  readonly height: number;
  // rgb triples, row-major, local to the tile
  data: Float64Array | null;

  constructor(x: number, y: number, width: number, height: number, data: Float64Array | null = null) {
    this.x = x;
    this.y = y;
    this.width = width;
    this.height = height;
    this.data = data;
  }
}

export class TileManager {
  /** Cuts the canvas into tiles of at most tileSize x tileSize, left to right, top to bottom. */
  static split(canvasSize: Vector2, tileSize: number): Tile[] {
    let tiles: Tile[] = [];

    for (let y = 0; y < canvasSize.y; y += tileSize) {
      for (let x = 0; x < canvasSize.x; x += tileSize) {
        tiles.push(
          new Tile(x, y, Math.min(tileSize, canvasSize.x - x), Math.min(tileSize, canvasSize.y - y)),
        );
      }
    }

    return tiles;
  }

  static resetTileData(tile: Tile): Float64Array {
    let length = tile.width * tile.height * 3;
    if (!tile.data || tile.data.length !== length) {
      tile.data = new Float64Array(length);
    } else {
      tile.data.fill(0);
    }

    return tile.data;
  }

  static addTile(frame: FrameBuffer, tile: Tile): void {
    let data = tile.data;
    if (!data) return;

    for (let j = 0; j < tile.height; j++) {
      for (let i = 0; i < tile.width; i++) {
        let src = (tile.width * j + i) * 3;
        frame.setRGB(tile.x + i, tile.y + j, data[src + 0], data[src + 1], data[src + 2]);
      }
    }
  }
}
