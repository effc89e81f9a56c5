import { Vector2, Vector3 } from "three";
import { Ray } from "./geometry/ray.js";

/**
 * Pinhole camera fixed at the origin, looking down -Z with +Y up. Pixel
 * centers are projected onto an image plane at z = -1.
 */
export class Camera {
  readonly center = new Vector3(0, 0, 0);

  constructor(
    public canvasSize: Vector2,
    public fov: number,
  ) { }

  // i counts columns from the left, j rows from the top
  getRay(i: number, j: number): Ray {
    let halfHeight = Math.tan(this.fov / 2);
    let aspectRatio = this.canvasSize.x / this.canvasSize.y;

    // range [-1 ... +1]
    let uv = new Vector2(
      (2 * (i + 0.5)) / this.canvasSize.x - 1,
      -((2 * (j + 0.5)) / this.canvasSize.y - 1),
    );

    uv.x *= aspectRatio;
    uv.multiplyScalar(halfHeight);

    return new Ray(this.center, new Vector3(uv.x, uv.y, -1));
  }
}
