import { Vector3 } from "three";

/** W x H unclamped rgb floats, row-major with row 0 at the top of the image. */
export class FrameBuffer {
  readonly data: Float64Array;

  constructor(
    public readonly width: number,
    public readonly height: number,
  ) {
    this.data = new Float64Array(width * height * 3);
  }

  index(i: number, j: number): number {
    return (this.width * j + i) * 3;
  }

  setRGB(i: number, j: number, r: number, g: number, b: number): void {
    let index = this.index(i, j);
    this.data[index + 0] = r;
    this.data[index + 1] = g;
    this.data[index + 2] = b;
  }

  get(i: number, j: number): Vector3 {
    let index = this.index(i, j);
    return new Vector3(this.data[index + 0], this.data[index + 1], this.data[index + 2]);
  }
}
