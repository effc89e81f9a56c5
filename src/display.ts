import { writeFile } from "node:fs/promises";
import type { FrameBuffer } from "./frameBuffer.js";

export type DisplayOptions = {
  toneMapping?: boolean;
  exposure?: number;
  gamma?: number;
};

/**
 * Converts the float frame into 8-bit rgb triples. Without tone mapping each
 * component is scaled by 255 and clamped to [0, 255]; with it, exposure tone
 * mapping and gamma are applied first.
 */
export function toRGBBytes(frame: FrameBuffer, options: DisplayOptions = {}): Uint8ClampedArray {
  let { toneMapping = false, exposure = 1, gamma = 2.2 } = options;
  let radianceData = frame.data;
  let bytes = new Uint8ClampedArray(radianceData.length);

  for (let i = 0; i < radianceData.length; i++) {
    let c = radianceData[i];

    // Exposure tone mapping
    // from: https://learnopengl.com/Advanced-Lighting/HDR
    if (toneMapping) {
      c = Math.pow(1 - Math.exp(-Math.max(c, 0) * exposure), 1 / gamma);
    }

    bytes[i] = Math.floor(Math.max(0, Math.min(1, c)) * 255);
  }

  return bytes;
}

/** Binary PPM (P6). */
export function encodePPM(frame: FrameBuffer, options: DisplayOptions = {}): Buffer {
  let bytes = toRGBBytes(frame, options);
  let header = Buffer.from(`P6\n${frame.width} ${frame.height}\n255\n`, "ascii");
  return Buffer.concat([header, Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength)]);
}

export async function writePPM(path: string, frame: FrameBuffer, options: DisplayOptions = {}): Promise<void> {
  await writeFile(path, encodePPM(frame, options));
}
