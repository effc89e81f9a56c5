import { Vector3 } from "three";
import { SceneError } from "../errors.js";
import { isFiniteVector } from "../geometry/vector.js";

// weights of the diffuse, specular, reflected and refracted terms, in that order
export type Albedo = readonly [diffuse: number, specular: number, reflect: number, refract: number];

export class Material {
  readonly color: Vector3;
  readonly albedo: Albedo;

  constructor(
    color: Vector3,
    albedo: Albedo,
    public readonly specularExponent: number,
    public readonly refractiveIndex: number = 1,
  ) {
    if (!isFiniteVector(color)) {
      throw new SceneError("material color must be finite");
    }
    if (albedo.length !== 4 || !albedo.every(Number.isFinite)) {
      throw new SceneError("material albedo must hold four finite weights");
    }
    if (!(specularExponent > 0)) {
      throw new SceneError(`specular exponent must be positive, got ${specularExponent}`);
    }
    if (!(refractiveIndex > 0)) {
      throw new SceneError(`refractive index must be positive, got ${refractiveIndex}`);
    }

    this.color = color.clone();
    this.albedo = [albedo[0], albedo[1], albedo[2], albedo[3]];
    Object.freeze(this.color);
    Object.freeze(this);
  }
}
