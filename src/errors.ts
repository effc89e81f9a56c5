export class RenderError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

// a vector operation got input it has no defined answer for (e.g. a zero-length ray direction)
export class GeometryError extends RenderError {}

// malformed scene: bad radius, intensity, material weights, or an unreadable scene description
export class SceneError extends RenderError {}

export class ConfigError extends RenderError {
  constructor(
    public readonly option: string,
    message: string,
  ) {
    super(`${option}: ${message}`);
  }
}
