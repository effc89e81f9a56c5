import { get, writable, type Readable } from "svelte/store";
import { Vector3 } from "three";
import { ConfigError } from "./errors.js";
import { EventHandler } from "./eventHandler.js";

// everything the recursive shader reads
export type TraceOptions = {
  maxDepth: number;
  // intersections at t <= hitEpsilon are ignored
  hitEpsilon: number;
  // distance secondary and shadow ray origins are pushed off the surface
  originBias: number;
  background: Vector3;
};

export type RenderOptions = TraceOptions & {
  width: number;
  height: number;
  // full vertical field of view, radians
  fov: number;
  tileSize: number;
  // 0 renders on the calling thread
  workers: number;
};

export const defaultOptions: Readonly<RenderOptions> = Object.freeze({
  width: 1024,
  height: 768,
  // tan(fov / 2) = 2 / PI
  fov: 4 / Math.PI,
  maxDepth: 4,
  hitEpsilon: 1e-3,
  originBias: 1e-3,
  background: new Vector3(0.2, 0.7, 0.8),
  tileSize: 64,
  workers: 0,
});

function cloneOptions(options: RenderOptions): RenderOptions {
  return { ...options, background: options.background.clone() };
}

function requireInteger(option: string, value: number, min: number) {
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigError(option, `expected an integer >= ${min}, got ${value}`);
  }
}

function requirePositive(option: string, value: number) {
  if (!(value > 0) || !Number.isFinite(value)) {
    throw new ConfigError(option, `expected a positive number, got ${value}`);
  }
}

export function validateOptions(options: RenderOptions): RenderOptions {
  requireInteger("width", options.width, 1);
  requireInteger("height", options.height, 1);
  requireInteger("maxDepth", options.maxDepth, 0);
  requireInteger("tileSize", options.tileSize, 1);
  requireInteger("workers", options.workers, 0);
  requirePositive("hitEpsilon", options.hitEpsilon);
  requirePositive("originBias", options.originBias);

  if (!(options.fov > 0 && options.fov < Math.PI)) {
    throw new ConfigError("fov", `expected an angle in (0, PI) radians, got ${options.fov}`);
  }

  let { x, y, z } = options.background;
  if (![x, y, z].every(Number.isFinite)) {
    throw new ConfigError("background", "components must be finite");
  }

  return options;
}

/** Defaults overlaid with `partial`, validated. Leaves the shared store alone. */
export function resolveOptions(partial: Partial<RenderOptions> = {}): RenderOptions {
  return validateOptions(cloneOptions({ ...defaultOptions, ...partial }));
}

export type ConfigStore = Readable<RenderOptions> & {
  set: (value: RenderOptions) => void;
  update: (fn: (value: RenderOptions) => RenderOptions) => void;
  getOldValue: () => RenderOptions;
};

export function createConfigStore(initialValue: RenderOptions): ConfigStore {
  const { subscribe, set, update } = writable<RenderOptions>(cloneOptions(initialValue));

  // subscribers may hold on to the object they were handed, keep our own copies
  let oldValues: RenderOptions[] = [cloneOptions(initialValue), cloneOptions(initialValue)];

  return {
    subscribe,
    set: (value: RenderOptions) => {
      oldValues[0] = oldValues[1];
      oldValues[1] = cloneOptions(value);
      set(value);
    },
    update: (fn: (value: RenderOptions) => RenderOptions) => {
      update((currentValue) => {
        let next = fn(currentValue);
        oldValues[0] = oldValues[1];
        oldValues[1] = cloneOptions(next);
        return next;
      });
    },
    getOldValue: () => oldValues[0],
  };
}

export const configOptions = createConfigStore(defaultOptions);

type ConfigEvents = {
  "config-update": RenderOptions;
};

export class ConfigManager {
  public options: RenderOptions;
  public prevOptions: RenderOptions;
  public e: EventHandler<ConfigEvents>;
  private unsubscribe: () => void;

  constructor(private store: ConfigStore = configOptions) {
    this.options = get(store);
    this.prevOptions = this.options;
    this.e = new EventHandler<ConfigEvents>();

    this.unsubscribe = store.subscribe((value) => {
      this.options = value;
      this.prevOptions = store.getOldValue();

      this.e.fireEvent("config-update", this.options);
    });
  }

  setStoreProperty(props: Partial<RenderOptions>) {
    this.store.set(validateOptions(cloneOptions({ ...this.options, ...props })));
  }

  dispose() {
    this.unsubscribe();
  }
}
