import { describe, expect, it } from "vitest";
import { ConfigManager, createConfigStore, defaultOptions, resolveOptions, type RenderOptions } from "./config.js";
import { ConfigError } from "./errors.js";
import { vec3 } from "./geometry/vector.js";

describe("resolveOptions", () => {
  it("fills in the defaults", () => {
    let options = resolveOptions();

    expect(options.width).toBe(1024);
    expect(options.height).toBe(768);
    expect(options.fov).toBeCloseTo(4 / Math.PI, 12);
    expect(options.maxDepth).toBe(4);
    expect(options.hitEpsilon).toBe(1e-3);
    expect(options.originBias).toBe(1e-3);
    expect(options.background).toEqual(vec3(0.2, 0.7, 0.8));
  });

  it("overrides only what it is given and never shares the background", () => {
    let options = resolveOptions({ width: 320, maxDepth: 0 });

    expect(options.width).toBe(320);
    expect(options.maxDepth).toBe(0);
    expect(options.height).toBe(768);

    options.background.set(1, 1, 1);
    expect(defaultOptions.background).toEqual(vec3(0.2, 0.7, 0.8));
  });

  it.each<[string, Partial<RenderOptions>]>([
    ["width", { width: 0 }],
    ["height", { height: 2.5 }],
    ["maxDepth", { maxDepth: -1 }],
    ["hitEpsilon", { hitEpsilon: 0 }],
    ["originBias", { originBias: Number.NaN }],
    ["fov", { fov: Math.PI }],
    ["workers", { workers: -2 }],
    ["background", { background: vec3(Number.POSITIVE_INFINITY, 0, 0) }],
  ])("rejects a bad %s", (option, partial) => {
    expect(() => resolveOptions(partial)).toThrow(ConfigError);

    try {
      resolveOptions(partial);
    } catch (err) {
      expect(err instanceof ConfigError && err.option).toBe(option);
    }
  });
});

describe("ConfigManager", () => {
  it("reads the store and reports updates with the previous value", () => {
    let manager = new ConfigManager(createConfigStore(resolveOptions()));
    let updates: number[] = [];
    manager.e.addEventListener("config-update", (options) => updates.push(options.width));

    manager.setStoreProperty({ width: 320 });

    expect(manager.options.width).toBe(320);
    expect(manager.prevOptions.width).toBe(1024);
    expect(updates).toEqual([320]);

    manager.dispose();
  });

  it("refuses invalid updates and keeps the current options", () => {
    let manager = new ConfigManager(createConfigStore(resolveOptions()));

    expect(() => manager.setStoreProperty({ maxDepth: -1 })).toThrow(ConfigError);
    expect(manager.options.maxDepth).toBe(4);

    manager.dispose();
  });

  it("stops listening after dispose", () => {
    let store = createConfigStore(resolveOptions());
    let manager = new ConfigManager(store);
    manager.dispose();

    store.set(resolveOptions({ width: 10 }));
    expect(manager.options.width).toBe(1024);
  });
});
