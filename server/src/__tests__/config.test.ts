import path from "node:path";
import { describe, expect, it } from "vitest";
import { loadConfig } from "../config";

describe("loadConfig", () => {
  it("falls back to the working directory layout", () => {
    const cwd = process.cwd();
    expect(loadConfig({})).toEqual({
      port: 4000,
      dataDir: path.join(cwd, "server", "data"),
      profilesDir: path.join(cwd, "data", "profiles"),
      cataloguePath: path.join(cwd, "data", "catalogue.yaml"),
      rngSeed: undefined
    });
  });

  it("reads overrides from the environment", () => {
    const config = loadConfig({
      PORT: "5050",
      SCOX_DATA_DIR: "/tmp/teams",
      SCOX_PROFILES_DIR: "/tmp/profiles",
      SCOX_CATALOGUE_PATH: "/tmp/catalogue.json",
      SCOX_RNG_SEED: "test-seed"
    });
    expect(config).toEqual({
      port: 5050,
      dataDir: "/tmp/teams",
      profilesDir: "/tmp/profiles",
      cataloguePath: "/tmp/catalogue.json",
      rngSeed: "test-seed"
    });
  });

  it("ignores invalid ports and empty seeds", () => {
    const config = loadConfig({ PORT: "abc", SCOX_RNG_SEED: "" });
    expect(config.port).toBe(4000);
    expect(config.rngSeed).toBeUndefined();
  });
});
