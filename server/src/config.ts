import path from "path";
import dotenv from "dotenv";

dotenv.config();

export interface ServerConfig {
  port: number;
  /** Root of the team store */
  dataDir: string;
  /** Holds demons/, angels/ and archetypes/ template archives */
  profilesDir: string;
  cataloguePath: string;
  /** Seed for power draws; unseeded draws use Math.random */
  rngSeed?: string;
}

const toPort = (value: string | undefined): number => {
  const n = Number(value);
  return Number.isInteger(n) && n > 0 ? n : 4000;
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const cwd = process.cwd();
  return {
    port: toPort(env.PORT),
    dataDir: env.SCOX_DATA_DIR ?? path.join(cwd, "server", "data"),
    profilesDir: env.SCOX_PROFILES_DIR ?? path.join(cwd, "data", "profiles"),
    cataloguePath: env.SCOX_CATALOGUE_PATH ?? path.join(cwd, "data", "catalogue.yaml"),
    rngSeed: env.SCOX_RNG_SEED || undefined
  };
}
