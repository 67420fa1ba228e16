import express from "express";
import cors from "cors";
import type { ServerConfig } from "./config";
import { loadCatalogueFromFile } from "./content/catalogue-file";
import { createCharactersRouter } from "./routes/characters";
import { createProfilesRouter } from "./routes/profiles";
import { createTeamsRouter } from "./routes/teams";
import { CharacterService } from "./services/character-service";
import { createRandomSource } from "./services/random";
import { TeamStore } from "./storage/team-store";

export function createApp(config: ServerConfig): express.Express {
  const catalogue = loadCatalogueFromFile(config.cataloguePath);
  const store = new TeamStore(config.dataDir);
  const service = new CharacterService(store, {
    catalogue,
    profilesDir: config.profilesDir,
    random: createRandomSource(config.rngSeed)
  });

  const app = express();
  app.use(cors());
  app.use(express.json());

  app.get("/api/health", (_req, res) => {
    res.json({ status: "ok" });
  });

  app.use("/api/profiles", createProfilesRouter(service));
  app.use("/api/teams", createTeamsRouter(store));
  app.use("/api/teams/:team/characters", createCharactersRouter(service));

  return app;
}
