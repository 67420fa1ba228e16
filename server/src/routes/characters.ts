import { Router, Request, Response } from "express";
import { serializeCharacter } from "@shared/rules/snapshot";
import { parseCharacterEdit, parseCreateInput, type CharacterService } from "../services/character-service";
import { sendError } from "./http-errors";

/** Mounted under /api/teams/:team/characters */
export function createCharactersRouter(service: CharacterService): Router {
  const router = Router({ mergeParams: true });

  router.get("/", async (req: Request<{ team: string }>, res: Response) => {
    try {
      res.json(await service.listCharacters(req.params.team));
    } catch (err) {
      sendError(res, err, "Unable to load characters");
    }
  });

  router.post("/", async (req: Request<{ team: string }>, res: Response) => {
    try {
      const created = await service.createCharacter(req.params.team, parseCreateInput(req.body));
      res.status(201).json(created);
    } catch (err) {
      sendError(res, err, "Unable to create character");
    }
  });

  router.get("/:name", async (req: Request<{ team: string; name: string }>, res: Response) => {
    try {
      const character = await service.getCharacter(req.params.team, req.params.name);
      res.type("application/json").send(serializeCharacter(character));
    } catch (err) {
      sendError(res, err, "Unable to load character");
    }
  });

  router.get("/:name/text", async (req: Request<{ team: string; name: string }>, res: Response) => {
    try {
      res.type("text/plain").send(await service.renderText(req.params.team, req.params.name));
    } catch (err) {
      sendError(res, err, "Unable to render character");
    }
  });

  router.patch("/:name", async (req: Request<{ team: string; name: string }>, res: Response) => {
    try {
      const outcome = await service.editCharacter(req.params.team, req.params.name, parseCharacterEdit(req.body));
      res.json(outcome);
    } catch (err) {
      sendError(res, err, "Unable to update character");
    }
  });

  router.delete("/:name", async (req: Request<{ team: string; name: string }>, res: Response) => {
    try {
      await service.deleteCharacter(req.params.team, req.params.name);
      res.status(204).end();
    } catch (err) {
      sendError(res, err, "Unable to delete character");
    }
  });

  return router;
}
