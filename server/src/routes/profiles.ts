import { Router, Request, Response } from "express";
import { parseNature, type CharacterService } from "../services/character-service";
import { sendError } from "./http-errors";

export function createProfilesRouter(service: CharacterService): Router {
  const router = Router();

  router.get("/", (req: Request, res: Response) => {
    try {
      res.json(service.listProfiles(parseNature(req.query.nature)));
    } catch (err) {
      sendError(res, err, "Unable to list profiles");
    }
  });

  return router;
}
