import { Router, Request, Response } from "express";
import { isValidTeamName, type TeamStore } from "../storage/team-store";
import { sendError } from "./http-errors";

export function createTeamsRouter(store: TeamStore): Router {
  const router = Router();

  router.get("/", async (_req: Request, res: Response) => {
    try {
      res.json(await store.listTeams());
    } catch (err) {
      sendError(res, err, "Unable to load teams");
    }
  });

  router.post("/", async (req: Request, res: Response) => {
    const { name }: { name?: unknown } = req.body ?? {};
    if (typeof name !== "string" || !isValidTeamName(name.trim())) {
      res.status(400).json({ error: "name is required (letters, digits, spaces, _ and -)" });
      return;
    }
    try {
      const team = await store.createTeam(name.trim());
      if (!team) {
        res.status(409).json({ error: `Team ${name.trim()} already exists` });
        return;
      }
      res.status(201).json(team);
    } catch (err) {
      sendError(res, err, "Unable to create team");
    }
  });

  router.delete("/:team", async (req: Request, res: Response) => {
    try {
      const deleted = await store.deleteTeam(req.params.team);
      if (!deleted) {
        res.status(404).json({ error: "not found" });
        return;
      }
      console.info(`[teams] team ${req.params.team} deleted`);
      res.status(204).end();
    } catch (err) {
      sendError(res, err, "Unable to delete team");
    }
  });

  return router;
}
