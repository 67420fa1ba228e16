import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createCharacter } from "@shared/rules/character";
import { DirectoryArchive } from "../content/archive";
import { loadCatalogueFromFile } from "../content/catalogue-file";
import { isValidTeamName, TeamStore } from "../storage/team-store";
import { cataloguePath, profilesDir } from "./paths";

const generate = () =>
  createCharacter(
    { name: "Mephisto", nature: "Demon" },
    {
      catalogue: loadCatalogueFromFile(cataloguePath),
      superior: new DirectoryArchive(path.join(profilesDir, "demons", "Scox")),
      archetype: new DirectoryArchive(path.join(profilesDir, "archetypes", "Corrupteur")),
      random: () => 0
    }
  ).character;

describe("TeamStore", () => {
  let tmpDir: string;
  let store: TeamStore;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "scox-teams-"));
    store = new TeamStore(tmpDir);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it("starts empty", async () => {
    expect(await store.listTeams()).toEqual([]);
    expect(await store.hasTeam("Paris")).toBe(false);
  });

  it("creates each team once", async () => {
    const created = await store.createTeam("Paris");
    expect(created?.name).toBe("Paris");
    expect(await store.createTeam("Paris")).toBeNull();
    expect((await store.listTeams()).map((t) => t.name)).toEqual(["Paris"]);
    expect(await store.readRoster("Paris")).toEqual([]);
  });

  it("round-trips a roster", async () => {
    await store.createTeam("Paris");
    const character = generate();
    const stored = { character, createdAt: "2026-01-01T00:00:00.000Z", updatedAt: "2026-01-01T00:00:00.000Z" };
    await store.writeRoster("Paris", [stored]);

    expect(await store.readRoster("Paris")).toEqual([stored]);
  });

  it("skips malformed characters", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    await store.createTeam("Paris");
    await fs.writeFile(
      path.join(tmpDir, "teams", "Paris.json"),
      JSON.stringify([{ character: { name: "Broken" }, createdAt: "x", updatedAt: "x" }]),
      "utf-8"
    );

    expect(await store.readRoster("Paris")).toEqual([]);
    expect(warn).toHaveBeenCalledWith("[team-store] 1 malformed character(s) skipped in team Paris");
  });

  it("registers teams created concurrently", async () => {
    await Promise.all([store.createTeam("Paris"), store.createTeam("Lyon")]);
    expect((await store.listTeams()).map((t) => t.name)).toEqual(["Paris", "Lyon"]);
  });

  it("runs queued tasks in order and past a failure", async () => {
    const order: string[] = [];
    const failed = store.exclusive("Paris", async () => {
      order.push("first");
      throw new Error("write failed");
    });
    const next = store.exclusive("Paris", async () => {
      order.push("second");
      return "done";
    });

    await expect(failed).rejects.toThrow("write failed");
    await expect(next).resolves.toBe("done");
    expect(order).toEqual(["first", "second"]);
  });

  it("deletes teams with their roster", async () => {
    await store.createTeam("Paris");
    expect(await store.deleteTeam("Paris")).toBe(true);
    expect(await store.deleteTeam("Paris")).toBe(false);
    expect(await store.listTeams()).toEqual([]);
    await expect(fs.access(path.join(tmpDir, "teams", "Paris.json"))).rejects.toThrow();
  });
});

describe("isValidTeamName", () => {
  it("accepts letters, digits, blanks, dashes and underscores", () => {
    expect(isValidTeamName("Équipe 2_b-c")).toBe(true);
  });

  it("rejects path separators and padded names", () => {
    expect(isValidTeamName("../etc")).toBe(false);
    expect(isValidTeamName(" Paris")).toBe(false);
    expect(isValidTeamName("")).toBe(false);
  });
});
