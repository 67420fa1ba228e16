import path from "path";
import fs from "fs/promises";
import type { Character } from "@shared/rules/character";
import { isCharacter } from "@shared/rules/snapshot";

export interface TeamSummary {
  name: string;
  createdAt: string;
}

export interface StoredCharacter {
  character: Character;
  createdAt: string;
  updatedAt: string;
}

// Queue key of teams.json; team names are never empty.
const REGISTRY_QUEUE = "";

const TEAM_NAME = /^[\p{L}\p{N} _-]+$/u;

export const isValidTeamName = (name: string): boolean => TEAM_NAME.test(name) && name.trim() === name;

const isRecord = (value: unknown): value is Record<string, unknown> =>
  !!value && typeof value === "object" && !Array.isArray(value);

const isStoredCharacter = (value: unknown): value is StoredCharacter =>
  isRecord(value) &&
  isCharacter(value.character) &&
  typeof value.createdAt === "string" &&
  typeof value.updatedAt === "string";

const isTeamSummary = (value: unknown): value is TeamSummary =>
  isRecord(value) && typeof value.name === "string" && typeof value.createdAt === "string";

/**
 * Teams and their characters as JSON files under one directory:
 * `teams.json` lists the teams, `teams/<name>.json` holds each roster.
 */
export class TeamStore {
  private readonly queues = new Map<string, Promise<void>>();

  constructor(private readonly dataDir: string) {}

  /**
   * Run a read-modify-write of one team's roster after every task queued
   * earlier on the same team has settled.
   */
  async exclusive<T>(team: string, task: () => Promise<T>): Promise<T> {
    const previous = this.queues.get(team) ?? Promise.resolve();
    const run = previous.then(task);
    const settled = run.then(
      () => undefined,
      () => undefined
    );
    this.queues.set(team, settled);
    try {
      return await run;
    } finally {
      if (this.queues.get(team) === settled) this.queues.delete(team);
    }
  }

  private get registryPath(): string {
    return path.join(this.dataDir, "teams.json");
  }

  private rosterPath(team: string): string {
    return path.join(this.dataDir, "teams", `${team}.json`);
  }

  private async ensureStore(): Promise<void> {
    await fs.mkdir(path.join(this.dataDir, "teams"), { recursive: true });
    try {
      await fs.access(this.registryPath);
    } catch {
      await fs.writeFile(this.registryPath, "[]", "utf-8");
    }
  }

  async listTeams(): Promise<TeamSummary[]> {
    await this.ensureStore();
    const raw = await fs.readFile(this.registryPath, "utf-8");
    const parsed: unknown = JSON.parse(raw);
    if (!Array.isArray(parsed)) {
      throw new Error(`${this.registryPath} does not hold a team list`);
    }
    return parsed.filter(isTeamSummary);
  }

  async hasTeam(name: string): Promise<boolean> {
    const teams = await this.listTeams();
    return teams.some((t) => t.name === name);
  }

  /** Returns null when the team already exists. */
  createTeam(name: string): Promise<TeamSummary | null> {
    return this.exclusive(REGISTRY_QUEUE, async () => {
      const teams = await this.listTeams();
      if (teams.some((t) => t.name === name)) return null;
      const team: TeamSummary = { name, createdAt: new Date().toISOString() };
      teams.push(team);
      await fs.writeFile(this.registryPath, JSON.stringify(teams, null, 2), "utf-8");
      await fs.writeFile(this.rosterPath(name), "[]", "utf-8");
      return team;
    });
  }

  /** Returns false when the team does not exist. */
  deleteTeam(name: string): Promise<boolean> {
    return this.exclusive(REGISTRY_QUEUE, async () => {
      const teams = await this.listTeams();
      const idx = teams.findIndex((t) => t.name === name);
      if (idx === -1) return false;
      teams.splice(idx, 1);
      await fs.writeFile(this.registryPath, JSON.stringify(teams, null, 2), "utf-8");
      await fs.rm(this.rosterPath(name), { force: true });
      return true;
    });
  }

  async readRoster(team: string): Promise<StoredCharacter[]> {
    await this.ensureStore();
    let raw: string;
    try {
      raw = await fs.readFile(this.rosterPath(team), "utf-8");
    } catch {
      return [];
    }
    const parsed: unknown = JSON.parse(raw);
    if (!Array.isArray(parsed)) {
      throw new Error(`Roster of team ${team} is malformed`);
    }
    const roster = parsed.filter(isStoredCharacter);
    if (roster.length !== parsed.length) {
      console.warn(`[team-store] ${parsed.length - roster.length} malformed character(s) skipped in team ${team}`);
    }
    return roster;
  }

  async writeRoster(team: string, roster: StoredCharacter[]): Promise<void> {
    await this.ensureStore();
    await fs.writeFile(this.rosterPath(team), JSON.stringify(roster, null, 2), "utf-8");
  }
}
