import type { Catalogue, Nature } from "@shared/rules/catalogue";
import { NATURES } from "@shared/rules/catalogue";
import {
  addSkillVariety,
  createCharacter,
  decrementEntry,
  ENTRY_SECTIONS,
  incrementEntry,
  recomputeCharacter,
  removeSkillVariety,
  renameSkillVariety,
  renameSpecialization,
  setLevel,
  type Character,
  type EntryPath
} from "@shared/rules/character";
import type { DrawReport, RandomSource } from "@shared/rules/power-table";
import { renderCharacterText } from "@shared/rules/rendering";
import type { EditResult } from "@shared/rules/values";
import { findProfileArchive, listProfiles } from "../content/archive";
import type { StoredCharacter, TeamStore } from "../storage/team-store";

export class ServiceError extends Error {
  status: number;

  constructor(status: number, message: string) {
    super(message);
    this.name = "ServiceError";
    this.status = status;
  }
}

export interface CreateCharacterInput {
  name: string;
  nature: Nature;
  superior: string;
  archetype: string;
  level?: number;
}

export interface CharacterSummary {
  name: string;
  nature: Nature;
  level: number;
  superior: string | null;
  archetype: string | null;
}

export interface CreatedCharacter {
  character: Character;
  warnings: string[];
  draw: DrawReport;
}

export type CharacterEdit =
  | { op: "increment" | "decrement"; path: EntryPath }
  | { op: "specialization"; path: EntryPath; name: string }
  | { op: "addVariety" | "removeVariety"; path: EntryPath; variety: string }
  | { op: "renameVariety"; path: EntryPath; from: string; to: string }
  | { op: "level"; level: number };

export interface EditOutcome {
  character: Character;
  warning?: string;
}

export interface CharacterServiceOptions {
  catalogue: Catalogue;
  profilesDir: string;
  random?: RandomSource;
}

// ═══════════════════════════════════════════════════════════════════════════
// REQUEST PARSING
// ═══════════════════════════════════════════════════════════════════════════

type UnknownRecord = Record<string, unknown>;

const isRecord = (value: unknown): value is UnknownRecord =>
  !!value && typeof value === "object" && !Array.isArray(value);

const requireString = (body: UnknownRecord, field: string): string => {
  const value = body[field];
  if (typeof value !== "string" || !value.trim()) {
    throw new ServiceError(400, `${field} is required`);
  }
  return value.trim();
};

export function parseNature(value: unknown): Nature {
  if (value === undefined) return "Demon";
  const match = NATURES.find((n) => typeof value === "string" && n.toLowerCase() === value.toLowerCase());
  if (!match) {
    throw new ServiceError(400, `nature must be one of ${NATURES.join(", ")}`);
  }
  return match;
}

const parseLevel = (value: unknown): number => {
  if (typeof value !== "number" || !Number.isInteger(value) || value < 0) {
    throw new ServiceError(400, "level must be a non-negative integer");
  }
  return value;
};

export function parseCreateInput(body: unknown): CreateCharacterInput {
  if (!isRecord(body)) throw new ServiceError(400, "body must be an object");
  return {
    name: requireString(body, "name"),
    nature: parseNature(body.nature),
    superior: requireString(body, "superior"),
    archetype: requireString(body, "archetype"),
    level: body.level === undefined ? undefined : parseLevel(body.level)
  };
}

function parsePath(body: UnknownRecord): EntryPath {
  const section = ENTRY_SECTIONS.find((s) => s === body.section);
  if (!section) {
    throw new ServiceError(400, `section must be one of ${ENTRY_SECTIONS.join(", ")}`);
  }
  return { section, key: requireString(body, "key"), specialization: body.specialization === true };
}

export function parseCharacterEdit(body: unknown): CharacterEdit {
  if (!isRecord(body)) throw new ServiceError(400, "body must be an object");
  const { op } = body;
  switch (op) {
    case "increment":
    case "decrement":
      return { op, path: parsePath(body) };
    case "specialization":
      return { op: "specialization", path: parsePath(body), name: requireString(body, "name") };
    case "addVariety":
    case "removeVariety":
      return { op, path: parsePath(body), variety: requireString(body, "variety") };
    case "renameVariety":
      return {
        op: "renameVariety",
        path: parsePath(body),
        from: requireString(body, "from"),
        to: requireString(body, "to")
      };
    case "level":
      return { op: "level", level: parseLevel(body.level) };
    default:
      throw new ServiceError(400, `Unknown edit op: ${String(op)}`);
  }
}

function applyEdit(character: Character, edit: CharacterEdit): EditResult {
  switch (edit.op) {
    case "increment":
      incrementEntry(character, edit.path);
      return { applied: true };
    case "decrement":
      decrementEntry(character, edit.path);
      return { applied: true };
    case "specialization":
      return renameSpecialization(character, edit.path, edit.name);
    case "addVariety":
      return addSkillVariety(character, edit.path, edit.variety);
    case "removeVariety":
      return removeSkillVariety(character, edit.path, edit.variety);
    case "renameVariety":
      return renameSkillVariety(character, edit.path, edit.from, edit.to);
    case "level":
      setLevel(character, edit.level);
      return { applied: true };
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// SERVICE
// ═══════════════════════════════════════════════════════════════════════════

const summarize = ({ character }: StoredCharacter): CharacterSummary => ({
  name: character.name,
  nature: character.nature,
  level: character.level,
  superior: character.superior,
  archetype: character.archetype
});

export class CharacterService {
  constructor(private readonly store: TeamStore, private readonly options: CharacterServiceOptions) {}

  listProfiles(nature: Nature): { superiors: string[]; archetypes: string[] } {
    return {
      superiors: listProfiles(this.options.profilesDir, "superior", nature),
      archetypes: listProfiles(this.options.profilesDir, "archetype", nature)
    };
  }

  private async roster(team: string): Promise<StoredCharacter[]> {
    if (!(await this.store.hasTeam(team))) {
      throw new ServiceError(404, `Team ${team} does not exist`);
    }
    return this.store.readRoster(team);
  }

  private async stored(team: string, name: string): Promise<{ roster: StoredCharacter[]; index: number }> {
    const roster = await this.roster(team);
    const index = roster.findIndex((s) => s.character.name === name);
    if (index === -1) {
      throw new ServiceError(404, `${name} does not exist in team ${team}`);
    }
    return { roster, index };
  }

  async listCharacters(team: string): Promise<CharacterSummary[]> {
    const roster = await this.roster(team);
    return roster.map(summarize);
  }

  createCharacter(team: string, input: CreateCharacterInput): Promise<CreatedCharacter> {
    return this.store.exclusive(team, () => this.insertCharacter(team, input));
  }

  private async insertCharacter(team: string, input: CreateCharacterInput): Promise<CreatedCharacter> {
    const roster = await this.roster(team);
    if (roster.some((s) => s.character.name === input.name)) {
      throw new ServiceError(409, `${input.name} already exists in team ${team}`);
    }

    const { profilesDir, catalogue, random } = this.options;
    const result = createCharacter(
      { name: input.name, nature: input.nature, level: input.level },
      {
        catalogue,
        superior: findProfileArchive(profilesDir, "superior", input.nature, input.superior),
        archetype: findProfileArchive(profilesDir, "archetype", input.nature, input.archetype),
        random
      }
    );

    const warnings = result.loads.flatMap((load) => load.warnings.map((w) => `${load.source}: ${w}`));
    for (const warning of warnings) {
      console.warn(`[characters] ${warning}`);
    }
    if (result.draw.aborted) {
      console.info(
        `[characters] power draw for ${input.name} stopped on a collision after ${result.draw.successes} draw(s)`
      );
    }

    const now = new Date().toISOString();
    roster.push({ character: result.character, createdAt: now, updatedAt: now });
    await this.store.writeRoster(team, roster);

    return { character: result.character, warnings, draw: result.draw };
  }

  async getCharacter(team: string, name: string): Promise<Character> {
    const { roster, index } = await this.stored(team, name);
    return roster[index].character;
  }

  async renderText(team: string, name: string): Promise<string> {
    return renderCharacterText(await this.getCharacter(team, name));
  }

  editCharacter(team: string, name: string, edit: CharacterEdit): Promise<EditOutcome> {
    return this.store.exclusive(team, () => this.updateCharacter(team, name, edit));
  }

  private async updateCharacter(team: string, name: string, edit: CharacterEdit): Promise<EditOutcome> {
    const { roster, index } = await this.stored(team, name);
    const character = roster[index].character;

    const result = applyEdit(character, edit);
    recomputeCharacter(character);
    roster[index] = { ...roster[index], character, updatedAt: new Date().toISOString() };
    await this.store.writeRoster(team, roster);

    if (!result.applied) {
      console.warn(`[characters] ${name}: ${result.warning}`);
      return { character, warning: result.warning };
    }
    return { character };
  }

  deleteCharacter(team: string, name: string): Promise<void> {
    return this.store.exclusive(team, async () => {
      const { roster, index } = await this.stored(team, name);
      roster.splice(index, 1);
      await this.store.writeRoster(team, roster);
    });
  }
}
