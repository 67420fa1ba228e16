/**
 * Character snapshots
 *
 * The whole character graph is plain data: specializations point back to
 * their master by key, so JSON round-trips it unchanged. Reloaded snapshots
 * are shape-checked before use.
 */

import { NATURES, type Nature } from "./catalogue";
import type { Character } from "./character";
import type { PowerCandidate, PowerTable, PowerTableFace } from "./power-table";
import type { Attribute, Power, SideValue, Skill, SkillCategory } from "./values";

type UnknownRecord = Record<string, unknown>;

const isRecord = (value: unknown): value is UnknownRecord =>
  !!value && typeof value === "object" && !Array.isArray(value);

const isNumber = (value: unknown): value is number => typeof value === "number" && Number.isFinite(value);

const isString = (value: unknown): value is string => typeof value === "string";

const isNature = (value: unknown): value is Nature => NATURES.some((nature) => nature === value);

const SKILL_CATEGORIES: readonly SkillCategory[] = ["primary", "secondary", "exotic"];

function isRanked(value: UnknownRecord): boolean {
  const { baseRank, rank, key, name } = value;
  return isNumber(baseRank) && isNumber(rank) && rank >= 0 && isString(key) && isString(name);
}

const isSideValue = (value: unknown): value is SideValue =>
  isRecord(value) && value.kind === "value" && isRanked(value);

const isAttribute = (value: unknown): value is Attribute =>
  isRecord(value) && value.kind === "attribute" && isRanked(value) && typeof value.invariant === "boolean";

const isPower = (value: unknown): value is Power =>
  isRecord(value) &&
  value.kind === "power" &&
  isRanked(value) &&
  typeof value.invariant === "boolean" &&
  isString(value.cost) &&
  isNumber(value.ordinal);

function isSkill(value: unknown): value is Skill {
  if (!isRecord(value) || value.kind !== "skill" || !isRanked(value)) return false;
  if (typeof value.invariant !== "boolean" || typeof value.acquired !== "boolean") return false;
  if (typeof value.singleSlot !== "boolean") return false;
  if (!SKILL_CATEGORIES.some((category) => category === value.category)) return false;
  const { governingAttribute, masterKey, varieties, specialization } = value;
  if (governingAttribute !== undefined && !isString(governingAttribute)) return false;
  if (masterKey !== undefined && !isString(masterKey)) return false;
  if (varieties !== undefined && !(Array.isArray(varieties) && varieties.every(isString))) return false;
  if (specialization !== undefined) {
    if (varieties !== undefined || !isSkill(specialization)) return false;
    if (specialization.masterKey !== value.key) return false;
  }
  return true;
}

const isEntityMap = <T>(value: unknown, guard: (entry: unknown) => entry is T): value is Record<string, T> =>
  isRecord(value) && Object.entries(value).every(([key, entry]) => guard(entry) && isRecord(entry) && entry.key === key);

const isCandidate = (value: unknown): value is PowerCandidate =>
  isRecord(value) && isString(value.name) && typeof value.flat === "boolean" && isNumber(value.rank) && isString(value.cost);

function isTableFace(value: unknown): value is PowerTableFace {
  if (!isRecord(value)) return false;
  const { candidates } = value;
  return isNumber(value.face) && isNumber(value.pp) && Array.isArray(candidates) && candidates.every(isCandidate);
}

function isPowerTable(value: unknown): value is PowerTable {
  if (!isRecord(value)) return false;
  const { faces } = value;
  return Array.isArray(faces) && faces.every(isTableFace);
}

export function isCharacter(value: unknown): value is Character {
  return (
    isRecord(value) &&
    isString(value.name) &&
    isNumber(value.level) &&
    isNature(value.nature) &&
    (value.superior === null || isString(value.superior)) &&
    (value.archetype === null || isString(value.archetype)) &&
    isEntityMap(value.attributes, isAttribute) &&
    isEntityMap(value.values, isSideValue) &&
    isEntityMap(value.primarySkills, isSkill) &&
    isEntityMap(value.secondarySkills, isSkill) &&
    isEntityMap(value.exoticSkills, isSkill) &&
    isEntityMap(value.powers, isPower) &&
    (value.powerTable === null || isPowerTable(value.powerTable))
  );
}

export const serializeCharacter = (character: Character): string => JSON.stringify(character, null, 2);

export function deserializeCharacter(raw: string): Character {
  const parsed: unknown = JSON.parse(raw);
  if (!isCharacter(parsed)) {
    throw new Error("Character snapshot is malformed");
  }
  return parsed;
}
