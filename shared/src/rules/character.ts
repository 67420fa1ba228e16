/**
 * Character composition
 *
 * A character is the fixed catalogue, then its superior, then its archetype,
 * then two draws on the archetype's power table. Derived ranks are
 * recomputed from the attributes once everything is merged and after every
 * manual edit.
 */

import type { Catalogue, Nature } from "./catalogue";
import { SchemaViolationError } from "./errors";
import { drawPowers, type DrawReport, type RandomSource } from "./power-table";
import { createProfile, loadProfile, type Profile, type ProfileArchive, type ProfileLoadReport } from "./profile";
import {
  addVariety,
  computeBaseRank,
  decrementRank,
  incrementRank,
  realRank,
  removeVariety,
  renameVariety,
  setSpecializationName,
  type Attribute,
  type EditResult,
  type RankedEntity,
  type Skill
} from "./values";

// ═══════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════

export interface Character extends Profile {
  name: string;
  level: number;
}

export interface CreateCharacterRequest {
  name: string;
  nature: Nature;
  level?: number;
}

export interface CreateCharacterSources {
  catalogue: Catalogue;
  superior: ProfileArchive;
  archetype: ProfileArchive;
  random?: RandomSource;
}

export interface CreateCharacterResult {
  character: Character;
  loads: ProfileLoadReport[];
  draw: DrawReport;
}

/** Read-only view handed to renderers and exporters. */
export type CharacterView = Readonly<Character>;

export const ARCHETYPE_DRAWS = 2;

export const WOUND_BONUS: Record<Nature, number> = {
  Demon: 2,
  Angel: 3
};

// ═══════════════════════════════════════════════════════════════════════════
// CREATION & RECOMPUTATION
// ═══════════════════════════════════════════════════════════════════════════

export function createCharacter(request: CreateCharacterRequest, sources: CreateCharacterSources): CreateCharacterResult {
  const character: Character = {
    name: request.name,
    level: request.level ?? 0,
    ...createProfile(request.nature, sources.catalogue)
  };

  const loads = [
    loadProfile(character, sources.superior, { isArchetype: false }),
    loadProfile(character, sources.archetype, { isArchetype: true })
  ];
  const draw = drawPowers(character, ARCHETYPE_DRAWS, sources.random);
  recomputeCharacter(character);

  return { character, loads, draw };
}

const attributeRealRank = (attributes: Record<string, Attribute>, key: string): number => {
  const attribute = attributes[key];
  return attribute ? realRank(attribute) : 0;
};

const setBaseRank = (profile: Profile, key: string, value: number): void => {
  const sideValue = profile.values[key];
  if (sideValue) sideValue.baseRank = Math.floor(value);
};

/**
 * Recompute every derived base rank from the current attributes.
 */
export function recomputeCharacter(profile: Profile): void {
  for (const skills of [profile.primarySkills, profile.secondarySkills, profile.exoticSkills]) {
    for (const skill of Object.values(skills)) {
      computeBaseRank(skill, profile.attributes);
    }
  }

  const force = attributeRealRank(profile.attributes, "Force");
  const volonte = attributeRealRank(profile.attributes, "Volonte");
  const foi = attributeRealRank(profile.attributes, "Foi");
  const wound = force + WOUND_BONUS[profile.nature];

  setBaseRank(profile, "PF", force + volonte);
  setBaseRank(profile, "PP", foi + volonte);
  setBaseRank(profile, "BL", wound);
  setBaseRank(profile, "BG", 2 * wound);
  setBaseRank(profile, "BF", 3 * wound);
  setBaseRank(profile, "MS", 4 * wound);
}

// ═══════════════════════════════════════════════════════════════════════════
// EDITS
// ═══════════════════════════════════════════════════════════════════════════

export type EntrySection = "attributes" | "values" | "primarySkills" | "secondarySkills" | "exoticSkills" | "powers";

export const ENTRY_SECTIONS: readonly EntrySection[] = [
  "attributes",
  "values",
  "primarySkills",
  "secondarySkills",
  "exoticSkills",
  "powers"
];

export interface EntryPath {
  section: EntrySection;
  key: string;
  /** Target the specialization of the skill instead of the skill */
  specialization?: boolean;
}

interface ResolvedEntry {
  entity: RankedEntity;
  master?: Skill;
}

function resolveEntry(character: Character, path: EntryPath): ResolvedEntry {
  const map: Record<string, RankedEntity> = character[path.section];
  if (!Object.hasOwn(map, path.key)) {
    throw new SchemaViolationError(path.section, `Entry ${path.key} not found in ${path.section}.`);
  }
  const entity = map[path.key];
  if (!path.specialization) return { entity };

  if (entity.kind !== "skill" || !entity.specialization) {
    throw new SchemaViolationError(path.section, `Entry ${path.key} has no specialization.`);
  }
  return { entity: entity.specialization, master: entity };
}

function resolveSkill(character: Character, path: EntryPath): Skill {
  const { entity } = resolveEntry(character, { ...path, specialization: false });
  if (entity.kind !== "skill") {
    throw new SchemaViolationError(path.section, `Entry ${path.key} is not a skill.`);
  }
  return entity;
}

export function incrementEntry(character: Character, path: EntryPath): void {
  incrementRank(resolveEntry(character, path).entity);
  recomputeCharacter(character);
}

export function decrementEntry(character: Character, path: EntryPath): void {
  const { entity, master } = resolveEntry(character, path);
  decrementRank(entity, master);
  recomputeCharacter(character);
}

export const renameSpecialization = (character: Character, path: EntryPath, name: string): EditResult =>
  setSpecializationName(resolveSkill(character, path), name);

export const addSkillVariety = (character: Character, path: EntryPath, variety: string): EditResult =>
  addVariety(resolveSkill(character, path), variety);

export const renameSkillVariety = (character: Character, path: EntryPath, from: string, to: string): EditResult =>
  renameVariety(resolveSkill(character, path), from, to);

export const removeSkillVariety = (character: Character, path: EntryPath, variety: string): EditResult =>
  removeVariety(resolveSkill(character, path), variety);

export function setLevel(character: Character, level: number): void {
  character.level = Math.max(0, Math.trunc(level));
}
