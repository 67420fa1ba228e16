/**
 * Fixed catalogue
 *
 * Declarative description of the attributes, skills and side values every
 * character starts with. The table itself lives in a data file; this module
 * turns its records into fresh ranked entities.
 */

import type { Attribute, SideValue, Skill, SkillCategory } from "./values";

export type Nature = "Angel" | "Demon";

export const NATURES: readonly Nature[] = ["Angel", "Demon"];

export const DEFAULT_ATTRIBUTE_BASE_RANK = 4;

export interface AttributeDefinition {
  key: string;
  name: string;
}

export interface SideValueDefinition {
  key: string;
  name: string;
}

export interface SkillDefinition {
  key: string;
  name: string;
  category: SkillCategory;
  governing?: string;
  /** Name given to the specialization of a specific skill */
  specialization?: string;
  multiple?: boolean;
  singleSlot?: boolean;
  invariant?: boolean;
  acquired?: boolean;
}

export interface Catalogue {
  attributes: AttributeDefinition[];
  values: SideValueDefinition[];
  skills: SkillDefinition[];
}

export const createAttribute = (def: AttributeDefinition): Attribute => ({
  kind: "attribute",
  key: def.key,
  name: def.name,
  invariant: false,
  baseRank: DEFAULT_ATTRIBUTE_BASE_RANK,
  rank: 0
});

export const createSideValue = (def: SideValueDefinition): SideValue => ({
  kind: "value",
  key: def.key,
  name: def.name,
  baseRank: 0,
  rank: 0
});

export function createSkill(def: SkillDefinition): Skill {
  const skill: Skill = {
    kind: "skill",
    key: def.key,
    name: def.name,
    category: def.category,
    invariant: def.invariant ?? false,
    acquired: def.acquired ?? false,
    governingAttribute: def.governing,
    singleSlot: false,
    baseRank: 0,
    rank: 0
  };

  if (def.specialization !== undefined) {
    skill.specialization = {
      kind: "skill",
      key: `${def.key}_spe`,
      name: def.specialization,
      category: def.category,
      invariant: skill.invariant,
      acquired: skill.acquired,
      governingAttribute: def.governing,
      masterKey: def.key,
      singleSlot: false,
      baseRank: 0,
      rank: 0
    };
  } else if (def.multiple) {
    skill.varieties = [];
    skill.singleSlot = def.singleSlot ?? false;
  }

  return skill;
}

/** Bonus skill met in a template but absent from the fixed catalogue. */
export const createBonusSkill = (name: string): Skill =>
  createSkill({ key: name, name, category: "secondary", acquired: true });

export interface CatalogueMaps {
  attributes: Record<string, Attribute>;
  values: Record<string, SideValue>;
  primarySkills: Record<string, Skill>;
  secondarySkills: Record<string, Skill>;
  exoticSkills: Record<string, Skill>;
}

export function instantiateCatalogue(catalogue: Catalogue): CatalogueMaps {
  const maps: CatalogueMaps = {
    attributes: {},
    values: {},
    primarySkills: {},
    secondarySkills: {},
    exoticSkills: {}
  };

  for (const def of catalogue.attributes) {
    maps.attributes[def.key] = createAttribute(def);
  }
  for (const def of catalogue.values) {
    maps.values[def.key] = createSideValue(def);
  }
  for (const def of catalogue.skills) {
    const skill = createSkill(def);
    switch (def.category) {
      case "primary":
        maps.primarySkills[def.key] = skill;
        break;
      case "secondary":
        maps.secondarySkills[def.key] = skill;
        break;
      case "exotic":
        maps.exoticSkills[def.key] = skill;
        break;
    }
  }

  return maps;
}
