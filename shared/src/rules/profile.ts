/**
 * Profiles
 *
 * A profile holds the ranked entities of a character. Templates (superiors
 * and archetypes) are archives of CSV sections whose rows are merged into an
 * existing profile, one section after the other.
 */

import { createBonusSkill, instantiateCatalogue, type Catalogue, type Nature } from "./catalogue";
import { isReservedName, parseBoolean, parseCsvRows, toInteger, type CsvRow } from "./csv";
import { PreconditionError, SchemaViolationError } from "./errors";
import { generatePowerTable, parsePowerTableRows, type PowerTable } from "./power-table";
import {
  addVariety,
  increaseRank,
  isMultiple,
  type Attribute,
  type Power,
  type SideValue,
  type Skill
} from "./values";

// ═══════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════

export interface Profile {
  nature: Nature;
  /** Display name of the loaded superior template */
  superior: string | null;
  /** Display name of the loaded archetype template */
  archetype: string | null;
  attributes: Record<string, Attribute>;
  values: Record<string, SideValue>;
  primarySkills: Record<string, Skill>;
  secondarySkills: Record<string, Skill>;
  exoticSkills: Record<string, Skill>;
  powers: Record<string, Power>;
  powerTable: PowerTable | null;
}

/** Named container of CSV sections. */
export interface ProfileArchive {
  name: string;
  /** Raw CSV text of a section, or null when the archive does not hold it */
  readSection(section: string): string | null;
}

export const powerTableSection = (nature: Nature): string => `power_table_${nature.toLowerCase()}`;

export interface LoadProfileOptions {
  isArchetype: boolean;
}

export interface ProfileLoadReport {
  source: string;
  isArchetype: boolean;
  warnings: string[];
}

export const SPECIALIZATION_SUFFIX = "spe";

export function createProfile(nature: Nature, catalogue: Catalogue): Profile {
  return {
    nature,
    superior: null,
    archetype: null,
    ...instantiateCatalogue(catalogue),
    powers: {},
    powerTable: null
  };
}

// ═══════════════════════════════════════════════════════════════════════════
// ROW HELPERS
// ═══════════════════════════════════════════════════════════════════════════

const rowName = (row: CsvRow, section: string): string => {
  const name = row.Name?.trim();
  if (!name) {
    throw new SchemaViolationError(section, `Row without Name in ${section}`);
  }
  if (isReservedName(name)) {
    throw new SchemaViolationError(section, `Reserved Name ${name} in ${section}`);
  }
  return name;
};

const rowRank = (row: CsvRow, section: string, name: string): number => {
  const rank = toInteger(row.Rank);
  if (rank === null) {
    throw new SchemaViolationError(section, `Invalid Rank "${row.Rank ?? ""}" for ${name} in ${section}`);
  }
  return rank;
};

const splitSuffix = (name: string): { base: string; suffix: string } | null => {
  const sep = name.indexOf("_");
  if (sep <= 0 || sep === name.length - 1) return null;
  return { base: name.slice(0, sep), suffix: name.slice(sep + 1) };
};

function lookup<T>(map: Record<string, T>, name: string, section: string, what: string): T {
  if (!Object.hasOwn(map, name)) {
    throw new SchemaViolationError(section, `${what} ${name} not found.`);
  }
  return map[name];
}

// ═══════════════════════════════════════════════════════════════════════════
// SECTION MERGES
// ═══════════════════════════════════════════════════════════════════════════

function mergeAttributes(profile: Profile, rows: CsvRow[]): void {
  for (const row of rows) {
    const name = rowName(row, "attributes");
    increaseRank(lookup(profile.attributes, name, "attributes", "Attribute"), rowRank(row, "attributes", name));
  }
}

function mergeValues(profile: Profile, rows: CsvRow[]): void {
  for (const row of rows) {
    const name = rowName(row, "values");
    const value = lookup(profile.values, name, "values", "Value");
    value.rank = Math.max(0, rowRank(row, "values", name));
  }
}

function mergeExoticSkills(profile: Profile, rows: CsvRow[]): void {
  for (const row of rows) {
    const name = rowName(row, "exotic_skills");
    increaseRank(lookup(profile.exoticSkills, name, "exotic_skills", "Skill"), rowRank(row, "exotic_skills", name));
  }
}

function mergePrimarySkills(profile: Profile, rows: CsvRow[]): void {
  for (const row of rows) {
    const name = rowName(row, "primary_skills");
    const rank = rowRank(row, "primary_skills", name);
    const split = splitSuffix(name);

    if (Object.hasOwn(profile.primarySkills, name)) {
      increaseRank(profile.primarySkills[name], rank);
    } else if (split && split.suffix === SPECIALIZATION_SUFFIX && Object.hasOwn(profile.primarySkills, split.base)) {
      const specialization = profile.primarySkills[split.base].specialization;
      if (!specialization) {
        throw new SchemaViolationError("primary_skills", `Skill ${split.base} has no specialization.`);
      }
      increaseRank(specialization, rank);
    } else {
      throw new SchemaViolationError("primary_skills", `Skill ${name} not found.`);
    }
  }
}

/** Where a secondary skill row lands. */
export type SecondarySkillTarget =
  | { kind: "found"; skill: Skill }
  | { kind: "specialization"; skill: Skill }
  | { kind: "variety"; skill: Skill; variety: string }
  | { kind: "ignoredSuffix"; skill: Skill; suffix: string }
  | { kind: "creatable"; name: string };

export function resolveSecondarySkill(skills: Record<string, Skill>, name: string): SecondarySkillTarget {
  if (Object.hasOwn(skills, name)) return { kind: "found", skill: skills[name] };

  const split = splitSuffix(name);
  if (split && Object.hasOwn(skills, split.base)) {
    const skill = skills[split.base];
    if (skill.specialization) return { kind: "specialization", skill: skill.specialization };
    if (isMultiple(skill)) return { kind: "variety", skill, variety: split.suffix };
    return { kind: "ignoredSuffix", skill, suffix: split.suffix };
  }

  return { kind: "creatable", name };
}

function mergeSecondarySkills(profile: Profile, rows: CsvRow[], warnings: string[]): void {
  for (const row of rows) {
    const name = rowName(row, "secondary_skills");
    const rank = rowRank(row, "secondary_skills", name);
    const target = resolveSecondarySkill(profile.secondarySkills, name);

    switch (target.kind) {
      case "found":
      case "specialization":
        increaseRank(target.skill, rank);
        break;
      case "variety": {
        const result = addVariety(target.skill, target.variety);
        if (!result.applied) warnings.push(result.warning);
        increaseRank(target.skill, rank);
        break;
      }
      case "ignoredSuffix":
        warnings.push(
          `${target.skill.name} is neither specific nor multiple; "${target.suffix}" in ${name} is ignored.`
        );
        break;
      case "creatable": {
        const skill = createBonusSkill(target.name);
        profile.secondarySkills[target.name] = skill;
        increaseRank(skill, rank);
        break;
      }
    }
  }
}

function mergePowers(profile: Profile, rows: CsvRow[]): void {
  for (const row of rows) {
    const name = rowName(row, "powers");
    if (Object.hasOwn(profile.powers, name)) {
      throw new SchemaViolationError("powers", `Power ${name} is already defined.`);
    }
    const invariant = parseBoolean(row.Invariant);
    const rank = invariant ? 0 : rowRank(row, "powers", name);
    if (rank < 0) {
      throw new SchemaViolationError("powers", `Negative Rank ${rank} for ${name} in powers`);
    }
    profile.powers[name] = {
      kind: "power",
      key: name,
      name,
      invariant,
      cost: row.Cost ?? "",
      ordinal: Object.keys(profile.powers).length,
      baseRank: 2 * rank,
      rank: 0
    };
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// LOAD
// ═══════════════════════════════════════════════════════════════════════════

const readRows = (archive: ProfileArchive, section: string): CsvRow[] => {
  const text = archive.readSection(section);
  return text === null ? [] : parseCsvRows(text, section);
};

/**
 * Merge every section of a template archive into the profile.
 * Sections merged before a failing row stay applied.
 */
export function loadProfile(profile: Profile, archive: ProfileArchive, options: LoadProfileOptions): ProfileLoadReport {
  const report: ProfileLoadReport = { source: archive.name, isArchetype: options.isArchetype, warnings: [] };

  mergeAttributes(profile, readRows(archive, "attributes"));
  mergeValues(profile, readRows(archive, "values"));
  mergePrimarySkills(profile, readRows(archive, "primary_skills"));
  mergeSecondarySkills(profile, readRows(archive, "secondary_skills"), report.warnings);
  mergeExoticSkills(profile, readRows(archive, "exotic_skills"));
  mergePowers(profile, readRows(archive, "powers"));

  if (options.isArchetype) {
    const section = powerTableSection(profile.nature);
    const tableText = archive.readSection(section);
    if (tableText === null) {
      throw new PreconditionError(`Archetype ${archive.name} has no ${section} section`);
    }
    profile.powerTable = generatePowerTable(parsePowerTableRows(tableText), profile.superior);
    profile.archetype = archive.name;
  } else {
    profile.superior = archive.name;
  }

  return report;
}
