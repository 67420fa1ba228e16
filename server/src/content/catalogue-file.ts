// Loads the fixed catalogue from its YAML (or JSON) data file and checks
// that it carries everything the derived-value rules read.

import fs from "fs";
import path from "path";
import yaml from "js-yaml";
import type { AttributeDefinition, Catalogue, SideValueDefinition, SkillDefinition } from "@shared/rules/catalogue";
import type { SkillCategory } from "@shared/rules/values";

const REQUIRED_ATTRIBUTES = ["Force", "Volonte", "Foi"];
const REQUIRED_VALUES = ["PF", "PP", "BL", "BG", "BF", "MS"];
const CATEGORIES: readonly SkillCategory[] = ["primary", "secondary", "exotic"];

type UnknownRecord = Record<string, unknown>;

const isRecord = (value: unknown): value is UnknownRecord =>
  !!value && typeof value === "object" && !Array.isArray(value);

const optionalString = (value: unknown, field: string, key: string): string | undefined => {
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "string") throw new Error(`Catalogue skill ${key}: ${field} must be a string`);
  return value;
};

const optionalBoolean = (value: unknown, field: string, key: string): boolean | undefined => {
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "boolean") throw new Error(`Catalogue skill ${key}: ${field} must be a boolean`);
  return value;
};

function readNamedEntries(data: UnknownRecord, field: string): { key: string; name: string }[] {
  const entries = data[field];
  if (!Array.isArray(entries)) {
    throw new Error(`Catalogue must include array field: ${field}`);
  }
  return entries.map((entry, index) => {
    if (!isRecord(entry) || typeof entry.key !== "string" || typeof entry.name !== "string") {
      throw new Error(`Catalogue ${field}[${index}] must have string key and name`);
    }
    return { key: entry.key, name: entry.name };
  });
}

function readSkill(entry: UnknownRecord, attributeKeys: Set<string>): SkillDefinition {
  const key = String(entry.key);
  const category = CATEGORIES.find((c) => c === entry.category);
  if (!category) {
    throw new Error(`Catalogue skill ${key}: unknown category ${String(entry.category)}`);
  }
  const skill: SkillDefinition = {
    key,
    name: String(entry.name),
    category,
    governing: optionalString(entry.governing, "governing", key),
    specialization: optionalString(entry.specialization, "specialization", key),
    multiple: optionalBoolean(entry.multiple, "multiple", key),
    singleSlot: optionalBoolean(entry.singleSlot, "singleSlot", key),
    invariant: optionalBoolean(entry.invariant, "invariant", key),
    acquired: optionalBoolean(entry.acquired, "acquired", key)
  };
  if (skill.governing !== undefined && !attributeKeys.has(skill.governing)) {
    throw new Error(`Catalogue skill ${key}: unknown governing attribute ${skill.governing}`);
  }
  if (skill.specialization !== undefined && skill.multiple) {
    throw new Error(`Catalogue skill ${key} cannot be both specific and multiple`);
  }
  return skill;
}

export function validateCatalogueShape(data: unknown): Catalogue {
  if (!isRecord(data)) {
    throw new Error("Catalogue must be an object");
  }
  const attributes: AttributeDefinition[] = readNamedEntries(data, "attributes");
  const values: SideValueDefinition[] = readNamedEntries(data, "values");
  const attributeKeys = new Set(attributes.map((a) => a.key));
  const valueKeys = new Set(values.map((v) => v.key));

  for (const key of REQUIRED_ATTRIBUTES) {
    if (!attributeKeys.has(key)) throw new Error(`Catalogue is missing attribute ${key}`);
  }
  for (const key of REQUIRED_VALUES) {
    if (!valueKeys.has(key)) throw new Error(`Catalogue is missing side value ${key}`);
  }

  const rawSkills = data.skills;
  if (!Array.isArray(rawSkills)) {
    throw new Error("Catalogue must include array field: skills");
  }
  const skills = rawSkills.map((entry, index) => {
    if (!isRecord(entry) || typeof entry.key !== "string" || typeof entry.name !== "string") {
      throw new Error(`Catalogue skills[${index}] must have string key and name`);
    }
    return readSkill(entry, attributeKeys);
  });

  return { attributes, values, skills };
}

export function loadCatalogueFromFile(filePath: string): Catalogue {
  const ext = path.extname(filePath).toLowerCase();
  const raw = fs.readFileSync(filePath, "utf8");
  let data: unknown;
  if (ext === ".yaml" || ext === ".yml") {
    data = yaml.load(raw);
  } else if (ext === ".json") {
    data = JSON.parse(raw);
  } else {
    throw new Error(`Unsupported catalogue file extension: ${ext}`);
  }
  return validateCatalogueShape(data);
}
