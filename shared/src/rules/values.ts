/**
 * Value model
 *
 * Ranked entities of a character sheet: attributes, skills, powers and side
 * values. Every entity carries a derived `baseRank` and an invested `rank`;
 * attributes, skills and powers count in half points.
 */

// ═══════════════════════════════════════════════════════════════════════════
// ENTITY TYPES
// ═══════════════════════════════════════════════════════════════════════════

export type SkillCategory = "primary" | "secondary" | "exotic";

export interface RankedValue {
  /** Derived part of the rank, recomputed from the rules */
  baseRank: number;
  /** Invested part of the rank, never negative */
  rank: number;
}

export interface SideValue extends RankedValue {
  kind: "value";
  key: string;
  name: string;
}

export interface Attribute extends RankedValue {
  kind: "attribute";
  key: string;
  name: string;
  invariant: boolean;
}

export interface Skill extends RankedValue {
  kind: "skill";
  key: string;
  name: string;
  category: SkillCategory;
  invariant: boolean;
  acquired: boolean;
  /** Key of the attribute flooring the base rank */
  governingAttribute?: string;
  /** Nested sub-skill, only on specific skills */
  specialization?: Skill;
  /** Key of the owning skill, only on specializations */
  masterKey?: string;
  /** Named instances, only on multiple skills */
  varieties?: string[];
  /** Multiple skill that keeps a single variety */
  singleSlot: boolean;
}

export interface Power extends RankedValue {
  kind: "power";
  key: string;
  name: string;
  invariant: boolean;
  cost: string;
  ordinal: number;
}

export type RankedEntity = SideValue | Attribute | Skill | Power;

export const DEFAULT_SKILL_BASE_RANK = 2;

// ═══════════════════════════════════════════════════════════════════════════
// RANK ARITHMETIC
// ═══════════════════════════════════════════════════════════════════════════

export const fullRank = (value: RankedValue): number => value.baseRank + value.rank;

export const realRank = (value: RankedValue): number => fullRank(value) / 2;

const isInvariant = (entity: RankedEntity): boolean => entity.kind !== "value" && entity.invariant;

export const isMultiple = (skill: Skill): boolean => skill.varieties !== undefined;

/**
 * Add one invested point.
 * A skill only grows while its specialization stays strictly above it.
 */
export function incrementRank(entity: RankedEntity): void {
  if (isInvariant(entity)) return;
  if (entity.kind === "skill" && entity.specialization) {
    if (fullRank(entity.specialization) <= fullRank(entity)) return;
  }
  entity.rank += 1;
}

/**
 * Remove one invested point.
 * A specialization only shrinks while it stays strictly above its master, so
 * without its master it does not shrink at all.
 */
export function decrementRank(entity: RankedEntity, master?: Skill): void {
  if (entity.rank === 0 || isInvariant(entity)) return;
  if (entity.kind === "skill" && entity.masterKey !== undefined) {
    if (!master || fullRank(master) >= fullRank(entity)) return;
  }
  entity.rank -= 1;
}

/**
 * Bulk increase used while merging profiles; skips the specialization ceiling.
 */
export function increaseRank(entity: RankedEntity, step: number): void {
  if (isInvariant(entity)) return;
  entity.rank = Math.max(0, entity.rank + step);
}

export function computeBaseRank(skill: Skill, attributes: Readonly<Record<string, Attribute>>): void {
  if (skill.invariant) {
    skill.baseRank = 0;
  } else if (skill.governingAttribute !== undefined) {
    const governing = attributes[skill.governingAttribute];
    skill.baseRank = governing ? Math.floor(fullRank(governing) / 2) : DEFAULT_SKILL_BASE_RANK;
  } else {
    skill.baseRank = DEFAULT_SKILL_BASE_RANK;
  }
  if (skill.specialization) {
    computeBaseRank(skill.specialization, attributes);
  }
}

export function isUsable(skill: Skill): boolean {
  if (!skill.acquired || skill.rank !== 0) return true;
  if (skill.specialization) return isUsable(skill.specialization);
  if (skill.varieties) return skill.varieties.length > 0;
  return false;
}

// ═══════════════════════════════════════════════════════════════════════════
// DISPLAY
// ═══════════════════════════════════════════════════════════════════════════

export const CONTINUATION_MARKER = "+";

/**
 * Sheet notation: whole points, then "+" for an extra half point or a blank.
 * Invariant entities have no displayed rank.
 */
export function displayRank(entity: RankedEntity): string | null {
  if (entity.kind === "value") return String(fullRank(entity));
  if (entity.invariant) return null;
  const full = fullRank(entity);
  return `${Math.trunc(full / 2)}${full % 2 === 0 ? " " : CONTINUATION_MARKER}`;
}

// ═══════════════════════════════════════════════════════════════════════════
// SPECIALIZATION & VARIETY EDITS
// ═══════════════════════════════════════════════════════════════════════════

export type EditResult = { applied: true } | { applied: false; warning: string };

const APPLIED: EditResult = { applied: true };

export function setSpecializationName(skill: Skill, name: string): EditResult {
  if (!skill.specialization) {
    return { applied: false, warning: `${skill.name} has no specialization; "${name}" is ignored.` };
  }
  skill.specialization.name = name;
  return APPLIED;
}

/**
 * Record a variety on a multiple skill. Repeated names are kept once and a
 * single-slot skill keeps its first variety.
 */
export function addVariety(skill: Skill, variety: string): EditResult {
  if (!skill.varieties) {
    return { applied: false, warning: `${skill.name} is neither specific nor multiple; variety "${variety}" is ignored.` };
  }
  if (skill.varieties.includes(variety)) return APPLIED;
  if (skill.singleSlot && skill.varieties.length > 0) {
    return {
      applied: false,
      warning: `${skill.name} already holds "${skill.varieties[0]}"; variety "${variety}" is ignored.`
    };
  }
  skill.varieties.push(variety);
  return APPLIED;
}

export function renameVariety(skill: Skill, from: string, to: string): EditResult {
  const index = skill.varieties?.indexOf(from) ?? -1;
  if (!skill.varieties || index === -1) {
    return { applied: false, warning: `${skill.name} has no variety "${from}".` };
  }
  skill.varieties[index] = to;
  return APPLIED;
}

export function removeVariety(skill: Skill, variety: string): EditResult {
  const index = skill.varieties?.indexOf(variety) ?? -1;
  if (!skill.varieties || index === -1) {
    return { applied: false, warning: `${skill.name} has no variety "${variety}".` };
  }
  skill.varieties.splice(index, 1);
  return APPLIED;
}
