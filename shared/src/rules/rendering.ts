import type { CharacterView } from "./character";
import { displayRank, isUsable, type Power, type RankedEntity, type Skill } from "./values";

const rankLabel = (entity: RankedEntity): string => (displayRank(entity) ?? "").trimEnd();

const withRank = (entity: RankedEntity): string => {
  const rank = rankLabel(entity);
  return rank ? `${entity.name} ${rank}` : entity.name;
};

/** "Combat 3 (Poings 4)", "Langues (Anglais, Latin)", "Hobby 1 (Peche)" */
export function describeSkill(skill: Skill): string {
  const head = withRank(skill);
  if (skill.specialization) {
    return `${head} (${withRank(skill.specialization)})`;
  }
  if (skill.varieties && skill.varieties.length > 0) {
    return `${head} (${skill.varieties.join(", ")})`;
  }
  return head;
}

export const describePower = (power: Power): string => (power.invariant ? power.name : withRank(power));

const sideValue = (character: CharacterView, key: string): string => {
  const value = character.values[key];
  return value ? rankLabel(value) : "0";
};

const sortedPowers = (character: CharacterView): Power[] =>
  Object.values(character.powers).sort((a, b) => a.ordinal - b.ordinal);

/**
 * Plain-text sheet: identity, attributes, side values, usable skills, powers.
 */
export function renderCharacterText(character: CharacterView): string {
  const attributes = Object.values(character.attributes)
    .map(withRank)
    .join(", ");

  const values =
    `${sideValue(character, "PP")} PP, ${sideValue(character, "PF")} PF, ` +
    `BL ${sideValue(character, "BL")} / BG ${sideValue(character, "BG")} / ` +
    `BF ${sideValue(character, "BF")} / MS ${sideValue(character, "MS")}`;

  const skills = [
    ...Object.values(character.primarySkills),
    ...Object.values(character.exoticSkills),
    ...Object.values(character.secondarySkills)
  ]
    .filter(isUsable)
    .map(describeSkill)
    .join(", ");

  const powers = sortedPowers(character).map(describePower).join(", ");

  return [
    `${character.name} - Grade ${character.level} - ${character.superior ?? "-"}`,
    `Attributs : ${attributes}`,
    `Valeurs annexes : ${values}`,
    `Talents : ${skills}`,
    `Pouvoirs : ${powers}`,
    ""
  ].join("\n");
}
