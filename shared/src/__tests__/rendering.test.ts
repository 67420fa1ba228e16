import { describe, expect, it } from "vitest";
import { createSkill } from "../rules/catalogue";
import { createCharacter } from "../rules/character";
import { describePower, describeSkill, renderCharacterText } from "../rules/rendering";
import { MemoryArchive, sequence, testCatalogue } from "./fixtures";

const superior = new MemoryArchive("Scox", {
  attributes: "Name,Rank\nForce,2\nVolonte,1\n",
  values: "Name,Rank\nPP,2\n",
  powers: "Name,Rank,Cost,Invariant\nContrat,,0 PP,1\n"
});

const archetype = new MemoryArchive("Corrupteur", {
  secondary_skills: "Name,Rank\nHobby_Peche,1\n",
  power_table_demon: "value;powers;pp;bonus\n[1];{Charme:[0,1,1 PP]};2;{Scox:4}\n"
});

describe("describeSkill", () => {
  it("shows the specialization beside its master", () => {
    const skill = createSkill({ key: "Combat", name: "Combat", category: "primary", specialization: "Mains nues" });
    skill.baseRank = 6;
    if (skill.specialization) {
      skill.specialization.baseRank = 6;
      skill.specialization.rank = 2;
    }
    expect(describeSkill(skill)).toBe("Combat 3 (Mains nues 4)");
  });

  it("lists varieties and omits the rank of invariant skills", () => {
    const skill = createSkill({ key: "Langues", name: "Langues", category: "primary", multiple: true, invariant: true });
    skill.varieties?.push("Anglais", "Latin");
    expect(describeSkill(skill)).toBe("Langues (Anglais, Latin)");
  });
});

describe("describePower", () => {
  it("shows ranked powers with their rank and flat powers by name", () => {
    const base = { kind: "power" as const, key: "Vol", name: "Vol", cost: "2 PP", ordinal: 0, rank: 0 };
    expect(describePower({ ...base, invariant: true, baseRank: 0 })).toBe("Vol");
    expect(describePower({ ...base, invariant: false, baseRank: 3 })).toBe("Vol 1+");
  });
});

describe("renderCharacterText", () => {
  it("renders the sheet of a generated character", () => {
    const { character } = createCharacter(
      { name: "Mephisto", nature: "Demon" },
      { catalogue: testCatalogue, superior, archetype, random: sequence(0) }
    );

    expect(renderCharacterText(character).split("\n")).toEqual([
      "Mephisto - Grade 0 - Scox",
      "Attributs : Force 3, Agilité 2, Perception 2, Volonté 2+, Présence 2, Foi 2",
      "Valeurs annexes : 10 PP, 5 PF, BL 5 / BG 10 / BF 15 / MS 20",
      "Talents : Combat 1+ (Mains nues 1+), Esquive 1, Langues, Hobby 1+ (Peche), Conduite 1",
      "Pouvoirs : Contrat, Charme 1",
      ""
    ]);
  });
});
