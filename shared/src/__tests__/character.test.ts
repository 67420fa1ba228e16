import { describe, expect, it } from "vitest";
import {
  addSkillVariety,
  createCharacter,
  decrementEntry,
  incrementEntry,
  recomputeCharacter,
  removeSkillVariety,
  renameSkillVariety,
  renameSpecialization,
  setLevel,
  type Character
} from "../rules/character";
import { createProfile } from "../rules/profile";
import { fullRank } from "../rules/values";
import { MemoryArchive, sequence, testCatalogue } from "./fixtures";

const superior = new MemoryArchive("Scox", {
  attributes: "Name,Rank\nForce,2\nVolonte,1\n",
  values: "Name,Rank\nPP,2\n",
  powers: "Name,Rank,Cost,Invariant\nContrat,,0 PP,1\n"
});

const archetype = new MemoryArchive("Corrupteur", {
  secondary_skills: "Name,Rank\nHobby_Peche,1\n",
  power_table_demon: "value;powers;pp;bonus\n[1,2];{Charme:[0,1,1 PP]};2;{Scox:4}\n[3];{Vol:[1,0,2 PP]};1;{}\n"
});

const create = (random = sequence(0)) =>
  createCharacter({ name: "Mephisto", nature: "Demon" }, { catalogue: testCatalogue, superior, archetype, random });

const bare = (nature: Character["nature"]): Character => ({
  name: "Test",
  level: 0,
  ...createProfile(nature, testCatalogue)
});

describe("createCharacter", () => {
  it("loads the superior, then the archetype, then draws", () => {
    const { character, loads, draw } = create();

    expect(character.superior).toBe("Scox");
    expect(character.archetype).toBe("Corrupteur");
    expect(loads.map((l) => [l.source, l.isArchetype])).toEqual([
      ["Scox", false],
      ["Corrupteur", true]
    ]);
    expect(character.secondarySkills.Hobby.varieties).toEqual(["Peche"]);
    expect(draw).toEqual({ successes: 1, aborted: true, faces: [1, 1] });
    expect(Object.keys(character.powers)).toEqual(["Contrat", "Charme"]);
  });

  it("recomputes derived values once everything is merged", () => {
    const { character } = create();

    expect(character.values.PP).toMatchObject({ baseRank: 4, rank: 6 });
    expect(character.values.PF.baseRank).toBe(5);
    expect(character.values.BL.baseRank).toBe(5);
    expect(character.primarySkills.Combat.baseRank).toBe(3);
    expect(character.level).toBe(0);
  });

  it("completes two draws when no face collides", () => {
    const { character, draw } = create(sequence(0, 0.7));
    expect(draw).toEqual({ successes: 2, aborted: false, faces: [1, 3] });
    expect(character.values.PP.rank).toBe(7);
    expect(character.powers.Vol).toMatchObject({ invariant: true, ordinal: 2 });
  });
});

describe("recomputeCharacter", () => {
  it("derives wound thresholds from Force for demons", () => {
    const character = bare("Demon");
    character.attributes.Force.rank = 2;
    recomputeCharacter(character);

    expect(
      ["BL", "BG", "BF", "MS"].map((key) => character.values[key].baseRank)
    ).toEqual([5, 10, 15, 20]);
  });

  it("gives angels a larger wound bonus", () => {
    const character = bare("Angel");
    character.attributes.Force.rank = 2;
    recomputeCharacter(character);

    expect(
      ["BL", "BG", "BF", "MS"].map((key) => character.values[key].baseRank)
    ).toEqual([6, 12, 18, 24]);
  });

  it("floors the strength and power pools", () => {
    const character = bare("Demon");
    character.attributes.Force.rank = 2;
    character.attributes.Volonte.rank = 1;
    recomputeCharacter(character);

    expect(character.values.PF.baseRank).toBe(5);
    expect(character.values.PP.baseRank).toBe(4);
  });

  it("is idempotent", () => {
    const character = bare("Demon");
    character.attributes.Presence.rank = 3;
    recomputeCharacter(character);
    const once = structuredClone(character);
    recomputeCharacter(character);
    expect(character).toEqual(once);
  });
});

describe("edits", () => {
  it("recomputes after an attribute increment", () => {
    const { character } = create();
    incrementEntry(character, { section: "attributes", key: "Force" });

    expect(fullRank(character.attributes.Force)).toBe(7);
    expect(["BL", "BG", "BF", "MS"].map((key) => character.values[key].baseRank)).toEqual([5, 11, 16, 22]);
  });

  it("keeps a specialization above its master", () => {
    const { character } = create();
    const path = { section: "primarySkills" as const, key: "Combat", specialization: true };
    incrementEntry(character, path);
    incrementEntry(character, { section: "primarySkills", key: "Combat" });
    decrementEntry(character, path);

    expect(character.primarySkills.Combat.rank).toBe(1);
    expect(character.primarySkills.Combat.specialization?.rank).toBe(1);
  });

  it("rejects unknown entries and missing specializations", () => {
    const { character } = create();
    expect(() => incrementEntry(character, { section: "primarySkills", key: "Cuisine" })).toThrow(
      "Entry Cuisine not found in primarySkills."
    );
    expect(() => incrementEntry(character, { section: "primarySkills", key: "Esquive", specialization: true })).toThrow(
      "Entry Esquive has no specialization."
    );
  });

  it("edits specialization names and varieties", () => {
    const { character } = create();
    expect(renameSpecialization(character, { section: "primarySkills", key: "Combat" }, "Poings")).toEqual({
      applied: true
    });
    expect(character.primarySkills.Combat.specialization?.name).toBe("Poings");

    const sciences = { section: "secondarySkills" as const, key: "Sciences" };
    addSkillVariety(character, sciences, "Chimie");
    renameSkillVariety(character, sciences, "Chimie", "Physique");
    expect(character.secondarySkills.Sciences.varieties).toEqual(["Physique"]);
    expect(removeSkillVariety(character, sciences, "Chimie")).toEqual({
      applied: false,
      warning: 'Sciences has no variety "Chimie".'
    });
  });

  it("rejects variety edits on entries that are not skills", () => {
    const { character } = create();
    expect(() => addSkillVariety(character, { section: "powers", key: "Contrat" }, "x")).toThrow(
      "Entry Contrat is not a skill."
    );
  });

  it("clamps the level to a non-negative integer", () => {
    const { character } = create();
    setLevel(character, 3.7);
    expect(character.level).toBe(3);
    setLevel(character, -2);
    expect(character.level).toBe(0);
  });
});
