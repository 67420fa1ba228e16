import type { Catalogue } from "../rules/catalogue";
import type { RandomSource } from "../rules/power-table";
import type { ProfileArchive } from "../rules/profile";

export const testCatalogue: Catalogue = {
  attributes: [
    { key: "Force", name: "Force" },
    { key: "Agilite", name: "Agilité" },
    { key: "Perception", name: "Perception" },
    { key: "Volonte", name: "Volonté" },
    { key: "Presence", name: "Présence" },
    { key: "Foi", name: "Foi" }
  ],
  values: [
    { key: "PF", name: "PF" },
    { key: "PP", name: "PP" },
    { key: "BL", name: "BL" },
    { key: "BG", name: "BG" },
    { key: "BF", name: "BF" },
    { key: "MS", name: "MS" }
  ],
  skills: [
    { key: "Combat", name: "Combat", category: "primary", governing: "Force", specialization: "Mains nues" },
    { key: "Esquive", name: "Esquive", category: "primary", governing: "Agilite" },
    { key: "Langues", name: "Langues", category: "primary", multiple: true, invariant: true },
    { key: "Medecine", name: "Médecine", category: "primary", governing: "Perception", acquired: true },
    {
      key: "Hobby",
      name: "Hobby",
      category: "secondary",
      governing: "Presence",
      multiple: true,
      singleSlot: true,
      acquired: true
    },
    { key: "Sciences", name: "Sciences", category: "secondary", governing: "Perception", multiple: true, acquired: true },
    { key: "Armes", name: "Armes", category: "secondary", governing: "Force", specialization: "Couteau", acquired: true },
    { key: "Conduite", name: "Conduite", category: "secondary", governing: "Agilite" },
    { key: "Hypnose", name: "Hypnose", category: "exotic", governing: "Presence", acquired: true },
    { key: "Sixieme", name: "Sixième sens", category: "exotic", acquired: true }
  ]
};

/** Archive whose sections are held in memory. */
export class MemoryArchive implements ProfileArchive {
  constructor(readonly name: string, private readonly sections: Record<string, string>) {}

  readSection(section: string): string | null {
    return Object.hasOwn(this.sections, section) ? this.sections[section] : null;
  }
}

/** Cycles through the given values. */
export function sequence(...values: number[]): RandomSource {
  let index = 0;
  return () => {
    const value = values[index % values.length];
    index += 1;
    return value;
  };
}
