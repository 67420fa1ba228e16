import seedrandom from "seedrandom";
import type { RandomSource } from "@shared/rules/power-table";

/** Reproducible draws when a seed is configured, Math.random otherwise. */
export const createRandomSource = (seed?: string): RandomSource => (seed ? seedrandom(seed) : Math.random);
