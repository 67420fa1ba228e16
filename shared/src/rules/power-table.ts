/**
 * Archetype power table
 *
 * Each row of the table covers one or more die faces and grants a set of
 * powers plus a bonus to the power-point pool. Drawing samples faces until
 * enough rows have been granted, and stops at the first face whose powers
 * the character already owns.
 */

import { isReservedName, parseBoolean, parseCsvRows, toInteger } from "./csv";
import { PreconditionError, SchemaViolationError } from "./errors";
import type { Power, SideValue } from "./values";

// ═══════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════

export interface PowerCandidate {
  name: string;
  /** Flat grants have no rank */
  flat: boolean;
  rank: number;
  cost: string;
}

export interface PowerTableRow {
  faces: number[];
  candidates: PowerCandidate[];
  pp: number;
  /** Lower-cased superior name → pp override */
  bonus: Record<string, number>;
}

export interface PowerTableFace {
  face: number;
  candidates: PowerCandidate[];
  pp: number;
}

export interface PowerTable {
  faces: PowerTableFace[];
}

export interface PowerOwner {
  powers: Record<string, Power>;
  values: Record<string, SideValue>;
  powerTable: PowerTable | null;
}

export interface DrawReport {
  successes: number;
  /** Set when a face collided with an owned power */
  aborted: boolean;
  faces: number[];
}

export type RandomSource = () => number;

export const POWER_POOL_KEY = "PP";

const SECTION = "power_table";

// ═══════════════════════════════════════════════════════════════════════════
// PARSING
// ═══════════════════════════════════════════════════════════════════════════

const stripDelimiters = (cell: string, open: string, close: string): string => {
  const trimmed = cell.trim();
  if (!trimmed.startsWith(open) || !trimmed.endsWith(close)) {
    throw new SchemaViolationError(SECTION, `Expected "${open}...${close}", got "${cell}"`);
  }
  return trimmed.slice(1, -1).trim();
};

const parseInteger = (raw: string, what: string): number => {
  const value = toInteger(raw);
  if (value === null) {
    throw new SchemaViolationError(SECTION, `Invalid ${what}: "${raw}"`);
  }
  return value;
};

const parseAward = (raw: string, what: string): number => {
  const value = parseInteger(raw, what);
  if (value < 0) {
    throw new SchemaViolationError(SECTION, `Negative ${what}: "${raw}"`);
  }
  return value;
};

const entryName = (raw: string): string => {
  const name = raw.trim();
  if (!name || isReservedName(name)) {
    throw new SchemaViolationError(SECTION, `Invalid name: "${raw}"`);
  }
  return name;
};

function parseFaces(cell: string): number[] {
  const inner = stripDelimiters(cell, "[", "]");
  if (!inner) return [];
  return inner.split(",").map((face) => parseInteger(face, "face value"));
}

function parseCandidates(cell: string): PowerCandidate[] {
  const inner = stripDelimiters(cell, "{", "}");
  if (!inner) return [];
  return inner.split("|").map((entry) => {
    const sep = entry.indexOf(":");
    if (sep === -1) {
      throw new SchemaViolationError(SECTION, `Invalid power entry: "${entry}"`);
    }
    const name = entryName(entry.slice(0, sep));
    const [flag = "", rank = "", ...cost] = stripDelimiters(entry.slice(sep + 1), "[", "]").split(",");
    const flat = parseBoolean(flag);
    return {
      name,
      flat,
      rank: flat && !rank.trim() ? 0 : parseAward(rank, `rank of ${name}`),
      cost: cost.join(",").trim()
    };
  });
}

function parseBonus(cell: string | undefined): Record<string, number> {
  const bonus: Record<string, number> = {};
  if (!cell || !cell.trim()) return bonus;
  const inner = stripDelimiters(cell, "{", "}");
  if (!inner) return bonus;
  for (const entry of inner.split(/[,|]/)) {
    const sep = entry.indexOf(":");
    if (sep === -1) {
      throw new SchemaViolationError(SECTION, `Invalid bonus entry: "${entry}"`);
    }
    bonus[entryName(entry.slice(0, sep)).toLowerCase()] = parseAward(entry.slice(sep + 1), "bonus pp");
  }
  return bonus;
}

export function parsePowerTableRows(csvText: string): PowerTableRow[] {
  return parseCsvRows(csvText, SECTION, ";").map((row) => ({
    faces: parseFaces(row.value ?? ""),
    candidates: parseCandidates(row.powers ?? ""),
    pp: parseAward(row.pp ?? "", "pp"),
    bonus: parseBonus(row.bonus)
  }));
}

// ═══════════════════════════════════════════════════════════════════════════
// GENERATION & DRAW
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Map every declared face to its row. A face declared twice keeps the later row.
 */
export function generatePowerTable(rows: PowerTableRow[], superior: string | null): PowerTable {
  const faces: PowerTableFace[] = [];
  const normalizedSuperior = superior?.toLowerCase();

  for (const row of rows) {
    const override =
      normalizedSuperior !== undefined && Object.hasOwn(row.bonus, normalizedSuperior)
        ? row.bonus[normalizedSuperior]
        : undefined;
    const pp = override ?? row.pp;
    for (const face of row.faces) {
      const entry: PowerTableFace = { face, candidates: row.candidates, pp };
      const existing = faces.findIndex((f) => f.face === face);
      if (existing === -1) {
        faces.push(entry);
      } else {
        faces[existing] = entry;
      }
    }
  }

  return { faces };
}

export const createTablePower = (candidate: PowerCandidate, ordinal: number): Power => ({
  kind: "power",
  key: candidate.name,
  name: candidate.name,
  invariant: candidate.flat,
  cost: candidate.cost,
  ordinal,
  baseRank: candidate.flat ? 0 : 2 * candidate.rank,
  rank: 0
});

/**
 * Attempt `count` successful draws on the owner's table.
 * The first collision ends the whole sequence; committed draws are kept.
 */
export function drawPowers(owner: PowerOwner, count: number, random: RandomSource = Math.random): DrawReport {
  const table = owner.powerTable;
  if (!table) {
    throw new PreconditionError("Power table has not been generated");
  }
  const pool = owner.values[POWER_POOL_KEY];
  if (!pool) {
    throw new PreconditionError(`Side value ${POWER_POOL_KEY} is missing`);
  }

  const report: DrawReport = { successes: 0, aborted: false, faces: [] };
  if (table.faces.length === 0) return report;

  while (report.successes < count) {
    const drawn = table.faces[Math.floor(random() * table.faces.length)];
    report.faces.push(drawn.face);

    if (drawn.candidates.some((c) => Object.hasOwn(owner.powers, c.name))) {
      report.aborted = true;
      break;
    }

    pool.rank += drawn.pp;
    for (const candidate of drawn.candidates) {
      owner.powers[candidate.name] = createTablePower(candidate, Object.keys(owner.powers).length);
    }
    report.successes += 1;
  }

  return report;
}
