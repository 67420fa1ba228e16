// Template archives on disk. A template is either a directory of
// `<section>.csv` files or a `.scx` zip holding the same entries.

import fs from "fs";
import path from "path";
import AdmZip from "adm-zip";
import type { Nature } from "@shared/rules/catalogue";
import type { ProfileArchive } from "@shared/rules/profile";

export const ARCHIVE_EXTENSION = ".scx";

export type ProfileKind = "superior" | "archetype";

export class ArchiveError extends Error {
  archive: string;

  constructor(archive: string, message: string) {
    super(message);
    this.name = "ArchiveError";
    this.archive = archive;
  }
}

export class DirectoryArchive implements ProfileArchive {
  readonly name: string;

  constructor(private readonly dir: string, name?: string) {
    this.name = name ?? path.basename(dir);
  }

  readSection(section: string): string | null {
    const filePath = path.join(this.dir, `${section}.csv`);
    if (!fs.existsSync(filePath)) return null;
    return fs.readFileSync(filePath, "utf8");
  }
}

export class ZipArchive implements ProfileArchive {
  readonly name: string;
  private readonly zip: AdmZip;

  constructor(source: string | Buffer, name?: string) {
    try {
      this.zip = new AdmZip(source);
    } catch (err) {
      const label = typeof source === "string" ? source : "in-memory archive";
      const reason = err instanceof Error ? err.message : String(err);
      throw new ArchiveError(label, `Unable to open ${label}: ${reason}`);
    }
    this.name = name ?? (typeof source === "string" ? path.basename(source, ARCHIVE_EXTENSION) : "archive");
  }

  readSection(section: string): string | null {
    const entry = this.zip.getEntry(`${section}.csv`);
    if (!entry) return null;
    return entry.getData().toString("utf8");
  }
}

export function openArchive(archivePath: string): ProfileArchive {
  if (!fs.existsSync(archivePath)) {
    throw new ArchiveError(archivePath, `Archive ${archivePath} not found`);
  }
  if (fs.statSync(archivePath).isDirectory()) {
    return new DirectoryArchive(archivePath);
  }
  if (path.extname(archivePath).toLowerCase() === ARCHIVE_EXTENSION) {
    return new ZipArchive(archivePath);
  }
  throw new ArchiveError(archivePath, `Unsupported archive: ${archivePath}`);
}

const kindDirectory = (kind: ProfileKind, nature: Nature): string => {
  if (kind === "archetype") return "archetypes";
  return nature === "Angel" ? "angels" : "demons";
};

const archiveName = (entry: string): string =>
  path.extname(entry).toLowerCase() === ARCHIVE_EXTENSION ? path.basename(entry, path.extname(entry)) : entry;

/** Names of the templates of one kind available for a nature. */
export function listProfiles(profilesDir: string, kind: ProfileKind, nature: Nature): string[] {
  const dir = path.join(profilesDir, kindDirectory(kind, nature));
  if (!fs.existsSync(dir)) return [];
  return fs
    .readdirSync(dir, { withFileTypes: true })
    .filter((entry) => entry.isDirectory() || path.extname(entry.name).toLowerCase() === ARCHIVE_EXTENSION)
    .map((entry) => archiveName(entry.name))
    .sort((a, b) => a.localeCompare(b));
}

/** Find a template by case-insensitive name. */
export function findProfileArchive(profilesDir: string, kind: ProfileKind, nature: Nature, name: string): ProfileArchive {
  const dir = path.join(profilesDir, kindDirectory(kind, nature));
  const wanted = name.trim().toLowerCase();
  const entries = fs.existsSync(dir) ? fs.readdirSync(dir) : [];
  const match = entries.find((entry) => archiveName(entry).toLowerCase() === wanted);
  if (!match) {
    throw new ArchiveError(name, `No ${kind} profile named ${name} for nature ${nature}`);
  }
  return openArchive(path.join(dir, match));
}
