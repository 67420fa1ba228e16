import type { Response } from "express";
import { PreconditionError, SchemaViolationError } from "@shared/rules/errors";
import { ArchiveError } from "../content/archive";
import { ServiceError } from "../services/character-service";

export function statusFor(err: unknown): number {
  if (err instanceof ServiceError) return err.status;
  if (err instanceof SchemaViolationError || err instanceof PreconditionError) return 400;
  if (err instanceof ArchiveError) return 404;
  return 500;
}

export function sendError(res: Response, err: unknown, fallback: string): void {
  const status = statusFor(err);
  const message = err instanceof Error ? err.message : fallback;
  if (status === 500) {
    console.error(`[server] ${fallback}`, err);
  }
  res.status(status).json({ error: message });
}
