import { z } from "zod";

export const sinceHoursSchema = z.coerce
  .number({ invalid_type_error: "since-hours must be a number" })
  .int("since-hours must be a whole number")
  .min(1, "since-hours must be at least 1")
  .max(720, "since-hours must be at most 720");

export const cutoffSchema = z
  .string()
  .refine(value => !Number.isNaN(Date.parse(value)), { message: "cutoff must be an ISO-8601 date" });

/**
 * ISO-8601 UTC with second precision and a literal `Z`, e.g. `2024-05-01T08:00:00Z`.
 */
export function toIsoSeconds(date: Date): string {
  return `${date.toISOString().slice(0, 19)}Z`;
}

/**
 * Cutoff for "new" events: the explicit value when given, else `now - sinceHours`.
 */
export function computeCutoff(sinceHours: number, now: Date = new Date(), explicit?: string): string {
  if (explicit) {
    return toIsoSeconds(new Date(cutoffSchema.parse(explicit)));
  }
  const hours = sinceHoursSchema.parse(sinceHours);
  return toIsoSeconds(new Date(now.getTime() - hours * 60 * 60 * 1000));
}
