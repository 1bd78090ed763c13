// Shared mark arithmetic: parsing, clamping, totals and grade lookup.
import type { GradeBand } from "../repositories/types";
import { ValidationError } from "../lib/errors";
import { resolveGrade } from "./gradingScales";

export const CA_MAX = 10;
export const EXAM_MAX = 60;

export const MARK_FIELDS = ["ca1", "ca2", "ca3", "ca4", "exam"] as const;
export type MarkField = (typeof MARK_FIELDS)[number];
export type Marks = Record<MarkField, number>;

export interface ScoredMarks extends Marks {
  total: number;
  grade: string;
  remark: string;
}

export const clampMark = (value: number, max: number) => Math.max(0, Math.min(max, value));

/**
 * Turns raw form/CSV input into an integer mark. Out-of-range integers are
 * left for the caller to clamp; anything that is not an integer is rejected.
 */
export function parseMark(raw: unknown, field: string): number {
  let value: number;
  if (typeof raw === "number") {
    value = raw;
  } else if (typeof raw === "string" && raw.trim() !== "") {
    value = Number(raw.trim());
  } else {
    throw new ValidationError(`${field} is required`, { field });
  }

  if (!Number.isFinite(value)) {
    throw new ValidationError(`${field} must be a number (got "${String(raw)}")`, { field });
  }
  if (!Number.isInteger(value)) {
    throw new ValidationError(`${field} must be a whole number (got ${value})`, { field });
  }
  return value;
}

export function parseMarks(raw: Record<MarkField, unknown>): Marks {
  return {
    ca1: parseMark(raw.ca1, "ca1"),
    ca2: parseMark(raw.ca2, "ca2"),
    ca3: parseMark(raw.ca3, "ca3"),
    ca4: parseMark(raw.ca4, "ca4"),
    exam: parseMark(raw.exam, "exam"),
  };
}

export function scoreMarks(marks: Marks, scale: GradeBand[]): ScoredMarks {
  const clamped: Marks = {
    ca1: clampMark(marks.ca1, CA_MAX),
    ca2: clampMark(marks.ca2, CA_MAX),
    ca3: clampMark(marks.ca3, CA_MAX),
    ca4: clampMark(marks.ca4, CA_MAX),
    exam: clampMark(marks.exam, EXAM_MAX),
  };
  const total = clamped.ca1 + clamped.ca2 + clamped.ca3 + clamped.ca4 + clamped.exam;
  return { ...clamped, total, ...resolveGrade(total, scale) };
}
