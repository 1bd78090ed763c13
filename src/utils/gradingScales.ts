// src/utils/gradingScales.ts
import type { GradeBand } from "../repositories/types";
import { ValidationError } from "../lib/errors";

export const GRADING_PRESETS = {
  "four-band": [
    { min: 70, grade: "A", remark: "Excellent" },
    { min: 55, grade: "C", remark: "Credit" },
    { min: 40, grade: "P", remark: "Pass" },
    { min: 0, grade: "F", remark: "Fail" },
  ],
  "six-band": [
    { min: 70, grade: "A", remark: "Excellent" },
    { min: 60, grade: "B", remark: "Very Good" },
    { min: 50, grade: "C", remark: "Good" },
    { min: 45, grade: "D", remark: "Fair" },
    { min: 40, grade: "E", remark: "Pass" },
    { min: 0, grade: "F", remark: "Fail" },
  ],
} satisfies Record<string, GradeBand[]>;

export type GradingPresetName = keyof typeof GRADING_PRESETS;

export const isGradingPreset = (name: string): name is GradingPresetName =>
  Object.prototype.hasOwnProperty.call(GRADING_PRESETS, name);

export function presetScale(name: string): GradeBand[] {
  if (!isGradingPreset(name)) {
    throw new ValidationError(
      `Unknown grading scale "${name}". Expected one of: ${Object.keys(GRADING_PRESETS).join(", ")}`
    );
  }
  return GRADING_PRESETS[name];
}

// Bands are matched on the highest `min` the total reaches; thresholds are inclusive.
export function resolveGrade(total: number, scale: GradeBand[]): { grade: string; remark: string } {
  const sorted = [...scale].sort((a, b) => b.min - a.min);
  const band = sorted.find((b) => total >= b.min) ?? sorted[sorted.length - 1];
  return { grade: band.grade, remark: band.remark };
}

export function validateScale(bands: GradeBand[]): GradeBand[] {
  if (bands.length === 0) throw new ValidationError("Grading scale needs at least one band");

  const mins = new Set<number>();
  for (const band of bands) {
    if (!Number.isInteger(band.min) || band.min < 0 || band.min > 100) {
      throw new ValidationError(`Band minimum must be an integer between 0 and 100 (got ${band.min})`);
    }
    if (!band.grade.trim()) throw new ValidationError("Every band needs a grade letter");
    if (mins.has(band.min)) throw new ValidationError(`Duplicate band minimum ${band.min}`);
    mins.add(band.min);
  }
  if (!mins.has(0)) throw new ValidationError("Grading scale must include a band starting at 0");

  return [...bands]
    .map((b) => ({ min: b.min, grade: b.grade.trim().toUpperCase(), remark: b.remark.trim() }))
    .sort((a, b) => b.min - a.min);
}
