// src/services/settingsService.ts
import type { GradeBand, Repositories } from "../repositories/types";
import { ValidationError } from "../lib/errors";
import { isGradingPreset, validateScale } from "../utils/gradingScales";
import { activeGradingScale } from "./resultService";

export interface GradingPolicy {
  source: "custom" | "preset";
  preset: string;
  bands: GradeBand[];
}

export type GradingUpdate = { preset: string } | { bands: GradeBand[] };

export async function describeGrading(repos: Repositories, defaultScale: string): Promise<GradingPolicy> {
  const settings = await repos.settings.get();
  const preset = settings.gradingPreset && isGradingPreset(settings.gradingPreset) ? settings.gradingPreset : defaultScale;
  return {
    source: settings.gradingScale && settings.gradingScale.length > 0 ? "custom" : "preset",
    preset,
    bands: await activeGradingScale({ repos, defaultScale }),
  };
}

/**
 * Switches to a preset (dropping any custom bands) or saves a custom scale.
 * Stored results keep their grade until their marks are recorded again.
 */
export async function updateGrading(repos: Repositories, defaultScale: string, update: GradingUpdate): Promise<GradingPolicy> {
  const current = await repos.settings.get();

  if ("preset" in update) {
    if (!isGradingPreset(update.preset)) throw new ValidationError(`Unknown grading scale "${update.preset}"`);
    await repos.settings.save({ gradingPreset: update.preset, gradingScale: null });
  } else {
    await repos.settings.save({ gradingPreset: current.gradingPreset, gradingScale: validateScale(update.bands) });
  }

  return describeGrading(repos, defaultScale);
}
