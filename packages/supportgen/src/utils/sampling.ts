/**
 * Sampling primitives shared by every generator. Each helper takes the run's
 * SeededRNG explicitly; none keeps state of its own.
 */

import type { SeededRNG } from "./seeded_rng";
import type {
  BoundedNormalParams,
  FcrParams,
  PeakHours,
  RangeParams,
  SymptomEntry,
} from "../config/schema";
import type { Flag } from "../types";
import { addDays, addSeconds, diffDays, isSunday } from "./dates";

const MAX_TRUNCNORM_ATTEMPTS = 1000;
const MAX_WEEKDAY_ATTEMPTS = 100;

export function clamp(value: number, low: number, high: number): number {
  return Math.max(low, Math.min(high, value));
}

export function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

export function weightedChoiceOf<K>(rng: SeededRNG, keys: readonly K[], weights: readonly number[]): K {
  return rng.weightedPick(keys, weights);
}

/** Weights are relative; they need not sum to 1. */
export function weightedChoice(rng: SeededRNG, weights: Record<string, number>): string {
  return weightedChoiceOf(rng, Object.keys(weights), Object.values(weights));
}

export function weightedChoiceFromTriples(
  rng: SeededRNG,
  entries: readonly SymptomEntry[]
): { category: string; symptom: string } {
  const entry = weightedChoiceOf(
    rng,
    entries,
    entries.map((e) => e.weight)
  );
  return { category: entry.category, symptom: entry.symptom };
}

/**
 * Rejection sampling inside [low, high]. After MAX_TRUNCNORM_ATTEMPTS misses a
 * final draw is clamped instead. Rounded to 2 decimals.
 */
export function truncatedNormal(rng: SeededRNG, mean: number, sd: number, low: number, high: number): number {
  for (let attempt = 0; attempt < MAX_TRUNCNORM_ATTEMPTS; attempt++) {
    const value = rng.normal(mean, sd);
    if (value >= low && value <= high) {
      return round2(value);
    }
  }
  return round2(clamp(rng.normal(mean, sd), low, high));
}

/**
 * Uniform second inside the whole-day span starting at `start`, redrawn while
 * it lands on a Sunday. Bounded; the last draw is moved a day forward or back
 * when that day is still inside the span, and kept as is otherwise.
 */
export function randomDate(rng: SeededRNG, start: Date, end: Date): Date {
  const spanSeconds = diffDays(end, start) * 86400;
  if (spanSeconds <= 0) {
    return new Date(start.getTime());
  }

  let candidate = addSeconds(start, rng.int(0, spanSeconds - 1));
  for (let attempt = 1; attempt < MAX_WEEKDAY_ATTEMPTS && isSunday(candidate); attempt++) {
    candidate = addSeconds(start, rng.int(0, spanSeconds - 1));
  }
  if (!isSunday(candidate)) {
    return candidate;
  }

  const forward = addDays(candidate, 1);
  if (forward.getTime() < addSeconds(start, spanSeconds).getTime()) {
    return forward;
  }
  const back = addDays(candidate, -1);
  return back.getTime() >= start.getTime() ? back : candidate;
}

/** Uniform whole day in [start, end), midnight UTC. */
export function randomDateOnly(rng: SeededRNG, start: Date, end: Date): Date {
  const days = diffDays(end, start);
  if (days <= 0) {
    return new Date(start.getTime());
  }
  return addDays(start, rng.int(0, days - 1));
}

/**
 * Keeps the calendar date of `base` and replaces its time with a bimodal
 * (morning/evening) hour clamped to the active window.
 */
export function dailyTimeOfDay(
  rng: SeededRNG,
  base: Date,
  peaks: PeakHours,
  activeHours: readonly [number, number]
): Date {
  const peak = rng.random() < peaks.morning.weight ? peaks.morning : peaks.evening;
  const hour = clamp(Math.trunc(rng.normal(peak.mean, peak.sd)), activeHours[0], activeHours[1]);
  const minute = rng.int(0, 59);
  const second = rng.int(0, 59);
  return new Date(
    Date.UTC(base.getUTCFullYear(), base.getUTCMonth(), base.getUTCDate(), hour, minute, second)
  );
}

export function valueWithAverageAndModifier(rng: SeededRNG, params: RangeParams, modifier = 1): number {
  const target = clamp(params.avg * modifier, params.low, params.high);
  const sd = (params.high - params.low) / 6;
  return truncatedNormal(rng, target, sd, params.low, params.high);
}

export function generateFcrForSymptom(rng: SeededRNG, params: FcrParams): Flag {
  const rate = clamp(rng.normal(params.mean, params.deviation / 3), 0, 1);
  return rng.random() < rate ? 1 : 0;
}

export function generateCpcForSymptom(rng: SeededRNG, params: BoundedNormalParams): number {
  return clamp(Math.round(rng.normal(params.mean, params.std)), params.min, params.max);
}

/** Hours, on half-hour steps. */
export function generateResolutionTime(rng: SeededRNG, params: BoundedNormalParams): number {
  const std = Math.max(params.std, (params.max - params.min) / 6);
  const hours = truncatedNormal(rng, params.mean, std, params.min, params.max);
  return Math.round(hours * 2) / 2;
}

export function calculateHourlyRate(rng: SeededRNG, startDate: Date, referenceDate: Date): number {
  const tenureYears = Math.max(0, diffDays(referenceDate, startDate)) / 365.25;
  const rate = rng.float(12, 14) + Math.min(tenureYears * 0.5, 2);
  return round2(Math.min(rate, 16));
}
