import type { WfmFactor } from "../config/schema";
import type { GenerationContext, GeneratorResult, User, WfmEntry } from "../types";
import { addDays, formatDate, isWeekday, maxDate, parseDateOnly, startOfUtcDay } from "../utils/dates";
import { clamp, round2 } from "../utils/sampling";
import { validateWfmEntry } from "../validate/model_validator";

const MINUTES_PER_FULL_DAY = 8 * 60;

function sampleFactor(ctx: GenerationContext, factor: WfmFactor): number {
  return clamp(ctx.rng.normal(factor.mean, factor.deviation / 3), 0.1, 1.0);
}

/**
 * One row per (user, day) from the later of the run start and the user's
 * start date through end_date inclusive. Weekends carry null times; there
 * is no holiday calendar.
 */
export function generateWfm(ctx: GenerationContext, users: User[]): GeneratorResult<WfmEntry> {
  const { config } = ctx;
  const rows: WfmEntry[] = [];
  const violations: string[] = [];
  const lastDay = startOfUtcDay(config.end_date);

  for (const user of users) {
    const firstDay = startOfUtcDay(maxDate(config.start_date, parseDateOnly(user.start_date)));

    for (let day = firstDay; day.getTime() <= lastDay.getTime(); day = addDays(day, 1)) {
      const date = formatDate(day);
      let entry: WfmEntry;

      if (isWeekday(day)) {
        const scheduled = user.fte * MINUTES_PER_FULL_DAY;
        const shrinkage = sampleFactor(ctx, config.wfm_params.shrinkage);
        const occupancy = sampleFactor(ctx, config.wfm_params.occupancy);
        const utilization = sampleFactor(ctx, config.wfm_params.utilization);
        const available = scheduled * shrinkage;

        entry = {
          date,
          user_id: user.id,
          paid_time: scheduled,
          scheduled_time: scheduled,
          available_time: round2(available),
          interactions_time: round2(available * occupancy),
          productive_time: round2(scheduled * utilization),
        };
      } else {
        entry = {
          date,
          user_id: user.id,
          paid_time: null,
          scheduled_time: null,
          available_time: null,
          interactions_time: null,
          productive_time: null,
        };
      }

      violations.push(...validateWfmEntry(entry));
      rows.push(entry);
    }
  }

  return { rows, violations };
}
