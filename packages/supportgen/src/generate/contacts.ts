/**
 * Calls and chats. Answered records mirror phone/chat interactions 1:1;
 * abandoned records are extra rows with no interaction behind them.
 */

import type { Channel, ContactKind, ContactRecord, GenerationContext, GeneratorResult, Interaction } from "../types";
import { addSeconds } from "../utils/dates";
import { clamp, dailyTimeOfDay, randomDate, truncatedNormal } from "../utils/sampling";
import { validateContactRecord } from "../validate/model_validator";

const CONTACT_KINDS: Record<ContactKind, { channel: Channel; prefix: string }> = {
  calls: { channel: "phone", prefix: "CAL" },
  chats: { channel: "chat", prefix: "CHA" },
};

export function generateContactRecords(
  ctx: GenerationContext,
  interactions: Interaction[],
  kind: ContactKind
): GeneratorResult<ContactRecord> {
  const { config, rng } = ctx;
  const { channel, prefix } = CONTACT_KINDS[kind];
  const abandonment = config.abandoned_params[kind];
  const wait = config.abandoned_wait;

  // First draw of the stage.
  const rate = clamp(rng.normal(abandonment.avg, abandonment.sd), abandonment.low, abandonment.high);

  const matching = interactions.filter((i) => i.channel === channel);
  const rows: ContactRecord[] = [];

  for (const interaction of matching) {
    const initialized = dailyTimeOfDay(rng, interaction.interaction_created, config.peak_hours, config.active_hours);
    rows.push({
      id: `${prefix}-${interaction.interaction_id}`,
      initialized,
      answered: addSeconds(initialized, interaction.speed_of_answer),
      abandoned: null,
      is_abandoned: 0,
    });
  }

  const abandonedCount = Math.floor(matching.length * rate);
  for (let n = 1; n <= abandonedCount; n++) {
    const day = randomDate(rng, config.start_date, config.end_date);
    const initialized = dailyTimeOfDay(rng, day, config.peak_hours, config.active_hours);
    const waitSeconds = Math.trunc(truncatedNormal(rng, wait.avg, (wait.high - wait.low) / 6, wait.low, wait.high));
    rows.push({
      id: `${prefix}-ABD-${String(n).padStart(6, "0")}`,
      initialized,
      answered: null,
      abandoned: addSeconds(initialized, waitSeconds),
      is_abandoned: 1,
    });
  }

  const violations = rows.flatMap((row) => validateContactRecord(row));
  return { rows, violations };
}

export function generateCalls(ctx: GenerationContext, interactions: Interaction[]): GeneratorResult<ContactRecord> {
  return generateContactRecords(ctx, interactions, "calls");
}

export function generateChats(ctx: GenerationContext, interactions: Interaction[]): GeneratorResult<ContactRecord> {
  return generateContactRecords(ctx, interactions, "chats");
}
