import type { Customer, GenerationContext, GeneratorResult, Interaction, Ticket, User } from "../types";
import { addMinutes, addSeconds, addHours, isValidDate, minDate } from "../utils/dates";
import {
  dailyTimeOfDay,
  generateCpcForSymptom,
  randomDate,
  valueWithAverageAndModifier,
} from "../utils/sampling";
import { validateInteraction } from "../validate/model_validator";
import { lookupParams } from "./lookup";

export function formatInteractionId(index: number): string {
  return `INT-${String(index).padStart(6, "0")}`;
}

/**
 * One interaction for FCR tickets, a CPC draw otherwise. Customer and handler
 * are drawn independently of the ticket's own owner and customer.
 */
export function generateInteractions(
  ctx: GenerationContext,
  tickets: Ticket[],
  users: User[],
  customers: Customer[]
): GeneratorResult<Interaction> {
  const { config, rng } = ctx;
  const rows: Interaction[] = [];
  const violations: string[] = [];
  let counter = 0;

  for (const ticket of tickets) {
    const count =
      ticket.fcr === 1
        ? 1
        : generateCpcForSymptom(rng, lookupParams(config.cpc_params, ticket.symptom_cat, "cpc_params", "interactions"));
    const modifier = lookupParams(
      config.handle_time_modifiers,
      ticket.symptom_cat,
      "handle_time_modifiers",
      "interactions"
    );

    const ticketCreated = isValidDate(ticket.ticket_created)
      ? ticket.ticket_created
      : randomDate(rng, config.start_date, config.end_date);
    const latestAllowed = minDate(config.end_date, addHours(ticketCreated, config.max_interaction_span_hours));
    const windowSeconds = Math.floor((latestAllowed.getTime() - ticketCreated.getTime()) / 1000);
    const window = { start: ticketCreated, end: latestAllowed };

    for (let k = 0; k < count; k++) {
      counter += 1;
      const customerId = rng.int(1, customers.length);
      const handledBy = rng.int(1, users.length);

      let created = ticketCreated;
      if (windowSeconds > 0) {
        const uniform = addSeconds(ticketCreated, rng.int(0, windowSeconds));
        const adjusted = dailyTimeOfDay(rng, uniform, config.peak_hours, config.active_hours);
        // The peak-hour shift can move the time off the ticket's window; keep the uniform draw then.
        const inWindow =
          adjusted.getTime() >= ticketCreated.getTime() && adjusted.getTime() <= latestAllowed.getTime();
        created = inWindow ? adjusted : uniform;
      }

      const handleTime = valueWithAverageAndModifier(rng, config.handle_time[ticket.origin], modifier);
      const speedOfAnswer = valueWithAverageAndModifier(rng, config.speed_of_answer[ticket.origin]);

      const interaction: Interaction = {
        interaction_id: formatInteractionId(counter),
        channel: ticket.origin,
        customer_id: customerId,
        interaction_created: created,
        handle_time: handleTime,
        speed_of_answer: speedOfAnswer,
        interaction_handled: addMinutes(created, handleTime),
        handled_by: handledBy,
        subject: "",
        body: "",
        ticket_id: ticket.ticket_id,
      };

      violations.push(...validateInteraction(interaction, window));
      rows.push(interaction);
    }
  }

  return { rows, violations };
}
