/**
 * Ticket generator. Owner and customer are uniform over the generated id
 * ranges; language follows the chosen customer's country.
 */

import { CHANNELS, TICKET_STATUSES } from "../config/schema";
import type { Customer, Flag, GenerationContext, GeneratorResult, Ticket, User } from "../types";
import { GenerationError } from "../errors";
import { addDays } from "../utils/dates";
import {
  generateFcrForSymptom,
  randomDate,
  weightedChoice,
  weightedChoiceFromTriples,
  weightedChoiceOf,
} from "../utils/sampling";
import { validateTicket } from "../validate/model_validator";
import { lookupParams } from "./lookup";

const MAX_PROVISIONAL_CLOSE_DAYS = 10;

export function formatTicketId(index: number): string {
  return `TKT-${String(index).padStart(5, "0")}`;
}

export function generateTickets(
  ctx: GenerationContext,
  users: User[],
  customers: Customer[]
): GeneratorResult<Ticket> {
  const { config, rng } = ctx;
  const rows: Ticket[] = [];
  const violations: string[] = [];

  const customersById = new Map<number, Customer>();
  customers.forEach((c) => customersById.set(c.id, c));

  const channelWeights = CHANNELS.map((c) => config.channels[c]);
  const statusWeights = TICKET_STATUSES.map((s) => config.statuses[s]);

  for (let i = 0; i < config.num_tickets; i++) {
    const ticketId = formatTicketId(i + 1);
    const owner = rng.int(1, users.length);
    const customerId = rng.int(1, customers.length);
    const origin = weightedChoiceOf(rng, CHANNELS, channelWeights);
    const product = weightedChoice(rng, config.products);
    const status = weightedChoiceOf(rng, TICKET_STATUSES, statusWeights);

    const customer = customersById.get(customerId);
    if (!customer) {
      throw new GenerationError("tickets", `${ticketId}: customer ${customerId} does not exist`);
    }
    if (!Object.hasOwn(config.country_language, customer.country)) {
      throw new GenerationError(
        "tickets",
        `${ticketId}: no language mapped for country "${customer.country}"`
      );
    }
    const language = config.country_language[customer.country];

    const { category, symptom } = weightedChoiceFromTriples(rng, config.symptoms);
    const fcr = generateFcrForSymptom(rng, lookupParams(config.fcr_params, category, "fcr_params", "tickets"));
    let escalated: Flag = 0;
    if (fcr === 0) {
      escalated = rng.chance(config.escalation_rate) ? 1 : 0;
    }

    const created = randomDate(rng, config.start_date, config.end_date);
    // Provisional; closure reconciliation replaces it once interactions exist.
    const closed =
      status === "closed" ? addDays(created, rng.int(0, MAX_PROVISIONAL_CLOSE_DAYS)) : null;

    const ticket: Ticket = {
      ticket_id: ticketId,
      origin,
      symptom_cat: category,
      symptom,
      status,
      product,
      ticket_owner: owner,
      customer_id: customerId,
      language,
      fcr,
      escalated,
      ticket_created: created,
      ticket_closed: closed,
      last_interaction_time: null,
      resolution_after_last_interaction_hours: null,
      lifecycle_hours: null,
    };

    violations.push(...validateTicket(ticket));
    rows.push(ticket);
  }

  return { rows, violations };
}
