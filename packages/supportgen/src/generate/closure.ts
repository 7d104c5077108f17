/**
 * Closure-time reconciliation: replaces the provisional closure of every
 * closed ticket with one derived from its interactions. Returns new ticket
 * objects; the inputs are left untouched.
 */

import { CLOSURE_ANCHORS, type ClosureAnchor } from "../config/schema";
import type { GenerationContext, Interaction, Ticket } from "../types";
import { addHours, diffHours } from "../utils/dates";
import { generateResolutionTime } from "../utils/sampling";
import { lookupParams } from "./lookup";

function isClosureAnchor(value: string): value is ClosureAnchor {
  return CLOSURE_ANCHORS.some((anchor) => anchor === value);
}

export function resolveClosureAnchor(ctx: GenerationContext): ClosureAnchor {
  const mode = ctx.config.anchor_closure_to;
  if (isClosureAnchor(mode)) return mode;
  ctx.logger.warn(`Unknown anchor_closure_to "${mode}", closing relative to the last interaction`);
  return "last_interaction";
}

function lastHandledByTicket(interactions: Interaction[]): Map<string, Date> {
  const latest = new Map<string, Date>();
  for (const interaction of interactions) {
    const handled = interaction.interaction_handled;
    if (Number.isNaN(handled.getTime())) continue;
    const current = latest.get(interaction.ticket_id);
    if (!current || handled.getTime() > current.getTime()) {
      latest.set(interaction.ticket_id, handled);
    }
  }
  return latest;
}

export function reconcileClosureTimes(
  ctx: GenerationContext,
  tickets: Ticket[],
  interactions: Interaction[]
): Ticket[] {
  const { config, rng } = ctx;
  const anchor = resolveClosureAnchor(ctx);
  const lastHandled = lastHandledByTicket(interactions);

  return tickets.map((ticket) => {
    if (ticket.status !== "closed") {
      return {
        ...ticket,
        last_interaction_time: null,
        resolution_after_last_interaction_hours: null,
        lifecycle_hours: null,
      };
    }

    const created = ticket.ticket_created;
    const lastInteraction = lastHandled.get(ticket.ticket_id) ?? created;
    const resolutionHours = generateResolutionTime(
      rng,
      lookupParams(config.resolution_time_params, ticket.symptom_cat, "resolution_time_params", "closure")
    );

    let closed = addHours(anchor === "from_creation" ? created : lastInteraction, resolutionHours);
    if (closed.getTime() < created.getTime()) {
      closed = addHours(created, Math.max(1, resolutionHours));
    }

    return {
      ...ticket,
      ticket_closed: closed,
      last_interaction_time: lastInteraction,
      resolution_after_last_interaction_hours: resolutionHours,
      lifecycle_hours: diffHours(closed, created),
    };
  });
}
