import { describe, it, expect } from "vitest";
import { generateUsers } from "../src/generate/users";
import { generateCustomers } from "../src/generate/customers";
import { generateTickets } from "../src/generate/tickets";
import { generateInteractions, formatInteractionId } from "../src/generate/interactions";
import { buildTestConfig, makeTicket, quietContext } from "./helpers";

const HOUR = 3600000;

function generated() {
  const config = buildTestConfig();
  const ctx = quietContext(config);
  const users = generateUsers(ctx).rows;
  const customers = generateCustomers(ctx).rows;
  const tickets = generateTickets(ctx, users, customers).rows;
  const result = generateInteractions(ctx, tickets, users, customers);
  return { config, users, customers, tickets, result };
}

describe("generateInteractions", () => {
  it("numbers interactions sequentially", () => {
    const { result } = generated();
    expect(result.rows[0].interaction_id).toBe("INT-000001");
    expect(result.rows.map((i) => i.interaction_id)).toEqual(
      result.rows.map((_, index) => formatInteractionId(index + 1))
    );
  });

  it("matches the FCR rule and the CPC bounds", () => {
    const { config, tickets, result } = generated();
    const counts = new Map<string, number>();
    for (const interaction of result.rows) {
      counts.set(interaction.ticket_id, (counts.get(interaction.ticket_id) ?? 0) + 1);
    }

    for (const ticket of tickets) {
      const count = counts.get(ticket.ticket_id) ?? 0;
      if (ticket.fcr === 1) {
        expect(count).toBe(1);
      } else {
        const bounds = config.cpc_params[ticket.symptom_cat];
        expect(count).toBeGreaterThanOrEqual(bounds.min);
        expect(count).toBeLessThanOrEqual(bounds.max);
      }
    }
  });

  it("keeps every interaction inside its ticket's window", () => {
    const { config, tickets, result } = generated();
    const byId = new Map(tickets.map((t) => [t.ticket_id, t]));

    expect(result.violations).toEqual([]);
    for (const interaction of result.rows) {
      const ticket = byId.get(interaction.ticket_id);
      expect(ticket).toBeDefined();
      if (!ticket) continue;

      const created = ticket.ticket_created.getTime();
      const latest = Math.min(config.end_date.getTime(), created + config.max_interaction_span_hours * HOUR);
      expect(interaction.interaction_created.getTime()).toBeGreaterThanOrEqual(created);
      expect(interaction.interaction_created.getTime()).toBeLessThanOrEqual(latest);
      expect(interaction.channel).toBe(ticket.origin);
    }
  });

  it("derives handled time from handle_time and leaves text empty", () => {
    const { users, customers, result } = generated();
    for (const interaction of result.rows) {
      expect(interaction.interaction_handled.getTime()).toBe(
        interaction.interaction_created.getTime() + interaction.handle_time * 60000
      );
      expect(interaction.handled_by).toBeGreaterThanOrEqual(1);
      expect(interaction.handled_by).toBeLessThanOrEqual(users.length);
      expect(interaction.customer_id).toBeGreaterThanOrEqual(1);
      expect(interaction.customer_id).toBeLessThanOrEqual(customers.length);
      expect(interaction.subject).toBe("");
      expect(interaction.body).toBe("");
    }
  });

  it("falls back to a fresh creation date when the ticket's is invalid", () => {
    const config = buildTestConfig();
    const ctx = quietContext(config);
    const users = generateUsers(ctx).rows;
    const customers = generateCustomers(ctx).rows;
    const ticket = makeTicket({ fcr: 1, ticket_created: new Date(Number.NaN) });

    const { rows } = generateInteractions(ctx, [ticket], users, customers);
    expect(rows).toHaveLength(1);
    const created = rows[0].interaction_created.getTime();
    expect(Number.isNaN(created)).toBe(false);
    expect(created).toBeGreaterThanOrEqual(config.start_date.getTime());
    expect(created).toBeLessThanOrEqual(config.end_date.getTime());
  });

  it("uses the ticket creation time when the window is empty", () => {
    const config = buildTestConfig({ max_interaction_span_hours: 0 });
    const ctx = quietContext(config);
    const users = generateUsers(ctx).rows;
    const customers = generateCustomers(ctx).rows;
    const ticket = makeTicket({ fcr: 1 });

    const { rows } = generateInteractions(ctx, [ticket], users, customers);
    expect(rows[0].interaction_created.toISOString()).toBe("2024-01-01T10:00:00.000Z");
  });
});
