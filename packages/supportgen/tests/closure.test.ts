import { describe, it, expect } from "vitest";
import { reconcileClosureTimes } from "../src/generate/closure";
import { buildTestConfig, makeInteraction, makeTicket, quietContext } from "./helpers";

// A degenerate range pins the sampled resolution time to exactly 10 hours.
function contextFor(anchor: string) {
  return quietContext(
    buildTestConfig({
      anchor_closure_to: anchor,
      resolution_time_params: {
        finance: { min: 10, max: 10, mean: 10, std: 0 },
      },
    })
  );
}

const interactions = [
  makeInteraction({ interaction_id: "INT-000001", interaction_handled: new Date("2024-01-01T11:00:00Z") }),
  makeInteraction({ interaction_id: "INT-000002", interaction_handled: new Date("2024-01-01T12:30:00Z") }),
];

describe("reconcileClosureTimes", () => {
  it("closes relative to the last handled interaction", () => {
    const [ticket] = reconcileClosureTimes(contextFor("last_interaction"), [makeTicket()], interactions);

    expect(ticket.last_interaction_time?.toISOString()).toBe("2024-01-01T12:30:00.000Z");
    expect(ticket.ticket_closed?.toISOString()).toBe("2024-01-01T22:30:00.000Z");
    expect(ticket.resolution_after_last_interaction_hours).toBe(10);
    expect(ticket.lifecycle_hours).toBe(12.5);
  });

  it("closes relative to creation in from_creation mode", () => {
    const [ticket] = reconcileClosureTimes(contextFor("from_creation"), [makeTicket()], interactions);

    expect(ticket.last_interaction_time?.toISOString()).toBe("2024-01-01T12:30:00.000Z");
    expect(ticket.ticket_closed?.toISOString()).toBe("2024-01-01T20:00:00.000Z");
    expect(ticket.lifecycle_hours).toBe(10);
  });

  it("falls back to last_interaction for an unknown mode and warns once", () => {
    const ctx = contextFor("whenever");
    const [ticket] = reconcileClosureTimes(ctx, [makeTicket()], interactions);

    expect(ticket.ticket_closed?.toISOString()).toBe("2024-01-01T22:30:00.000Z");
    const warnings = ctx.logger.entries.filter((e) => e.level === "warn");
    expect(warnings).toHaveLength(1);
    expect(warnings[0].message).toContain('"whenever"');
  });

  it("uses creation as the last interaction when there are none", () => {
    const [ticket] = reconcileClosureTimes(contextFor("last_interaction"), [makeTicket()], []);

    expect(ticket.last_interaction_time?.toISOString()).toBe("2024-01-01T10:00:00.000Z");
    expect(ticket.ticket_closed?.toISOString()).toBe("2024-01-01T20:00:00.000Z");
  });

  it("never closes before creation", () => {
    const early = [makeInteraction({ interaction_handled: new Date("2023-12-31T20:00:00Z") })];
    const [ticket] = reconcileClosureTimes(contextFor("last_interaction"), [makeTicket()], early);

    expect(ticket.ticket_closed?.toISOString()).toBe("2024-01-01T20:00:00.000Z");
    expect(ticket.lifecycle_hours).toBe(10);
  });

  it("clears the derived fields of tickets that are not closed", () => {
    const open = makeTicket({ status: "open", ticket_closed: null });
    const [ticket] = reconcileClosureTimes(contextFor("last_interaction"), [open], interactions);

    expect(ticket.ticket_closed).toBeNull();
    expect(ticket.last_interaction_time).toBeNull();
    expect(ticket.resolution_after_last_interaction_hours).toBeNull();
    expect(ticket.lifecycle_hours).toBeNull();
  });

  it("returns new tickets and leaves its input untouched", () => {
    const original = makeTicket();
    const [ticket] = reconcileClosureTimes(contextFor("last_interaction"), [original], interactions);

    expect(ticket).not.toBe(original);
    expect(original.ticket_closed?.toISOString()).toBe("2024-01-03T10:00:00.000Z");
    expect(original.last_interaction_time).toBeNull();
    expect(original.lifecycle_hours).toBeNull();
  });

  it("only looks at interactions of the same ticket", () => {
    const other = [makeInteraction({ ticket_id: "TKT-00002", interaction_handled: new Date("2024-01-05T00:00:00Z") })];
    const [ticket] = reconcileClosureTimes(contextFor("last_interaction"), [makeTicket()], other);
    expect(ticket.last_interaction_time?.toISOString()).toBe("2024-01-01T10:00:00.000Z");
  });
});
