/**
 * Cross-table integrity checks over a complete dataset. Unlike the row
 * checks in model_validator, a failure here is fatal to the caller.
 */

import { IntegrityError, toFailureReport, type FailureReport, type IntegrityErrorCode } from "../errors";
import type { GeneratedDataset } from "../types";
import type { GenLogger } from "../utils/logger";

type IntegrityCheck = {
  code: IntegrityErrorCode;
  reason: string;
  run: (dataset: GeneratedDataset) => string[];
};

const CHECKS: IntegrityCheck[] = [
  {
    code: "UNKNOWN_TICKET_OWNER",
    reason: "Tickets reference owners that are not users",
    run: ({ users, tickets }) => {
      const ids = new Set(users.map((u) => u.id));
      return tickets
        .filter((t) => !ids.has(t.ticket_owner))
        .map((t) => `${t.ticket_id}: ticket_owner ${t.ticket_owner}`);
    },
  },
  {
    code: "UNKNOWN_TICKET_CUSTOMER",
    reason: "Tickets reference customers that do not exist",
    run: ({ customers, tickets }) => {
      const ids = new Set(customers.map((c) => c.id));
      return tickets
        .filter((t) => !ids.has(t.customer_id))
        .map((t) => `${t.ticket_id}: customer_id ${t.customer_id}`);
    },
  },
  {
    code: "UNKNOWN_HANDLER",
    reason: "Interactions are handled by unknown users",
    run: ({ users, interactions }) => {
      const ids = new Set(users.map((u) => u.id));
      return interactions
        .filter((i) => !ids.has(i.handled_by))
        .map((i) => `${i.interaction_id}: handled_by ${i.handled_by}`);
    },
  },
  {
    code: "UNKNOWN_INTERACTION_CUSTOMER",
    reason: "Interactions reference customers that do not exist",
    run: ({ customers, interactions }) => {
      const ids = new Set(customers.map((c) => c.id));
      return interactions
        .filter((i) => !ids.has(i.customer_id))
        .map((i) => `${i.interaction_id}: customer_id ${i.customer_id}`);
    },
  },
  {
    code: "UNKNOWN_TICKET_REFERENCE",
    reason: "Interactions reference tickets that do not exist",
    run: ({ tickets, interactions }) => {
      const ids = new Set(tickets.map((t) => t.ticket_id));
      return interactions
        .filter((i) => !ids.has(i.ticket_id))
        .map((i) => `${i.interaction_id}: ticket_id ${i.ticket_id}`);
    },
  },
  {
    code: "FCR_INTERACTION_COUNT",
    reason: "FCR tickets must have exactly one interaction",
    run: ({ tickets, interactions }) => {
      const counts = new Map<string, number>();
      for (const interaction of interactions) {
        counts.set(interaction.ticket_id, (counts.get(interaction.ticket_id) ?? 0) + 1);
      }
      return tickets
        .filter((t) => t.fcr === 1 && (counts.get(t.ticket_id) ?? 0) !== 1)
        .map((t) => `${t.ticket_id}: ${counts.get(t.ticket_id) ?? 0} interaction(s)`);
    },
  },
  {
    code: "CLOSURE_BEFORE_CREATION",
    reason: "Closed tickets need a closure date no earlier than creation",
    run: ({ tickets }) =>
      tickets
        .filter((t) => t.status === "closed")
        .filter((t) => !t.ticket_closed || t.ticket_closed.getTime() < t.ticket_created.getTime())
        .map((t) => `${t.ticket_id}: ticket_closed ${t.ticket_closed ? t.ticket_closed.toISOString() : "missing"}`),
  },
  {
    code: "UNKNOWN_QA_INTERACTION",
    reason: "QA evaluations reference interactions that do not exist",
    run: ({ interactions, qa }) => {
      const ids = new Set(interactions.map((i) => i.interaction_id));
      return qa.filter((e) => !ids.has(e.interaction_id)).map((e) => `${e.eval_id}: ${e.interaction_id}`);
    },
  },
  {
    code: "UNKNOWN_WFM_USER",
    reason: "WFM rows reference unknown users",
    run: ({ users, wfm }) => {
      const ids = new Set(users.map((u) => u.id));
      return wfm.filter((w) => !ids.has(w.user_id)).map((w) => `${w.date}: user_id ${w.user_id}`);
    },
  },
];

/**
 * Runs every check in order and throws on the first one that finds
 * violations. The error carries all violations of that check.
 */
export function assertDataIntegrity(dataset: GeneratedDataset): void {
  for (const check of CHECKS) {
    const violations = check.run(dataset);
    if (violations.length > 0) {
      throw new IntegrityError({
        code: check.code,
        reason: `${check.reason} (${violations.length})`,
        violations,
      });
    }
  }
}

/** Logging wrapper: null when the dataset passes, otherwise the failure report. */
export function checkDataIntegrity(dataset: GeneratedDataset, logger: GenLogger): FailureReport | null {
  try {
    assertDataIntegrity(dataset);
  } catch (err) {
    const report = toFailureReport(err, "integrity");
    logger.error(`Data integrity check failed: ${report.reason}`);
    for (const violation of report.violations.slice(0, 5)) {
      logger.error(`  - ${violation}`);
    }
    return report;
  }
  logger.info("Data integrity check passed");
  return null;
}
