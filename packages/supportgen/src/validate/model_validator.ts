/**
 * Row-local rule checks. Each returns human-readable messages and never
 * throws; the caller logs them and keeps the row.
 */

import { CHANNELS, TICKET_STATUSES } from "../config/schema";
import type { ContactRecord, Interaction, QaEntry, Ticket, User, WfmEntry } from "../types";

const TICKET_ID = /^TKT-\d{5,}$/;
const INTERACTION_ID = /^INT-\d{6,}$/;
const QA_ID = /^QA-\d{6,}$/;

function isFlag(value: number): boolean {
  return value === 0 || value === 1;
}

export function validateUser(user: User): string[] {
  const errors: string[] = [];
  if (user.fte < 0 || user.fte > 1) {
    errors.push(`User ${user.id}: fte ${user.fte} outside [0, 1]`);
  }
  if (user.hourly_rate_eur < 0) {
    errors.push(`User ${user.id}: negative hourly_rate_eur ${user.hourly_rate_eur}`);
  }
  if (user.status !== "active" && user.status !== "inactive") {
    errors.push(`User ${user.id}: unknown status ${String(user.status)}`);
  }
  return errors;
}

export function validateTicket(ticket: Ticket): string[] {
  const errors: string[] = [];
  const id = ticket.ticket_id;
  if (!TICKET_ID.test(id)) errors.push(`Ticket ${id}: malformed id`);
  if (!CHANNELS.includes(ticket.origin)) errors.push(`Ticket ${id}: unknown origin ${ticket.origin}`);
  if (!TICKET_STATUSES.includes(ticket.status)) errors.push(`Ticket ${id}: unknown status ${ticket.status}`);
  if (!isFlag(ticket.fcr)) errors.push(`Ticket ${id}: fcr must be 0 or 1`);
  if (!isFlag(ticket.escalated)) errors.push(`Ticket ${id}: escalated must be 0 or 1`);
  if (ticket.fcr === 1 && ticket.escalated === 1) {
    errors.push(`Ticket ${id}: escalated although resolved on first contact`);
  }
  if (ticket.status === "closed") {
    if (!ticket.ticket_closed) {
      errors.push(`Ticket ${id}: closed without ticket_closed`);
    } else if (ticket.ticket_closed.getTime() < ticket.ticket_created.getTime()) {
      errors.push(`Ticket ${id}: ticket_closed before ticket_created`);
    }
  }
  return errors;
}

/** `window` is the ticket's allowed span for interaction_created, when known. */
export function validateInteraction(interaction: Interaction, window?: { start: Date; end: Date }): string[] {
  const errors: string[] = [];
  const id = interaction.interaction_id;
  if (!INTERACTION_ID.test(id)) errors.push(`Interaction ${id}: malformed id`);
  if (interaction.handle_time < 0) errors.push(`Interaction ${id}: negative handle_time`);
  if (interaction.speed_of_answer < 0) errors.push(`Interaction ${id}: negative speed_of_answer`);
  if (interaction.interaction_handled.getTime() < interaction.interaction_created.getTime()) {
    errors.push(`Interaction ${id}: handled before created`);
  }
  if (window && window.end.getTime() >= window.start.getTime()) {
    const created = interaction.interaction_created.getTime();
    if (created < window.start.getTime() || created > window.end.getTime()) {
      errors.push(`Interaction ${id}: created outside its ticket's interaction window`);
    }
  }
  return errors;
}

export function validateContactRecord(record: ContactRecord): string[] {
  const errors: string[] = [];
  const id = record.id;
  if (record.is_abandoned === 1) {
    if (!record.abandoned) errors.push(`${id}: abandoned record without abandoned time`);
    if (record.answered) errors.push(`${id}: abandoned record has an answered time`);
    if (record.abandoned && record.abandoned.getTime() < record.initialized.getTime()) {
      errors.push(`${id}: abandoned before initialized`);
    }
  } else {
    if (!record.answered) errors.push(`${id}: answered record without answered time`);
    if (record.abandoned) errors.push(`${id}: answered record has an abandoned time`);
    if (record.answered && record.answered.getTime() < record.initialized.getTime()) {
      errors.push(`${id}: answered before initialized`);
    }
  }
  return errors;
}

export function validateWfmEntry(entry: WfmEntry): string[] {
  const values = [
    entry.paid_time,
    entry.scheduled_time,
    entry.available_time,
    entry.interactions_time,
    entry.productive_time,
  ];
  const populated = values.filter((v) => v !== null).length;
  const key = `WFM ${entry.user_id}/${entry.date}`;
  if (populated !== 0 && populated !== values.length) {
    return [`${key}: time fields partially populated`];
  }
  if (values.some((v) => v !== null && v < 0)) {
    return [`${key}: negative time value`];
  }
  return [];
}

export function validateQaEntry(entry: QaEntry): string[] {
  const errors: string[] = [];
  const id = entry.eval_id;
  if (!QA_ID.test(id)) errors.push(`QA ${id}: malformed id`);
  if (entry.qa_score < 0 || entry.qa_score > 1) errors.push(`QA ${id}: qa_score outside [0, 1]`);
  const critical = entry.customer_critical === 1 || entry.business_critical === 1 || entry.compliance_critical === 1;
  if (critical && entry.qa_score !== 0) {
    errors.push(`QA ${id}: critical evaluation must score 0`);
  }
  return errors;
}
