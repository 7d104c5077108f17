/**
 * Column order for every exported table.
 */

import type {
  ContactRecord,
  Customer,
  GeneratedDataset,
  Interaction,
  QaEntry,
  TableName,
  Ticket,
  User,
  WfmEntry,
} from "../../types";
import { toCsv } from "./csv_writer";

export const USER_COLUMNS = [
  "id",
  "full_name",
  "first_name",
  "last_name",
  "fte",
  "position",
  "start_date",
  "status",
  "hourly_rate_eur",
] as const satisfies ReadonlyArray<keyof User>;

export const CUSTOMER_COLUMNS = ["id", "name", "email", "phone", "country"] as const satisfies ReadonlyArray<
  keyof Customer
>;

export const TICKET_COLUMNS = [
  "ticket_id",
  "origin",
  "symptom_cat",
  "symptom",
  "status",
  "product",
  "ticket_owner",
  "customer_id",
  "language",
  "fcr",
  "escalated",
  "ticket_created",
  "ticket_closed",
  "last_interaction_time",
  "resolution_after_last_interaction_hours",
  "lifecycle_hours",
] as const satisfies ReadonlyArray<keyof Ticket>;

export const INTERACTION_COLUMNS = [
  "interaction_id",
  "channel",
  "customer_id",
  "interaction_created",
  "handle_time",
  "speed_of_answer",
  "interaction_handled",
  "handled_by",
  "subject",
  "body",
  "ticket_id",
] as const satisfies ReadonlyArray<keyof Interaction>;

export const CONTACT_COLUMNS = ["id", "initialized", "answered", "abandoned", "is_abandoned"] as const satisfies ReadonlyArray<
  keyof ContactRecord
>;

export const WFM_COLUMNS = [
  "date",
  "user_id",
  "paid_time",
  "scheduled_time",
  "available_time",
  "interactions_time",
  "productive_time",
] as const satisfies ReadonlyArray<keyof WfmEntry>;

export const QA_COLUMNS = [
  "eval_id",
  "interaction_id",
  "qa_score",
  "customer_critical",
  "business_critical",
  "compliance_critical",
] as const satisfies ReadonlyArray<keyof QaEntry>;

export function exportTableCsv(dataset: GeneratedDataset, table: TableName): string {
  switch (table) {
    case "users":
      return toCsv(dataset.users, USER_COLUMNS);
    case "customers":
      return toCsv(dataset.customers, CUSTOMER_COLUMNS);
    case "tickets":
      return toCsv(dataset.tickets, TICKET_COLUMNS);
    case "interactions":
      return toCsv(dataset.interactions, INTERACTION_COLUMNS);
    case "calls":
      return toCsv(dataset.calls, CONTACT_COLUMNS);
    case "chats":
      return toCsv(dataset.chats, CONTACT_COLUMNS);
    case "wfm":
      return toCsv(dataset.wfm, WFM_COLUMNS);
    case "qa":
      return toCsv(dataset.qa, QA_COLUMNS);
  }
}

export function tableFileName(table: TableName): string {
  return `${table}_table.csv`;
}
