/**
 * Row types for every generated table. Field names follow the exported
 * column names.
 */

import type { GeneratorConfig, Channel, TicketStatus } from "./config/schema";
import type { SeededRNG } from "./utils/seeded_rng";
import type { GenLogger } from "./utils/logger";

export type { Channel, TicketStatus } from "./config/schema";

export type Flag = 0 | 1;

export interface User {
  id: number;
  full_name: string;
  first_name: string;
  last_name: string;
  fte: number;
  position: string;
  start_date: string; // YYYY-MM-DD
  status: "active" | "inactive";
  hourly_rate_eur: number;
}

export interface Customer {
  id: number;
  name: string;
  email: string;
  phone: string;
  country: string;
}

export interface Ticket {
  ticket_id: string;
  origin: Channel;
  symptom_cat: string;
  symptom: string;
  status: TicketStatus;
  product: string;
  ticket_owner: number;
  customer_id: number;
  language: string;
  fcr: Flag;
  escalated: Flag;
  ticket_created: Date;
  ticket_closed: Date | null;
  last_interaction_time: Date | null;
  resolution_after_last_interaction_hours: number | null;
  lifecycle_hours: number | null;
}

export interface Interaction {
  interaction_id: string;
  channel: Channel;
  customer_id: number;
  interaction_created: Date;
  handle_time: number; // minutes
  speed_of_answer: number;
  interaction_handled: Date;
  handled_by: number;
  subject: string;
  body: string;
  ticket_id: string;
}

export interface ContactRecord {
  id: string;
  initialized: Date;
  answered: Date | null;
  abandoned: Date | null;
  is_abandoned: Flag;
}

export type Call = ContactRecord;
export type Chat = ContactRecord;
export type ContactKind = "calls" | "chats";

type WfmTimes = {
  paid_time: number;
  scheduled_time: number;
  available_time: number;
  interactions_time: number;
  productive_time: number;
};

type WfmOffTimes = { [K in keyof WfmTimes]: null };

export type WfmEntry = { date: string; user_id: number } & (WfmTimes | WfmOffTimes);

export interface QaEntry {
  eval_id: string;
  interaction_id: string;
  qa_score: number;
  customer_critical: Flag;
  business_critical: Flag;
  compliance_critical: Flag;
}

export interface GeneratedDataset {
  users: User[];
  customers: Customer[];
  tickets: Ticket[];
  interactions: Interaction[];
  calls: Call[];
  chats: Chat[];
  wfm: WfmEntry[];
  qa: QaEntry[];
}

export type TableName = keyof GeneratedDataset;

export const TABLE_NAMES: readonly TableName[] = [
  "users",
  "customers",
  "tickets",
  "interactions",
  "calls",
  "chats",
  "wfm",
  "qa",
];

/** Rows plus the soft-validation messages collected while producing them. */
export interface GeneratorResult<T> {
  rows: T[];
  violations: string[];
}

export interface NamePools {
  first_names: string[];
  last_names: string[];
  email_domains: string[];
}

export interface GenerationContext {
  config: GeneratorConfig;
  rng: SeededRNG;
  logger: GenLogger;
  names: NamePools;
}
