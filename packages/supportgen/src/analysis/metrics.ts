/**
 * Read-only aggregates over a generated dataset, compared against the
 * configured targets. Nothing here mutates the dataset.
 */

import { CHANNELS, type Channel, type GeneratorConfig } from "../config/schema";
import type { ContactKind, ContactRecord, GeneratedDataset, TicketStatus } from "../types";

export interface SymptomFcr {
  category: string;
  tickets: number;
  fcr_rate: number;
  target: number | null;
}

export interface SymptomCpc {
  category: string;
  tickets: number;
  avg: number;
  min: number;
  max: number;
  target_mean: number | null;
}

export interface ChannelHandleTime {
  channel: Channel;
  interactions: number;
  avg_handle_time: number;
  target_avg: number;
  avg_speed_of_answer: number;
}

export interface SymptomHandleTime {
  category: string;
  interactions: number;
  avg_handle_time: number;
  modifier: number | null;
}

export interface AbandonmentStats {
  kind: ContactKind;
  total: number;
  abandoned: number;
  rate: number;
  target_avg: number;
  avg_wait_seconds: number | null;
}

export interface CountryShare {
  country: string;
  customers: number;
  share: number;
  target_share: number | null;
}

export interface WfmSummary {
  working_days: number;
  off_days: number;
  avg_paid_time: number | null;
  avg_available_time: number | null;
  avg_interactions_time: number | null;
  avg_productive_time: number | null;
}

export interface QaSummary {
  evaluations: number;
  avg_score: number | null;
  avg_non_critical_score: number | null;
  perfect_scores: number;
  customer_critical_rate: number;
  business_critical_rate: number;
  compliance_critical_rate: number;
}

export interface TicketSummary {
  total: number;
  by_status: Record<TicketStatus, number>;
  escalation_rate: number;
  avg_lifecycle_hours: number | null;
}

export interface DatasetReport {
  tickets: TicketSummary;
  fcr_by_symptom: SymptomFcr[];
  cpc_by_symptom: SymptomCpc[];
  handle_time_by_channel: ChannelHandleTime[];
  handle_time_by_symptom: SymptomHandleTime[];
  abandonment: AbandonmentStats[];
  countries: CountryShare[];
  fte_breakdown: Array<{ fte: number; agents: number }>;
  wfm: WfmSummary;
  qa: QaSummary;
}

function average(values: number[]): number | null {
  if (values.length === 0) return null;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

function ratio(part: number, whole: number): number {
  return whole === 0 ? 0 : part / whole;
}

function groupBy<T>(rows: readonly T[], key: (row: T) => string): Map<string, T[]> {
  const groups = new Map<string, T[]>();
  for (const row of rows) {
    const k = key(row);
    const bucket = groups.get(k);
    if (bucket) {
      bucket.push(row);
    } else {
      groups.set(k, [row]);
    }
  }
  return groups;
}

function lookup<T>(table: Record<string, T>, key: string): T | null {
  return Object.hasOwn(table, key) ? table[key] : null;
}

function summarizeTickets(dataset: GeneratedDataset): TicketSummary {
  const { tickets } = dataset;
  const byStatus: Record<TicketStatus, number> = { new: 0, open: 0, closed: 0 };
  for (const ticket of tickets) byStatus[ticket.status] += 1;

  const lifecycles = tickets.flatMap((t) => (t.lifecycle_hours === null ? [] : [t.lifecycle_hours]));
  const nonFcr = tickets.filter((t) => t.fcr === 0);
  return {
    total: tickets.length,
    by_status: byStatus,
    escalation_rate: ratio(nonFcr.filter((t) => t.escalated === 1).length, nonFcr.length),
    avg_lifecycle_hours: average(lifecycles),
  };
}

function summarizeContacts(kind: ContactKind, rows: ContactRecord[], config: GeneratorConfig): AbandonmentStats {
  const abandoned = rows.filter((r) => r.is_abandoned === 1);
  const waits = abandoned.flatMap((r) =>
    r.abandoned ? [(r.abandoned.getTime() - r.initialized.getTime()) / 1000] : []
  );
  return {
    kind,
    total: rows.length,
    abandoned: abandoned.length,
    rate: ratio(abandoned.length, rows.length),
    target_avg: config.abandoned_params[kind].avg,
    avg_wait_seconds: average(waits),
  };
}

function summarizeWfm(dataset: GeneratedDataset): WfmSummary {
  const paid: number[] = [];
  const available: number[] = [];
  const interactionsTime: number[] = [];
  const productive: number[] = [];
  let offDays = 0;

  for (const entry of dataset.wfm) {
    if (entry.paid_time === null) {
      offDays += 1;
      continue;
    }
    paid.push(entry.paid_time);
    available.push(entry.available_time);
    interactionsTime.push(entry.interactions_time);
    productive.push(entry.productive_time);
  }

  return {
    working_days: paid.length,
    off_days: offDays,
    avg_paid_time: average(paid),
    avg_available_time: average(available),
    avg_interactions_time: average(interactionsTime),
    avg_productive_time: average(productive),
  };
}

function summarizeQa(dataset: GeneratedDataset): QaSummary {
  const { qa } = dataset;
  const nonCritical = qa.filter(
    (e) => e.customer_critical === 0 && e.business_critical === 0 && e.compliance_critical === 0
  );
  return {
    evaluations: qa.length,
    avg_score: average(qa.map((e) => e.qa_score)),
    avg_non_critical_score: average(nonCritical.map((e) => e.qa_score)),
    perfect_scores: qa.filter((e) => e.qa_score === 1).length,
    customer_critical_rate: ratio(qa.filter((e) => e.customer_critical === 1).length, qa.length),
    business_critical_rate: ratio(qa.filter((e) => e.business_critical === 1).length, qa.length),
    compliance_critical_rate: ratio(qa.filter((e) => e.compliance_critical === 1).length, qa.length),
  };
}

export function buildReport(dataset: GeneratedDataset, config: GeneratorConfig): DatasetReport {
  const { tickets, interactions, customers, users } = dataset;

  const fcrBySymptom = [...groupBy(tickets, (t) => t.symptom_cat)].map(([category, rows]) => ({
    category,
    tickets: rows.length,
    fcr_rate: ratio(rows.filter((t) => t.fcr === 1).length, rows.length),
    target: lookup(config.fcr_params, category)?.mean ?? null,
  }));

  const interactionCounts = new Map<string, number>();
  for (const interaction of interactions) {
    interactionCounts.set(interaction.ticket_id, (interactionCounts.get(interaction.ticket_id) ?? 0) + 1);
  }
  const cpcBySymptom = [...groupBy(tickets, (t) => t.symptom_cat)].map(([category, rows]) => {
    const counts = rows.map((t) => interactionCounts.get(t.ticket_id) ?? 0);
    return {
      category,
      tickets: rows.length,
      avg: average(counts) ?? 0,
      min: Math.min(...counts),
      max: Math.max(...counts),
      target_mean: lookup(config.cpc_params, category)?.mean ?? null,
    };
  });

  const handleTimeByChannel = CHANNELS.map((channel) => {
    const rows = interactions.filter((i) => i.channel === channel);
    return {
      channel,
      interactions: rows.length,
      avg_handle_time: average(rows.map((i) => i.handle_time)) ?? 0,
      target_avg: config.handle_time[channel].avg,
      avg_speed_of_answer: average(rows.map((i) => i.speed_of_answer)) ?? 0,
    };
  });

  const symptomByTicket = new Map(tickets.map((t) => [t.ticket_id, t.symptom_cat]));
  const handleTimeBySymptom = [...groupBy(interactions, (i) => symptomByTicket.get(i.ticket_id) ?? "unknown")].map(
    ([category, rows]) => ({
      category,
      interactions: rows.length,
      avg_handle_time: average(rows.map((i) => i.handle_time)) ?? 0,
      modifier: lookup(config.handle_time_modifiers, category),
    })
  );

  const totalCountryWeight = Object.values(config.countries).reduce((sum, w) => sum + w, 0);
  const countries = [...groupBy(customers, (c) => c.country)]
    .map(([country, rows]) => {
      const weight = lookup(config.countries, country);
      return {
        country,
        customers: rows.length,
        share: ratio(rows.length, customers.length),
        target_share: weight === null ? null : ratio(weight, totalCountryWeight),
      };
    })
    .sort((a, b) => b.customers - a.customers || a.country.localeCompare(b.country));

  const fteBreakdown = [...groupBy(users, (u) => String(u.fte))]
    .map(([fte, rows]) => ({ fte: Number(fte), agents: rows.length }))
    .sort((a, b) => a.fte - b.fte);

  return {
    tickets: summarizeTickets(dataset),
    fcr_by_symptom: fcrBySymptom,
    cpc_by_symptom: cpcBySymptom,
    handle_time_by_channel: handleTimeByChannel,
    handle_time_by_symptom: handleTimeBySymptom,
    abandonment: [summarizeContacts("calls", dataset.calls, config), summarizeContacts("chats", dataset.chats, config)],
    countries,
    fte_breakdown: fteBreakdown,
    wfm: summarizeWfm(dataset),
    qa: summarizeQa(dataset),
  };
}

function pct(value: number): string {
  return `${(value * 100).toFixed(1)}%`;
}

function num(value: number | null, digits = 2): string {
  return value === null ? "n/a" : value.toFixed(digits);
}

export function formatReport(report: DatasetReport): string[] {
  const lines: string[] = [];
  const t = report.tickets;

  lines.push("Tickets");
  lines.push(`  total ${t.total} (new ${t.by_status.new}, open ${t.by_status.open}, closed ${t.by_status.closed})`);
  lines.push(`  escalation rate (non-FCR) ${pct(t.escalation_rate)}, avg lifecycle ${num(t.avg_lifecycle_hours)}h`);

  lines.push("FCR by symptom category");
  for (const row of report.fcr_by_symptom) {
    const target = row.target === null ? "n/a" : pct(row.target);
    lines.push(`  ${row.category}: ${pct(row.fcr_rate)} of ${row.tickets} (target ${target})`);
  }

  lines.push("Contacts per case");
  for (const row of report.cpc_by_symptom) {
    lines.push(
      `  ${row.category}: avg ${num(row.avg)} [${row.min}-${row.max}] (target ${num(row.target_mean)})`
    );
  }

  lines.push("Handle time by channel (minutes)");
  for (const row of report.handle_time_by_channel) {
    lines.push(
      `  ${row.channel}: avg ${num(row.avg_handle_time)} over ${row.interactions} (target ${num(row.target_avg)}), speed of answer ${num(row.avg_speed_of_answer)}`
    );
  }

  lines.push("Handle time by symptom category (minutes)");
  for (const row of report.handle_time_by_symptom) {
    lines.push(`  ${row.category}: avg ${num(row.avg_handle_time)} (modifier ${num(row.modifier)})`);
  }

  lines.push("Abandonment");
  for (const row of report.abandonment) {
    const wait = row.avg_wait_seconds === null ? "n/a" : `${num(row.avg_wait_seconds, 0)}s`;
    lines.push(
      `  ${row.kind}: ${row.abandoned}/${row.total} ${pct(row.rate)} (target ${pct(row.target_avg)}), avg wait ${wait}`
    );
  }

  lines.push("Customers by country");
  for (const row of report.countries) {
    const target = row.target_share === null ? "n/a" : pct(row.target_share);
    lines.push(`  ${row.country}: ${row.customers} ${pct(row.share)} (target ${target})`);
  }

  lines.push("Agents by FTE");
  for (const row of report.fte_breakdown) {
    lines.push(`  ${row.fte}: ${row.agents}`);
  }

  const w = report.wfm;
  lines.push("WFM");
  lines.push(`  working days ${w.working_days}, off days ${w.off_days}`);
  lines.push(
    `  avg paid ${num(w.avg_paid_time)}, available ${num(w.avg_available_time)}, interactions ${num(w.avg_interactions_time)}, productive ${num(w.avg_productive_time)}`
  );

  const q = report.qa;
  lines.push("QA");
  lines.push(`  evaluations ${q.evaluations}, avg score ${num(q.avg_score)}, non-critical avg ${num(q.avg_non_critical_score)}`);
  lines.push(
    `  critical rates: customer ${pct(q.customer_critical_rate)}, business ${pct(q.business_critical_rate)}, compliance ${pct(q.compliance_critical_rate)}; perfect scores ${q.perfect_scores}`
  );

  return lines;
}
