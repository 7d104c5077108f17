import { loadConfig, type ConfigOverrides } from "../src/config/load_config";
import type { GeneratorConfig } from "../src/config/schema";
import { createContext } from "../src/generate/generator";
import type { GenerationContext, Interaction, Ticket } from "../src/types";
import { createGenLogger } from "../src/utils/logger";

export function buildTestConfig(overrides: ConfigOverrides = {}): GeneratorConfig {
  return loadConfig(undefined, {
    num_tickets: 200,
    unique_customers: 50,
    unique_agents: 5,
    start_date: "2024-01-01",
    end_date: "2024-03-31",
    ...overrides,
  });
}

export function quietContext(config: GeneratorConfig = buildTestConfig()): GenerationContext {
  return createContext(config, { logger: createGenLogger({ quiet: true }) });
}

export function makeTicket(overrides: Partial<Ticket> = {}): Ticket {
  return {
    ticket_id: "TKT-00001",
    origin: "email",
    symptom_cat: "finance",
    symptom: "payment details",
    status: "closed",
    product: "amplifier",
    ticket_owner: 1,
    customer_id: 1,
    language: "english",
    fcr: 0,
    escalated: 0,
    ticket_created: new Date("2024-01-01T10:00:00Z"),
    ticket_closed: new Date("2024-01-03T10:00:00Z"),
    last_interaction_time: null,
    resolution_after_last_interaction_hours: null,
    lifecycle_hours: null,
    ...overrides,
  };
}

export function makeInteraction(overrides: Partial<Interaction> = {}): Interaction {
  return {
    interaction_id: "INT-000001",
    channel: "phone",
    customer_id: 1,
    interaction_created: new Date("2024-01-02T09:00:00Z"),
    handle_time: 5,
    speed_of_answer: 30,
    interaction_handled: new Date("2024-01-02T09:05:00Z"),
    handled_by: 1,
    subject: "",
    body: "",
    ticket_id: "TKT-00001",
    ...overrides,
  };
}
