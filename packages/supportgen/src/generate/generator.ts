/**
 * Dataset driver. Runs every generator once, in dependency order, against a
 * single seeded RNG; reordering the stages changes every downstream row.
 */

import namePools from "../data/names.json";
import type { GeneratorConfig } from "../config/schema";
import type { GeneratedDataset, GenerationContext, NamePools, TableName } from "../types";
import { SeededRNG } from "../utils/seeded_rng";
import { createGenLogger, reportViolations, type GenLogger } from "../utils/logger";
import { generateUsers } from "./users";
import { generateCustomers } from "./customers";
import { generateTickets } from "./tickets";
import { generateInteractions } from "./interactions";
import { reconcileClosureTimes } from "./closure";
import { generateCalls, generateChats } from "./contacts";
import { generateWfm } from "./wfm";
import { generateQa } from "./qa";

export interface GenerateOptions {
  logger?: GenLogger;
  names?: NamePools;
}

export interface GenerationOutcome {
  dataset: GeneratedDataset;
  violations: Record<TableName, string[]>;
}

export const DEFAULT_NAME_POOLS: NamePools = namePools;

export function createContext(config: GeneratorConfig, options: GenerateOptions = {}): GenerationContext {
  return {
    config,
    rng: new SeededRNG(config.random_seed),
    logger: options.logger ?? createGenLogger(),
    names: options.names ?? DEFAULT_NAME_POOLS,
  };
}

export function generateDataset(config: GeneratorConfig, options: GenerateOptions = {}): GenerationOutcome {
  const ctx = createContext(config, options);
  const { logger } = ctx;

  const users = generateUsers(ctx);
  reportViolations(logger, "users", users.violations);
  logger.info(`Generated ${users.rows.length} users`);

  const customers = generateCustomers(ctx);
  reportViolations(logger, "customers", customers.violations);
  logger.info(`Generated ${customers.rows.length} customers`);

  const tickets = generateTickets(ctx, users.rows, customers.rows);
  reportViolations(logger, "tickets", tickets.violations);
  logger.info(`Generated ${tickets.rows.length} tickets`);

  const interactions = generateInteractions(ctx, tickets.rows, users.rows, customers.rows);
  reportViolations(logger, "interactions", interactions.violations);
  logger.info(`Generated ${interactions.rows.length} interactions`);

  const reconciled = reconcileClosureTimes(ctx, tickets.rows, interactions.rows);
  logger.info("Updated ticket closure times from interactions");

  const calls = generateCalls(ctx, interactions.rows);
  reportViolations(logger, "calls", calls.violations);
  logger.info(`Generated ${calls.rows.length} calls`);

  const chats = generateChats(ctx, interactions.rows);
  reportViolations(logger, "chats", chats.violations);
  logger.info(`Generated ${chats.rows.length} chats`);

  const wfm = generateWfm(ctx, users.rows);
  reportViolations(logger, "wfm", wfm.violations);
  logger.info(`Generated ${wfm.rows.length} WFM rows`);

  const qa = generateQa(ctx, interactions.rows);
  reportViolations(logger, "qa", qa.violations);
  logger.info(`Generated ${qa.rows.length} QA evaluations`);

  return {
    dataset: {
      users: users.rows,
      customers: customers.rows,
      tickets: reconciled,
      interactions: interactions.rows,
      calls: calls.rows,
      chats: chats.rows,
      wfm: wfm.rows,
      qa: qa.rows,
    },
    violations: {
      users: users.violations,
      customers: customers.violations,
      tickets: tickets.violations,
      interactions: interactions.violations,
      calls: calls.violations,
      chats: chats.violations,
      wfm: wfm.violations,
      qa: qa.violations,
    },
  };
}
