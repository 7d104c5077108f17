#!/usr/bin/env tsx
/**
 * CLI for supportgen - synthetic customer-support dataset generator
 */

import { Command } from "commander";
import * as path from "path";
import { z } from "zod";
import { loadConfig, type ConfigOverrides } from "./config/load_config";
import { runPipeline } from "./run/run_pipeline";
import { toFailureReport, type FailureReport } from "./errors";
import { createGenLogger } from "./utils/logger";

const GenerateOptionsSchema = z.object({
  config: z.string().optional(),
  seed: z.coerce.number().int().optional(),
  tickets: z.coerce.number().int().nonnegative().optional(),
  customers: z.coerce.number().int().positive().optional(),
  agents: z.coerce.number().int().positive().optional(),
  start: z.string().optional(),
  end: z.string().optional(),
  out: z.string(),
  zip: z.boolean().default(false),
  checkIntegrity: z.boolean().default(false),
  report: z.boolean().default(true),
  quiet: z.boolean().default(false),
});

type GenerateOptions = z.infer<typeof GenerateOptionsSchema>;

function toOverrides(options: GenerateOptions): ConfigOverrides {
  const overrides: ConfigOverrides = {};
  if (options.seed !== undefined) overrides.random_seed = options.seed;
  if (options.tickets !== undefined) overrides.num_tickets = options.tickets;
  if (options.customers !== undefined) overrides.unique_customers = options.customers;
  if (options.agents !== undefined) overrides.unique_agents = options.agents;
  if (options.start !== undefined) overrides.start_date = options.start;
  if (options.end !== undefined) overrides.end_date = options.end;
  return overrides;
}

function fail(error: unknown, stage: string): void {
  printFailure(toFailureReport(error, stage));
}

function printFailure(report: FailureReport): void {
  console.error(`\n❌ ${report.stage_failed} failed: ${report.reason}`);
  for (const violation of report.violations.slice(0, 10)) {
    console.error(`   - ${violation}`);
  }
  console.error(`   ${report.next_action}`);
  process.exitCode = 1;
}

const program = new Command();

program
  .name("supportgen")
  .description("Synthetic customer-support dataset generator")
  .version("0.1.0");

program
  .command("generate")
  .description("Generate every table and write a CSV bundle")
  .option("-c, --config <path>", "JSON config file merged over the defaults")
  .option("-s, --seed <number>", "Random seed")
  .option("-t, --tickets <number>", "Number of tickets")
  .option("--customers <number>", "Number of unique customers")
  .option("--agents <number>", "Number of support agents")
  .option("--start <date>", "Start date (YYYY-MM-DD)")
  .option("--end <date>", "End date (YYYY-MM-DD)")
  .option("--out <dir>", "Output directory (default: ./support_runs)", "./support_runs")
  .option("--zip", "Also write a zip of the bundle")
  .option("--check-integrity", "Run cross-table integrity checks and fail on violations")
  .option("--no-report", "Skip the analysis report")
  .option("--quiet", "Only print the final result")
  .action((raw: unknown) => {
    const parsed = GenerateOptionsSchema.safeParse(raw);
    if (!parsed.success) {
      fail(new Error(parsed.error.issues.map((i) => `--${i.path.join(".")}: ${i.message}`).join("; ")), "arguments");
      return;
    }
    const options = parsed.data;

    let stage = "config";
    try {
      const config = loadConfig(options.config, toOverrides(options));
      stage = "generate";
      const result = runPipeline({
        config,
        outputDir: path.resolve(options.out),
        zip: options.zip,
        checkIntegrity: options.checkIntegrity,
        report: options.report,
        logger: createGenLogger({ quiet: options.quiet }),
      });

      console.log(`\n✅ Done!`);
      console.log(`   Bundle: ${result.bundlePath}`);
      if (result.zipPath) console.log(`   Zip: ${result.zipPath}`);

      if (result.integrityFailure) {
        printFailure(result.integrityFailure);
      }
    } catch (err) {
      fail(err, stage);
    }
  });

program
  .command("check-config")
  .description("Validate a config file against the schema")
  .argument("<path>", "JSON config file")
  .action((configPath: string) => {
    try {
      const config = loadConfig(configPath);
      console.log(
        `✅ ${configPath} is valid (seed=${config.random_seed}, tickets=${config.num_tickets}, agents=${config.unique_agents})`
      );
    } catch (err) {
      fail(err, "config");
    }
  });

program.parse();
