/**
 * Pipeline runner - generates the dataset, checks it, writes the CSV bundle
 */

import * as fs from "fs";
import * as path from "path";
import AdmZip from "adm-zip";
import type { GeneratorConfig } from "../config/schema";
import { generateDataset } from "../generate/generator";
import { exportTableCsv, tableFileName } from "../generate/exporters/tables";
import { buildReport, formatReport, type DatasetReport } from "../analysis/metrics";
import { checkDataIntegrity } from "../validate/integrity";
import type { FailureReport } from "../errors";
import { TABLE_NAMES, type TableName } from "../types";
import { createGenLogger, type GenLogger } from "../utils/logger";
import { formatDate } from "../utils/dates";

export interface PipelineOptions {
  config: GeneratorConfig;
  outputDir: string;
  zip?: boolean;
  checkIntegrity?: boolean;
  report?: boolean;
  logger?: GenLogger;
}

export interface BundleManifest {
  seed: number;
  start_date: string;
  end_date: string;
  anchor_closure_to: string;
  generated_at: string;
  files: string[];
  counts: Record<TableName, number>;
  violations: Record<TableName, number>;
}

export interface PipelineResult {
  bundlePath: string;
  zipPath: string | null;
  manifest: BundleManifest;
  report: DatasetReport | null;
  integrityFailure: FailureReport | null;
}

export function runPipeline(options: PipelineOptions): PipelineResult {
  const { config } = options;
  const logger = options.logger ?? createGenLogger();
  const startTime = Date.now();

  logger.info(
    `Generating support dataset (seed=${config.random_seed}, tickets=${config.num_tickets}, ` +
      `${formatDate(config.start_date)}..${formatDate(config.end_date)})`
  );

  // 1. Generate
  const { dataset, violations } = generateDataset(config, { logger });

  // 2. Integrity (opt-in)
  const integrityFailure = options.checkIntegrity ? checkDataIntegrity(dataset, logger) : null;

  // 3. Bundle directory
  const timestamp = new Date().toISOString().replace(/[:.]/g, "-").substring(0, 19);
  const bundleDir = path.join(options.outputDir, `support-${timestamp}-seed${config.random_seed}`);
  fs.mkdirSync(bundleDir, { recursive: true });

  // 4. CSVs
  const files: string[] = [];
  for (const table of TABLE_NAMES) {
    const fileName = tableFileName(table);
    fs.writeFileSync(path.join(bundleDir, fileName), exportTableCsv(dataset, table));
    files.push(fileName);
    logger.info(`Wrote ${fileName} (${dataset[table].length} rows)`);
  }

  // 5. Manifest
  const manifest: BundleManifest = {
    seed: config.random_seed,
    start_date: config.start_date.toISOString(),
    end_date: config.end_date.toISOString(),
    anchor_closure_to: config.anchor_closure_to,
    generated_at: new Date().toISOString(),
    files,
    counts: countByTable((t) => dataset[t].length),
    violations: countByTable((t) => violations[t].length),
  };
  fs.writeFileSync(path.join(bundleDir, "manifest.json"), JSON.stringify(manifest, null, 2));

  if (integrityFailure) {
    fs.writeFileSync(path.join(bundleDir, "integrity_failure.json"), JSON.stringify(integrityFailure, null, 2));
  }

  // 6. Report
  let report: DatasetReport | null = null;
  if (options.report ?? true) {
    report = buildReport(dataset, config);
    const lines = formatReport(report);
    fs.writeFileSync(path.join(bundleDir, "analysis_report.txt"), lines.join("\n") + "\n");
    lines.forEach((line) => logger.info(line));
  }

  // 7. Summary
  fs.writeFileSync(
    path.join(bundleDir, "run_summary.md"),
    generateSummary(manifest, integrityFailure, Date.now() - startTime)
  );

  // 8. Zip (opt-in)
  let zipPath: string | null = null;
  if (options.zip) {
    const zip = new AdmZip();
    zip.addLocalFolder(bundleDir);
    zipPath = `${bundleDir}.zip`;
    zip.writeZip(zipPath);
    logger.info(`Bundle zipped: ${zipPath}`);
  }

  logger.info(`Bundle written: ${bundleDir}`);

  return { bundlePath: bundleDir, zipPath, manifest, report, integrityFailure };
}

function countByTable(count: (table: TableName) => number): Record<TableName, number> {
  return {
    users: count("users"),
    customers: count("customers"),
    tickets: count("tickets"),
    interactions: count("interactions"),
    calls: count("calls"),
    chats: count("chats"),
    wfm: count("wfm"),
    qa: count("qa"),
  };
}

function generateSummary(manifest: BundleManifest, integrityFailure: FailureReport | null, durationMs: number): string {
  const lines: string[] = [];

  lines.push(`# Support Dataset Summary`);
  lines.push(``);
  lines.push(`**Seed**: ${manifest.seed}`);
  lines.push(`**Window**: ${manifest.start_date.substring(0, 10)} to ${manifest.end_date.substring(0, 10)}`);
  lines.push(`**Closure anchor**: ${manifest.anchor_closure_to}`);
  lines.push(`**Generated**: ${manifest.generated_at}`);
  lines.push(`**Duration**: ${(durationMs / 1000).toFixed(2)}s`);
  lines.push(``);

  lines.push(`## Dataset Counts`);
  lines.push(``);
  lines.push(`| Table | Rows | Validation issues |`);
  lines.push(`|-------|------|-------------------|`);
  for (const table of TABLE_NAMES) {
    lines.push(`| ${table} | ${manifest.counts[table]} | ${manifest.violations[table]} |`);
  }
  lines.push(``);

  if (integrityFailure) {
    lines.push(`## Integrity Failure`);
    lines.push(``);
    lines.push(`- **Reason**: ${integrityFailure.reason}`);
    for (const violation of integrityFailure.violations.slice(0, 10)) {
      lines.push(`- ${violation}`);
    }
    lines.push(``);
  }

  return lines.join("\n");
}
