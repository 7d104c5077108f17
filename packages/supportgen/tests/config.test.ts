import { describe, it, expect } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { loadConfig, loadDefaultConfig, mergeConfig, parseConfig } from "../src/config/load_config";
import { ConfigError } from "../src/errors";

function configErrorOf(run: () => unknown): ConfigError {
  try {
    run();
  } catch (err) {
    if (err instanceof ConfigError) return err;
    throw err;
  }
  throw new Error("expected a ConfigError");
}

describe("loadDefaultConfig", () => {
  it("loads the bundled defaults", () => {
    const config = loadDefaultConfig();
    expect(config.num_tickets).toBe(25000);
    expect(config.unique_customers).toBe(6000);
    expect(config.unique_agents).toBe(12);
    expect(config.random_seed).toBe(42);
    expect(config.start_date.toISOString()).toBe("2023-09-15T00:00:00.000Z");
    expect(config.end_date.toISOString()).toBe("2025-08-21T00:00:00.000Z");
    expect(config.anchor_closure_to).toBe("last_interaction");
    expect(config.active_hours).toEqual([8, 22]);
    expect(config.symptoms).toHaveLength(13);
    expect(config.abandoned_params.calls).toEqual({ avg: 0.07, sd: 0.03, low: 0, high: 0.17 });
  });
});

describe("mergeConfig", () => {
  it("merges objects and replaces arrays", () => {
    const merged = mergeConfig(
      { a: { b: 1, c: 2 }, list: [1, 2, 3] },
      { a: { c: 5 }, list: [9] }
    );
    expect(merged).toEqual({ a: { b: 1, c: 5 }, list: [9] });
  });
});

describe("loadConfig", () => {
  it("applies nested overrides over the defaults", () => {
    const config = loadConfig(undefined, { random_seed: 7, qa: { sample_size: 0.5 } });
    expect(config.random_seed).toBe(7);
    expect(config.qa.sample_size).toBe(0.5);
    expect(config.qa.customer_critical_prob).toBe(0.02);
  });

  it("reads a JSON file and lets overrides win", () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "supportgen-config-"));
    const file = path.join(dir, "config.json");
    fs.writeFileSync(file, JSON.stringify({ num_tickets: 10, unique_agents: 4 }));

    const config = loadConfig(file, { unique_agents: 6 });
    expect(config.num_tickets).toBe(10);
    expect(config.unique_agents).toBe(6);
    expect(config.unique_customers).toBe(6000);

    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("rejects a file that is not JSON", () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "supportgen-config-"));
    const file = path.join(dir, "broken.json");
    fs.writeFileSync(file, "{ not json");

    expect(() => loadConfig(file)).toThrow(ConfigError);
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("rejects a missing file", () => {
    expect(() => loadConfig(path.join(os.tmpdir(), "supportgen-does-not-exist.json"))).toThrow(/Cannot read config file/);
  });

  it("reports a date window that ends before it starts", () => {
    const error = configErrorOf(() => loadConfig(undefined, { start_date: "2025-01-01", end_date: "2024-01-01" }));
    expect(error.issues).toContain("end_date: end_date must be after start_date");
  });

  it("requires parameters for every symptom category", () => {
    const defaults = loadDefaultConfig();
    const error = configErrorOf(() =>
      loadConfig(undefined, {
        symptoms: [...defaults.symptoms, { category: "warranty", symptom: "extension", weight: 0.01 }],
      })
    );
    expect(error.issues).toEqual([
      'fcr_params: missing entry for symptom category "warranty"',
      'cpc_params: missing entry for symptom category "warranty"',
      'resolution_time_params: missing entry for symptom category "warranty"',
      'handle_time_modifiers: missing entry for symptom category "warranty"',
    ]);
  });

  it("rejects weight tables that sum to zero", () => {
    const error = configErrorOf(() =>
      loadConfig(undefined, {
        countries: { UK: 0, Germany: 0, Austria: 0, Netherlands: 0, France: 0, Belgium: 0 },
      })
    );
    expect(error.issues).toEqual(["countries: weights must have a positive total"]);
  });

  it("rejects probabilities outside [0, 1]", () => {
    const error = configErrorOf(() => loadConfig(undefined, { escalation_rate: 1.5 }));
    expect(error.issues).toHaveLength(1);
    expect(error.issues[0].startsWith("escalation_rate: ")).toBe(true);
  });

  it("keeps an unknown closure anchor for the generator to resolve", () => {
    expect(loadConfig(undefined, { anchor_closure_to: "whenever" }).anchor_closure_to).toBe("whenever");
  });

  it("parses a plain object without touching the file system", () => {
    const config = parseConfig(mergeConfig(loadDefaultConfig(), { num_tickets: 3 }));
    expect(config.num_tickets).toBe(3);
    expect(config.start_date.toISOString()).toBe("2023-09-15T00:00:00.000Z");
  });
});
