import { describe, it, expect } from "vitest";
import { generateWfm } from "../src/generate/wfm";
import { generateQa } from "../src/generate/qa";
import { formatInteractionId } from "../src/generate/interactions";
import type { User } from "../src/types";
import { buildTestConfig, makeInteraction, quietContext } from "./helpers";

function user(id: number, fte: number, startDate: string): User {
  return {
    id,
    full_name: `Agent ${id}`,
    first_name: "Agent",
    last_name: String(id),
    fte,
    position: "support_agent",
    start_date: startDate,
    status: "active",
    hourly_rate_eur: 13,
  };
}

const fixedFactors = {
  shrinkage: { mean: 0.85, deviation: 0 },
  occupancy: { mean: 0.8, deviation: 0 },
  utilization: { mean: 0.75, deviation: 0 },
};

describe("generateWfm", () => {
  // 2024-01-01 is a Monday; the 6th/7th and 13th/14th are weekends.
  const config = buildTestConfig({ start_date: "2024-01-01", end_date: "2024-01-14", wfm_params: fixedFactors });
  const users = [user(1, 0.75, "2023-06-01"), user(2, 1, "2024-01-08")];

  it("covers every day from the later start through end_date", () => {
    const { rows, violations } = generateWfm(quietContext(config), users);

    expect(violations).toEqual([]);
    expect(rows.filter((r) => r.user_id === 1)).toHaveLength(14);
    expect(rows.filter((r) => r.user_id === 2)).toHaveLength(7);
    expect(rows.filter((r) => r.user_id === 2)[0].date).toBe("2024-01-08");
    expect(rows[rows.length - 1].date).toBe("2024-01-14");
  });

  it("leaves weekend rows empty", () => {
    const { rows } = generateWfm(quietContext(config), users);
    const weekend = rows.filter((r) => r.paid_time === null);

    expect(weekend.map((r) => `${r.user_id}:${r.date}`)).toEqual([
      "1:2024-01-06",
      "1:2024-01-07",
      "1:2024-01-13",
      "1:2024-01-14",
      "2:2024-01-13",
      "2:2024-01-14",
    ]);
    for (const row of weekend) {
      expect([row.scheduled_time, row.available_time, row.interactions_time, row.productive_time]).toEqual([
        null,
        null,
        null,
        null,
      ]);
    }
  });

  it("scales working days by fte and the sampled factors", () => {
    const { rows } = generateWfm(quietContext(config), users);
    const partTime = rows.find((r) => r.user_id === 1 && r.date === "2024-01-02");
    const fullTime = rows.find((r) => r.user_id === 2 && r.date === "2024-01-08");

    expect(partTime).toEqual({
      date: "2024-01-02",
      user_id: 1,
      paid_time: 360,
      scheduled_time: 360,
      available_time: 306,
      interactions_time: 244.8,
      productive_time: 270,
    });
    expect(fullTime).toEqual({
      date: "2024-01-08",
      user_id: 2,
      paid_time: 480,
      scheduled_time: 480,
      available_time: 408,
      interactions_time: 326.4,
      productive_time: 360,
    });
  });

  it("clamps factors to [0.1, 1]", () => {
    const extreme = buildTestConfig({
      start_date: "2024-01-01",
      end_date: "2024-01-14",
      wfm_params: {
        shrinkage: { mean: 3, deviation: 0 },
        occupancy: { mean: -1, deviation: 0 },
        utilization: { mean: 0.5, deviation: 0 },
      },
    });
    const { rows } = generateWfm(quietContext(extreme), [user(1, 1, "2020-01-01")]);
    const monday = rows.find((r) => r.date === "2024-01-01");
    expect(monday?.available_time).toBe(480);
    expect(monday?.interactions_time).toBe(48);
    expect(monday?.productive_time).toBe(240);
  });
});

describe("generateQa", () => {
  const interactions = Array.from({ length: 200 }, (_, i) =>
    makeInteraction({
      interaction_id: formatInteractionId(i + 1),
      interaction_created: new Date(Date.UTC(2024, 0, 1, 0, 200 - i)),
    })
  );

  it("returns an empty result with a warning when the sample rounds to zero", () => {
    const ctx = quietContext(buildTestConfig());
    const { rows, violations } = generateQa(ctx, interactions.slice(0, 10));

    expect(rows).toEqual([]);
    expect(violations).toEqual([]);
    expect(ctx.logger.entries.some((e) => e.level === "warn" && e.message.startsWith("QA sample is empty"))).toBe(true);
  });

  it("samples floor(N x sample_size) distinct interactions", () => {
    const ctx = quietContext(buildTestConfig({ qa: { sample_size: 0.1 } }));
    const { rows, violations } = generateQa(ctx, interactions);

    expect(violations).toEqual([]);
    expect(rows).toHaveLength(20);
    expect(rows.map((r) => r.eval_id)).toEqual(
      Array.from({ length: 20 }, (_, i) => `QA-${String(i + 1).padStart(6, "0")}`)
    );
    expect(new Set(rows.map((r) => r.interaction_id)).size).toBe(20);
    for (const row of rows) {
      expect(row.qa_score).toBeGreaterThanOrEqual(0);
      expect(row.qa_score).toBeLessThanOrEqual(1);
      if (row.customer_critical || row.business_critical || row.compliance_critical) {
        expect(row.qa_score).toBe(0);
      }
    }
  });

  it("scores every critical evaluation at exactly zero", () => {
    const ctx = quietContext(
      buildTestConfig({
        qa: { sample_size: 0.1, customer_critical_prob: 1, business_critical_prob: 0, compliance_critical_prob: 0 },
      })
    );
    const { rows } = generateQa(ctx, interactions);
    expect(rows.every((r) => r.customer_critical === 1 && r.qa_score === 0)).toBe(true);
    expect(rows.every((r) => r.business_critical === 0 && r.compliance_critical === 0)).toBe(true);
  });

  it("uses the clamped score distribution when nothing is critical", () => {
    const ctx = quietContext(
      buildTestConfig({
        qa: {
          sample_size: 0.1,
          customer_critical_prob: 0,
          business_critical_prob: 0,
          compliance_critical_prob: 0,
          score_params: { mean: 0.85, std: 0, min: 0, max: 1 },
        },
      })
    );
    const { rows } = generateQa(ctx, interactions);
    expect(rows.map((r) => r.qa_score)).toEqual(Array.from({ length: 20 }, () => 0.85));
  });
});
