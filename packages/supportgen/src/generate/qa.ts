import type { Flag, GenerationContext, GeneratorResult, Interaction, QaEntry } from "../types";
import { clamp, round2 } from "../utils/sampling";
import { validateQaEntry } from "../validate/model_validator";

function flag(value: boolean): Flag {
  return value ? 1 : 0;
}

/**
 * Uniform sample of interactions without replacement. Any critical flag
 * forces a score of exactly 0.
 */
export function generateQa(ctx: GenerationContext, interactions: Interaction[]): GeneratorResult<QaEntry> {
  const { config, rng, logger } = ctx;
  const qa = config.qa;
  const evaluations = Math.floor(interactions.length * qa.sample_size);

  if (evaluations === 0) {
    logger.warn(
      `QA sample is empty: ${interactions.length} interaction(s) at sample_size ${qa.sample_size}`
    );
    return { rows: [], violations: [] };
  }

  // Timeline order only fixes which row each index refers to; the draw is uniform.
  const timeline = [...interactions].sort(
    (a, b) => a.interaction_created.getTime() - b.interaction_created.getTime()
  );
  const picked = rng.sampleIndices(timeline.length, evaluations).sort((a, b) => a - b);

  const rows: QaEntry[] = [];
  const violations: string[] = [];

  picked.forEach((index, n) => {
    const interaction = timeline[index];
    const customerCritical = rng.chance(qa.customer_critical_prob);
    const businessCritical = rng.chance(qa.business_critical_prob);
    const complianceCritical = rng.chance(qa.compliance_critical_prob);
    const score =
      customerCritical || businessCritical || complianceCritical
        ? 0
        : round2(clamp(rng.normal(qa.score_params.mean, qa.score_params.std), qa.score_params.min, qa.score_params.max));

    const entry: QaEntry = {
      eval_id: `QA-${String(n + 1).padStart(6, "0")}`,
      interaction_id: interaction.interaction_id,
      qa_score: score,
      customer_critical: flag(customerCritical),
      business_critical: flag(businessCritical),
      compliance_critical: flag(complianceCritical),
    };
    violations.push(...validateQaEntry(entry));
    rows.push(entry);
  });

  return { rows, violations };
}
