import type { GenerationContext, GeneratorResult, User } from "../types";
import { calculateHourlyRate, randomDateOnly } from "../utils/sampling";
import { formatDate } from "../utils/dates";
import { validateUser } from "../validate/model_validator";

const PART_TIME_AGENTS = 2;
const PART_TIME_FTE = 0.75;

/**
 * Support agents with sequential ids. The first two are part-time; the rule
 * is positional, not sampled.
 */
export function generateUsers(ctx: GenerationContext): GeneratorResult<User> {
  const { config, rng, names } = ctx;
  const rows: User[] = [];
  const violations: string[] = [];

  for (let i = 0; i < config.unique_agents; i++) {
    const firstName = rng.pick(names.first_names);
    const lastName = rng.pick(names.last_names);
    const startDate = randomDateOnly(rng, config.user_start_window.start, config.user_start_window.end);

    const user: User = {
      id: i + 1,
      full_name: `${firstName} ${lastName}`,
      first_name: firstName,
      last_name: lastName,
      fte: i < PART_TIME_AGENTS ? PART_TIME_FTE : 1.0,
      position: "support_agent",
      start_date: formatDate(startDate),
      status: "active",
      hourly_rate_eur: calculateHourlyRate(rng, startDate, config.rate_reference_date),
    };

    violations.push(...validateUser(user));
    rows.push(user);
  }

  return { rows, violations };
}
