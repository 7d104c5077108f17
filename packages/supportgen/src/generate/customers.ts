import type { Customer, GenerationContext, GeneratorResult } from "../types";
import { weightedChoice } from "../utils/sampling";

function emailLocalPart(value: string): string {
  return value.toLowerCase().replace(/[^a-z0-9]+/g, "");
}

export function generateCustomers(ctx: GenerationContext): GeneratorResult<Customer> {
  const { config, rng, names } = ctx;
  const rows: Customer[] = [];

  for (let i = 0; i < config.unique_customers; i++) {
    const id = i + 1;
    const firstName = rng.pick(names.first_names);
    const lastName = rng.pick(names.last_names);
    const domain = rng.pick(names.email_domains);
    const country = weightedChoice(rng, config.countries);
    const phone = `+${rng.int(10, 99)} ${rng.int(100, 999)} ${String(rng.int(0, 9999999)).padStart(7, "0")}`;

    rows.push({
      id,
      name: `${firstName} ${lastName}`,
      email: `${emailLocalPart(firstName)}.${emailLocalPart(lastName)}.${id}@${domain}`,
      phone,
      country,
    });
  }

  return { rows, violations: [] };
}
