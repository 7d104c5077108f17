import { z } from "zod";

export const CHANNELS = ["email", "phone", "chat"] as const;
export const ChannelSchema = z.enum(CHANNELS);
export type Channel = z.infer<typeof ChannelSchema>;

export const TICKET_STATUSES = ["new", "open", "closed"] as const;
export const TicketStatusSchema = z.enum(TICKET_STATUSES);
export type TicketStatus = z.infer<typeof TicketStatusSchema>;

export const CLOSURE_ANCHORS = ["last_interaction", "from_creation"] as const;
export type ClosureAnchor = (typeof CLOSURE_ANCHORS)[number];

const probability = z.number().min(0).max(1);
const weight = z.number().nonnegative();
const weightTable = z.record(z.string(), weight);

/** low/high bound a value, avg is its target before any modifier. */
export const RangeParamsSchema = z.object({
  low: z.number(),
  high: z.number(),
  avg: z.number(),
});
export type RangeParams = z.infer<typeof RangeParamsSchema>;

const perChannel = <T extends z.ZodTypeAny>(schema: T) =>
  z.object({ email: schema, phone: schema, chat: schema });

export const SymptomEntrySchema = z.object({
  category: z.string().min(1),
  symptom: z.string().min(1),
  weight,
});
export type SymptomEntry = z.infer<typeof SymptomEntrySchema>;

export const FcrParamsSchema = z.object({
  mean: probability,
  deviation: z.number().nonnegative(),
});
export type FcrParams = z.infer<typeof FcrParamsSchema>;

export const BoundedNormalParamsSchema = z.object({
  min: z.number(),
  max: z.number(),
  mean: z.number(),
  std: z.number().nonnegative(),
});
export type BoundedNormalParams = z.infer<typeof BoundedNormalParamsSchema>;

export const PeakSchema = z.object({
  mean: z.number(),
  sd: z.number().nonnegative(),
  weight: probability,
});
export type Peak = z.infer<typeof PeakSchema>;

export const PeakHoursSchema = z.object({ morning: PeakSchema, evening: PeakSchema });
export type PeakHours = z.infer<typeof PeakHoursSchema>;

export const AbandonmentParamsSchema = z.object({
  avg: z.number(),
  sd: z.number().nonnegative(),
  low: z.number(),
  high: z.number(),
});
export type AbandonmentParams = z.infer<typeof AbandonmentParamsSchema>;

export const WfmFactorSchema = z.object({
  mean: z.number(),
  deviation: z.number().nonnegative(),
});
export type WfmFactor = z.infer<typeof WfmFactorSchema>;

export const QaParamsSchema = z.object({
  sample_size: probability,
  customer_critical_prob: probability,
  business_critical_prob: probability,
  compliance_critical_prob: probability,
  score_params: BoundedNormalParamsSchema,
});
export type QaParams = z.infer<typeof QaParamsSchema>;

const hourOfDay = z.number().int().min(0).max(23);

export const GeneratorConfigSchema = z
  .object({
    num_tickets: z.number().int().nonnegative(),
    unique_customers: z.number().int().positive(),
    unique_agents: z.number().int().positive(),
    random_seed: z.number().int(),
    start_date: z.coerce.date(),
    end_date: z.coerce.date(),
    max_interaction_span_hours: z.number().nonnegative(),
    escalation_rate: probability,
    // Unknown modes are tolerated and fall back to last_interaction at run time.
    anchor_closure_to: z.string(),
    channels: perChannel(weight),
    countries: weightTable,
    country_language: z.record(z.string(), z.string()),
    products: weightTable,
    statuses: z.object({ new: weight, open: weight, closed: weight }),
    symptoms: z.array(SymptomEntrySchema).min(1),
    fcr_params: z.record(z.string(), FcrParamsSchema),
    cpc_params: z.record(z.string(), BoundedNormalParamsSchema),
    resolution_time_params: z.record(z.string(), BoundedNormalParamsSchema),
    handle_time_modifiers: z.record(z.string(), z.number().positive()),
    handle_time: perChannel(RangeParamsSchema),
    speed_of_answer: perChannel(RangeParamsSchema),
    peak_hours: PeakHoursSchema,
    active_hours: z.tuple([hourOfDay, hourOfDay]),
    abandoned_params: z.object({ calls: AbandonmentParamsSchema, chats: AbandonmentParamsSchema }),
    abandoned_wait: RangeParamsSchema,
    user_start_window: z.object({ start: z.coerce.date(), end: z.coerce.date() }),
    rate_reference_date: z.coerce.date(),
    wfm_params: z.object({
      shrinkage: WfmFactorSchema,
      occupancy: WfmFactorSchema,
      utilization: WfmFactorSchema,
    }),
    qa: QaParamsSchema,
  })
  .superRefine((config, ctx) => {
    if (config.start_date.getTime() >= config.end_date.getTime()) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["end_date"],
        message: "end_date must be after start_date",
      });
    }
    if (config.user_start_window.start.getTime() >= config.user_start_window.end.getTime()) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["user_start_window", "end"],
        message: "user_start_window.end must be after user_start_window.start",
      });
    }
    if (config.active_hours[0] > config.active_hours[1]) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["active_hours"],
        message: "active_hours must be [first, last] with first <= last",
      });
    }

    const weightTables: Array<[string, number[]]> = [
      ["channels", Object.values(config.channels)],
      ["countries", Object.values(config.countries)],
      ["products", Object.values(config.products)],
      ["statuses", Object.values(config.statuses)],
      ["symptoms", config.symptoms.map((entry) => entry.weight)],
    ];
    for (const [tableName, weights] of weightTables) {
      if (weights.reduce((sum, w) => sum + w, 0) <= 0) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [tableName],
          message: "weights must have a positive total",
        });
      }
    }

    const tables = {
      fcr_params: config.fcr_params,
      cpc_params: config.cpc_params,
      resolution_time_params: config.resolution_time_params,
      handle_time_modifiers: config.handle_time_modifiers,
    };
    const categories = new Set(config.symptoms.map((entry) => entry.category));
    for (const category of categories) {
      for (const [tableName, table] of Object.entries(tables)) {
        if (!(category in table)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: [tableName],
            message: `missing entry for symptom category "${category}"`,
          });
        }
      }
    }

    for (const country of Object.keys(config.countries)) {
      if (!(country in config.country_language)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["country_language"],
          message: `missing language for country "${country}"`,
        });
      }
    }
  });

export type GeneratorConfig = z.infer<typeof GeneratorConfigSchema>;
export type GeneratorConfigInput = z.input<typeof GeneratorConfigSchema>;
