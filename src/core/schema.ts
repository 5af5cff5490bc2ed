import { z } from 'zod';
import { OptimizerConfig } from './types';

const yieldModelSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('zero') }),
  z.object({ kind: z.literal('constant'), apy: z.number().min(0) }),
  z.object({ kind: z.literal('emission-scaled'), dailyReturnPerEmission: z.number().min(0).optional() }),
  z.object({
    kind: z.literal('supply-calibrated'),
    calibration: z
      .array(z.object({ supply: z.number().positive(), stakedRatio: z.number().positive().max(1) }))
      .length(2)
      .optional()
  })
]);

export const optimizerConfigSchema = z.object({
  initialCapital: z.number().positive(),
  transactionCostBps: z.number().min(0),
  slippageBps: z.number().min(0),
  topN: z.number().int().min(1),
  riskFreeRate: z.number(),
  cadences: z
    .record(z.number().int().min(0))
    .refine((c) => Object.keys(c).length > 0, { message: 'at least one cadence is required' }),
  priceModel: z.object({
    dampingFactor: z.number().positive(),
    clipBound: z.number().positive(),
    basePrice: z.number().positive()
  }),
  minTradeValue: z.number().min(0),
  dustQuantity: z.number().min(0),
  yieldModel: yieldModelSchema,
  maxConcurrency: z.number().int().min(1),
  emissionsDir: z.string().min(1),
  resultsDir: z.string().min(1),
  weightScheduleFile: z.string().min(1).optional(),
  uiPort: z.number().int().min(0).max(65535),
  uiBind: z.string().min(1)
});

export const parseOptimizerConfig = (raw: unknown): OptimizerConfig => {
  const result = optimizerConfigSchema.safeParse(raw);
  if (!result.success) {
    const errors = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new Error(`Invalid optimizer config: ${errors.join('; ')}`);
  }
  return result.data;
};

const numericRecord = z.record(z.coerce.number());

export const emissionSampleSchema = z.object({
  block_timestamp_utc: z.string().refine((val) => !Number.isNaN(Date.parse(val)), {
    message: 'block_timestamp_utc must be an ISO timestamp'
  }),
  closest_block: z.coerce.number().int(),
  emissions: numericRecord,
  supplies: numericRecord.optional()
});

export const emissionFileSchema = z.object({
  samples: z.array(z.unknown())
});


export const weightScheduleSchema = z
  .array(
    z.object({
      effectiveDate: z.string().refine((val) => !Number.isNaN(Date.parse(val)), {
        message: 'effectiveDate must be an ISO date'
      }),
      weights: z.record(z.number().min(0))
    })
  )
  .nonempty();


const comparisonRowSchema = z.object({
  frequency: z.string(),
  cadenceHours: z.number(),
  totalReturnPct: z.number(),
  annualizedReturnPct: z.number(),
  volatilityPct: z.number(),
  sharpeRatio: z.number(),
  maxDrawdownPct: z.number(),
  rebalances: z.number(),
  transactionCosts: z.number(),
  transactionCostsPct: z.number(),
  trackingErrorPct: z.number(),
  finalNav: z.number(),
  days: z.number()
});

const dataQualityFlagSchema = z.object({
  code: z.string(),
  severity: z.enum(['info', 'warn', 'error']),
  message: z.string(),
  symbols: z.array(z.string()).optional(),
  observed: z.union([z.record(z.unknown()), z.string(), z.number(), z.array(z.string())]).optional()
});

// Shape of summary.json as read back by the report UI.
export const reportSummarySchema = z.object({
  generatedAt: z.string(),
  config: z.object({
    initialCapital: z.number(),
    transactionCostBps: z.number(),
    slippageBps: z.number(),
    topN: z.number(),
    riskFreeRate: z.number(),
    cadences: z.record(z.number())
  }),
  rows: z.array(comparisonRowSchema),
  recommended: comparisonRowSchema.optional(),
  excluded: z.array(z.object({ cadence: z.object({ label: z.string(), hours: z.number() }), reason: z.string() })),
  flags: z.array(dataQualityFlagSchema)
});
