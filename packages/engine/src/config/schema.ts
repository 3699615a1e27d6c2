import { z } from 'zod';

/**
 * Strategy configuration schema.
 *
 * Values are coerced so the same schema validates programmatic objects and
 * string values read from the environment. Defaults are the usual scalping
 * parameter set (22/20/2.0/50/0.85, SMA 50, 0.3% target, 0.5% stop).
 */

export const StopPolicySchema = z.enum(['fixedAtEntry', 'tighteningOnly', 'recomputeEachTick']);

export type StopPolicy = z.infer<typeof StopPolicySchema>;

export const OrderKindSchema = z.enum(['LIMIT', 'MARKET']);

const fraction = () => z.coerce.number().gt(0).lt(1);

export const EngineConfigObjectSchema = z.object({
  tradingPair: z.string().min(1).default('BTC-USDT'),

  // Volatility indicator
  lookbackPeriod: z.coerce.number().int().min(1).default(22),
  bollingerLength: z.coerce.number().int().min(2).default(20),
  bollingerMultiplier: z.coerce.number().positive().default(2.0),
  percentileLookback: z.coerce.number().int().min(1).default(50),
  highPercentile: z.coerce.number().min(0).max(1).default(0.85),

  // Trend filter
  smaPeriod: z.coerce.number().int().min(1).default(50),

  // Orders
  orderAmount: z.coerce.number().positive().default(0.001),
  orderKind: OrderKindSchema.default('LIMIT'),
  profitTargetPct: fraction().default(0.003),
  initialStopLossPct: fraction().default(0.005),

  // Risk
  baseRiskAmount: z.coerce.number().positive().default(150),
  maxRiskAmount: z.coerce.number().positive().default(300),
  riskStepPerWin: z.coerce.number().min(0).default(0.25),
  initialPortfolioValue: z.coerce.number().positive().default(10_000),
  stopPolicy: StopPolicySchema.default('tighteningOnly'),

  // Histories
  historyCapacity: z.coerce.number().int().min(1).default(100),
  indicatorHistoryCapacity: z.coerce.number().int().min(1).optional(),

  /** Entries are suppressed for this long after an exit (0 disables) */
  cooldownMs: z.coerce.number().int().min(0).default(0),
});

export const EngineConfigSchema = EngineConfigObjectSchema.transform((cfg) => ({
  ...cfg,
  indicatorHistoryCapacity:
    cfg.indicatorHistoryCapacity ??
    Math.max(2 * cfg.lookbackPeriod, 2 * cfg.bollingerLength, cfg.percentileLookback),
})).superRefine((cfg, ctx) => {
  if (cfg.maxRiskAmount < cfg.baseRiskAmount) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['maxRiskAmount'],
      message: `maxRiskAmount (${cfg.maxRiskAmount}) must be >= baseRiskAmount (${cfg.baseRiskAmount})`,
    });
  }

  const priceWindow = Math.max(cfg.lookbackPeriod, cfg.smaPeriod);
  if (cfg.historyCapacity < priceWindow) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['historyCapacity'],
      message: `historyCapacity (${cfg.historyCapacity}) must hold lookbackPeriod and smaPeriod (${priceWindow})`,
    });
  }

  const indicatorWindow = Math.max(cfg.bollingerLength, cfg.percentileLookback);
  if (cfg.indicatorHistoryCapacity < indicatorWindow) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['indicatorHistoryCapacity'],
      message: `indicatorHistoryCapacity (${cfg.indicatorHistoryCapacity}) must hold bollingerLength and percentileLookback (${indicatorWindow})`,
    });
  }
});

export type EngineConfigInput = z.input<typeof EngineConfigSchema>;

export type EngineConfig = Readonly<z.output<typeof EngineConfigSchema>>;
