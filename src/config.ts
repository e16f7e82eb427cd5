import { z } from 'zod';
import { InvalidConfigurationError } from './errors';

const rate = z.number().finite().nonnegative();

const pointSchema = z
  .object({
    x: z.number().finite(),
    y: z.number().finite(),
  })
  .strict();

const DEFAULT_GENTLE_SLOPE_PERCENT = 5;
const DEFAULT_MODERATE_SLOPE_PERCENT = 10;

function clamp(value: number, lo: number, hi: number): number {
  return Math.min(Math.max(value, lo), hi);
}

const gradingConfigObject = z
  .object({
    gridSizeFt: z.number().finite().positive().default(10),
    targetElevationFt: z.number().finite().optional(),
    padOutline: z.array(pointSchema).min(3).optional(),
    defaultSlopePercent: z.number().finite().nonnegative().default(0),
    maxSlopePercent: z.number().finite().positive().default(15),
    minSlopePercent: z.number().finite().nonnegative().default(0.5),
    gentleSlopePercent: z.number().finite().nonnegative().optional(),
    moderateSlopePercent: z.number().finite().nonnegative().optional(),
    excavationCostPerCy: rate.default(15),
    fillCostPerCy: rate.default(25),
    compactionCostPerCy: rate.default(8),
    haulCostPerCyFt: rate.default(0.01),
    importCostPerCy: rate.default(35),
    exportCostPerCy: rate.default(20),
    balanceToleranceFt: z.number().finite().nonnegative().default(0.01),
    connectivity: z.union([z.literal(4), z.literal(8)]).default(4),
    haulDistanceMetric: z.enum(['euclidean', 'manhattan']).default('euclidean'),
    haulStrategy: z.enum(['sorted', 'naive']).default('sorted'),
    compactionFactor: z.number().finite().min(1).default(1.15),
  })
  .strict();

/**
 * Only min < max is required of the thresholds. The gentle and moderate
 * breaks are checked when given; otherwise their defaults are clamped into
 * [min, max] so any valid min/max pair resolves.
 */
export const gradingConfigSchema = gradingConfigObject
  .superRefine((cfg, ctx) => {
    if (cfg.minSlopePercent >= cfg.maxSlopePercent) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['minSlopePercent'],
        message: 'must be less than maxSlopePercent',
      });
      return;
    }
    const gentle = cfg.gentleSlopePercent;
    const moderate = cfg.moderateSlopePercent;
    if (gentle !== undefined && (gentle < cfg.minSlopePercent || gentle > (moderate ?? cfg.maxSlopePercent))) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['gentleSlopePercent'],
        message: 'must lie between minSlopePercent and moderateSlopePercent',
      });
    }
    if (moderate !== undefined && (moderate < (gentle ?? cfg.minSlopePercent) || moderate > cfg.maxSlopePercent)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['moderateSlopePercent'],
        message: 'must lie between gentleSlopePercent and maxSlopePercent',
      });
    }
  })
  .transform(cfg => {
    const gentleSlopePercent = cfg.gentleSlopePercent ??
      clamp(DEFAULT_GENTLE_SLOPE_PERCENT, cfg.minSlopePercent, cfg.moderateSlopePercent ?? cfg.maxSlopePercent);
    const moderateSlopePercent = cfg.moderateSlopePercent ??
      clamp(DEFAULT_MODERATE_SLOPE_PERCENT, gentleSlopePercent, cfg.maxSlopePercent);
    return { ...cfg, gentleSlopePercent, moderateSlopePercent };
  });

export type GradingConfigInput = z.input<typeof gradingConfigSchema>;
export type GradingConfig = Readonly<z.output<typeof gradingConfigSchema>>;

export type HaulDistanceMetric = GradingConfig['haulDistanceMetric'];
export type HaulStrategy = GradingConfig['haulStrategy'];

/**
 * Validates a partial configuration and fills in defaults. The returned value
 * is frozen; callers derive variants by spreading it into a new input.
 */
export function resolveGradingConfig(input: GradingConfigInput = {}): GradingConfig {
  const parsed = gradingConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new InvalidConfigurationError(
      parsed.error.issues.map(issue => {
        const path = issue.path.join('.');
        return path ? `${path}: ${issue.message}` : issue.message;
      })
    );
  }

  const cfg = parsed.data;
  if (cfg.padOutline) Object.freeze(cfg.padOutline);
  return Object.freeze(cfg);
}

export const DEFAULT_GRADING_CONFIG: GradingConfig = resolveGradingConfig();
