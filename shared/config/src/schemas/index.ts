/**
 * Zod Schema Validation for Config Objects and Boundary Payloads
 *
 * Runtime validation for everything that enters the analyzer from outside:
 * environment configuration, market snapshots read from the data store and
 * alerts posted by peers.
 *
 * ## Hot-Path Safety
 * Config schemas run once at startup. Snapshot and alert schemas run at the
 * adapter boundary; detectors trust their input after that.
 */

import { z } from 'zod';

// =============================================================================
// Primitive Schemas
// =============================================================================

/**
 * Percentage as decimal (0-1).
 */
const PercentageDecimalSchema = z
  .number()
  .min(0, 'Percentage cannot be negative')
  .max(1, 'Percentage cannot exceed 1 (100%)');

/**
 * Positive integer.
 */
const PositiveIntSchema = z
  .number()
  .int()
  .positive('Value must be a positive integer');

/**
 * Non-negative integer.
 */
const NonNegativeIntSchema = z
  .number()
  .int()
  .min(0, 'Value cannot be negative');

/**
 * Non-negative finite number (caps, factors, thresholds).
 */
const NonNegativeNumberSchema = z
  .number()
  .finite()
  .min(0, 'Value cannot be negative');

/**
 * Redis URL schema.
 */
const RedisUrlSchema = z
  .string()
  .regex(/^rediss?:\/\//, 'Redis URL must start with redis:// or rediss://');

/**
 * RPC URL schema (HTTP or HTTPS).
 */
const RpcUrlSchema = z
  .string()
  .regex(/^https?:\/\//, 'RPC URL must start with http:// or https://');

const OpportunityKindSchema = z.enum(['arbitrage', 'sandwich', 'liquidation']);

// =============================================================================
// Detection Policy Schemas
// =============================================================================

const ArbitragePolicySchema = z.object({
  /** Reference token0/token1 price ratio */
  referenceRatio: z.number().finite().positive('Reference ratio must be positive').default(2000),
  /** Relative deviation that must be exceeded (strictly) to fire */
  deviationThreshold: NonNegativeNumberSchema.default(0.01),
  /** estimatedValue = liquidity * deviation * valueFactor */
  valueFactor: NonNegativeNumberSchema.default(0.1),
  /** riskScore = deviation * riskMultiplier */
  riskMultiplier: NonNegativeNumberSchema.default(10),
  valueCap: NonNegativeNumberSchema.default(10),
  confidence: PercentageDecimalSchema.default(0.85),
});

const SandwichPolicySchema = z.object({
  priceImpactThreshold: NonNegativeNumberSchema.default(0.3),
  /** Pools at or above this liquidity are not sandwich candidates */
  liquidityThreshold: NonNegativeNumberSchema.default(1_000_000),
  /** Liquidity that maps to zero liquidity risk */
  liquidityNorm: z.number().finite().positive('Liquidity norm must be positive').default(10_000_000),
  /** estimatedValue = volume24h * volumeFactor * priceImpact */
  volumeFactor: NonNegativeNumberSchema.default(0.001),
  valueCap: NonNegativeNumberSchema.default(5),
  confidence: PercentageDecimalSchema.default(0.75),
});

const LiquidationPolicySchema = z.object({
  volatilityThreshold: NonNegativeNumberSchema.default(0.6),
  /** estimatedValue = volatility * volatilityMultiplier */
  volatilityMultiplier: NonNegativeNumberSchema.default(2.0),
  valueCap: NonNegativeNumberSchema.default(3),
  confidence: PercentageDecimalSchema.default(0.65),
});

const DetectionPolicySchema = z.object({
  arbitrage: ArbitragePolicySchema.default({}),
  sandwich: SandwichPolicySchema.default({}),
  liquidation: LiquidationPolicySchema.default({}),
});

const CorrelationPolicySchema = z.object({
  /** Disable to skip the enhancement stage entirely */
  enabled: z.boolean().default(true),
  /** Trailing window for same-pool history (ms) */
  windowMs: PositiveIntSchema.default(5 * 60 * 1000),
  /** Risk is raised when the window holds MORE than this many entries */
  triggerCount: NonNegativeIntSchema.default(2),
  riskBoost: PercentageDecimalSchema.default(0.2),
  confidenceBoost: PercentageDecimalSchema.default(0.1),
  /** Arbitrage confidence rule: estimatedValue must exceed this */
  highValueThreshold: NonNegativeNumberSchema.default(2.0),
  /** Arbitrage confidence rule: riskScore must be below this */
  lowRiskThreshold: PercentageDecimalSchema.default(0.5),
});

// =============================================================================
// Service Configuration Schema
// =============================================================================

const RedisConfigSchema = z.object({
  url: RedisUrlSchema.default('redis://localhost:6379'),
  /** Hash key prefix; one hash per pool */
  snapshotKeyPrefix: z.string().min(1).default('mev:snapshot:'),
  /** Stream that receives dispatched alerts */
  alertStream: z.string().min(1).default('stream:mev-alerts'),
  /** Approximate MAXLEN applied on XADD */
  alertStreamMaxLen: PositiveIntSchema.default(10_000),
});

export const AnalyzerConfigSchema = z
  .object({
    serviceName: z.string().min(1).default('mev-analyzer'),
    pools: z.array(z.string().min(1, 'Pool id cannot be empty')).default([]),
    cycleIntervalMs: PositiveIntSchema.default(1000),
    /** Opportunities with riskScore >= threshold are dispatched */
    alertThreshold: PercentageDecimalSchema.default(0.7),
    ledgerCapacity: PositiveIntSchema.default(100),
    fetchTimeoutMs: PositiveIntSchema.default(5000),
    dispatchTimeoutMs: PositiveIntSchema.default(5000),
    enhanceTimeoutMs: PositiveIntSchema.default(2000),
    shutdownTimeoutMs: PositiveIntSchema.default(10_000),
    externalAlertConfidence: PercentageDecimalSchema.default(0.8),
    /** Run external alerts through the enhancement stage as well */
    correlateExternal: z.boolean().default(false),
    detection: DetectionPolicySchema.default({}),
    correlation: CorrelationPolicySchema.default({}),
    redis: RedisConfigSchema.default({}),
    rpcUrl: RpcUrlSchema.optional(),
    healthCheckPort: z.number().int().min(1).max(65535).default(3010),
  })
  .superRefine((config, ctx) => {
    const { liquidityThreshold, liquidityNorm } = config.detection.sandwich;
    if (liquidityThreshold > liquidityNorm) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['detection', 'sandwich', 'liquidityThreshold'],
        message: `Liquidity threshold (${liquidityThreshold}) cannot exceed liquidity norm (${liquidityNorm})`,
      });
    }
  });

// =============================================================================
// Boundary Payload Schemas
// =============================================================================

/**
 * Market snapshot as stored in the data store. Values arrive as strings
 * (Redis hash fields), so they are coerced.
 */
export const MarketSnapshotSchema = z.object({
  token0Price: z.coerce.number().finite().min(0),
  token1Price: z.coerce.number().finite().min(0),
  volume24h: z.coerce.number().finite().min(0),
  liquidity: z.coerce.number().finite().min(0),
  priceImpact: z.coerce.number().finite().min(0),
  volatility: z.coerce.number().finite().min(0),
});

/**
 * Alert posted by a peer. Scores are clamped downstream, so only
 * types and non-negativity are enforced here.
 */
export const ExternalAlertSchema = z.object({
  poolId: z.string().min(1),
  kind: OpportunityKindSchema,
  estimatedValue: z.number().finite().min(0),
  riskScore: z.number().finite().min(0),
  blockReference: NonNegativeIntSchema,
  transactionRef: z.string().min(1).optional(),
});

export type AnalyzerConfig = z.output<typeof AnalyzerConfigSchema>;
export type AnalyzerConfigInput = z.input<typeof AnalyzerConfigSchema>;
export type DetectionPolicy = z.output<typeof DetectionPolicySchema>;
export type ArbitragePolicy = z.output<typeof ArbitragePolicySchema>;
export type SandwichPolicy = z.output<typeof SandwichPolicySchema>;
export type LiquidationPolicy = z.output<typeof LiquidationPolicySchema>;
export type CorrelationPolicy = z.output<typeof CorrelationPolicySchema>;
export type RedisConfig = z.output<typeof RedisConfigSchema>;
