/**
 * MEV Analyzer Configuration
 *
 * Builds the analyzer configuration from environment variables plus explicit
 * overrides, then validates it with the zod schemas. Every detector threshold,
 * cap and correlation rule is part of this surface so policy can be tuned
 * without code changes.
 *
 * Invalid values are fatal: loadAnalyzerConfig() throws ConfigurationError and
 * the service must not start its scheduler.
 *
 * @see .env.example for the variable names
 */

import { ConfigurationError } from '@mev-sentinel/types';
import {
  AnalyzerConfigSchema,
  type AnalyzerConfig,
  type AnalyzerConfigInput,
} from './schemas';
import { readEnvBoolean, readEnvList, readEnvNumber, readEnvString } from './utils/env-parsing';

type Env = Record<string, string | undefined>;

/**
 * Defaults, resolved through the schema so they cannot drift from it.
 */
export const DEFAULT_ANALYZER_CONFIG: AnalyzerConfig = AnalyzerConfigSchema.parse({});

/**
 * Map environment variables onto the config input shape.
 * Unset variables stay undefined so schema defaults apply.
 */
export function readConfigFromEnv(env: Env): AnalyzerConfigInput {
  return {
    serviceName: readEnvString(env.SERVICE_NAME),
    pools: readEnvList(env.MEV_POOLS),
    cycleIntervalMs: readEnvNumber(env.MEV_CYCLE_INTERVAL_MS),
    alertThreshold: readEnvNumber(env.MEV_ALERT_THRESHOLD),
    ledgerCapacity: readEnvNumber(env.MEV_LEDGER_CAPACITY),
    fetchTimeoutMs: readEnvNumber(env.MEV_FETCH_TIMEOUT_MS),
    dispatchTimeoutMs: readEnvNumber(env.MEV_DISPATCH_TIMEOUT_MS),
    enhanceTimeoutMs: readEnvNumber(env.MEV_ENHANCE_TIMEOUT_MS),
    shutdownTimeoutMs: readEnvNumber(env.MEV_SHUTDOWN_TIMEOUT_MS),
    externalAlertConfidence: readEnvNumber(env.MEV_EXTERNAL_CONFIDENCE),
    correlateExternal: readEnvBoolean(env.MEV_CORRELATE_EXTERNAL, 'MEV_CORRELATE_EXTERNAL'),
    detection: {
      arbitrage: {
        referenceRatio: readEnvNumber(env.MEV_REFERENCE_RATIO),
        deviationThreshold: readEnvNumber(env.MEV_ARB_DEVIATION_THRESHOLD),
        valueCap: readEnvNumber(env.MEV_ARB_VALUE_CAP),
      },
      sandwich: {
        priceImpactThreshold: readEnvNumber(env.MEV_SANDWICH_IMPACT_THRESHOLD),
        liquidityThreshold: readEnvNumber(env.MEV_SANDWICH_LIQUIDITY_THRESHOLD),
        liquidityNorm: readEnvNumber(env.MEV_SANDWICH_LIQUIDITY_NORM),
        valueCap: readEnvNumber(env.MEV_SANDWICH_VALUE_CAP),
      },
      liquidation: {
        volatilityThreshold: readEnvNumber(env.MEV_LIQUIDATION_VOLATILITY_THRESHOLD),
        valueCap: readEnvNumber(env.MEV_LIQUIDATION_VALUE_CAP),
      },
    },
    correlation: {
      enabled: readEnvBoolean(env.MEV_CORRELATION_ENABLED, 'MEV_CORRELATION_ENABLED'),
      windowMs: readEnvNumber(env.MEV_CORRELATION_WINDOW_MS),
      triggerCount: readEnvNumber(env.MEV_CORRELATION_TRIGGER_COUNT),
    },
    redis: {
      url: readEnvString(env.REDIS_URL),
      snapshotKeyPrefix: readEnvString(env.MEV_SNAPSHOT_KEY_PREFIX),
      alertStream: readEnvString(env.MEV_ALERT_STREAM),
      alertStreamMaxLen: readEnvNumber(env.MEV_ALERT_STREAM_MAXLEN),
    },
    rpcUrl: readEnvString(env.RPC_URL),
    healthCheckPort: readEnvNumber(env.HEALTH_CHECK_PORT),
  };
}

/**
 * Copy an object without its undefined entries, so a later spread
 * cannot erase a value with an unset one.
 */
function definedEntries<T extends object>(value: T | undefined): Partial<T> {
  if (!value) return {};
  const result: Partial<T> = {};
  for (const key of Object.keys(value) as Array<keyof T>) {
    if (value[key] !== undefined) {
      result[key] = value[key];
    }
  }
  return result;
}

/**
 * Deep-merge two config inputs. Overrides win over the base.
 */
export function mergeConfigInput(
  base: AnalyzerConfigInput,
  overrides: AnalyzerConfigInput
): AnalyzerConfigInput {
  return {
    ...definedEntries(base),
    ...definedEntries(overrides),
    detection: {
      arbitrage: {
        ...definedEntries(base.detection?.arbitrage),
        ...definedEntries(overrides.detection?.arbitrage),
      },
      sandwich: {
        ...definedEntries(base.detection?.sandwich),
        ...definedEntries(overrides.detection?.sandwich),
      },
      liquidation: {
        ...definedEntries(base.detection?.liquidation),
        ...definedEntries(overrides.detection?.liquidation),
      },
    },
    correlation: {
      ...definedEntries(base.correlation),
      ...definedEntries(overrides.correlation),
    },
    redis: {
      ...definedEntries(base.redis),
      ...definedEntries(overrides.redis),
    },
  };
}

/**
 * Load and validate the analyzer configuration.
 *
 * @param env - Environment to read (defaults to process.env)
 * @param overrides - Explicit values that win over the environment
 * @throws ConfigurationError listing every invalid field
 *
 * @example
 * ```typescript
 * const config = loadAnalyzerConfig(process.env, { pools: ['pool-a'] });
 * ```
 */
export function loadAnalyzerConfig(
  env: Env = process.env,
  overrides: AnalyzerConfigInput = {}
): AnalyzerConfig {
  const merged = mergeConfigInput(readConfigFromEnv(env), overrides);
  const result = AnalyzerConfigSchema.safeParse(merged);

  if (!result.success) {
    const issues = result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Invalid analyzer configuration: ${issues.join('; ')}`, issues);
  }

  return result.data;
}
