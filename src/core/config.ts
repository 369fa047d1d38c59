/**
 * Factor engine configuration loaded from JSON with defaults
 */

import { existsSync, readFileSync } from 'fs';
import { isAbsolute, join } from 'path';
import { loadEnvConfig } from './env';
import { ConfigError } from './errors';
import { validateEngineConfig } from '@/validation/ajv_instance';
import { FACTOR_NAMES, type FactorName } from '@/types/factors';

export interface StalenessTiers {
  /** Age above which a value is flagged `financial_stale`. */
  softDays: number;
  /** Age above which a value is dropped with `data_expired`. */
  hardDays: number;
}

export interface CapConfig {
  percentile: number;
  minSampleSize: number;
  fixedCap: number;
}

export interface FactorEngineConfig {
  enabledFactors: FactorName[];
  staleness: StalenessTiers;
  alignment: {
    fundamentalLookbackDays: number;
    priceFallbackTradingDays: number;
    stalePriceTradingDays: number;
    publicationLagDays: Record<string, number>;
  };
  dividends: {
    trailingDays: number;
  };
  sentiment: {
    windowDays: number;
    clampMin: number;
    clampMax: number;
  };
  momentum: {
    lookbackTradingDays: number;
  };
  volatility: {
    windowTradingDays: number;
  };
  capping: Partial<Record<FactorName, CapConfig>>;
  pipeline: {
    maxConcurrency: number;
    warmupDays: number;
  };
}

interface RawCapConfig {
  percentile?: number;
  min_sample_size?: number;
  fixed_cap?: number;
}

export interface RawFactorEngineConfig {
  enabled_factors?: string[];
  staleness?: {
    soft_days?: number;
    hard_days?: number;
  };
  alignment?: {
    fundamental_lookback_days?: number;
    price_fallback_trading_days?: number;
    stale_price_trading_days?: number;
    publication_lag_days?: Record<string, number>;
  };
  dividends?: {
    trailing_days?: number;
  };
  sentiment?: {
    window_days?: number;
    clamp_min?: number;
    clamp_max?: number;
  };
  momentum?: {
    lookback_trading_days?: number;
  };
  volatility?: {
    window_trading_days?: number;
  };
  capping?: Record<string, RawCapConfig>;
  pipeline?: {
    max_concurrency?: number;
    warmup_days?: number;
  };
}

export const DEFAULT_FACTOR_ENGINE_CONFIG: FactorEngineConfig = {
  enabledFactors: [...FACTOR_NAMES],
  staleness: {
    softDays: 270,
    hardDays: 365,
  },
  alignment: {
    fundamentalLookbackDays: 730,
    priceFallbackTradingDays: 3,
    stalePriceTradingDays: 1,
    publicationLagDays: {},
  },
  dividends: {
    trailingDays: 365,
  },
  sentiment: {
    windowDays: 30,
    clampMin: -1,
    clampMax: 1,
  },
  momentum: {
    lookbackTradingDays: 20,
  },
  volatility: {
    windowTradingDays: 20,
  },
  capping: {
    pb_ratio: { percentile: 0.99, minSampleSize: 50, fixedCap: 100 },
  },
  pipeline: {
    maxConcurrency: 4,
    warmupDays: 370,
  },
};

let cachedConfig: FactorEngineConfig | null = null;

function isFactorName(value: string): value is FactorName {
  return FACTOR_NAMES.some((name) => name === value);
}

function mergeCapping(
  base: FactorEngineConfig['capping'],
  raw: Record<string, RawCapConfig> | undefined
): FactorEngineConfig['capping'] {
  if (!raw) return { ...base };
  const merged: FactorEngineConfig['capping'] = { ...base };
  for (const [factor, cap] of Object.entries(raw)) {
    if (!isFactorName(factor)) {
      throw new ConfigError(`Capping configured for unknown factor: ${factor}`);
    }
    const current = merged[factor] ?? DEFAULT_FACTOR_ENGINE_CONFIG.capping.pb_ratio;
    merged[factor] = {
      percentile: cap.percentile ?? current?.percentile ?? 0.99,
      minSampleSize: cap.min_sample_size ?? current?.minSampleSize ?? 50,
      fixedCap: cap.fixed_cap ?? current?.fixedCap ?? 100,
    };
  }
  return merged;
}

export function buildFactorEngineConfig(
  raw: RawFactorEngineConfig,
  base: FactorEngineConfig = DEFAULT_FACTOR_ENGINE_CONFIG
): FactorEngineConfig {
  const enabledFactors = raw.enabled_factors
    ? raw.enabled_factors.map((name) => {
        if (!isFactorName(name)) {
          throw new ConfigError(`Unknown factor in enabled_factors: ${name}`);
        }
        return name;
      })
    : [...base.enabledFactors];

  const config: FactorEngineConfig = {
    enabledFactors,
    staleness: {
      softDays: raw.staleness?.soft_days ?? base.staleness.softDays,
      hardDays: raw.staleness?.hard_days ?? base.staleness.hardDays,
    },
    alignment: {
      fundamentalLookbackDays:
        raw.alignment?.fundamental_lookback_days ?? base.alignment.fundamentalLookbackDays,
      priceFallbackTradingDays:
        raw.alignment?.price_fallback_trading_days ?? base.alignment.priceFallbackTradingDays,
      stalePriceTradingDays:
        raw.alignment?.stale_price_trading_days ?? base.alignment.stalePriceTradingDays,
      publicationLagDays: {
        ...base.alignment.publicationLagDays,
        ...(raw.alignment?.publication_lag_days ?? {}),
      },
    },
    dividends: {
      trailingDays: raw.dividends?.trailing_days ?? base.dividends.trailingDays,
    },
    sentiment: {
      windowDays: raw.sentiment?.window_days ?? base.sentiment.windowDays,
      clampMin: raw.sentiment?.clamp_min ?? base.sentiment.clampMin,
      clampMax: raw.sentiment?.clamp_max ?? base.sentiment.clampMax,
    },
    momentum: {
      lookbackTradingDays:
        raw.momentum?.lookback_trading_days ?? base.momentum.lookbackTradingDays,
    },
    volatility: {
      windowTradingDays:
        raw.volatility?.window_trading_days ?? base.volatility.windowTradingDays,
    },
    capping: mergeCapping(base.capping, raw.capping),
    pipeline: {
      maxConcurrency: raw.pipeline?.max_concurrency ?? base.pipeline.maxConcurrency,
      warmupDays: raw.pipeline?.warmup_days ?? base.pipeline.warmupDays,
    },
  };

  if (config.staleness.softDays > config.staleness.hardDays) {
    throw new ConfigError(
      `staleness.soft_days (${config.staleness.softDays}) must not exceed hard_days (${config.staleness.hardDays})`
    );
  }
  if (config.alignment.fundamentalLookbackDays < config.staleness.hardDays) {
    throw new ConfigError(
      'alignment.fundamental_lookback_days must be at least staleness.hard_days'
    );
  }

  return config;
}

function resolveConfigPath(): string {
  const envPath = loadEnvConfig().engineConfigPath;
  if (envPath) {
    return isAbsolute(envPath) ? envPath : join(process.cwd(), envPath);
  }
  return join(process.cwd(), 'config', 'factor_engine.json');
}

function applyEnvOverrides(config: FactorEngineConfig): FactorEngineConfig {
  const envConcurrency = loadEnvConfig().maxConcurrency;
  if (envConcurrency === null) return config;
  return { ...config, pipeline: { ...config.pipeline, maxConcurrency: envConcurrency } };
}

export function loadFactorEngineConfig(configPath: string = resolveConfigPath()): FactorEngineConfig {
  if (!existsSync(configPath)) {
    return applyEnvOverrides(buildFactorEngineConfig({}));
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(configPath, 'utf-8'));
  } catch (error) {
    throw new ConfigError(`Unreadable factor engine config at ${configPath}: ${String(error)}`);
  }

  const result = validateEngineConfig(parsed);
  if (!result.valid) {
    throw new ConfigError(`Invalid factor engine config at ${configPath}`, result.errors);
  }

  return applyEnvOverrides(buildFactorEngineConfig(result.data));
}

export function getFactorEngineConfig(): FactorEngineConfig {
  if (!cachedConfig) {
    cachedConfig = loadFactorEngineConfig();
  }
  return cachedConfig;
}

export function resetFactorEngineConfig(): void {
  cachedConfig = null;
}
