import { readFileSync } from 'node:fs';
import path from 'node:path';
import YAML from 'yaml';
import { z } from 'zod';

export const REPORTING_PERIODS = ['day', 'month', 'quarter', 'year', 'all'] as const;
export type ReportingPeriod = (typeof REPORTING_PERIODS)[number];

export const UNRESOLVED_POLICIES = ['abort', 'quarantine'] as const;
export type UnresolvedPolicy = (typeof UNRESOLVED_POLICIES)[number];

export type PipelineConfig = {
  classAThreshold: number;
  classBThreshold: number;
  zeroPriceThreshold: number;
  returnRateOutlierMultiplier: number;
  reconciliationEpsilon: number;
  reportingPeriod: ReportingPeriod;
  unresolvedPolicy: UnresolvedPolicy;
  csvDelimiter: string;
  decimalSeparator: string;
};

export const DEFAULT_CONFIG: PipelineConfig = {
  classAThreshold: 0.8,
  classBThreshold: 0.95,
  zeroPriceThreshold: 0.01,
  returnRateOutlierMultiplier: 2,
  reconciliationEpsilon: 0.01,
  reportingPeriod: 'month',
  unresolvedPolicy: 'abort',
  csvDelimiter: ';',
  decimalSeparator: ',',
};

const share = z.coerce.number().gt(0).max(1);

export const rawConfigSchema = z
  .object({
    class_a_threshold: share,
    class_b_threshold: share,
    zero_price_threshold: z.coerce.number().min(0),
    return_rate_outlier_multiplier: z.coerce.number().positive(),
    reconciliation_epsilon: z.coerce.number().min(0),
    reporting_period: z.enum(REPORTING_PERIODS),
    unresolved_policy: z.enum(UNRESOLVED_POLICIES),
    csv_delimiter: z.string().length(1),
    decimal_separator: z.enum(['.', ',']),
  })
  .partial()
  .strict();

export type RawConfig = z.infer<typeof rawConfigSchema>;

const ENV_KEYS: Record<keyof RawConfig, string> = {
  class_a_threshold: 'ETL_CLASS_A_THRESHOLD',
  class_b_threshold: 'ETL_CLASS_B_THRESHOLD',
  zero_price_threshold: 'ETL_ZERO_PRICE_THRESHOLD',
  return_rate_outlier_multiplier: 'ETL_RETURN_RATE_MULTIPLIER',
  reconciliation_epsilon: 'ETL_RECONCILIATION_EPSILON',
  reporting_period: 'ETL_REPORTING_PERIOD',
  unresolved_policy: 'ETL_UNRESOLVED_POLICY',
  csv_delimiter: 'ETL_CSV_DELIMITER',
  decimal_separator: 'ETL_DECIMAL_SEPARATOR',
};

export class ConfigError extends Error {
  readonly issues: z.ZodIssue[];

  constructor(message: string, issues: z.ZodIssue[] = []) {
    super(message);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

function parseRaw(value: unknown, origin: string): RawConfig {
  const parsed = rawConfigSchema.safeParse(value ?? {});
  if (!parsed.success) {
    const summary = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new ConfigError(`invalid configuration in ${origin}: ${summary.join('; ')}`, parsed.error.issues);
  }
  return parsed.data;
}

export function readConfigFile(filePath: string): RawConfig {
  const resolved = path.resolve(filePath);
  const document: unknown = YAML.parse(readFileSync(resolved, 'utf8'));
  return parseRaw(document, resolved);
}

export function readEnvConfig(env: NodeJS.ProcessEnv): RawConfig {
  const values: Record<string, string> = {};
  for (const [key, envKey] of Object.entries(ENV_KEYS)) {
    const value = env[envKey];
    if (value !== undefined && value.trim() !== '') {
      values[key] = value.trim();
    }
  }
  return parseRaw(values, 'environment');
}

export function resolveConfig(...layers: RawConfig[]): PipelineConfig {
  const merged = layers.reduce<RawConfig>((acc, layer) => ({ ...acc, ...layer }), {});
  const config: PipelineConfig = {
    classAThreshold: merged.class_a_threshold ?? DEFAULT_CONFIG.classAThreshold,
    classBThreshold: merged.class_b_threshold ?? DEFAULT_CONFIG.classBThreshold,
    zeroPriceThreshold: merged.zero_price_threshold ?? DEFAULT_CONFIG.zeroPriceThreshold,
    returnRateOutlierMultiplier: merged.return_rate_outlier_multiplier ?? DEFAULT_CONFIG.returnRateOutlierMultiplier,
    reconciliationEpsilon: merged.reconciliation_epsilon ?? DEFAULT_CONFIG.reconciliationEpsilon,
    reportingPeriod: merged.reporting_period ?? DEFAULT_CONFIG.reportingPeriod,
    unresolvedPolicy: merged.unresolved_policy ?? DEFAULT_CONFIG.unresolvedPolicy,
    csvDelimiter: merged.csv_delimiter ?? DEFAULT_CONFIG.csvDelimiter,
    decimalSeparator: merged.decimal_separator ?? DEFAULT_CONFIG.decimalSeparator,
  };

  if (config.classAThreshold >= config.classBThreshold) {
    throw new ConfigError(
      `class_a_threshold (${config.classAThreshold}) must be lower than class_b_threshold (${config.classBThreshold})`
    );
  }
  if (config.csvDelimiter === config.decimalSeparator) {
    throw new ConfigError('csv_delimiter and decimal_separator must differ');
  }
  return config;
}

type LoadConfigOptions = {
  env?: NodeJS.ProcessEnv;
  configPath?: string;
  /** Validated like any other layer, so untrusted input is fine here. */
  overrides?: Record<string, unknown>;
};

/**
 * Builds the pipeline configuration from, lowest precedence first: defaults,
 * the YAML file (`configPath` or `ETL_CONFIG_PATH`), `ETL_*` variables and
 * explicit overrides.
 */
export function loadConfig({ env = process.env, configPath, overrides = {} }: LoadConfigOptions = {}): PipelineConfig {
  const filePath = configPath ?? env.ETL_CONFIG_PATH;
  const fileLayer = filePath ? readConfigFile(filePath) : {};
  return resolveConfig(fileLayer, readEnvConfig(env), parseRaw(overrides, 'overrides'));
}
