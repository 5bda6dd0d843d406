// Engine configuration
// Scoring weights, verdict thresholds and algorithm selectors. Everything here
// can be overridden per request or through SPAMGRAPH_* environment variables.

import { z } from 'zod';
import { ConfigurationError } from './errors';

const unit = z.number().min(0).max(1);

export const engineConfigSchema = z
  .object({
    weights: z
      .object({
        degreeRatio: unit,
        centrality: unit,
        burst: unit,
      })
      .refine((w) => Math.abs(w.degreeRatio + w.centrality + w.burst - 1) < 1e-6, {
        message: 'Scoring weights must sum to 1',
      }),
    thresholds: z
      .object({
        high: unit,
        low: unit,
      })
      .refine((t) => t.high > t.low, { message: 'High threshold must exceed low threshold' }),
    centralityVariant: z.enum(['betweenness', 'closeness']),
    coloringStrategy: z.enum(['largest-first', 'insertion-order', 'smallest-last']),
    burstStrategy: z.enum(['coefficient-of-variation', 'windowed-rate']),
    burstWindowMs: z.number().int().positive(),
    diameterMetric: z.enum(['hops', 'cost']),
  })
  .strict();

export type EngineConfig = z.infer<typeof engineConfigSchema>;

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  weights: { degreeRatio: 0.4, centrality: 0.35, burst: 0.25 },
  thresholds: { high: 0.6, low: 0.3 },
  centralityVariant: 'closeness',
  coloringStrategy: 'largest-first',
  burstStrategy: 'coefficient-of-variation',
  burstWindowMs: 60 * 60 * 1000,
  diameterMetric: 'hops',
};

/** Shape accepted for overrides: any subset, nested groups replaced whole. */
export const engineConfigOverridesSchema = z
  .object({
    weights: engineConfigSchema.shape.weights.optional(),
    thresholds: engineConfigSchema.shape.thresholds.optional(),
    centralityVariant: engineConfigSchema.shape.centralityVariant.optional(),
    coloringStrategy: engineConfigSchema.shape.coloringStrategy.optional(),
    burstStrategy: engineConfigSchema.shape.burstStrategy.optional(),
    burstWindowMs: engineConfigSchema.shape.burstWindowMs.optional(),
    diameterMetric: engineConfigSchema.shape.diameterMetric.optional(),
  })
  .strict();

export type EngineConfigOverrides = z.infer<typeof engineConfigOverridesSchema>;

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
  );
}

/**
 * Merge overrides onto a base configuration and validate the result.
 * Throws ConfigurationError listing every problem found.
 */
export function resolveConfig(
  overrides: unknown = {},
  base: EngineConfig = DEFAULT_ENGINE_CONFIG
): EngineConfig {
  const parsedOverrides = engineConfigOverridesSchema.safeParse(overrides);
  if (!parsedOverrides.success) {
    throw new ConfigurationError(formatIssues(parsedOverrides.error));
  }

  const merged = engineConfigSchema.safeParse({ ...base, ...parsedOverrides.data });
  if (!merged.success) {
    throw new ConfigurationError(formatIssues(merged.error));
  }
  return merged.data;
}

function parseNumberList(raw: string, names: string[], variable: string): Record<string, number> {
  const parts = raw.split(',').map((part) => Number(part.trim()));
  if (parts.length !== names.length || parts.some((value) => Number.isNaN(value))) {
    throw new ConfigurationError([`${variable} must be ${names.length} comma-separated numbers`]);
  }
  return Object.fromEntries(names.map((name, i) => [name, parts[i]]));
}

/**
 * Read overrides from the environment:
 *   SPAMGRAPH_WEIGHTS="0.4,0.35,0.25"   (degreeRatio, centrality, burst)
 *   SPAMGRAPH_THRESHOLDS="0.6,0.3"      (high, low)
 *   SPAMGRAPH_CENTRALITY, SPAMGRAPH_COLORING, SPAMGRAPH_BURST,
 *   SPAMGRAPH_BURST_WINDOW_MS, SPAMGRAPH_DIAMETER_METRIC
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  const overrides: Record<string, unknown> = {};

  if (env.SPAMGRAPH_WEIGHTS) {
    overrides.weights = parseNumberList(
      env.SPAMGRAPH_WEIGHTS,
      ['degreeRatio', 'centrality', 'burst'],
      'SPAMGRAPH_WEIGHTS'
    );
  }
  if (env.SPAMGRAPH_THRESHOLDS) {
    overrides.thresholds = parseNumberList(env.SPAMGRAPH_THRESHOLDS, ['high', 'low'], 'SPAMGRAPH_THRESHOLDS');
  }
  if (env.SPAMGRAPH_CENTRALITY) overrides.centralityVariant = env.SPAMGRAPH_CENTRALITY;
  if (env.SPAMGRAPH_COLORING) overrides.coloringStrategy = env.SPAMGRAPH_COLORING;
  if (env.SPAMGRAPH_BURST) overrides.burstStrategy = env.SPAMGRAPH_BURST;
  if (env.SPAMGRAPH_BURST_WINDOW_MS) overrides.burstWindowMs = Number(env.SPAMGRAPH_BURST_WINDOW_MS);
  if (env.SPAMGRAPH_DIAMETER_METRIC) overrides.diameterMetric = env.SPAMGRAPH_DIAMETER_METRIC;

  return resolveConfig(overrides);
}
