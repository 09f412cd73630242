/**
 * Fitness metric validation and ranking-column resolution
 */

import { z } from 'zod';
import { InvalidArgumentError } from './errors';
import { FitnessMetrics } from './types';

export const fitnessMetricsSchema = z.object({
  sharpeRatio: z.number().finite(),
  calmarRatio: z.number().finite(),
  maxDrawdown: z.number().finite(),
  cagr: z.number().finite(),
  totalReturn: z.number().finite(),
  tradeCount: z.number().int().nonnegative().optional(),
  winRate: z.number().min(0).max(1).optional(),
  psr: z.number().min(0).max(1).optional(),
  netSharpe: z.number().finite().optional(),
});

export type MetricColumn =
  | 'sharpe'
  | 'calmar'
  | 'max_dd'
  | 'cagr'
  | 'total_return'
  | 'trade_count'
  | 'win_rate'
  | 'psr'
  | 'net_sharpe';

// Column names double as the short metric names; field names are aliases.
const METRIC_ALIASES: Record<string, MetricColumn> = {
  sharpe: 'sharpe',
  sharpeRatio: 'sharpe',
  calmar: 'calmar',
  calmarRatio: 'calmar',
  max_dd: 'max_dd',
  maxDrawdown: 'max_dd',
  cagr: 'cagr',
  total_return: 'total_return',
  totalReturn: 'total_return',
  trade_count: 'trade_count',
  tradeCount: 'trade_count',
  win_rate: 'win_rate',
  winRate: 'win_rate',
  psr: 'psr',
  net_sharpe: 'net_sharpe',
  netSharpe: 'net_sharpe',
};

export const PRIMARY_METRIC: MetricColumn = 'calmar';

export function resolveMetric(name: string): MetricColumn {
  const column = Object.prototype.hasOwnProperty.call(METRIC_ALIASES, name) ? METRIC_ALIASES[name] : undefined;
  if (!column) {
    throw new InvalidArgumentError(
      `Unknown metric "${name}". Expected one of: ${Object.keys(METRIC_ALIASES).join(', ')}`
    );
  }
  return column;
}

export function validateMetrics(metrics: unknown): FitnessMetrics {
  const parsed = fitnessMetricsSchema.safeParse(metrics);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.') || 'metrics'}: ${issue.message}`);
    throw new InvalidArgumentError(`Invalid fitness metrics: ${issues.join('; ')}`);
  }
  return parsed.data;
}
