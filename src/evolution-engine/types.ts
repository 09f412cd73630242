/**
 * Evolution Store Types
 * Programs, fitness metrics and the collaborator contracts of the evolution loop
 */

export interface FitnessMetrics {
  sharpeRatio: number;
  calmarRatio: number;         // Primary fitness metric
  maxDrawdown: number;
  cagr: number;
  totalReturn: number;
  tradeCount?: number;
  winRate?: number;
  psr?: number;                // Probabilistic Sharpe ratio: P(SR > 0)
  netSharpe?: number;          // Sharpe after transaction costs
}

/**
 * A program is pending until its first evaluation lands. Ranking and pruning
 * switch on `status`, so a pending program never reads as fitness 0.
 */
export type ProgramState =
  | { status: 'pending' }
  | { status: 'scored'; metrics: FitnessMetrics };

export interface Program {
  id: string;
  code: string;
  parentId: string | null;
  generation: number;
  experiment: string | null;
  state: ProgramState;
  createdAt: number;           // Epoch millis, strictly increasing per database file
}

export const SELECTION_STRATEGIES = ['elite', 'exploit', 'explore'] as const;

export type SelectionStrategy = (typeof SELECTION_STRATEGIES)[number];

export interface InsertOptions {
  metrics?: FitnessMetrics | null;
  parentId?: string | null;
  experiment?: string | null;
}

export interface ProgramStoreOptions {
  populationSize?: number;     // Live programs allowed after each insert
  archiveSize?: number;        // Top performers never pruned
  random?: () => number;       // [0, 1) source for sampling
}

export interface ExperimentSummary {
  name: string;
  count: number;
  scoredCount: number;
  bestCalmar: number | null;
  maxGeneration: number;
  createdAt: number;
}

// ---------------------------------------------------------------------------
// Evolution loop collaborators

export interface MutationRequest {
  parentCode: string;
  parentMetrics: FitnessMetrics | null;
  experiment: string;
}

export type MutationResponse =
  | { success: true; code: string }
  | { success: false; error: string };

export interface Mutator {
  mutate(request: MutationRequest): Promise<MutationResponse>;
}

export interface EvaluationRequest {
  code: string;
  experiment: string;
}

export type EvaluationResult =
  | { success: true; metrics: FitnessMetrics }
  | { success: false; error: string };

export interface StrategyEvaluator {
  evaluate(request: EvaluationRequest): Promise<EvaluationResult>;
}

export function metricsOf(program: Program): FitnessMetrics | null {
  return program.state.status === 'scored' ? program.state.metrics : null;
}
