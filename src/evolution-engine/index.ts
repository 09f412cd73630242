/**
 * Strategy Evolution Engine
 *
 * Population store, parent selection and the evolution loop that glues
 * an external mutator and backtest evaluator to the store.
 */

export { ProgramStore } from '../data/program-store';
export {
  EvolutionController,
  EvolutionStatus,
  ProgressEvent,
  ProgressEventType,
  StopCondition,
  EvolutionProgress,
  EvolutionResult,
  EvolutionControllerOptions,
  validateStopCondition,
} from './evolution-controller';
export { Selector, SelectionConfig, RankedEntry, DEFAULT_SELECTION_CONFIG, compareRanked } from './selector';
export { MetricColumn, PRIMARY_METRIC, fitnessMetricsSchema, resolveMetric, validateMetrics } from './metrics';
export { EvolutionStoreError, NotFoundError, InvalidArgumentError, StorageError } from './errors';
export {
  FitnessMetrics,
  ProgramState,
  Program,
  SelectionStrategy,
  SELECTION_STRATEGIES,
  InsertOptions,
  ProgramStoreOptions,
  ExperimentSummary,
  MutationRequest,
  MutationResponse,
  Mutator,
  EvaluationRequest,
  EvaluationResult,
  StrategyEvaluator,
  metricsOf,
} from './types';
