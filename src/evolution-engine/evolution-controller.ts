/**
 * Evolution Controller
 * Drives the sample -> mutate -> evaluate -> insert loop against a ProgramStore.
 * Mutation and evaluation are delegated to injected collaborators.
 */

import { EventEmitter } from 'events';
import { ProgramStore } from '../data/program-store';
import logger from '../shared/logger';
import { Config } from '../shared/types';
import { InvalidArgumentError, NotFoundError, StorageError } from './errors';
import {
  FitnessMetrics,
  Mutator,
  Program,
  SelectionStrategy,
  StrategyEvaluator,
  metricsOf,
} from './types';

export type EvolutionStatus = 'idle' | 'running' | 'paused' | 'completed' | 'failed';

export type ProgressEventType =
  | 'iteration_start'
  | 'parent_selected'
  | 'mutation_requested'
  | 'mutation_complete'
  | 'evaluation_start'
  | 'evaluation_complete'
  | 'iteration_complete'
  | 'evolution_complete'
  | 'error';

export interface ProgressEvent {
  type: ProgressEventType;
  iteration: number;
  timestamp: Date;
  data: Record<string, unknown>;
}

export interface StopCondition {
  maxIterations: number;
  targetFitness?: number;            // Stop once best calmar reaches this
  maxTimeSeconds?: number;
  noImprovementGenerations?: number; // Stop after this many iterations without a new best
}

export interface EvolutionProgress {
  experiment: string;
  iteration: number;
  generation: number;
  bestFitness: number;
  bestStrategyId: string | null;
  populationSize: number;
  elapsedSeconds: number;
  status: EvolutionStatus;
  mutationsAttempted: number;
  mutationsSuccessful: number;
  evaluationsCompleted: number;
  evaluationsFailed: number;
}

export interface EvolutionResult {
  experiment: string;
  status: EvolutionStatus;
  iterationsCompleted: number;
  bestStrategy: Program | null;
  finalPopulationSize: number;
  elapsedSeconds: number;
  totalMutations: number;
  successfulMutations: number;
  totalEvaluations: number;
  successfulEvaluations: number;
  stopReason: string;
}

export interface EvolutionControllerOptions {
  random?: () => number;
  now?: () => number;                // Epoch millis
}

export function validateStopCondition(condition: StopCondition): StopCondition {
  if (!Number.isInteger(condition.maxIterations) || condition.maxIterations < 1) {
    throw new InvalidArgumentError('maxIterations must be an integer >= 1');
  }
  if (condition.maxTimeSeconds !== undefined && condition.maxTimeSeconds <= 0) {
    throw new InvalidArgumentError('maxTimeSeconds must be > 0 if set');
  }
  if (
    condition.noImprovementGenerations !== undefined &&
    (!Number.isInteger(condition.noImprovementGenerations) || condition.noImprovementGenerations < 1)
  ) {
    throw new InvalidArgumentError('noImprovementGenerations must be an integer >= 1 if set');
  }
  return condition;
}

export class EvolutionController extends EventEmitter {
  private readonly settings: Config['evolution'];
  private readonly store: ProgramStore;
  private readonly evaluator: StrategyEvaluator;
  private readonly mutator: Mutator;
  private readonly random: () => number;
  private readonly now: () => number;

  private experiment: string | null = null;
  private status: EvolutionStatus = 'idle';
  private stopRequested = false;
  private currentIteration = 0;
  private iterationsCompleted = 0;
  private startTime: number | null = null;
  private bestFitness = -Infinity;
  private bestStrategyId: string | null = null;
  private withoutImprovement = 0;

  private mutationsAttempted = 0;
  private mutationsSuccessful = 0;
  private evaluationsCompleted = 0;
  private evaluationsFailed = 0;

  constructor(
    settings: Config['evolution'],
    store: ProgramStore,
    evaluator: StrategyEvaluator,
    mutator: Mutator,
    options: EvolutionControllerOptions = {}
  ) {
    super();
    if (settings.eliteRatio < 0 || settings.explorationRatio < 0 || settings.eliteRatio + settings.explorationRatio > 1) {
      throw new InvalidArgumentError('eliteRatio and explorationRatio must be >= 0 and sum to <= 1');
    }
    this.settings = settings;
    this.store = store;
    this.evaluator = evaluator;
    this.mutator = mutator;
    this.random = options.random ?? Math.random;
    this.now = options.now ?? Date.now;
  }

  /**
   * Seed `experiment` with `seedCode` and evolve for up to `iterations` rounds
   */
  async run(
    seedCode: string,
    experiment: string,
    iterations: number,
    stopCondition: Omit<StopCondition, 'maxIterations'> = {}
  ): Promise<EvolutionResult> {
    const condition = validateStopCondition({ ...stopCondition, maxIterations: iterations });
    this.assertIdle();

    this.reset(experiment);
    logger.info(`[EvolutionController] Starting evolution: ${experiment}, iterations=${condition.maxIterations}`);

    return this.evolve(experiment, condition, () => this.loadSeed(seedCode, experiment));
  }

  /**
   * Continue an experiment already in the store for `iterations` more rounds.
   * Best fitness is rebuilt from the stored population and no seed is inserted.
   */
  async resume(
    experiment: string,
    iterations: number,
    stopCondition: Omit<StopCondition, 'maxIterations'> = {}
  ): Promise<EvolutionResult> {
    const condition = validateStopCondition({ ...stopCondition, maxIterations: iterations });
    this.assertIdle();

    if (this.store.count(experiment) === 0) {
      throw new NotFoundError(experiment, 'Experiment');
    }

    this.reset(experiment);
    const best = this.store.topK(1, 'calmar', experiment)[0];
    const bestMetrics = best ? metricsOf(best) : null;
    if (best && bestMetrics) {
      this.bestFitness = bestMetrics.calmarRatio;
      this.bestStrategyId = best.id;
    }
    logger.info(
      `[EvolutionController] Resuming evolution: ${experiment}, iterations=${condition.maxIterations}, best=${this.bestFitness.toFixed(4)}`
    );

    return this.evolve(experiment, condition, async () => undefined);
  }

  private async evolve(
    experiment: string,
    condition: StopCondition,
    prepare: () => Promise<void>
  ): Promise<EvolutionResult> {
    let stopReason: string | null = null;

    try {
      await prepare();

      for (let iteration = 0; iteration < condition.maxIterations; iteration++) {
        if (this.stopRequested) {
          this.status = 'paused';
          stopReason = 'Stop requested';
          break;
        }

        this.currentIteration = iteration;
        this.emitProgress('iteration_start', { maxIterations: condition.maxIterations });

        try {
          await this.runIteration(experiment);
        } catch (error) {
          if (error instanceof StorageError) throw error;
          const message = error instanceof Error ? error.message : String(error);
          logger.error(`[EvolutionController] Iteration ${iteration} failed: ${message}`);
          this.emitProgress('error', { error: message });
          this.iterationsCompleted = iteration + 1;

          stopReason = this.checkStopConditions(condition);
          if (stopReason) break;
          continue;
        }

        if (this.isInterrupted()) {
          stopReason = 'Stop requested';
          break;
        }

        this.iterationsCompleted = iteration + 1;
        this.emitProgress('iteration_complete', {
          bestFitness: this.bestFitness,
          populationSize: this.store.count(experiment),
        });

        stopReason = this.checkStopConditions(condition);
        if (stopReason) break;
      }
    } catch (error) {
      this.status = 'failed';
      logger.error('[EvolutionController] Evolution failed:', error);
      throw error;
    }

    if (this.status === 'running') {
      this.status = 'completed';
    }
    stopReason = stopReason ?? 'Completed all iterations';

    const elapsedSeconds = this.elapsedSeconds();
    this.emitProgress('evolution_complete', { status: this.status, stopReason, elapsedSeconds });
    logger.info(`[EvolutionController] Evolution complete: ${stopReason}`);

    return {
      experiment,
      status: this.status,
      iterationsCompleted: this.iterationsCompleted,
      bestStrategy: this.bestStrategyId ? this.store.get(this.bestStrategyId) : null,
      finalPopulationSize: this.store.count(experiment),
      elapsedSeconds,
      totalMutations: this.mutationsAttempted,
      successfulMutations: this.mutationsSuccessful,
      totalEvaluations: this.evaluationsCompleted + this.evaluationsFailed,
      successfulEvaluations: this.evaluationsCompleted,
      stopReason,
    };
  }

  /**
   * Request a stop. By default the current iteration finishes first; with
   * `force` the run is paused at once and an in-flight child is not evaluated.
   */
  stop(force: boolean = false): void {
    this.stopRequested = true;
    logger.info(`[EvolutionController] Stop requested (force=${force})`);
    if (force && this.status === 'running') {
      this.status = 'paused';
    }
  }

  getProgress(): EvolutionProgress {
    if (!this.experiment) {
      throw new InvalidArgumentError('No active experiment');
    }

    const top = this.store.topK(1, 'calmar', this.experiment);

    return {
      experiment: this.experiment,
      iteration: this.currentIteration,
      generation: top.length > 0 ? top[0].generation : 0,
      bestFitness: this.bestFitness,
      bestStrategyId: this.bestStrategyId,
      populationSize: this.store.count(this.experiment),
      elapsedSeconds: this.elapsedSeconds(),
      status: this.status,
      mutationsAttempted: this.mutationsAttempted,
      mutationsSuccessful: this.mutationsSuccessful,
      evaluationsCompleted: this.evaluationsCompleted,
      evaluationsFailed: this.evaluationsFailed,
    };
  }

  /**
   * Pick elite, exploit or explore from the configured ratios
   */
  selectParentMode(): SelectionStrategy {
    const r = this.random();
    if (r < this.settings.eliteRatio) return 'elite';
    if (r < 1 - this.settings.explorationRatio) return 'exploit';
    return 'explore';
  }

  private assertIdle(): void {
    if (this.status === 'running') {
      throw new InvalidArgumentError(`Evolution already running: ${this.experiment}`);
    }
  }

  private isInterrupted(): boolean {
    return this.stopRequested && this.status === 'paused';
  }

  private reset(experiment: string): void {
    this.experiment = experiment;
    this.status = 'running';
    this.stopRequested = false;
    this.currentIteration = 0;
    this.iterationsCompleted = 0;
    this.startTime = this.now();
    this.bestFitness = -Infinity;
    this.bestStrategyId = null;
    this.withoutImprovement = 0;
    this.mutationsAttempted = 0;
    this.mutationsSuccessful = 0;
    this.evaluationsCompleted = 0;
    this.evaluationsFailed = 0;
  }

  private async loadSeed(seedCode: string, experiment: string): Promise<void> {
    const result = await this.evaluator.evaluate({ code: seedCode, experiment });
    const metrics = result.success ? result.metrics : null;
    if (result.success) {
      this.evaluationsCompleted++;
    } else {
      this.evaluationsFailed++;
      logger.warn(`[EvolutionController] Seed evaluation failed, storing as pending: ${result.error}`);
    }

    const seedId = this.store.insert(seedCode, { metrics, experiment });
    if (metrics) {
      this.recordResult(seedId, metrics);
    }
    logger.info(`[EvolutionController] Loaded seed strategy (id=${seedId.slice(0, 8)}...)`);
  }

  private async runIteration(experiment: string): Promise<void> {
    const mode = this.selectParentMode();
    const parent = this.store.sample(mode, experiment) ?? this.store.sample('explore', experiment);
    if (!parent) {
      throw new Error(`Cannot select parent: experiment ${experiment} has no programs`);
    }

    const parentMetrics = metricsOf(parent);
    this.emitProgress('parent_selected', {
      parentId: parent.id,
      mode,
      parentFitness: parentMetrics ? parentMetrics.calmarRatio : null,
    });

    this.emitProgress('mutation_requested', {});
    this.mutationsAttempted++;
    const mutation = await this.mutator.mutate({ parentCode: parent.code, parentMetrics, experiment });
    if (this.isInterrupted()) {
      logger.info('[EvolutionController] Forced stop, discarding mutation');
      return;
    }

    if (!mutation.success) {
      logger.warn(`[EvolutionController] Mutation failed: ${mutation.error}`);
      this.emitProgress('mutation_complete', { success: false, error: mutation.error });
      return;
    }

    this.mutationsSuccessful++;
    this.emitProgress('mutation_complete', { success: true });

    this.emitProgress('evaluation_start', {});
    const evaluation = await this.evaluator.evaluate({ code: mutation.code, experiment });

    if (!evaluation.success) {
      logger.warn(`[EvolutionController] Evaluation failed: ${evaluation.error}`);
      this.evaluationsFailed++;
      this.emitProgress('evaluation_complete', { success: false, error: evaluation.error });
      return;
    }

    this.evaluationsCompleted++;
    this.emitProgress('evaluation_complete', {
      success: true,
      calmar: evaluation.metrics.calmarRatio,
      sharpe: evaluation.metrics.sharpeRatio,
    });

    const childId = this.store.insert(mutation.code, {
      metrics: evaluation.metrics,
      parentId: parent.id,
      experiment,
    });
    this.recordResult(childId, evaluation.metrics);
  }

  private recordResult(id: string, metrics: FitnessMetrics): void {
    if (metrics.calmarRatio > this.bestFitness) {
      logger.info(`[EvolutionController] New best: calmar=${metrics.calmarRatio.toFixed(4)} (was ${this.bestFitness.toFixed(4)})`);
      this.bestFitness = metrics.calmarRatio;
      this.bestStrategyId = id;
      this.withoutImprovement = 0;
    } else {
      this.withoutImprovement++;
    }
  }

  private checkStopConditions(condition: StopCondition): string | null {
    if (condition.targetFitness !== undefined && this.bestFitness >= condition.targetFitness) {
      return `Target fitness reached: ${this.bestFitness.toFixed(4)}`;
    }

    if (condition.maxTimeSeconds !== undefined) {
      const elapsed = this.elapsedSeconds();
      if (elapsed >= condition.maxTimeSeconds) {
        return `Time limit reached: ${Math.round(elapsed)}s`;
      }
    }

    if (
      condition.noImprovementGenerations !== undefined &&
      this.withoutImprovement >= condition.noImprovementGenerations
    ) {
      return `No improvement for ${this.withoutImprovement} generations`;
    }

    return null;
  }

  private elapsedSeconds(): number {
    return this.startTime === null ? 0 : (this.now() - this.startTime) / 1000;
  }

  private emitProgress(type: ProgressEventType, data: Record<string, unknown>): void {
    const event: ProgressEvent = {
      type,
      iteration: this.currentIteration,
      timestamp: new Date(this.now()),
      data,
    };

    try {
      this.emit('progress', event);
    } catch (error) {
      logger.warn('[EvolutionController] Progress listener error:', error);
    }
  }
}
