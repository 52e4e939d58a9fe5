import { Logger } from 'winston';
import { v4 as uuidv4 } from 'uuid';
import { RandomStream } from '../random/RandomStream';
import { Ensemble, TimeGrid, TimeSeriesTable, Viewport } from '../models/types';
import { VisualizationSink } from '../render/VisualizationSink';
import { createComponentLogger } from '../../utils/logger';
import { EnsembleGenerator } from './EnsembleGenerator';
import { TimeSeriesAssembler } from './TimeSeriesAssembler';
import { deriveTimeGrid } from './TimeGrid';
import { WalkGenerator } from './WalkGenerator';
import { requirePositiveInteger } from './validation';

export interface SimulationOptions {
  count: number;
  initialValue: number;
  duration: number;
  sd: number;
  timeStep: number;
  seed?: number;
  /**
   * When true (the default) the ensemble holds `count + 1` walks, matching
   * the historical behavior of this simulator. Pass false for exactly
   * `count` walks.
   */
  includeExtraWalk?: boolean;
}

export interface SimulationRun {
  runId: string;
  requestedCount: number;
  /** Walks actually generated; see `includeExtraWalk` */
  effectiveCount: number;
  seed: number;
  grid: TimeGrid;
  ensemble: Ensemble;
  table: TimeSeriesTable;
}

/**
 * Number of walks generated for a requested count
 */
export function effectiveWalkCount(requestedCount: number, includeExtraWalk = true): number {
  requirePositiveInteger('count', requestedCount);
  return includeExtraWalk ? requestedCount + 1 : requestedCount;
}

/**
 * Runs the full pipeline: grid derivation, ensemble generation, assembly and
 * optionally rendering.
 *
 * The grid is derived once and its `numSteps` feeds both the generators and
 * the assembler, so the two cannot disagree.
 */
export class RandomWalkSimulator {
  private readonly logger: Logger;

  constructor(logger?: Logger) {
    this.logger = logger ?? createComponentLogger('RandomWalkSimulator');
  }

  run(options: SimulationOptions, stream?: RandomStream): SimulationRun {
    const runId = uuidv4();
    const grid = deriveTimeGrid(options.timeStep, options.duration);
    const effectiveCount = effectiveWalkCount(options.count, options.includeExtraWalk ?? true);
    const randomStream =
      stream ??
      (options.seed !== undefined ? RandomStream.fromSeed(options.seed) : RandomStream.unseeded());

    this.logger.info('Starting random walk simulation', {
      runId,
      requestedCount: options.count,
      effectiveCount,
      numSteps: grid.numSteps
    });
    this.logger.debug('Simulation parameters', { runId, ...options, seed: randomStream.seed });

    const startTime = Date.now();
    const walkGenerator = new WalkGenerator(randomStream, this.logger.child({ component: 'WalkGenerator' }));
    const ensembleGenerator = new EnsembleGenerator(
      walkGenerator,
      this.logger.child({ component: 'EnsembleGenerator' })
    );
    const assembler = new TimeSeriesAssembler(this.logger.child({ component: 'TimeSeriesAssembler' }));

    const ensemble = ensembleGenerator.generate(
      effectiveCount,
      options.initialValue,
      grid.numSteps,
      options.sd
    );
    const table = assembler.assembleOnGrid(ensemble, grid);

    this.logger.info(`Generated ${effectiveCount} walks in ${Date.now() - startTime}ms`, {
      runId,
      draws: randomStream.draws
    });

    return {
      runId,
      requestedCount: options.count,
      effectiveCount,
      seed: randomStream.seed,
      grid,
      ensemble,
      table
    };
  }

  /**
   * Run, then hand the table and the y range to `sink` untouched
   */
  async runAndRender(
    options: SimulationOptions,
    sink: VisualizationSink,
    viewport: Viewport,
    stream?: RandomStream
  ): Promise<SimulationRun> {
    const result = this.run(options, stream);
    await sink.render(result.table, viewport);
    this.logger.debug('Rendered table', { runId: result.runId, sink: sink.name });
    return result;
  }
}
