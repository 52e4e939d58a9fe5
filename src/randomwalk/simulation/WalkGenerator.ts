import { Logger } from 'winston';
import { RandomStream } from '../random/RandomStream';
import { RandomWalk } from '../models/types';
import { createComponentLogger } from '../../utils/logger';
import { requireFinite, requireNonNegative, requirePositiveInteger } from './validation';

/**
 * Produces single Gaussian random walks from a caller-owned stream
 */
export class WalkGenerator {
  private readonly logger: Logger;

  constructor(
    private readonly stream: RandomStream,
    logger?: Logger
  ) {
    this.logger = logger ?? createComponentLogger('WalkGenerator');
  }

  /**
   * Generate one walk of `numSteps` samples starting at `initialValue`.
   * Consumes `numSteps - 1` variates from the stream. Overflow and NaN in
   * the samples are not checked.
   */
  generate(initialValue: number, numSteps: number, sd: number): RandomWalk {
    requireFinite('initialValue', initialValue);
    requirePositiveInteger('numSteps', numSteps);
    requireNonNegative('sd', sd);

    const samples = new Array<number>(numSteps);
    samples[0] = initialValue;

    for (let i = 1; i < numSteps; i++) {
      samples[i] = samples[i - 1] + this.stream.normal(sd);
    }

    this.logger.debug('Generated walk', { numSteps, sd, draws: this.stream.draws });
    return Object.freeze(samples);
  }
}
