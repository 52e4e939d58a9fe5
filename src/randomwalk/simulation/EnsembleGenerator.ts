import { Logger } from 'winston';
import { Ensemble, RandomWalk } from '../models/types';
import { createComponentLogger } from '../../utils/logger';
import { WalkGenerator } from './WalkGenerator';
import { requirePositiveInteger } from './validation';

/**
 * Builds an ensemble by calling the walk generator `count` times with the
 * same parameters. The walks share one stream, so their draws interleave in
 * call order.
 */
export class EnsembleGenerator {
  private readonly logger: Logger;

  constructor(
    private readonly walkGenerator: WalkGenerator,
    logger?: Logger
  ) {
    this.logger = logger ?? createComponentLogger('EnsembleGenerator');
  }

  generate(count: number, initialValue: number, numSteps: number, sd: number): Ensemble {
    requirePositiveInteger('count', count);

    const walks: RandomWalk[] = [];
    for (let j = 0; j < count; j++) {
      walks.push(this.walkGenerator.generate(initialValue, numSteps, sd));
    }

    this.logger.debug('Generated ensemble', { count, numSteps, sd });

    return Object.freeze({
      walks: Object.freeze(walks),
      count,
      numSteps
    });
  }
}
