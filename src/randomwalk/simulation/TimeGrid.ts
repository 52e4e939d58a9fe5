import * as _ from 'lodash';
import { TimeGrid } from '../models/types';
import { requireNonNegative, requirePositive } from './validation';

// Absorbs representation error in duration / timeStep, e.g. 0.03 / 0.01
const SEQUENCE_FUZZ = 1e-10;

/**
 * Derive the sampling grid for `[0, duration]` at spacing `timeStep`.
 * `numSteps` counts both end points.
 */
export function deriveTimeGrid(timeStep: number, duration: number): TimeGrid {
  requirePositive('timeStep', timeStep);
  requireNonNegative('duration', duration);

  const numSteps = Math.floor(duration / timeStep + SEQUENCE_FUZZ) + 1;
  return Object.freeze({ timeStep, duration, numSteps });
}

export function buildTimeAxis(grid: TimeGrid): readonly number[] {
  return Object.freeze(_.range(grid.numSteps).map(i => i * grid.timeStep));
}
