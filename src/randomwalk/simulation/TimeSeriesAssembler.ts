import { Logger } from 'winston';
import { DimensionMismatchError } from '../models/errors';
import { Ensemble, TimeGrid, TimeSeriesTable } from '../models/types';
import { createComponentLogger } from '../../utils/logger';
import { buildTimeAxis, deriveTimeGrid } from './TimeGrid';

export const TIME_COLUMN = 'time';

export function walkColumnName(walkIndex: number): string {
  return `walk_${walkIndex + 1}`;
}

/**
 * Merges an ensemble with its time axis into one positionally aligned table
 */
export class TimeSeriesAssembler {
  private readonly logger: Logger;

  constructor(logger?: Logger) {
    this.logger = logger ?? createComponentLogger('TimeSeriesAssembler');
  }

  /**
   * Build the time column `0, timeStep, ...` up to and including `duration`
   * and pair it with the ensemble. Fails with DimensionMismatchError when the
   * column length differs from the walk length, or when `ensemble.count`
   * differs from the number of walks.
   */
  assemble(ensemble: Ensemble, timeStep: number, duration: number): TimeSeriesTable {
    return this.assembleOnGrid(ensemble, deriveTimeGrid(timeStep, duration));
  }

  assembleOnGrid(ensemble: Ensemble, grid: TimeGrid): TimeSeriesTable {
    const time = buildTimeAxis(grid);

    if (ensemble.walks.length !== ensemble.count) {
      throw new DimensionMismatchError(ensemble.count, ensemble.walks.length, 'walks');
    }
    if (time.length !== ensemble.numSteps) {
      throw new DimensionMismatchError(time.length, ensemble.numSteps);
    }
    for (const walk of ensemble.walks) {
      if (walk.length !== ensemble.numSteps) {
        throw new DimensionMismatchError(time.length, walk.length);
      }
    }

    const columns = [TIME_COLUMN, ...ensemble.walks.map((_walk, j) => walkColumnName(j))];

    this.logger.debug('Assembled table', { rows: time.length, columns: columns.length });

    return Object.freeze({
      columns: Object.freeze(columns),
      time,
      series: ensemble.walks,
      rowCount: time.length,
      columnCount: columns.length
    });
  }
}

/**
 * Row `i` of the table: `[time[i], series[0][i], series[1][i], ...]`
 */
export function tableRow(table: TimeSeriesTable, i: number): number[] {
  return [table.time[i], ...table.series.map(column => column[i])];
}

export function tableRows(table: TimeSeriesTable): number[][] {
  return table.time.map((_t, i) => tableRow(table, i));
}
