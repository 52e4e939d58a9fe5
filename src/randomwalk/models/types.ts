/**
 * A single random walk. Element 0 is the initial value and every later
 * element is the previous one plus a Normal(0, sd) increment.
 */
export type RandomWalk = readonly number[];

/**
 * Walks generated with identical parameters, all `numSteps` long
 */
export interface Ensemble {
  walks: readonly RandomWalk[];
  count: number;
  numSteps: number;
}

/**
 * Sampling grid shared by generation and assembly
 */
export interface TimeGrid {
  timeStep: number;
  duration: number;
  numSteps: number;
}

/**
 * Positionally aligned table: column 0 is time, column j + 1 is walk j.
 * `series[j][i]` pairs with `time[i]`.
 */
export interface TimeSeriesTable {
  columns: readonly string[];
  time: readonly number[];
  series: readonly (readonly number[])[];
  rowCount: number;
  columnCount: number;
}

/**
 * Y-axis range a renderer clips to
 */
export interface Viewport {
  yMin: number;
  yMax: number;
}
