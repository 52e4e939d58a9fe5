/**
 * Gaussian random walk ensembles
 *
 * Generation of single walks and ensembles from an explicit random stream,
 * alignment on a shared time axis, and sinks that render or export the
 * resulting table.
 */

export * from './models/types';
export * from './models/errors';
export { RandomStream } from './random/RandomStream';
export { WalkGenerator } from './simulation/WalkGenerator';
export { EnsembleGenerator } from './simulation/EnsembleGenerator';
export {
  TimeSeriesAssembler,
  TIME_COLUMN,
  walkColumnName,
  tableRow,
  tableRows
} from './simulation/TimeSeriesAssembler';
export { deriveTimeGrid, buildTimeAxis } from './simulation/TimeGrid';
export {
  RandomWalkSimulator,
  SimulationOptions,
  SimulationRun,
  effectiveWalkCount
} from './simulation/RandomWalkSimulator';
export { VisualizationSink } from './render/VisualizationSink';
export { ChartSpecSink, ChartSpec, ChartSeries, buildChartSpec } from './render/ChartSpecSink';
export { CsvTableSink, CsvTableSinkOptions, tableToCsv } from './render/CsvTableSink';
export {
  RandomWalkConfig,
  DEFAULT_RANDOM_WALK_CONFIG,
  DEFAULT_TIME_STEP,
  Environment,
  loadRandomWalkConfig,
  configFromEnv,
  parseNumber,
  parseBoolean
} from './config/simulation.config';
