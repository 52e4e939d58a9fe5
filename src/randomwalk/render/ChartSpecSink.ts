import { Writable } from 'stream';
import { InvalidParameterError } from '../models/errors';
import { TimeSeriesTable, Viewport } from '../models/types';
import { TIME_COLUMN } from '../simulation/TimeSeriesAssembler';
import { VisualizationSink, writeToStream } from './VisualizationSink';

export type Marker = 'o';

export interface ChartSeries {
  /** Column index in the table (1 for the first walk) */
  column: number;
  label: string;
  colorIndex: number;
  marker: Marker;
  points: Array<[number, number]>;
}

export interface ChartSpec {
  xLabel: string;
  yLabel: string;
  xColumn: string;
  yDomain: [number, number];
  series: ChartSeries[];
}

/**
 * Describe how a renderer should draw the table: time on the x axis, one
 * series per walk column with color keyed by column index, y clipped to
 * the viewport.
 */
export function buildChartSpec(table: TimeSeriesTable, viewport: Viewport): ChartSpec {
  const { yMin, yMax } = viewport;
  if (!Number.isFinite(yMin) || !Number.isFinite(yMax) || yMin >= yMax) {
    throw new InvalidParameterError('yMin', `y range [${yMin}, ${yMax}] is empty or not finite`, {
      yMin,
      yMax
    });
  }

  const series = table.series.map((values, j): ChartSeries => {
    const column = j + 1;
    return {
      column,
      label: table.columns[column],
      colorIndex: column,
      marker: 'o',
      points: values.map((value, i): [number, number] => [table.time[i], value])
    };
  });

  return {
    xLabel: 'Time',
    yLabel: 'Value',
    xColumn: TIME_COLUMN,
    yDomain: [yMin, yMax],
    series
  };
}

/**
 * Builds a ChartSpec for every rendered table, keeps the latest one and
 * optionally writes it as JSON
 */
export class ChartSpecSink implements VisualizationSink {
  readonly name = 'chart';
  private last: ChartSpec | null = null;

  constructor(private readonly output?: Writable) {}

  async render(table: TimeSeriesTable, viewport: Viewport): Promise<void> {
    this.last = buildChartSpec(table, viewport);
    if (this.output) {
      await writeToStream(this.output, `${JSON.stringify(this.last, null, 2)}\n`);
    }
  }

  getLastSpec(): ChartSpec | null {
    return this.last;
  }
}
