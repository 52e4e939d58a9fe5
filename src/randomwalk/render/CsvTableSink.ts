import { Writable } from 'stream';
import { stringify } from 'csv-stringify/sync';
import { TimeSeriesTable, Viewport } from '../models/types';
import { tableRows } from '../simulation/TimeSeriesAssembler';
import { VisualizationSink, writeToStream } from './VisualizationSink';

export interface CsvTableSinkOptions {
  delimiter?: string;
}

export function tableToCsv(table: TimeSeriesTable, options: CsvTableSinkOptions = {}): string {
  return stringify(tableRows(table), {
    header: true,
    columns: [...table.columns],
    delimiter: options.delimiter ?? ','
  });
}

/**
 * Writes the table as CSV. The viewport only matters to plotting sinks and
 * is ignored here.
 */
export class CsvTableSink implements VisualizationSink {
  readonly name = 'csv';

  constructor(
    private readonly output: Writable,
    private readonly options: CsvTableSinkOptions = {}
  ) {}

  async render(table: TimeSeriesTable, _viewport: Viewport): Promise<void> {
    await writeToStream(this.output, tableToCsv(table, this.options));
  }
}
