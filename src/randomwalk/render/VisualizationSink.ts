import { Writable } from 'stream';
import { TimeSeriesTable, Viewport } from '../models/types';

/**
 * Receives an assembled table for display or export
 */
export interface VisualizationSink {
  readonly name: string;
  render(table: TimeSeriesTable, viewport: Viewport): Promise<void>;
}

export function writeToStream(output: Writable, text: string): Promise<void> {
  return new Promise((resolve, reject) => {
    output.write(text, error => {
      if (error) {
        reject(error);
      } else {
        resolve();
      }
    });
  });
}
