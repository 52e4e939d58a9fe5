#!/usr/bin/env node
/**
 * Random Walk CLI
 *
 * Simulates an ensemble of Gaussian random walks and writes the aligned
 * table as CSV or as a chart description.
 */

import fs from 'fs';
import { Writable } from 'stream';
import { Command, Option } from 'commander';
import * as dotenv from 'dotenv';
import {
  ChartSpecSink,
  CsvTableSink,
  Environment,
  RandomWalkConfig,
  RandomWalkSimulator,
  SimulationRun,
  VisualizationSink,
  loadRandomWalkConfig,
  parseNumber
} from '../randomwalk';
import logger from '../utils/logger';

export type OutputFormat = 'csv' | 'chart';

export interface SimulateFlags {
  count?: string;
  initial?: string;
  duration?: string;
  sd?: string;
  timeStep?: string;
  seed?: string;
  yMin?: string;
  yMax?: string;
  extraWalk: boolean;
  format: OutputFormat;
  output?: string;
}

/**
 * Turn command-line flags into config overrides. Absent flags stay
 * undefined so the environment and defaults apply.
 */
export function flagsToOverrides(flags: SimulateFlags): Partial<RandomWalkConfig> {
  const number = (name: string, raw?: string): number | undefined =>
    raw === undefined ? undefined : parseNumber(name, raw);

  return {
    count: number('--count', flags.count),
    initialValue: number('--initial', flags.initial),
    duration: number('--duration', flags.duration),
    sd: number('--sd', flags.sd),
    timeStep: number('--time-step', flags.timeStep),
    seed: number('--seed', flags.seed),
    yMin: number('--y-min', flags.yMin),
    yMax: number('--y-max', flags.yMax),
    includeExtraWalk: flags.extraWalk ? undefined : false
  };
}

export function createSink(format: OutputFormat, output: Writable): VisualizationSink {
  return format === 'chart' ? new ChartSpecSink(output) : new CsvTableSink(output);
}

export async function runSimulate(
  flags: SimulateFlags,
  env: Environment = process.env,
  stdout: Writable = process.stdout
): Promise<SimulationRun> {
  const config = loadRandomWalkConfig(env, flagsToOverrides(flags));
  const viewport = { yMin: config.yMin, yMax: config.yMax };
  const simulator = new RandomWalkSimulator();

  if (!flags.output) {
    return simulator.runAndRender(config, createSink(flags.format, stdout), viewport);
  }

  // Render in memory so a failed run never leaves a partial file behind
  const chunks: Buffer[] = [];
  const buffer = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      chunks.push(chunk);
      callback();
    }
  });

  const run = await simulator.runAndRender(config, createSink(flags.format, buffer), viewport);
  await fs.promises.writeFile(flags.output, Buffer.concat(chunks));
  return run;
}

export function buildProgram(): Command {
  const program = new Command();

  program
    .name('random-walk')
    .description('Gaussian random walk ensemble simulator')
    .version('1.0.0');

  program
    .command('simulate')
    .description('Generate an ensemble of random walks and write the aligned table')
    .option('-n, --count <walks>', 'Walks requested (one extra is added unless --no-extra-walk)')
    .option('-i, --initial <value>', 'Initial value of every walk')
    .option('-d, --duration <time>', 'Last time value on the axis')
    .option('-s, --sd <sd>', 'Standard deviation of each increment')
    .option('-t, --time-step <step>', 'Spacing of the time axis')
    .option('--seed <seed>', 'Seed for a reproducible run')
    .option('--y-min <value>', 'Lower bound of the plotted y range')
    .option('--y-max <value>', 'Upper bound of the plotted y range')
    .option('--no-extra-walk', 'Generate exactly --count walks')
    .addOption(
      new Option('-f, --format <format>', 'Output format').choices(['csv', 'chart']).default('csv')
    )
    .option('-o, --output <file>', 'Write to a file instead of stdout')
    .action(async (flags: SimulateFlags) => {
      const run = await runSimulate(flags);
      logger.info(`Run ${run.runId} finished`, {
        effectiveCount: run.effectiveCount,
        rows: run.table.rowCount,
        seed: run.seed
      });
    });

  return program;
}

if (require.main === module) {
  dotenv.config();
  logger.level = process.env.LOG_LEVEL || logger.level;

  buildProgram()
    .parseAsync(process.argv)
    .catch((error: unknown) => {
      logger.error('Random walk simulation failed', {
        error: error instanceof Error ? error.message : String(error)
      });
      process.exit(1);
    });
}
