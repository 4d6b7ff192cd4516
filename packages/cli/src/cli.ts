// packages/cli/src/cli.ts

import { parseArgs } from 'node:util';
import { InvalidArgumentError, runSweep } from '@credit-terms/engine';
import { writeChartPage } from './chart';
import { DEFAULT_INPUT_PATH, InputError, loadParameterFile, toLoanParameters, writeSampleParameterFile } from './input';
import { formatParameters, formatSweep } from './report';

export const USAGE = 'Usage: credit-terms [input.json] [--chart <file>] [--init]';

const parseCliArgs = (argv: string[]) =>
  parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      chart: { type: 'string' },
      init: { type: 'boolean', default: false },
    },
  });

/**
 * Runs one sweep for the given arguments and returns the process exit code.
 */
export function run(argv: string[]): number {
  let args: ReturnType<typeof parseCliArgs>;
  try {
    args = parseCliArgs(argv);
  } catch (error) {
    console.error(error instanceof Error ? error.message : error);
    console.error(USAGE);
    return 1;
  }

  const filepath = args.positionals[0] ?? DEFAULT_INPUT_PATH;

  try {
    if (args.values.init) {
      writeSampleParameterFile(filepath);
      console.log(`Sample credit parameters written to ${filepath}`);
      return 0;
    }

    console.log(`Credit parameters input file path: ${filepath}`);
    const file = loadParameterFile(filepath);
    formatParameters(file).forEach((line) => console.log(line));

    const params = toLoanParameters(file);
    const sweep = runSweep(params);
    console.log('');
    formatSweep(sweep, params).forEach((line) => console.log(line));

    const chartPath = args.values.chart;
    if (chartPath !== undefined) {
      writeChartPage(chartPath, sweep, params.acceptableMonthlyPayment);
      console.log(`\nCharts written to ${chartPath}`);
    }
    return 0;
  } catch (error) {
    if (error instanceof InputError || error instanceof InvalidArgumentError) {
      console.error(`ERROR: ${error.message}`);
      return 1;
    }
    throw error;
  }
}
