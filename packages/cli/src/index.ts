// packages/cli/src/index.ts

export { run, USAGE } from './cli';
export {
  DEFAULT_INPUT_PATH,
  InputError,
  ParameterFileSchema,
  SAMPLE_PARAMETERS,
  loadParameterFile,
  readParameterFile,
  toLoanParameters,
  validateParameters,
  writeSampleParameterFile,
} from './input';
export type { ParameterFile } from './input';
export { formatCreditResults, formatModeResults, formatParameters, formatSweep } from './report';
export { CHART_JS_URL, buildChartConfigs, buildChartPage, writeChartPage } from './chart';
export type { ChartConfig } from './chart';
