// packages/cli/src/input.ts

import { readFileSync, writeFileSync } from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import type { LoanParameters } from '@credit-terms/engine';

export const DEFAULT_INPUT_PATH = fileURLToPath(new URL('../input/default_input.json', import.meta.url));

export class InputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InputError';
  }
}

// ---------- schema ----------
const missing = (key: string) => `There's no ${key} in the input file, please set a value under the '${key}' key`;
const empty = (key: string) => `${key} is empty, please add some values under the '${key}' key`;

function amount(key: string) {
  return z
    .number({ required_error: missing(key), invalid_type_error: `${key} must be a number` })
    .finite(`${key} must be a finite number`)
    .min(0, `${key} cannot be negative`);
}

function valueList(key: string, lowerBound: 'zero' | 'minus-hundred' = 'zero') {
  const value = z
    .number({ invalid_type_error: `${key} values must be numbers` })
    .finite(`${key} values must be finite numbers`);
  return z
    .array(lowerBound === 'zero'
      ? value.min(0, `${key} values cannot be negative`)
      : value.gt(-100, `${key} values must be greater than -100`), {
      required_error: missing(key),
      invalid_type_error: `${key} must be a list of numbers`,
    })
    .nonempty({ message: empty(key) });
}

export const ParameterFileSchema = z.object(
  {
    'Credit amount': amount('Credit amount'),
    'Credit rate': valueList('Credit rate'),
    'Expected inflation': valueList('Expected inflation', 'minus-hundred'),
    'Acceptable monthly payment': valueList('Acceptable monthly payment').optional(),
    'Investment interest rate': valueList('Investment interest rate').optional(),
  },
  { invalid_type_error: 'The input file must contain a JSON object' },
);

export type ParameterFile = z.infer<typeof ParameterFileSchema>;

export const SAMPLE_PARAMETERS: ParameterFile = {
  'Credit amount': 600000,
  'Credit rate': [8.0],
  'Expected inflation': [3.0],
  'Acceptable monthly payment': [6000],
  'Investment interest rate': [5.0],
};

// ---------- file handling ----------
const messageOf = (error: unknown): string => (error instanceof Error ? error.message : String(error));

/**
 * Reads and decodes a parameter file. Paths that still climb out with `..`
 * after normalization are refused.
 */
export function readParameterFile(filepath: string): unknown {
  const normalized = path.normalize(filepath);
  if (normalized.split(/[\\/]/).includes('..')) {
    throw new InputError(`Path traversal detected in ${filepath}`);
  }

  let text: string;
  try {
    text = readFileSync(normalized, 'utf8');
  } catch (error) {
    throw new InputError(`Unable to read the input file ${normalized}: ${messageOf(error)}`);
  }

  try {
    return JSON.parse(text);
  } catch (error) {
    throw new InputError(`An error occurred during input file decoding: ${messageOf(error)}`);
  }
}

export function validateParameters(raw: unknown): ParameterFile {
  const parsed = ParameterFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new InputError(parsed.error.issues.map((issue) => issue.message).join('; '));
  }
  return parsed.data;
}

export function toLoanParameters(file: ParameterFile): LoanParameters {
  return {
    principal: file['Credit amount'],
    annualRatePercent: file['Credit rate'][0],
    inflationRatePercent: file['Expected inflation'][0],
    acceptableMonthlyPayment: file['Acceptable monthly payment']?.[0],
    investmentRatePercent: file['Investment interest rate']?.[0],
  };
}

export const loadParameterFile = (filepath: string): ParameterFile =>
  validateParameters(readParameterFile(filepath));

export function writeSampleParameterFile(filepath: string): void {
  try {
    writeFileSync(filepath, JSON.stringify(SAMPLE_PARAMETERS, null, 2) + '\n', 'utf8');
  } catch (error) {
    throw new InputError(`Failed to write the sample input file ${filepath}: ${messageOf(error)}`);
  }
}
