/**
 * surveyor identifiers - find identifiers named like contextual keywords
 */

import type { Command } from 'commander';

import { DEFAULT_WATCHED_IDENTIFIERS, IdentifierSurveyor } from '../surveyors/identifier-surveyor.js';
import {
  addSurveyOptions,
  parsePositiveInt,
  runSurvey,
  toOverrides,
  type SurveyCommandOptions,
  type SurveyIO,
} from './shared.js';

/**
 * Syntax only, no installs; the config file, environment and flags can turn either back on
 */
export const IDENTIFIERS_DEFAULTS = { forceSkipInstall: true, resolveUnits: false } as const;

export interface IdentifiersOptions extends SurveyCommandOptions {
  ids?: string[];
  stopAfter?: number;
  install?: boolean;
}

export async function identifiersAction(
  paths: string[],
  options: IdentifiersOptions,
  io: SurveyIO = {}
): Promise<number> {
  const overrides = {
    ...toOverrides(paths, options),
    showErrors: false,
    ...(options.install ? { forceSkipInstall: false } : {}),
  };
  const ids = options.ids && options.ids.length > 0 ? options.ids : DEFAULT_WATCHED_IDENTIFIERS;

  return runSurvey(
    overrides,
    options,
    ({ formatter, stats }) => [
      new IdentifierSurveyor({ formatter, stats, ids, stopAfter: options.stopAfter ?? null }),
    ],
    io,
    IDENTIFIERS_DEFAULTS
  );
}

export function registerIdentifiersCommand(program: Command): void {
  const command = program
    .command('identifiers')
    .description('Count identifiers with the given names, split into declarations and references')
    .option('--ids <names...>', 'Identifier names to look for (default: async await yield)')
    .option('--stop-after <n>', 'Stop after the root in which this many occurrences were found', parsePositiveInt)
    .option('--install', 'Install dependencies before analysis');

  addSurveyOptions(command).action(async (paths: string[], options: IdentifiersOptions) => {
    process.exitCode = await identifiersAction(paths, options);
  });
}
