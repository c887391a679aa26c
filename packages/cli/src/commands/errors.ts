/**
 * surveyor errors - print the diagnostics of every project under a path
 */

import { Option, type Command } from 'commander';
import { SEVERITIES, type Severity } from 'surveyor-core';

import { DEFAULT_REPORTED_SEVERITIES, ErrorSurveyor } from '../surveyors/error-surveyor.js';
import { addSurveyOptions, runSurvey, toOverrides, type SurveyCommandOptions, type SurveyIO } from './shared.js';

export interface ErrorsOptions extends SurveyCommandOptions {
  severity?: string[];
}

function isSeverity(value: string): value is Severity {
  return SEVERITIES.some((severity) => severity === value);
}

export function parseSeverities(values: readonly string[] | undefined): Severity[] {
  if (!values || values.length === 0) {
    return [...DEFAULT_REPORTED_SEVERITIES];
  }
  return values.map((value) => value.toUpperCase()).filter(isSeverity);
}

export async function errorsAction(paths: string[], options: ErrorsOptions, io: SurveyIO = {}): Promise<number> {
  const severities = parseSeverities(options.severity);
  const overrides = { ...toOverrides(paths, options), showErrors: true };

  return runSurvey(overrides, options, ({ formatter }) => [new ErrorSurveyor({ formatter, severities })], io);
}

export function registerErrorsCommand(program: Command): void {
  const command = program
    .command('errors')
    .description('Report compiler diagnostics for each project')
    .addOption(
      new Option('-s, --severity <levels...>', 'Severities to report').choices([
        ...SEVERITIES,
        ...SEVERITIES.map((severity) => severity.toLowerCase()),
      ])
    );

  addSurveyOptions(command).action(async (paths: string[], options: ErrorsOptions) => {
    process.exitCode = await errorsAction(paths, options);
  });
}
