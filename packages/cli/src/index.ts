/**
 * surveyor command line
 */

import { Command } from 'commander';

import { registerErrorsCommand } from './commands/errors.js';
import { registerIdentifiersCommand } from './commands/identifiers.js';

export const VERSION = '0.1.0';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('surveyor')
    .description('Run analysis visitors over one or many TypeScript and JavaScript projects')
    .version(VERSION);

  registerErrorsCommand(program);
  registerIdentifiersCommand(program);

  return program;
}

export async function main(argv: readonly string[] = process.argv): Promise<void> {
  await createProgram().parseAsync([...argv]);
}

export { errorsAction, parseSeverities, type ErrorsOptions } from './commands/errors.js';
export { IDENTIFIERS_DEFAULTS, identifiersAction, type IdentifiersOptions } from './commands/identifiers.js';
export {
  EXIT_CODES,
  addSurveyOptions,
  parsePositiveInt,
  runSurvey,
  toOverrides,
  type SurveyCommandOptions,
  type SurveyIO,
  type SurveySetup,
} from './commands/shared.js';
export {
  ErrorSurveyor,
  DEFAULT_REPORTED_SEVERITIES,
  formatRootBanner,
  formatSeverityTally,
  type SeverityCounts,
} from './surveyors/error-surveyor.js';
export {
  IdentifierSurveyor,
  DEFAULT_WATCHED_IDENTIFIERS,
  isDeclarationName,
  projectName,
  type Occurrences,
} from './surveyors/identifier-surveyor.js';
