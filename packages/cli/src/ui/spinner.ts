/**
 * Spinner - discovery progress on stderr
 */

import ora, { type Ora } from 'ora';

import type { Driver, DiscoveryResult } from 'surveyor-core';

export type SpinnerColor = 'red' | 'green' | 'yellow' | 'blue' | 'magenta' | 'cyan' | 'gray';

export interface SpinnerOptions {
  text?: string;
  color?: SpinnerColor;
  /** Whether to animate (default: off in CI) */
  enabled?: boolean;
  stream?: NodeJS.WritableStream;
}

/**
 * Thin wrapper over ora
 */
export class Spinner {
  private spinner: Ora;
  private readonly enabled: boolean;

  constructor(options: SpinnerOptions = {}) {
    this.enabled = options.enabled ?? !process.env['CI'];
    this.spinner = ora({
      text: options.text ?? '',
      color: options.color ?? 'cyan',
      isEnabled: this.enabled,
      stream: options.stream ?? process.stderr,
    });
  }

  start(text?: string): this {
    if (text) {
      this.spinner.text = text;
    }
    this.spinner.start();
    return this;
  }

  succeed(text?: string): this {
    this.spinner.succeed(text);
    return this;
  }

  fail(text?: string): this {
    this.spinner.fail(text);
    return this;
  }

  stop(): this {
    this.spinner.stop();
    return this;
  }

  get isSpinning(): boolean {
    return this.spinner.isSpinning;
  }
}

export function discoverySummary(result: DiscoveryResult): string {
  const noun = result.total === 1 ? 'root' : 'roots';
  const errors = result.errors.length > 0 ? `, ${result.errors.length} invalid path(s)` : '';
  return `Found ${result.total} analysis ${noun}${errors}`;
}

/**
 * Spin while the driver discovers roots; stop before any root output
 */
export function trackDiscovery(driver: Driver, spinner: Spinner): void {
  driver.on('state', (state) => {
    if (state === 'discovering') {
      spinner.start('Discovering analysis roots...');
    } else if (spinner.isSpinning) {
      spinner.stop();
    }
  });
  driver.on('discovered', (result) => {
    if (!spinner.isSpinning) {return;}
    if (result.total === 0) {
      spinner.fail(discoverySummary(result));
    } else {
      spinner.succeed(discoverySummary(result));
    }
  });
}
