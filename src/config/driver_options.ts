/**
 * Driver configuration: timeouts, buffer limits and log level.
 *
 * @module config/driver_options
 */

import {
  DEFAULT_COMMAND_TIMEOUT_MS,
  DEFAULT_MAX_LINE_LENGTH,
  DEFAULT_PROBE_TIMEOUT_MS,
  DEFAULT_RESTART_SETTLE_MS,
  DEFAULT_TRAILING_OK_GRACE_MS
} from '../protocol/constants';
import type { LogLevel } from '../util/logger';

export interface DriverOptions {
  /** Deadline for an ordinary command reply. */
  command_timeout_ms: number;
  /** Deadline for the Test probe that resolves an unknown mode. */
  probe_timeout_ms: number;
  /** Wait after Reset / Default before the module is addressed again. */
  restart_settle_ms: number;
  /** How long a set reply waits for its trailing `OK`. */
  trailing_ok_grace_ms: number;
  /** Longest partial line kept between reads. */
  max_line_length: number;
  log_level: LogLevel;
}

export const DEFAULT_DRIVER_OPTIONS: DriverOptions = {
  command_timeout_ms: DEFAULT_COMMAND_TIMEOUT_MS,
  probe_timeout_ms: DEFAULT_PROBE_TIMEOUT_MS,
  restart_settle_ms: DEFAULT_RESTART_SETTLE_MS,
  trailing_ok_grace_ms: DEFAULT_TRAILING_OK_GRACE_MS,
  max_line_length: DEFAULT_MAX_LINE_LENGTH,
  log_level: 'info'
};

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

/**
 * Merge caller overrides onto the defaults.
 *
 * @throws If a duration is negative or not an integer, a limit is not a
 *   positive integer, or the log level is unknown.
 */
export function resolve_driver_options(overrides: Partial<DriverOptions> = {}): DriverOptions {
  const options: DriverOptions = { ...DEFAULT_DRIVER_OPTIONS, ...overrides };

  const durations = [
    ['command_timeout_ms', options.command_timeout_ms],
    ['probe_timeout_ms', options.probe_timeout_ms],
    ['restart_settle_ms', options.restart_settle_ms],
    ['trailing_ok_grace_ms', options.trailing_ok_grace_ms]
  ] as const;

  for (const [key, value] of durations) {
    if (!Number.isInteger(value) || value < 0) {
      throw new Error(`DriverOptions: ${key} must be a non-negative integer, got ${value}`);
    }
  }
  if (options.command_timeout_ms === 0 || options.probe_timeout_ms === 0) {
    throw new Error('DriverOptions: reply deadlines must be greater than zero');
  }
  if (!Number.isInteger(options.max_line_length) || options.max_line_length < 1) {
    throw new Error(`DriverOptions: max_line_length must be a positive integer, got ${options.max_line_length}`);
  }
  if (!LOG_LEVELS.includes(options.log_level)) {
    throw new Error(`DriverOptions: unknown log_level "${options.log_level}"`);
  }

  return options;
}
