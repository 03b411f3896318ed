/**
 * Built-in functions for the Brook interpreter.
 */

import { Environment } from './environment';
import { mkBuiltin, mkNumber } from './values';

/**
 * Register all built-in functions into the given environment.
 */
export function registerBuiltins(env: Environment, now: () => number = Date.now): void {
  // Seconds since the Unix epoch, with millisecond precision
  env.define('clock', mkBuiltin('clock', 0, () => mkNumber(now() / 1000)));
}
