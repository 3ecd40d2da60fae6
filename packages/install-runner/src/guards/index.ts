/**
 * Guard evaluation
 *
 * Guards are pure predicates over the resolved configuration: the plan's
 * flags and a read-only snapshot of the environment.
 */

import type { Guard } from '../dsl/index.js';
import { InstallError, InstallErrorCode } from '../shared/errors.js';

export interface GuardScope {
  flags: Readonly<Record<string, boolean>>;
  env: Readonly<Record<string, string | undefined>>;
}

/**
 * Evaluate a guard. An absent guard always holds.
 * Referencing a flag the plan does not declare is an error rather than false.
 */
export function evaluateGuard(guard: Guard | undefined, scope: GuardScope): boolean {
  if (guard === undefined) {
    return true;
  }

  if ('flag' in guard) {
    const value = scope.flags[guard.flag];
    if (value === undefined) {
      throw new InstallError(
        InstallErrorCode.CONFIG_INVALID,
        `Guard references undeclared flag: ${guard.flag}`
      );
    }
    return value;
  }

  if ('equals' in guard) {
    return scope.env[guard.env] === guard.equals;
  }

  if ('set' in guard) {
    const value = scope.env[guard.env];
    const isSet = value !== undefined && value !== '';
    return isSet === guard.set;
  }

  if ('all' in guard) {
    return guard.all.every(g => evaluateGuard(g, scope));
  }

  if ('any' in guard) {
    return guard.any.some(g => evaluateGuard(g, scope));
  }

  return !evaluateGuard(guard.not, scope);
}

/**
 * Short human-readable rendering, used in dry runs and debug output
 */
export function describeGuard(guard: Guard): string {
  if ('flag' in guard) return `flag ${guard.flag}`;
  if ('equals' in guard) return `${guard.env} == ${JSON.stringify(guard.equals)}`;
  if ('set' in guard) return guard.set ? `${guard.env} is set` : `${guard.env} is unset`;
  if ('all' in guard) return `(${guard.all.map(describeGuard).join(' and ')})`;
  if ('any' in guard) return `(${guard.any.map(describeGuard).join(' or ')})`;
  return `not ${describeGuard(guard.not)}`;
}

/**
 * Names of every flag a guard refers to
 */
export function guardFlags(guard: Guard): string[] {
  if ('flag' in guard) return [guard.flag];
  if ('equals' in guard || 'set' in guard) return [];
  if ('all' in guard) return guard.all.flatMap(guardFlags);
  if ('any' in guard) return guard.any.flatMap(guardFlags);
  return guardFlags(guard.not);
}
