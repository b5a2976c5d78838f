import { isJsonMap } from '@strata/core';

export interface PathBinding {
  path: string;
}

export interface FunctionCallBinding {
  function: string;
  args?: Record<string, unknown>;
}

export type Binding = PathBinding | FunctionCallBinding;

export function isPathBinding(value: unknown): value is PathBinding {
  return isJsonMap(value) && typeof value.path === 'string' && !('function' in value);
}

export function isFunctionCall(value: unknown): value is FunctionCallBinding {
  if (!isJsonMap(value) || typeof value.function !== 'string') return false;
  return value.args === undefined || isJsonMap(value.args);
}

/**
 * Truthiness for conditions: null, undefined, false, '', 0, NaN and empty
 * collections are false; everything else is true.
 */
export function isTruthy(value: unknown): boolean {
  if (value === null || value === undefined) return false;
  if (typeof value === 'boolean') return value;
  if (typeof value === 'number') return value !== 0 && !Number.isNaN(value);
  if (typeof value === 'string') return value.length > 0;
  if (Array.isArray(value)) return value.length > 0;
  if (typeof value === 'object') return Object.keys(value).length > 0;
  return true;
}
