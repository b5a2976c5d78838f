import { defer, of } from 'rxjs';
import { z } from 'zod';
import { createSilentLogger, describeError, type Logger } from '@strata/core';
import { type ClientFunction } from './contracts';
import { defineClientFunction, defineSynchronousFunction } from './define';
import { formatDatePattern, toDate } from './format-date';
import { interpolate } from './format-string';

export type UrlLauncher = (url: URL) => Promise<void> | void;

export interface BasicFunctionsOptions {
  /** Locale for number, currency, date and plural formatting. Defaults to `en-US`. */
  locale?: string;
  /** Receives URLs opened through `openUrl`. Without one, `openUrl` only validates. */
  launchUrl?: UrlLauncher;
  logger?: Logger;
}

/** Logical truthiness for the boolean combinators: only `false` and null-ish values are false. */
function isLogicallyTrue(value: unknown): boolean {
  if (typeof value === 'boolean') return value;
  return value !== null && value !== undefined;
}

function lengthOf(value: unknown): number {
  if (typeof value === 'string' || Array.isArray(value)) return value.length;
  if (typeof value === 'object' && value !== null) return Object.keys(value).length;
  return 0;
}

const ValuesArgs = z.object({ values: z.array(z.unknown()).optional() });
const ValueArgs = z.object({ value: z.unknown() });

const andFunction = defineSynchronousFunction({
  name: 'and',
  description: 'Performs a logical AND over a list of values. An empty or missing list is false.',
  argumentSchema: ValuesArgs,
  returnType: 'boolean',
  run: ({ values }) => values !== undefined && values.length > 0 && values.every(isLogicallyTrue)
});

const orFunction = defineSynchronousFunction({
  name: 'or',
  description: 'Performs a logical OR over a list of values. An empty or missing list is false.',
  argumentSchema: ValuesArgs,
  returnType: 'boolean',
  run: ({ values }) => values !== undefined && values.some(isLogicallyTrue)
});

const notFunction = defineSynchronousFunction({
  name: 'not',
  description: 'Performs a logical NOT on a value. A missing value is false.',
  argumentSchema: ValueArgs,
  returnType: 'boolean',
  run: (args) => ('value' in args ? !isLogicallyTrue(args.value) : false)
});

const requiredFunction = defineSynchronousFunction({
  name: 'required',
  description: 'Checks that the value is not null, undefined, or empty.',
  argumentSchema: ValueArgs,
  returnType: 'boolean',
  run: ({ value }) => {
    if (value === null || value === undefined) return false;
    if (typeof value === 'string' || Array.isArray(value) || typeof value === 'object') {
      return lengthOf(value) > 0;
    }
    return true;
  }
});

const regexFunction = defineSynchronousFunction({
  name: 'regex',
  description: 'Checks that the value matches a regular expression string.',
  argumentSchema: z.object({ value: z.unknown(), pattern: z.string() }),
  returnType: 'boolean',
  run: ({ value, pattern }) => {
    if (typeof value !== 'string') return false;
    let expression: RegExp;
    try {
      expression = new RegExp(pattern);
    } catch (error) {
      throw new Error(`Invalid regex pattern: ${pattern}. ${describeError(error)}`);
    }
    return expression.test(value);
  }
});

const lengthFunction = defineSynchronousFunction({
  name: 'length',
  description:
    'Returns the length of a string, list or map. With min and/or max, returns whether the length is within range.',
  argumentSchema: z.object({
    value: z.unknown(),
    min: z.number().int().optional(),
    max: z.number().int().optional()
  }),
  returnType: 'any',
  run: ({ value, min, max }) => {
    const length = lengthOf(value);
    if (min === undefined && max === undefined) return length;
    if (min !== undefined && length < min) return false;
    if (max !== undefined && length > max) return false;
    return true;
  }
});

const numericFunction = defineSynchronousFunction({
  name: 'numeric',
  description: 'Checks that the value is a number within the optional min/max range.',
  argumentSchema: z.object({
    value: z.unknown(),
    min: z.number().optional(),
    max: z.number().optional()
  }),
  returnType: 'boolean',
  run: ({ value, min, max }) => {
    if (typeof value !== 'number' || Number.isNaN(value)) return false;
    if (min !== undefined && value < min) return false;
    if (max !== undefined && value > max) return false;
    return true;
  }
});

const EMAIL = /^[^@\s]+@[^@\s]+\.[^@\s]+$/;

const emailFunction = defineSynchronousFunction({
  name: 'email',
  description: 'Checks that the value is a valid email address.',
  argumentSchema: ValueArgs,
  returnType: 'boolean',
  run: ({ value }) => typeof value === 'string' && EMAIL.test(value)
});

const formatStringFunction = defineClientFunction({
  name: 'formatString',
  description:
    'Interpolates ${path} placeholders with values from the data model. Paths starting with / are absolute; others are relative to the current context.',
  argumentSchema: z.object({ value: z.string() }),
  returnType: 'string',
  execute: ({ value }, context) => interpolate(value, context)
});

function fallbackText(value: unknown): string {
  return value === null || value === undefined ? '' : String(value);
}

/**
 * Returns the built-in validators, formatters and boolean combinators.
 */
export function createBasicFunctions(options: BasicFunctionsOptions = {}): ClientFunction[] {
  const locale = options.locale ?? 'en-US';
  const logger = options.logger ?? createSilentLogger();

  const formatNumberFunction = defineSynchronousFunction({
    name: 'formatNumber',
    description: 'Formats a number with the specified grouping and decimal precision.',
    argumentSchema: z.object({
      value: z.unknown(),
      decimalPlaces: z.number().int().min(0).max(20).optional(),
      useGrouping: z.boolean().optional()
    }),
    returnType: 'string',
    run: ({ value, decimalPlaces, useGrouping }) => {
      if (typeof value !== 'number') return fallbackText(value);
      const format: Intl.NumberFormatOptions = { useGrouping: useGrouping ?? true };
      if (decimalPlaces !== undefined) {
        format.minimumFractionDigits = decimalPlaces;
        format.maximumFractionDigits = decimalPlaces;
      }
      return new Intl.NumberFormat(locale, format).format(value);
    }
  });

  const formatCurrencyFunction = defineSynchronousFunction({
    name: 'formatCurrency',
    description: 'Formats a number as a currency string using an ISO 4217 currency code.',
    argumentSchema: z.object({ value: z.unknown(), currencyCode: z.unknown() }),
    returnType: 'string',
    run: ({ value, currencyCode }) => {
      if (typeof value !== 'number' || typeof currencyCode !== 'string') return fallbackText(value);
      return new Intl.NumberFormat(locale, { style: 'currency', currency: currencyCode }).format(value);
    }
  });

  const formatDateFunction = defineSynchronousFunction({
    name: 'formatDate',
    description:
      'Formats a timestamp (ISO-8601 string or epoch milliseconds) with a pattern such as "yyyy-MM-dd". Dates are rendered in UTC.',
    argumentSchema: z.object({ value: z.unknown(), pattern: z.unknown() }),
    returnType: 'string',
    run: ({ value, pattern }) => {
      const date = toDate(value);
      if (!date || typeof pattern !== 'string') return fallbackText(value);
      return formatDatePattern(date, pattern, locale);
    }
  });

  const pluralRules = new Intl.PluralRules(locale);
  const pluralizeFunction = defineSynchronousFunction({
    name: 'pluralize',
    description:
      "Returns a string chosen by the CLDR plural category of the count (zero, one, two, few, many, other). Requires an 'other' fallback. For English, just use 'one' and 'other'.",
    argumentSchema: z.object({
      count: z.unknown(),
      zero: z.string().optional(),
      one: z.string().optional(),
      two: z.string().optional(),
      few: z.string().optional(),
      many: z.string().optional(),
      other: z.string().optional()
    }),
    returnType: 'string',
    run: (args) => {
      const { count } = args;
      if (typeof count !== 'number') return '';
      if (count === 0 && args.zero !== undefined) return args.zero;
      const category = pluralRules.select(count);
      return args[category] ?? args.other ?? '';
    }
  });

  const openUrlFunction = defineClientFunction({
    name: 'openUrl',
    description: 'Opens the specified URL in a browser or handler. This function has no return value.',
    argumentSchema: z.object({ url: z.string() }),
    returnType: 'void',
    execute: ({ url }) =>
      defer(() => {
        const target = new URL(url);
        const launch = options.launchUrl;
        if (launch) {
          void Promise.resolve()
            .then(() => launch(target))
            .catch((error: unknown) => {
              logger.warn({ url: target.href, error: describeError(error) }, 'Failed to open URL');
            });
        }
        return of(undefined);
      })
  });

  return [
    requiredFunction,
    regexFunction,
    lengthFunction,
    numericFunction,
    emailFunction,
    formatStringFunction,
    openUrlFunction,
    formatNumberFunction,
    formatCurrencyFunction,
    formatDateFunction,
    pluralizeFunction,
    andFunction,
    orFunction,
    notFunction
  ];
}
