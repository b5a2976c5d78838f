/**
 * Default values for Strata configuration
 */

export const ACTION_DEFAULTS = {
  ALLOW_CREATE: true,
  ALLOW_UPDATE: true,
  ALLOW_DELETE: true,
  ALLOW_DATA_UPDATE: true
} as const;

export const STRATA_DEFAULTS = {
  ROOT_COMPONENT_ID: 'root',
  LOCALE: 'en-US'
} as const;

export const LOGGING_DEFAULTS = {
  LEVEL: 'info' as const,

  /** Pretty-print outside production */
  PRETTY_PRINT: process.env.NODE_ENV !== 'production'
};
