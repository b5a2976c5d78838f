import { z } from 'zod';
import { ACTION_DEFAULTS, LOGGING_DEFAULTS, STRATA_DEFAULTS } from './defaults';
import { type LoggingConfig, type StrataConfig, type StrataConfigInput } from './types';

const LogLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']);

const StrataConfigSchema = z.object({
  actions: z.object({
    allowCreate: z.boolean(),
    allowUpdate: z.boolean(),
    allowDelete: z.boolean(),
    allowDataUpdate: z.boolean()
  }),
  rootComponentId: z.string().min(1),
  locale: z.string().min(1),
  toolTimeoutMs: z.number().int().positive().optional(),
  requestTimeoutMs: z.number().int().positive().optional(),
  maxToolIterations: z.number().int().positive().optional(),
  logging: z.object({
    level: LogLevelSchema,
    prettyPrint: z.boolean(),
    name: z.string().optional()
  })
});

export function resolveStrataConfig(input: StrataConfigInput = {}): StrataConfig {
  const resolved: StrataConfig = {
    actions: {
      allowCreate     : input.actions?.allowCreate     ?? ACTION_DEFAULTS.ALLOW_CREATE,
      allowUpdate     : input.actions?.allowUpdate     ?? ACTION_DEFAULTS.ALLOW_UPDATE,
      allowDelete     : input.actions?.allowDelete     ?? ACTION_DEFAULTS.ALLOW_DELETE,
      allowDataUpdate : input.actions?.allowDataUpdate ?? ACTION_DEFAULTS.ALLOW_DATA_UPDATE
    },
    rootComponentId : input.rootComponentId ?? STRATA_DEFAULTS.ROOT_COMPONENT_ID,
    locale          : input.locale          ?? STRATA_DEFAULTS.LOCALE,
    logging: {
      level       : input.logging?.level       ?? LOGGING_DEFAULTS.LEVEL,
      prettyPrint : input.logging?.prettyPrint ?? LOGGING_DEFAULTS.PRETTY_PRINT
    }
  };
  if (input.logging?.name !== undefined) {
    resolved.logging.name = input.logging.name;
  }
  if (input.toolTimeoutMs !== undefined) {
    resolved.toolTimeoutMs = input.toolTimeoutMs;
  }
  if (input.requestTimeoutMs !== undefined) {
    resolved.requestTimeoutMs = input.requestTimeoutMs;
  }
  if (input.maxToolIterations !== undefined) {
    resolved.maxToolIterations = input.maxToolIterations;
  }

  const parsed = StrataConfigSchema.safeParse(resolved);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid strata config: ${issues}`);
  }

  return resolved;
}

/** Reads logging overrides from `STRATA_LOG_LEVEL` and `NODE_ENV`. */
export function loadLoggingConfigFromEnv(env: NodeJS.ProcessEnv = process.env): Partial<LoggingConfig> {
  const config: Partial<LoggingConfig> = {};
  const level = LogLevelSchema.safeParse(env.STRATA_LOG_LEVEL?.toLowerCase());
  if (level.success) {
    config.level = level.data;
  }
  if (env.NODE_ENV !== undefined) {
    config.prettyPrint = env.NODE_ENV !== 'production';
  }
  return config;
}
