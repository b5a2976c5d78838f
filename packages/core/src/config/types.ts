import { type LogLevel } from '../ports/logger';

/** Which surface operations the generating model is allowed to perform. */
export type ActionsConfig = {
  allowCreate: boolean;
  allowUpdate: boolean;
  allowDelete: boolean;
  allowDataUpdate: boolean;
};

export type LoggingConfig = {
  level: LogLevel;
  prettyPrint: boolean;
  name?: string;
};

export interface StrataConfig {
  actions: ActionsConfig;
  /** Root id the generator is told to use; never enforced against components. */
  rootComponentId: string;
  /** Locale used by the built-in number, currency and date formatters. */
  locale: string;
  /** Per-tool deadline; tools run without one when unset. */
  toolTimeoutMs?: number;
  /** Deadline the content generator imposes on a whole request. */
  requestTimeoutMs?: number;
  /** Cap on model turns per request; the loop is unbounded when unset. */
  maxToolIterations?: number;
  logging: LoggingConfig;
}

export type StrataConfigInput = Partial<Omit<StrataConfig, 'actions' | 'logging'>> & {
  actions?: Partial<ActionsConfig>;
  logging?: Partial<LoggingConfig>;
};
