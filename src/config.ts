import { z, type ZodError, type ZodIssue } from 'zod';

import {
  createLogger,
  type LogLevel,
  type Logger,
} from './logger.js';

/**
 * Options accepted by `new Template()`.
 */
export const TemplateOptionsSchema = z.object({
  /** Name used in error messages. */
  filename: z.string().min(1).default('<string>'),
  /** Install the whitespace post-filter. */
  stripWhitespace: z.boolean().default(true),
  /** `strict` turns lookups of undefined names into runtime errors. */
  lookupErrors: z.enum([ 'lenient', 'strict' ]).default('lenient'),
}).strict();

/**
 * Options accepted by `new TemplateLoader()`. The template options apply to
 * every loaded template; the filename is always the resolved file path.
 */
export const LoaderOptionsSchema = TemplateOptionsSchema.omit({ filename: true }).extend({
  searchPath: z.union([ z.string(), z.array(z.string()) ])
    .default([])
    .transform((v) => (typeof v === 'string') ? [ v ] : v),
  autoReload: z.boolean().default(false),
  encoding: z.enum([ 'utf8', 'utf-8', 'latin1', 'ascii', 'utf16le' ]).default('utf8'),
}).strict();

export type TemplateOptions = z.input<typeof TemplateOptionsSchema>;
export type TemplateConfig = z.output<typeof TemplateOptionsSchema>;
export type LoaderOptions = z.input<typeof LoaderOptionsSchema>;
export type LoaderConfig = z.output<typeof LoaderOptionsSchema>;

export const LOG_LEVEL_ENV = 'MARKWEAVE_LOG_LEVEL';

const LogLevelSchema = z.enum([ 'debug', 'info', 'warn', 'error', 'silent' ]);

/**
 * Individual validation issue.
 */
export interface ConfigValidationIssue {
  path: (string | number)[];
  message: string;
  code: string;
}

/**
 * Raised when an options object fails validation.
 */
export class TemplateConfigError extends Error {
  readonly issues: ConfigValidationIssue[];

  constructor (message: string, issues: ConfigValidationIssue[]) {
    super(message);
    this.name = 'TemplateConfigError';
    this.issues = issues;
  }

  /**
   * Format the issues for display, one `path: message` line each.
   */
  format (): string {
    const lines = [ 'Configuration validation failed:' ];
    for (const issue of this.issues) {
      const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
      lines.push(`  - ${path}: ${issue.message}`);
    }
    return lines.join('\n');
  }
}

const configIssues = (zodIssues: ZodIssue[]): ConfigValidationIssue[] => zodIssues.map((issue) => ({
  path: issue.path,
  message: issue.message,
  code: issue.code,
}));

/**
 * Freeze an object and everything reachable from it.
 */
const deepFreeze = <T extends object>(obj: T): Readonly<T> => {
  for (const value of Object.values(obj)) {
    const v: unknown = value;
    if (v && typeof v === 'object' && !Object.isFrozen(v)) deepFreeze(v);
  }
  return Object.freeze(obj);
};

const configFailure = (error: ZodError, what: string): TemplateConfigError => {
  const issues = configIssues(error.issues);
  return new TemplateConfigError(`Invalid ${what} options: ${issues.length} validation error(s)`, issues);
};

/**
 * Validate template options and apply defaults.
 *
 * @param input - Raw options.
 * @returns Frozen configuration.
 * @throws TemplateConfigError if validation fails.
 */
export const parseTemplateOptions = (input: unknown): Readonly<TemplateConfig> => {
  const result = TemplateOptionsSchema.safeParse(input ?? {});
  if (!result.success) throw configFailure(result.error, 'template');
  return deepFreeze(result.data);
};

/**
 * Validate loader options and apply defaults.
 *
 * @param input - Raw options.
 * @returns Frozen configuration.
 * @throws TemplateConfigError if validation fails.
 */
export const parseLoaderOptions = (input: unknown): Readonly<LoaderConfig> => {
  const result = LoaderOptionsSchema.safeParse(input ?? {});
  if (!result.success) throw configFailure(result.error, 'loader');
  return deepFreeze(result.data);
};

/**
 * Log level from the environment, `warn` when unset.
 *
 * @param env - Environment variables.
 * @throws TemplateConfigError on an unknown level name.
 */
export const resolveLogLevel = (env: NodeJS.ProcessEnv = process.env): LogLevel => {
  const raw = env[LOG_LEVEL_ENV];
  if (raw === undefined || raw === '') return 'warn';
  const result = LogLevelSchema.safeParse(raw.toLowerCase());
  if (!result.success) {
    throw new TemplateConfigError(`Invalid ${LOG_LEVEL_ENV} value "${raw}"`, configIssues(result.error.issues));
  }
  return result.data;
};

let defaultLogger: Logger | null = null;

/**
 * Logger shared by templates and loaders that were not given one.
 * Created on first use with the level from the environment.
 */
export const getDefaultLogger = (): Logger => {
  if (defaultLogger === null) defaultLogger = createLogger({ level: resolveLogLevel() });
  return defaultLogger;
};
