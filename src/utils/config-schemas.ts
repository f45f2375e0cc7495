/**
 * Configuration Schemas
 *
 * Centralized Zod schemas for type-safe runtime configuration validation.
 * All environment variable parsing goes through these schemas for consistent
 * validation and clear error messages.
 */

import { z } from 'zod';

// ============================================
// HELPER SCHEMAS
// ============================================

/**
 * Schema for parsing a string as a boolean.
 * Recognizes 'true', '1', 'yes' as true; everything else as false.
 */
export const booleanStringSchema = z
  .string()
  .optional()
  .transform((val) => {
    if (!val) return false;
    return ['true', '1', 'yes'].includes(val.toLowerCase());
  });

/**
 * Boolean-from-string with a default applied when the variable is unset
 */
export function booleanWithDefault(defaultVal: boolean) {
  return z
    .string()
    .optional()
    .transform((val) => {
      if (val === undefined || val === '') return defaultVal;
      return ['true', '1', 'yes'].includes(val.toLowerCase());
    });
}

/**
 * Schema for parsing a string as an integer with bounds.
 */
export function integerStringSchema(options: {
  min?: number;
  max?: number;
  default: number;
}) {
  const { min, max } = options;
  let schema = z.coerce.number().int();

  if (min !== undefined) schema = schema.min(min);
  if (max !== undefined) schema = schema.max(max);

  return schema.default(options.default);
}

/**
 * Schema for a valid URL string.
 */
export const urlSchema = z.string().url();

/**
 * Schema for a URL path beginning with a slash.
 */
export const pathSchema = z.string().startsWith('/', { message: 'Must be a path starting with /' });

// ============================================
// LOG LEVEL SCHEMA
// ============================================

export const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);
export type LogLevel = z.infer<typeof logLevelSchema>;

export const logConfigSchema = z.object({
  level: logLevelSchema.default('info'),
  prettyPrint: booleanStringSchema,
});

export type LogConfig = z.infer<typeof logConfigSchema>;

// ============================================
// SESSION POOL CONFIGURATION
// ============================================

export const poolConfigSchema = z.object({
  /** Idle time after which an unpinned session is evicted */
  sessionTtlMs: integerStringSchema({ min: 1000, max: 24 * 60 * 60 * 1000, default: 30 * 60 * 1000 }),
  /** Background sweep interval; 0 disables the sweeper */
  sweepIntervalMs: integerStringSchema({ min: 0, max: 60 * 60 * 1000, default: 60 * 1000 }),
  /** Idle time after which an abandoned workflow run is dropped */
  runTtlMs: integerStringSchema({ min: 1000, max: 24 * 60 * 60 * 1000, default: 30 * 60 * 1000 }),
});

export type PoolConfig = z.infer<typeof poolConfigSchema>;

// ============================================
// BROWSER CONFIGURATION
// ============================================

export const browserConfigSchema = z.object({
  headless: booleanWithDefault(true),
  /** Upper bound for navigation and element waits */
  timeout: integerStringSchema({ min: 1000, max: 300000, default: 30000 }),
  slowMo: integerStringSchema({ min: 0, max: 5000, default: 0 }),
});

export type BrowserConfig = z.infer<typeof browserConfigSchema>;

// ============================================
// PORTAL CONFIGURATION
// ============================================

export const portalConfigSchema = z.object({
  baseUrl: urlSchema.default('https://portal.example.com'),
  loginPath: pathSchema.default('/login'),
  appointmentPath: pathSchema.default('/appointments/new'),
  containersPath: pathSchema.default('/containers'),
  appointmentListPath: pathSchema.default('/appointments'),
});

export type PortalConfig = z.infer<typeof portalConfigSchema>;

// ============================================
// WORKFLOW CONFIGURATION
// ============================================

export const unreadableSignalPolicySchema = z.enum(['assume_advanced', 'ambiguous']);

export const workflowConfigSchema = z.object({
  /** Extra transition attempts after the first, re-filling before each */
  maxRetries: integerStringSchema({ min: 0, max: 10, default: 2 }),
  /** Wait between firing a transition and reading the step indicator */
  settleMs: integerStringSchema({ min: 0, max: 60000, default: 15000 }),
  unreadableSignalPolicy: unreadableSignalPolicySchema.default('assume_advanced'),
  /** Wait after entering a phase, before filling */
  entrySettleMs: integerStringSchema({ min: 0, max: 60000, default: 5000 }),
  /** Wait after loading a portal page for the single-page app to boot */
  bootSettleMs: integerStringSchema({ min: 0, max: 120000, default: 45000 }),
  /** Wait after each click or keystroke */
  uiSettleMs: integerStringSchema({ min: 0, max: 10000, default: 1000 }),
});

export type WorkflowConfig = z.infer<typeof workflowConfigSchema>;

// ============================================
// CONTENT LOADER CONFIGURATION
// ============================================

export const loaderConfigSchema = z.object({
  stabilityThreshold: integerStringSchema({ min: 1, max: 50, default: 6 }),
  maxCycles: integerStringSchema({ min: 1, max: 10000, default: 200 }),
  settleMs: integerStringSchema({ min: 0, max: 30000, default: 700 }),
});

export type LoaderConfig = z.infer<typeof loaderConfigSchema>;

// ============================================
// COMPLETE APPLICATION CONFIGURATION
// ============================================

/**
 * Complete validated configuration for the engine.
 */
export const appConfigSchema = z.object({
  log: logConfigSchema,
  pool: poolConfigSchema,
  browser: browserConfigSchema,
  portal: portalConfigSchema,
  workflow: workflowConfigSchema,
  loader: loaderConfigSchema,
});

export type AppConfig = z.infer<typeof appConfigSchema>;

// ============================================
// ERROR FORMATTING
// ============================================

/**
 * Format Zod validation errors into readable messages.
 */
export function formatConfigErrors(error: z.ZodError<unknown>): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.join('.');
      return `  - ${path}: ${issue.message}`;
    })
    .join('\n');
}

/**
 * Create a configuration validation error with helpful messages.
 */
export class ConfigValidationError extends Error {
  readonly code = 'CONFIG_INVALID';

  constructor(
    public readonly section: string,
    public readonly zodError: z.ZodError
  ) {
    const formatted = formatConfigErrors(zodError);
    super(
      `Configuration validation failed for ${section}:\n${formatted}\n\n` +
      `Please check your environment variables or configuration file.`
    );
    this.name = 'ConfigValidationError';
  }
}
