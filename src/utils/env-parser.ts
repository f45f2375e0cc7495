/**
 * Environment Variable Parser
 *
 * Type-safe environment variable parsing with validation.
 * Centralizes all env var access and provides clear error messages
 * for misconfiguration.
 */

import type { z } from 'zod';
import {
  logConfigSchema,
  poolConfigSchema,
  browserConfigSchema,
  portalConfigSchema,
  workflowConfigSchema,
  loaderConfigSchema,
  ConfigValidationError,
  type AppConfig,
  type LogConfig,
  type PoolConfig,
  type BrowserConfig,
  type PortalConfig,
  type WorkflowConfig,
  type LoaderConfig,
} from './config-schemas.js';

type Env = Record<string, string | undefined>;

// ============================================
// ENVIRONMENT VARIABLE MAPPING
// ============================================

function mapEnvToLogConfig(env: Env) {
  return {
    level: env.LOG_LEVEL,
    prettyPrint: env.LOG_PRETTY,
  };
}

function mapEnvToPoolConfig(env: Env) {
  return {
    sessionTtlMs: env.SESSION_TTL_MS,
    sweepIntervalMs: env.SESSION_SWEEP_INTERVAL_MS,
    runTtlMs: env.RUN_TTL_MS,
  };
}

function mapEnvToBrowserConfig(env: Env) {
  return {
    headless: env.BROWSER_HEADLESS,
    timeout: env.BROWSER_TIMEOUT,
    slowMo: env.BROWSER_SLOW_MO,
  };
}

function mapEnvToPortalConfig(env: Env) {
  return {
    baseUrl: env.PORTAL_BASE_URL,
    loginPath: env.PORTAL_LOGIN_PATH,
    appointmentPath: env.PORTAL_APPOINTMENT_PATH,
    containersPath: env.PORTAL_CONTAINERS_PATH,
    appointmentListPath: env.PORTAL_APPOINTMENT_LIST_PATH,
  };
}

function mapEnvToWorkflowConfig(env: Env) {
  return {
    maxRetries: env.PHASE_MAX_RETRIES,
    settleMs: env.PHASE_SETTLE_MS,
    unreadableSignalPolicy: env.UNREADABLE_SIGNAL_POLICY,
    entrySettleMs: env.PHASE_ENTRY_SETTLE_MS,
    bootSettleMs: env.PORTAL_BOOT_SETTLE_MS,
    uiSettleMs: env.UI_SETTLE_MS,
  };
}

function mapEnvToLoaderConfig(env: Env) {
  return {
    stabilityThreshold: env.LOADER_STABILITY_THRESHOLD,
    maxCycles: env.LOADER_MAX_CYCLES,
    settleMs: env.LOADER_SCROLL_SETTLE_MS,
  };
}

// ============================================
// INDIVIDUAL CONFIG PARSERS
// ============================================

function parseSection<S extends z.ZodTypeAny>(section: string, schema: S, input: unknown): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new ConfigValidationError(section, result.error);
  }
  return result.data;
}

/**
 * Parse and validate logging configuration from environment.
 */
export function parseLogConfig(env: Env = process.env): LogConfig {
  return parseSection('logging', logConfigSchema, mapEnvToLogConfig(env));
}

/**
 * Parse and validate session pool configuration from environment.
 */
export function parsePoolConfig(env: Env = process.env): PoolConfig {
  return parseSection('pool', poolConfigSchema, mapEnvToPoolConfig(env));
}

/**
 * Parse and validate browser configuration from environment.
 */
export function parseBrowserConfig(env: Env = process.env): BrowserConfig {
  return parseSection('browser', browserConfigSchema, mapEnvToBrowserConfig(env));
}

/**
 * Parse and validate portal configuration from environment.
 */
export function parsePortalConfig(env: Env = process.env): PortalConfig {
  return parseSection('portal', portalConfigSchema, mapEnvToPortalConfig(env));
}

/**
 * Parse and validate workflow engine configuration from environment.
 */
export function parseWorkflowConfig(env: Env = process.env): WorkflowConfig {
  return parseSection('workflow', workflowConfigSchema, mapEnvToWorkflowConfig(env));
}

/**
 * Parse and validate content loader configuration from environment.
 */
export function parseLoaderConfig(env: Env = process.env): LoaderConfig {
  return parseSection('loader', loaderConfigSchema, mapEnvToLoaderConfig(env));
}

// ============================================
// COMPLETE CONFIGURATION
// ============================================

/**
 * Parse every configuration section. Throws ConfigValidationError naming the
 * first section that fails.
 */
export function parseAppConfig(env: Env = process.env): AppConfig {
  return {
    log: parseLogConfig(env),
    pool: parsePoolConfig(env),
    browser: parseBrowserConfig(env),
    portal: parsePortalConfig(env),
    workflow: parseWorkflowConfig(env),
    loader: parseLoaderConfig(env),
  };
}
