import * as fs from 'fs';
import * as yaml from 'yaml';
import { ZodError } from 'zod';
import { ConfigError } from './errors.js';
import { logger } from './logger.js';
import { DemoConfigSchema, HandlerErrorPolicySchema, type DemoConfig, type DispatcherConfig } from './types.js';
import { isFalsyEnv, isTruthyEnv } from './utils.js';

function describeZodError(error: ZodError): string {
  return error.issues
    .map(issue => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

/**
 * Parse and validate a YAML config document. An empty document yields all defaults.
 */
export function parseConfig(text: string, source = '<inline>'): DemoConfig {
  let raw: unknown;
  try {
    raw = yaml.parse(text);
  } catch (error) {
    throw new ConfigError(source, error);
  }

  const result = DemoConfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    throw new ConfigError(source, new Error(describeZodError(result.error)));
  }
  return result.data;
}

export function loadConfig(configPath: string): DemoConfig {
  logger.info(`Loading configuration from ${configPath}`, 'config');

  try {
    const config = parseConfig(fs.readFileSync(configPath, 'utf-8'), configPath);
    logger.info('Configuration loaded and validated successfully.', 'config');
    return config;
  } catch (error) {
    const wrapped = error instanceof ConfigError ? error : new ConfigError(configPath, error);
    logger.error(`Failed to load config: ${wrapped.message}`, 'config');
    throw wrapped;
  }
}

/**
 * Apply `DISPATCH_TRACE` and `DISPATCH_HANDLER_ERRORS` on top of a dispatcher config.
 * Unset or unrecognised values leave the config as it is.
 */
export function applyEnvOverrides(config: DispatcherConfig, env: NodeJS.ProcessEnv = process.env): DispatcherConfig {
  const next = { ...config };

  if (isTruthyEnv(env.DISPATCH_TRACE)) next.trace = true;
  else if (isFalsyEnv(env.DISPATCH_TRACE)) next.trace = false;

  const policy = HandlerErrorPolicySchema.safeParse((env.DISPATCH_HANDLER_ERRORS ?? '').toLowerCase().trim());
  if (policy.success) next.handler_errors = policy.data;

  return next;
}
