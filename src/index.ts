#!/usr/bin/env node
import * as fs from 'fs';
import * as path from 'path';
import * as dotenv from 'dotenv';
import { applyEnvOverrides, loadConfig } from './config.js';
import { runDemo } from './demo.js';
import { logger } from './logger.js';
import { DemoConfigSchema } from './types.js';

function parseArgs(argv: string[]): { configFile?: string; ticks?: number; quiet: boolean } {
  let configFile: string | undefined;
  let ticks: number | undefined;
  let quiet = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    // npm forwards a literal `--`.
    if (arg === '--') continue;

    if (arg === '--quiet' || arg === '-q') {
      quiet = true;
      continue;
    }

    if (arg === '--ticks') {
      const next = argv[i + 1];
      if (!next) throw new Error('Missing value for --ticks');
      const n = Number(next);
      if (!Number.isInteger(n) || n <= 0) throw new Error(`Invalid tick count "${next}" for --ticks`);
      ticks = n;
      i++;
      continue;
    }

    if (arg === '--config') {
      const next = argv[i + 1];
      if (!next) throw new Error('Missing value for --config');
      configFile = next;
      i++;
      continue;
    }

    if (arg.startsWith('-')) {
      throw new Error(`Unknown argument: ${arg}`);
    }

    if (!configFile) configFile = arg;
  }

  return { configFile, ticks, quiet };
}

async function main() {
  dotenv.config();

  const args = parseArgs(process.argv.slice(2));
  if (args.quiet) logger.setLevel('warn');

  const configPath = path.resolve(process.cwd(), args.configFile ?? 'dispatch-config.yaml');

  try {
    // Only the default config file may be missing.
    const useDefaults = args.configFile === undefined && !fs.existsSync(configPath);
    const config = useDefaults ? DemoConfigSchema.parse({}) : loadConfig(configPath);
    const result = await runDemo({
      ...config,
      ticks: args.ticks ?? config.ticks,
      dispatcher: applyEnvOverrides(config.dispatcher),
    });
    for (const [tick, names] of result.deliveries) {
      logger.info(`tick ${tick} -> ${names.join(', ')}`, config.dispatcher.name);
    }
    logger.info(`Stats: ${JSON.stringify(result.stats)}`, config.dispatcher.name);
  } catch (error) {
    console.error('Fatal Error:', error);
    process.exit(1);
  }
}

void main();
