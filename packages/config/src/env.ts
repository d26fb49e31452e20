/**
 * Centralized environment variable loader
 *
 * Locates the repo root and loads .env files deterministically.
 * Provides diagnostics and validation without logging secrets.
 */

import { config } from 'dotenv';
import { existsSync, readFileSync } from 'fs';
import { join, resolve, dirname } from 'path';
import { pino } from 'pino';
import { z } from 'zod';
import { ConfigurationError } from '@phenoxform/core';

const logger = pino({ level: process.env.LOG_LEVEL || 'info' });

export interface EnvDiagnostics {
  cwd: string;
  repoRoot: string;
  envFilePath: string;
  envFileExists: boolean;
  requiredKeys: Array<{ key: string; present: boolean; maskedValue?: string; length?: number; source?: string }>;
  warnings: string[];
}

export interface EnvInitResult {
  repoRoot: string;
  envFilePath: string;
  envLocalFilePath: string;
  loaded: boolean;
  localLoaded: boolean;
  keysLoaded: string[];
  /** key -> '.env' | '.env.local' */
  keySources: Record<string, string>;
}

/**
 * Find repository root by walking up from the start directory
 */
export function findRepoRoot(startPath: string = process.cwd()): string {
  let current = resolve(startPath);

  while (true) {
    const packageJsonPath = join(current, 'package.json');
    if (existsSync(packageJsonPath)) {
      try {
        const pkg: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
        if (typeof pkg === 'object' && pkg !== null && 'workspaces' in pkg) {
          return current;
        }
      } catch (error) {
        logger.debug({
          event: 'env.package_json.unreadable',
          path: packageJsonPath,
          error: error instanceof Error ? error.message : String(error),
        }, 'Skipping unreadable package.json');
      }
    }

    if (existsSync(join(current, '.git'))) {
      return current;
    }

    const parent = dirname(current);
    if (parent === current) break;
    current = parent;
  }

  // Fallback: the start path when nothing marks a root
  return resolve(startPath);
}

/**
 * Mask sensitive values for logging
 */
export function maskValue(value: string): string {
  if (value.length <= 8) {
    return '*'.repeat(value.length);
  }
  return `${value.substring(0, 4)}...${value.substring(value.length - 4)}`;
}

function isSecretKey(key: string): boolean {
  return key.includes('TOKEN') || key.includes('SECRET') || key.includes('PASSWORD') || key.includes('KEY');
}

/**
 * Check if value contains unprintable characters (common CRLF issues)
 */
function hasUnprintableChars(value: string): boolean {
  return /[\r\x00-\x08\x0B-\x0C\x0E-\x1F]/.test(value);
}

function hasQuotesOrWhitespace(value: string): boolean {
  return /^["'\s]|["'\s]$/.test(value);
}

// dotenv is loaded once per process
let cachedResult: EnvInitResult | null = null;

function loadEnvFile(path: string, name: string, keysLoaded: string[], keySources: Record<string, string>): boolean {
  const result = config({ path, override: true });
  const parsed = result.parsed ?? {};
  const loaded = !result.error || Object.keys(parsed).length > 0;

  for (const key of Object.keys(parsed)) {
    if (parsed[key].trim().length > 0) {
      keySources[key] = name;
      if (!keysLoaded.includes(key)) keysLoaded.push(key);
    }
  }

  if (!loaded && result.error) {
    logger.warn({ event: 'env.load.failed', file: name, error: result.error.message }, `Error loading ${name}`);
  }
  return loaded;
}

/**
 * Initialize environment variables
 *
 * Loads <repo-root>/.env, then <repo-root>/.env.local over it. A variable that
 * already has a non-empty value is never overwritten by an empty one.
 */
export function initEnv(envFileOverride?: string): EnvInitResult {
  if (cachedResult) {
    return cachedResult;
  }

  const repoRoot = findRepoRoot(process.cwd());
  const envFilePath = resolve(envFileOverride || process.env.ENV_FILE || join(repoRoot, '.env'));
  const envLocalFilePath = resolve(join(repoRoot, '.env.local'));

  const existingEnv: Record<string, string> = {};
  for (const [key, value] of Object.entries(process.env)) {
    if (value && value.trim().length > 0) {
      existingEnv[key] = value;
    }
  }

  const keysLoaded: string[] = [];
  const keySources: Record<string, string> = {};

  let loaded = false;
  if (existsSync(envFilePath)) {
    loaded = loadEnvFile(envFilePath, '.env', keysLoaded, keySources);
  } else {
    logger.debug({ event: 'env.file.missing', path: envFilePath }, '.env file not found');
  }

  let localLoaded = false;
  if (existsSync(envLocalFilePath)) {
    localLoaded = loadEnvFile(envLocalFilePath, '.env.local', keysLoaded, keySources);
  }

  // Restore existing non-empty values the files blanked
  for (const [key, existingValue] of Object.entries(existingEnv)) {
    const currentValue = process.env[key];
    if (!currentValue || currentValue.trim().length === 0) {
      process.env[key] = existingValue;
    }
  }

  cachedResult = { repoRoot, envFilePath, envLocalFilePath, loaded, localLoaded, keysLoaded, keySources };
  return cachedResult;
}

/**
 * Get environment diagnostics (safe for logging, no secrets)
 */
export function getEnvDiagnostics(requiredKeys: readonly string[]): EnvDiagnostics {
  const cwd = process.cwd();
  const repoRoot = findRepoRoot(cwd);
  const envFilePath = resolve(process.env.ENV_FILE || join(repoRoot, '.env'));
  const envFileExists = existsSync(envFilePath);
  const keySources = cachedResult?.keySources ?? {};

  const requiredKeysStatus = requiredKeys.map((key) => {
    const value = process.env[key];
    if (!value || value.trim().length === 0) {
      return { key, present: false };
    }
    return {
      key,
      present: true,
      length: value.trim().length,
      maskedValue: isSecretKey(key) ? maskValue(value) : undefined,
      source: keySources[key],
    };
  });

  const warnings: string[] = [];
  if (!envFileExists) {
    warnings.push(`.env file not found at: ${envFilePath}`);
  }
  for (const key of requiredKeys) {
    const value = process.env[key];
    if (!value) continue;
    if (isSecretKey(key) && hasQuotesOrWhitespace(value)) {
      warnings.push(`${key} contains quotes or leading/trailing whitespace (may cause issues)`);
    }
    if (hasUnprintableChars(value)) {
      warnings.push(`${key} contains unprintable characters (possible CRLF/encoding issue)`);
    }
  }

  return { cwd, repoRoot, envFilePath, envFileExists, requiredKeys: requiredKeysStatus, warnings };
}

/**
 * Trimmed value of a required variable
 */
export function requireEnv(key: string): string {
  const value = process.env[key];

  if (!value || value.trim().length === 0) {
    throw new ConfigurationError(
      `Missing or empty required environment variable: ${key}. ` +
      `Check your .env file and ensure ${key} is set with a non-empty value.`
    );
  }

  return value.trim();
}

const RuntimeEnvSchema = z.object({
  BIOPORTAL_API_KEY: z.string().trim().min(1).optional(),
  BIOPORTAL_URL: z.string().url().optional(),
  ONTOLOGY_DIR: z.string().trim().min(1).optional(),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
});

export interface RuntimeEnv {
  bioportalApiKey?: string;
  bioportalUrl?: string;
  ontologyDir?: string;
  logLevel: string;
}

/**
 * Settings the pipeline reads from the environment
 */
export function readRuntimeEnv(env: NodeJS.ProcessEnv = process.env): RuntimeEnv {
  const blankToUndefined = (value: string | undefined) => (value && value.trim().length > 0 ? value : undefined);
  const parsed = RuntimeEnvSchema.safeParse({
    BIOPORTAL_API_KEY: blankToUndefined(env.BIOPORTAL_API_KEY),
    BIOPORTAL_URL: blankToUndefined(env.BIOPORTAL_URL),
    ONTOLOGY_DIR: blankToUndefined(env.ONTOLOGY_DIR),
    LOG_LEVEL: blankToUndefined(env.LOG_LEVEL),
  });

  if (!parsed.success) {
    throw new ConfigurationError(
      'Invalid environment',
      parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  return {
    bioportalApiKey: parsed.data.BIOPORTAL_API_KEY,
    bioportalUrl: parsed.data.BIOPORTAL_URL,
    ontologyDir: parsed.data.ONTOLOGY_DIR,
    logLevel: parsed.data.LOG_LEVEL,
  };
}
