/**
 * Command line front end
 */

import { pino } from 'pino';
import { PipelineError } from '@phenoxform/core';
import { formatLintReport } from '@phenoxform/checks';
import {
  getEnvDiagnostics,
  initEnv,
  loadPipelineConfig,
  readRuntimeEnv,
} from '@phenoxform/config';
import { buildPipeline } from './build.js';

const logger = pino({ level: process.env.LOG_LEVEL || 'info' });

const ENV_KEYS = ['BIOPORTAL_API_KEY', 'BIOPORTAL_URL', 'ONTOLOGY_DIR', 'LOG_LEVEL'] as const;

export const EXIT_OK = 0;
export const EXIT_FAILED = 1;
export const EXIT_LINT = 2;

export class CliError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliError';
  }
}

export interface CliOptions {
  configPath?: string;
  envFile?: string;
  /** Exit with EXIT_LINT when checks report an error */
  failOnLint: boolean;
  checkEnv: boolean;
  showHelp: boolean;
}

export const USAGE = [
  'Usage: phenoxform --config <path> [options]',
  '',
  'Options:',
  '  --config <path>    Pipeline configuration (YAML or JSON)',
  '  --env-file <path>  Environment file to load instead of <repo>/.env',
  '  --fail-on-lint     Exit with status 2 when checks report errors',
  '  --check-env        Print environment diagnostics and exit',
  '  --help             Show this message',
].join('\n');

function requireValue(argv: readonly string[], index: number, flag: string): string {
  const value = argv[index];
  if (value === undefined || value.startsWith('--')) {
    throw new CliError(`Missing value for ${flag}`);
  }
  return value;
}

export function parseArgs(argv: readonly string[]): CliOptions {
  const options: CliOptions = { failOnLint: false, checkEnv: false, showHelp: false };

  for (let i = 0; i < argv.length; i += 1) {
    const token = argv[i];
    if (!token.startsWith('--')) {
      throw new CliError(`Unexpected argument: ${token}`);
    }
    switch (token.slice(2)) {
      case 'config':
        options.configPath = requireValue(argv, ++i, '--config');
        break;
      case 'env-file':
        options.envFile = requireValue(argv, ++i, '--env-file');
        break;
      case 'fail-on-lint':
        options.failOnLint = true;
        break;
      case 'check-env':
        options.checkEnv = true;
        break;
      case 'help':
        options.showHelp = true;
        break;
      default:
        throw new CliError(`Unknown option: ${token}`);
    }
  }

  return options;
}

/**
 * Error text safe to print: credentials in the message are masked
 */
export function safeErrorMessage(err: unknown): string {
  let msg = err instanceof Error ? err.message : String(err);
  msg = msg.replace(/token[=:]\s*[\w-]+/gi, 'token=***');
  msg = msg.replace(/api[_-]?key[=:]\s*[\w-]+/gi, 'api_key=***');
  if (msg.length > 2000) {
    msg = msg.substring(0, 2000) + '...';
  }
  return msg;
}

function envReport(): string {
  const diagnostics = getEnvDiagnostics(ENV_KEYS);
  const lines = [
    `Repo root: ${diagnostics.repoRoot}`,
    `.env file: ${diagnostics.envFilePath} (${diagnostics.envFileExists ? 'found' : 'missing'})`,
  ];
  for (const key of diagnostics.requiredKeys) {
    const detail = key.maskedValue ? ` (${key.maskedValue})` : '';
    lines.push(`  ${key.present ? 'set' : 'unset'}  ${key.key}${detail}`);
  }
  for (const warning of diagnostics.warnings) {
    lines.push(`  warning: ${warning}`);
  }
  return lines.join('\n');
}

/**
 * Run the CLI and return the process exit status
 */
export async function runCli(
  argv: readonly string[],
  write: (text: string) => void = text => process.stdout.write(`${text}\n`)
): Promise<number> {
  let options: CliOptions;
  try {
    options = parseArgs(argv);
  } catch (error) {
    write(`${safeErrorMessage(error)}\n\n${USAGE}`);
    return EXIT_FAILED;
  }

  if (options.showHelp) {
    write(USAGE);
    return EXIT_OK;
  }

  initEnv(options.envFile);

  if (options.checkEnv) {
    write(envReport());
    return EXIT_OK;
  }

  if (!options.configPath) {
    write(`Missing required --config <path>\n\n${USAGE}`);
    return EXIT_FAILED;
  }

  try {
    const env = readRuntimeEnv();
    const config = await loadPipelineConfig(options.configPath);
    const { pipeline, sources } = buildPipeline(config, { env });
    const result = await pipeline.run(sources);

    write(`Processed ${result.records.length} subject(s) from ${sources.length} source(s)`);
    const counts = Object.entries(result.diagnostics.countByKind());
    write(counts.length > 0
      ? `Diagnostics: ${counts.map(([kind, count]) => `${kind}=${count}`).join(', ')}`
      : 'Diagnostics: none');
    if (result.lintReport) {
      write(formatLintReport(result.lintReport));
      if (options.failOnLint && result.lintReport.hasViolations) {
        return EXIT_LINT;
      }
    }
    return EXIT_OK;
  } catch (error) {
    logger.error({
      event: 'cli.failed',
      code: error instanceof PipelineError ? error.code : undefined,
      error: safeErrorMessage(error),
    }, 'Run failed');
    write(`Error: ${safeErrorMessage(error)}`);
    return EXIT_FAILED;
  }
}
