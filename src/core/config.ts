/**
 * doxygen-md - Configuration Loader
 *
 * Handles loading and resolving CLI configuration from multiple sources:
 * - Options passed on the command line
 * - Environment variables
 * - Built-in defaults
 */

import { z } from 'zod';
import type { DoxygenMdConfig, ResolvedConfig } from '../types';
import { createDoxygenMdError } from './errors';

// Default Configuration

const DEFAULT_OUT_DIR = './doxygen_md_output';
const DEFAULT_PATTERN = '*.xml';

// Zod Schema for Validation

const configSchema = z.object({
  input: z.string().min(1).optional(),
  outDir: z.string().min(1).default(DEFAULT_OUT_DIR),
  pattern: z.string().min(1).default(DEFAULT_PATTERN),
  verbose: z.boolean().default(false),
});


// Environment Variable Loading


interface EnvConfig {
  outDir?: string;
  pattern?: string;
  verbose?: boolean;
}

/**
 * Load configuration from environment variables
 */
function loadEnvConfig(env: NodeJS.ProcessEnv): EnvConfig {
  const config: EnvConfig = {};

  if (env.DOXYGEN_MD_OUTDIR) {
    config.outDir = env.DOXYGEN_MD_OUTDIR;
  }

  if (env.DOXYGEN_MD_PATTERN) {
    config.pattern = env.DOXYGEN_MD_PATTERN;
  }

  if (env.DOXYGEN_MD_VERBOSE) {
    config.verbose = env.DOXYGEN_MD_VERBOSE === 'true' || env.DOXYGEN_MD_VERBOSE === '1';
  }

  return config;
}


// Configuration Resolution


/**
 * Validate and resolve configuration (options take precedence over the environment)
 */
export function resolveConfig(options: DoxygenMdConfig, env: NodeJS.ProcessEnv = process.env): ResolvedConfig {
  const envConfig = loadEnvConfig(env);

  const merged = {
    input: options.input,
    outDir: options.outDir || envConfig.outDir,
    pattern: options.pattern || envConfig.pattern,
    verbose: options.verbose ?? envConfig.verbose,
  };

  const result = configSchema.safeParse(merged);
  if (!result.success) {
    const issues = result.error.issues
      .map(issue => `${issue.path.join('.') || 'config'}: ${issue.message}`)
      .join('; ');
    throw createDoxygenMdError('DOXYGEN_MD_INVALID_CONFIG', `doxygen-md: invalid options (${issues})`, result.error);
  }

  return result.data;
}

export { configSchema };
