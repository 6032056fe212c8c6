import { existsSync, readFileSync } from 'fs';
import { load } from 'js-yaml';
import { z } from 'zod';
import merge from 'lodash/merge.js';
import { DEFAULTS_FILE, resolvePackagePath } from './paths.js';

// ============================================
// Schemas (validation only, defaults come from config.defaults.yaml)
// ============================================

const logConfigSchema = z.object({
  level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']),
  target: z.enum(['stdout', 'file']),
  filePath: z.string(),
  pretty: z.boolean(),
});

const charsetsConfigSchema = z.object({
  default: z.string().min(1, 'charsets.default must name a charset'),
});

const configSchema = z.object({
  log: logConfigSchema,
  charsets: charsetsConfigSchema,
});

const yamlDocumentSchema = z.record(z.string(), z.unknown());

export type LogConfig = z.infer<typeof logConfigSchema>;
export type CharsetsConfig = z.infer<typeof charsetsConfigSchema>;
export type Config = z.infer<typeof configSchema>;

// ============================================
// Loading
// ============================================

function readYaml(path: string): Record<string, unknown> {
  const doc = load(readFileSync(path, 'utf8'));
  // An empty file loads as undefined
  return doc === undefined || doc === null ? {} : yamlDocumentSchema.parse(doc);
}

/**
 * Load defaults, merge the user file over them (when present) and validate.
 */
export function loadConfigFrom(defaultsPath: string, userPath: string): Config {
  try {
    const defaults = readYaml(defaultsPath);
    const user = existsSync(userPath) ? readYaml(userPath) : {};
    return configSchema.parse(merge({}, defaults, user));
  } catch (error) {
    if (error instanceof z.ZodError) {
      console.error('Configuration validation failed:');
      error.issues.forEach((e) => console.error(`  - ${e.path.join('.')}: ${e.message}`));
      throw new Error('Invalid configuration. Please check config.yaml and config.defaults.yaml');
    }
    throw error;
  }
}

export function loadProjectConfig(): Config {
  return loadConfigFrom(resolvePackagePath(DEFAULTS_FILE), resolvePackagePath('config.yaml'));
}

// ============================================
// State
// ============================================

let config: Config | null = null;

/**
 * Install a configuration. Without an argument, loads the project's YAML files.
 */
export function initConfig(value?: Config): void {
  config = value === undefined ? loadProjectConfig() : configSchema.parse(value);
}

function getConfig(): Config {
  if (!config) {
    config = loadProjectConfig();
  }
  return config;
}

// ============================================
// Getters
// ============================================

export const getLogConfig = () => getConfig().log;
export const getCharsetsConfig = () => getConfig().charsets;
