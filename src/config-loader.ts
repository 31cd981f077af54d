/**
 * Reflector configuration loader and validator
 *
 * Config comes from user files (YAML or JSON) or from code. Both paths go
 * through the same zod schema so defaults and errors are identical.
 */

import fs from 'fs/promises';
import path from 'path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { DEFAULTS, MIME } from './constants.js';
import { ConfigurationError } from './errors.js';

const jsonText = z.string().refine(
  (text) => {
    try {
      JSON.parse(text);
      return true;
    } catch {
      return false;
    }
  },
  { message: 'must be valid JSON text' }
);

export const reflectorConfigSchema = z.object({
  openapi: z.string().regex(/^3\.0\.\d+$/, 'only OpenAPI 3.0.x documents are supported').default(DEFAULTS.OPENAPI_VERSION),
  info: z.object({
    title: z.string().min(1).default(DEFAULTS.TITLE),
    version: z.string().min(1).default(DEFAULTS.VERSION),
    description: z.string().optional(),
  }).default({}),
  trivialSchemas: z.array(jsonText).default([...DEFAULTS.TRIVIAL_SCHEMAS]),
  defaultResponseContentType: z.string().min(1).default(MIME.JSON),
  logLevel: z.enum(['DEBUG', 'INFO', 'WARN', 'ERROR', 'SILENT']).optional(),
}).strict();

export type ReflectorConfig = z.output<typeof reflectorConfigSchema>;
export type ReflectorConfigInput = z.input<typeof reflectorConfigSchema>;

/**
 * Apply defaults to an in-memory partial config
 */
export function resolveConfig(input: unknown = {}): ReflectorConfig {
  const result = reflectorConfigSchema.safeParse(input);

  if (!result.success) {
    const issues = result.error.issues.map(issue => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));
    throw new ConfigurationError(
      `Invalid reflector configuration: ${issues.map(i => `${i.path || '(root)'}: ${i.message}`).join('; ')}`,
      { issues }
    );
  }

  return result.data;
}

/**
 * Read and validate a config file; .yaml and .yml are parsed as YAML,
 * everything else as JSON
 */
export async function loadConfig(configPath: string): Promise<ReflectorConfig> {
  let content: string;
  try {
    content = await fs.readFile(configPath, 'utf-8');
  } catch (error) {
    throw new ConfigurationError(`Cannot read config file ${configPath}`, {
      path: configPath,
      cause: error instanceof Error ? error.message : String(error),
    });
  }

  const ext = path.extname(configPath).toLowerCase();
  let parsed: unknown;
  try {
    parsed = ext === '.yaml' || ext === '.yml' ? parseYaml(content) : JSON.parse(content);
  } catch (error) {
    throw new ConfigurationError(`Cannot parse config file ${configPath}`, {
      path: configPath,
      cause: error instanceof Error ? error.message : String(error),
    });
  }

  // An empty YAML file parses to null.
  return resolveConfig(parsed ?? {});
}
