/**
 * Configuration loader for Loa.
 *
 * Loads loa.config.json from the working directory or a specified path.
 * Provides interpreter settings such as tracing and execution limits.
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';

const CONFIG_FILENAMES = ['loa.config.json', '.loarc.json'];

export const LoaConfigSchema = z.object({
  trace: z.boolean().optional(),
  maxSteps: z.number().int().positive().optional(),
  maxCallDepth: z.number().int().positive().optional(),
}).strict();

export type LoaConfig = z.infer<typeof LoaConfigSchema>;

/**
 * Load Loa configuration from the filesystem.
 *
 * Search order:
 * 1. Explicit path (if provided)
 * 2. loa.config.json in cwd
 * 3. .loarc.json in cwd
 *
 * Returns empty config if no file is found (not an error).
 */
export function loadConfig(explicitPath?: string): LoaConfig {
  if (explicitPath) {
    return readConfigFile(explicitPath);
  }
  return findConfigIn(process.cwd()) ?? {};
}

/**
 * Load config relative to a script file's directory, falling back to cwd.
 * Useful when running `loa path/to/script.loa` from a different directory.
 */
export function loadConfigForScript(scriptPath: string): LoaConfig {
  const scriptDir = path.dirname(path.resolve(scriptPath));
  return findConfigIn(scriptDir) ?? loadConfig();
}

function findConfigIn(dir: string): LoaConfig | undefined {
  for (const filename of CONFIG_FILENAMES) {
    const filePath = path.join(dir, filename);
    if (fs.existsSync(filePath)) {
      return readConfigFile(filePath);
    }
  }
  return undefined;
}

function readConfigFile(filePath: string): LoaConfig {
  const content = fs.readFileSync(filePath, 'utf-8');

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new Error(`Invalid JSON in config file ${filePath}: ${reason}`);
  }

  const parsed = LoaConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map(issue => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid config in ${filePath}: ${issues}`);
  }
  return parsed.data;
}
