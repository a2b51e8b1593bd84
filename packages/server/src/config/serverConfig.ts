/**
 * @fileoverview Server configuration loading from YAML.
 * Validates and caches configuration for the coordinator.
 */

import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { GameSettingsSchema } from '@tagfield/shared';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';

// Schema for server configuration
const ServerConfigSchema = z.object({
  server: z.object({
    host: z.string().min(1),
    port: z.number().int().min(0).max(65535),
  }),
  game: GameSettingsSchema,
  logging: z.object({
    level: z.enum(['debug', 'info', 'warn', 'error']),
  }),
});

export type ServerConfig = z.infer<typeof ServerConfigSchema>;

let cachedConfig: ServerConfig | null = null;

/**
 * Apply PORT and LOG_LEVEL environment overrides on top of the file contents.
 */
function applyEnvOverrides(rawConfig: unknown): unknown {
  if (typeof rawConfig !== 'object' || rawConfig === null) {
    return rawConfig;
  }
  const config: Record<string, unknown> = { ...rawConfig };
  const server = config['server'];
  const logging = config['logging'];

  // biome-ignore lint/complexity/useLiteralKeys: TypeScript requires bracket notation for index signatures
  const port = process.env['PORT'];
  // biome-ignore lint/complexity/useLiteralKeys: TypeScript requires bracket notation for index signatures
  const level = process.env['LOG_LEVEL'];

  return {
    ...config,
    server:
      port !== undefined && typeof server === 'object' && server !== null
        ? { ...server, port: Number(port) }
        : server,
    logging:
      level !== undefined && typeof logging === 'object' && logging !== null
        ? { ...logging, level }
        : logging,
  };
}

/**
 * Load and validate server configuration from a YAML file.
 * Caches the result for subsequent calls.
 *
 * Config file is loaded from:
 * - the explicit path, if given
 * - CONFIG_PATH environment variable if set
 * - Otherwise from ./config/server.yaml relative to cwd (project root)
 */
export function loadServerConfig(path?: string): ServerConfig {
  if (cachedConfig) {
    return cachedConfig;
  }

  const configPath =
    // biome-ignore lint/complexity/useLiteralKeys: TypeScript requires bracket notation for index signatures
    path ?? process.env['CONFIG_PATH'] ?? join(process.cwd(), 'config/server.yaml');

  try {
    const fileContents = readFileSync(configPath, 'utf8');
    const rawConfig: unknown = parseYaml(fileContents);
    const validatedConfig = ServerConfigSchema.parse(applyEnvOverrides(rawConfig));
    cachedConfig = validatedConfig;
    return validatedConfig;
  } catch (error) {
    if (error instanceof z.ZodError) {
      throw new Error(
        `Invalid server configuration in ${configPath}: ${error.issues
          .map((issue) => `${issue.path.join('.')} ${issue.message}`)
          .join('; ')}`
      );
    }
    throw error;
  }
}

/**
 * Clear the cached config (useful for testing)
 */
export function clearConfigCache(): void {
  cachedConfig = null;
}
