import * as fs from 'node:fs';
import * as path from 'node:path';
import type { z } from 'zod';
import { type ConfigFileSchema, type ConfigSchema, configFileSchema, configSchema, type StreamConfig } from './config';
import { type EnvSchema, envSchema } from './env';

const DEFAULT_CONFIG_PATH = path.resolve(process.cwd(), 'config/config.json');
const DEFAULT_ENV_PATH = path.resolve(process.cwd(), 'config/.env');

export interface LoadOptions {
  configPath?: string;
  envPath?: string;
  skipEnv?: boolean;
}

export interface LoadedConfig {
  config: ConfigSchema;
  env: EnvSchema;
}

interface LoadEnvOptions {
  envPath?: string;
  skipEnv?: boolean;
}

interface EnvSources {
  fileVars: Record<string, string>;
  env: EnvSchema;
}

export function loadConfig(options: LoadOptions = {}): LoadedConfig {
  const {
    configPath = process.env.RACE_CONFIG_PATH ?? DEFAULT_CONFIG_PATH,
    envPath = process.env.RACE_ENV_PATH ?? DEFAULT_ENV_PATH,
    skipEnv = false,
  } = options;

  const configFile = loadConfigFile(configPath);
  const sources = readEnvSources({ envPath, skipEnv });

  const mergedConfig = mergeConfig(configFile, sources);
  const result = configSchema.safeParse(mergedConfig);

  if (!result.success) {
    throw new Error(`Configuration validation failed:\n${formatZodIssues(result.error)}`);
  }

  return {
    config: result.data,
    env: sources.env,
  };
}

export function loadConfigFile(configPath: string = DEFAULT_CONFIG_PATH): ConfigFileSchema {
  if (!fs.existsSync(configPath)) {
    throw new Error(`Configuration file not found: ${configPath}`);
  }

  const configContent = fs.readFileSync(configPath, 'utf-8');
  let rawConfig: unknown;
  try {
    rawConfig = JSON.parse(configContent);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new Error(`Configuration file is not valid JSON (${configPath}): ${reason}`);
  }

  const result = configFileSchema.safeParse(rawConfig);

  if (!result.success) {
    throw new Error(`Configuration file validation failed:\n${formatZodIssues(result.error)}`);
  }

  return result.data;
}

function readEnvSources(options: LoadEnvOptions): EnvSources {
  const { envPath = DEFAULT_ENV_PATH, skipEnv = false } = options;
  const fileVars = skipEnv ? {} : readEnvFile(envPath);
  const processVars = readProcessEnv(Object.keys(envSchema.shape));
  const mergedEnv = { ...fileVars, ...processVars };

  const result = envSchema.safeParse(mergedEnv);

  if (!result.success) {
    throw new Error(`.env validation failed:\n${formatZodIssues(result.error)}`);
  }

  return { fileVars, env: result.data };
}

function readEnvFile(envPath: string): Record<string, string> {
  if (!fs.existsSync(envPath)) {
    return {};
  }

  const content = fs.readFileSync(envPath, 'utf-8');
  return parseEnvContent(content);
}

export function parseEnvContent(content: string): Record<string, string> {
  const envVars: Record<string, string> = {};

  for (const line of content.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith('#')) {
      continue;
    }

    const equalsIndex = trimmed.indexOf('=');
    if (equalsIndex === -1) {
      continue;
    }

    const key = trimmed.slice(0, equalsIndex).trim();
    let value = trimmed.slice(equalsIndex + 1).trim();

    if ((value.startsWith('"') && value.endsWith('"')) || (value.startsWith("'") && value.endsWith("'"))) {
      value = value.slice(1, -1);
    }

    envVars[key] = value;
  }

  return envVars;
}

function readProcessEnv(keys: string[]): Record<string, string> {
  const envVars: Record<string, string> = {};

  for (const key of keys) {
    const value = process.env[key];
    if (typeof value === 'string') {
      envVars[key] = value;
    }
  }

  return envVars;
}

function mergeConfig(configFile: ConfigFileSchema, sources: EnvSources): ConfigSchema {
  return {
    ...configFile,
    telemetry: {
      ...configFile.telemetry,
      logLevel: sources.env.LOG_LEVEL ?? configFile.telemetry.logLevel,
    },
    streams: configFile.streams.map(
      (stream, index): StreamConfig => ({
        id: index,
        name: stream.name,
        endpoint: stream.endpoint,
        accessToken: resolveAccessToken(stream, sources),
      }),
    ),
  };
}

function resolveAccessToken(stream: ConfigFileSchema['streams'][number], sources: EnvSources): string | undefined {
  if (stream.accessToken) {
    return stream.accessToken;
  }

  if (stream.accessTokenEnv) {
    const value = sources.fileVars[stream.accessTokenEnv] ?? process.env[stream.accessTokenEnv];
    if (!value || value.trim().length === 0) {
      throw new Error(`Missing access token env var for stream "${stream.name}": ${stream.accessTokenEnv}`);
    }
    return value.trim();
  }

  return sources.env.GEYSER_X_TOKEN;
}

function formatZodIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const issuePath = issue.path.length > 0 ? issue.path.map(String).join('.') : '<root>';
      return `  - ${issuePath}: ${issue.message}`;
    })
    .join('\n');
}
