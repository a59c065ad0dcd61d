/**
 * Copyright (c) Microsoft Corporation.
 *
 * Licensed under the Apache License, Version 2.0 (the "License");
 * you may not use this file except in compliance with the License.
 * You may obtain a copy of the License at
 *
 * http://www.apache.org/licenses/LICENSE-2.0
 *
 * Unless required by applicable law or agreed to in writing, software
 * distributed under the License is distributed on an "AS IS" BASIS,
 * WITHOUT WARRANTIES OR CONDITIONS OF ANY KIND, either express or implied.
 * See the License for the specific language governing permissions and
 * limitations under the License.
 */

import fs from 'fs';
import os from 'os';
import path from 'path';
import YAML from 'yaml';
import { z } from 'zod';
import { ConfigError } from './errors';
import { debugLogger } from '../utils/debugLogger';
import { errorMessage } from '../utils/utils';

const permissionsSchema = z.union([
  z.number().int(),
  z.string().regex(/^(0o)?[0-7]{3,4}$/, 'expected an octal mode such as 0600').transform(mode => parseInt(mode.replace('0o', ''), 8)),
]).pipe(z.number().int().min(0).max(0o777));

const configSchema = z.object({
  socket: z.object({
    path: z.string().min(1),
    permissions: permissionsSchema,
  }),
  layout: z.string().min(1),
  device: z.object({
    path: z.string(),
  }),
  performance: z.object({
    maxMessageSize: z.coerce.number().int().positive(),
    streamDelayMs: z.coerce.number().int().nonnegative(),
    charDelayMs: z.coerce.number().int().nonnegative(),
    maxConcurrentCommands: z.coerce.number().int().positive(),
    commandTimeoutMs: z.coerce.number().int().nonnegative(),
  }),
  logging: z.object({
    level: z.enum(['debug', 'info', 'warn', 'error']),
  }),
});

export type Config = z.output<typeof configSchema>;

type ConfigTree = { [key: string]: unknown };

export type LoadConfigOptions = {
  configFile?: string,
  env?: NodeJS.ProcessEnv,
  searchPaths?: string[],
};

export function defaultSocketPath(env: NodeJS.ProcessEnv = process.env): string {
  if (env.XDG_RUNTIME_DIR)
    return path.join(env.XDG_RUNTIME_DIR, 'vkbd.sock');
  return '/tmp/.vkbd.sock';
}

export function defaultConfig(env: NodeJS.ProcessEnv = process.env): Config {
  return {
    socket: {
      path: defaultSocketPath(env),
      permissions: 0o600,
    },
    layout: 'us',
    device: {
      path: '',
    },
    performance: {
      maxMessageSize: 1024 * 1024,
      streamDelayMs: 50,
      charDelayMs: 10,
      maxConcurrentCommands: 100,
      commandTimeoutMs: 0,
    },
    logging: {
      level: 'info',
    },
  };
}

export function defaultSearchPaths(): string[] {
  return [
    '/etc/vkbd/vkbd.yaml',
    path.join(os.homedir(), '.config', 'vkbd', 'vkbd.yaml'),
    path.resolve('vkbd.yaml'),
  ];
}

const envOverrides: [string, string[]][] = [
  ['VKBD_SOCKET_PATH', ['socket', 'path']],
  ['VKBD_LAYOUT', ['layout']],
  ['VKBD_DEVICE_PATH', ['device', 'path']],
  ['VKBD_CHAR_DELAY_MS', ['performance', 'charDelayMs']],
  ['VKBD_STREAM_DELAY_MS', ['performance', 'streamDelayMs']],
  ['VKBD_COMMAND_TIMEOUT_MS', ['performance', 'commandTimeoutMs']],
  ['VKBD_LOG_LEVEL', ['logging', 'level']],
];

/**
 * Defaults, then the YAML file, then `VKBD_*` environment variables.
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<Config> {
  const env = options.env || process.env;
  let tree: ConfigTree = { ...defaultConfig(env) };

  const configFile = options.configFile || findConfigFile(options.searchPaths || defaultSearchPaths());
  if (configFile) {
    debugLogger.log('config', `reading ${configFile}`);
    tree = mergeTrees(tree, await readConfigFile(configFile));
  }

  for (const [name, keyPath] of envOverrides) {
    const value = env[name];
    if (value)
      tree = mergeTrees(tree, nestedValue(keyPath, value));
  }

  const result = configSchema.safeParse(tree);
  if (!result.success) {
    const problems = result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`invalid configuration: ${problems.join('; ')}`);
  }
  return result.data;
}

function findConfigFile(searchPaths: string[]): string | undefined {
  return searchPaths.find(candidate => fs.existsSync(candidate));
}

async function readConfigFile(file: string): Promise<ConfigTree> {
  let text: string;
  try {
    text = await fs.promises.readFile(file, 'utf8');
  } catch (error) {
    throw new ConfigError(`failed to read config ${file}: ${errorMessage(error)}`, { cause: error });
  }
  let parsed: unknown;
  try {
    parsed = YAML.parse(text);
  } catch (error) {
    throw new ConfigError(`failed to parse config ${file}: ${errorMessage(error)}`, { cause: error });
  }
  if (parsed === null || parsed === undefined)
    return {};
  if (!isConfigTree(parsed))
    throw new ConfigError(`config ${file} must contain a mapping at the top level`);
  return parsed;
}

function isConfigTree(value: unknown): value is ConfigTree {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function nestedValue(keyPath: string[], value: unknown): ConfigTree {
  let tree: unknown = value;
  for (let i = keyPath.length - 1; i >= 0; --i)
    tree = { [keyPath[i]]: tree };
  return isConfigTree(tree) ? tree : {};
}

function mergeTrees(base: ConfigTree, override: ConfigTree): ConfigTree {
  const result: ConfigTree = { ...base };
  for (const [key, value] of Object.entries(override)) {
    const current = result[key];
    result[key] = isConfigTree(current) && isConfigTree(value) ? mergeTrees(current, value) : value;
  }
  return result;
}
