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
import { test as it, expect } from '@playwright/test';
import { defaultConfig, loadConfig } from '../../src/server/config';
import { ConfigError } from '../../src/server/errors';

let tmpDir: string;

it.beforeAll(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'vkbd-config-'));
});

it.afterAll(() => {
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

function writeConfig(name: string, text: string): string {
  const file = path.join(tmpDir, name);
  fs.writeFileSync(file, text);
  return file;
}

it.describe('loadConfig', () => {
  it('should use defaults when nothing is configured', async () => {
    const config = await loadConfig({ env: {}, searchPaths: [] });
    expect(config).toEqual(defaultConfig({}));
    expect(config.socket).toEqual({ path: '/tmp/.vkbd.sock', permissions: 0o600 });
    expect(config.performance).toEqual({
      maxMessageSize: 1048576,
      streamDelayMs: 50,
      charDelayMs: 10,
      maxConcurrentCommands: 100,
      commandTimeoutMs: 0,
    });
    expect(config.layout).toBe('us');
    expect(config.logging.level).toBe('info');
  });

  it('should put the socket in the runtime directory', async () => {
    const config = await loadConfig({ env: { XDG_RUNTIME_DIR: '/run/user/1000' }, searchPaths: [] });
    expect(config.socket.path).toBe('/run/user/1000/vkbd.sock');
  });

  it('should layer the file and then the environment over the defaults', async () => {
    const configFile = writeConfig('layered.yaml', [
      'layout: fr',
      'socket:',
      '  permissions: "0660"',
      'performance:',
      '  charDelayMs: 25',
      '  streamDelayMs: 80',
    ].join('\n'));
    const config = await loadConfig({
      configFile,
      env: { VKBD_CHAR_DELAY_MS: '5', VKBD_LOG_LEVEL: 'debug', VKBD_SOCKET_PATH: '/tmp/test-vkbd.sock' },
    });
    expect(config.layout).toBe('fr');
    expect(config.socket).toEqual({ path: '/tmp/test-vkbd.sock', permissions: 0o660 });
    expect(config.performance.charDelayMs).toBe(5);
    expect(config.performance.streamDelayMs).toBe(80);
    expect(config.performance.maxConcurrentCommands).toBe(100);
    expect(config.logging.level).toBe('debug');
  });

  it('should accept YAML octal permissions', async () => {
    const configFile = writeConfig('octal.yaml', 'socket:\n  permissions: 0o640\n');
    const config = await loadConfig({ configFile, env: {} });
    expect(config.socket.permissions).toBe(0o640);
  });

  it('should take the first config file that exists', async () => {
    const second = writeConfig('second.yaml', 'layout: it\n');
    const third = writeConfig('third.yaml', 'layout: es\n');
    const config = await loadConfig({ env: {}, searchPaths: [path.join(tmpDir, 'missing.yaml'), second, third] });
    expect(config.layout).toBe('it');
  });

  it('should accept an empty file', async () => {
    const configFile = writeConfig('empty.yaml', '');
    const config = await loadConfig({ configFile, env: {} });
    expect(config.layout).toBe('us');
  });

  it('should reject values of the wrong type', async () => {
    const error = await loadConfig({ env: { VKBD_CHAR_DELAY_MS: 'fast' }, searchPaths: [] }).catch(e => e);
    expect(error).toBeInstanceOf(ConfigError);
    expect(error.message).toBe('invalid configuration: performance.charDelayMs: Expected number, received nan');
  });

  it('should reject unknown log levels', async () => {
    await expect(loadConfig({ env: { VKBD_LOG_LEVEL: 'verbose' }, searchPaths: [] })).rejects.toThrow(
        `invalid configuration: logging.level: Invalid enum value. Expected 'debug' | 'info' | 'warn' | 'error', received 'verbose'`);
  });

  it('should reject decimal permissions', async () => {
    const configFile = writeConfig('decimal.yaml', 'socket:\n  permissions: 600\n');
    await expect(loadConfig({ configFile, env: {} })).rejects.toThrow('invalid configuration: socket.permissions: Number must be less than or equal to 511');
  });

  it('should report a missing config file', async () => {
    const configFile = path.join(tmpDir, 'nowhere.yaml');
    await expect(loadConfig({ configFile, env: {} })).rejects.toThrow(`failed to read config ${configFile}: `);
  });

  it('should report broken YAML', async () => {
    const configFile = writeConfig('broken.yaml', 'layout: [fr\n');
    await expect(loadConfig({ configFile, env: {} })).rejects.toThrow(`failed to parse config ${configFile}: `);
  });

  it('should require a mapping', async () => {
    const configFile = writeConfig('list.yaml', '- us\n- fr\n');
    await expect(loadConfig({ configFile, env: {} })).rejects.toThrow(`config ${configFile} must contain a mapping at the top level`);
  });
});
