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
import { loadConfig } from '../server/config';
import { CommandDispatcher } from '../server/dispatcher';
import { ConfigError } from '../server/errors';
import { DeviceEventSink, LoggingEventSink } from '../server/eventSink';
import { Keyboard } from '../server/input';
import { LayoutRegistry } from '../server/layouts/registry';
import { KeyboardServer } from '../server/server';
import { debugLogger } from '../utils/debugLogger';

import type { Config } from '../server/config';
import type { EventSink } from '../server/eventSink';

export type DaemonOptions = {
  config?: string,
  socket?: string,
  device?: string,
  dryRun?: boolean,
};

export type Daemon = {
  config: Config,
  socketPath: string,
  close(): Promise<void>,
};

export async function startDaemon(options: DaemonOptions, env: NodeJS.ProcessEnv = process.env): Promise<Daemon> {
  const config = await loadConfig({ configFile: options.config, env });
  debugLogger.applyLevel(config.logging.level);

  const registry = LayoutRegistry.createDefault();
  // Fail before opening anything when the configured default is unknown.
  registry.get(config.layout);

  const sink = createSink(config, options);
  const keyboard = new Keyboard(sink);
  const dispatcher = new CommandDispatcher(keyboard, registry, config);
  const server = new KeyboardServer(dispatcher, {
    socketPath: options.socket || config.socket.path,
    permissions: config.socket.permissions,
    maxMessageSize: config.performance.maxMessageSize,
    maxConcurrentCommands: config.performance.maxConcurrentCommands,
    commandTimeoutMs: config.performance.commandTimeoutMs,
  });

  let socketPath: string;
  try {
    socketPath = await server.listen();
  } catch (error) {
    await sink.close();
    throw error;
  }
  debugLogger.log('server', `layouts: ${registry.available().join(', ')} (default ${config.layout})`);

  return {
    config,
    socketPath,
    close: async () => {
      await server.close();
      await sink.close();
    },
  };
}

function createSink(config: Config, options: DaemonOptions): EventSink {
  if (options.dryRun) {
    debugLogger.log('server', 'dry run: events are logged, not written');
    return new LoggingEventSink();
  }
  const devicePath = options.device || config.device.path;
  if (!devicePath)
    throw new ConfigError('no input device configured: pass --device <path>, set device.path, or use --dry-run');
  debugLogger.log('server', `writing input events to ${devicePath}`);
  return new DeviceEventSink(fs.createWriteStream(devicePath, { flags: 'a' }));
}
