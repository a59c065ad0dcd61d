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

import debug from 'debug';
import fs from 'fs';
import util from 'util';

const debugLoggerColorMap = {
  'server': 45, // cyan
  'keyboard': 34, // green
  'config': 33, // blue
  'warning': 202, // orange
  'error': 160, // red
};
export type LogName = keyof typeof debugLoggerColorMap;
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const kNamespace = 'vkbd';

const levelChannels: { [level in LogLevel]: LogName[] } = {
  'debug': ['server', 'keyboard', 'config', 'warning', 'error'],
  'info': ['server', 'config', 'warning', 'error'],
  'warn': ['warning', 'error'],
  'error': ['error'],
};

class DebugLogger {
  private _debuggers = new Map<string, debug.Debugger>();

  constructor() {
    if (process.env.DEBUG_FILE) {
      const ansiRegex = new RegExp([
        '[\\u001B\\u009B][[\\]()#;?]*(?:(?:(?:[a-zA-Z\\d]*(?:;[-a-zA-Z\\d\\/#&.:=?%@~_]*)*)?\\u0007)',
        '(?:(?:\\d{1,4}(?:;\\d{0,4})*)?[\\dA-PR-TZcf-ntqry=><~]))'
      ].join('|'), 'g');
      const stream = fs.createWriteStream(process.env.DEBUG_FILE);
      debug.log = (...args: unknown[]) => {
        stream.write(util.format(...args).replace(ansiRegex, ''));
        stream.write('\n');
      };
    }
  }

  log(name: LogName, message: string | Error | object) {
    let cachedDebugger = this._debuggers.get(name);
    if (!cachedDebugger) {
      cachedDebugger = debug(`${kNamespace}:${name}`);
      this._debuggers.set(name, cachedDebugger);
      cachedDebugger.color = String(debugLoggerColorMap[name]);
    }
    cachedDebugger(message);
  }

  // DEBUG always wins over the configured level.
  applyLevel(level: LogLevel) {
    if (process.env.DEBUG)
      return;
    debug.enable(levelChannels[level].map(name => `${kNamespace}:${name}`).join(','));
  }
}

export const debugLogger = new DebugLogger();
