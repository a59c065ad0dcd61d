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

import { commandSchema, errorResponse, successResponse } from '../protocol/commands';
import { InvalidCommandError } from './errors';
import { debugLogger } from '../utils/debugLogger';
import { errorMessage } from '../utils/utils';

import type { Command, KeyPayload, Response, StreamPayload, TypePayload } from '../protocol/commands';
import type { Config } from './config';
import type { Keyboard, TypeResult } from './input';
import type { KeyboardLayout } from './layouts/layout';
import type { LayoutRegistry } from './layouts/registry';
import type { Progress } from './progress';

export type DispatcherDefaults = Pick<Config, 'layout'> & {
  performance: Pick<Config['performance'], 'charDelayMs' | 'streamDelayMs'>,
};

/**
 * Routes decoded commands to the keyboard, filling in the configured layout
 * and delays where the command leaves them out.
 */
export class CommandDispatcher {
  private _keyboard: Keyboard;
  private _registry: LayoutRegistry;
  private _defaults: DispatcherDefaults;

  constructor(keyboard: Keyboard, registry: LayoutRegistry, defaults: DispatcherDefaults) {
    this._keyboard = keyboard;
    this._registry = registry;
    this._defaults = defaults;
  }

  /** Never throws: failures become error responses. */
  async dispatchLine(progress: Progress, line: string): Promise<Response> {
    try {
      const command = parseCommand(line);
      const result = await this.dispatch(progress, command);
      return successResponse(result.skipped.map(skipped => skipped.char));
    } catch (error) {
      debugLogger.log('error', `command failed: ${errorMessage(error)}`);
      return errorResponse(error);
    }
  }

  async dispatch(progress: Progress, command: Command): Promise<TypeResult> {
    progress.log(`handling ${command.type} command`);
    switch (command.type) {
      case 'type': return await this._type(progress, command.payload);
      case 'stream': return await this._stream(progress, command.payload);
      case 'key': return await this._key(progress, command.payload);
      case 'ping': return { typed: 0, skipped: [] };
    }
  }

  private async _type(progress: Progress, payload: TypePayload): Promise<TypeResult> {
    const layout = this._layout(payload.layout);
    progress.log(`typing ${[...payload.text].length} characters with ${layout.name} layout`);
    return await this._keyboard.type(progress, payload.text, layout);
  }

  private async _stream(progress: Progress, payload: StreamPayload): Promise<TypeResult> {
    const layout = this._layout(payload.layout);
    const charDelayMs = payload.charDelayMs || this._defaults.performance.charDelayMs;
    const wordDelayMs = payload.wordDelayMs || this._defaults.performance.streamDelayMs;
    progress.log(`streaming ${[...payload.text].length} characters with ${layout.name} layout (char delay ${charDelayMs}ms, word delay ${wordDelayMs}ms)`);
    return await this._keyboard.stream(progress, payload.text, layout, { charDelayMs, wordDelayMs });
  }

  private async _key(progress: Progress, payload: KeyPayload): Promise<TypeResult> {
    progress.log(`sending key ${payload.keycode}${payload.modifier ? ` with ${payload.modifier}` : ''}`);
    await this._keyboard.press(progress, payload.keycode, payload.modifier);
    return { typed: 0, skipped: [] };
  }

  private _layout(name: string | undefined): KeyboardLayout {
    return this._registry.get(name || this._defaults.layout);
  }
}

export function parseCommand(line: string): Command {
  let json: unknown;
  try {
    json = JSON.parse(line);
  } catch (error) {
    throw new InvalidCommandError(`failed to decode command: ${errorMessage(error)}`, { cause: error });
  }
  const result = commandSchema.safeParse(json);
  if (!result.success) {
    const problems = result.error.issues.map(issue => issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message);
    throw new InvalidCommandError(`invalid command: ${problems.join('; ')}`);
  }
  return result.data;
}
