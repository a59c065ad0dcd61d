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

import { codePointLabel } from '../utils/utils';

class CustomError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = this.constructor.name;
  }
}

export class TimeoutError extends CustomError {}

export class AbortedError extends CustomError {
  constructor(reason?: string) {
    super(reason || 'Operation was aborted');
  }
}

export class CharacterNotSupportedError extends CustomError {
  readonly char: string;
  readonly layout: string;

  constructor(char: string, layout: string) {
    super(`character ${JSON.stringify(char)} (${codePointLabel(char)}) not supported in ${layout} layout`);
    this.char = char;
    this.layout = layout;
  }
}

export class LayoutNotFoundError extends CustomError {
  readonly requested: string;
  readonly available: string[];

  constructor(requested: string, available: string[]) {
    super(`layout ${JSON.stringify(requested)} not found (available: ${available.join(', ')})`);
    this.requested = requested;
    this.available = available;
  }
}

export class UnknownModifierError extends CustomError {
  readonly modifier: string;

  constructor(modifier: string) {
    super(`unknown modifier: ${modifier}`);
    this.modifier = modifier;
  }
}

export class SinkWriteError extends CustomError {
  constructor(cause: unknown) {
    super(`failed to send key: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
  }
}

export class InvalidCommandError extends CustomError {}

export class ConfigError extends CustomError {}

export class CommandFailedError extends CustomError {}
