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

import net from 'net';
import { responseSchema, serializeMessage } from '../protocol/commands';
import { readLine } from '../protocol/transport';
import { CommandFailedError, TimeoutError } from '../server/errors';
import { errorMessage } from '../utils/utils';

import type { Command, Response } from '../protocol/commands';

export type ClientOptions = {
  /** Idle timeout in milliseconds, defaults to 5000; 0 waits forever. */
  timeout?: number,
};

export type TypeOptions = {
  layout?: string,
};

export type StreamOptions = {
  layout?: string,
  charDelayMs?: number,
  wordDelayMs?: number,
};

export type KeyModifier = '' | 'shift' | 'ctrl' | 'alt' | 'altgr';

const kMaxResponseSize = 64 * 1024;

/**
 * Talks to a running daemon. Every call opens its own connection.
 *
 * ```ts
 * const client = new VkbdClient('/tmp/.vkbd.sock');
 * await client.typeText('Hello, World!', { layout: 'fr' });
 * ```
 */
export class VkbdClient {
  private _socketPath: string;
  private _timeout: number;

  constructor(socketPath: string, options: ClientOptions = {}) {
    this._socketPath = socketPath;
    this._timeout = options.timeout ?? 5000;
  }

  async typeText(text: string, options: TypeOptions = {}): Promise<Response> {
    return await this.send({ type: 'type', payload: { text, layout: options.layout } });
  }

  async streamText(text: string, options: StreamOptions = {}): Promise<Response> {
    return await this.send({ type: 'stream', payload: { text, layout: options.layout, charDelayMs: options.charDelayMs, wordDelayMs: options.wordDelayMs } });
  }

  async sendKey(keycode: number, modifier: KeyModifier = ''): Promise<Response> {
    return await this.send({ type: 'key', payload: { keycode, modifier: modifier || undefined } });
  }

  async ping(): Promise<Response> {
    return await this.send({ type: 'ping' });
  }

  /** Rejects with {@link CommandFailedError} when the daemon reports a failure. */
  async send(command: Command): Promise<Response> {
    const socket = await this._connect();
    let socketError: Error | undefined;
    socket.on('error', error => socketError = error);
    try {
      socket.write(serializeMessage(command));
      const line = await readLine(socket, kMaxResponseSize);
      if (line === undefined)
        throw socketError || new CommandFailedError('daemon closed the connection without responding');
      const response = parseResponse(line);
      if (!response.success)
        throw new CommandFailedError(response.error || 'command failed');
      return response;
    } finally {
      socket.destroy();
    }
  }

  private _connect(): Promise<net.Socket> {
    return new Promise<net.Socket>((resolve, reject) => {
      const socket = net.createConnection(this._socketPath);
      socket.setTimeout(this._timeout);
      socket.on('timeout', () => socket.destroy(new TimeoutError(`Timeout ${this._timeout}ms exceeded.`)));
      const onError = (error: Error) => reject(new CommandFailedError(`failed to connect to daemon at ${this._socketPath}: ${error.message} (is vkbd running?)`, { cause: error }));
      socket.once('error', onError);
      socket.once('connect', () => {
        socket.off('error', onError);
        resolve(socket);
      });
    });
  }
}

function parseResponse(line: string): Response {
  let json: unknown;
  try {
    json = JSON.parse(line);
  } catch (error) {
    throw new CommandFailedError(`invalid response from daemon: ${errorMessage(error)}`, { cause: error });
  }
  const result = responseSchema.safeParse(json);
  if (!result.success)
    throw new CommandFailedError(`invalid response from daemon: ${result.error.issues.map(issue => issue.message).join('; ')}`);
  return result.data;
}
