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
import net from 'net';
import { errorResponse, serializeMessage } from '../protocol/commands';
import { readLine } from '../protocol/transport';
import { AbortedError } from './errors';
import { ProgressController } from './progress';
import { debugLogger } from '../utils/debugLogger';
import { errorMessage } from '../utils/utils';

import type { Response } from '../protocol/commands';
import type { CommandDispatcher } from './dispatcher';

export type ServerOptions = {
  socketPath: string,
  permissions: number,
  maxMessageSize: number,
  maxConcurrentCommands: number,
  commandTimeoutMs: number,
};

/**
 * Serves one command per connection: a JSON line in, a JSON line out.
 */
export class KeyboardServer {
  private _dispatcher: CommandDispatcher;
  private _options: ServerOptions;
  private _server: net.Server | undefined;
  private _sockets = new Set<net.Socket>();
  private _inFlight = new Set<ProgressController>();

  constructor(dispatcher: CommandDispatcher, options: ServerOptions) {
    this._dispatcher = dispatcher;
    this._options = options;
  }

  async listen(): Promise<string> {
    const socketPath = this._options.socketPath;
    // A previous daemon that crashed leaves its socket file behind.
    await fs.promises.rm(socketPath, { force: true });

    const server = net.createServer(socket => this._onConnection(socket));
    await new Promise<void>((resolve, reject) => {
      server.once('error', reject);
      server.listen(socketPath, () => {
        server.off('error', reject);
        resolve();
      });
    });
    server.on('error', error => debugLogger.log('error', `server error: ${error.message}`));
    this._server = server;

    await fs.promises.chmod(socketPath, this._options.permissions);
    debugLogger.log('server', `listening on ${socketPath} (mode ${this._options.permissions.toString(8)})`);
    return socketPath;
  }

  inFlightCount() {
    return this._inFlight.size;
  }

  async close() {
    const server = this._server;
    if (!server)
      return;
    this._server = undefined;
    debugLogger.log('server', 'shutting down');
    const closed = new Promise<void>(resolve => server.close(() => resolve()));
    await Promise.all([...this._inFlight].map(controller => controller.abort(new AbortedError('server is shutting down'))));
    for (const socket of this._sockets)
      socket.destroy();
    await closed;
    await fs.promises.rm(this._options.socketPath, { force: true });
  }

  private _onConnection(socket: net.Socket) {
    this._sockets.add(socket);
    socket.on('error', error => debugLogger.log('server', `connection error: ${error.message}`));
    socket.on('close', () => this._sockets.delete(socket));

    if (this._inFlight.size >= this._options.maxConcurrentCommands) {
      debugLogger.log('warning', `rejecting connection, ${this._inFlight.size} commands in flight`);
      socket.end(serializeMessage(errorResponse(new Error('server busy'))));
      return;
    }

    const controller = new ProgressController('server');
    this._inFlight.add(controller);
    socket.on('close', () => {
      if (controller.isRunning())
        controller.abort(new AbortedError('client disconnected')).catch(error => debugLogger.log('error', errorMessage(error)));
    });
    this._handleConnection(socket, controller).finally(() => this._inFlight.delete(controller)).catch(error => {
      debugLogger.log('error', `connection failed: ${errorMessage(error)}`);
      socket.destroy();
    });
  }

  private async _handleConnection(socket: net.Socket, controller: ProgressController) {
    let response: Response;
    try {
      const line = await readLine(socket, this._options.maxMessageSize);
      if (line === undefined) {
        debugLogger.log('server', 'client disconnected before sending a command');
        return;
      }
      const timeout = this._options.commandTimeoutMs || undefined;
      response = await controller.run(progress => this._dispatcher.dispatchLine(progress, line), timeout);
    } catch (error) {
      response = errorResponse(error);
    }
    if (socket.writable)
      socket.end(serializeMessage(response));
  }
}
