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

import { TimeoutError } from './errors';
import { assert } from '../utils/utils';
import { ManualPromise } from '../utils/manualPromise';
import { debugLogger } from '../utils/debugLogger';

import type { LogName } from '../utils/debugLogger';

export interface Progress {
  log(message: string): void;
  race<T>(promise: Promise<T> | Promise<T>[]): Promise<T>;
  wait(timeout: number): Promise<void>;
  throwIfAborted(): void;
}

export class ProgressController {
  // Always rejects, once aborted.
  private _forceAbortPromise = new ManualPromise<never>();
  private _donePromise = new ManualPromise<void>();
  private _state: 'before' | 'running' | { error: Error } | 'finished' = 'before';
  private _logName: LogName;

  constructor(logName: LogName = 'keyboard') {
    this._logName = logName;
    this._forceAbortPromise.catch(() => null);  // Prevent unhandled promise rejection.
  }

  isRunning() {
    return this._state === 'running';
  }

  async abort(error: Error) {
    if (this._state === 'before') {
      abortErrors.add(error);
      this._state = { error };
      return;
    }
    if (this._state === 'running') {
      abortErrors.add(error);
      this._state = { error };
      this._forceAbortPromise.reject(error);
    }
    await this._donePromise;
  }

  async run<T>(task: (progress: Progress) => Promise<T>, timeout?: number): Promise<T> {
    if (typeof this._state === 'object')
      throw this._state.error;
    assert(this._state === 'before');
    this._state = 'running';

    const progress: Progress = {
      log: message => {
        debugLogger.log(this._logName, message);
      },
      race: <T>(promise: Promise<T> | Promise<T>[]) => {
        const promises = Array.isArray(promise) ? promise : [promise];
        return Promise.race([...promises, this._forceAbortPromise]);
      },
      wait: async (timeout: number) => {
        let timer: NodeJS.Timeout | undefined;
        const promise = new Promise<void>(f => timer = setTimeout(f, timeout));
        return progress.race(promise).finally(() => clearTimeout(timer));
      },
      throwIfAborted: () => {
        if (typeof this._state === 'object')
          throw this._state.error;
      },
    };

    let timer: NodeJS.Timeout | undefined;
    if (timeout) {
      const timeoutError = new TimeoutError(`Timeout ${timeout}ms exceeded.`);
      timer = setTimeout(() => {
        if (this._state === 'running') {
          abortErrors.add(timeoutError);
          this._state = { error: timeoutError };
          this._forceAbortPromise.reject(timeoutError);
        }
      }, timeout);
    }

    try {
      const result = await task(progress);
      this._state = 'finished';
      return result;
    } catch (error) {
      if (this._state === 'running')
        this._state = { error: error instanceof Error ? error : new Error(String(error)) };
      throw error;
    } finally {
      clearTimeout(timer);
      this._donePromise.resolve();
    }
  }
}

const abortErrors = new WeakSet<Error>();

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && abortErrors.has(error);
}

// Use this method to race some external operation that you really want to undo
// when it goes beyond the progress abort.
export async function raceUncancellableOperationWithCleanup<T>(progress: Progress, run: () => Promise<T>, cleanup: (t: T) => void | Promise<unknown>): Promise<T> {
  let aborted = false;
  try {
    return await progress.race(run().then(async t => {
      if (aborted)
        await cleanup(t);
      return t;
    }));
  } catch (error) {
    aborted = true;
    throw error;
  }
}
