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

import { BaseEventSink } from '../../src/server/eventSink';
import { formatInputEvent } from '../../src/server/inputEvent';
import { ProgressController } from '../../src/server/progress';

import type { InputEvent } from '../../src/server/inputEvent';
import type { Progress } from '../../src/server/progress';

/** Keeps every event in memory; can be told to fail after a number of writes. */
export class RecordingEventSink extends BaseEventSink {
  readonly events: InputEvent[] = [];
  private _failAfter: number | undefined;
  private _onWrite: ((event: InputEvent) => Promise<void>) | undefined;
  closed = false;

  failAfter(writes: number) {
    this._failAfter = writes;
  }

  /** Runs before each event is recorded, e.g. to hold a write open. */
  onWrite(handler: (event: InputEvent) => Promise<void>) {
    this._onWrite = handler;
  }

  async writeEvent(event: InputEvent) {
    if (this.closed)
      throw new Error('device not open');
    if (this._failAfter !== undefined && this.events.length >= this._failAfter)
      throw new Error('write /dev/input/event99: input/output error');
    if (this._onWrite)
      await this._onWrite(event);
    this.events.push(event);
  }

  async close() {
    this.closed = true;
  }

  formatted(): string[] {
    return this.events.map(formatInputEvent);
  }

  keyEvents(): string[] {
    return this.formatted().filter(event => event !== 'sync');
  }
}

export async function runWithProgress<T>(task: (progress: Progress) => Promise<T>, timeout?: number): Promise<T> {
  return await new ProgressController().run(task, timeout);
}
