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

import { encodeInputEvent, formatInputEvent, newKeyEvent, newSynEvent } from './inputEvent';
import { debugLogger } from '../utils/debugLogger';

import type { Writable } from 'stream';
import type { InputEvent } from './inputEvent';
import type { Progress } from './progress';

/**
 * Low-level key event sink, the virtual device as seen by the keyboard.
 */
export interface EventSink {
  /** press, sync, release, sync */
  sendKey(progress: Progress, keyCode: number): Promise<void>;
  /** modifier press, sync, key press, sync, key release, sync, modifier release, sync */
  sendKeyWithModifier(progress: Progress, modifierKeyCode: number, keyCode: number): Promise<void>;
  writeEvent(event: InputEvent): Promise<void>;
  close(): Promise<void>;
}

export abstract class BaseEventSink implements EventSink {
  abstract writeEvent(event: InputEvent): Promise<void>;
  abstract close(): Promise<void>;

  async sendKey(progress: Progress, keyCode: number) {
    progress.throwIfAborted();
    await this.writeEvent(newKeyEvent(keyCode, true));
    await this.writeEvent(newSynEvent());
    await this.writeEvent(newKeyEvent(keyCode, false));
    await this.writeEvent(newSynEvent());
  }

  async sendKeyWithModifier(progress: Progress, modifierKeyCode: number, keyCode: number) {
    progress.throwIfAborted();
    await this.writeEvent(newKeyEvent(modifierKeyCode, true));
    await this.writeEvent(newSynEvent());
    await this.writeEvent(newKeyEvent(keyCode, true));
    await this.writeEvent(newSynEvent());
    await this.writeEvent(newKeyEvent(keyCode, false));
    await this.writeEvent(newSynEvent());
    await this.writeEvent(newKeyEvent(modifierKeyCode, false));
    await this.writeEvent(newSynEvent());
  }
}

/**
 * Writes encoded `input_event` records to an already configured device node
 * or pipe.
 */
export class DeviceEventSink extends BaseEventSink {
  private _stream: Writable | undefined;

  constructor(stream: Writable) {
    super();
    this._stream = stream;
    // Failed writes reject through their callback; this only keeps the stream from throwing.
    stream.on('error', error => debugLogger.log('error', `device error: ${error.message}`));
  }

  async writeEvent(event: InputEvent) {
    const stream = this._stream;
    if (!stream)
      throw new Error('device not open');
    const data = encodeInputEvent(event);
    await new Promise<void>((resolve, reject) => {
      stream.write(data, error => error ? reject(error) : resolve());
    });
  }

  async close() {
    const stream = this._stream;
    if (!stream)
      return;
    this._stream = undefined;
    await new Promise<void>(resolve => stream.end(() => resolve()));
  }
}

/** Dry-run sink: events only go to the `keyboard` log channel. */
export class LoggingEventSink extends BaseEventSink {
  private _closed = false;
  private _eventCount = 0;

  async writeEvent(event: InputEvent) {
    if (this._closed)
      throw new Error('device not open');
    ++this._eventCount;
    debugLogger.log('keyboard', `event ${formatInputEvent(event)}`);
  }

  eventCount() {
    return this._eventCount;
  }

  async close() {
    this._closed = true;
  }
}
