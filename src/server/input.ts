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

import { CharacterNotSupportedError, SinkWriteError, UnknownModifierError } from './errors';
import { KeyCode, Modifier, formatModifiers, hasModifier, rawModifierKeys } from './keyCodes';
import { newKeyEvent, newSynEvent } from './inputEvent';
import { isAbortError, raceUncancellableOperationWithCleanup } from './progress';
import { Lock } from '../utils/manualPromise';
import { debugLogger } from '../utils/debugLogger';

import type { EventSink } from './eventSink';
import type { InputEvent } from './inputEvent';
import type { KeyboardLayout, KeyMapping, KeySequence } from './layouts/layout';
import type { Progress } from './progress';

export type SkippedCharacter = {
  char: string,
  reason: string,
};

export type TypeResult = {
  typed: number,
  skipped: SkippedCharacter[],
};

export type StreamDelays = {
  charDelayMs: number,
  wordDelayMs: number,
};

export class Keyboard {
  private _sink: EventSink;
  // One keystroke sequence on the device at a time.
  private _lock = new Lock();

  constructor(sink: EventSink) {
    this._sink = sink;
  }

  async type(progress: Progress, text: string, layout: KeyboardLayout): Promise<TypeResult> {
    const result: TypeResult = { typed: 0, skipped: [] };
    for (const char of text)
      await this._typeChar(progress, layout, char, result);
    return result;
  }

  /**
   * Types word by word. The character delay follows every typed character,
   * the last one of a word included; the word delay follows each separating space.
   */
  async stream(progress: Progress, text: string, layout: KeyboardLayout, delays: StreamDelays): Promise<TypeResult> {
    const result: TypeResult = { typed: 0, skipped: [] };
    const words = splitWords(text);
    for (let i = 0; i < words.length; ++i) {
      for (const char of words[i]) {
        const typed = await this._typeChar(progress, layout, char, result);
        if (typed && delays.charDelayMs > 0)
          await progress.wait(delays.charDelayMs);
      }
      if (i < words.length - 1) {
        await this._typeChar(progress, layout, ' ', result);
        if (delays.wordDelayMs > 0)
          await progress.wait(delays.wordDelayMs);
      }
    }
    return result;
  }

  async press(progress: Progress, keyCode: number, modifier = '') {
    let modifierKeyCode: number | undefined;
    if (modifier) {
      modifierKeyCode = rawModifierKeys.get(modifier);
      if (modifierKeyCode === undefined)
        throw new UnknownModifierError(modifier);
    }
    await this._withLock(progress, async () => {
      await this._guardSink(async () => {
        if (modifierKeyCode === undefined)
          await this._sink.sendKey(progress, keyCode);
        else
          await this._sink.sendKeyWithModifier(progress, modifierKeyCode, keyCode);
      });
    });
  }

  async sendKeySequence(progress: Progress, sequence: KeySequence) {
    await this._withLock(progress, async () => {
      for (const mapping of sequence)
        await this._guardSink(() => this._sendKeyMapping(progress, mapping));
    });
  }

  private async _typeChar(progress: Progress, layout: KeyboardLayout, char: string, result: TypeResult): Promise<boolean> {
    progress.throwIfAborted();
    let sequence: KeySequence;
    try {
      sequence = layout.resolveChar(char);
    } catch (error) {
      if (!(error instanceof CharacterNotSupportedError))
        throw error;
      debugLogger.log('warning', `skipping: ${error.message}`);
      result.skipped.push({ char, reason: error.message });
      return false;
    }
    await this.sendKeySequence(progress, sequence);
    ++result.typed;
    return true;
  }

  private async _sendKeyMapping(progress: Progress, mapping: KeyMapping) {
    const shift = hasModifier(mapping.modifiers, Modifier.Shift);
    const altGr = hasModifier(mapping.modifiers, Modifier.AltGr);
    debugLogger.log('keyboard', `key ${mapping.keyCode} [${formatModifiers(mapping.modifiers)}]`);
    if (shift && altGr) {
      progress.throwIfAborted();
      for (const event of nestedKeyEvents([KeyCode.ShiftLeft, KeyCode.AltRight], mapping.keyCode))
        await this._sink.writeEvent(event);
    } else if (shift) {
      await this._sink.sendKeyWithModifier(progress, KeyCode.ShiftLeft, mapping.keyCode);
    } else if (altGr) {
      await this._sink.sendKeyWithModifier(progress, KeyCode.AltRight, mapping.keyCode);
    } else {
      await this._sink.sendKey(progress, mapping.keyCode);
    }
  }

  private async _withLock(progress: Progress, task: () => Promise<void>) {
    await raceUncancellableOperationWithCleanup(progress, () => this._lock.obtain(), () => this._lock.release());
    try {
      await task();
    } finally {
      this._lock.release();
    }
  }

  private async _guardSink(task: () => Promise<void>) {
    try {
      await task();
    } catch (error) {
      if (isAbortError(error))
        throw error;
      throw new SinkWriteError(error);
    }
  }
}

/**
 * Holds the modifiers down outer to inner, strikes the key, then lets go
 * inner to outer. Every transition is followed by a sync.
 */
export function nestedKeyEvents(modifierKeyCodes: number[], keyCode: number): InputEvent[] {
  const events: InputEvent[] = [];
  for (const modifier of modifierKeyCodes)
    events.push(newKeyEvent(modifier, true), newSynEvent());
  events.push(newKeyEvent(keyCode, true), newSynEvent());
  events.push(newKeyEvent(keyCode, false), newSynEvent());
  for (let i = modifierKeyCodes.length - 1; i >= 0; --i)
    events.push(newKeyEvent(modifierKeyCodes[i], false), newSynEvent());
  return events;
}

// Unicode White_Space: `\s` without U+FEFF, plus NEL.
const kWhitespace = /[\t\n\v\f\r \u0085\u00a0\u1680\u2000-\u200a\u2028\u2029\u202f\u205f\u3000]+/;

export function splitWords(text: string): string[] {
  return text.split(kWhitespace).filter(word => !!word);
}
