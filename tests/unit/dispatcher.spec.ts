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

import { test as it, expect } from '@playwright/test';
import { CommandDispatcher, parseCommand } from '../../src/server/dispatcher';
import { InvalidCommandError } from '../../src/server/errors';
import { Keyboard } from '../../src/server/input';
import { LayoutRegistry } from '../../src/server/layouts/registry';
import { RecordingEventSink, runWithProgress } from './fakes';

import type { StreamDelays, TypeResult } from '../../src/server/input';
import type { KeyboardLayout } from '../../src/server/layouts/layout';
import type { Progress } from '../../src/server/progress';

class StreamSpyKeyboard extends Keyboard {
  readonly delays: StreamDelays[] = [];

  override async stream(progress: Progress, text: string, layout: KeyboardLayout, delays: StreamDelays): Promise<TypeResult> {
    this.delays.push(delays);
    return await super.stream(progress, text, layout, delays);
  }
}

function setup(layout = 'us') {
  const sink = new RecordingEventSink();
  const keyboard = new StreamSpyKeyboard(sink);
  const dispatcher = new CommandDispatcher(keyboard, LayoutRegistry.createDefault(), {
    layout,
    performance: { charDelayMs: 1, streamDelayMs: 2 },
  });
  const dispatch = (command: unknown) => runWithProgress(progress => dispatcher.dispatchLine(progress, JSON.stringify(command)));
  return { sink, keyboard, dispatcher, dispatch };
}

it.describe('CommandDispatcher', () => {
  it('should type text', async () => {
    const { sink, dispatch } = setup();
    expect(await dispatch({ type: 'type', payload: { text: 'hi' } })).toEqual({ success: true, message: 'command executed successfully' });
    expect(sink.keyEvents()).toEqual(['press(35)', 'release(35)', 'press(23)', 'release(23)']);
  });

  it('should use the requested layout', async () => {
    const { sink, dispatch } = setup();
    await dispatch({ type: 'type', payload: { text: 'a', layout: 'fr' } });
    expect(sink.keyEvents()).toEqual(['press(16)', 'release(16)']);
  });

  it('should fall back to the configured layout', async () => {
    const { sink, dispatch } = setup('de');
    await dispatch({ type: 'type', payload: { text: 'z', layout: '' } });
    expect(sink.keyEvents()).toEqual(['press(21)', 'release(21)']);
  });

  it('should report skipped characters', async () => {
    const { sink, dispatch } = setup();
    expect(await dispatch({ type: 'type', payload: { text: 'né' } })).toEqual({
      success: true,
      message: 'command executed successfully',
      skipped: ['é'],
    });
    expect(sink.events).toHaveLength(4);
  });

  it('should fail on unknown layouts without typing', async () => {
    const { sink, dispatch } = setup();
    expect(await dispatch({ type: 'type', payload: { text: 'hello', layout: 'nonexistent_layout' } })).toEqual({
      success: false,
      error: 'layout "nonexistent_layout" not found (available: us, fr, de, es, uk, it)',
    });
    expect(sink.events).toHaveLength(0);
  });

  it('should fill in configured stream delays', async () => {
    const { keyboard, sink, dispatch } = setup();
    await dispatch({ type: 'stream', payload: { text: 'a b' } });
    await dispatch({ type: 'stream', payload: { text: 'c', charDelayMs: 0, wordDelayMs: 0 } });
    await dispatch({ type: 'stream', payload: { text: 'd', charDelayMs: 5, wordDelayMs: 7 } });
    expect(keyboard.delays).toEqual([
      { charDelayMs: 1, wordDelayMs: 2 },
      { charDelayMs: 1, wordDelayMs: 2 },
      { charDelayMs: 5, wordDelayMs: 7 },
    ]);
    expect(sink.keyEvents()).toEqual([
      'press(30)', 'release(30)',
      'press(57)', 'release(57)',
      'press(48)', 'release(48)',
      'press(46)', 'release(46)',
      'press(32)', 'release(32)',
    ]);
  });

  it('should send raw keys', async () => {
    const { sink, dispatch } = setup();
    expect(await dispatch({ type: 'key', payload: { keycode: 46, modifier: 'ctrl' } })).toEqual({ success: true, message: 'command executed successfully' });
    expect(sink.keyEvents()).toEqual(['press(29)', 'press(46)', 'release(46)', 'release(29)']);
  });

  it('should fail on unknown modifiers without typing', async () => {
    const { sink, dispatch } = setup();
    expect(await dispatch({ type: 'key', payload: { keycode: 30, modifier: 'bogus' } })).toEqual({ success: false, error: 'unknown modifier: bogus' });
    expect(sink.events).toHaveLength(0);
  });

  it('should answer pings without typing', async () => {
    const { sink, dispatch } = setup();
    expect(await dispatch({ type: 'ping' })).toEqual({ success: true, message: 'command executed successfully' });
    expect(sink.events).toHaveLength(0);
  });

  it('should reject key codes out of range', async () => {
    const { dispatch } = setup();
    expect(await dispatch({ type: 'key', payload: { keycode: 70000 } })).toEqual({
      success: false,
      error: 'invalid command: payload.keycode: Number must be less than or equal to 65535',
    });
  });

  it('should report the sink failure', async () => {
    const { sink, dispatch } = setup();
    sink.failAfter(0);
    expect(await dispatch({ type: 'type', payload: { text: 'x' } })).toEqual({
      success: false,
      error: 'failed to send key: write /dev/input/event99: input/output error',
    });
  });
});

it.describe('parseCommand', () => {
  it('should parse commands', () => {
    expect(parseCommand('{"type":"stream","payload":{"text":"hi","charDelayMs":5}}')).toEqual({
      type: 'stream',
      payload: { text: 'hi', charDelayMs: 5 },
    });
  });

  it('should reject malformed JSON', () => {
    expect(() => parseCommand('{"type":')).toThrow(InvalidCommandError);
    expect(() => parseCommand('{"type":')).toThrow(/^failed to decode command: /);
  });

  it('should reject unknown command types', () => {
    expect(() => parseCommand('{"type":"click","payload":{}}')).toThrow(/^invalid command: type: /);
  });

  it('should reject payloads of the wrong shape', () => {
    expect(() => parseCommand('{"type":"type","payload":{"text":5}}')).toThrow('invalid command: payload.text: Expected string, received number');
  });
});
