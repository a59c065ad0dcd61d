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

import { EV_KEY, EV_SYN, KEY_PRESS, KEY_RELEASE, SYN_REPORT } from './keyCodes';

export type EventTime = {
  sec: number,
  usec: number,
};

/** Mirrors `struct input_event` on 64-bit Linux. */
export type InputEvent = {
  time: EventTime,
  type: number,
  code: number,
  value: number,
};

export const kInputEventSize = 24;

export function newEvent(type: number, code: number, value: number, now = Date.now()): InputEvent {
  return {
    time: { sec: Math.floor(now / 1000), usec: (now % 1000) * 1000 },
    type,
    code,
    value,
  };
}

export function newKeyEvent(keyCode: number, pressed: boolean): InputEvent {
  return newEvent(EV_KEY, keyCode, pressed ? KEY_PRESS : KEY_RELEASE);
}

export function newSynEvent(): InputEvent {
  return newEvent(EV_SYN, SYN_REPORT, 0);
}

export function isSynEvent(event: InputEvent): boolean {
  return event.type === EV_SYN;
}

export function encodeInputEvent(event: InputEvent): Buffer {
  const buffer = Buffer.alloc(kInputEventSize);
  buffer.writeBigInt64LE(BigInt(event.time.sec), 0);
  buffer.writeBigInt64LE(BigInt(event.time.usec), 8);
  buffer.writeUInt16LE(event.type, 16);
  buffer.writeUInt16LE(event.code, 18);
  buffer.writeInt32LE(event.value, 20);
  return buffer;
}

export function decodeInputEvent(buffer: Buffer, offset = 0): InputEvent {
  return {
    time: {
      sec: Number(buffer.readBigInt64LE(offset)),
      usec: Number(buffer.readBigInt64LE(offset + 8)),
    },
    type: buffer.readUInt16LE(offset + 16),
    code: buffer.readUInt16LE(offset + 18),
    value: buffer.readInt32LE(offset + 20),
  };
}

export function formatInputEvent(event: InputEvent): string {
  if (event.type === EV_SYN)
    return 'sync';
  if (event.type === EV_KEY)
    return `${event.value === KEY_PRESS ? 'press' : event.value === KEY_RELEASE ? 'release' : 'repeat'}(${event.code})`;
  return `event(type=${event.type}, code=${event.code}, value=${event.value})`;
}
