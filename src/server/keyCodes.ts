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

// Event types and values from <linux/input.h>.
export const EV_SYN = 0x00;
export const EV_KEY = 0x01;
export const SYN_REPORT = 0;

export const KEY_RELEASE = 0;
export const KEY_PRESS = 1;
export const KEY_REPEAT = 2;

/**
 * Physical keys, named after their DOM `code`, numbered as in
 * <linux/input-event-codes.h>.
 */
export const KeyCode = {
  'Escape': 1,
  'Digit1': 2,
  'Digit2': 3,
  'Digit3': 4,
  'Digit4': 5,
  'Digit5': 6,
  'Digit6': 7,
  'Digit7': 8,
  'Digit8': 9,
  'Digit9': 10,
  'Digit0': 11,
  'Minus': 12,
  'Equal': 13,
  'Backspace': 14,
  'Tab': 15,
  'KeyQ': 16,
  'KeyW': 17,
  'KeyE': 18,
  'KeyR': 19,
  'KeyT': 20,
  'KeyY': 21,
  'KeyU': 22,
  'KeyI': 23,
  'KeyO': 24,
  'KeyP': 25,
  'BracketLeft': 26,
  'BracketRight': 27,
  'Enter': 28,
  'ControlLeft': 29,
  'KeyA': 30,
  'KeyS': 31,
  'KeyD': 32,
  'KeyF': 33,
  'KeyG': 34,
  'KeyH': 35,
  'KeyJ': 36,
  'KeyK': 37,
  'KeyL': 38,
  'Semicolon': 39,
  'Quote': 40,
  'Backquote': 41,
  'ShiftLeft': 42,
  'Backslash': 43,
  'KeyZ': 44,
  'KeyX': 45,
  'KeyC': 46,
  'KeyV': 47,
  'KeyB': 48,
  'KeyN': 49,
  'KeyM': 50,
  'Comma': 51,
  'Period': 52,
  'Slash': 53,
  'ShiftRight': 54,
  'AltLeft': 56,
  'Space': 57,
  'CapsLock': 58,
  // Extra key left of Z on ISO keyboards.
  'IntlBackslash': 86,
  'ControlRight': 97,
  // AltGr
  'AltRight': 100,
} as const;

export type KeyName = keyof typeof KeyCode;

export function isKeyName(name: string): name is KeyName {
  return Object.prototype.hasOwnProperty.call(KeyCode, name);
}

export const Modifier = {
  None: 0,
  Shift: 1 << 0,
  AltGr: 1 << 1,
  Ctrl: 1 << 2,
  Alt: 1 << 3,
} as const;

/** Bit set over {@link Modifier}. */
export type Modifiers = number;

export type ModifierName = 'Shift' | 'AltGr' | 'Ctrl' | 'Alt';

export function isModifierName(name: string): name is ModifierName {
  return name === 'Shift' || name === 'AltGr' || name === 'Ctrl' || name === 'Alt';
}

export function hasModifier(modifiers: Modifiers, modifier: number): boolean {
  return (modifiers & modifier) !== 0;
}

export function formatModifiers(modifiers: Modifiers): string {
  const names: string[] = [];
  if (hasModifier(modifiers, Modifier.Shift))
    names.push('Shift');
  if (hasModifier(modifiers, Modifier.AltGr))
    names.push('AltGr');
  if (hasModifier(modifiers, Modifier.Ctrl))
    names.push('Ctrl');
  if (hasModifier(modifiers, Modifier.Alt))
    names.push('Alt');
  return names.length ? names.join('+') : 'None';
}

/** Modifier names accepted by the raw key command, mapped to the physical key they hold down. */
export const rawModifierKeys: ReadonlyMap<string, number> = new Map([
  ['shift', KeyCode.ShiftLeft],
  ['ctrl', KeyCode.ControlLeft],
  ['alt', KeyCode.AltLeft],
  ['altgr', KeyCode.AltRight],
]);
