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

import { CharacterNotSupportedError } from '../errors';
import { KeyCode, Modifier, isKeyName, isModifierName } from '../keyCodes';
import { buildDeadKeyRegistry } from './deadKeys';

import type { Modifiers } from '../keyCodes';
import type { DeadKeyRegistry } from './deadKeys';

export type KeyMapping = {
  readonly keyCode: number,
  readonly modifiers: Modifiers,
};

/** Everything that has to be struck to produce one character, never empty. */
export type KeySequence = readonly [KeyMapping, ...KeyMapping[]];

export type Keymap = ReadonlyMap<string, KeyMapping>;

export interface KeyboardLayout {
  readonly name: string;
  /** Throws {@link CharacterNotSupportedError} when the layout cannot produce `char`. */
  resolveChar(char: string): KeySequence;
}

/**
 * Parses key strings such as `KeyQ`, `Shift+Digit1` or `Shift+AltGr+Backquote`.
 * The last token names the physical key, the others are modifiers.
 */
export function parseKeySpec(spec: string): KeyMapping {
  const tokens = spec.split('+');
  const keyName = tokens[tokens.length - 1];
  if (!isKeyName(keyName))
    throw new Error(`Unknown key: "${keyName}" in "${spec}"`);
  let modifiers: Modifiers = Modifier.None;
  for (let i = 0; i < tokens.length - 1; ++i) {
    const token = tokens[i];
    if (!isModifierName(token))
      throw new Error(`Unknown modifier: "${token}" in "${spec}"`);
    modifiers |= Modifier[token];
  }
  return { keyCode: KeyCode[keyName], modifiers };
}

export function buildKeymap(keys: { [char: string]: string }): Keymap {
  const result = new Map<string, KeyMapping>();
  for (const [char, spec] of Object.entries(keys)) {
    if ([...char].length !== 1)
      throw new Error(`Keymap entry must be a single character, got ${JSON.stringify(char)}`);
    result.set(char, parseKeySpec(spec));
  }
  return result;
}

/** Later keymaps override earlier ones. */
export function mergeKeymaps(...keymaps: Keymap[]): Keymap {
  const result = new Map<string, KeyMapping>();
  for (const keymap of keymaps) {
    for (const [char, mapping] of keymap)
      result.set(char, mapping);
  }
  return result;
}

const sharedDeadKeyRegistry = buildDeadKeyRegistry();

export class ComposedLayout implements KeyboardLayout {
  readonly name: string;
  private _keys: Keymap;
  private _deadKeys: Keymap;
  private _deadKeyRegistry: DeadKeyRegistry;

  constructor(name: string, keys: Keymap, deadKeys: Keymap, deadKeyRegistry: DeadKeyRegistry = sharedDeadKeyRegistry) {
    this.name = name;
    this._keys = keys;
    this._deadKeys = deadKeys;
    this._deadKeyRegistry = deadKeyRegistry;
  }

  resolveChar(char: string): KeySequence {
    // Direct keys win over compositions: French é has its own key.
    const mapping = this._keys.get(char);
    if (mapping)
      return [mapping];

    const composition = this._deadKeyRegistry.get(char);
    if (composition) {
      const deadKeyMapping = this._deadKeys.get(composition.deadKey);
      const baseMapping = this._keys.get(composition.baseChar);
      if (deadKeyMapping && baseMapping)
        return [deadKeyMapping, baseMapping];
    }

    throw new CharacterNotSupportedError(char, this.name);
  }

  hasDirectKey(char: string): boolean {
    return this._keys.has(char);
  }

  deadKeys(): string[] {
    return [...this._deadKeys.keys()];
  }

  characters(): string[] {
    return [...this._keys.keys()];
  }
}
