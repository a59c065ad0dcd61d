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
import { LayoutNotFoundError } from '../../src/server/errors';
import { buildDeadKeyRegistry, deadKeyCompositions } from '../../src/server/layouts/deadKeys';
import { builtinLayout } from '../../src/server/layouts/definitions';
import { ComposedLayout, buildKeymap } from '../../src/server/layouts/layout';
import { LayoutRegistry } from '../../src/server/layouts/registry';

it.describe('LayoutRegistry', () => {
  it('should list the builtin layouts in registration order', () => {
    expect(LayoutRegistry.createDefault().available()).toEqual(['us', 'fr', 'de', 'es', 'uk', 'it']);
  });

  it('should share layouts between registries', () => {
    const registry = LayoutRegistry.createDefault();
    expect(registry.get('fr')).toBe(builtinLayout('fr'));
    expect(LayoutRegistry.createDefault().get('fr')).toBe(registry.get('fr'));
  });

  it('should name the available layouts when a layout is missing', () => {
    const registry = LayoutRegistry.createDefault();
    expect(() => registry.get('nonexistent_layout')).toThrow('layout "nonexistent_layout" not found (available: us, fr, de, es, uk, it)');
    expect(() => registry.get('')).toThrow(LayoutNotFoundError);
  });

  it('should default to us', () => {
    expect(LayoutRegistry.createDefault().defaultLayout().name).toBe('us');
    expect(new LayoutRegistry().defaultLayout().name).toBe('us');
  });

  it('should register extra layouts', () => {
    const registry = LayoutRegistry.createDefault();
    registry.register(new ComposedLayout('test', buildKeymap({ 'x': 'KeyX' }), buildKeymap({})));
    expect(registry.available()).toEqual(['us', 'fr', 'de', 'es', 'uk', 'it', 'test']);
    expect(registry.get('test').resolveChar('x')).toEqual([{ keyCode: 45, modifiers: 0 }]);
  });
});

it.describe('dead key compositions', () => {
  it('should cover five accents in both cases', () => {
    expect(deadKeyCompositions).toHaveLength(50);
    expect(new Set(deadKeyCompositions.map(c => c.deadKey))).toEqual(new Set(['^', '´', '`', '¨', '~']));
  });

  it('should index compositions by the composed character', () => {
    const registry = buildDeadKeyRegistry();
    expect(registry.size).toBe(50);
    expect(registry.get('ô')).toEqual({ deadKey: '^', baseChar: 'o', composed: 'ô' });
    expect(registry.get('Ÿ')).toEqual({ deadKey: '¨', baseChar: 'Y', composed: 'Ÿ' });
    expect(registry.get('ñ')).toEqual({ deadKey: '~', baseChar: 'n', composed: 'ñ' });
    expect(registry.get('o')).toBe(undefined);
  });

  it('should let later entries win', () => {
    const registry = buildDeadKeyRegistry([
      { deadKey: '^', baseChar: 'a', composed: 'â' },
      { deadKey: '~', baseChar: 'a', composed: 'â' },
    ]);
    expect(registry.get('â')?.deadKey).toBe('~');
  });
});
