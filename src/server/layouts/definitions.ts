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

import { z } from 'zod';
import { ComposedLayout, buildKeymap, mergeKeymaps } from './layout';

import sharedData from './data/shared.json';
import usData from './data/us.json';
import ukData from './data/uk.json';
import frData from './data/fr.json';
import deData from './data/de.json';
import esData from './data/es.json';
import itData from './data/it.json';

import type { Keymap } from './layout';

export type LayoutName = 'us' | 'uk' | 'fr' | 'de' | 'es' | 'it';

const keysSchema = z.record(z.string(), z.string());

const sharedTablesSchema = z.record(z.string(), keysSchema);

const layoutDefinitionSchema = z.object({
  name: z.string(),
  layers: z.array(z.union([
    z.string().startsWith('@'),
    z.object({ name: z.string(), keys: keysSchema }),
  ])),
  deadKeys: keysSchema,
});

const sharedTables = new Map<string, Keymap>(Object.entries(sharedTablesSchema.parse(sharedData)).map(([name, keys]) => [name, buildKeymap(keys)]));

/**
 * Flattens the layers in order, so that layout-specific tables override the
 * shared ones they are stacked on.
 */
export function composeLayout(data: unknown): ComposedLayout {
  const definition = layoutDefinitionSchema.parse(data);
  const layers: Keymap[] = definition.layers.map(layer => {
    if (typeof layer !== 'string')
      return buildKeymap(layer.keys);
    const shared = sharedTables.get(layer.substring(1));
    if (!shared)
      throw new Error(`Layout "${definition.name}" refers to unknown shared table "${layer}"`);
    return shared;
  });
  return new ComposedLayout(definition.name, mergeKeymaps(...layers), buildKeymap(definition.deadKeys));
}

const builtinLayoutData: { [name in LayoutName]: unknown } = {
  us: usData,
  fr: frData,
  de: deData,
  es: esData,
  uk: ukData,
  it: itData,
};

export const builtinLayoutNames: readonly LayoutName[] = ['us', 'fr', 'de', 'es', 'uk', 'it'];

const builtinLayouts = new Map<LayoutName, ComposedLayout>();

/** Layouts are built once, on first use, and shared afterwards. */
export function builtinLayout(name: LayoutName): ComposedLayout {
  let layout = builtinLayouts.get(name);
  if (!layout) {
    layout = composeLayout(builtinLayoutData[name]);
    builtinLayouts.set(name, layout);
  }
  return layout;
}
