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
import deadKeysData from './data/deadKeys.json';

/**
 * A dead key followed by a base character produces the composed character,
 * e.g. `^` then `o` gives `ô`. The triples are the same on every layout; only
 * the physical location of the dead key differs.
 */
export type DeadKeyComposition = {
  deadKey: string,
  baseChar: string,
  composed: string,
};

export type DeadKeyRegistry = ReadonlyMap<string, DeadKeyComposition>;

const singleCodePoint = z.string().refine(s => [...s].length === 1, 'expected a single character');
const compositionsSchema = z.array(z.tuple([singleCodePoint, singleCodePoint, singleCodePoint]));

export const deadKeyCompositions: readonly DeadKeyComposition[] = compositionsSchema.parse(deadKeysData).map(([deadKey, baseChar, composed]) => ({ deadKey, baseChar, composed }));

/** Indexes the compositions by the character they produce. */
export function buildDeadKeyRegistry(compositions: readonly DeadKeyComposition[] = deadKeyCompositions): DeadKeyRegistry {
  const registry = new Map<string, DeadKeyComposition>();
  for (const composition of compositions)
    registry.set(composition.composed, composition);
  return registry;
}
