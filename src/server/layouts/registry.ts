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

import { LayoutNotFoundError } from '../errors';
import { builtinLayout, builtinLayoutNames } from './definitions';

import type { KeyboardLayout } from './layout';

export class LayoutRegistry {
  private _layouts = new Map<string, KeyboardLayout>();

  static createDefault(): LayoutRegistry {
    const registry = new LayoutRegistry();
    for (const name of builtinLayoutNames)
      registry.register(builtinLayout(name));
    return registry;
  }

  register(layout: KeyboardLayout) {
    this._layouts.set(layout.name, layout);
  }

  get(name: string): KeyboardLayout {
    const layout = this._layouts.get(name);
    if (!layout)
      throw new LayoutNotFoundError(name, this.available());
    return layout;
  }

  available(): string[] {
    return [...this._layouts.keys()];
  }

  /** US is the fallback regardless of what is registered. */
  defaultLayout(): KeyboardLayout {
    return builtinLayout('us');
  }
}
