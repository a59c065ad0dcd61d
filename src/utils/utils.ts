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

export function assert(value: unknown, message?: string): asserts value {
  if (!value)
    throw new Error(message || 'Assertion error');
}

export function isError(obj: unknown): obj is Error {
  return obj instanceof Error;
}

export function errorMessage(error: unknown): string {
  return isError(error) ? error.message : String(error);
}

export function monotonicTime(): number {
  const [seconds, nanoseconds] = process.hrtime();
  return seconds * 1000 + (nanoseconds / 1000 | 0) / 1000;
}

// U+00E9 style notation used in diagnostics.
export function codePointLabel(char: string): string {
  const codePoint = char.codePointAt(0) ?? 0;
  return 'U+' + codePoint.toString(16).toUpperCase().padStart(4, '0');
}
