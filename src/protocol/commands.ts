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

export const typePayloadSchema = z.object({
  text: z.string(),
  layout: z.string().optional(),
});
export type TypePayload = z.infer<typeof typePayloadSchema>;

export const streamPayloadSchema = z.object({
  text: z.string(),
  layout: z.string().optional(),
  charDelayMs: z.number().int().nonnegative().optional(),
  wordDelayMs: z.number().int().nonnegative().optional(),
});
export type StreamPayload = z.infer<typeof streamPayloadSchema>;

export const keyPayloadSchema = z.object({
  keycode: z.number().int().min(0).max(0xffff),
  modifier: z.string().optional(),
});
export type KeyPayload = z.infer<typeof keyPayloadSchema>;

export const commandSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('type'), payload: typePayloadSchema }),
  z.object({ type: z.literal('stream'), payload: streamPayloadSchema }),
  z.object({ type: z.literal('key'), payload: keyPayloadSchema }),
  z.object({ type: z.literal('ping'), payload: z.unknown().optional() }),
]);
export type Command = z.infer<typeof commandSchema>;

export const responseSchema = z.object({
  success: z.boolean(),
  error: z.string().optional(),
  message: z.string().optional(),
  skipped: z.array(z.string()).optional(),
});
export type Response = z.infer<typeof responseSchema>;

export const kSuccessMessage = 'command executed successfully';

export function successResponse(skipped: string[] = []): Response {
  const response: Response = { success: true, message: kSuccessMessage };
  if (skipped.length)
    response.skipped = skipped;
  return response;
}

export function errorResponse(error: unknown): Response {
  return { success: false, error: error instanceof Error ? error.message : String(error) };
}

/** Commands and responses travel as one JSON document per line. */
export function serializeMessage(message: Command | Response): string {
  return JSON.stringify(message) + '\n';
}
