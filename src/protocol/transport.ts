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

import { InvalidCommandError } from '../server/errors';

/**
 * Resolves with the first newline-terminated line read from `stream`, or with
 * everything read when the other end closes without a newline. Resolves with
 * undefined when the stream ends before any byte arrived.
 */
export function readLine(stream: NodeJS.ReadableStream, maxMessageSize: number): Promise<string | undefined> {
  return new Promise<string | undefined>((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;

    const cleanup = () => {
      stream.off('data', onData);
      stream.off('end', onEnd);
      stream.off('close', onEnd);
    };

    const onData = (data: Buffer | string) => {
      const buffer = typeof data === 'string' ? Buffer.from(data, 'utf8') : data;
      const end = buffer.indexOf('\n');
      const chunk = end === -1 ? buffer : buffer.subarray(0, end);
      chunks.push(chunk);
      size += chunk.length;
      if (size > maxMessageSize) {
        cleanup();
        reject(new InvalidCommandError(`message exceeds ${maxMessageSize} bytes`));
      } else if (end !== -1) {
        cleanup();
        resolve(Buffer.concat(chunks).toString('utf8'));
      }
    };

    const onEnd = () => {
      cleanup();
      resolve(chunks.length ? Buffer.concat(chunks).toString('utf8') : undefined);
    };

    stream.on('data', onData);
    stream.on('end', onEnd);
    stream.on('close', onEnd);
  });
}
