#!/usr/bin/env node

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

/* eslint-disable no-console */

import colors from 'colors/safe';
import dotenv from 'dotenv';
import { InvalidArgumentError, program } from 'commander';
import { VkbdClient } from '../client/client';
import { loadConfig } from '../server/config';
import { LayoutRegistry } from '../server/layouts/registry';
import { startDaemon } from './daemon';
import packageJSON from '../../package.json';

import type { KeyModifier } from '../client/client';
import type { Response } from '../protocol/commands';

dotenv.config();

program
    .version('Version ' + packageJSON.version)
    .name('vkbd')
    .option('-s, --socket <path>', 'daemon socket path (default: from config)');

program
    .command('daemon')
    .description('run the daemon, typing into an input device')
    .option('-c, --config <file>', 'configuration file')
    .option('-d, --device <path>', 'event device node or pipe to write input events to')
    .option('--dry-run', 'log input events instead of writing them')
    .action(function(options: { config?: string, device?: string, dryRun?: boolean }) {
      runDaemon(options).catch(logErrorAndExit);
    }).on('--help', function() {
      console.log('');
      console.log('Examples:');
      console.log('');
      console.log('  $ daemon --device /dev/input/event7');
      console.log('  $ daemon --dry-run');
    });

program
    .command('type <text>')
    .description('type text in one go')
    .option('-l, --layout <name>', 'keyboard layout, one of ' + LayoutRegistry.createDefault().available().join(', '))
    .action(function(text: string, options: { layout?: string }) {
      withClient(client => client.typeText(text, options)).catch(logErrorAndExit);
    }).on('--help', function() {
      console.log('');
      console.log('Examples:');
      console.log('');
      console.log('  $ type "Hello, World!"');
      console.log('  $ type -l fr "château"');
    });

program
    .command('stream <text>')
    .description('type text word by word with delays')
    .option('-l, --layout <name>', 'keyboard layout')
    .option('--char-delay <ms>', 'delay after each character', parseInteger)
    .option('--word-delay <ms>', 'delay after each word', parseInteger)
    .action(function(text: string, options: { layout?: string, charDelay?: number, wordDelay?: number }) {
      withClient(client => client.streamText(text, {
        layout: options.layout,
        charDelayMs: options.charDelay,
        wordDelayMs: options.wordDelay,
      }), 0).catch(logErrorAndExit);
    }).on('--help', function() {
      console.log('');
      console.log('Examples:');
      console.log('');
      console.log('  $ stream --word-delay 200 "one two three"');
    });

program
    .command('key')
    .argument('<keycode>', 'Linux key code, e.g. 28 for Enter', parseInteger)
    .description('press and release a single key')
    .option('-m, --modifier <name>', 'hold shift, ctrl, alt or altgr while pressing')
    .action(function(keycode: number, options: { modifier?: string }) {
      const modifier = options.modifier || '';
      if (!isKeyModifier(modifier))
        logErrorAndExit(new Error(`unknown modifier: ${modifier}`));
      else
        withClient(client => client.sendKey(keycode, modifier)).catch(logErrorAndExit);
    });

program
    .command('ping')
    .description('check that the daemon is running')
    .action(function() {
      withClient(client => client.ping()).catch(logErrorAndExit);
    });

program
    .command('layouts')
    .description('list the supported keyboard layouts')
    .action(function() {
      for (const name of LayoutRegistry.createDefault().available())
        console.log(name);
    });

program.parse(process.argv);

async function runDaemon(options: { config?: string, device?: string, dryRun?: boolean }) {
  const { socket } = program.opts<{ socket?: string }>();
  const daemon = await startDaemon({ ...options, socket });
  console.log(colors.green(`vkbd listening on ${daemon.socketPath}`));
  const shutdown = () => {
    daemon.close().then(() => process.exit(0), logErrorAndExit);
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

async function withClient(run: (client: VkbdClient) => Promise<Response>, timeout?: number) {
  const client = new VkbdClient(await socketPath(), { timeout });
  const response = await run(client);
  console.log(colors.green('✓ ') + (response.message || 'ok'));
  if (response.skipped?.length)
    console.log(colors.yellow(`skipped unsupported characters: ${response.skipped.join(' ')}`));
}

async function socketPath(): Promise<string> {
  const { socket } = program.opts<{ socket?: string }>();
  if (socket)
    return socket;
  const config = await loadConfig();
  return config.socket.path;
}

function isKeyModifier(name: string): name is KeyModifier {
  return ['', 'shift', 'ctrl', 'alt', 'altgr'].includes(name);
}

function parseInteger(value: string): number {
  const result = Number(value);
  if (!Number.isInteger(result) || result < 0)
    throw new InvalidArgumentError('expected a non-negative integer');
  return result;
}

function logErrorAndExit(e: Error) {
  console.error(colors.red(e.message));
  process.exit(1);
}
