#!/usr/bin/env node

import { createInterface } from 'node:readline';
import { Command } from 'commander';
import { createDb, getRawDb, UndoManager } from '@sqlite-undo/core';

import type { CliOptions } from './helpers.js';
import { $try, formatStatus, resolveConfig } from './helpers.js';
import { handleLine } from './shell.js';
import * as out from './output.js';

const program = new Command()
  .name('sqlite-undo')
  .description('SQL shell with undo/redo over tracked tables')
  .version('1.0.0')
  .argument('<database>', 'Path to the SQLite database')
  .requiredOption('-t, --track <tables...>', 'Tables to record changes on')
  .option('--log-table <name>', 'Name of the temporary change log table')
  .option('--no-freeze', 'Disable .freeze and .unfreeze')
  .option('--manual-barrier', 'Only close undo steps on .barrier')
  .option('-v, --verbose', 'Print the undo status after every change');

program.action((database: string, opts: CliOptions) => {
  const db = createDb(database);
  const config = resolveConfig(opts, {
    onStatusChange: status => out.dim(formatStatus(status)),
  });
  const undo = new UndoManager(db, config.undoOptions);

  if (!$try(() => undo.activate(...config.tables))) {
    getRawDb(db).close();
    process.exitCode = 1;
    return;
  }

  out.info(`Tracking ${config.tables.join(', ')}. Type .help for commands.`);

  const session = { db, undo, autoBarrier: config.autoBarrier };
  const rl = createInterface({ input: process.stdin, output: process.stdout, prompt: 'undo> ' });

  rl.on('line', line => {
    const result = handleLine(session, line);
    if (result?.type === 'quit') {
      rl.close();
      return;
    }
    if (result) out.printResult(result);
    rl.prompt();
  });

  rl.on('close', () => {
    if (undo.isFrozen) out.warning('Closing while frozen, frozen changes stay in the database');
    $try(() => undo.deactivate());
    getRawDb(db).close();
  });

  rl.prompt();
});

program.parse();
