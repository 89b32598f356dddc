/**
 * Line handling for the interactive shell. Pure with respect to output:
 * every line yields a ShellResult, printing happens in output.ts.
 */

import type { StepResult, UndoDb, UndoManager } from '@sqlite-undo/core';
import { getLogEntries, getRawDb } from '@sqlite-undo/core';
import { formatInterval, formatStack, formatStatus } from './helpers.js';

export type ShellResult =
  | { readonly type: 'success'; readonly message: string }
  | { readonly type: 'info'; readonly message: string }
  | { readonly type: 'error'; readonly message: string }
  | { readonly type: 'rows'; readonly columns: readonly string[]; readonly rows: readonly (readonly unknown[])[] }
  | { readonly type: 'quit' };

export interface ShellSession {
  readonly db: UndoDb;
  readonly undo: UndoManager;
  /** Close an undo step after every data-changing statement */
  readonly autoBarrier: boolean;
}

export const HELP_TEXT = [
  '.undo       Undo the last step',
  '.redo       Redo the last undone step',
  '.barrier    Close the changes made so far into one undo step',
  '.freeze     Stop recording changes into the undo history',
  '.unfreeze   Resume recording, discarding what was logged while frozen',
  '.status     Show the undo status',
  '.history    Show the undo and redo stacks',
  '.log        Show the change log',
  '.help       Show this help',
  '.quit       Exit',
  'Any other line is run as a single SQL statement.',
].join('\n');

type MetaCommand = (session: ShellSession) => ShellResult;

function describeStep(verb: string, result: StepResult): string {
  const count = result.statements === 1 ? '1 statement' : `${result.statements} statements`;
  return `${verb} ${formatInterval(result.replayed)} (${count})`;
}

const META_COMMANDS: Record<string, MetaCommand> = {
  '.undo': ({ undo }) => {
    const result = undo.undo();
    return result
      ? { type: 'success', message: describeStep('Undone', result) }
      : { type: 'info', message: 'Nothing to undo' };
  },
  '.redo': ({ undo }) => {
    const result = undo.redo();
    return result
      ? { type: 'success', message: describeStep('Redone', result) }
      : { type: 'info', message: 'Nothing to redo' };
  },
  '.barrier': ({ undo }) => {
    const interval = undo.barrier();
    return interval
      ? { type: 'success', message: `Recorded ${formatInterval(interval)}` }
      : { type: 'info', message: 'Nothing to record' };
  },
  '.freeze': ({ undo }) => {
    if (!undo.freezeEnabled) return { type: 'success', message: 'Freeze is disabled' };
    undo.freeze();
    return { type: 'success', message: 'Frozen' };
  },
  '.unfreeze': ({ undo }) => {
    if (!undo.freezeEnabled) return { type: 'success', message: 'Freeze is disabled' };
    const discarded = undo.unfreeze();
    return { type: 'success', message: `Unfrozen, discarded ${discarded} log ${discarded === 1 ? 'row' : 'rows'}` };
  },
  '.status': ({ undo }) => ({ type: 'info', message: formatStatus(undo.status()) }),
  '.history': ({ undo }) => ({
    type: 'info',
    message: `undo: ${formatStack(undo.undoHistory)}\nredo: ${formatStack(undo.redoHistory)}`,
  }),
  '.log': ({ db, undo }) => ({
    type: 'rows',
    columns: ['seq', 'sql'],
    rows: getLogEntries(db, undo.log).map(entry => [entry.seq, entry.sql]),
  }),
  '.help': () => ({ type: 'info', message: HELP_TEXT }),
  '.quit': () => ({ type: 'quit' }),
  '.exit': () => ({ type: 'quit' }),
};

function runStatement(session: ShellSession, sql: string): ShellResult {
  const stmt = getRawDb(session.db).prepare(sql);

  if (stmt.reader) {
    const columns = stmt.columns().map(c => c.name);
    const rows = stmt.raw(true).all().map(row => (Array.isArray(row) ? row : [row]));
    return { type: 'rows', columns, rows };
  }

  const { changes } = stmt.run();
  if (session.autoBarrier) session.undo.barrier();
  return { type: 'success', message: `OK, ${changes} ${changes === 1 ? 'row' : 'rows'} changed` };
}

/** Handle one input line. Blank lines yield null. */
export function handleLine(session: ShellSession, line: string): ShellResult | null {
  const input = line.trim();
  if (input === '') return null;

  try {
    if (input.startsWith('.')) {
      const command = META_COMMANDS[input.toLowerCase()];
      return command
        ? command(session)
        : { type: 'error', message: `Unknown command: ${input}. Try .help` };
    }
    return runStatement(session, input);
  } catch (err: unknown) {
    return { type: 'error', message: err instanceof Error ? err.message : String(err) };
  }
}
