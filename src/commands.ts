'use strict';

import type { Command, CommandName, CommandRejection } from './types';

export const COMMAND_NAMES: readonly CommandName[] = [
  'help',
  'assign',
  'label',
  'close',
  'reopen',
  'changelog',
  'joke',
  'motivate',
];

export type CommandParseResult =
  | { status: 'parsed'; command: Command }
  | { status: 'rejected'; rejection: CommandRejection }
  | { status: 'none' };

const COMMAND_NAME_SHAPE = /^[a-z][a-z0-9-]*$/;
const MENTION_RE = /^@[a-z0-9](?:[a-z0-9-]*[a-z0-9])?(?:\[bot\])?$/i;
const BARE_LABEL_RE = /^[^@/\s]\S*$/;
const FENCE_RE = /^(```|~~~)/;

function hasValidArguments(name: CommandName, args: readonly string[]): boolean {
  switch (name) {
    case 'assign':
      return args.length === 1 && MENTION_RE.test(args[0]);
    case 'label':
      return args.length === 1 && BARE_LABEL_RE.test(args[0]);
    default:
      return true;
  }
}

/**
 * Finds the first command-shaped line: `/` as its first non-whitespace
 * character followed by a name token. Lines inside fenced code blocks are
 * ignored. That line alone decides the result.
 */
export function parseCommandLine(body: string, invoker: string): CommandParseResult {
  let insideFence = false;

  for (const rawLine of body.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (FENCE_RE.test(line)) {
      insideFence = !insideFence;
      continue;
    }

    if (insideFence || !line.startsWith('/')) {
      continue;
    }

    const [head, ...args] = line.split(/\s+/);
    const name = head.slice(1).toLowerCase();
    if (!COMMAND_NAME_SHAPE.test(name)) {
      continue;
    }

    const commandName = COMMAND_NAMES.find((candidate) => candidate === name);
    if (!commandName) {
      return { status: 'rejected', rejection: { name, reason: 'unknown-command' } };
    }

    if (!hasValidArguments(commandName, args)) {
      return { status: 'rejected', rejection: { name: commandName, reason: 'invalid-arguments' } };
    }

    return { status: 'parsed', command: { name: commandName, args, invoker } };
  }

  return { status: 'none' };
}

/** The recognized command in a comment body, or `null` for anything else. */
export function parseCommand(body: string, invoker = ''): Command | null {
  const result = parseCommandLine(body, invoker);
  return result.status === 'parsed' ? result.command : null;
}
