'use strict';

import test from 'node:test';
import assert from 'node:assert/strict';

import { parseCommand, parseCommandLine } from '../src/commands';

test('parses a line-leading command with its arguments', () => {
  assert.deepEqual(parseCommand('/assign @alice', 'bob'), {
    name: 'assign',
    args: ['@alice'],
    invoker: 'bob',
  });
});

test('commands must start their line', () => {
  assert.equal(parseCommand('please /assign @alice'), null);
  assert.deepEqual(parseCommandLine('please /assign @alice', 'bob'), { status: 'none' });
});

test('unknown command names yield no command and a rejection', () => {
  assert.equal(parseCommand('/unknown foo'), null);
  assert.deepEqual(parseCommandLine('/unknown foo', 'bob'), {
    status: 'rejected',
    rejection: { name: 'unknown', reason: 'unknown-command' },
  });
});

test('names are case-insensitive and leading whitespace is allowed', () => {
  assert.deepEqual(parseCommand('   /HELP', 'bob'), { name: 'help', args: [], invoker: 'bob' });
});

test('assign takes exactly one mention', () => {
  const reject = { status: 'rejected', rejection: { name: 'assign', reason: 'invalid-arguments' } };

  assert.deepEqual(parseCommandLine('/assign alice', 'bob'), reject);
  assert.deepEqual(parseCommandLine('/assign @alice @carol', 'bob'), reject);
  assert.deepEqual(parseCommandLine('/assign', 'bob'), reject);
  assert.deepEqual(parseCommand('/assign @dependabot[bot]', 'bob')?.args, ['@dependabot[bot]']);
});

test('label takes exactly one bare label name', () => {
  const reject = { status: 'rejected', rejection: { name: 'label', reason: 'invalid-arguments' } };

  assert.deepEqual(parseCommandLine('/label @bug', 'bob'), reject);
  assert.deepEqual(parseCommandLine('/label', 'bob'), reject);
  assert.deepEqual(parseCommandLine('/label needs review', 'bob'), reject);
  assert.deepEqual(parseCommand('/label needs-review', 'bob')?.args, ['needs-review']);
});

test('other commands accept free-form arguments', () => {
  assert.deepEqual(parseCommand('/close duplicate of #3', 'bob'), {
    name: 'close',
    args: ['duplicate', 'of', '#3'],
    invoker: 'bob',
  });
});

test('lines inside fenced code blocks are ignored', () => {
  const body = ['Try this:', '```sh', '/close', '```', '/reopen'].join('\n');

  assert.equal(parseCommand(body)?.name, 'reopen');
  assert.equal(parseCommand(['~~~', '/close', '~~~'].join('\n')), null);
});

test('the first command-shaped line decides', () => {
  assert.deepEqual(parseCommandLine('/nope\n/help', 'bob'), {
    status: 'rejected',
    rejection: { name: 'nope', reason: 'unknown-command' },
  });
  assert.equal(parseCommand('Thanks!\r\n/joke')?.name, 'joke');
});

test('paths and bare slashes are not commands', () => {
  assert.deepEqual(parseCommandLine('/usr/bin/env node', 'bob'), { status: 'none' });
  assert.deepEqual(parseCommandLine('/', 'bob'), { status: 'none' });
});
