import assert from 'node:assert/strict';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { afterEach, beforeEach, describe, test } from 'node:test';
import { runCli, type CliIO } from '../cli.js';
import { openTaskQueue } from '../task-queue.js';
import type { HookInput, SessionStorageRoot } from '../types.js';
import { MAIN_ENTRY, makeStorage, removeStorage, runNode } from './helpers.js';

interface CapturedIO extends CliIO {
  out: string[];
  err: string[];
}

describe('hook-relay cli', () => {
  let storage: SessionStorageRoot;

  beforeEach(() => {
    storage = makeStorage();
  });

  afterEach(() => {
    removeStorage(storage);
  });

  function io(input?: HookInput): CapturedIO {
    const out: string[] = [];
    const err: string[] = [];
    return {
      out,
      err,
      stdout: (text) => out.push(text),
      stderr: (text) => err.push(text),
      storage,
      input,
      cwd: storage.root,
    };
  }

  function writeConfig(data: unknown): string {
    const file = path.join(storage.root, 'router.json');
    fs.writeFileSync(file, JSON.stringify(data));
    return file;
  }

  test('--version prints the version', async () => {
    const captured = io();
    assert.equal(await runCli(['--version'], captured), 0);
    assert.deepEqual(captured.out, ['0.1.0\n']);
  });

  test('--queue-task records the trailing command', async () => {
    const captured = io();
    const code = await runCli(
      ['--queue-task', '--session', 's1', '--source', 'manual', '--timeout', '30', '--', '/bin/sh', '-c', 'echo hi'],
      captured,
    );
    assert.equal(code, 0);
    assert.match(captured.out.join(''), /^Queued task: [0-9a-f-]{36}\n$/);

    const queue = openTaskQueue(storage, 's1');
    try {
      const [task] = queue.listAll();
      assert.deepEqual(task.command, ['/bin/sh', '-c', 'echo hi']);
      assert.equal(task.source, 'manual');
      assert.equal(task.timeout, 30);
      assert.equal(task.status, 'pending');
    } finally {
      queue.close();
    }
  });

  test('--queue-task defaults the source to cli', async () => {
    await runCli(['--queue-task', '--session', 's1', '--', 'make', 'lint'], io());
    const queue = openTaskQueue(storage, 's1');
    try {
      assert.equal(queue.listAll()[0].source, 'cli');
      assert.equal(queue.listAll()[0].timeout, 120);
    } finally {
      queue.close();
    }
  });

  test('--queue-task without a session is a usage error', async () => {
    const captured = io();
    assert.equal(await runCli(['--queue-task', '--', 'make'], captured), 2);
    assert.deepEqual(captured.err, ['--queue-task requires --session <id>\n']);
  });

  test('--queue-task without a command is rejected', async () => {
    const captured = io();
    assert.equal(await runCli(['--queue-task', '--session', 's1'], captured), 1);
    assert.deepEqual(captured.err, ['Invalid task request: command: command must not be empty\n']);
  });

  test('a non-numeric --timeout is rejected by the parser', async () => {
    const captured = io();
    assert.equal(await runCli(['--queue-task', '--session', 's1', '--timeout', 'soon', '--', 'make'], captured), 1);
    assert.match(captured.err.join(''), /must be a positive integer number of seconds/);
  });

  test('--check-config prints the config with defaults applied', async () => {
    const file = writeConfig({ max_background: 4, events: { Stop: ['protect-branch'] } });
    const captured = io();
    assert.equal(await runCli(['--check-config', '--config', file], captured), 0);
    const printed: unknown = JSON.parse(captured.out.join(''));
    assert.deepEqual(printed, {
      concurrency: 6,
      default_timeout: 12,
      max_background: 4,
      feedback_ttl_hours: 24,
      default_strategy: 'show_once',
      policy: { block_on: [] },
      events: { Stop: ['protect-branch'] },
    });
  });

  test('--check-config reports an invalid config', async () => {
    const file = writeConfig({ concurrency: 0 });
    const captured = io();
    assert.equal(await runCli(['--check-config', '--config', file], captured), 1);
    assert.match(captured.err.join(''), /concurrency/);
  });

  test('without flags the hook payload is routed and one JSON object is written', async () => {
    const file = writeConfig({ events: { PreToolUse: [{ ref: 'protect-branch', params: { branches: ['main'] } }] } });
    const captured = io({
      hook_event_name: 'PreToolUse',
      session_id: 's1',
      tool_name: 'Bash',
      tool_input: { command: 'git push --force origin main' },
    });
    assert.equal(await runCli(['--config', file], captured), 0);
    assert.equal(captured.out.length, 1);
    const output: unknown = JSON.parse(captured.out[0]);
    assert.deepEqual(output, {
      continue: true,
      hookSpecificOutput: {
        hookEventName: 'PreToolUse',
        permissionDecision: 'deny',
        permissionDecisionReason:
          'Force push to a protected branch is not allowed\n\nCommand: git push --force origin main\n\nPush a feature branch and open a pull request instead.',
      },
    });
  });

  test('a broken config still yields a continue response', async () => {
    const file = path.join(storage.root, 'broken.json');
    fs.writeFileSync(file, '{');
    const captured = io({ hook_event_name: 'Stop', session_id: 's1' });
    assert.equal(await runCli(['--config', file], captured), 0);
    assert.equal(captured.out.length, 1);
    assert.match(captured.out[0], /"continue":true/);
    assert.match(captured.out[0], /hook-relay: .*broken\.json is not valid JSON/);
  });

  test('stray arguments without --queue-task are refused', async () => {
    const captured = io();
    assert.equal(await runCli(['make', 'lint'], captured), 2);
    assert.deepEqual(captured.err, ['Unexpected arguments: make lint (did you mean --queue-task?)\n']);
  });

  describe('as a process', () => {
    test('an unusable storage root with logging enabled still answers continue', async () => {
      const blocker = path.join(storage.root, 'not-a-dir');
      fs.writeFileSync(blocker, '');
      const run = await runNode(MAIN_ENTRY, [], {
        env: {
          HOOK_RELAY_HOME: blocker,
          HOOK_RELAY_LOG_LEVEL: 'info',
          HOOK_RELAY_LOG_DIR: '',
          HOOK_RELAY_CONFIG: '',
          TMPDIR: storage.root,
        },
        input: JSON.stringify({
          hook_event_name: 'PostToolUse',
          session_id: 's1',
          cwd: storage.root,
          tool_name: 'Edit',
          tool_input: { file_path: 'src/a.ts' },
        }),
      });
      assert.equal(run.code, 0, run.stderr);
      assert.equal(run.stdout, '{"continue":true}');
      const fallbackLog = fs.readFileSync(path.join(storage.root, 'hook-relay', 'hook-relay.log'), 'utf-8');
      assert.match(fallbackLog, /"msg":"event routed"/);
    });

    test('a timed-out task does not keep the process alive', async () => {
      fs.writeFileSync(
        path.join(storage.root, 'slow.mjs'),
        "import { setTimeout } from 'node:timers/promises';\nexport async function run() { await setTimeout(8000); }\n",
      );
      const file = writeConfig({ events: { PostToolUse: [{ ref: './slow.mjs', timeout: 1 }] } });
      const run = await runNode(MAIN_ENTRY, ['--config', file], {
        env: { HOOK_RELAY_HOME: path.join(storage.root, 'home') },
        input: JSON.stringify({ hook_event_name: 'PostToolUse', session_id: 's1', cwd: storage.root }),
      });
      assert.equal(run.code, 0, run.stderr);
      assert.deepEqual(JSON.parse(run.stdout), {
        continue: true,
        hookSpecificOutput: {
          hookEventName: 'PostToolUse',
          additionalContext: '[warn] Task ./slow.mjs timed out after 1s',
        },
      });
      assert.ok(run.elapsedMs < 6000, `process lived ${run.elapsedMs}ms`);
    });
  });
});
