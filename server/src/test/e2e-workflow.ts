import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { test, describe, before, after } from 'node:test';
import assert from 'node:assert/strict';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { setTimeout as sleep } from 'node:timers/promises';
import { runHook } from '../hook-helpers.js';
import { incomingDir, sessionDir } from '../session-root.js';
import { registerTools } from '../tools.js';
import type { HookInput, HookOutput, SessionStorageRoot } from '../types.js';
import { callTool, makeStorage, removeStorage, text } from './helpers.js';

/**
 * A session seen from the host's side: work queued through MCP and a drop-in
 * file, results picked up by later hook invocations, then session end.
 */
describe('e2e: background work across hook invocations', () => {
  let client: Client;
  let server: McpServer;
  let storage: SessionStorageRoot;
  let configPath: string;

  before(async () => {
    storage = makeStorage();
    configPath = path.join(storage.root, 'hooks.json');
    fs.writeFileSync(configPath, JSON.stringify({ default_strategy: 'show_once', max_background: 2 }));

    server = new McpServer({ name: 'hook-relay', version: '0.0.0-test' });
    registerTools(server, storage);
    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    await server.connect(serverTransport);
    client = new Client({ name: 'test-client', version: '1.0.0' });
    await client.connect(clientTransport);
  });

  after(async () => {
    await client.close();
    await server.close();
    removeStorage(storage);
  });

  async function hook(input: HookInput): Promise<{ output: HookOutput; written: string[] }> {
    const written: string[] = [];
    const output = await runHook({
      configPath,
      input,
      deps: { storage, cwd: storage.root, graceMs: 100 },
      write: (chunk) => written.push(chunk),
    });
    return { output, written };
  }

  const prompt: HookInput = { hook_event_name: 'UserPromptSubmit', session_id: 'e2e', prompt: 'next step' };

  test('queued work surfaces on a later prompt and only once', async () => {
    const queued = text(await callTool(client, 'queue_task', {
      session_id: 'e2e',
      command: ['/bin/sh', '-c', 'printf \'{"feedback":[{"content":"2 tests failed","severity":"error","category":"tests"}]}\''],
      source: 'test-suite',
    }));
    assert.match(queued, /^Queued task: /);

    const dir = incomingDir(storage, 'e2e');
    fs.mkdirSync(dir, { recursive: true });
    fs.writeFileSync(path.join(dir, 'typecheck.json'), JSON.stringify({
      command: ['/bin/sh', '-c', 'echo types ok'],
      source: 'typecheck',
    }));

    const first = await hook(prompt);
    assert.equal(first.written.length, 1);
    assert.deepEqual(JSON.parse(first.written[0]), { continue: true });

    let context = '';
    const deadline = Date.now() + 10_000;
    while (!(context.includes('types ok') && context.includes('tests failed')) && Date.now() < deadline) {
      await sleep(50);
      const { output } = await hook(prompt);
      const more = output.hookSpecificOutput?.additionalContext;
      if (more) context = context ? `${context}\n${more}` : more;
    }
    assert.ok(context.includes('[error] 2 tests failed'));
    assert.ok(context.includes('[info] types ok'));

    const { output } = await hook(prompt);
    assert.deepEqual(output, { continue: true });

    const tasks = text(await callTool(client, 'list_tasks', { session_id: 'e2e', status: 'completed' }));
    assert.match(tasks, /^2 task\(s\):/);
  });

  test('session end removes everything the session stored', async () => {
    const { written } = await hook({ hook_event_name: 'SessionEnd', session_id: 'e2e' });
    assert.deepEqual(written, ['{"continue":true}']);
    assert.equal(fs.existsSync(sessionDir(storage, 'e2e')), false);
  });
});
