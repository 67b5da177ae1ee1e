import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { test, describe, before, after } from 'node:test';
import assert from 'node:assert/strict';
import { FeedbackStore } from '../feedback-store.js';
import { registerTools } from '../tools.js';
import type { SessionStorageRoot } from '../types.js';
import { VERSION } from '../version.js';
import { callTool, isError, makeStorage, removeStorage, text } from './helpers.js';

let client: Client;
let server: McpServer;
let storage: SessionStorageRoot;

describe('hook-relay MCP server', () => {
  before(async () => {
    storage = makeStorage();
    server = new McpServer({ name: 'hook-relay', version: VERSION });
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

  test('lists all 4 tools', async () => {
    const tools = await client.listTools();
    const names = tools.tools.map((t) => t.name).sort();
    assert.deepEqual(names, ['health', 'list_feedback', 'list_tasks', 'queue_task']);
  });

  test('health answers ok', async () => {
    assert.equal(text(await callTool(client, 'health')), `ok (hook-relay ${VERSION})`);
  });

  test('list_tasks on an unknown session finds nothing', async () => {
    assert.equal(text(await callTool(client, 'list_tasks', { session_id: 'nobody' })), 'No tasks found.');
  });

  let taskId: string;

  test('queue_task records a pending task', async () => {
    const result = await callTool(client, 'queue_task', {
      session_id: 's1',
      command: ['npm', 'test'],
      timeout: 300,
    });
    const match = /^Queued task: ([0-9a-f-]{36})$/.exec(text(result));
    assert.ok(match);
    taskId = match[1];
  });

  test('list_tasks shows the queued task with its source', async () => {
    const result = text(await callTool(client, 'list_tasks', { session_id: 's1' }));
    assert.equal(result, `1 task(s):\n\n- [pending] mcp: npm test [id: ${taskId}]`);
  });

  test('list_tasks filters by status', async () => {
    assert.equal(text(await callTool(client, 'list_tasks', { session_id: 's1', status: 'completed' })), 'No tasks found.');
  });

  test('queue_task rejects an empty command', async () => {
    const result = await callTool(client, 'queue_task', { session_id: 's1', command: [] });
    assert.equal(isError(result), true);
    assert.equal(text(result), 'Invalid task request: command: command must not be empty');
  });

  test('list_feedback reports recorded items', async () => {
    assert.equal(text(await callTool(client, 'list_feedback', { session_id: 's1' })), 'No feedback recorded.');

    const store = new FeedbackStore(storage, 's1');
    store.upsert({
      issue_id: 'eslint:a.ts:no-console',
      instance_id: 'inst-1',
      content: 'Unexpected console statement',
      task_id: 'eslint',
      file_path: 'src/a.ts',
      severity: 'warn',
      category: 'lint',
      strategy: 'show_once',
      occurrences: 1,
    });
    store.close();

    assert.equal(
      text(await callTool(client, 'list_feedback', { session_id: 's1', unshown_only: true })),
      '1 feedback item(s):\n\n- [warn] lint: Unexpected console statement (seen 1x, unshown, show_once) [issue: eslint:a.ts:no-console]',
    );
  });
});
