#!/usr/bin/env node
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { createLogger } from './logger.js';
import { defaultStorageRoot } from './session-root.js';
import { registerTools } from './tools.js';
import { VERSION } from './version.js';

const log = createLogger('mcp');

const storage = defaultStorageRoot();
const server = new McpServer({ name: 'hook-relay', version: VERSION });
registerTools(server, storage);

await server.connect(new StdioServerTransport());
log.info('mcp server listening on stdio', { storage_root: storage.root });
