#!/usr/bin/env node
import { runCli } from './cli.js';

const code = await runCli(process.argv.slice(2));
// Abandoned (timed-out) tasks may still hold timers or sockets; exit once the
// response is flushed instead of waiting for them.
process.stdout.write('', () => process.exit(code));
