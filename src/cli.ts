#!/usr/bin/env node
import open from 'open';
import { runCli } from './commands.js';
import { ExecaRunner } from './process/runner.js';
import { launcherLogger, setupErrorHandlers } from './utils/logger.js';

setupErrorHandlers(launcherLogger);

process.exitCode = await runCli(process.argv, {
  runner: new ExecaRunner(),
  openUrl: (url) => open(url),
  interactive: process.stdout.isTTY,
});
