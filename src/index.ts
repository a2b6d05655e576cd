#!/usr/bin/env node
import { chalkStderr } from 'chalk';
import { runCli } from './cli.js';
import { loadBuildInfo } from './config.js';
import { streamSink } from './output/reporter.js';

const exitCode = await runCli(process.argv.slice(2), {
  stdout: streamSink(process.stdout),
  stderr: streamSink(process.stderr),
  chalk: chalkStderr,
  buildInfo: loadBuildInfo(),
});
process.exitCode = exitCode;
