#!/usr/bin/env node
import 'dotenv/config';

import { runCli } from './runCli';

process.exitCode = runCli(process.argv.slice(2), process.env, {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
});
