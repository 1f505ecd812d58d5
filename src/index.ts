#!/usr/bin/env node
import { runCli } from './cli.js';
import { config } from './config.js';

process.exitCode = await runCli(config);
