#!/usr/bin/env node
import { runCli } from './cli.js';
import { loadConfig, loadEnvFile } from './config.js';

loadEnvFile();
process.exitCode = runCli(process.argv.slice(2), loadConfig());
