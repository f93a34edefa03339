#!/usr/bin/env node
import dotenv from 'dotenv';
import { runCli } from './cli.js';

dotenv.config();

await runCli(process.argv.slice(2));
