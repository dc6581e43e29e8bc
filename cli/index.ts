#!/usr/bin/env node
// Filename: cli/index.ts

import { main } from './main.js';

process.exitCode = await main(process.argv.slice(2));
