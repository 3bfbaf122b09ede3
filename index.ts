#!/usr/bin/env node
import { run } from './src/commands/index.ts';

await run();
