#!/usr/bin/env node

/**
 * wikiladder CLI エントリポイント
 */

import { createCli } from './interface/cli/index.js';

const program = createCli();
await program.parseAsync(process.argv);
