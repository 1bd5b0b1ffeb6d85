#!/usr/bin/env node

import { createCLI } from '../src/cli/index.js';

const program = createCLI();

program.parseAsync(process.argv).catch((err) => {
    console.error('compose failed:', (err as Error).message);
    process.exit(1);
});
