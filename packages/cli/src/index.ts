// packages/cli/src/index.ts — accelbuild entry point

import { createProgram } from './program.js';

await createProgram().parseAsync(process.argv);
