// packages/core/src/config/defaults.ts

import { projectConfigSchema, type ProjectConfig } from './schema.js';

/** Every field at its schema default. */
export const DEFAULT_CONFIG: ProjectConfig = projectConfigSchema.parse({});
