/**
 * Centralized version module
 * Reads version from package.json - single source of truth
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { dirname, join } from 'node:path';
import { z } from 'zod';

const packageJsonSchema = z.object({ version: z.string() });

// Both src/ and dist/ sit one level below the package root
const __dirname = dirname(fileURLToPath(import.meta.url));
const packageJson = packageJsonSchema.parse(
  JSON.parse(readFileSync(join(__dirname, '../package.json'), 'utf-8'))
);

export const VERSION: string = packageJson.version;
