/**
 * Centralized version module
 * Reads version from package.json - single source of truth
 */

import { existsSync, readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { dirname, join } from 'node:path';
import { z } from 'zod';

const packageJsonSchema = z.object({ version: z.string() });

const __dirname = dirname(fileURLToPath(import.meta.url));

// src/ when run from sources, dist/src/ when built
const candidates = [join(__dirname, '../package.json'), join(__dirname, '../../package.json')];
const packagePath = candidates.find((path) => existsSync(path));

export const VERSION: string = packagePath
  ? packageJsonSchema.parse(JSON.parse(readFileSync(packagePath, 'utf-8'))).version
  : '0.0.0';
