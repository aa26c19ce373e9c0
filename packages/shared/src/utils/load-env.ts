/**
 * Utility to load the pool's .env file from the project root
 * Works from any package directory
 */

import dotenv from 'dotenv';
import { fileURLToPath } from 'url';
import { dirname, join, resolve } from 'path';
import { existsSync } from 'fs';

/**
 * Find project root by looking for .env file
 * Starts from current module location and goes up
 */
export function findProjectRoot(startPath: string): string | null {
  let current = resolve(startPath);
  const root = resolve(current, '/');

  while (current !== root) {
    const envPath = join(current, '.env');
    if (existsSync(envPath)) {
      return current;
    }
    current = resolve(current, '..');
  }
  return null;
}

/**
 * Load environment variables from project root .env file into process.env
 * and return the resulting environment.
 */
export function loadEnvFromRoot(): NodeJS.ProcessEnv {
  const moduleDir = dirname(fileURLToPath(import.meta.url));

  // Find project root (go up from packages/shared/src/utils)
  const projectRoot = findProjectRoot(moduleDir);

  if (projectRoot) {
    dotenv.config({ path: join(projectRoot, '.env') });
  } else {
    // Fallback: try current working directory
    dotenv.config();
  }
  return process.env;
}
