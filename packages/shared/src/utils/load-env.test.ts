import { describe, it, expect, afterEach } from 'vitest';
import { mkdtempSync, mkdirSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { findProjectRoot } from './load-env.js';

describe('findProjectRoot', () => {
  let root: string;

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it('should walk up to the directory holding .env', () => {
    root = mkdtempSync(join(tmpdir(), 'pool-env-'));
    writeFileSync(join(root, '.env'), 'POOL_OWNER=0xowner\n');
    const nested = join(root, 'packages', 'engine', 'src');
    mkdirSync(nested, { recursive: true });

    expect(findProjectRoot(nested)).toBe(root);
  });
});
