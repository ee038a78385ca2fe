import { describe, it, expect, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { findConfigFileOrThrow } from './config-discovery.js';
import { ConfigNotFoundError } from './errors.js';

describe('findConfigFileOrThrow', () => {
  let dir: string | undefined;

  afterEach(() => {
    if (dir) rmSync(dir, { recursive: true, force: true });
    dir = undefined;
  });

  it('should resolve an explicit path that exists', () => {
    dir = mkdtempSync(join(tmpdir(), 'parley-cli-'));
    const configPath = join(dir, 'custom.toml');
    writeFileSync(configPath, '[parley]\nname = "test"\n');

    expect(findConfigFileOrThrow(configPath)).toBe(configPath);
  });

  it('should list the searched path when the explicit file is missing', () => {
    dir = mkdtempSync(join(tmpdir(), 'parley-cli-'));
    const missing = join(dir, 'missing.toml');

    expect(() => findConfigFileOrThrow(missing)).toThrow(ConfigNotFoundError);
    try {
      findConfigFileOrThrow(missing);
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigNotFoundError);
      if (error instanceof ConfigNotFoundError) {
        expect(error.exitCode).toBe(2);
        expect(error.suggestion).toContain(`  - ${missing}`);
      }
    }
  });
});
