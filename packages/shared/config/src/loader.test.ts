import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { parseToml, ConfigLoadError, findConfigFile, loadConfig, getConfigSearchPaths } from './loader.js';

describe('TOML Loader', () => {
  describe('parseToml', () => {
    it('should parse a provider cascade', () => {
      const config = parseToml(`
[parley]
name = "ops-bot"
version = "1.0"

[llm.primary]
provider = "openai"
model = "gpt-4o-mini"

[llm.secondary]
provider = "anthropic"
model = "claude-3-5-haiku-latest"

[llm.tertiary]
provider = "ollama"
model = "llama3.1"
base_url = "http://localhost:11434/v1"
      `);

      expect(config).toEqual({
        parley: { name: 'ops-bot', version: '1.0' },
        llm: {
          primary: { provider: 'openai', model: 'gpt-4o-mini' },
          secondary: { provider: 'anthropic', model: 'claude-3-5-haiku-latest' },
          tertiary: { provider: 'ollama', model: 'llama3.1', base_url: 'http://localhost:11434/v1' },
        },
      });
    });

    it('should parse arrays and numbers', () => {
      const config = parseToml(`
[assistant]
admin_users = ["42", "77"]
history_turns = 6
      `);
      expect(config.assistant).toEqual({ admin_users: ['42', '77'], history_turns: 6 });
    });

    it('should throw ConfigLoadError for invalid TOML', () => {
      expect(() => parseToml('[parley\nname = ')).toThrow(ConfigLoadError);
    });
  });

  describe('file discovery', () => {
    let dir: string;

    beforeEach(() => {
      dir = fs.mkdtempSync(path.join(os.tmpdir(), 'parley-loader-'));
    });

    afterEach(() => {
      fs.rmSync(dir, { recursive: true, force: true });
    });

    it('should return the first existing path', () => {
      const second = path.join(dir, 'parley.toml');
      fs.writeFileSync(second, '[parley]\nname = "x"\n');
      expect(findConfigFile([path.join(dir, 'missing.toml'), second])).toBe(second);
    });

    it('should return null when nothing exists', () => {
      expect(findConfigFile([path.join(dir, 'missing.toml')])).toBeNull();
    });

    it('should load a file by explicit path', () => {
      const file = path.join(dir, 'custom.toml');
      fs.writeFileSync(file, '[runtime]\nlog_level = "debug"\n');
      expect(loadConfig(file)).toEqual({ runtime: { log_level: 'debug' } });
    });

    it('should throw for a missing explicit path', () => {
      expect(() => loadConfig(path.join(dir, 'nope.toml'))).toThrow(
        /Configuration file not found/
      );
    });

    it('should put PARLEY_CONFIG first in the search paths', () => {
      const original = process.env.PARLEY_CONFIG;
      process.env.PARLEY_CONFIG = path.join(dir, 'env.toml');
      try {
        expect(getConfigSearchPaths()[0]).toBe(path.join(dir, 'env.toml'));
      } finally {
        if (original === undefined) delete process.env.PARLEY_CONFIG;
        else process.env.PARLEY_CONFIG = original;
      }
    });
  });
});
