import assert from 'node:assert/strict';
import { describe, it } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import {
  findConfigFile,
  getConfigCandidates,
  loadConfigFile,
  mergeConfig,
  resolveConfig,
} from '../../src/host/config-loader';
import { ConfigurationError } from '../../src/host/errors';
import { withTempDir } from '../helpers/disk-image';

const writeJson = (filePath: string, value: unknown): void => {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, JSON.stringify(value));
};

describe('config-loader', () => {
  describe('getConfigCandidates', () => {
    it('lists the explicit path first', () => {
      assert.deepEqual(getConfigCandidates('my.json'), ['my.json', 'sdspi.json', '.sdspi.json']);
      assert.deepEqual(getConfigCandidates(), ['sdspi.json', '.sdspi.json']);
    });
  });

  describe('findConfigFile', () => {
    it('walks up to the nearest config', () => {
      withTempDir((dir) => {
        writeJson(path.join(dir, 'sdspi.json'), { latencyMs: 0 });
        const nested = path.join(dir, 'a', 'b');
        fs.mkdirSync(nested, { recursive: true });
        assert.equal(findConfigFile(nested, getConfigCandidates()), path.join(dir, 'sdspi.json'));
      });
    });

    it('accepts package.json only with an sdspi section', () => {
      withTempDir((dir) => {
        const inner = path.join(dir, 'inner');
        writeJson(path.join(inner, 'package.json'), { name: 'x' });
        writeJson(path.join(dir, 'package.json'), { name: 'y', sdspi: { capacity: 2048 } });
        assert.equal(findConfigFile(inner, getConfigCandidates()), path.join(dir, 'package.json'));
      });
    });
  });

  describe('loadConfigFile', () => {
    it('reads the sdspi section of package.json', () => {
      withTempDir((dir) => {
        const pkg = path.join(dir, 'package.json');
        writeJson(pkg, { name: 'y', sdspi: { capacity: 2048, image: 'card.img' } });
        assert.deepEqual(loadConfigFile(pkg), { capacity: 2048, image: 'card.img' });
      });
    });

    it('rejects missing, malformed and invalid files', () => {
      withTempDir((dir) => {
        const missing = path.join(dir, 'missing.json');
        assert.throws(() => loadConfigFile(missing), {
          message: `Config file ${missing} does not exist`,
        });

        const broken = path.join(dir, 'broken.json');
        fs.writeFileSync(broken, '{ nope');
        assert.throws(() => loadConfigFile(broken), ConfigurationError);

        const invalid = path.join(dir, 'sdspi.json');
        writeJson(invalid, { blockSize: 0 });
        assert.throws(() => loadConfigFile(invalid), {
          message: 'Invalid sdspi configuration:\n- blockSize must be at least 1, got 0',
        });
      });
    });
  });

  describe('mergeConfig', () => {
    it('lets defined overrides win', () => {
      assert.deepEqual(
        mergeConfig({ image: 'a.img', latencyMs: 30 }, { latencyMs: 0, image: undefined }),
        { image: 'a.img', latencyMs: 0 }
      );
    });
  });

  describe('resolveConfig', () => {
    it('uses an explicit path relative to the start directory', () => {
      withTempDir((dir) => {
        writeJson(path.join(dir, 'cfg', 'card.json'), { capacity: 1024 });
        const loaded = resolveConfig(dir, 'cfg/card.json');
        assert.deepEqual(loaded, {
          config: { capacity: 1024 },
          configPath: path.join(dir, 'cfg', 'card.json'),
          baseDir: path.join(dir, 'cfg'),
        });
      });
    });

    it('falls back to the discovered config', () => {
      withTempDir((dir) => {
        writeJson(path.join(dir, '.sdspi.json'), { verbose: true });
        const loaded = resolveConfig(dir);
        assert.equal(loaded.configPath, path.join(dir, '.sdspi.json'));
        assert.deepEqual(loaded.config, { verbose: true });
        assert.equal(loaded.baseDir, dir);
      });
    });

    it('skips an unparsable package.json above the start directory', () => {
      withTempDir((dir) => {
        fs.writeFileSync(path.join(dir, 'package.json'), '{ not json');
        const start = path.join(dir, 'other');
        fs.mkdirSync(start);
        assert.equal(findConfigFile(start, getConfigCandidates()), undefined);
        assert.deepEqual(resolveConfig(start), { config: {}, baseDir: start });
        assert.throws(() => loadConfigFile(path.join(dir, 'package.json')), ConfigurationError);
      });
    });

    it('fails when the explicit file is missing', () => {
      withTempDir((dir) => {
        assert.throws(() => resolveConfig(dir, 'none.json'), ConfigurationError);
      });
    });
  });
});
