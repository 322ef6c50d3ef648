import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { SourceLoadError, loadSource } from './index.js';

function fakeReader(files: Record<string, string>): (path: string) => Promise<string> {
  return (path) => {
    const content = Object.hasOwn(files, path) ? files[path] : undefined;
    if (content === undefined) {
      return Promise.reject(Object.assign(new Error(`ENOENT: ${path}`), { code: 'ENOENT' }));
    }
    return Promise.resolve(content);
  };
}

describe('loadSource', () => {
  it('should use the first candidate that loads', async () => {
    const reader = fakeReader({
      '/etc/feedbackd/feedbackd.toml': '["event first"]\n',
      './feedbackd.toml': '["event second"]\n',
    });

    const loaded = await loadSource(['/etc/feedbackd/feedbackd.toml', './feedbackd.toml'], reader);

    expect(loaded.path).toBe('/etc/feedbackd/feedbackd.toml');
    expect(loaded.source.groupNames()).toEqual(['event first']);
    expect(loaded.skipped).toEqual([]);
  });

  it('should fall through missing and unparseable candidates', async () => {
    const reader = fakeReader({
      '/broken.toml': '[general\n',
      './feedbackd.toml': '["event second"]\n',
    });

    const loaded = await loadSource(['/missing.toml', '/broken.toml', './feedbackd.toml'], reader);

    expect(loaded.path).toBe('./feedbackd.toml');
    expect(loaded.skipped).toHaveLength(2);
    expect(loaded.skipped[0]).toEqual({ path: '/missing.toml', reason: 'file not found' });
    expect(loaded.skipped[1]?.path).toBe('/broken.toml');
    expect(loaded.skipped[1]?.reason).toMatch(/^Invalid TOML syntax/);
  });

  it('should throw SourceLoadError listing every attempt when nothing loads', async () => {
    const reader = fakeReader({});

    await expect(loadSource(['/a.toml', '/b.toml'], reader)).rejects.toThrow(
      'No configuration source could be loaded (tried: /a.toml, /b.toml)'
    );

    try {
      await loadSource(['/a.toml', '/b.toml'], reader);
    } catch (error) {
      expect(error).toBeInstanceOf(SourceLoadError);
      expect((error as SourceLoadError).attempts).toEqual([
        { path: '/a.toml', reason: 'file not found' },
        { path: '/b.toml', reason: 'file not found' },
      ]);
    }
  });

  it('should throw SourceLoadError for an empty candidate list', async () => {
    await expect(loadSource([], fakeReader({}))).rejects.toThrow(
      'No configuration source candidates given'
    );
  });

  describe('with the file system', () => {
    let tempDir: string;

    beforeAll(async () => {
      tempDir = await mkdtemp(join(tmpdir(), 'feedbackd-source-'));
      await writeFile(join(tempDir, 'feedbackd.toml'), '["event sms"]\nled_enabled = true\n');
    });

    afterAll(async () => {
      await rm(tempDir, { recursive: true, force: true });
    });

    it('should read candidates from disk by default', async () => {
      const path = join(tempDir, 'feedbackd.toml');

      const loaded = await loadSource([join(tempDir, 'missing.toml'), path]);

      expect(loaded.path).toBe(path);
      expect(loaded.source.lookupBoolean('event sms', 'led_enabled')).toEqual({
        status: 'ok',
        value: true,
      });
      expect(loaded.skipped[0]?.reason).toBe('file not found');
    });
  });
});
