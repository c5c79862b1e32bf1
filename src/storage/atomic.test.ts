import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { z } from 'zod';
import { atomicWriteJson, readJson, readValidatedJson, fileExists } from './atomic.js';

describe('atomic', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'atomic-test-'));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  describe('atomicWriteJson', () => {
    it('creates file with correct content', async () => {
      const filePath = path.join(tempDir, 'test.json');
      const data = { foo: 'bar', num: 42 };

      await atomicWriteJson(filePath, data);

      const content = await fs.readFile(filePath, 'utf-8');
      expect(JSON.parse(content)).toEqual(data);
    });

    it('creates parent directories', async () => {
      const filePath = path.join(tempDir, 'nested', 'deep', 'test.json');
      await atomicWriteJson(filePath, { test: true });

      const content = await fs.readFile(filePath, 'utf-8');
      expect(JSON.parse(content)).toEqual({ test: true });
    });

    it('uses 2-space indentation', async () => {
      const filePath = path.join(tempDir, 'test.json');
      await atomicWriteJson(filePath, { a: 1 });

      const content = await fs.readFile(filePath, 'utf-8');
      expect(content).toBe('{\n  "a": 1\n}');
    });

    it('overwrites existing file and leaves no temp files', async () => {
      const filePath = path.join(tempDir, 'test.json');
      await atomicWriteJson(filePath, { first: true });
      await atomicWriteJson(filePath, { second: true });

      const content = await fs.readFile(filePath, 'utf-8');
      expect(JSON.parse(content)).toEqual({ second: true });
      expect(await fs.readdir(tempDir)).toEqual(['test.json']);
    });

    it('wraps failures with the target path', async () => {
      const blocker = path.join(tempDir, 'blocker');
      await fs.writeFile(blocker, 'file, not a directory');
      const filePath = path.join(blocker, 'test.json');

      await expect(atomicWriteJson(filePath, {})).rejects.toThrow(`Atomic write failed for ${filePath}`);
    });
  });

  describe('readJson', () => {
    it('returns parsed content', async () => {
      const filePath = path.join(tempDir, 'test.json');
      await fs.writeFile(filePath, '{"foo":"bar"}');

      expect(await readJson(filePath)).toEqual({ foo: 'bar' });
    });

    it('throws for non-existent file', async () => {
      const filePath = path.join(tempDir, 'missing.json');
      await expect(readJson(filePath)).rejects.toThrow('File not found');
    });

    it('throws for invalid JSON', async () => {
      const filePath = path.join(tempDir, 'invalid.json');
      await fs.writeFile(filePath, 'not json');

      await expect(readJson(filePath)).rejects.toThrow('Invalid JSON');
    });
  });

  describe('readValidatedJson', () => {
    const schema = z.object({ count: z.number() });

    it('returns data matching the schema', async () => {
      const filePath = path.join(tempDir, 'ok.json');
      await fs.writeFile(filePath, '{"count": 3}');

      const data = await readValidatedJson(filePath, schema);
      expect(data.count).toBe(3);
    });

    it('throws when the data does not match', async () => {
      const filePath = path.join(tempDir, 'bad.json');
      await fs.writeFile(filePath, '{"count": "three"}');

      await expect(readValidatedJson(filePath, schema)).rejects.toThrow('Invalid data in file');
    });
  });

  describe('fileExists', () => {
    it('returns true for existing file', async () => {
      const filePath = path.join(tempDir, 'test.json');
      await fs.writeFile(filePath, '{}');

      expect(await fileExists(filePath)).toBe(true);
    });

    it('returns false for non-existent file', async () => {
      expect(await fileExists(path.join(tempDir, 'missing.json'))).toBe(false);
    });

    it('returns false for directories', async () => {
      expect(await fileExists(tempDir)).toBe(false);
    });
  });
});
