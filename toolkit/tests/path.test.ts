import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { afterAll, beforeAll, describe, expect, it } from 'vitest';

import { pathCandidates, sanitizePath } from '../src/utils/path.js';

describe('pathCandidates', () => {
  it('strips quotes and offers unescaped spellings', () => {
    expect(pathCandidates('  "a\\\\b"  ')).toEqual(['a\\b', 'ab']);
    expect(pathCandidates("'/tmp/my\\ file.json'")).toEqual([
      '/tmp/my\\ file.json',
      '/tmp/my file.json',
    ]);
  });

  it('returns nothing for blank input', () => {
    expect(pathCandidates('  ""  ')).toEqual([]);
  });
});

describe('sanitizePath', () => {
  let dir: string;
  let file: string;

  beforeAll(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'sanitize-'));
    file = path.join(dir, 'my call (1).json');
    await fs.writeFile(file, '{}', 'utf-8');
  });

  afterAll(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('accepts quoted paths', async () => {
    expect(await sanitizePath(`"${file}"`)).toBe(file);
  });

  it('undoes shell escapes from drag and drop', async () => {
    const escaped = file.replace(/([ ()])/g, '\\$1');
    expect(await sanitizePath(`${escaped} `)).toBe(file);
  });

  it('rejects paths that do not exist', async () => {
    await expect(sanitizePath(path.join(dir, 'missing.json'))).rejects.toThrow(
      'Could not find the file. Please ensure the path is correct and try again.'
    );
  });
});
