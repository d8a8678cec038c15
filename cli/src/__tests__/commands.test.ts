/**
 * Tests for command helpers and CLI wiring
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { createCLI } from '../cli.js';
import { readUploadFiles } from '../commands/submit.js';
import { parseEndpoint } from '../commands/register.js';

describe('parseEndpoint', () => {
  it('accepts a host and numeric port', () => {
    expect(parseEndpoint('10.0.0.1', '8001')).toEqual({ host: '10.0.0.1', port: 8001 });
  });

  it('rejects out-of-range or non-numeric ports', () => {
    expect(parseEndpoint('10.0.0.1', '0')).toBeNull();
    expect(parseEndpoint('10.0.0.1', '65536')).toBeNull();
    expect(parseEndpoint('10.0.0.1', '80a')).toBeNull();
    expect(parseEndpoint('', '8001')).toBeNull();
  });
});

describe('readUploadFiles', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'scatter-upload-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('reads existing files by basename and skips missing ones', async () => {
    await writeFile(join(dir, 'one.txt'), 'abc');
    const skipped: string[] = [];

    const files = await readUploadFiles(
      [join(dir, 'one.txt'), join(dir, 'missing.txt')],
      (path) => skipped.push(path)
    );

    expect(files.map((f) => f.filename)).toEqual(['one.txt']);
    expect(Array.from(files[0]?.content ?? [])).toEqual([97, 98, 99]);
    expect(skipped).toEqual([join(dir, 'missing.txt')]);
  });
});

describe('createCLI', () => {
  it('registers every command', () => {
    const names = createCLI().commands.map((c) => c.name());
    expect(names).toEqual(['config', 'submit', 'workers', 'register', 'deregister']);
  });
});
