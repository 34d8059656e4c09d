/**
 * Archiver Tests
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync } from 'node:fs';
import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import * as tar from 'tar';
import { ArchiveError } from '@apppack/shared';
import { createArchive } from './archiver.js';

describe('createArchive', () => {
  let distDir: string;

  beforeEach(async () => {
    distDir = await mkdtemp(join(tmpdir(), 'apppack-archive-'));
    await mkdir(join(distDir, 'App.app', 'Contents', 'MacOS'), { recursive: true });
    await writeFile(join(distDir, 'App.app', 'Contents', 'Info.plist'), '<plist/>');
    await writeFile(join(distDir, 'App.app', 'Contents', 'MacOS', 'App'), '#!/bin/sh\n');
  });

  afterEach(async () => {
    await rm(distDir, { recursive: true, force: true });
  });

  it('should write a .tar.gz next to the bundle', async () => {
    const archivePath = await createArchive(join(distDir, 'App.app'));

    expect(archivePath).toBe(join(distDir, 'App.app.tar.gz'));
    expect(existsSync(archivePath)).toBe(true);
  });

  it('should root archive entries at the bundle directory', async () => {
    const archivePath = await createArchive(join(distDir, 'App.app'));
    const entries: string[] = [];

    await tar.list({
      file: archivePath,
      onReadEntry: (entry) => {
        entries.push(entry.path);
      },
    });

    expect(entries.sort()).toEqual([
      'App.app/',
      'App.app/Contents/',
      'App.app/Contents/Info.plist',
      'App.app/Contents/MacOS/',
      'App.app/Contents/MacOS/App',
    ]);
  });

  it('should raise ArchiveError when the bundle is missing', async () => {
    await expect(createArchive(join(distDir, 'Missing.app'))).rejects.toBeInstanceOf(ArchiveError);
    expect(existsSync(join(distDir, 'Missing.app.tar.gz'))).toBe(false);
  });
});
