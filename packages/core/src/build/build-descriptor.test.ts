/**
 * Build Descriptor Tests
 */
import { describe, it, expect, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ConfigurationError } from '@apppack/shared';
import { loadBuildDescriptor, parseBuildDescriptor, resolveBundleName } from './build-descriptor.js';
import { SETUP_PY } from '../../../../tests/mocks/fake-toolchain.js';

const PY2APP_DESCRIPTOR = `"""
This is a setup.py script generated by py2applet

Usage:
    python setup.py py2app
"""

from setuptools import setup

APP = ['main.py']
DATA_FILES = []

Plist = dict(
    CFBundleDocumentTypes=[
        dict(
            CFBundleTypeExtensions=['png'],
            CFBundleTypeName='PNG image',
            CFBundleTypeRole='Viewer',
            ),
        ]
    )

OPTIONS = {
    # 'iconfile': 'old/Old.icns',
    'iconfile': 'Viewer/Viewer.icns',
    'plist': Plist,
}

setup(
    name='PhotoViewer',
    app=APP,
    data_files=DATA_FILES,
    options={'py2app': OPTIONS},
    setup_requires=['py2app'],
    version='1.4.1',
)
`;

describe('parseBuildDescriptor', () => {
  it('should read name, version, entry points and icon', () => {
    const descriptor = parseBuildDescriptor(PY2APP_DESCRIPTOR, '/project/setup.py');

    expect(descriptor).toEqual({
      path: '/project/setup.py',
      name: 'PhotoViewer',
      version: '1.4.1',
      entryPoints: ['main.py'],
      iconFile: 'Viewer/Viewer.icns',
    });
  });

  it('should not mistake plist keys for the setup name', () => {
    const descriptor = parseBuildDescriptor(PY2APP_DESCRIPTOR, 'setup.py');

    expect(descriptor.name).toBe('PhotoViewer');
  });

  it('should follow a variable passed as the name', () => {
    const source = `from setuptools import setup
APP_NAME = "Notes"
setup(name=APP_NAME, app=["notes.py", "helpers.py"], version="0.3")
`;

    const descriptor = parseBuildDescriptor(source, 'setup.py');

    expect(descriptor.name).toBe('Notes');
    expect(descriptor.entryPoints).toEqual(['notes.py', 'helpers.py']);
    expect(descriptor.version).toBe('0.3');
  });

  it('should leave missing fields undefined', () => {
    const descriptor = parseBuildDescriptor('from setuptools import setup\nsetup()\n', 'setup.py');

    expect(descriptor.name).toBeUndefined();
    expect(descriptor.version).toBeUndefined();
    expect(descriptor.entryPoints).toEqual([]);
    expect(descriptor.iconFile).toBeUndefined();
  });

  it('should handle a file without a setup call', () => {
    const descriptor = parseBuildDescriptor('print("not a descriptor")\n', 'setup.py');

    expect(descriptor.name).toBeUndefined();
  });
});

describe('loadBuildDescriptor', () => {
  let dir: string | undefined;

  afterEach(async () => {
    if (dir) await rm(dir, { recursive: true, force: true });
    dir = undefined;
  });

  it('should load the descriptor from disk', async () => {
    dir = await mkdtemp(join(tmpdir(), 'apppack-descriptor-'));
    const path = join(dir, 'setup.py');
    await writeFile(path, SETUP_PY);

    const descriptor = await loadBuildDescriptor(path);

    expect(descriptor.name).toBe('App');
    expect(descriptor.version).toBe('2.0.1');
    expect(descriptor.iconFile).toBe('icons/App.icns');
  });

  it('should raise a configuration error for a missing file', async () => {
    await expect(loadBuildDescriptor('/nonexistent/apppack/setup.py')).rejects.toBeInstanceOf(
      ConfigurationError
    );
  });
});

describe('resolveBundleName', () => {
  const descriptor = { path: 'setup.py', name: 'PhotoViewer', entryPoints: [] };

  it('should derive the bundle name from the descriptor name', () => {
    expect(resolveBundleName(descriptor)).toBe('PhotoViewer.app');
  });

  it('should prefer an explicit override', () => {
    expect(resolveBundleName(descriptor, 'Custom.app')).toBe('Custom.app');
  });

  it('should fail when neither is available', () => {
    expect(() => resolveBundleName({ path: 'setup.py', entryPoints: [] })).toThrow(ConfigurationError);
  });
});
