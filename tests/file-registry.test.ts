import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import path from 'node:path';
import os from 'node:os';
import { heldBackPackages, heldBackBy } from '../src/index.js';
import { FileSystemStorage } from '../src/registry/storage.js';
import { locateRegistries } from '../src/registry/registry-locator.js';
import { loadBundledStdlibs, loadStdlibsFromDirectory } from '../src/compat/stdlib.js';
import { ConfigError } from '../src/utils/errors.js';
import { writeRegistry, uuidFor, live } from './helpers/registry-fixture.js';

// ---------------------------------------------------------------------------
// Helpers: temporary directory management
// ---------------------------------------------------------------------------

let tmpDir: string;

function writeFile(filePath: string, content: string): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, content, 'utf-8');
}

beforeEach(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'holdback-test-'));
});

afterEach(() => {
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

// ---------------------------------------------------------------------------
// FileSystemStorage
// ---------------------------------------------------------------------------

describe('FileSystemStorage', () => {
  it('returns null for a missing file and [] for a missing directory', () => {
    const storage = new FileSystemStorage();
    expect(storage.readFile(path.join(tmpDir, 'nope.toml'))).toBeNull();
    expect(storage.listDirectories(path.join(tmpDir, 'nope'))).toEqual([]);
  });

  it('lists only subdirectories', () => {
    writeFile(path.join(tmpDir, 'one', 'a.txt'), 'x');
    writeFile(path.join(tmpDir, 'file.txt'), 'x');
    expect(new FileSystemStorage().listDirectories(tmpDir)).toEqual(['one']);
  });
});

// ---------------------------------------------------------------------------
// Registry discovery in depots
// ---------------------------------------------------------------------------

describe('locateRegistries', () => {
  it('returns registries holding a manifest, in depot then name order', () => {
    const depotA = path.join(tmpDir, 'depotA');
    const depotB = path.join(tmpDir, 'depotB');
    writeRegistry(writeFile, path.join(depotA, 'registries', 'General'), []);
    writeRegistry(writeFile, path.join(depotA, 'registries', 'Alpha'), []);
    writeFile(path.join(depotA, 'registries', 'Stale', 'README.md'), 'not a registry');
    writeRegistry(writeFile, path.join(depotB, 'registries', 'Local'), []);

    expect(locateRegistries([depotA, depotB, path.join(tmpDir, 'missing')], new FileSystemStorage())).toEqual([
      path.join(depotA, 'registries', 'Alpha'),
      path.join(depotA, 'registries', 'General'),
      path.join(depotB, 'registries', 'Local'),
    ]);
  });
});

// ---------------------------------------------------------------------------
// End to end over the file system
// ---------------------------------------------------------------------------

describe('heldBackPackages on disk', () => {
  it('finds registries through JULIA_DEPOT_PATH and reports held-back packages', () => {
    writeRegistry(writeFile, path.join(tmpDir, 'registries', 'General'), [
      {
        uuid: uuidFor(1),
        name: 'Plots',
        versions: live('1.0.0'),
        deps: { '1': { Colors: uuidFor(2), LinearAlgebra: uuidFor(50) } },
        compat: { '1': { Colors: '0.11', LinearAlgebra: '0.1' } },
      },
      { uuid: uuidFor(2), name: 'Colors', versions: live('0.11.2', '0.12.0') },
    ]);
    const env = { JULIA_DEPOT_PATH: tmpDir };

    const holdMap = heldBackPackages({ env });

    expect([...holdMap.keys()]).toEqual(['Plots']);
    expect(holdMap.get('Plots')?.map((entry) => `${entry.name}@${entry.lastVersion.version}`)).toEqual([
      'Colors@0.12.0',
    ]);
    expect(heldBackBy('Colors', undefined, { env })).toEqual(['Plots']);
    // A prospective version below the latest release does not lower the maximum
    expect(heldBackBy('Colors', '0.11.9', { env })).toEqual(['Plots']);
  });

  it('prefers HOLDBACK_REGISTRIES over depot discovery', () => {
    const explicit = path.join(tmpDir, 'explicit');
    writeRegistry(writeFile, explicit, [
      {
        uuid: uuidFor(1),
        name: 'Holder',
        versions: live('1.0.0'),
        deps: { '1': { Dep: uuidFor(2) } },
        compat: { '1': { Dep: '1' } },
      },
      { uuid: uuidFor(2), name: 'Dep', versions: live('2.0.0') },
    ]);

    const holdMap = heldBackPackages({ env: { HOLDBACK_REGISTRIES: explicit, JULIA_DEPOT_PATH: tmpDir } });

    expect([...holdMap.keys()]).toEqual(['Holder']);
  });
});

// ---------------------------------------------------------------------------
// Standard-library names
// ---------------------------------------------------------------------------

describe('stdlib names', () => {
  it('ships a bundled list', () => {
    const stdlibs = loadBundledStdlibs();
    expect(stdlibs.has('LinearAlgebra')).toBe(true);
    expect(stdlibs.has('Pkg')).toBe(true);
    expect(stdlibs.has('Colors')).toBe(false);
  });

  it('reads module directories from a stdlib directory', () => {
    fs.mkdirSync(path.join(tmpDir, 'Dates'));
    fs.mkdirSync(path.join(tmpDir, 'Printf'));
    writeFile(path.join(tmpDir, 'VERSION'), '1.10');
    expect([...loadStdlibsFromDirectory(tmpDir)].sort()).toEqual(['Dates', 'Printf']);
  });

  it('fails on a missing stdlib directory', () => {
    expect(() => loadStdlibsFromDirectory(path.join(tmpDir, 'missing'))).toThrow(ConfigError);
  });
});
