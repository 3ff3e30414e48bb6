import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, mkdirSync, rmSync, realpathSync, symlinkSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { ProjectRegistry, canonicalizePath } from '../../../src/storage/registry.js';
import { RegistryError, RegistryErrorCode, isProjectNotFound } from '../../../src/storage/types.js';

describe('ProjectRegistry', () => {
  let registry: ProjectRegistry;
  let tempDir: string;
  let projectDir: string;

  beforeEach(() => {
    tempDir = realpathSync(mkdtempSync(join(tmpdir(), 'fathom-registry-')));
    projectDir = join(tempDir, 'demo');
    mkdirSync(projectDir);
    registry = ProjectRegistry.create(join(tempDir, 'registry.db'));
  });

  afterEach(() => {
    registry.close();
    rmSync(tempDir, { recursive: true, force: true });
  });

  describe('register', () => {
    it('should register a project and resolve it by name', () => {
      const id = registry.register('demo', projectDir);

      expect(id).toBeGreaterThan(0);
      expect(registry.resolve('demo')).toBe(projectDir);
      expect(registry.get('demo').lastIndexedAt).toBeNull();
    });

    it('should store the canonical path', () => {
      registry.register('demo', join(projectDir, '..', 'demo') + '/');

      expect(registry.resolve('demo')).toBe(projectDir);
    });

    it('should resolve symlinks', () => {
      const link = join(tempDir, 'link');
      symlinkSync(projectDir, link);

      registry.register('linked', link);

      expect(registry.resolve('linked')).toBe(projectDir);
    });

    it('should reject a duplicate name and keep the first path', () => {
      const other = join(tempDir, 'other');
      mkdirSync(other);
      registry.register('demo', projectDir);

      let caught: unknown;
      try {
        registry.register('demo', other);
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(RegistryError);
      expect(caught instanceof RegistryError ? caught.code : null).toBe(
        RegistryErrorCode.DUPLICATE_NAME
      );
      expect(registry.resolve('demo')).toBe(projectDir);
      expect(registry.list()).toHaveLength(1);
    });

    it('should allow two names for the same path', () => {
      registry.register('a', projectDir);
      registry.register('b', projectDir);

      expect(registry.list().map((p) => p.name)).toEqual(['a', 'b']);
    });
  });

  describe('lookup', () => {
    it('should return null from find for an unknown name', () => {
      expect(registry.find('missing')).toBeNull();
    });

    it('should throw PROJECT_NOT_FOUND from resolve for an unknown name', () => {
      let caught: unknown;
      try {
        registry.resolve('missing');
      } catch (error) {
        caught = error;
      }

      expect(isProjectNotFound(caught)).toBe(true);
    });

    it('should list projects sorted by name', () => {
      registry.register('zeta', projectDir);
      registry.register('alpha', projectDir);

      expect(registry.list().map((p) => p.name)).toEqual(['alpha', 'zeta']);
    });
  });

  describe('touch', () => {
    it('should record the last indexing time', () => {
      registry.register('demo', projectDir);
      const at = new Date('2024-05-01T10:00:00.000Z');

      registry.touch('demo', at);

      expect(registry.get('demo').lastIndexedAt).toBe('2024-05-01T10:00:00.000Z');
    });

    it('should throw for an unknown project', () => {
      expect(() => registry.touch('missing')).toThrow(RegistryError);
    });
  });

  describe('remove', () => {
    it('should remove a project', () => {
      registry.register('demo', projectDir);

      expect(registry.remove('demo')).toBe(true);
      expect(registry.find('demo')).toBeNull();
    });

    it('should not fail for an unknown project', () => {
      expect(registry.remove('missing')).toBe(false);
    });
  });

  it('should persist across reopen', () => {
    registry.register('demo', projectDir);
    registry.close();

    registry = ProjectRegistry.create(join(tempDir, 'registry.db'));

    expect(registry.resolve('demo')).toBe(projectDir);
  });
});

describe('canonicalizePath', () => {
  it('should keep a non-existent path absolute', () => {
    expect(canonicalizePath('/no/such/dir/')).toBe('/no/such/dir');
  });
});
