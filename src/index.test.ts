import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { defineConfig, LogLevel, MaterialConfigError, MaterialManager } from './index';
import { createAssetTree, RGB_PNG, RGBA_PNG, type AssetTree } from './testing/asset-tree';

describe('MaterialManager', () => {
  let tree: AssetTree;

  const manager = () => defineConfig({ rootDir: tree.root, workingDir: tree.root, logLevel: LogLevel.WARN });

  beforeEach(() => {
    tree = createAssetTree();
    vi.spyOn(console, 'log').mockImplementation(() => undefined);

    tree.write('textures/rock/01/D.png', RGBA_PNG);
    tree.write('textures/rock/01/N.png', '');
    tree.write('textures/rock/02/N.png', '');
    tree.write('3d_objects/crate/D.png', RGB_PNG);
    tree.write('3d_objects/crate/S.png', '');
  });

  afterEach(() => {
    tree.cleanup();
    vi.restoreAllMocks();
  });

  it('lists asset directories with their material file and name', () => {
    expect(manager().scan()).toEqual([
      {
        directory: path.join(tree.root, '3d_objects', 'crate'),
        materialFile: path.join(tree.root, '3d_objects', 'crate', 'ogre.material'),
        materialName: '/global/crate',
      },
      {
        directory: path.join(tree.root, 'textures', 'rock', '01'),
        materialFile: path.join(tree.root, 'textures', 'rock', '01', 'ogre.material'),
        materialName: '/global/rock/01',
      },
    ]);
  });

  it('prints missing material files', () => {
    tree.write('3d_objects/crate/ogre.material', 'material /global/crate : /base/simple');
    const rockMaterial = path.join(tree.root, 'textures', 'rock', '01', 'ogre.material');

    const report = manager().run('find-missing');

    expect(report).toEqual({ mode: 'find-missing', directories: 2, reported: [rockMaterial], generated: [] });
    expect(vi.mocked(console.log).mock.calls).toEqual([[rockMaterial]]);
  });

  it('creates missing material files and leaves them alone afterwards', () => {
    const first = manager().run('create-missing');

    expect(first.generated).toEqual([
      path.join(tree.root, '3d_objects', 'crate', 'ogre.material'),
      path.join(tree.root, 'textures', 'rock', '01', 'ogre.material'),
    ]);
    expect(tree.read('textures/rock/01/ogre.material')).toBe([
      'import * from "resources/ogre/scripts/materials/base.material"',
      'import * from "resources/ogre/scripts/programs/DepthShadowmap.material"',
      'material /global/rock/01/shadowcaster : Ogre/DepthShadowmap/Caster/Float',
      '{',
      '    set_texture_alias DiffuseMap textures/rock/01/D.png',
      '}',
      'material /global/rock/01 : /base/normalmap/nonculled/alpharejected',
      '{',
      '    set_texture_alias DiffuseMap textures/rock/01/D.png',
      '    set $shadow_caster_material /global/rock/01/shadowcaster',
      '    set_texture_alias NormalHeightMap textures/rock/01/N.png',
      '}',
    ].join('\n'));
    expect(tree.read('3d_objects/crate/ogre.material')).toBe([
      'import * from "resources/ogre/scripts/materials/base.material"',
      'material /global/crate : /base/simple',
      '{',
      '    set_texture_alias DiffuseMap 3d_objects/crate/D.png',
      '    set_texture_alias SpecularMap 3d_objects/crate/S.png',
      '}',
    ].join('\n'));
    expect(tree.exists('textures/rock/02/ogre.material')).toBe(false);

    tree.write('3d_objects/crate/ogre.material', 'edited');
    const second = manager().run('create-missing');

    expect(second.generated).toEqual([]);
    expect(tree.read('3d_objects/crate/ogre.material')).toBe('edited');
    expect(console.log).not.toHaveBeenCalled();
  });

  it('regenerates every material file on refresh', () => {
    tree.write('3d_objects/crate/ogre.material', 'stale');

    const report = manager().run('refresh');

    expect(report.generated).toHaveLength(2);
    expect(tree.read('3d_objects/crate/ogre.material')).toContain('material /global/crate : /base/simple');
  });

  it('prints material files missing their material name', () => {
    tree.write('3d_objects/crate/ogre.material', 'material /global/barrel : /base/simple');
    tree.write('textures/rock/01/ogre.material', 'material /global/rock/01 : /base/simple');
    const crateMaterial = path.join(tree.root, '3d_objects', 'crate', 'ogre.material');

    const report = manager().run('find-invalid');

    expect(report.reported).toEqual([crateMaterial]);
    expect(vi.mocked(console.log).mock.calls).toEqual([[crateMaterial]]);
  });

  it('rejects an unknown mode', () => {
    expect(() => manager().run('delete-all')).toThrow(MaterialConfigError);
    try {
      manager().run('delete-all');
    } catch (error) {
      expect(error).toBeInstanceOf(MaterialConfigError);
      if (error instanceof MaterialConfigError) {
        expect(error.configKey).toBe('mode');
        expect(error.message).toBe('Invalid mode: delete-all');
      }
    }
  });

  it('rejects a material file name containing a path separator', () => {
    expect(() => new MaterialManager({ materialFileName: 'sub/ogre.material' })).toThrow(MaterialConfigError);
    try {
      new MaterialManager({ materialFileName: 'sub/ogre.material' });
    } catch (error) {
      expect(error).toBeInstanceOf(MaterialConfigError);
      if (error instanceof MaterialConfigError) {
        expect(error.getFormattedErrors()).toEqual([
          'materialFileName: Material file name must not contain path separators',
        ]);
      }
    }
  });

  it.each(['.', '..'])('rejects %s as material file name', (materialFileName) => {
    expect(() => new MaterialManager({ materialFileName })).toThrow(MaterialConfigError);
  });

  it('writes to a configured material file name', () => {
    const custom = defineConfig({
      rootDir: tree.root,
      workingDir: tree.root,
      materialFileName: 'generated.material',
      logLevel: LogLevel.WARN,
    });

    custom.run('create-missing');

    expect(tree.exists('3d_objects/crate/generated.material')).toBe(true);
    expect(tree.exists('3d_objects/crate/ogre.material')).toBe(false);
  });

  it('defaults to the current directory', () => {
    expect(new MaterialManager().getConfig()).toEqual({
      rootDir: process.cwd(),
      workingDir: process.cwd(),
      materialFileName: 'ogre.material',
      logLevel: LogLevel.INFO,
    });
  });
});
