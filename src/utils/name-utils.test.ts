import * as path from 'path';
import { describe, expect, it } from 'vitest';
import { deriveMaterialName } from './name-utils';

const ROOT = path.join(path.sep, 'assets');

describe('deriveMaterialName', () => {
  it('strips the textures segment and adds the global prefix', () => {
    expect(deriveMaterialName(path.join(ROOT, 'textures', 'rock', '01'), ROOT)).toBe('/global/rock/01');
  });

  it('strips object and skeleton segments', () => {
    expect(deriveMaterialName(path.join(ROOT, '3d_objects', 'props', 'crate'), ROOT)).toBe('/global/props/crate');
    expect(deriveMaterialName(path.join(ROOT, 'characters', '3d_skeletons', 'human'), ROOT)).toBe('/global/characters/human');
  });

  it('removes every occurrence, not only whole segments', () => {
    expect(deriveMaterialName(path.join(ROOT, 'mytextures', 'wall'), ROOT)).toBe('/global/mywall');
    expect(deriveMaterialName(path.join(ROOT, 'textures', 'old', 'textures', 'brick'), ROOT)).toBe('/global/old/brick');
  });

  it('keeps a trailing segment that has no slash after it', () => {
    expect(deriveMaterialName(path.join(ROOT, 'terrain', 'textures'), ROOT)).toBe('/global/terrain/textures');
  });

  it('names the root directory itself', () => {
    expect(deriveMaterialName(ROOT, ROOT)).toBe('/global/.');
  });

  it('yields the same name for the same directory', () => {
    const directory = path.join(ROOT, '3d_objects', 'items', 'sword');
    expect(deriveMaterialName(directory, ROOT)).toBe(deriveMaterialName(directory, ROOT));
  });
});
