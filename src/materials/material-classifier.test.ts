import { describe, expect, it } from 'vitest';
import { classifyParentMaterial } from './material-classifier';

describe('classifyParentMaterial', () => {
  it.each<[boolean, boolean, boolean, string]>([
    [true, true, false, '/base/normalmap/specular'],
    [true, false, false, '/base/normalmap'],
    [false, true, false, '/base/simple'],
    [false, false, false, '/base/simple'],
    [true, true, true, '/base/normalmap/specular/nonculled/alpharejected'],
    [true, false, true, '/base/normalmap/nonculled/alpharejected'],
    [false, true, true, '/base/simple/nonculled/alpharejected'],
    [false, false, true, '/base/simple/nonculled/alpharejected'],
  ])('normal=%s specular=%s alpha=%s -> %s', (hasNormalMap, hasSpecularMap, hasAlphaDiffuseMap, expected) => {
    expect(classifyParentMaterial({ hasNormalMap, hasSpecularMap, hasAlphaDiffuseMap })).toBe(expected);
  });
});
