import { describe, it, expect } from 'vitest';
import * as THREE from 'three';
import { type EnvironmentMaps, UniformEnvironment } from './environment';
import {
  DEFAULT_MATERIAL,
  EXPOSURE,
  fresnelConductor,
  gammaEncode,
  normFactor,
  reflect,
  shadeHit,
  shadeMiss,
} from './shading';

function uniformMaps(color: THREE.Color): EnvironmentMaps {
  const env = new UniformEnvironment(color);
  return { reflection: env, cos1: env, cos8: env, cos64: env, cos512: env };
}

describe('fresnelConductor', () => {
  it('matches the conductor reflectance at normal incidence', () => {
    expect(fresnelConductor(1, 0.2, 3)).toBeCloseTo(0.923372, 6);
  });

  it('reflects everything at grazing incidence', () => {
    expect(fresnelConductor(0, 0.2, 3)).toBe(1);
  });

  it('reduces to the dielectric value without absorption', () => {
    expect(fresnelConductor(1, 1.5, 0)).toBeCloseTo(0.04, 12);
  });

  it('clamps the cosine', () => {
    expect(fresnelConductor(-0.5, 0.2, 3)).toBe(fresnelConductor(0, 0.2, 3));
    expect(fresnelConductor(1.5, 0.2, 3)).toBe(fresnelConductor(1, 0.2, 3));
  });
});

describe('shading helpers', () => {
  it('normalizes a Phong lobe', () => {
    expect(normFactor(8)).toBe(5);
  });

  it('mirrors a direction about the normal', () => {
    const r = reflect(new THREE.Vector3(1, -1, 0), new THREE.Vector3(0, 1, 0));
    expect(r.toArray()).toEqual([1, 1, 0]);
  });

  it('gamma encodes each channel and drops negatives', () => {
    const c = gammaEncode(new THREE.Color(0.25, 0, -1), 2);
    expect(c.r).toBeCloseTo(0.5, 12);
    expect(c.g).toBe(0);
    expect(c.b).toBe(0);
  });
});

describe('shadeHit', () => {
  const maps = uniformMaps(new THREE.Color(0.5, 0.5, 0.5));
  const direction = new THREE.Vector3(0, 0, -1);
  const normal = new THREE.Vector3(0, 0, 1);

  it('combines diffuse, specular and mirror terms', () => {
    const color = shadeHit(direction, normal, 1, maps, DEFAULT_MATERIAL);
    expect(color.r).toBeCloseTo(0.638277, 6);
    expect(color.g).toBeCloseTo(0.573097, 6);
    expect(color.b).toBeCloseTo(0.45817, 6);
  });

  it('scales linearly with occlusion', () => {
    const lit = shadeHit(direction, normal, 1, maps, DEFAULT_MATERIAL);
    const half = shadeHit(direction, normal, 0.5, maps, DEFAULT_MATERIAL);
    expect(half.r).toBeCloseTo(lit.r / 2, 12);
    expect(shadeHit(direction, normal, 0, maps, DEFAULT_MATERIAL).g).toBe(0);
  });

  it('keeps only the diffuse term without specular weight', () => {
    const material = { ...DEFAULT_MATERIAL, specularWeight: 0 };
    const color = shadeHit(direction, normal, 1, maps, material);
    expect(color.r).toBeCloseTo(0.5 * 0.8 * 0.25 * EXPOSURE, 12);
  });
});

describe('shadeMiss', () => {
  it('shows the reflection map', () => {
    const color = shadeMiss(new THREE.Vector3(0, 1, 0), uniformMaps(new THREE.Color(0.1, 0.2, 0.3)));
    expect(color.toArray()).toEqual([0.1, 0.2, 0.3]);
  });
});
