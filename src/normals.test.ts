import { describe, it, expect } from 'vitest';
import * as THREE from 'three';
import { NORMAL_BACKSTEP, backwardDifferenceNormal, centralDifferenceNormal, createNormalEstimator } from './normals';
import { type DistanceField, sphere } from './sdf';

describe('normal estimation', () => {
  const unit = sphere(1);
  const diagonal = new THREE.Vector3(1, 1, 0).normalize();

  it('points away from the sphere with backward differences', () => {
    const n = backwardDifferenceNormal(unit, diagonal);
    expect(n.distanceTo(diagonal)).toBeLessThan(1e-4);
    expect(n.length()).toBeCloseTo(1, 12);
  });

  it('points away from the sphere with central differences', () => {
    const n = centralDifferenceNormal(unit, diagonal);
    expect(n.distanceTo(diagonal)).toBeLessThan(1e-6);
  });

  it('backs off along the ray before differencing', () => {
    const queries: THREE.Vector3[] = [];
    const recording: DistanceField = {
      evaluate: (p) => {
        queries.push(p.clone());
        return unit.evaluate(p);
      },
    };
    const estimate = createNormalEstimator('backward');
    estimate(recording, new THREE.Vector3(0, 0, 1), new THREE.Vector3(0, 0, -1));
    expect(queries).toHaveLength(4);
    expect(queries[0].z).toBeCloseTo(1 + NORMAL_BACKSTEP, 12);
  });

  it('evaluates the field six times for central differences', () => {
    let count = 0;
    const counting: DistanceField = {
      evaluate: (p) => {
        count++;
        return unit.evaluate(p);
      },
    };
    createNormalEstimator('central')(counting, new THREE.Vector3(0, 1, 0), new THREE.Vector3(0, -1, 0));
    expect(count).toBe(6);
  });
});
