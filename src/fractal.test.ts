import { describe, it, expect } from 'vitest';
import * as THREE from 'three';
import {
  ANIMATED_POWER_MAX,
  ANIMATED_POWER_MIN,
  animatedPower,
  mandelbulb,
  mandelbulbDistance,
  triplexPow,
  triplexPow8,
  triplexPower,
} from './fractal';

function expectVectorClose(actual: THREE.Vector3, expected: THREE.Vector3, tolerance: number) {
  expect(Math.abs(actual.x - expected.x)).toBeLessThan(tolerance);
  expect(Math.abs(actual.y - expected.y)).toBeLessThan(tolerance);
  expect(Math.abs(actual.z - expected.z)).toBeLessThan(tolerance);
}

describe('triplexPow', () => {
  it('doubles the polar angle for power 2', () => {
    const result = triplexPow(new THREE.Vector3(1, 0, 0), 2);
    expectVectorClose(result, new THREE.Vector3(0, 0, -1), 1e-12);
  });

  it('maps zero to zero', () => {
    expect(triplexPow(new THREE.Vector3(0, 0, 0), 8).toArray()).toEqual([0, 0, 0]);
  });

  it('writes into the target', () => {
    const target = new THREE.Vector3();
    const result = triplexPow(new THREE.Vector3(0, 0, 2), 3, target);
    expect(result).toBe(target);
    expect(result.z).toBeCloseTo(8, 12);
  });
});

describe('triplexPow8', () => {
  const points = [
    new THREE.Vector3(0.3, -0.5, 0.6),
    new THREE.Vector3(-0.7, 0.2, 0.4),
    new THREE.Vector3(0.1, 0.9, -0.3),
    new THREE.Vector3(-0.45, -0.45, -0.55),
    new THREE.Vector3(0.8, 0, 0),
  ];

  it('matches the trigonometric form', () => {
    for (const p of points) {
      expectVectorClose(triplexPow8(p), triplexPow(p, 8), 1e-4);
    }
  });

  it('falls back on the pole axis', () => {
    const p = new THREE.Vector3(0, 0, 0.9);
    expectVectorClose(triplexPow8(p), triplexPow(p, 8), 1e-12);
  });

  it('is picked for power 8 only', () => {
    expect(triplexPower(8)).toBe(triplexPow8);
    expect(triplexPower(7)).not.toBe(triplexPow8);
  });
});

describe('mandelbulbDistance', () => {
  it('estimates the distance outside the bulb', () => {
    expect(mandelbulbDistance(new THREE.Vector3(0, 0, 3), 8)).toBeCloseTo(1.647824, 5);
    expect(mandelbulbDistance(new THREE.Vector3(0, 0, 1.5), 8)).toBeCloseTo(0.302566, 5);
    expect(mandelbulbDistance(new THREE.Vector3(0, 1.5, 0), 8)).toBeCloseTo(0.325163, 5);
    expect(mandelbulbDistance(new THREE.Vector3(2, 0, 0), 8)).toBeCloseTo(0.692496, 5);
  });

  it('stays below the distance to the origin', () => {
    for (const z of [1.2, 1.5, 3]) {
      expect(mandelbulbDistance(new THREE.Vector3(0, 0, z), 8)).toBeLessThan(z);
    }
  });

  it('goes negative inside the set', () => {
    expect(mandelbulbDistance(new THREE.Vector3(0, 0, 0.5), 8)).toBeCloseTo(-0.162452, 5);
  });

  it('is zero at the origin', () => {
    expect(mandelbulbDistance(new THREE.Vector3(0, 0, 0), 8)).toBe(0);
  });

  it('gives the same field through mandelbulb()', () => {
    const p = new THREE.Vector3(0, 0, 1.2);
    expect(mandelbulb(8).evaluate(p)).toBeCloseTo(0.112566, 5);
  });
});

describe('animatedPower', () => {
  it('sweeps between the limits as a triangle wave', () => {
    expect(animatedPower(0)).toBe(ANIMATED_POWER_MIN);
    expect(animatedPower(5)).toBeCloseTo(6.5, 12);
    expect(animatedPower(10)).toBe(ANIMATED_POWER_MAX);
    expect(animatedPower(15)).toBeCloseTo(6.5, 12);
    expect(animatedPower(20)).toBe(ANIMATED_POWER_MIN);
  });

  it('is symmetric around zero', () => {
    expect(animatedPower(-5)).toBeCloseTo(6.5, 12);
  });
});
