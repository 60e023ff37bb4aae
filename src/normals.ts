import * as THREE from 'three';
import type { DistanceField } from './sdf';
import { HIT_EPSILON, type NormalEstimator } from './tracer';

export const NORMAL_EPSILON = 1e-5;
// Distance to back off along the incoming ray before differencing
export const NORMAL_BACKSTEP = HIT_EPSILON;

export type NormalMethod = 'backward' | 'central';

/**
 * One-sided difference f(p) - f(p - eps * axis). Three extra evaluations.
 */
export function backwardDifferenceNormal(field: DistanceField, p: THREE.Vector3): THREE.Vector3 {
  const d = field.evaluate(p);
  const q = new THREE.Vector3();
  return new THREE.Vector3(
    d - field.evaluate(q.set(p.x - NORMAL_EPSILON, p.y, p.z)),
    d - field.evaluate(q.set(p.x, p.y - NORMAL_EPSILON, p.z)),
    d - field.evaluate(q.set(p.x, p.y, p.z - NORMAL_EPSILON))
  ).normalize();
}

/**
 * Symmetric difference f(p + eps * axis) - f(p - eps * axis). Six evaluations.
 */
export function centralDifferenceNormal(field: DistanceField, p: THREE.Vector3): THREE.Vector3 {
  const q = new THREE.Vector3();
  const e = NORMAL_EPSILON;
  const axis = (dx: number, dy: number, dz: number) =>
    field.evaluate(q.set(p.x + dx, p.y + dy, p.z + dz)) - field.evaluate(q.set(p.x - dx, p.y - dy, p.z - dz));
  return new THREE.Vector3(axis(e, 0, 0), axis(0, e, 0), axis(0, 0, e)).normalize();
}

export function createNormalEstimator(method: NormalMethod): NormalEstimator {
  switch (method) {
    case 'backward':
      return (field, position, direction) =>
        backwardDifferenceNormal(
          field,
          position.clone().addScaledVector(direction, -NORMAL_BACKSTEP)
        );
    case 'central':
      return (field, position) => centralDifferenceNormal(field, position);
  }
}
