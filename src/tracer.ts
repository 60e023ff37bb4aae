import * as THREE from 'three';
import type { Ray } from './camera';
import type { DistanceField } from './sdf';

export const MAX_MARCH_STEPS = 128;
export const HIT_EPSILON = 0.001;

export type MarchResult =
  | {
      kind: 'hit';
      position: THREE.Vector3;
      t: number;
      steps: number;
      // 1 for an immediate hit, falling towards 0 as the step cap is approached
      stepGradient: number;
    }
  | { kind: 'miss' };

export type HitResult =
  | {
      kind: 'hit';
      position: THREE.Vector3;
      normal: THREE.Vector3;
      t: number;
      steps: number;
      stepGradient: number;
    }
  | { kind: 'miss' };

export type NormalEstimator = (field: DistanceField, position: THREE.Vector3, direction: THREE.Vector3) => THREE.Vector3;

const MISS: MarchResult = { kind: 'miss' };

/**
 * Ray against a sphere of `radius` around the origin.
 * Returns [entry, exit] distances along the ray, or null when the line misses
 * the sphere or the sphere lies entirely behind the ray origin.
 */
export function intersectBoundingSphere(ray: Ray, radius: number): [number, number] | null {
  const b = ray.origin.dot(ray.direction);
  const c = ray.origin.lengthSq() - radius * radius;
  const discriminant = b * b - c;
  if (discriminant < 0) return null;
  const root = Math.sqrt(discriminant);
  const exit = -b + root;
  if (exit < 0) return null;
  return [Math.max(-b - root, 0), exit];
}

/**
 * Sphere tracing. The bounding sphere limits both where marching starts and
 * how far it may go; a hit needs the field to drop below HIT_EPSILON within
 * MAX_MARCH_STEPS evaluations.
 */
export function sphereTrace(ray: Ray, field: DistanceField, boundingRadius: number): MarchResult {
  const bounds = intersectBoundingSphere(ray, boundingRadius);
  if (!bounds) return MISS;

  let t = bounds[0];
  const exit = bounds[1];
  const position = new THREE.Vector3();

  for (let steps = 0; steps < MAX_MARCH_STEPS; steps++) {
    const d = field.evaluate(position.copy(ray.direction).multiplyScalar(t).add(ray.origin));
    t += d;
    if (t > exit) return MISS;
    if (d < HIT_EPSILON) {
      return {
        kind: 'hit',
        position: position.copy(ray.direction).multiplyScalar(t).add(ray.origin),
        t,
        steps,
        stepGradient: 1 - steps / MAX_MARCH_STEPS,
      };
    }
  }

  return MISS;
}

export function intersect(
  ray: Ray,
  field: DistanceField,
  boundingRadius: number,
  estimateNormal: NormalEstimator
): HitResult {
  const march = sphereTrace(ray, field, boundingRadius);
  if (march.kind === 'miss') return march;
  return {
    ...march,
    normal: estimateNormal(field, march.position, ray.direction),
  };
}
