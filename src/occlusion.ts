import * as THREE from 'three';
import type { DistanceField } from './sdf';

export interface OcclusionSample {
  weight: number;
  delta: number;
}

export interface OcclusionParams {
  kind: 'primary' | 'alternate';
  samples: readonly OcclusionSample[];
  // Maps the summed sample contributions to a visibility factor
  remap: (contribution: number) => number;
}

export type OcclusionMethod = 'distance' | 'step-count';

function clamp01(x: number): number {
  return Math.min(Math.max(x, 0), 1);
}

// Empirically tuned for fine fractal detail
export const PRIMARY_OCCLUSION: OcclusionParams = {
  kind: 'primary',
  samples: [
    { weight: 0.5, delta: 0.016 },
    { weight: 0.25, delta: 0.081 },
  ],
  remap: (contribution) => {
    let occl = 1 - contribution;
    occl = (occl - 0.29) * 3.5;
    occl = occl * occl;
    return clamp01(occl);
  },
};

export const ALTERNATE_OCCLUSION: OcclusionParams = {
  kind: 'alternate',
  samples: [
    { weight: 0.1, delta: 0.1 },
    { weight: 0.2, delta: 0.2 },
    { weight: 0.125, delta: 0.4 },
    { weight: 0.0625, delta: 0.5 },
  ],
  remap: (contribution) => clamp01(1 - contribution),
};

/**
 * Compares the field along the normal with the distance actually travelled.
 * Returns a visibility factor in [0, 1], 1 meaning unoccluded.
 */
export function ambientOcclusion(
  field: DistanceField,
  position: THREE.Vector3,
  normal: THREE.Vector3,
  params: OcclusionParams
): number {
  const q = new THREE.Vector3();
  let contribution = 0;
  for (const { weight, delta } of params.samples) {
    const d = field.evaluate(q.copy(normal).multiplyScalar(delta).add(position));
    contribution += weight * clamp01(1 - d / delta);
  }
  return params.remap(contribution);
}
