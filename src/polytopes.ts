import * as THREE from 'three';
import type { DistanceField } from './sdf';

const PHI = (1 + Math.sqrt(5)) / 2;

function unit(x: number, y: number, z: number): THREE.Vector3 {
  return new THREE.Vector3(x, y, z).normalize();
}

/**
 * Face normal directions of the generalized distance function family.
 * Each entry stands for the pair of opposite faces +n / -n.
 */
export const POLYTOPE_NORMALS: readonly THREE.Vector3[] = Object.freeze([
  // cube
  unit(1, 0, 0),
  unit(0, 1, 0),
  unit(0, 0, 1),
  // octahedron
  unit(1, 1, 1),
  unit(-1, 1, 1),
  unit(1, -1, 1),
  unit(1, 1, -1),
  // icosahedron (with the octahedron set)
  unit(0, 1, PHI + 1),
  unit(0, -1, PHI + 1),
  unit(PHI + 1, 0, 1),
  unit(-PHI - 1, 0, 1),
  unit(1, PHI + 1, 0),
  unit(-1, PHI + 1, 0),
  // dodecahedron
  unit(0, PHI, 1),
  unit(0, -PHI, 1),
  unit(1, 0, PHI),
  unit(-1, 0, PHI),
  unit(PHI, 1, 0),
  unit(-PHI, 1, 0),
]);

export type PolytopeFamily =
  | 'cube'
  | 'octahedron'
  | 'icosahedron'
  | 'dodecahedron'
  | 'truncatedOctahedron'
  | 'truncatedIcosahedron';

// Inclusive index ranges into POLYTOPE_NORMALS
export const POLYTOPE_RANGES: Readonly<Record<PolytopeFamily, readonly [number, number]>> = {
  cube: [0, 2],
  octahedron: [3, 6],
  icosahedron: [3, 12],
  dodecahedron: [13, 18],
  truncatedOctahedron: [0, 6],
  truncatedIcosahedron: [3, 18],
};

export function polytopeNormals(family: PolytopeFamily): THREE.Vector3[] {
  const [begin, end] = POLYTOPE_RANGES[family];
  return POLYTOPE_NORMALS.slice(begin, end + 1);
}

/**
 * (sum |dot(p, n_i)|^e)^(1/e) - r. Larger exponents give sharper edges;
 * an infinite exponent yields the exact planar polytope via max().
 */
export function sdPolytope(
  p: THREE.Vector3,
  normals: readonly THREE.Vector3[],
  exponent: number,
  radius: number
): number {
  if (exponent === Infinity) {
    let d = 0;
    for (const n of normals) d = Math.max(d, Math.abs(p.dot(n)));
    return d - radius;
  }
  let sum = 0;
  for (const n of normals) sum += Math.pow(Math.abs(p.dot(n)), exponent);
  return Math.pow(sum, 1 / exponent) - radius;
}

export function polytope(family: PolytopeFamily, exponent: number, radius: number): DistanceField {
  const normals = polytopeNormals(family);
  return {
    evaluate: (p) => sdPolytope(p, normals, exponent, radius),
  };
}
