import * as THREE from 'three';
import type { DistanceField } from './sdf';

export const FLOATS_PER_TRIANGLE = 9;

function dot2(v: THREE.Vector3): number {
  return v.dot(v);
}

function clamp01(x: number): number {
  return Math.min(Math.max(x, 0), 1);
}

/**
 * Unsigned distance from `p` to the triangle (a, b, c).
 * Inside the prism over the triangle this is the plane distance, outside it is
 * the distance to the closest edge.
 */
export function sdTriangle(
  p: THREE.Vector3,
  a: THREE.Vector3,
  b: THREE.Vector3,
  c: THREE.Vector3
): number {
  const ba = new THREE.Vector3().subVectors(b, a);
  const pa = new THREE.Vector3().subVectors(p, a);
  const cb = new THREE.Vector3().subVectors(c, b);
  const pb = new THREE.Vector3().subVectors(p, b);
  const ac = new THREE.Vector3().subVectors(a, c);
  const pc = new THREE.Vector3().subVectors(p, c);
  const nor = new THREE.Vector3().crossVectors(ba, ac);

  const side = (edge: THREE.Vector3, rel: THREE.Vector3) =>
    Math.sign(new THREE.Vector3().crossVectors(edge, nor).dot(rel));

  if (side(ba, pa) + side(cb, pb) + side(ac, pc) < 2) {
    const edgeDist2 = (edge: THREE.Vector3, rel: THREE.Vector3) =>
      dot2(
        edge
          .clone()
          .multiplyScalar(clamp01(edge.dot(rel) / dot2(edge)))
          .sub(rel)
      );
    return Math.sqrt(Math.min(edgeDist2(ba, pa), edgeDist2(cb, pb), edgeDist2(ac, pc)));
  }
  const h = nor.dot(pa);
  return Math.sqrt((h * h) / dot2(nor));
}

/**
 * Splits a flat vertex array (x, y, z per vertex, three vertices per triangle)
 * into triangles. Trailing floats that don't complete a triangle are rejected.
 */
export function unpackTriangles(data: ArrayLike<number>): [THREE.Vector3, THREE.Vector3, THREE.Vector3][] {
  if (data.length % FLOATS_PER_TRIANGLE !== 0) {
    throw new Error(
      `Triangle data must hold a multiple of ${FLOATS_PER_TRIANGLE} floats, got ${data.length}`
    );
  }
  const vertex = (offset: number) =>
    new THREE.Vector3(data[offset], data[offset + 1], data[offset + 2]);
  const triangles: [THREE.Vector3, THREE.Vector3, THREE.Vector3][] = [];
  for (let i = 0; i < data.length; i += FLOATS_PER_TRIANGLE) {
    triangles.push([vertex(i), vertex(i + 3), vertex(i + 6)]);
  }
  return triangles;
}

export function triangleMesh(data: ArrayLike<number>): DistanceField {
  const triangles = unpackTriangles(data);
  return {
    evaluate: (p) => {
      let d = Infinity;
      for (const [a, b, c] of triangles) d = Math.min(d, sdTriangle(p, a, b, c));
      return d;
    },
  };
}

/**
 * Axis-aligned box centered at the origin as 12 outward-wound triangles.
 */
export function boxMeshGeometry(halfExtent: number = 0.5): Float32Array {
  const h = halfExtent;
  // Corner i has x = bit 0, y = bit 1, z = bit 2
  const corner = (i: number): [number, number, number] => [
    i & 1 ? h : -h,
    i & 2 ? h : -h,
    i & 4 ? h : -h,
  ];
  // Quads wound counter-clockwise seen from outside
  const quads = [
    [1, 3, 7, 5], // +x
    [0, 4, 6, 2], // -x
    [2, 6, 7, 3], // +y
    [0, 1, 5, 4], // -y
    [4, 5, 7, 6], // +z
    [0, 2, 3, 1], // -z
  ];
  const floats: number[] = [];
  for (const [a, b, c, d] of quads) {
    for (const i of [a, b, c, a, c, d]) floats.push(...corner(i));
  }
  return new Float32Array(floats);
}
