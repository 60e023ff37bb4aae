import * as THREE from 'three';

export interface DistanceField {
  evaluate: (p: THREE.Vector3) => number;
}

export function sdSphere(p: THREE.Vector3, radius: number): number {
  return p.length() - radius;
}

// Ring in the xz plane around the y axis
export function sdTorus(p: THREE.Vector3, major: number, minor: number): number {
  const qx = Math.sqrt(p.x * p.x + p.z * p.z) - major;
  return Math.sqrt(qx * qx + p.y * p.y) - minor;
}

export function sdRoundedBox(p: THREE.Vector3, halfExtents: THREE.Vector3, radius: number): number {
  const dx = Math.max(Math.abs(p.x) - halfExtents.x, 0);
  const dy = Math.max(Math.abs(p.y) - halfExtents.y, 0);
  const dz = Math.max(Math.abs(p.z) - halfExtents.z, 0);
  return Math.sqrt(dx * dx + dy * dy + dz * dz) - radius;
}

/**
 * Cone with its tip at the origin, opening towards -y, cut off at `height`.
 * `angle` is the half-angle in radians. This is a bound, not an exact distance.
 */
export function sdCone(p: THREE.Vector3, angle: number, height: number): number {
  const q = Math.sqrt(p.x * p.x + p.z * p.z);
  return Math.max(Math.sin(angle) * q + Math.cos(angle) * p.y, -height - p.y);
}

/**
 * Exponential smooth minimum, -ln(e^(-k*a) + e^(-k*b)) / k.
 *
 * Evaluated as min(a, b) - ln(1 + e^(-k*|a - b|)) / k, which is the same value
 * but keeps the exponent non-positive so it can't overflow for large k or very
 * negative distances.
 */
export function smin(a: number, b: number, k: number): number {
  const m = Math.min(a, b);
  if (!Number.isFinite(k)) return m;
  return m - Math.log1p(Math.exp(-k * Math.abs(a - b))) / k;
}

export function sphere(radius: number = 1): DistanceField {
  return {
    evaluate: (p) => sdSphere(p, radius),
  };
}

export function torus(major: number, minor: number): DistanceField {
  return {
    evaluate: (p) => sdTorus(p, major, minor),
  };
}

export function roundedBox(halfExtents: THREE.Vector3, radius: number): DistanceField {
  const b = halfExtents.clone();
  return {
    evaluate: (p) => sdRoundedBox(p, b, radius),
  };
}

export function cone(angle: number, height: number): DistanceField {
  return {
    evaluate: (p) => sdCone(p, angle, height),
  };
}

export function translate(field: DistanceField, offset: THREE.Vector3): DistanceField {
  const o = offset.clone();
  const local = new THREE.Vector3();
  return {
    evaluate: (p) => field.evaluate(local.subVectors(p, o)),
  };
}

// Combining operations
export function union(...fields: DistanceField[]): DistanceField {
  return {
    evaluate: (p) => {
      let d = Infinity;
      for (const field of fields) d = Math.min(d, field.evaluate(p));
      return d;
    },
  };
}

export function smoothUnion(k: number, ...fields: DistanceField[]): DistanceField {
  if (fields.length === 0) {
    throw new Error('smoothUnion requires at least one field');
  }
  return {
    evaluate: (p) => {
      let d = fields[0].evaluate(p);
      for (let i = 1; i < fields.length; i++) {
        d = smin(d, fields[i].evaluate(p), k);
      }
      return d;
    },
  };
}
