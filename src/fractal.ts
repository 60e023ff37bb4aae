import * as THREE from 'three';
import type { DistanceField } from './sdf';

export const FRACTAL_MAX_ITERATIONS = 25;
export const FRACTAL_BAILOUT = 4;

export const ANIMATED_POWER_MIN = 2;
export const ANIMATED_POWER_MAX = 11;
// Seconds for one sweep from the minimum power to the maximum
export const ANIMATED_POWER_HALF_PERIOD = 10;

/**
 * Raises a triplex number to a power: r -> r^power and both spherical angles
 * multiplied by power. The pole is the z axis (theta = acos(z / r)).
 * Writes into `target` and returns it.
 */
export function triplexPow(
  w: THREE.Vector3,
  power: number,
  target: THREE.Vector3 = new THREE.Vector3()
): THREE.Vector3 {
  const r = w.length();
  if (r === 0) return target.set(0, 0, 0);
  const theta = Math.acos(w.z / r) * power;
  const phi = Math.atan2(w.y, w.x) * power;
  const rn = Math.pow(r, power);
  const sinTheta = Math.sin(theta);
  return target.set(
    rn * sinTheta * Math.cos(phi),
    rn * sinTheta * Math.sin(phi),
    rn * Math.cos(theta)
  );
}

/**
 * Power 8 expanded into polynomials, same result as triplexPow(w, 8) without
 * any trigonometry. Points on the pole axis (x = y = 0) divide by zero in the
 * expansion and take the general path instead.
 */
export function triplexPow8(w: THREE.Vector3, target: THREE.Vector3 = new THREE.Vector3()): THREE.Vector3 {
  // Expansion is written for a pole along its second coordinate
  const x = w.y;
  const y = w.z;
  const z = w.x;

  const x2 = x * x;
  const z2 = z * z;
  const k3 = x2 + z2;
  if (k3 === 0) return triplexPow(w, 8, target);

  const x4 = x2 * x2;
  const y2 = y * y;
  const y4 = y2 * y2;
  const z4 = z2 * z2;

  const k2 = 1 / Math.sqrt(k3 * k3 * k3 * k3 * k3 * k3 * k3);
  const k1 = x4 + y4 + z4 - 6 * y2 * z2 - 6 * x2 * y2 + 2 * z2 * x2;
  const k4 = x2 - y2 + z2;

  const rx = 64 * x * y * z * (x2 - z2) * k4 * (x4 - 6 * x2 * z2 + z4) * k1 * k2;
  const ry = -16 * y2 * k3 * k4 * k4 + k1 * k1;
  const rz =
    -8 * y * k4 * (x4 * x4 - 28 * x4 * x2 * z2 + 70 * x4 * z4 - 28 * x2 * z2 * z4 + z4 * z4) * k1 * k2;

  return target.set(rz, rx, ry);
}

export type TriplexPower = (w: THREE.Vector3, target: THREE.Vector3) => THREE.Vector3;

export function triplexPower(power: number): TriplexPower {
  if (power === 8) return triplexPow8;
  return (w, target) => triplexPow(w, power, target);
}

/**
 * Escape-time distance estimate 0.5 * ln(r) * r / dr for the power-n
 * Mandelbulb. The input is reoriented so the fractal's pole points along +y.
 */
export function mandelbulbDistance(p: THREE.Vector3, power: number, pow: TriplexPower = triplexPower(power)): number {
  const c = new THREE.Vector3(p.x, p.z, p.y);
  const w = c.clone();
  let dr = 1;
  let r = 0;
  for (let i = 0; i < FRACTAL_MAX_ITERATIONS; i++) {
    r = w.length();
    if (r > FRACTAL_BAILOUT) break;
    dr = power * Math.pow(r, power - 1) * dr + 1;
    pow(w, w).add(c);
  }
  // The orbit of the origin stays at zero, where ln(r) * r has limit 0
  if (r === 0) return 0;
  return (0.5 * Math.log(r) * r) / dr;
}

export function mandelbulb(power: number): DistanceField {
  const pow = triplexPower(power);
  return {
    evaluate: (p) => mandelbulbDistance(p, power, pow),
  };
}

/**
 * Triangle wave between ANIMATED_POWER_MIN and ANIMATED_POWER_MAX, starting at
 * the minimum at time 0.
 */
export function animatedPower(time: number): number {
  const phase = time / ANIMATED_POWER_HALF_PERIOD;
  const wrapped = phase - 2 * Math.floor(phase / 2); // [0, 2)
  const tri = 1 - Math.abs(wrapped - 1); // 0 at 0, 1 at 1, back to 0 at 2
  return ANIMATED_POWER_MIN + (ANIMATED_POWER_MAX - ANIMATED_POWER_MIN) * tri;
}
