import * as THREE from 'three';
import type { EnvironmentMaps } from './environment';

export const SPECULAR_POWER = 8;
export const MIRROR_SCALE = 0.1;
export const EXPOSURE = 3.0;
export const GAMMA = 2.2;

export interface Material {
  diffuseColor: THREE.Color;
  specularColor: THREE.Color;
  diffuseWeight: number;
  specularWeight: number;
  // Complex index of refraction eta + i*k of the conductor
  eta: number;
  k: number;
}

export const DEFAULT_MATERIAL: Material = {
  diffuseColor: new THREE.Color(0.8, 0.75, 0.7),
  specularColor: new THREE.Color(1.0, 0.86, 0.57),
  diffuseWeight: 0.25,
  specularWeight: 0.05,
  eta: 0.27,
  k: 2.78,
};

/**
 * Fresnel reflectance of a conductor, averaging the parallel and perpendicular
 * polarizations. `cosi` is clamped to [0, 1].
 */
export function fresnelConductor(cosi: number, eta: number, k: number): number {
  const c = Math.min(Math.max(cosi, 0), 1);
  const c2 = c * c;
  const etaK = eta * eta + k * k;
  const twoEtaC = 2 * eta * c;

  const tmp = etaK * c2;
  const rParallel = (tmp - twoEtaC + 1) / (tmp + twoEtaC + 1);
  const rPerpendicular = (etaK - twoEtaC + c2) / (etaK + twoEtaC + c2);
  return (rParallel + rPerpendicular) / 2;
}

// Energy normalization of a Phong lobe of the given power
export function normFactor(power: number): number {
  return (power + 2) / 2;
}

export function reflect(direction: THREE.Vector3, normal: THREE.Vector3): THREE.Vector3 {
  return direction.clone().addScaledVector(normal, -2 * direction.dot(normal));
}

export function shadeHit(
  direction: THREE.Vector3,
  normal: THREE.Vector3,
  occlusion: number,
  environment: EnvironmentMaps,
  material: Material
): THREE.Color {
  const reflected = reflect(direction, normal);
  const fresnel = fresnelConductor(-direction.dot(normal), material.eta, material.k);

  const diffuse = environment.cos1
    .sample(normal)
    .multiply(material.diffuseColor)
    .multiplyScalar(material.diffuseWeight);
  const specular = environment.cos8
    .sample(reflected)
    .multiply(material.specularColor)
    .multiplyScalar(normFactor(SPECULAR_POWER) * fresnel * material.specularWeight);
  const mirror = environment.reflection
    .sample(reflected)
    .multiplyScalar(material.specularWeight * fresnel * MIRROR_SCALE);

  return diffuse.add(specular).add(mirror).multiplyScalar(EXPOSURE * occlusion);
}

// Rays that leave the scene show the environment itself
export function shadeMiss(direction: THREE.Vector3, environment: EnvironmentMaps): THREE.Color {
  return environment.reflection.sample(direction);
}

export function gammaEncode(color: THREE.Color, gamma: number = GAMMA): THREE.Color {
  const inv = 1 / gamma;
  return new THREE.Color(
    Math.pow(Math.max(color.r, 0), inv),
    Math.pow(Math.max(color.g, 0), inv),
    Math.pow(Math.max(color.b, 0), inv)
  );
}
