import * as THREE from 'three';
import { type Camera, type Resolution, generateRay, lookAt, orbitCamera } from './camera';
import { type RenderConfig, materialFromConfig } from './config';
import type { EnvironmentMaps } from './environment';
import { RenderError } from './errors';
import { createNormalEstimator } from './normals';
import { ambientOcclusion } from './occlusion';
import { composeScene } from './scene';
import { gammaEncode, shadeHit, shadeMiss } from './shading';
import { type HitResult, intersect } from './tracer';

/**
 * Read-only inputs shared by every pixel of a frame.
 */
export interface Uniforms {
  time: number;
  resolution: Resolution;
  environment: EnvironmentMaps;
  geometry?: ArrayLike<number>;
}

/**
 * Color of the pixel at integer coordinates (x, y), y growing upwards.
 */
export type PixelKernel = (x: number, y: number) => THREE.Color;

// Max channel difference between the first two samples before refining
export const SUPERSAMPLE_THRESHOLD = 1 / 32;

const CENTER = new THREE.Vector2(0, 0);
const FIRST_DIAGONAL = [new THREE.Vector2(-0.25, -0.25), new THREE.Vector2(0.25, 0.25)];
const SECOND_DIAGONAL = [new THREE.Vector2(0.25, -0.25), new THREE.Vector2(-0.25, 0.25)];

type SampleFn = (pixel: THREE.Vector2, offset: THREE.Vector2) => THREE.Color;

function average(colors: THREE.Color[]): THREE.Color {
  const sum = new THREE.Color(0, 0, 0);
  for (const c of colors) sum.add(c);
  return sum.multiplyScalar(1 / colors.length);
}

function maxChannelDifference(a: THREE.Color, b: THREE.Color): number {
  return Math.max(Math.abs(a.r - b.r), Math.abs(a.g - b.g), Math.abs(a.b - b.b));
}

/**
 * Two samples along one diagonal of the pixel; if they disagree, two more
 * along the other diagonal.
 */
export function adaptiveSample(sample: SampleFn, pixel: THREE.Vector2): THREE.Color {
  const first = FIRST_DIAGONAL.map((offset) => sample(pixel, offset));
  if (maxChannelDifference(first[0], first[1]) <= SUPERSAMPLE_THRESHOLD) {
    return average(first);
  }
  const second = SECOND_DIAGONAL.map((offset) => sample(pixel, offset));
  return average([...first, ...second]);
}

export function cameraFromConfig(config: RenderConfig, time: number): Camera {
  const { eye, focus, up, projection, orbitSpeed } = config.camera;
  const camera: Camera = {
    transform: lookAt(new THREE.Vector3(...eye), new THREE.Vector3(...focus), new THREE.Vector3(...up)),
    projection,
  };
  return orbitCamera(camera, orbitSpeed * time);
}

export function validateResolution(resolution: Resolution): void {
  const { width, height } = resolution;
  if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
    throw new RenderError(`Resolution must be positive integers, got ${width}x${height}`);
  }
}

/**
 * Resolves every configuration choice once and returns the per-pixel
 * pipeline: ray, trace, normal and occlusion on hit, shading, gamma.
 */
export function createKernel(config: RenderConfig, uniforms: Uniforms): PixelKernel {
  validateResolution(uniforms.resolution);

  const scene = composeScene(config, uniforms);
  const camera = cameraFromConfig(config, uniforms.time);
  const estimateNormal = createNormalEstimator(config.normals);
  const material = materialFromConfig(config);
  const { environment, resolution } = uniforms;

  type Hit = Extract<HitResult, { kind: 'hit' }>;
  const occlusionOf: (hit: Hit) => number =
    config.occlusion === 'distance'
      ? (hit) => ambientOcclusion(scene.field, hit.position, hit.normal, scene.occlusion)
      : (hit) => hit.stepGradient;

  const shadeSample: SampleFn = (pixel, offset) => {
    const ray = generateRay(camera, pixel, offset, resolution);
    const hit = intersect(ray, scene.field, scene.boundingRadius, estimateNormal);
    if (hit.kind === 'miss') return shadeMiss(ray.direction, environment);
    return shadeHit(ray.direction, hit.normal, occlusionOf(hit), environment, material);
  };

  const sample: (pixel: THREE.Vector2) => THREE.Color = config.supersampling
    ? (pixel) => adaptiveSample(shadeSample, pixel)
    : (pixel) => shadeSample(pixel, CENTER);
  const encode = config.gamma ? (c: THREE.Color) => gammaEncode(c) : (c: THREE.Color) => c;

  // Rays go through pixel centers
  return (x, y) => encode(sample(new THREE.Vector2(x + 0.5, y + 0.5)));
}
