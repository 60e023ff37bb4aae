import * as THREE from 'three';

export interface EnvironmentSampler {
  sample(direction: THREE.Vector3): THREE.Color;
}

/**
 * Pre-filtered lighting inputs: a mirror reflection map plus the environment
 * convolved with cosine lobes of increasing power.
 */
export interface EnvironmentMaps {
  reflection: EnvironmentSampler;
  cos1: EnvironmentSampler;
  cos8: EnvironmentSampler;
  cos64: EnvironmentSampler;
  cos512: EnvironmentSampler;
}

export type CubeFace = 0 | 1 | 2 | 3 | 4 | 5;

// +x, -x, +y, -y, +z, -z
export const CUBE_FACES: readonly CubeFace[] = [0, 1, 2, 3, 4, 5];

/**
 * Direction through face coordinates (u, v) in [-1, 1], unnormalized.
 * Follows the OpenGL cube map face layout.
 */
export function cubeFaceDirection(face: CubeFace, u: number, v: number): THREE.Vector3 {
  switch (face) {
    case 0:
      return new THREE.Vector3(1, -v, -u);
    case 1:
      return new THREE.Vector3(-1, -v, u);
    case 2:
      return new THREE.Vector3(u, 1, v);
    case 3:
      return new THREE.Vector3(u, -1, -v);
    case 4:
      return new THREE.Vector3(u, -v, 1);
    case 5:
      return new THREE.Vector3(-u, -v, -1);
  }
}

/**
 * Inverse of cubeFaceDirection: the face hit by `direction` and the face
 * coordinates (u, v) in [-1, 1].
 */
export function cubeFaceCoordinates(direction: THREE.Vector3): { face: CubeFace; u: number; v: number } {
  const ax = Math.abs(direction.x);
  const ay = Math.abs(direction.y);
  const az = Math.abs(direction.z);
  if (ax >= ay && ax >= az) {
    return direction.x >= 0
      ? { face: 0, u: -direction.z / ax, v: -direction.y / ax }
      : { face: 1, u: direction.z / ax, v: -direction.y / ax };
  }
  if (ay >= az) {
    return direction.y >= 0
      ? { face: 2, u: direction.x / ay, v: direction.z / ay }
      : { face: 3, u: direction.x / ay, v: -direction.z / ay };
  }
  return direction.z >= 0
    ? { face: 4, u: direction.x / az, v: -direction.y / az }
    : { face: 5, u: -direction.x / az, v: -direction.y / az };
}

/**
 * Six square RGB float faces, nearest-texel lookup.
 */
export class CubeMap implements EnvironmentSampler {
  constructor(
    public readonly size: number,
    public readonly faces: readonly Float32Array[]
  ) {
    if (!Number.isInteger(size) || size <= 0) {
      throw new Error(`Cube map size must be a positive integer, got ${size}`);
    }
    if (faces.length !== 6) {
      throw new Error(`Cube map needs 6 faces, got ${faces.length}`);
    }
    faces.forEach((face, i) => {
      if (face.length !== size * size * 3) {
        throw new Error(`Cube map face ${i} holds ${face.length} floats, expected ${size * size * 3}`);
      }
    });
  }

  static fromSampler(source: EnvironmentSampler, size: number): CubeMap {
    return CubeMap.generate(size, (direction) => source.sample(direction));
  }

  /**
   * Fills every texel from its center direction (normalized).
   */
  static generate(size: number, texel: (direction: THREE.Vector3, face: CubeFace) => THREE.Color): CubeMap {
    const faces = CUBE_FACES.map((face) => {
      const data = new Float32Array(size * size * 3);
      for (let j = 0; j < size; j++) {
        for (let i = 0; i < size; i++) {
          const { u, v } = texelCenter(i, j, size);
          const color = texel(cubeFaceDirection(face, u, v).normalize(), face);
          const offset = (j * size + i) * 3;
          data[offset] = color.r;
          data[offset + 1] = color.g;
          data[offset + 2] = color.b;
        }
      }
      return data;
    });
    return new CubeMap(size, faces);
  }

  sample(direction: THREE.Vector3): THREE.Color {
    const { face, u, v } = cubeFaceCoordinates(direction);
    const i = Math.min(Math.floor(((u + 1) / 2) * this.size), this.size - 1);
    const j = Math.min(Math.floor(((v + 1) / 2) * this.size), this.size - 1);
    const data = this.faces[face];
    const offset = (j * this.size + i) * 3;
    return new THREE.Color(data[offset], data[offset + 1], data[offset + 2]);
  }
}

function texelCenter(i: number, j: number, size: number): { u: number; v: number } {
  return {
    u: ((i + 0.5) / size) * 2 - 1,
    v: ((j + 0.5) / size) * 2 - 1,
  };
}

// Solid angle subtended by a texel, up to a constant factor
function texelSolidAngle(u: number, v: number): number {
  return 1 / Math.pow(1 + u * u + v * v, 1.5);
}

export class UniformEnvironment implements EnvironmentSampler {
  private readonly color: THREE.Color;

  constructor(color: THREE.Color) {
    this.color = color.clone();
  }

  sample(_direction: THREE.Vector3): THREE.Color {
    return this.color.clone();
  }
}

export interface SkyOptions {
  zenith: THREE.Color;
  horizon: THREE.Color;
  ground: THREE.Color;
  sunDirection: THREE.Vector3;
  sunColor: THREE.Color;
  sunSharpness: number;
}

export const DEFAULT_SKY: SkyOptions = {
  zenith: new THREE.Color(0.18, 0.32, 0.62),
  horizon: new THREE.Color(0.85, 0.8, 0.72),
  ground: new THREE.Color(0.22, 0.19, 0.16),
  sunDirection: new THREE.Vector3(0.5, 0.7, 0.4).normalize(),
  sunColor: new THREE.Color(6, 5.4, 4.6),
  sunSharpness: 400,
};

/**
 * Procedural gradient sky with a ground plane and a sun highlight, used when no
 * captured environment is available.
 */
export class SkyEnvironment implements EnvironmentSampler {
  private readonly options: SkyOptions;

  constructor(options: Partial<SkyOptions> = {}) {
    this.options = { ...DEFAULT_SKY, ...options };
  }

  sample(direction: THREE.Vector3): THREE.Color {
    const { zenith, horizon, ground, sunDirection, sunColor, sunSharpness } = this.options;
    const d = direction.clone().normalize();
    if (d.y < 0) {
      return horizon.clone().lerp(ground, Math.min(1, -d.y * 8));
    }
    const color = horizon.clone().lerp(zenith, Math.sqrt(d.y));
    const sun = Math.pow(Math.max(d.dot(sunDirection), 0), sunSharpness);
    return color.add(sunColor.clone().multiplyScalar(sun));
  }
}

/**
 * Convolves `source` with a normalized cos^power lobe around each output texel
 * direction. The source is first resampled into a cube map of `sourceSize`.
 */
export function prefilterCubeMap(
  source: EnvironmentSampler,
  power: number,
  size: number,
  sourceSize: number = size
): CubeMap {
  const directions: THREE.Vector3[] = [];
  const radiance: THREE.Color[] = [];
  const solidAngles: number[] = [];
  for (const face of CUBE_FACES) {
    for (let j = 0; j < sourceSize; j++) {
      for (let i = 0; i < sourceSize; i++) {
        const { u, v } = texelCenter(i, j, sourceSize);
        const direction = cubeFaceDirection(face, u, v).normalize();
        directions.push(direction);
        radiance.push(source.sample(direction));
        solidAngles.push(texelSolidAngle(u, v));
      }
    }
  }

  return CubeMap.generate(size, (normal) => {
    const sum = new THREE.Color(0, 0, 0);
    let weightSum = 0;
    for (let k = 0; k < directions.length; k++) {
      const cosine = normal.dot(directions[k]);
      if (cosine <= 0) continue;
      const weight = Math.pow(cosine, power) * solidAngles[k];
      sum.r += radiance[k].r * weight;
      sum.g += radiance[k].g * weight;
      sum.b += radiance[k].b * weight;
      weightSum += weight;
    }
    return weightSum > 0 ? sum.multiplyScalar(1 / weightSum) : sum;
  });
}

export interface EnvironmentMapOptions {
  reflectionSize: number;
  irradianceSize: number;
  sourceSize: number;
}

export const DEFAULT_ENVIRONMENT_MAP_OPTIONS: EnvironmentMapOptions = {
  reflectionSize: 64,
  irradianceSize: 8,
  sourceSize: 16,
};

export function createEnvironmentMaps(
  source: EnvironmentSampler,
  options: Partial<EnvironmentMapOptions> = {}
): EnvironmentMaps {
  const { reflectionSize, irradianceSize, sourceSize } = { ...DEFAULT_ENVIRONMENT_MAP_OPTIONS, ...options };
  return {
    reflection: CubeMap.fromSampler(source, reflectionSize),
    cos1: prefilterCubeMap(source, 1, irradianceSize, sourceSize),
    cos8: prefilterCubeMap(source, 8, irradianceSize, sourceSize),
    cos64: prefilterCubeMap(source, 64, irradianceSize, sourceSize),
    cos512: prefilterCubeMap(source, 512, irradianceSize, sourceSize),
  };
}
