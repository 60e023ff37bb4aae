import * as THREE from 'three';

export type Projection =
  | { kind: 'orthographic'; width: number }
  | { kind: 'perspective'; hfovDegrees: number };

export interface Camera {
  // Orthonormal basis in the upper 3x3, position in the last column
  transform: THREE.Matrix4;
  projection: Projection;
}

export interface Ray {
  origin: THREE.Vector3;
  direction: THREE.Vector3; // unit length
}

export interface Resolution {
  width: number;
  height: number;
}

/**
 * Camera transform looking from `eye` towards `focus`; the camera looks down
 * its local -z axis. Degenerate when `up` is parallel to the view direction.
 */
export function lookAt(eye: THREE.Vector3, focus: THREE.Vector3, up: THREE.Vector3): THREE.Matrix4 {
  const z = new THREE.Vector3().subVectors(eye, focus).normalize();
  const x = new THREE.Vector3().crossVectors(up, z).normalize();
  const y = new THREE.Vector3().crossVectors(z, x);
  return new THREE.Matrix4().makeBasis(x, y, z).setPosition(eye);
}

// Rotates the whole camera rig around the world y axis
export function orbitCamera(camera: Camera, angle: number): Camera {
  if (angle === 0) return camera;
  return {
    transform: new THREE.Matrix4().makeRotationY(angle).multiply(camera.transform),
    projection: camera.projection,
  };
}

export function pixelToNDC(
  pixel: THREE.Vector2,
  sampleOffset: THREE.Vector2,
  resolution: Resolution
): THREE.Vector2 {
  return new THREE.Vector2(
    ((pixel.x + sampleOffset.x) / resolution.width) * 2 - 1,
    ((pixel.y + sampleOffset.y) / resolution.height) * 2 - 1
  );
}

export function generateRay(
  camera: Camera,
  pixel: THREE.Vector2,
  sampleOffset: THREE.Vector2,
  resolution: Resolution
): Ray {
  const ndc = pixelToNDC(pixel, sampleOffset, resolution);
  const aspect = resolution.width / resolution.height;
  const projection = camera.projection;

  switch (projection.kind) {
    case 'orthographic': {
      const halfWidth = projection.width / 2;
      const halfHeight = projection.width / aspect / 2;
      return {
        origin: new THREE.Vector3(ndc.x * halfWidth, ndc.y * halfHeight, 0).applyMatrix4(camera.transform),
        direction: new THREE.Vector3(0, 0, -1).transformDirection(camera.transform),
      };
    }
    case 'perspective': {
      const fovScale = Math.tan(THREE.MathUtils.degToRad(projection.hfovDegrees) / 2);
      return {
        origin: new THREE.Vector3().setFromMatrixPosition(camera.transform),
        // transformDirection ignores the translation and normalizes
        direction: new THREE.Vector3(ndc.x * fovScale, (ndc.y * fovScale) / aspect, -1).transformDirection(
          camera.transform
        ),
      };
    }
  }
}
