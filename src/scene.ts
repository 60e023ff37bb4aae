import * as THREE from 'three';
import type { SceneKind, RenderConfig } from './config';
import { FLOATS_PER_TRIANGLE, triangleMesh } from './boxmesh';
import { RenderError } from './errors';
import { animatedPower, mandelbulb } from './fractal';
import { ALTERNATE_OCCLUSION, type OcclusionParams, PRIMARY_OCCLUSION } from './occlusion';
import { type PolytopeFamily, polytope } from './polytopes';
import { type DistanceField, cone, roundedBox, smoothUnion, sphere, torus, translate } from './sdf';

export type Vec3 = readonly [number, number, number];

export type ShapeNode =
  | { type: 'sphere'; radius: number }
  | { type: 'torus'; major: number; minor: number }
  | { type: 'roundedBox'; halfExtents: Vec3; radius: number }
  | { type: 'cone'; angle: number; height: number }
  | { type: 'polytope'; family: PolytopeFamily; exponent: number; radius: number }
  | { type: 'translate'; offset: Vec3; child: ShapeNode }
  | { type: 'smoothUnion'; k: number; children: ShapeNode[] };

export const CSG_BLEND_SHARPNESS = 64;

export const BOUNDING_RADIUS: Record<SceneKind, number> = {
  'primitive-csg': 1.5,
  mandelbulb: 1.5,
  'box-mesh': 1.0,
};

function at(offset: Vec3, child: ShapeNode): ShapeNode {
  return { type: 'translate', offset, child };
}

export const PRIMITIVE_SCENE: ShapeNode = {
  type: 'smoothUnion',
  k: CSG_BLEND_SHARPNESS,
  children: [
    at([0, -0.45, 0], { type: 'torus', major: 0.7, minor: 0.1 }),
    { type: 'sphere', radius: 0.3 },
    at([0, 0.75, 0], { type: 'cone', angle: 0.45, height: 0.35 }),
    at([0.55, 0.05, 0.25], { type: 'roundedBox', halfExtents: [0.14, 0.14, 0.14], radius: 0.04 }),
    at([-0.55, 0.05, 0.25], { type: 'polytope', family: 'octahedron', exponent: 24, radius: 0.2 }),
    at([0.25, 0.1, -0.55], { type: 'polytope', family: 'dodecahedron', exponent: 32, radius: 0.2 }),
    at([-0.3, 0.05, -0.5], { type: 'polytope', family: 'truncatedIcosahedron', exponent: 48, radius: 0.2 }),
  ],
};

export function shapeToField(node: ShapeNode): DistanceField {
  switch (node.type) {
    case 'sphere':
      return sphere(node.radius);
    case 'torus':
      return torus(node.major, node.minor);
    case 'roundedBox':
      return roundedBox(new THREE.Vector3(...node.halfExtents), node.radius);
    case 'cone':
      return cone(node.angle, node.height);
    case 'polytope':
      return polytope(node.family, node.exponent, node.radius);
    case 'translate':
      return translate(shapeToField(node.child), new THREE.Vector3(...node.offset));
    case 'smoothUnion':
      return smoothUnion(node.k, ...node.children.map(shapeToField));
  }
}

export interface SceneInputs {
  time: number;
  // Flat triangle list for the box-mesh scene
  geometry?: ArrayLike<number>;
}

export interface ComposedScene {
  kind: SceneKind;
  field: DistanceField;
  boundingRadius: number;
  occlusion: OcclusionParams;
}

export function fractalPower(config: RenderConfig, time: number): number {
  return config.power.kind === 'fixed' ? config.power.value : animatedPower(time);
}

export function composeScene(config: RenderConfig, inputs: SceneInputs): ComposedScene {
  const kind = config.scene;
  switch (kind) {
    case 'primitive-csg':
      return {
        kind,
        field: shapeToField(PRIMITIVE_SCENE),
        boundingRadius: BOUNDING_RADIUS[kind],
        occlusion: ALTERNATE_OCCLUSION,
      };
    case 'mandelbulb':
      return {
        kind,
        field: mandelbulb(fractalPower(config, inputs.time)),
        boundingRadius: BOUNDING_RADIUS[kind],
        occlusion: PRIMARY_OCCLUSION,
      };
    case 'box-mesh': {
      const geometry = inputs.geometry;
      if (!geometry || geometry.length === 0) {
        throw new RenderError('box-mesh scene needs triangle geometry');
      }
      if (geometry.length % FLOATS_PER_TRIANGLE !== 0) {
        throw new RenderError(
          `Triangle geometry must hold a multiple of ${FLOATS_PER_TRIANGLE} floats, got ${geometry.length}`
        );
      }
      return {
        kind,
        field: triangleMesh(geometry),
        boundingRadius: BOUNDING_RADIUS[kind],
        occlusion: ALTERNATE_OCCLUSION,
      };
    }
  }
}
