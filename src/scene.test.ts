import { describe, it, expect } from 'vitest';
import * as THREE from 'three';
import { boxMeshGeometry } from './boxmesh';
import { parseRenderConfig } from './config';
import { RenderError } from './errors';
import { ALTERNATE_OCCLUSION, PRIMARY_OCCLUSION } from './occlusion';
import { PRIMITIVE_SCENE, composeScene, fractalPower, shapeToField } from './scene';

describe('shapeToField', () => {
  it('builds leaves and translations', () => {
    const field = shapeToField({ type: 'translate', offset: [0, 1, 0], child: { type: 'sphere', radius: 0.5 } });
    expect(field.evaluate(new THREE.Vector3(0, 1, 0))).toBe(-0.5);
    expect(field.evaluate(new THREE.Vector3(0, 3, 0))).toBe(1.5);
  });

  it('is dominated by the central sphere at the origin of the primitive scene', () => {
    const d = shapeToField(PRIMITIVE_SCENE).evaluate(new THREE.Vector3(0, 0, 0));
    expect(d).toBeCloseTo(-0.3, 6);
    expect(d).toBeLessThanOrEqual(-0.3);
  });
});

describe('fractalPower', () => {
  it('uses the fixed value or the animation', () => {
    expect(fractalPower(parseRenderConfig({}), 3)).toBe(8);
    const animated = parseRenderConfig({ power: { kind: 'animated' } });
    expect(fractalPower(animated, 0)).toBe(2);
    expect(fractalPower(animated, 10)).toBe(11);
  });
});

describe('composeScene', () => {
  it('composes the Mandelbulb with the primary occlusion', () => {
    const scene = composeScene(parseRenderConfig({}), { time: 0 });
    expect(scene.kind).toBe('mandelbulb');
    expect(scene.boundingRadius).toBe(1.5);
    expect(scene.occlusion).toBe(PRIMARY_OCCLUSION);
    expect(scene.field.evaluate(new THREE.Vector3(0, 0, 3))).toBeCloseTo(1.647824, 5);
  });

  it('composes the primitive scene with the alternate occlusion', () => {
    const scene = composeScene(parseRenderConfig({ scene: 'primitive-csg' }), { time: 0 });
    expect(scene.boundingRadius).toBe(1.5);
    expect(scene.occlusion).toBe(ALTERNATE_OCCLUSION);
  });

  it('builds the box mesh from geometry', () => {
    const scene = composeScene(parseRenderConfig({ scene: 'box-mesh' }), { time: 0, geometry: boxMeshGeometry() });
    expect(scene.boundingRadius).toBe(1);
    expect(scene.field.evaluate(new THREE.Vector3(0, 0, 2))).toBeCloseTo(1.5, 6);
  });

  it('needs geometry for the box mesh', () => {
    const config = parseRenderConfig({ scene: 'box-mesh' });
    expect(() => composeScene(config, { time: 0 })).toThrow(RenderError);
    expect(() => composeScene(config, { time: 0, geometry: [] })).toThrow('box-mesh scene needs triangle geometry');
    expect(() => composeScene(config, { time: 0, geometry: new Float32Array(20) })).toThrow(
      'Triangle geometry must hold a multiple of 9 floats, got 20'
    );
  });
});
