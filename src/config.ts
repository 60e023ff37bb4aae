import { readFileSync } from 'fs';
import * as THREE from 'three';
import { z } from 'zod';
import { ConfigError } from './errors';
import type { Material } from './shading';

const vec3 = z.tuple([z.number(), z.number(), z.number()]);
const rgb = z.tuple([z.number().nonnegative(), z.number().nonnegative(), z.number().nonnegative()]);

export const sceneKindSchema = z.enum(['primitive-csg', 'mandelbulb', 'box-mesh']);
export type SceneKind = z.infer<typeof sceneKindSchema>;

const powerSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('fixed'), value: z.number().positive() }),
  z.object({ kind: z.literal('animated') }),
]);

const projectionSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('perspective'), hfovDegrees: z.number().gt(0).lt(180) }),
  z.object({ kind: z.literal('orthographic'), width: z.number().positive() }),
]);

const cameraSchema = z
  .object({
    eye: vec3.default([0, 0.6, 2.6]),
    focus: vec3.default([0, 0, 0]),
    up: vec3.default([0, 1, 0]),
    projection: projectionSchema.default({ kind: 'perspective', hfovDegrees: 60 }),
    // Radians per second around the world y axis
    orbitSpeed: z.number().default(0),
  })
  .superRefine((camera, ctx) => {
    const view = new THREE.Vector3(...camera.eye).sub(new THREE.Vector3(...camera.focus));
    if (view.lengthSq() === 0) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['focus'], message: 'focus must differ from eye' });
      return;
    }
    const side = new THREE.Vector3(...camera.up).cross(view);
    if (side.lengthSq() < 1e-12) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['up'], message: 'up must not be parallel to the view direction' });
    }
  });

const materialSchema = z.object({
  diffuseColor: rgb.default([0.8, 0.75, 0.7]),
  specularColor: rgb.default([1.0, 0.86, 0.57]),
  diffuseWeight: z.number().nonnegative().default(0.25),
  specularWeight: z.number().nonnegative().default(0.05),
  eta: z.number().positive().default(0.27),
  k: z.number().nonnegative().default(2.78),
});

export const renderConfigSchema = z
  .object({
    scene: sceneKindSchema.default('mandelbulb'),
    power: powerSchema.default({ kind: 'fixed', value: 8 }),
    occlusion: z.enum(['distance', 'step-count']).default('distance'),
    normals: z.enum(['backward', 'central']).default('backward'),
    gamma: z.boolean().default(true),
    supersampling: z.boolean().default(false),
    camera: cameraSchema.default({}),
    material: materialSchema.default({}),
  })
  .strict();

export type RenderConfigInput = z.input<typeof renderConfigSchema>;
export type RenderConfig = z.output<typeof renderConfigSchema>;

export function parseRenderConfig(input: unknown): RenderConfig {
  const result = renderConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigError(
      'Invalid render configuration',
      result.error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message }))
    );
  }
  return result.data;
}

export function loadRenderConfig(filename: string): RenderConfig {
  const source = readFileSync(filename, 'utf-8');
  let json: unknown;
  try {
    json = JSON.parse(source);
  } catch (e) {
    throw new ConfigError(`Config file ${filename} is not valid JSON: ${e instanceof Error ? e.message : String(e)}`);
  }
  return parseRenderConfig(json);
}

function toColor([r, g, b]: [number, number, number]): THREE.Color {
  return new THREE.Color(r, g, b);
}

export function materialFromConfig(config: RenderConfig): Material {
  const { material } = config;
  return {
    diffuseColor: toColor(material.diffuseColor),
    specularColor: toColor(material.specularColor),
    diffuseWeight: material.diffuseWeight,
    specularWeight: material.specularWeight,
    eta: material.eta,
    k: material.k,
  };
}
