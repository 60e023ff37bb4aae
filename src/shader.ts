import type { RenderConfig } from './config';
import { FLOATS_PER_TRIANGLE } from './boxmesh';
import {
  ANIMATED_POWER_HALF_PERIOD,
  ANIMATED_POWER_MAX,
  ANIMATED_POWER_MIN,
  FRACTAL_BAILOUT,
  FRACTAL_MAX_ITERATIONS,
} from './fractal';
import { GLSLContext, GLSLGenerator, glslFloat, glslVec3 } from './glslgen';
import { NORMAL_BACKSTEP, NORMAL_EPSILON } from './normals';
import { ALTERNATE_OCCLUSION, type OcclusionParams, PRIMARY_OCCLUSION } from './occlusion';
import { POLYTOPE_NORMALS, POLYTOPE_RANGES } from './polytopes';
import { BOUNDING_RADIUS, PRIMITIVE_SCENE, type ShapeNode } from './scene';
import { EXPOSURE, GAMMA, MIRROR_SCALE, SPECULAR_POWER } from './shading';
import { SUPERSAMPLE_THRESHOLD } from './kernel';
import { HIT_EPSILON, MAX_MARCH_STEPS } from './tracer';

export const FULLSCREEN_VERTEX_SHADER = `#version 330 core
layout(location = 0) in vec2 in_pos;
void main() {
  gl_Position = vec4(in_pos, 0.0, 1.0);
}
`;

export interface ShaderOptions {
  // Size of the in_tri uniform array for the box-mesh scene
  triangleFloats: number;
}

/**
 * Emits the CSG tree as single-assignment GLSL and returns the variable
 * holding the distance.
 */
export function shapeToGLSL(node: ShapeNode, context: GLSLContext): string {
  switch (node.type) {
    case 'sphere':
      return context.distance((p) => `sdSphere(${p}, ${glslFloat(node.radius)})`);
    case 'torus':
      return context.distance((p) => `sdTorus(${p}, ${glslFloat(node.major)}, ${glslFloat(node.minor)})`);
    case 'roundedBox':
      return context.distance(
        (p) => `sdRoundedBox(${p}, ${glslVec3(...node.halfExtents)}, ${glslFloat(node.radius)})`
      );
    case 'cone':
      return context.distance((p) => `sdCone(${p}, ${glslFloat(node.angle)}, ${glslFloat(node.height)})`);
    case 'polytope': {
      const [begin, end] = POLYTOPE_RANGES[node.family];
      return node.exponent === Infinity
        ? context.distance((p) => `sdPolytopeMax(${p}, ${begin}, ${end}, ${glslFloat(node.radius)})`)
        : context.distance(
            (p) => `sdPolytope(${p}, ${begin}, ${end}, ${glslFloat(node.exponent)}, ${glslFloat(node.radius)})`
          );
    }
    case 'translate':
      return shapeToGLSL(node.child, context.translate(...node.offset));
    case 'smoothUnion': {
      const vars = node.children.map((child) => shapeToGLSL(child, context));
      return vars
        .slice(1)
        .reduce((acc, v) => context.generator.save(`smin(${acc}, ${v}, ${glslFloat(node.k)})`, 'float'), vars[0]);
    }
  }
}

function sceneFunction(config: RenderConfig): string {
  switch (config.scene) {
    case 'primitive-csg': {
      const generator = new GLSLGenerator();
      const result = shapeToGLSL(PRIMITIVE_SCENE, new GLSLContext(generator));
      return `float scene(vec3 pos) {
  ${generator.generateCode().split('\n').join('\n  ')}
  return ${result};
}`;
    }
    case 'mandelbulb':
      return `float scene(vec3 pos) {
  return mandelbulb(pos, fractalPower());
}`;
    case 'box-mesh':
      return `float scene(vec3 pos) {
  float d = 1e30;
  for (int i = 0; i + ${FLOATS_PER_TRIANGLE - 1} < TRI_FLOATS; i += ${FLOATS_PER_TRIANGLE}) {
    vec3 a = vec3(in_tri[i], in_tri[i + 1], in_tri[i + 2]);
    vec3 b = vec3(in_tri[i + 3], in_tri[i + 4], in_tri[i + 5]);
    vec3 c = vec3(in_tri[i + 6], in_tri[i + 7], in_tri[i + 8]);
    d = min(d, sdTriangle(pos, a, b, c));
  }
  return d;
}`;
  }
}

function occlusionFunction(params: OcclusionParams): string {
  const samples = params.samples
    .map(
      ({ weight, delta }) =>
        `  contribution += ${glslFloat(weight)} * clamp(1.0 - scene(p + n * ${glslFloat(delta)}) / ${glslFloat(delta)}, 0.0, 1.0);`
    )
    .join('\n');
  const remap =
    params.kind === 'primary'
      ? `  float occl = 1.0 - contribution;
  occl = (occl - 0.29) * 3.5;
  occl = occl * occl;
  return clamp(occl, 0.0, 1.0);`
      : `  return clamp(1.0 - contribution, 0.0, 1.0);`;
  return `float ambientOcclusion(vec3 p, vec3 n) {
  float contribution = 0.0;
${samples}
${remap}
}`;
}

function defines(config: RenderConfig, options: ShaderOptions): string[] {
  const lines = [`#define SCENE_${config.scene.replace('-', '_').toUpperCase()}`];
  if (config.power.kind === 'animated') {
    lines.push('#define POWER_ANIMATED');
  } else {
    lines.push(`#define POWER ${glslFloat(config.power.value)}`);
    if (config.power.value === 8) lines.push('#define POWER_8');
  }
  lines.push(config.occlusion === 'distance' ? '#define AO_DISTANCE' : '#define AO_STEP_COUNT');
  lines.push(config.normals === 'backward' ? '#define NORMAL_BACKWARD' : '#define NORMAL_CENTRAL');
  if (config.gamma) lines.push('#define GAMMA_CORRECT');
  if (config.supersampling) lines.push('#define ADAPTIVE_SUPERSAMPLING');

  const projection = config.camera.projection;
  if (projection.kind === 'orthographic') {
    lines.push('#define PROJECTION_ORTHOGRAPHIC', `#define ORTHO_WIDTH ${glslFloat(projection.width)}`);
  } else {
    lines.push('#define PROJECTION_PERSPECTIVE', `#define CAMERA_HFOV ${glslFloat(projection.hfovDegrees)}`);
  }

  const m = config.material;
  lines.push(
    `#define DIFFUSE_COLOR ${glslVec3(...m.diffuseColor)}`,
    `#define SPECULAR_COLOR ${glslVec3(...m.specularColor)}`,
    `#define DIFFUSE_WEIGHT ${glslFloat(m.diffuseWeight)}`,
    `#define SPECULAR_WEIGHT ${glslFloat(m.specularWeight)}`,
    `#define MATERIAL_ETA ${glslFloat(m.eta)}`,
    `#define MATERIAL_K ${glslFloat(m.k)}`,
    `#define BOUNDING_RADIUS ${glslFloat(BOUNDING_RADIUS[config.scene])}`,
    `#define TRI_FLOATS ${options.triangleFloats}`
  );
  return lines;
}

const POLYTOPE_TABLE = `const vec3 POLYTOPE_NORMALS[${POLYTOPE_NORMALS.length}] = vec3[${POLYTOPE_NORMALS.length}](
${POLYTOPE_NORMALS.map((n) => `  vec3(${n.x.toFixed(8)}, ${n.y.toFixed(8)}, ${n.z.toFixed(8)})`).join(',\n')}
);`;

const DISTANCE_LIBRARY = `float sdSphere(vec3 p, float r) {
  return length(p) - r;
}

float sdTorus(vec3 p, float major, float minor) {
  vec2 q = vec2(length(p.xz) - major, p.y);
  return length(q) - minor;
}

float sdRoundedBox(vec3 p, vec3 b, float r) {
  return length(max(abs(p) - b, 0.0)) - r;
}

float sdCone(vec3 p, float angle, float h) {
  float q = length(p.xz);
  return max(dot(vec2(sin(angle), cos(angle)), vec2(q, p.y)), -h - p.y);
}

${POLYTOPE_TABLE}

float sdPolytope(vec3 p, int begin, int end, float e, float r) {
  float s = 0.0;
  for (int i = begin; i <= end; i++) {
    s += pow(abs(dot(p, POLYTOPE_NORMALS[i])), e);
  }
  return pow(s, 1.0 / e) - r;
}

float sdPolytopeMax(vec3 p, int begin, int end, float r) {
  float d = 0.0;
  for (int i = begin; i <= end; i++) {
    d = max(d, abs(dot(p, POLYTOPE_NORMALS[i])));
  }
  return d - r;
}

float smin(float a, float b, float k) {
  return min(a, b) - log(1.0 + exp(-k * abs(a - b))) / k;
}

float dot2(vec3 v) {
  return dot(v, v);
}

float sdTriangle(vec3 p, vec3 a, vec3 b, vec3 c) {
  vec3 ba = b - a; vec3 pa = p - a;
  vec3 cb = c - b; vec3 pb = p - b;
  vec3 ac = a - c; vec3 pc = p - c;
  vec3 nor = cross(ba, ac);
  if (sign(dot(cross(ba, nor), pa)) + sign(dot(cross(cb, nor), pb)) + sign(dot(cross(ac, nor), pc)) < 2.0) {
    return sqrt(min(min(
      dot2(ba * clamp(dot(ba, pa) / dot2(ba), 0.0, 1.0) - pa),
      dot2(cb * clamp(dot(cb, pb) / dot2(cb), 0.0, 1.0) - pb)),
      dot2(ac * clamp(dot(ac, pc) / dot2(ac), 0.0, 1.0) - pc)));
  }
  return sqrt(dot(nor, pa) * dot(nor, pa) / dot2(nor));
}`;

const FRACTAL_LIBRARY = `vec3 triplexPow(vec3 w, float power) {
  float r = length(w);
  if (r == 0.0) return vec3(0.0);
  float theta = acos(w.z / r) * power;
  float phi = atan(w.y, w.x) * power;
  return pow(r, power) * vec3(sin(theta) * cos(phi), sin(theta) * sin(phi), cos(theta));
}

vec3 triplexPow8(vec3 w) {
  float x = w.y; float y = w.z; float z = w.x;
  float x2 = x * x; float z2 = z * z;
  float k3 = x2 + z2;
  if (k3 == 0.0) return triplexPow(w, 8.0);
  float x4 = x2 * x2; float y2 = y * y; float y4 = y2 * y2; float z4 = z2 * z2;
  float k2 = inversesqrt(k3 * k3 * k3 * k3 * k3 * k3 * k3);
  float k1 = x4 + y4 + z4 - 6.0 * y2 * z2 - 6.0 * x2 * y2 + 2.0 * z2 * x2;
  float k4 = x2 - y2 + z2;
  float rx = 64.0 * x * y * z * (x2 - z2) * k4 * (x4 - 6.0 * x2 * z2 + z4) * k1 * k2;
  float ry = -16.0 * y2 * k3 * k4 * k4 + k1 * k1;
  float rz = -8.0 * y * k4 * (x4 * x4 - 28.0 * x4 * x2 * z2 + 70.0 * x4 * z4 - 28.0 * x2 * z2 * z4 + z4 * z4) * k1 * k2;
  return vec3(rz, rx, ry);
}

float mandelbulb(vec3 p, float power) {
  vec3 c = p.xzy;
  vec3 w = c;
  float dr = 1.0;
  float r = 0.0;
  for (int i = 0; i < ${FRACTAL_MAX_ITERATIONS}; i++) {
    r = length(w);
    if (r > ${glslFloat(FRACTAL_BAILOUT)}) break;
    dr = power * pow(r, power - 1.0) * dr + 1.0;
#ifdef POWER_8
    w = triplexPow8(w) + c;
#else
    w = triplexPow(w, power) + c;
#endif
  }
  if (r == 0.0) return 0.0;
  return 0.5 * log(r) * r / dr;
}

float fractalPower() {
#ifdef POWER_ANIMATED
  float tri = 1.0 - abs(mod(in_time / ${glslFloat(ANIMATED_POWER_HALF_PERIOD)}, 2.0) - 1.0);
  return ${glslFloat(ANIMATED_POWER_MIN)} + ${glslFloat(ANIMATED_POWER_MAX - ANIMATED_POWER_MIN)} * tri;
#else
  return POWER;
#endif
}`;

const PIPELINE = `bool sphereTrace(vec3 ro, vec3 rd, out vec3 pos, out float stepGradient) {
  float b = dot(ro, rd);
  float c = dot(ro, ro) - BOUNDING_RADIUS * BOUNDING_RADIUS;
  float disc = b * b - c;
  if (disc < 0.0) return false;
  float root = sqrt(disc);
  float tExit = -b + root;
  if (tExit < 0.0) return false;
  float t = max(-b - root, 0.0);
  for (int steps = 0; steps < ${MAX_MARCH_STEPS}; steps++) {
    float d = scene(ro + rd * t);
    t += d;
    if (t > tExit) return false;
    if (d < ${glslFloat(HIT_EPSILON)}) {
      pos = ro + rd * t;
      stepGradient = 1.0 - float(steps) / ${glslFloat(MAX_MARCH_STEPS)};
      return true;
    }
  }
  return false;
}

vec3 estimateNormal(vec3 p, vec3 rd) {
  const vec2 e = vec2(${NORMAL_EPSILON.toExponential()}, 0.0);
#ifdef NORMAL_CENTRAL
  return normalize(vec3(
    scene(p + e.xyy) - scene(p - e.xyy),
    scene(p + e.yxy) - scene(p - e.yxy),
    scene(p + e.yyx) - scene(p - e.yyx)));
#else
  p -= rd * ${glslFloat(NORMAL_BACKSTEP)};
  float d = scene(p);
  return normalize(vec3(d - scene(p - e.xyy), d - scene(p - e.yxy), d - scene(p - e.yyx)));
#endif
}

float fresnelConductor(float cosi, float eta, float k) {
  float c = clamp(cosi, 0.0, 1.0);
  float c2 = c * c;
  float etaK = eta * eta + k * k;
  float twoEtaC = 2.0 * eta * c;
  float tmp = etaK * c2;
  float rParallel = (tmp - twoEtaC + 1.0) / (tmp + twoEtaC + 1.0);
  float rPerpendicular = (etaK - twoEtaC + c2) / (etaK + twoEtaC + c2);
  return (rParallel + rPerpendicular) / 2.0;
}

float normFactor(float power) {
  return (power + 2.0) / 2.0;
}

vec3 shade(vec3 rd, vec3 n, float ao) {
  vec3 r = reflect(rd, n);
  float f = fresnelConductor(-dot(rd, n), MATERIAL_ETA, MATERIAL_K);
  vec3 col = texture(env_cos_1, n).rgb * DIFFUSE_COLOR * DIFFUSE_WEIGHT
           + texture(env_cos_8, r).rgb * SPECULAR_COLOR * normFactor(${glslFloat(SPECULAR_POWER)}) * f * SPECULAR_WEIGHT
           + texture(env_reflection, r).rgb * SPECULAR_WEIGHT * f * ${glslFloat(MIRROR_SCALE)};
  return col * ${glslFloat(EXPOSURE)} * ao;
}

vec3 sampleColor(vec2 pixel) {
  vec2 ndc = pixel / in_resolution * 2.0 - 1.0;
  float aspect = in_resolution.x / in_resolution.y;
#ifdef PROJECTION_ORTHOGRAPHIC
  vec3 ro = (in_camera * vec4(ndc.x * ORTHO_WIDTH / 2.0, ndc.y * ORTHO_WIDTH / aspect / 2.0, 0.0, 1.0)).xyz;
  vec3 rd = normalize(mat3(in_camera) * vec3(0.0, 0.0, -1.0));
#else
  float fovScale = tan(radians(CAMERA_HFOV) / 2.0);
  vec3 ro = in_camera[3].xyz;
  vec3 rd = normalize(mat3(in_camera) * vec3(ndc.x * fovScale, ndc.y * fovScale / aspect, -1.0));
#endif
  vec3 pos;
  float stepGradient;
  if (!sphereTrace(ro, rd, pos, stepGradient)) {
    return texture(env_reflection, rd).rgb;
  }
  vec3 n = estimateNormal(pos, rd);
#ifdef AO_STEP_COUNT
  float ao = stepGradient;
#else
  float ao = ambientOcclusion(pos, n);
#endif
  return shade(rd, n, ao);
}

void main() {
#ifdef ADAPTIVE_SUPERSAMPLING
  vec3 a = sampleColor(gl_FragCoord.xy + vec2(-0.25, -0.25));
  vec3 b = sampleColor(gl_FragCoord.xy + vec2(0.25, 0.25));
  vec3 diff = abs(a - b);
  vec3 col;
  if (max(diff.x, max(diff.y, diff.z)) <= ${glslFloat(SUPERSAMPLE_THRESHOLD)}) {
    col = (a + b) * 0.5;
  } else {
    col = (a + b
      + sampleColor(gl_FragCoord.xy + vec2(0.25, -0.25))
      + sampleColor(gl_FragCoord.xy + vec2(-0.25, 0.25))) * 0.25;
  }
#else
  vec3 col = sampleColor(gl_FragCoord.xy);
#endif
#ifdef GAMMA_CORRECT
  col = pow(max(col, vec3(0.0)), vec3(${glslFloat(1 / GAMMA)}));
#endif
  frag_color = vec4(clamp(col, 0.0, 1.0), 1.0);
}`;

/**
 * Fragment shader running the whole per-pixel pipeline on the GPU. The driver
 * supplies in_camera (camera to world), in_resolution, in_time, the five
 * environment cube maps and, for the box-mesh scene, in_tri.
 */
export function generateShader(config: RenderConfig, options: Partial<ShaderOptions> = {}): string {
  const resolved: ShaderOptions = { triangleFloats: 12 * FLOATS_PER_TRIANGLE, ...options };
  const occlusion = config.scene === 'mandelbulb' ? PRIMARY_OCCLUSION : ALTERNATE_OCCLUSION;

  return `#version 330 core
${defines(config, resolved).join('\n')}

uniform float in_time;
uniform vec2 in_resolution;
uniform mat4 in_camera;
uniform samplerCube env_reflection;
uniform samplerCube env_cos_1;
uniform samplerCube env_cos_8;
uniform samplerCube env_cos_64;
uniform samplerCube env_cos_512;
#ifdef SCENE_BOX_MESH
uniform float in_tri[TRI_FLOATS];
#endif
out vec4 frag_color;

${DISTANCE_LIBRARY}

${FRACTAL_LIBRARY}

${sceneFunction(config)}

${occlusionFunction(occlusion)}

${PIPELINE}
`;
}
