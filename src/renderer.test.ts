import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as THREE from 'three';
import { boxMeshGeometry } from './boxmesh';
import { parseRenderConfig } from './config';
import { type EnvironmentMaps, UniformEnvironment } from './environment';
import { RenderError } from './errors';
import { FrameBuffer } from './framebuffer';
import { Renderer, type TaskProgress, renderFrame } from './renderer';

function uniformMaps(color: THREE.Color): EnvironmentMaps {
  const env = new UniformEnvironment(color);
  return { reflection: env, cos1: env, cos8: env, cos64: env, cos512: env };
}

beforeEach(() => {
  vi.spyOn(console, 'log').mockImplementation(() => {});
  vi.spyOn(console, 'error').mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe('renderFrame', () => {
  it('runs the kernel once per pixel, bottom row first', () => {
    const visited: [number, number][] = [];
    const fb = new FrameBuffer(3, 2);
    const result = renderFrame((x, y) => {
      visited.push([x, y]);
      return new THREE.Color(1, 0, 0);
    }, fb);
    expect(visited).toEqual([
      [0, 0],
      [1, 0],
      [2, 0],
      [0, 1],
      [1, 1],
      [2, 1],
    ]);
    expect(result).toMatchObject({ taskId: 'frame', width: 3, height: 2 });
    expect(fb.getPixel(2, 1)).toEqual([255, 0, 0, 255]);
  });

  it('reports progress per row band', () => {
    const updates: TaskProgress[] = [];
    renderFrame(() => new THREE.Color(0, 0, 0), new FrameBuffer(1, 4), {
      taskId: 'bands',
      progressRows: 2,
      onProgress: (progress) => updates.push(progress),
    });
    expect(updates.map(({ status, progress }) => [status, progress])).toEqual([
      ['running', 0],
      ['running', 0.5],
      ['completed', 1],
    ]);
    expect(updates.every((update) => update.taskId === 'bands' && update.type === 'frame')).toBe(true);
  });

  it('reports a failing kernel and rethrows', () => {
    const updates: TaskProgress[] = [];
    expect(() =>
      renderFrame(
        () => {
          throw new Error('kernel exploded');
        },
        new FrameBuffer(1, 1),
        { onProgress: (progress) => updates.push(progress) }
      )
    ).toThrow('kernel exploded');
    expect(updates[updates.length - 1]).toEqual({
      taskId: 'frame',
      type: 'frame',
      progress: 0,
      status: 'failed',
      error: 'kernel exploded',
    });
  });

  it('returns null when the frame buffer is already mapped', () => {
    const fb = new FrameBuffer(1, 1);
    const updates: TaskProgress[] = [];
    const result = fb.fill(() =>
      renderFrame(() => new THREE.Color(1, 1, 1), fb, { onProgress: (progress) => updates.push(progress) })
    );
    expect(result).toBeNull();
    expect(updates[updates.length - 1].status).toBe('failed');
    expect(updates[updates.length - 1].error).toBe('frame buffer mapping failed');
  });
});

describe('Renderer', () => {
  const config = parseRenderConfig({
    scene: 'box-mesh',
    camera: { eye: [0, 0, 3], projection: { kind: 'orthographic', width: 4 } },
  });
  const environment = uniformMaps(new THREE.Color(0.5, 0.5, 0.5));

  it('renders numbered frames and notifies listeners', () => {
    const renderer = new Renderer(config, environment, 4, 4, boxMeshGeometry());
    const statuses: string[] = [];
    const unsubscribe = renderer.onProgress((progress) => statuses.push(`${progress.taskId}:${progress.status}`));

    expect(renderer.render(0)).toMatchObject({ taskId: 'frame-1', width: 4, height: 4 });
    unsubscribe();
    expect(renderer.render(0).taskId).toBe('frame-2');
    expect(statuses).toEqual(['frame-1:running', 'frame-1:completed']);
  });

  it('fills the corners with the environment', () => {
    const renderer = new Renderer(config, environment, 4, 4, boxMeshGeometry());
    renderer.render(0);
    const gray = Math.round(Math.pow(0.5, 1 / 2.2) * 255);
    expect(renderer.framebuffer.getPixel(0, 0)).toEqual([gray, gray, gray, 255]);
  });

  it('renders at the new size after a resize', () => {
    const renderer = new Renderer(config, environment, 4, 4, boxMeshGeometry());
    renderer.resize(2, 3);
    expect(renderer.render(0)).toMatchObject({ width: 2, height: 3 });
  });

  it('fails without box geometry', () => {
    const renderer = new Renderer(config, environment, 4, 4);
    expect(() => renderer.render(0)).toThrow(RenderError);
  });
});
