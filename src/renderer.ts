import type { RenderConfig } from './config';
import type { EnvironmentMaps } from './environment';
import { RenderError } from './errors';
import { FrameBuffer, packColor } from './framebuffer';
import { type PixelKernel, createKernel } from './kernel';
import { savePNG } from './pngexporter';

export interface TaskProgress {
  taskId: string;
  type: 'frame';
  progress: number;
  status: 'queued' | 'running' | 'completed' | 'failed';
  error?: string;
}

export interface RenderResult {
  taskId: string;
  width: number;
  height: number;
  elapsedMs: number;
}

export interface RenderFrameOptions {
  taskId?: string;
  // Rows rendered between progress reports
  progressRows?: number;
  onProgress?: (progress: TaskProgress) => void;
}

/**
 * Runs the kernel once for every pixel of the frame buffer, bottom row first.
 * Returns null when the frame buffer can't be mapped.
 */
export function renderFrame(
  kernel: PixelKernel,
  framebuffer: FrameBuffer,
  options: RenderFrameOptions = {}
): RenderResult | null {
  const taskId = options.taskId ?? 'frame';
  const progressRows = Math.max(1, options.progressRows ?? 16);
  const report = (progress: number, status: TaskProgress['status'], error?: string) =>
    options.onProgress?.({ taskId, type: 'frame', progress, status, error });

  const start = performance.now();
  report(0, 'running');
  let rendered: boolean | null;
  try {
    rendered = framebuffer.fill((width, height, pixels) => {
      for (let y = 0; y < height; y++) {
        for (let x = 0; x < width; x++) {
          pixels[y * width + x] = packColor(kernel(x, y));
        }
        if ((y + 1) % progressRows === 0 && y + 1 < height) {
          report((y + 1) / height, 'running');
        }
      }
      return true;
    });
  } catch (e) {
    report(0, 'failed', e instanceof Error ? e.message : 'Unknown error');
    throw e;
  }

  if (rendered === null) {
    report(0, 'failed', 'frame buffer mapping failed');
    return null;
  }
  report(1, 'completed');
  return {
    taskId,
    width: framebuffer.width,
    height: framebuffer.height,
    elapsedMs: performance.now() - start,
  };
}

/**
 * Owns the frame buffer and the frame-invariant inputs; builds a fresh kernel
 * for every frame from the elapsed time.
 */
export class Renderer {
  readonly framebuffer: FrameBuffer;
  private frameCounter = 0;
  private listeners = new Set<(progress: TaskProgress) => void>();

  constructor(
    private readonly config: RenderConfig,
    private readonly environment: EnvironmentMaps,
    width: number,
    height: number,
    private readonly geometry?: ArrayLike<number>
  ) {
    this.framebuffer = new FrameBuffer(width, height);
  }

  onProgress(callback: (progress: TaskProgress) => void) {
    this.listeners.add(callback);
    return () => this.listeners.delete(callback);
  }

  resize(width: number, height: number) {
    this.framebuffer.resize(width, height);
  }

  render(time: number): RenderResult {
    const { width, height } = this.framebuffer;
    const kernel = createKernel(this.config, {
      time,
      resolution: { width, height },
      environment: this.environment,
      geometry: this.geometry,
    });
    const taskId = `frame-${++this.frameCounter}`;
    console.log(`[Renderer] ${taskId}: ${this.config.scene} at ${width}x${height}, t=${time.toFixed(2)}s`);

    const result = renderFrame(kernel, this.framebuffer, {
      taskId,
      onProgress: (progress) => this.listeners.forEach((listener) => listener(progress)),
    });
    if (!result) {
      throw new RenderError(`${taskId}: frame buffer mapping failed`);
    }
    console.log(`[Renderer] ${taskId} done in ${result.elapsedMs.toFixed(0)} ms`);
    return result;
  }

  screenshot(filename: string) {
    savePNG(this.framebuffer, filename);
  }
}
