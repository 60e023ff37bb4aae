import { boxMeshGeometry } from './boxmesh';
import { type RenderConfig, loadRenderConfig, parseRenderConfig, sceneKindSchema } from './config';
import { SkyEnvironment, createEnvironmentMaps } from './environment';
import { ConfigError } from './errors';
import { Renderer } from './renderer';

const USAGE = 'Usage: tsx src/cli.ts <scene> <width> <height> <time> <output.png> [config.json]';

function parseDimension(value: string | undefined, name: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n <= 0) {
    throw new Error(`${name} must be a positive integer, got ${value}`);
  }
  return n;
}

const [sceneArg, widthArg, heightArg, timeArg, output, configFile] = process.argv.slice(2);
if (!sceneArg || !output) {
  console.error(USAGE);
  process.exit(1);
}

try {
  const parsedScene = sceneKindSchema.safeParse(sceneArg);
  if (!parsedScene.success) {
    throw new ConfigError(`Unknown scene '${sceneArg}', expected one of ${sceneKindSchema.options.join(', ')}`);
  }
  const scene = parsedScene.data;
  const width = parseDimension(widthArg, 'width');
  const height = parseDimension(heightArg, 'height');
  const time = Number(timeArg);
  if (!Number.isFinite(time)) {
    throw new Error(`time must be a number of seconds, got ${timeArg}`);
  }

  const base: RenderConfig = configFile ? loadRenderConfig(configFile) : parseRenderConfig({});
  const config: RenderConfig = { ...base, scene };

  console.log(`[CLI] Building environment maps`);
  const environment = createEnvironmentMaps(new SkyEnvironment());
  const geometry = scene === 'box-mesh' ? boxMeshGeometry() : undefined;

  const renderer = new Renderer(config, environment, width, height, geometry);
  renderer.onProgress((progress) => {
    if (progress.status === 'running' && progress.progress > 0) {
      console.log(`[CLI] ${progress.taskId}: ${Math.round(progress.progress * 100)}%`);
    }
  });
  renderer.render(time);
  renderer.screenshot(output);
} catch (e) {
  if (e instanceof Error) {
    console.error(`[CLI] ${e.message}`);
    process.exit(1);
  }
  throw e;
}
