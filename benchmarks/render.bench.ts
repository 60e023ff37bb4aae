import { describe, bench } from 'vitest'
import * as THREE from 'three'
import { boxMeshGeometry } from '../src/boxmesh'
import { parseRenderConfig } from '../src/config'
import { SkyEnvironment, createEnvironmentMaps } from '../src/environment'
import { mandelbulbDistance, triplexPow, triplexPow8 } from '../src/fractal'
import { FrameBuffer } from '../src/framebuffer'
import { createKernel } from '../src/kernel'
import { renderFrame } from '../src/renderer'

const environment = createEnvironmentMaps(new SkyEnvironment(), { reflectionSize: 16, irradianceSize: 4, sourceSize: 8 })
const resolution = { width: 32, height: 32 }

describe('Fractal Benchmarks', () => {
  const w = new THREE.Vector3(0.3, -0.5, 0.6)
  const target = new THREE.Vector3()

  bench('triplexPow8', () => {
    triplexPow8(w, target)
  })

  bench('triplexPow(w, 8)', () => {
    triplexPow(w, 8, target)
  })

  bench('distance estimate near the surface', () => {
    mandelbulbDistance(new THREE.Vector3(0, 0, 1.2), 8)
  })
})

describe('Frame Benchmarks', () => {
  bench('render mandelbulb 32x32', () => {
    const kernel = createKernel(parseRenderConfig({}), { time: 0, resolution, environment })
    renderFrame(kernel, new FrameBuffer(resolution.width, resolution.height))
  })

  bench('render primitive scene 32x32 with supersampling', () => {
    const config = parseRenderConfig({ scene: 'primitive-csg', supersampling: true })
    const kernel = createKernel(config, { time: 0, resolution, environment })
    renderFrame(kernel, new FrameBuffer(resolution.width, resolution.height))
  })

  bench('render box mesh 32x32', () => {
    const config = parseRenderConfig({ scene: 'box-mesh' })
    const kernel = createKernel(config, { time: 0, resolution, environment, geometry: boxMeshGeometry() })
    renderFrame(kernel, new FrameBuffer(resolution.width, resolution.height))
  })
})
