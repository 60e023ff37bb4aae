/**
 * GLSL float literal; integers get a trailing ".0" so they aren't read as ints.
 */
export function glslFloat(n: number): string {
  if (n === Infinity) return '1e30';
  if (n === -Infinity) return '-1e30';
  return Number.isInteger(n) ? `${n}.0` : n.toString();
}

export function glslVec3(x: number, y: number, z: number): string {
  return `vec3(${glslFloat(x)}, ${glslFloat(y)}, ${glslFloat(z)})`;
}

/**
 * Collects single-assignment statements; each saved expression gets its own
 * variable.
 */
export class GLSLGenerator {
  private varCounter = 0;
  private statements: string[] = [];

  freshVar(): string {
    return `var${++this.varCounter}`;
  }

  save(expr: string, type: 'float' | 'vec3'): string {
    const varName = this.freshVar();
    this.statements.push(`${type} ${varName} = ${expr};`);
    return varName;
  }

  generateCode(): string {
    return this.statements.join('\n');
  }
}

export class GLSLContext {
  private readonly currentPoint: string;

  constructor(
    public readonly generator: GLSLGenerator,
    initialPoint: string = 'pos'
  ) {
    this.currentPoint = initialPoint;
  }

  withPoint(point: string): GLSLContext {
    return new GLSLContext(this.generator, point);
  }

  getPoint(): string {
    return this.currentPoint;
  }

  // Context whose point is the current one moved into a child placed at (dx, dy, dz)
  translate(dx: number, dy: number, dz: number): GLSLContext {
    const newPoint = this.generator.save(`${this.currentPoint} - ${glslVec3(dx, dy, dz)}`, 'vec3');
    return this.withPoint(newPoint);
  }

  // Stores a distance computed at the current point
  distance(expr: (point: string) => string): string {
    return this.generator.save(expr(this.currentPoint), 'float');
  }
}
