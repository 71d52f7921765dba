/**
 * Prototype: shapes copy themselves, and a registry hands out copies.
 */

export interface Prototype<T> {
  clone(): T;
}

export abstract class Shape implements Prototype<Shape> {
  constructor(
    public x: number,
    public y: number,
    public color: string
  ) {}

  abstract clone(): Shape;

  abstract describe(): string;
}

export class Circle extends Shape {
  constructor(x: number, y: number, color: string, public radius: number) {
    super(x, y, color);
  }

  clone(): Circle {
    return new Circle(this.x, this.y, this.color, this.radius);
  }

  describe(): string {
    return `${this.color} circle r=${this.radius} at (${this.x}, ${this.y})`;
  }
}

export class Rectangle extends Shape {
  constructor(x: number, y: number, color: string, public width: number, public height: number) {
    super(x, y, color);
  }

  clone(): Rectangle {
    return new Rectangle(this.x, this.y, this.color, this.width, this.height);
  }

  describe(): string {
    return `${this.color} rectangle ${this.width}x${this.height} at (${this.x}, ${this.y})`;
  }
}

export class ShapeRegistry {
  private readonly prototypes = new Map<string, Shape>();

  register(key: string, shape: Shape): void {
    this.prototypes.set(key, shape);
  }

  get(key: string): Shape | undefined {
    return this.prototypes.get(key)?.clone();
  }
}

export function demo(print: (line: string) => void): void {
  const original = new Circle(5, 5, "red", 10);
  const copy = original.clone();
  print(`Clone equals original: ${copy === original}`);
  print(`Clone: ${copy.describe()}`);

  const registry = new ShapeRegistry();
  registry.register("tile", new Rectangle(0, 0, "blue", 3, 4));
  print(`Registry: ${registry.get("tile")?.describe() ?? "missing"}`);
}
