/**
 * Composite: single dots and groups of graphics share one interface.
 */

export interface Graphic {
  move(dx: number, dy: number): void;
  draw(): string;
}

export class Dot implements Graphic {
  constructor(
    private x: number,
    private y: number
  ) {}

  move(dx: number, dy: number): void {
    this.x += dx;
    this.y += dy;
  }

  draw(): string {
    return `Dot(${this.x}, ${this.y})`;
  }
}

export class CompoundGraphic implements Graphic {
  private readonly children: Graphic[] = [];

  add(child: Graphic): this {
    this.children.push(child);
    return this;
  }

  remove(child: Graphic): void {
    const index = this.children.indexOf(child);
    if (index >= 0) {
      this.children.splice(index, 1);
    }
  }

  move(dx: number, dy: number): void {
    for (const child of this.children) {
      child.move(dx, dy);
    }
  }

  draw(): string {
    return `Compound(${this.children.map((child) => child.draw()).join(", ")})`;
  }
}

export function demo(print: (line: string) => void): void {
  const group = new CompoundGraphic().add(new Dot(5, 5)).add(new Dot(7, 8));
  const scene = new CompoundGraphic().add(new Dot(1, 2)).add(group);

  print(scene.draw());
  scene.move(1, 1);
  print(scene.draw());
}
