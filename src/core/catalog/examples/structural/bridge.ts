/**
 * Bridge: shapes and colors vary independently.
 */

export interface Color {
  fill(): string;
}

export class Red implements Color {
  fill(): string {
    return "red";
  }
}

export class Blue implements Color {
  fill(): string {
    return "blue";
  }
}

export abstract class Shape {
  constructor(protected readonly color: Color) {}

  abstract draw(): string;
}

export class Circle extends Shape {
  draw(): string {
    return `Circle filled with ${this.color.fill()}`;
  }
}

export class Square extends Shape {
  draw(): string {
    return `Square filled with ${this.color.fill()}`;
  }
}

export function demo(print: (line: string) => void): void {
  const shapes: Shape[] = [new Circle(new Red()), new Square(new Blue())];
  for (const shape of shapes) {
    print(shape.draw());
  }
}
