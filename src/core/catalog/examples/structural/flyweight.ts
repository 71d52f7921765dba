/**
 * Flyweight: thousands of trees share a handful of tree types.
 */

export class TreeType {
  constructor(
    readonly name: string,
    readonly color: string,
    readonly texture: string
  ) {}

  draw(x: number, y: number): string {
    return `${this.color} ${this.name} at (${x}, ${y})`;
  }
}

export class TreeFactory {
  private static readonly types = new Map<string, TreeType>();

  static getTreeType(name: string, color: string, texture: string): TreeType {
    const key = `${name}:${color}:${texture}`;
    let type = TreeFactory.types.get(key);
    if (!type) {
      type = new TreeType(name, color, texture);
      TreeFactory.types.set(key, type);
    }
    return type;
  }

  static count(): number {
    return TreeFactory.types.size;
  }

  static reset(): void {
    TreeFactory.types.clear();
  }
}

export class Tree {
  constructor(
    private readonly x: number,
    private readonly y: number,
    private readonly type: TreeType
  ) {}

  draw(): string {
    return this.type.draw(this.x, this.y);
  }
}

export class Forest {
  private readonly trees: Tree[] = [];

  plantTree(x: number, y: number, name: string, color: string, texture: string): void {
    this.trees.push(new Tree(x, y, TreeFactory.getTreeType(name, color, texture)));
  }

  size(): number {
    return this.trees.length;
  }
}

export function demo(print: (line: string) => void): void {
  TreeFactory.reset();
  const forest = new Forest();
  for (let i = 0; i < 3; i++) {
    forest.plantTree(i, i * 2, "oak", "green", "rough");
    forest.plantTree(i * 3, i, "birch", "white", "smooth");
  }

  print(`Trees planted: ${forest.size()}`);
  print(`Tree types: ${TreeFactory.count()}`);
}
