/**
 * Abstract Factory: each factory produces a matching family of furniture.
 */

export interface Chair {
  style(): string;
}

export interface Sofa {
  style(): string;
}

export interface FurnitureFactory {
  createChair(): Chair;
  createSofa(): Sofa;
}

class VictorianChair implements Chair {
  style(): string {
    return "Victorian chair";
  }
}

class VictorianSofa implements Sofa {
  style(): string {
    return "Victorian sofa";
  }
}

class ModernChair implements Chair {
  style(): string {
    return "Modern chair";
  }
}

class ModernSofa implements Sofa {
  style(): string {
    return "Modern sofa";
  }
}

export class VictorianFurnitureFactory implements FurnitureFactory {
  createChair(): Chair {
    return new VictorianChair();
  }

  createSofa(): Sofa {
    return new VictorianSofa();
  }
}

export class ModernFurnitureFactory implements FurnitureFactory {
  createChair(): Chair {
    return new ModernChair();
  }

  createSofa(): Sofa {
    return new ModernSofa();
  }
}

function furnishRoom(factory: FurnitureFactory): string {
  return `${factory.createChair().style()} with a ${factory.createSofa().style()}`;
}

export function demo(print: (line: string) => void): void {
  print(furnishRoom(new VictorianFurnitureFactory()));
  print(furnishRoom(new ModernFurnitureFactory()));
}
