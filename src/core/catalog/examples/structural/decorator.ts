/**
 * Decorator: condiments wrap a coffee and add to its price and description.
 */

export interface Coffee {
  cost(): number;
  description(): string;
}

export class SimpleCoffee implements Coffee {
  cost(): number {
    return 2;
  }

  description(): string {
    return "Coffee";
  }
}

export abstract class CoffeeDecorator implements Coffee {
  constructor(protected readonly inner: Coffee) {}

  cost(): number {
    return this.inner.cost();
  }

  description(): string {
    return this.inner.description();
  }
}

export class MilkDecorator extends CoffeeDecorator {
  cost(): number {
    return super.cost() + 0.5;
  }

  description(): string {
    return `${super.description()}, milk`;
  }
}

export class SugarDecorator extends CoffeeDecorator {
  cost(): number {
    return super.cost() + 0.25;
  }

  description(): string {
    return `${super.description()}, sugar`;
  }
}

function receipt(coffee: Coffee): string {
  return `${coffee.description()}: $${coffee.cost().toFixed(2)}`;
}

export function demo(print: (line: string) => void): void {
  const plain = new SimpleCoffee();
  print(receipt(plain));
  print(receipt(new SugarDecorator(new MilkDecorator(plain))));
}
