/**
 * Factory Method: subclasses decide which transport a delivery plan uses.
 */

export interface Transport {
  deliver(): string;
}

export class Truck implements Transport {
  deliver(): string {
    return "Truck delivers by road in a box";
  }
}

export class Ship implements Transport {
  deliver(): string {
    return "Ship delivers by sea in a container";
  }
}

export abstract class Logistics {
  protected abstract createTransport(): Transport;

  planDelivery(): string {
    const transport = this.createTransport();
    return transport.deliver();
  }
}

export class RoadLogistics extends Logistics {
  protected createTransport(): Transport {
    return new Truck();
  }
}

export class SeaLogistics extends Logistics {
  protected createTransport(): Transport {
    return new Ship();
  }
}

export function demo(print: (line: string) => void): void {
  const plans: Logistics[] = [new RoadLogistics(), new SeaLogistics()];
  for (const logistics of plans) {
    print(logistics.planDelivery());
  }
}
