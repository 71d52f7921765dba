/**
 * Builder: a house assembled step by step, with a director for common plans.
 */

export class House {
  constructor(
    readonly walls: number,
    readonly roof: string,
    readonly hasGarage: boolean
  ) {}

  describe(): string {
    const garage = this.hasGarage ? "a garage" : "no garage";
    return `House with ${this.walls} walls, a ${this.roof} roof and ${garage}`;
  }
}

export class HouseBuilder {
  private walls = 0;
  private roof = "flat";
  private garage = false;

  withWalls(count: number): this {
    this.walls = count;
    return this;
  }

  withRoof(style: string): this {
    this.roof = style;
    return this;
  }

  withGarage(): this {
    this.garage = true;
    return this;
  }

  build(): House {
    return new House(this.walls, this.roof, this.garage);
  }
}

export class HouseDirector {
  constructFamilyHome(builder: HouseBuilder): House {
    return builder.withWalls(4).withRoof("gabled").withGarage().build();
  }

  constructCabin(builder: HouseBuilder): House {
    return builder.withWalls(4).build();
  }
}

export function demo(print: (line: string) => void): void {
  const director = new HouseDirector();
  print(director.constructFamilyHome(new HouseBuilder()).describe());
  print(director.constructCabin(new HouseBuilder()).describe());
}
