/**
 * Adapter: square pegs made to fit a round hole.
 */

export class RoundPeg {
  constructor(private readonly radius: number) {}

  getRadius(): number {
    return this.radius;
  }
}

export class RoundHole {
  constructor(private readonly radius: number) {}

  fits(peg: RoundPeg): boolean {
    return this.radius >= peg.getRadius();
  }
}

export class SquarePeg {
  constructor(private readonly width: number) {}

  getWidth(): number {
    return this.width;
  }
}

export class SquarePegAdapter extends RoundPeg {
  constructor(private readonly peg: SquarePeg) {
    super(0);
  }

  getRadius(): number {
    return (this.peg.getWidth() * Math.sqrt(2)) / 2;
  }
}

export function demo(print: (line: string) => void): void {
  const hole = new RoundHole(5);
  print(`Round peg r=5 fits: ${hole.fits(new RoundPeg(5))}`);

  for (const width of [5, 10]) {
    const adapter = new SquarePegAdapter(new SquarePeg(width));
    print(`Square peg w=${width} fits: ${hole.fits(adapter)}`);
  }
}
