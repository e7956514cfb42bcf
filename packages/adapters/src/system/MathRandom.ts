import type { IRandom } from "@smileys/contracts";

export class MathRandom implements IRandom {
  private source: () => number;

  constructor(source: () => number = Math.random) {
    this.source = source;
  }

  uniform(n: number): number {
    if (n <= 0) return 0;
    return Math.floor(this.source() * Math.floor(n));
  }
}
