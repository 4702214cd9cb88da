function mod(value: number, divisor: number): number {
  return ((value % divisor) + divisor) % divisor;
}

function roundLowToMultiple(low: number, multipleOf: number): number {
  return Number.isFinite(low) ? low + mod(-low, multipleOf) : low;
}

function roundHighToMultiple(high: number, multipleOf: number): number {
  return Number.isFinite(high) ? high - mod(high, multipleOf) : high;
}

/**
 * An inclusive range of party sizes, optionally restricted to multiples of a step.
 *
 * Open ends are `-Infinity` / `Infinity`. Finite bounds are rounded inwards to the step on
 * construction, so `new PlayerRange(3, 8, 2)` covers 4, 6 and 8.
 */
export class PlayerRange {
  readonly low: number;
  readonly high: number;
  readonly multipleOf: number;

  constructor(low: number, high: number, multipleOf = 1) {
    if (!Number.isInteger(multipleOf) || multipleOf < 1) {
      throw new Error(`Invalid player range step: ${multipleOf}`);
    }
    this.multipleOf = multipleOf;
    this.low = roundLowToMultiple(low, multipleOf);
    this.high = roundHighToMultiple(high, multipleOf);
  }

  static exactly(count: number): PlayerRange {
    return new PlayerRange(count, count);
  }

  static atLeast(count: number, multipleOf = 1): PlayerRange {
    return new PlayerRange(count, Infinity, multipleOf);
  }

  isEmpty(): boolean {
    return this.low > this.high;
  }

  has(count: number): boolean {
    return this.low <= count && count <= this.high && mod(count, this.multipleOf) === 0;
  }

  /** Clamps to the implicit bounds and drops whichever bound is implied by them. */
  simplified(implicitLow: number, implicitHigh: number): PlayerRange {
    const roundedLow = roundLowToMultiple(implicitLow, this.multipleOf);
    const roundedHigh = roundHighToMultiple(implicitHigh, this.multipleOf);

    const low = Math.max(this.low, roundedLow);
    const high = Math.min(this.high, roundedHigh);

    if (low >= high) {
      // empty, or a single count
      return new PlayerRange(low, high);
    }

    return new PlayerRange(
      low === roundedLow ? -Infinity : low,
      high === roundedHigh ? Infinity : high,
      this.multipleOf,
    );
  }

  toString(): string {
    if (this.isEmpty()) {
      return "none";
    }

    let text: string;
    if (this.low === -Infinity) {
      text = this.high === Infinity ? "any" : `up to ${this.high}`;
    } else if (this.high === Infinity) {
      text = `${this.low}+`;
    } else if (this.low === this.high) {
      return `${this.low}`;
    } else {
      text = `${this.low}..${this.high}`;
    }

    if (this.multipleOf === 1) {
      return text;
    }
    if (this.multipleOf === 2) {
      return `${text} even`;
    }
    return `${text} multiple of ${this.multipleOf}`;
  }
}
