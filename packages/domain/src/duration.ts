export class Duration {
  private readonly _milliseconds: number;

  private constructor(milliseconds: number) {
    if (!Number.isFinite(milliseconds) || milliseconds < 0) {
      throw new RangeError("Duration requires a finite, non-negative number of milliseconds");
    }
    this._milliseconds = milliseconds;
  }

  static fromMilliseconds(value: number): Duration {
    return new Duration(value);
  }

  static fromSeconds(value: number): Duration {
    return new Duration(value * 1000);
  }

  get milliseconds(): number {
    return this._milliseconds;
  }

  times(factor: number): Duration {
    return new Duration(this._milliseconds * factor);
  }

  min(other: Duration): Duration {
    return other._milliseconds < this._milliseconds ? other : this;
  }
}
