// Market price floor and the 2025-26 market price cap in $/MWh. The cap is
// re-indexed every July; both bounds are informational and never applied.
export const MARKET_PRICE_FLOOR_DOLLARS_PER_MWH = -1_000;
export const MARKET_PRICE_CAP_DOLLARS_PER_MWH = 20_300;

export class EnergyPrice {
  private readonly _dollarsPerMwh: number;

  private constructor(dollarsPerMwh: number) {
    if (!Number.isFinite(dollarsPerMwh)) {
      throw new TypeError("EnergyPrice requires a finite numeric value in $/MWh");
    }
    this._dollarsPerMwh = dollarsPerMwh;
  }

  static fromDollarsPerMwh(value: number): EnergyPrice {
    return new EnergyPrice(value);
  }

  get dollarsPerMwh(): number {
    return this._dollarsPerMwh;
  }

  get dollarsPerKwh(): number {
    return this._dollarsPerMwh / 1000;
  }

  get centsPerKwh(): number {
    return this._dollarsPerMwh / 10;
  }

  isNegative(): boolean {
    return this._dollarsPerMwh < 0;
  }

  withinMarketBounds(): boolean {
    return (
      this._dollarsPerMwh >= MARKET_PRICE_FLOOR_DOLLARS_PER_MWH &&
      this._dollarsPerMwh <= MARKET_PRICE_CAP_DOLLARS_PER_MWH
    );
  }
}
