import type { EnergyPrice, RegionCode, SpikeInfo } from "@nemcast/domain";

export const SPIKE_MIN_SAMPLES = 3;
export const SPIKE_RATIO_THRESHOLD = 2;
export const SPIKE_MAGNITUDE_THRESHOLD_DOLLARS_PER_MWH = 20;

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

/**
 * Compares the newest realtime price against the mean of the ones before it.
 * `recent` is ordered oldest first; all figures are in $/MWh.
 */
export function assessSpike(region: RegionCode, recent: readonly EnergyPrice[]): SpikeInfo {
  const latest = recent.at(-1);
  if (!latest) {
    return {
      region,
      is_spike: false,
      is_negative: false,
      spike_ratio: 1,
      spike_magnitude: 0,
      current_price: null,
      avg_price: null,
      samples: 0,
    };
  }

  const current = latest.dollarsPerMwh;
  if (recent.length < SPIKE_MIN_SAMPLES) {
    return {
      region,
      is_spike: false,
      is_negative: latest.isNegative(),
      spike_ratio: 1,
      spike_magnitude: 0,
      current_price: current,
      avg_price: current,
      samples: recent.length,
    };
  }

  const previous = recent.slice(0, -1);
  const average = previous.reduce((sum, price) => sum + price.dollarsPerMwh, 0) / previous.length;
  const ratio = average !== 0 ? current / average : 1;
  const magnitude = current - average;
  return {
    region,
    is_spike: ratio > SPIKE_RATIO_THRESHOLD && magnitude > SPIKE_MAGNITUDE_THRESHOLD_DOLLARS_PER_MWH,
    is_negative: latest.isNegative(),
    spike_ratio: round2(ratio),
    spike_magnitude: round2(magnitude),
    current_price: current,
    avg_price: round2(average),
    samples: recent.length,
  };
}
