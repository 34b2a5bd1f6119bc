/* =========================================================
   Linear rescaling of statistic values onto a target range
   ========================================================= */

import { makeError } from "../../../engine/errors/index.js";

/**
 * Affine map of `value` from [dataLow, dataHigh] onto [targetLow, targetHigh],
 * orientation preserved, measured back from the high end:
 *
 *   targetHigh - (targetHigh - targetLow) * (dataHigh - value) / (dataHigh - dataLow)
 *
 * Integers map onto themselves when the two ranges are equal. `dataLow` is
 * pinned to `targetLow`, which the subtraction can miss by an ulp.
 */
export function scale(
  value: number,
  dataLow: number,
  dataHigh: number,
  targetLow: number,
  targetHigh: number
): number {
  const span = dataHigh - dataLow;
  if (span === 0 || !Number.isFinite(span)) {
    throw makeError("Config", `Cannot scale from a degenerate range [${dataLow}, ${dataHigh}]`, undefined, {
      dataLow,
      dataHigh,
    });
  }
  if (value === dataLow) return targetLow;
  return targetHigh - ((targetHigh - targetLow) * (dataHigh - value)) / span;
}

export function scaleSeries(
  values: readonly number[],
  dataLow: number,
  dataHigh: number,
  targetLow: number,
  targetHigh: number
): number[] {
  return values.map((v) => scale(v, dataLow, dataHigh, targetLow, targetHigh));
}
