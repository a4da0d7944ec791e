/**
 * ReportCalc – Extra calculations plugin
 *
 * Opt-in lighting-report helpers. Like the built-ins, every function returns
 * a fallback string instead of throwing.
 *
 *   const registries = applyPlugins(createDefaultRegistries(), extraCalculationsPlugin);
 *
 * License: Apache-2.0
 */

import type { CalculationFunction } from '../calculator/functions';
import { toFixed } from '../core/format';
import { toNumeric } from '../utils/numbers';
import { displayString, toDecimalPlaces } from './calculations';
import type { Plugin } from './index';

function ratio(numerator: unknown, denominator: unknown): number | null {
  if (!denominator) return null;

  const top = toNumeric(numerator);
  const bottom = toNumeric(denominator);
  if (top === null || bottom === null || bottom === 0) return null;

  return top / bottom;
}

/** Luminous efficacy in lm/W, one decimal. */
export function lumenPerWatt(lumen: unknown, watt: unknown): string {
  const value = ratio(lumen, watt);
  return value === null ? '0.0' : toFixed(value, 1);
}

/** Active over apparent power, two decimals. */
export function powerFactor(activePower: unknown, apparentPower: unknown): string {
  const value = ratio(activePower, apparentPower);
  return value === null ? '0.00' : toFixed(value, 2);
}

export function formatWithUnit(value: unknown, unit: unknown, decimals: unknown = 2): string {
  const num = toNumeric(value);
  const places = toDecimalPlaces(decimals);
  const suffix = displayString(unit);

  if (num === null || places === null) return `${displayString(value)} ${suffix}`;
  return `${toFixed(num, places)} ${suffix}`;
}

/**
 * Signed deviation of the measured colour temperature from the rated one,
 * in percent: "+2.5%", "-1.0%".
 */
export function cctDeviation(measured: unknown, rated: unknown): string {
  if (!rated) return '0.0%';

  const actual = toNumeric(measured);
  const nominal = toNumeric(rated);
  if (actual === null || nominal === null || nominal === 0) return '0.0%';

  const deviation = ((actual - nominal) / nominal) * 100;
  return `${deviation > 0 ? '+' : ''}${toFixed(deviation, 1)}%`;
}

export function average(...values: unknown[]): string {
  const present = values.filter((value) => value !== null && value !== undefined);
  if (present.length === 0) return '0.00';

  let total = 0;
  for (const value of present) {
    const num = toNumeric(value);
    if (num === null) return '0.00';
    total += num;
  }
  return toFixed(total / present.length, 2);
}

export function checkPassFail(value: unknown, minLimit: unknown, maxLimit: unknown): string {
  const measured = toNumeric(value);
  const min = toNumeric(minLimit);
  const max = toNumeric(maxLimit);
  if (measured === null || min === null || max === null) return 'N/A';

  return min <= measured && measured <= max ? 'Pass' : 'Fail';
}

/**
 * Average intensity in cd over a cone of `angleDegrees`:
 * I = Φ / Ω with Ω = 2π(1 − cos(θ/2)).
 */
export function luminousIntensity(flux: unknown, angleDegrees: unknown): string {
  const lumens = toNumeric(flux);
  const angle = toNumeric(angleDegrees);
  if (lumens === null || angle === null || !(angle > 0 && angle <= 360)) return '0.0';

  const halfAngle = ((angle / 2) * Math.PI) / 180;
  const solidAngle = 2 * Math.PI * (1 - Math.cos(halfAngle));
  if (solidAngle === 0) return '0.0';

  return toFixed(lumens / solidAngle, 1);
}

export const EXTRA_CALCULATIONS: ReadonlyArray<readonly [string, CalculationFunction]> = [
  ['calculate_lumen_per_watt', lumenPerWatt],
  ['calculate_power_factor', powerFactor],
  ['format_with_unit', formatWithUnit],
  ['calculate_cct_deviation', cctDeviation],
  ['calculate_average', average],
  ['check_pass_fail', checkPassFail],
  ['calculate_luminous_intensity', luminousIntensity],
];

export const extraCalculationsPlugin: Plugin = (registries) => {
  for (const [name, fn] of EXTRA_CALCULATIONS) {
    registries.functions.register(name, fn);
  }
  return registries;
};
