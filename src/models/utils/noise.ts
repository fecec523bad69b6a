/**
 * @module utils/noise
 * @description Thermal (Johnson-Nyquist) noise power
 *
 * @see https://en.wikipedia.org/wiki/Johnson%E2%80%93Nyquist_noise#Noise_power_in_decibels
 */

import { dbmToMilliwatts, dbmToWatts, linearToDb } from './conversion';

/**
 * Thermal Noise Power Spectral Density at Room Temperature (dBm/Hz)
 * At 290K (approx 17°C), kT = -174 dBm/Hz
 */
export const THERMAL_NOISE_DENSITY = -174;

/** Thermal noise power of one 180 kHz LTE resource block (dBm) */
export const THERMAL_NOISE_POWER_DBM = -121.45;
export const THERMAL_NOISE_POWER_MW = dbmToMilliwatts(THERMAL_NOISE_POWER_DBM);
export const THERMAL_NOISE_POWER_W = dbmToWatts(THERMAL_NOISE_POWER_DBM);

/**
 * Thermal noise power over a bandwidth
 *
 * @param bandwidthHz - Bandwidth in Hz (must be > 0)
 * @returns Noise power in dBm
 *
 * @example
 * ```typescript
 * thermalNoiseDbm(1e6); // -114 dBm
 * ```
 */
export function thermalNoiseDbm(bandwidthHz: number): number {
    return THERMAL_NOISE_DENSITY + linearToDb(bandwidthHz);
}
