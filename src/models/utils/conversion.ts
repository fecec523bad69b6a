/**
 * @module utils/conversion
 * @description Unit conversion utility functions
 *
 * dB inputs are accepted for every real value. Linear inputs must be strictly positive:
 * the logarithm is undefined otherwise and a {@link DomainError} is thrown.
 */

import { DomainError } from '../../core/errors';

/** Speed of light in vacuum (m/s), exact SI value */
export const SPEED_OF_LIGHT = 299792458;

function assertPositive(value: number, what: string): void {
    if (!(value > 0) || !Number.isFinite(value)) {
        throw new DomainError(`${what} must be a positive finite number`, { value });
    }
}

/**
 * Convert linear value to dB (decibels)
 *
 * @param linear - Linear value (must be > 0)
 * @returns dB value
 *
 * @example
 * ```typescript
 * linearToDb(10);   // returns 10
 * linearToDb(100);  // returns 20
 * linearToDb(0.5);  // returns -3.01
 * ```
 */
export function linearToDb(linear: number): number {
    assertPositive(linear, 'Linear value');
    return 10 * Math.log10(linear);
}

/**
 * Convert dB (decibels) to linear value
 *
 * @example
 * ```typescript
 * dbToLinear(10);   // returns 10
 * dbToLinear(-3);   // returns ~0.5
 * ```
 */
export function dbToLinear(db: number): number {
    return Math.pow(10, db / 10);
}

/**
 * Convert dBm to power in milliwatts
 */
export function dbmToMilliwatts(dbm: number): number {
    return dbToLinear(dbm);
}

/**
 * Convert power in milliwatts to dBm
 *
 * @param milliwatts - Power in mW (must be > 0)
 */
export function milliwattsToDbm(milliwatts: number): number {
    assertPositive(milliwatts, 'Power value');
    return linearToDb(milliwatts);
}

/**
 * Convert power (Watts) to dBm
 *
 * @param watts - Power value in Watts (must be > 0)
 *
 * @example
 * ```typescript
 * wattsToDbm(1);     // returns 30 dBm
 * wattsToDbm(0.001); // returns 0 dBm
 * ```
 */
export function wattsToDbm(watts: number): number {
    assertPositive(watts, 'Power value');
    return milliwattsToDbm(watts * 1000);
}

/**
 * Convert dBm to power (Watts)
 *
 * @example
 * ```typescript
 * dbmToWatts(30);  // returns 1 W
 * dbmToWatts(0);   // returns 0.001 W (1 mW)
 * ```
 */
export function dbmToWatts(dbm: number): number {
    return dbmToMilliwatts(dbm) / 1000;
}
