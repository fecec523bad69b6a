/**
 * @module device/path-loss
 * @description Free-space path loss (Friis)
 *
 * FSPL = 20log10(d) + 20log10(f) + 20log10(4π/c) - G_tx - G_rx
 *
 * With a fixed carrier frequency only the distance and gain terms change between queries,
 * so the frequency and speed-of-light terms are folded into one constant per device.
 *
 * @see https://en.wikipedia.org/wiki/Free-space_path_loss
 */

import { DomainError } from '../../core/errors';
import { SPEED_OF_LIGHT } from '../utils/conversion';

const FSPL_SPEED_OF_LIGHT_TERM_DB = 20 * Math.log10((4 * Math.PI) / SPEED_OF_LIGHT);

/**
 * Constant part of the FSPL equation in dB
 *
 * @param carrierFreqGhz - Carrier frequency in GHz (must be > 0)
 *
 * @example
 * ```typescript
 * calcFsplConstantDb(2.1); // ≈ 38.89 dB
 * ```
 */
export function calcFsplConstantDb(carrierFreqGhz: number): number {
    if (!(carrierFreqGhz > 0) || !Number.isFinite(carrierFreqGhz)) {
        throw new DomainError('Carrier frequency must be a positive finite number', { carrierFreqGhz });
    }
    return 20 * Math.log10(carrierFreqGhz * 1e9) + FSPL_SPEED_OF_LIGHT_TERM_DB;
}

/**
 * Free-space path loss in dB
 *
 * @param distanceM - Link distance in meters (must be > 0)
 * @param fsplConstantDb - Output of {@link calcFsplConstantDb}
 * @param txGainDb - Transmitting antenna gain
 * @param rxGainDb - Receiving antenna gain
 */
export function freeSpacePathLossDb(
    distanceM: number,
    fsplConstantDb: number,
    txGainDb: number,
    rxGainDb: number
): number {
    if (!(distanceM > 0) || !Number.isFinite(distanceM)) {
        throw new DomainError('Path loss distance must be a positive finite number', { distanceM });
    }
    return 20 * Math.log10(distanceM) + fsplConstantDb - txGainDb - rxGainDb;
}
