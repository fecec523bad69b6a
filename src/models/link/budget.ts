/**
 * @module link/budget
 * @description Deterministic link budget between two devices
 *
 * Combines the transmitter's power and antenna gain with the receiver's free-space path
 * loss, noise floor, interference margin and SINR operating point:
 *
 *   P_rx   = P_tx - FSPL(d, G_tx, G_rx)
 *   N      = NF + N_thermal + M_ix
 *   SNR    = P_rx - N
 *   margin = SNR - SINR_required
 *
 * No fading or shadowing term is applied.
 */

import { ValidationError } from '../../core/errors';
import type { Logger } from '../../core/logging';
import type { Device } from '../device/device';
import type { RawDeviceId } from '../device/types';

// ==================== Types ====================

export interface LinkOptions {
    /** Transmit power in dBm (defaults to the transmitter's ceiling) */
    txPowerDbm?: number;
    /** Receives one `link` entry per evaluation */
    logger?: Logger;
}

/**
 * Link budget evaluation result
 */
export interface LinkBudget {
    txId: RawDeviceId;
    rxId: RawDeviceId;
    /** Link distance (m) */
    distanceM: number;
    /** Transmit power (dBm) */
    txPowerDbm: number;
    /** Free-space path loss including both antenna gains (dB) */
    pathLossDb: number;
    /** Received power (dBm) */
    rxPowerDbm: number;
    /** Receiver noise floor plus interference margin (dBm) */
    noiseFloorDbm: number;
    /** Signal-to-noise ratio (dB) */
    snrDb: number;
    /** Receiver SINR operating point (dB) */
    requiredSinrDb: number;
    /** snrDb - requiredSinrDb */
    marginDb: number;
    /** Whether the margin is non-negative */
    feasible: boolean;
}

// ==================== Helpers ====================

function resolveTxPower(tx: Device, txPowerDbm: number | undefined): number {
    const ceiling = tx.maxTxPowerDbm;
    if (txPowerDbm === undefined) {
        return ceiling;
    }
    if (!Number.isFinite(txPowerDbm)) {
        throw new ValidationError(
            `Transmit power must be a finite number, got ${txPowerDbm} for ${tx.toString()}`,
            { txPowerDbm }
        );
    }
    if (txPowerDbm > ceiling) {
        throw new ValidationError(
            `Transmit power ${txPowerDbm} dBm exceeds the ${ceiling} dBm ceiling of ${tx.toString()}`,
            { txPowerDbm, maxTxPowerDbm: ceiling }
        );
    }
    return txPowerDbm;
}

/** Noise floor the receiver must overcome, interference margin included */
function effectiveNoiseFloorDbm(rx: Device): number {
    return rx.rxNoiseFloorDbm + rx.ixMarginDb;
}

// ==================== Link Budget ====================

/**
 * Received power at `rx` from `tx` over free space
 *
 * @param txPowerDbm - Defaults to `tx.maxTxPowerDbm`; may not exceed it
 * @throws DomainError when the distance is not positive
 * @throws ValidationError when the transmit power exceeds the ceiling
 */
export function receivedPowerDbm(
    tx: Device,
    rx: Device,
    distanceM: number,
    txPowerDbm?: number
): number {
    const power = resolveTxPower(tx, txPowerDbm);
    return power - rx.freeSpacePathLossDb(distanceM, tx.txAntennaGainDbi);
}

/**
 * Evaluate the full link budget from `tx` to `rx`
 *
 * @example
 * ```typescript
 * const bs = new BaseStation('bs0');
 * const ue = new UserEquipment('ue0');
 * const downlink = evaluateLink(bs, ue, 500);
 * console.log(downlink.marginDb.toFixed(1));
 * ```
 */
export function evaluateLink(
    tx: Device,
    rx: Device,
    distanceM: number,
    options: LinkOptions = {}
): LinkBudget {
    const txPowerDbm = resolveTxPower(tx, options.txPowerDbm);
    const pathLossDb = rx.freeSpacePathLossDb(distanceM, tx.txAntennaGainDbi);
    const rxPowerDbm = txPowerDbm - pathLossDb;
    const noiseFloorDbm = effectiveNoiseFloorDbm(rx);
    const snrDb = rxPowerDbm - noiseFloorDbm;
    const requiredSinrDb = rx.sinrDb;
    const marginDb = snrDb - requiredSinrDb;

    const budget: LinkBudget = {
        txId: tx.id.raw,
        rxId: rx.id.raw,
        distanceM,
        txPowerDbm,
        pathLossDb,
        rxPowerDbm,
        noiseFloorDbm,
        snrDb,
        requiredSinrDb,
        marginDb,
        feasible: marginDb >= 0,
    };

    options.logger?.logLink({
        txId: tx.id.toString(),
        rxId: rx.id.toString(),
        distanceM,
        txPowerDbm,
        pathLossDb,
        rxPowerDbm,
        snrDb,
        marginDb,
        feasible: budget.feasible,
    });

    return budget;
}

/**
 * Distance at which the link margin reaches zero
 *
 * Inverts the FSPL equation for the largest path loss the receiver tolerates.
 */
export function maxRangeM(tx: Device, rx: Device, txPowerDbm?: number): number {
    const power = resolveTxPower(tx, txPowerDbm);
    const maxPathLossDb = power - effectiveNoiseFloorDbm(rx) - rx.sinrDb;
    const distanceTermDb = maxPathLossDb - rx.fsplConstantDb + tx.txAntennaGainDbi + rx.rxAntennaGainDbi;
    return Math.pow(10, distanceTermDb / 20);
}
