/**
 * @module device/device
 * @description Radio device model: identity, configuration and link-budget terms
 *
 * A device owns one identifier and one frozen configuration. The FSPL constant is derived
 * once, at construction, from the merged carrier frequency and stored beside the
 * configuration. Configuration cannot change afterwards; {@link Device.withConfig} builds a
 * new device instead, which re-derives the constant.
 *
 * The stored configuration is typed `Partial<C>`: an override may clear a default with an
 * explicit `undefined`, and every accessor reads through `requireField`.
 */

import { requireField } from '../../core/config';
import { calcFsplConstantDb, freeSpacePathLossDb } from './path-loss';
import { DeviceId } from './identifier';
import type {
    DeviceConfig,
    DeviceKind,
    DeviceOptions,
    DeviceSnapshot,
    RawDeviceId,
} from './types';

export abstract class Device<K extends DeviceKind = DeviceKind, C extends DeviceConfig = DeviceConfig> {
    readonly kind: K;
    readonly id: DeviceId;
    readonly config: Readonly<Partial<C>>;
    /** 20log10(f) + 20log10(4π/c), in dB */
    readonly fsplConstantDb: number;

    protected readonly options: DeviceOptions;

    protected constructor(kind: K, id: RawDeviceId | DeviceId, config: Partial<C>, options: DeviceOptions = {}) {
        this.kind = kind;
        this.id = DeviceId.of(id);
        this.config = Object.freeze({ ...config });
        this.options = options;
        this.fsplConstantDb = calcFsplConstantDb(this.carrierFreqGhz);

        options.logger?.logDevice({
            deviceId: this.id.toString(),
            kind: this.kind,
            carrierFreqGhz: this.carrierFreqGhz,
            fsplConstantDb: this.fsplConstantDb,
        });
    }

    /**
     * New device of the same kind and id with overrides applied on top of this configuration
     */
    abstract withConfig(overrides: Partial<C>): Device<K, C>;

    /**
     * Read a configuration field; throws MissingConfigKeyError when absent
     */
    protected field(key: keyof C & string): number {
        return requireField(this.config, key, `${this.kind} ${this.id.toString()}`);
    }

    // ==================== Link Budget ====================

    /**
     * Free-space path loss for a signal received by this device
     *
     * This device's receive antenna gain is part of the loss budget.
     *
     * @param distanceM - Distance to the transmitter in meters (must be > 0)
     * @param txGainDb - Transmitter antenna gain in dB
     * @throws DomainError when the distance is not positive
     */
    freeSpacePathLossDb(distanceM: number, txGainDb: number): number {
        return freeSpacePathLossDb(distanceM, this.fsplConstantDb, txGainDb, this.rxAntennaGainDbi);
    }

    /** Receiver noise floor: noise figure + thermal noise (dBm) */
    get rxNoiseFloorDbm(): number {
        return this.noiseFigureDb + this.thermalNoiseDbm;
    }

    /** Occupied bandwidth: PRBs × subcarriers × spacing (Hz) */
    get bandwidthHz(): number {
        return this.numPrb * this.subcarrierQuantity * this.subcarrierSpacingKhz * 1e3;
    }

    // ==================== Accessors ====================

    get numPrb(): number {
        return this.field('numPrb');
    }

    get carrierFreqGhz(): number {
        return this.field('carrierFreqGhz');
    }

    get subcarrierQuantity(): number {
        return this.field('subcarrierQuantity');
    }

    get subcarrierSpacingKhz(): number {
        return this.field('subcarrierSpacingKhz');
    }

    get maxTxPowerDbm(): number {
        return this.field('maxTxPowerDbm');
    }

    get antennaHeightM(): number {
        return this.field('antennaHeightM');
    }

    get txAntennaGainDbi(): number {
        return this.field('txAntennaGainDbi');
    }

    get rxAntennaGainDbi(): number {
        return this.field('rxAntennaGainDbi');
    }

    get noiseFigureDb(): number {
        return this.field('noiseFigureDb');
    }

    get thermalNoiseDbm(): number {
        return this.field('thermalNoiseDbm');
    }

    get sinrDb(): number {
        return this.field('sinrDb');
    }

    get ixMarginDb(): number {
        return this.field('ixMarginDb');
    }

    // ==================== Serialization ====================

    toJSON(): DeviceSnapshot<C> {
        return {
            id: this.id.raw,
            kind: this.kind,
            config: this.config,
            fsplConstantDb: this.fsplConstantDb,
        };
    }

    toString(): string {
        return `${this.kind}:${this.id.toString()}`;
    }
}
