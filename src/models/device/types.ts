/**
 * @module device/types
 * @description Type definitions for radio device configuration
 */

import type { Logger } from '../../core/logging';

/**
 * Device kind discriminant
 */
export type DeviceKind = 'base-station' | 'user-equipment';

/**
 * Raw identifier supplied by the scenario layer
 */
export type RawDeviceId = string | number;

/**
 * Resource grid parameters shared by every device
 */
export interface ResourceGridConfig {
    /** Number of physical resource blocks */
    numPrb: number;
    /** Carrier frequency in GHz */
    carrierFreqGhz: number;
    /** Subcarriers per resource block */
    subcarrierQuantity: number;
    /** Subcarrier spacing in kHz */
    subcarrierSpacingKhz: number;
}

/**
 * RF parameters shared by every device kind
 */
export interface DeviceConfig extends ResourceGridConfig {
    /** Transmit power ceiling in dBm */
    maxTxPowerDbm: number;
    /** Antenna height in meters */
    antennaHeightM: number;
    /** Transmit antenna gain in dBi */
    txAntennaGainDbi: number;
    /** Receive antenna gain in dBi */
    rxAntennaGainDbi: number;
    /** Thermal noise power in dBm */
    thermalNoiseDbm: number;
    /** Receiver noise figure in dB */
    noiseFigureDb: number;
    /** SINR operating point in dB */
    sinrDb: number;
    /** Interference margin in dB (noise rise from surrounding cells) */
    ixMarginDb: number;
}

/**
 * Base station configuration
 */
export interface BaseStationConfig extends DeviceConfig {
    /** Feeder cable loss in dB */
    cableLossDb: number;
    /** Masthead amplifier gain in dB */
    mastheadAmplifierGainDb: number;
}

/**
 * User equipment configuration
 */
export interface UserEquipmentConfig extends DeviceConfig {
    /** Control channel overhead in dB */
    controlChannelOverheadDb: number;
    /** Body loss in dB */
    bodyLossDb: number;
}

/**
 * Options accepted by every device constructor
 */
export interface DeviceOptions {
    /** Receives one `device` entry at construction */
    logger?: Logger;
}

/**
 * Serializable device snapshot
 */
export interface DeviceSnapshot<C extends DeviceConfig = DeviceConfig> {
    id: RawDeviceId;
    kind: DeviceKind;
    config: Readonly<Partial<C>>;
    fsplConstantDb: number;
}
