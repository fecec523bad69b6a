/**
 * @module device/defaults
 * @description Default configuration tables per device kind
 *
 * The tables are shared module-wide and frozen; devices always merge into a fresh copy.
 */

import { mergeConfig } from '../../core/config';
import type {
    BaseStationConfig,
    DeviceKind,
    ResourceGridConfig,
    UserEquipmentConfig,
} from './types';

/**
 * Shared resource grid defaults (1 PRB of 12 subcarriers at 30 kHz, 2.1 GHz carrier)
 */
export const DEFAULT_DEVICE_CONFIG: Readonly<ResourceGridConfig> = Object.freeze({
    numPrb: 1,
    carrierFreqGhz: 2.1,
    subcarrierQuantity: 12,
    subcarrierSpacingKhz: 30.0,
});

export const DEFAULT_BASE_STATION_CONFIG: Readonly<BaseStationConfig> = Object.freeze(
    mergeConfig(DEFAULT_DEVICE_CONFIG, {
        maxTxPowerDbm: 46.0,
        antennaHeightM: 23.0,
        txAntennaGainDbi: 17.5,
        rxAntennaGainDbi: 17.5,
        thermalNoiseDbm: -118.4,
        noiseFigureDb: 2.0,
        sinrDb: -7.0,
        ixMarginDb: 2.0,
        cableLossDb: 2.0,
        mastheadAmplifierGainDb: 2.0,
    })
);

export const DEFAULT_USER_EQUIPMENT_CONFIG: Readonly<UserEquipmentConfig> = Object.freeze(
    mergeConfig(DEFAULT_DEVICE_CONFIG, {
        maxTxPowerDbm: 23.0,
        antennaHeightM: 1.5,
        txAntennaGainDbi: 0.0,
        rxAntennaGainDbi: 0.0,
        thermalNoiseDbm: -104.5,
        noiseFigureDb: 7.0,
        sinrDb: -10.0,
        ixMarginDb: 3.0,
        controlChannelOverheadDb: 1.0,
        bodyLossDb: 3.0,
    })
);

/**
 * Default table for a device kind
 */
export function defaultConfigFor(kind: 'base-station'): Readonly<BaseStationConfig>;
export function defaultConfigFor(kind: 'user-equipment'): Readonly<UserEquipmentConfig>;
export function defaultConfigFor(kind: DeviceKind): Readonly<BaseStationConfig | UserEquipmentConfig>;
export function defaultConfigFor(kind: DeviceKind): Readonly<BaseStationConfig | UserEquipmentConfig> {
    return kind === 'base-station' ? DEFAULT_BASE_STATION_CONFIG : DEFAULT_USER_EQUIPMENT_CONFIG;
}
