/**
 * @module device/base-station
 * @description Base station: high-power, high-gain sector antenna on a mast
 */

import { mergeConfig } from '../../core/config';
import { DEFAULT_BASE_STATION_CONFIG } from './defaults';
import { Device } from './device';
import type { DeviceId } from './identifier';
import type { BaseStationConfig, DeviceOptions, RawDeviceId } from './types';

export class BaseStation extends Device<'base-station', BaseStationConfig> {
    /**
     * @param overrides - Merged over {@link DEFAULT_BASE_STATION_CONFIG}, override wins per key
     */
    constructor(
        id: RawDeviceId | DeviceId,
        overrides: Partial<BaseStationConfig> = {},
        options: DeviceOptions = {}
    ) {
        super('base-station', id, mergeConfig(DEFAULT_BASE_STATION_CONFIG, overrides), options);
    }

    withConfig(overrides: Partial<BaseStationConfig>): BaseStation {
        return new BaseStation(this.id, mergeConfig(this.config, overrides), this.options);
    }

    get cableLossDb(): number {
        return this.field('cableLossDb');
    }

    get mastheadAmplifierGainDb(): number {
        return this.field('mastheadAmplifierGainDb');
    }
}
