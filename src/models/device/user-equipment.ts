/**
 * @module device/user-equipment
 * @description User equipment: handset-class transmitter held near the body
 */

import { mergeConfig } from '../../core/config';
import { DEFAULT_USER_EQUIPMENT_CONFIG } from './defaults';
import { Device } from './device';
import type { DeviceId } from './identifier';
import type { DeviceOptions, RawDeviceId, UserEquipmentConfig } from './types';

export class UserEquipment extends Device<'user-equipment', UserEquipmentConfig> {
    /**
     * @param overrides - Merged over {@link DEFAULT_USER_EQUIPMENT_CONFIG}, override wins per key
     */
    constructor(
        id: RawDeviceId | DeviceId,
        overrides: Partial<UserEquipmentConfig> = {},
        options: DeviceOptions = {}
    ) {
        super('user-equipment', id, mergeConfig(DEFAULT_USER_EQUIPMENT_CONFIG, overrides), options);
    }

    withConfig(overrides: Partial<UserEquipmentConfig>): UserEquipment {
        return new UserEquipment(this.id, mergeConfig(this.config, overrides), this.options);
    }

    get controlChannelOverheadDb(): number {
        return this.field('controlChannelOverheadDb');
    }

    get bodyLossDb(): number {
        return this.field('bodyLossDb');
    }
}
