/**
 * @module device
 * @description Radio device models
 *
 * - Device identity (`DeviceId`)
 * - Default configuration tables per kind
 * - Free-space path loss
 * - `BaseStation` / `UserEquipment`
 */

export type {
    DeviceKind,
    RawDeviceId,
    ResourceGridConfig,
    DeviceConfig,
    BaseStationConfig,
    UserEquipmentConfig,
    DeviceOptions,
    DeviceSnapshot,
} from './types';

export { DeviceId } from './identifier';

export {
    DEFAULT_DEVICE_CONFIG,
    DEFAULT_BASE_STATION_CONFIG,
    DEFAULT_USER_EQUIPMENT_CONFIG,
    defaultConfigFor,
} from './defaults';

export { calcFsplConstantDb, freeSpacePathLossDb } from './path-loss';

export { Device } from './device';
export { BaseStation } from './base-station';
export { UserEquipment } from './user-equipment';

export type { BaseStationSpec, UserEquipmentSpec, DeviceSpec, AnyDevice } from './factory';

export {
    createDevice,
    parseDeviceSpec,
    isBaseStation,
    isUserEquipment,
    validateDeviceConfig,
} from './factory';
