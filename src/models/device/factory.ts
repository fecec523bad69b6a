/**
 * @module device/factory
 * @description Build devices from tagged specs, narrow them by kind, validate configs
 */

import { parseConfigOverrides, validateConfig, type ValidationResult } from '../../core/config';
import { ErrorCodes, ValidationError } from '../../core/errors';
import { BaseStation } from './base-station';
import { defaultConfigFor } from './defaults';
import { UserEquipment } from './user-equipment';
import type {
    BaseStationConfig,
    DeviceKind,
    DeviceOptions,
    RawDeviceId,
    UserEquipmentConfig,
} from './types';

// ==================== Types ====================

export interface BaseStationSpec {
    kind: 'base-station';
    id: RawDeviceId;
    config?: Partial<BaseStationConfig>;
}

export interface UserEquipmentSpec {
    kind: 'user-equipment';
    id: RawDeviceId;
    config?: Partial<UserEquipmentConfig>;
}

/**
 * Tagged device description, as produced by a scenario generator
 */
export type DeviceSpec = BaseStationSpec | UserEquipmentSpec;

export type AnyDevice = BaseStation | UserEquipment;

// ==================== Factory ====================

/**
 * Construct the device a spec describes
 */
export function createDevice(spec: BaseStationSpec, options?: DeviceOptions): BaseStation;
export function createDevice(spec: UserEquipmentSpec, options?: DeviceOptions): UserEquipment;
export function createDevice(spec: DeviceSpec, options?: DeviceOptions): AnyDevice;
export function createDevice(spec: DeviceSpec, options: DeviceOptions = {}): AnyDevice {
    switch (spec.kind) {
        case 'base-station':
            return new BaseStation(spec.id, spec.config, options);
        case 'user-equipment':
            return new UserEquipment(spec.id, spec.config, options);
    }
}

function isDeviceKind(value: unknown): value is DeviceKind {
    return value === 'base-station' || value === 'user-equipment';
}

/**
 * Validate an untyped device description (e.g. one entry of a JSON scenario file)
 *
 * @throws ValidationError (code INVALID_CONFIG)
 */
export function parseDeviceSpec(raw: unknown): DeviceSpec {
    if (typeof raw !== 'object' || raw === null) {
        throw new ValidationError('Device spec must be an object', { received: raw }, ErrorCodes.INVALID_CONFIG);
    }

    const kind: unknown = Reflect.get(raw, 'kind');
    const id: unknown = Reflect.get(raw, 'id');

    if (!isDeviceKind(kind)) {
        throw new ValidationError(
            `Unknown device kind: ${String(kind)}`,
            { kind },
            ErrorCodes.INVALID_CONFIG
        );
    }
    if (typeof id !== 'string' && typeof id !== 'number') {
        throw new ValidationError('Device id must be a string or a number', { id }, ErrorCodes.INVALID_CONFIG);
    }

    const config = parseConfigOverrides(Reflect.get(raw, 'config'));
    return { kind, id, config };
}

// ==================== Narrowing ====================

export function isBaseStation(device: AnyDevice): device is BaseStation {
    return device.kind === 'base-station';
}

export function isUserEquipment(device: AnyDevice): device is UserEquipment {
    return device.kind === 'user-equipment';
}

// ==================== Validation ====================

/**
 * Check a merged configuration against the default table of a device kind
 *
 * Adds an error for a non-positive carrier frequency, which would make the FSPL
 * constant undefined.
 */
export function validateDeviceConfig(config: object, kind: DeviceKind): ValidationResult {
    const result = validateConfig(config, Object.keys(defaultConfigFor(kind)));

    const carrierFreqGhz: unknown = Reflect.get(config, 'carrierFreqGhz');
    if (typeof carrierFreqGhz === 'number' && Number.isFinite(carrierFreqGhz) && carrierFreqGhz <= 0) {
        result.errors.push('carrierFreqGhz must be positive');
    }

    return {
        ...result,
        valid: result.errors.length === 0,
    };
}
