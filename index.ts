/**
 * @packageDocumentation
 * @module d2d-radio
 *
 * d2d-radio: RF link-budget models for device-to-device simulation
 *
 * Provides the per-device radio parameters (transmit power ceiling, antenna gains, noise
 * figure, SINR operating point) and the deterministic free-space path loss and noise floor
 * that SINR and scheduling logic consume.
 *
 * ## Modules
 * - `core` - Errors, structured logging, configuration merge
 * - `device` - `BaseStation`, `UserEquipment`, `DeviceId`, path loss
 * - `link` - Link budget between two devices
 * - `units` - dB/linear conversion and thermal noise
 *
 * ## Usage Example
 * ```typescript
 * import { BaseStation, UserEquipment, evaluateLink } from 'd2d-radio';
 *
 * const bs = new BaseStation('bs0');
 * const ue = new UserEquipment('ue0', { maxTxPowerDbm: 20 });
 *
 * bs.freeSpacePathLossDb(1000, ue.txAntennaGainDbi); // uplink path loss (dB)
 * bs.rxNoiseFloorDbm;                                 // -116.4 dBm
 *
 * const uplink = evaluateLink(ue, bs, 1000);
 * ```
 *
 * @license MIT
 */

// ==================== Namespaces ====================
export * as core from './src/core';
export * as device from './src/models/device';
export * as link from './src/models/link';
export * as units from './src/models/utils';

// ==================== Common Exports ====================
export {
    BaseStation,
    UserEquipment,
    Device,
    DeviceId,
    createDevice,
    isBaseStation,
    isUserEquipment,
    DEFAULT_BASE_STATION_CONFIG,
    DEFAULT_USER_EQUIPMENT_CONFIG,
} from './src/models/device';

export type {
    DeviceKind,
    DeviceConfig,
    BaseStationConfig,
    UserEquipmentConfig,
    DeviceSpec,
    AnyDevice,
} from './src/models/device';

export { evaluateLink, receivedPowerDbm, maxRangeM } from './src/models/link';
export type { LinkBudget } from './src/models/link';

export {
    linearToDb,
    dbToLinear,
    dbmToWatts,
    wattsToDbm,
    dbmToMilliwatts,
    milliwattsToDbm,
} from './src/models/utils';

export {
    RadioError,
    DomainError,
    MissingConfigKeyError,
    ValidationError,
    mergeConfig,
} from './src/core';
