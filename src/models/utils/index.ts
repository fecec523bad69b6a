/**
 * @module utils
 * @description dB/linear unit conversion and thermal noise helpers
 */

export {
    SPEED_OF_LIGHT,
    linearToDb,
    dbToLinear,
    dbmToMilliwatts,
    milliwattsToDbm,
    wattsToDbm,
    dbmToWatts,
} from './conversion';

export {
    THERMAL_NOISE_DENSITY,
    THERMAL_NOISE_POWER_DBM,
    THERMAL_NOISE_POWER_MW,
    THERMAL_NOISE_POWER_W,
    thermalNoiseDbm,
} from './noise';
