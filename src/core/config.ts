/**
 * @module core/config
 * @description Configuration merge, fail-fast field access and override validation
 */

import { ErrorCodes, MissingConfigKeyError, ValidationError } from './errors';

// ==================== Types ====================

/**
 * Validation result for a configuration record
 */
export interface ValidationResult {
    valid: boolean;
    errors: string[];
    warnings: string[];
}

// ==================== Merge ====================

/**
 * Merge an override record onto a base record
 *
 * Key-union: every key of `base` is kept, every key the override owns wins, and keys
 * present only in the override are added. Neither input is mutated. An own key set to
 * `undefined` still wins, so accessors reading it fail with {@link MissingConfigKeyError}
 * instead of falling back to the default.
 *
 * @example
 * ```typescript
 * mergeConfig({ a: 1, b: 2 }, { b: 3, c: 4 }); // { a: 1, b: 3, c: 4 }
 * ```
 */
export function mergeConfig<B extends object, O extends object>(base: B, override: O): Omit<B, keyof O> & O {
    return { ...base, ...override };
}

// ==================== Field Access ====================

/**
 * Read a numeric configuration field, failing fast when it is absent
 *
 * @param owner - Included in the error message (e.g. the device id)
 * @throws MissingConfigKeyError when the field is missing or not a number
 */
export function requireField(config: object, key: string, owner?: string): number {
    const value: unknown = Reflect.get(config, key);
    if (typeof value !== 'number' || Number.isNaN(value)) {
        throw new MissingConfigKeyError(key, owner);
    }
    return value;
}

// ==================== Validation ====================

function isPlainObject(value: unknown): value is Record<string, unknown> {
    if (typeof value !== 'object' || value === null || Array.isArray(value)) {
        return false;
    }
    const proto: unknown = Object.getPrototypeOf(value);
    return proto === Object.prototype || proto === null;
}

/**
 * Validate an untyped override object (e.g. parsed from a JSON scenario file)
 *
 * @returns The override as a numeric record, ready for {@link mergeConfig}
 * @throws ValidationError (code INVALID_CONFIG) listing every offending key
 */
export function parseConfigOverrides(raw: unknown): Record<string, number> {
    if (raw === undefined || raw === null) {
        return {};
    }
    if (!isPlainObject(raw)) {
        throw new ValidationError(
            'Configuration overrides must be a plain object',
            { received: Array.isArray(raw) ? 'array' : typeof raw },
            ErrorCodes.INVALID_CONFIG
        );
    }

    const entries: [string, number][] = [];
    const invalidKeys: string[] = [];

    for (const [key, value] of Object.entries(raw)) {
        if (typeof value === 'number' && Number.isFinite(value)) {
            entries.push([key, value]);
        } else {
            invalidKeys.push(key);
        }
    }

    if (invalidKeys.length > 0) {
        throw new ValidationError(
            `Configuration overrides must be finite numbers: ${invalidKeys.join(', ')}`,
            { invalidKeys },
            ErrorCodes.INVALID_CONFIG
        );
    }

    // fromEntries defines own properties, so a "__proto__" key survives
    return Object.fromEntries(entries);
}

/**
 * Check a merged configuration against the key universe of its default table
 *
 * Missing or non-finite required fields are errors. Keys outside the table are only
 * warnings: the merge keeps them, but no accessor reads them.
 */
export function validateConfig(config: object, requiredKeys: readonly string[]): ValidationResult {
    const errors: string[] = [];
    const warnings: string[] = [];

    for (const key of requiredKeys) {
        const value: unknown = Reflect.get(config, key);
        if (value === undefined) {
            errors.push(`${key} is required`);
        } else if (typeof value !== 'number' || !Number.isFinite(value)) {
            errors.push(`${key} must be a finite number`);
        }
    }

    const known = new Set(requiredKeys);
    for (const key of Object.keys(config)) {
        if (!known.has(key)) {
            warnings.push(`${key} is not a known configuration key`);
        }
    }

    return {
        valid: errors.length === 0,
        errors,
        warnings,
    };
}
