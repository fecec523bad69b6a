/**
 * Core Config Module Tests
 * Tests for configuration merge, field access and override validation
 */

import { describe, it, expect, expectTypeOf } from 'vitest';
import {
    mergeConfig,
    requireField,
    parseConfigOverrides,
    validateConfig,
    ErrorCodes,
    MissingConfigKeyError,
    ValidationError,
} from '../src/core';

// ==================== mergeConfig ====================

describe('mergeConfig', () => {
    it('should take override values on conflict and keep the rest of base', () => {
        const merged = mergeConfig({ a: 1, b: 2 }, { b: 3 });
        expect(merged).toEqual({ a: 1, b: 3 });
    });

    it('should form the key union', () => {
        const base: Record<string, number> = { a: 1, b: 2 };
        const override: Record<string, number> = { b: 20, c: 30 };
        const merged = mergeConfig(base, override);

        for (const key of new Set([...Object.keys(base), ...Object.keys(override)])) {
            expect(merged[key]).toBe(key in override ? override[key] : base[key]);
        }
        expect(Object.keys(merged).sort()).toEqual(['a', 'b', 'c']);
    });

    it('should accept an empty override', () => {
        expect(mergeConfig({ a: 1 }, {})).toEqual({ a: 1 });
    });

    it('should not mutate either input', () => {
        const base = { a: 1, b: 2 };
        const override = { b: 3, c: 4 };
        const merged = mergeConfig(base, override);

        expect(base).toEqual({ a: 1, b: 2 });
        expect(override).toEqual({ b: 3, c: 4 });
        expect(merged).not.toBe(base);
        expect(merged).not.toBe(override);
    });

    it('should work on frozen inputs', () => {
        const base = Object.freeze({ a: 1 });
        expect(mergeConfig(base, { a: 2 })).toEqual({ a: 2 });
    });

    it('should let an explicit undefined override win', () => {
        const merged = mergeConfig({ a: 1, b: 2 }, { b: undefined });
        expect('b' in merged).toBe(true);
        expect(merged.b).toBeUndefined();
        expectTypeOf(merged.b).toEqualTypeOf<undefined>();
        expectTypeOf(merged.a).toEqualTypeOf<number>();
    });

    it('should type a conflicting key as the override type', () => {
        const merged = mergeConfig({ gain: 3, loss: 1 }, { gain: 'high' });
        expect(merged).toEqual({ gain: 'high', loss: 1 });
        expectTypeOf(merged.gain).toEqualTypeOf<string>();
        expectTypeOf(merged.loss).toEqualTypeOf<number>();
    });
});

// ==================== requireField ====================

describe('requireField', () => {
    it('should return present numeric fields', () => {
        expect(requireField({ noiseFigureDb: 7 }, 'noiseFigureDb')).toBe(7);
        expect(requireField({ gain: 0 }, 'gain')).toBe(0);
    });

    it('should fail fast for absent fields instead of defaulting', () => {
        expect(() => requireField({}, 'noiseFigureDb')).toThrow(MissingConfigKeyError);
        expect(() => requireField({ noiseFigureDb: undefined }, 'noiseFigureDb')).toThrow(MissingConfigKeyError);
    });

    it('should treat non-numeric values as missing', () => {
        expect(() => requireField({ sinrDb: '-7' }, 'sinrDb')).toThrow(MissingConfigKeyError);
        expect(() => requireField({ sinrDb: Number.NaN }, 'sinrDb')).toThrow(MissingConfigKeyError);
    });

    it('should report the key and owner', () => {
        try {
            requireField({}, 'ixMarginDb', 'user-equipment ue0');
            expect.unreachable();
        } catch (error) {
            expect(error).toBeInstanceOf(MissingConfigKeyError);
            if (error instanceof MissingConfigKeyError) {
                expect(error.key).toBe('ixMarginDb');
                expect(error.message).toContain('user-equipment ue0');
            }
        }
    });
});

// ==================== parseConfigOverrides ====================

describe('parseConfigOverrides', () => {
    it('should accept numeric records', () => {
        expect(parseConfigOverrides({ maxTxPowerDbm: 40, extra: 1 })).toEqual({ maxTxPowerDbm: 40, extra: 1 });
    });

    it('should treat null and undefined as no overrides', () => {
        expect(parseConfigOverrides(undefined)).toEqual({});
        expect(parseConfigOverrides(null)).toEqual({});
    });

    it('should accept parsed JSON', () => {
        const parsed: unknown = JSON.parse('{"carrierFreqGhz": 3.5, "noiseFigureDb": 5}');
        expect(parseConfigOverrides(parsed)).toEqual({ carrierFreqGhz: 3.5, noiseFigureDb: 5 });
    });

    it('should keep a "__proto__" key as an own field', () => {
        const parsed: unknown = JSON.parse('{"__proto__": 5, "maxTxPowerDbm": 40}');
        const overrides = parseConfigOverrides(parsed);

        expect(Object.keys(overrides)).toEqual(['__proto__', 'maxTxPowerDbm']);
        expect(Object.getOwnPropertyDescriptor(overrides, '__proto__')?.value).toBe(5);
        expect(Object.getPrototypeOf(overrides)).toBe(Object.prototype);
        expect(validateConfig(overrides, ['maxTxPowerDbm']).warnings).toEqual([
            '__proto__ is not a known configuration key',
        ]);
    });

    it('should report a non-numeric "__proto__" key', () => {
        const parsed: unknown = JSON.parse('{"__proto__": "x"}');
        expect(() => parseConfigOverrides(parsed)).toThrow(
            'Configuration overrides must be finite numbers: __proto__'
        );
    });

    it('should reject non-objects', () => {
        expect(() => parseConfigOverrides([1, 2])).toThrow(ValidationError);
        expect(() => parseConfigOverrides('maxTxPowerDbm=40')).toThrow(ValidationError);
        expect(() => parseConfigOverrides(new Date())).toThrow(ValidationError);
    });

    it('should list every non-numeric key', () => {
        try {
            parseConfigOverrides({ a: '1', b: 2, c: Number.POSITIVE_INFINITY, d: null });
            expect.unreachable();
        } catch (error) {
            expect(error).toBeInstanceOf(ValidationError);
            if (error instanceof ValidationError) {
                expect(error.code).toBe(ErrorCodes.INVALID_CONFIG);
                expect(error.details).toEqual({ invalidKeys: ['a', 'c', 'd'] });
            }
        }
    });
});

// ==================== validateConfig ====================

describe('validateConfig', () => {
    it('should pass a complete config', () => {
        expect(validateConfig({ a: 1, b: 2 }, ['a', 'b'])).toEqual({ valid: true, errors: [], warnings: [] });
    });

    it('should report missing and non-finite fields as errors', () => {
        const result = validateConfig({ a: Number.NaN }, ['a', 'b']);
        expect(result.valid).toBe(false);
        expect(result.errors).toEqual(['a must be a finite number', 'b is required']);
    });

    it('should report unknown keys as warnings only', () => {
        const result = validateConfig({ a: 1, extra: 5 }, ['a']);
        expect(result.valid).toBe(true);
        expect(result.warnings).toEqual(['extra is not a known configuration key']);
    });
});
