/**
 * Link Budget Module Tests
 */

import { describe, it, expect } from 'vitest';
import { evaluateLink, receivedPowerDbm, maxRangeM } from '../src/models/link';
import { BaseStation, UserEquipment } from '../src/models/device';
import { DomainError, MemoryLogger, ValidationError } from '../src/core';
import { expectedFsplConstantDb, isClose } from './test-utils';

const bs = new BaseStation('bs0');
const ue = new UserEquipment('ue0');

describe('receivedPowerDbm', () => {
    it('should subtract path loss from the transmit power ceiling', () => {
        const pathLoss = 20 * Math.log10(1000) + expectedFsplConstantDb(2.1) - 17.5 - 0;
        expect(isClose(receivedPowerDbm(bs, ue, 1000), 46 - pathLoss, 1e-12)).toBe(true);
    });

    it('should use a lower transmit power when given', () => {
        const full = receivedPowerDbm(ue, bs, 200);
        const reduced = receivedPowerDbm(ue, bs, 200, 13);
        expect(isClose(full - reduced, 10)).toBe(true);
    });

    it('should refuse power above the ceiling', () => {
        expect(() => receivedPowerDbm(ue, bs, 200, 30)).toThrow(ValidationError);
        expect(() => receivedPowerDbm(ue, bs, 200, 30)).toThrow(
            'Transmit power 30 dBm exceeds the 23 dBm ceiling of user-equipment:ue0'
        );
    });

    it('should refuse non-finite power without mentioning the ceiling', () => {
        expect(() => receivedPowerDbm(ue, bs, 200, Number.NaN)).toThrow(
            'Transmit power must be a finite number, got NaN for user-equipment:ue0'
        );
        expect(() => receivedPowerDbm(ue, bs, 200, Number.NEGATIVE_INFINITY)).toThrow(
            'Transmit power must be a finite number, got -Infinity for user-equipment:ue0'
        );
    });

    it('should propagate domain errors for zero distance', () => {
        expect(() => receivedPowerDbm(bs, ue, 0)).toThrow(DomainError);
    });
});

describe('evaluateLink', () => {
    it('should compute the downlink budget', () => {
        const budget = evaluateLink(bs, ue, 1000);
        const pathLossDb = 20 * Math.log10(1000) + expectedFsplConstantDb(2.1) - 17.5;

        expect(budget.txId).toBe('bs0');
        expect(budget.rxId).toBe('ue0');
        expect(budget.txPowerDbm).toBe(46);
        expect(isClose(budget.pathLossDb, pathLossDb, 1e-12)).toBe(true);
        expect(isClose(budget.rxPowerDbm, 46 - pathLossDb, 1e-12)).toBe(true);
        expect(budget.noiseFloorDbm).toBe(-94.5);
        expect(isClose(budget.snrDb, 46 - pathLossDb + 94.5, 1e-12)).toBe(true);
        expect(budget.requiredSinrDb).toBe(-10);
        expect(isClose(budget.marginDb, budget.snrDb + 10, 1e-12)).toBe(true);
        expect(budget.feasible).toBe(true);
    });

    it('should use the receiving base station noise and operating point on the uplink', () => {
        const budget = evaluateLink(ue, bs, 1000);
        expect(budget.noiseFloorDbm).toBeCloseTo(-114.4, 10);
        expect(budget.requiredSinrDb).toBe(-7);
        expect(budget.txPowerDbm).toBe(23);
    });

    it('should write one link entry per evaluation to the logger', () => {
        const logger = new MemoryLogger({ scenario: 'links' });
        const budget = evaluateLink(bs, ue, 500, { logger });

        expect(logger.links).toHaveLength(1);
        const [entry] = logger.links;
        expect(entry.txId).toBe('bs0');
        expect(entry.rxId).toBe('ue0');
        expect(entry.distanceM).toBe(500);
        expect(entry.marginDb).toBe(budget.marginDb);
        expect(entry.feasible).toBe(true);
    });
});

describe('maxRangeM', () => {
    it('should place the zero-margin point at the returned distance', () => {
        for (const [tx, rx] of [[bs, ue], [ue, bs]] as const) {
            const range = maxRangeM(tx, rx);
            expect(evaluateLink(tx, rx, range).marginDb).toBeCloseTo(0, 6);
        }
    });

    it('should make links beyond the range infeasible', () => {
        const range = maxRangeM(ue, bs);
        const budget = evaluateLink(ue, bs, range * 2);
        expect(budget.feasible).toBe(false);
        expect(budget.marginDb).toBeCloseTo(-20 * Math.log10(2), 6);
    });

    it('should shrink with lower transmit power', () => {
        expect(maxRangeM(ue, bs, 3)).toBeCloseTo(maxRangeM(ue, bs) / 10, 3);
    });
});
