/**
 * Test Utilities
 * Provides common helpers for numerical testing
 */

/**
 * Check if two numbers are approximately equal
 */
export function isClose(a: number, b: number, rtol = 1e-5, atol = 1e-8): boolean {
    return Math.abs(a - b) <= atol + rtol * Math.abs(b);
}

/**
 * Closed-form FSPL constant, written out independently of the library
 */
export function expectedFsplConstantDb(carrierFreqGhz: number): number {
    return 20 * Math.log10(carrierFreqGhz * 1e9) + 20 * Math.log10((4 * Math.PI) / 299792458);
}
