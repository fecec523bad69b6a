/**
 * @module link
 * @description Free-space link budget between devices
 */

export type { LinkOptions, LinkBudget } from './budget';

export { receivedPowerDbm, evaluateLink, maxRangeM } from './budget';
