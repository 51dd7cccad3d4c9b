export { DetectorSet } from './detector-set';
export type { DetectionFailure, DetectionResult } from './detector-set';
export { detectArbitrage, priceRatioDeviation } from './arbitrage-detector';
export { detectSandwich } from './sandwich-detector';
export { detectLiquidation } from './liquidation-detector';
export { capValue, clampUnit, createDetectedOpportunity } from './scoring';
export type { DetectionInput } from './scoring';
