/**
 * Pricing Strategies
 */

export { ConstantProductStrategy } from './constant-product';
export type { ConstantProductStrategyConfig } from './constant-product';

export { OracleAnchoredStrategy } from './oracle-anchored';
export type { OracleAnchoredStrategyConfig } from './oracle-anchored';
