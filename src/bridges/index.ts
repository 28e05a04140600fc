/**
 * Data Bridges
 * Export all bundled market-data providers
 */

export { StaticDataBridge } from './static-data-bridge';

export { UniswapV2ReserveBridge } from './uniswap-v2-bridge';
export type { UniswapV2ReserveBridgeConfig } from './uniswap-v2-bridge';

export { UniswapV3SpotBridge } from './uniswap-v3-bridge';
export type { UniswapV3SpotBridgeConfig } from './uniswap-v3-bridge';

export { ChainlinkFeedBridge } from './chainlink-bridge';
export type { ChainlinkFeedBridgeConfig } from './chainlink-bridge';

export { TokenMetadataCache } from './token-metadata';
export { encodePricePayload, decodePricePayload } from './payload';
export type { PricePayload } from './payload';
