export { TradeAction, isTradeAction } from './types/index.js'
export type { Holding, Stock, Trade, TradeJSON, RebalanceResultJSON } from './types/index.js'

export { D, Dec, toDecimal, SHARE_DECIMALS, MONEY_DECIMALS } from './utils/decimal.js'
export type { Money, Weight, NumericInput } from './utils/decimal.js'
export { normalizeTicker } from './utils/allocationUtils.js'
export type { AllocationInput } from './utils/allocationUtils.js'
export * from './utils/rebalanceErrors.js'
export { logger } from './utils/logger.js'

export { loadRebalancerConfig, DEFAULT_CONFIG } from './config/rebalancerConfig.js'
export type { RebalancerConfig } from './config/rebalancerConfig.js'

export { createStock, createHolding, createTrade, marketValue, describeTrade } from './services/market.js'
export { Allocation, ALLOCATION_EPSILON } from './services/allocation.js'
export type { SafeAllocationResult } from './services/allocation.js'
export { PriceBook } from './services/priceBook.js'
export type { PriceBookInput } from './services/priceBook.js'
export { Portfolio } from './services/portfolio.js'
export type { PortfolioInit } from './services/portfolio.js'
export { computeRebalance } from './services/rebalancing.js'
export type { RebalanceOptions, RebalanceSnapshot } from './services/rebalancing.js'
export { RebalanceResult } from './services/rebalanceResult.js'

export {
    parsePortfolioInput,
    parseRebalanceRequest,
    rebalanceFromInput,
    portfolioInputSchema,
    rebalanceRequestSchema,
} from './api/validation.js'
export type { PortfolioInput, RebalanceRequest } from './api/validation.js'
