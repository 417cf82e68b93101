import { z, type ZodError } from 'zod'
import type { NumericInput } from '../utils/decimal.js'
import { logger } from '../utils/logger.js'
import { InputValidationError, type InputIssue } from '../utils/rebalanceErrors.js'
import { createHolding, createStock } from '../services/market.js'
import { Portfolio } from '../services/portfolio.js'
import type { RebalanceResult } from '../services/rebalanceResult.js'

// Numbers or numeric strings; strings stay strings so no float ever touches them
const numeric = z.union([
    z.number().finite(),
    z.string().trim().regex(/^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/, 'Must be a numeric string'),
])

const ticker = z.string().trim().min(1, 'ticker is required')

export const holdingSchema = z.object({
    ticker,
    price: numeric,
    shares: numeric,
}).strict()

export const quoteSchema = z.object({
    ticker,
    price: numeric,
}).strict()

// Schema for a portfolio snapshot handed in by an outer collaborator
export const portfolioInputSchema = z.object({
    holdings: z.array(holdingSchema).default([]),
    allocation: z.record(z.string(), numeric).refine(
        (allocation) => Object.keys(allocation).length > 0,
        { message: 'allocation must name at least one ticker' }
    ),
    cash: numeric.optional(),
    quotes: z.array(quoteSchema).optional(),
}).strict()

export const rebalanceRequestSchema = portfolioInputSchema.extend({
    threshold: numeric.optional(),
}).strict()

export type PortfolioInput = z.infer<typeof portfolioInputSchema>
export type RebalanceRequest = z.infer<typeof rebalanceRequestSchema>

const formatIssues = (error: ZodError): InputIssue[] =>
    error.issues.map(issue => ({
        field: issue.path.join('.'),
        message: issue.message,
    }))

function parseOrThrow<T extends z.ZodTypeAny>(schema: T, raw: unknown, label: string): z.output<T> {
    const result = schema.safeParse(raw)
    if (!result.success) {
        const issues = formatIssues(result.error)
        logger.warn({ input: label, errors: issues }, 'Input validation failed')
        throw new InputValidationError(`Invalid ${label}`, issues)
    }
    return result.data
}

/**
 * Build a Portfolio from untrusted JSON. Shape problems raise
 * InputValidationError; domain problems (negative shares, weights not summing
 * to 1, ...) raise their own errors from the constructors.
 */
export function portfolioFromInput(input: PortfolioInput): Portfolio {
    return new Portfolio({
        holdings: input.holdings.map(h => createHolding(createStock(h.ticker, h.price), h.shares)),
        allocation: input.allocation,
        cash: input.cash,
        prices: input.quotes?.map(q => createStock(q.ticker, q.price)),
    })
}

export function parsePortfolioInput(raw: unknown): Portfolio {
    return portfolioFromInput(parseOrThrow(portfolioInputSchema, raw, 'portfolio input'))
}

export function parseRebalanceRequest(raw: unknown): { portfolio: Portfolio, threshold: NumericInput | undefined } {
    const request = parseOrThrow(rebalanceRequestSchema, raw, 'rebalance request')
    const { threshold, ...portfolio } = request
    return { portfolio: portfolioFromInput(portfolio), threshold }
}

/** Parse a rebalance request and run it */
export function rebalanceFromInput(raw: unknown): RebalanceResult {
    const { portfolio, threshold } = parseRebalanceRequest(raw)
    return threshold === undefined ? portfolio.rebalance() : portfolio.rebalance(threshold)
}
