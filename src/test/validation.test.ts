import { describe, it, expect } from 'vitest'
import { parsePortfolioInput, parseRebalanceRequest, rebalanceFromInput } from '../api/validation.js'
import {
    AllocationSumError,
    InputValidationError,
    NegativeSharesError,
} from '../utils/rebalanceErrors.js'

const validInput = {
    holdings: [
        { ticker: 'meta', price: 585, shares: 50 },
        { ticker: 'AAPL', price: '228', shares: '100' },
        { ticker: 'NVDA', price: 131, shares: 200 },
    ],
    allocation: { META: 0.4, AAPL: '0.35', NVDA: 0.25 },
    cash: '2000.00',
}

const captureError = (fn: () => unknown): unknown => {
    try {
        fn()
    } catch (error) {
        return error
    }
    return undefined
}

describe('parsePortfolioInput', () => {
    it('builds a portfolio from JSON with numbers and numeric strings', () => {
        const portfolio = parsePortfolioInput(validInput)

        expect(portfolio.totalValue.toString()).toBe('80250')
        expect(portfolio.holdingFor('META')?.shares.toString()).toBe('50')
        expect(portfolio.allocation.weightOf('AAPL').toString()).toBe('0.35')
    })

    it('reports the path of a malformed field', () => {
        const error = captureError(() => parsePortfolioInput({
            ...validInput,
            holdings: [{ ticker: 'AAPL', price: 'abc', shares: 1 }],
        }))

        expect(error).toBeInstanceOf(InputValidationError)
        expect(error).toMatchObject({ code: 'INPUT_VALIDATION', message: 'Invalid portfolio input' })
        if (error instanceof InputValidationError) {
            expect(error.details.map(d => d.field)).toEqual(['holdings.0.price'])
        }
    })

    it('requires an allocation with at least one ticker', () => {
        const missing = captureError(() => parsePortfolioInput({ holdings: [] }))
        const empty = captureError(() => parsePortfolioInput({ holdings: [], allocation: {} }))

        expect(missing).toBeInstanceOf(InputValidationError)
        expect(empty).toBeInstanceOf(InputValidationError)
        if (empty instanceof InputValidationError) {
            expect(empty.details).toEqual([
                { field: 'allocation', message: 'allocation must name at least one ticker' },
            ])
        }
    })

    it('rejects unknown keys', () => {
        expect(() => parsePortfolioInput({ ...validInput, leverage: 2 })).toThrow(InputValidationError)
    })

    it('lets domain errors through unchanged', () => {
        expect(() => parsePortfolioInput({ ...validInput, allocation: { META: 0.5 } })).toThrow(AllocationSumError)
        expect(() => parsePortfolioInput({
            ...validInput,
            holdings: [{ ticker: 'META', price: 585, shares: -1 }],
        })).toThrow(NegativeSharesError)
    })
})

describe('parseRebalanceRequest', () => {
    it('separates the threshold from the portfolio', () => {
        const { portfolio, threshold } = parseRebalanceRequest({ ...validInput, threshold: '3000' })

        expect(threshold).toBe('3000')
        expect(portfolio.cash.toString()).toBe('2000')
    })
})

describe('rebalanceFromInput', () => {
    it('rebalances with the default threshold when none is given', () => {
        expect(rebalanceFromInput(validInput).trades).toHaveLength(3)
    })

    it('applies the requested threshold', () => {
        const result = rebalanceFromInput({ ...validInput, threshold: 3000 })
        expect(result.trades.map(t => `${t.action} ${t.ticker}`)).toEqual(['SELL NVDA', 'BUY AAPL'])
    })

    it('prices allocated tickers from the quotes', () => {
        const result = rebalanceFromInput({
            holdings: [{ ticker: 'AAPL', price: 200, shares: 10 }],
            allocation: { AAPL: 0.5, GOOG: 0.5 },
            quotes: [{ ticker: 'goog', price: '100' }],
        })

        expect(result.toJSON().trades).toEqual([
            { ticker: 'AAPL', action: 'SELL', shares: '5', value: '1000' },
            { ticker: 'GOOG', action: 'BUY', shares: '10', value: '1000' },
        ])
        expect(result.warnings).toHaveLength(1)
    })
})
