import { describe, it, expect } from 'vitest'
import { createHolding, createStock, marketValue } from '../services/market.js'
import { PriceBook } from '../services/priceBook.js'
import {
    DuplicateQuoteError,
    InvalidTickerError,
    MissingPriceError,
    NegativePriceError,
    NegativeSharesError,
} from '../utils/rebalanceErrors.js'

describe('createStock', () => {
    it('normalises the ticker and stores an exact price', () => {
        const stock = createStock(' aapl ', 228.1)

        expect(stock.ticker).toBe('AAPL')
        expect(stock.price.toString()).toBe('228.1')
        expect(Object.isFrozen(stock)).toBe(true)
    })

    it('allows a zero price', () => {
        expect(createStock('DEAD', 0).price.isZero()).toBe(true)
    })

    it('rejects a negative price', () => {
        expect(() => createStock('AAPL', -1)).toThrow(NegativePriceError)
    })

    it('rejects an empty or blank ticker', () => {
        expect(() => createStock('', 1)).toThrow(InvalidTickerError)
        expect(() => createStock('   ', 1)).toThrow(InvalidTickerError)
    })
})

describe('createHolding', () => {
    it('computes market value with fractional shares', () => {
        const holding = createHolding(createStock('META', '585'), '0.5')
        expect(marketValue(holding).toString()).toBe('292.5')
    })

    it('allows zero shares', () => {
        expect(marketValue(createHolding(createStock('META', 585), 0)).isZero()).toBe(true)
    })

    it('rejects negative shares', () => {
        expect(() => createHolding(createStock('META', 585), -0.5)).toThrow(NegativeSharesError)
    })
})

describe('PriceBook', () => {
    it('builds from stocks or a ticker-to-price record', () => {
        const fromStocks = PriceBook.from([createStock('GOOG', 150)])
        const fromRecord = PriceBook.from({ goog: '150' })

        expect(fromStocks.require('goog').price.toString()).toBe('150')
        expect(fromRecord.find('GOOG')?.ticker).toBe('GOOG')
        expect(PriceBook.from(fromRecord)).toBe(fromRecord)
    })

    it('is empty when nothing is given', () => {
        const book = PriceBook.from(undefined)
        expect(book.size).toBe(0)
        expect(book.find('GOOG')).toBeUndefined()
    })

    it('fails with MissingPriceError for unknown tickers', () => {
        expect(() => PriceBook.empty().require('goog')).toThrow(MissingPriceError)
        expect(() => PriceBook.empty().require('goog')).toThrow('No price available for GOOG')
    })

    it('rejects negative quotes', () => {
        expect(() => PriceBook.from({ GOOG: -1 })).toThrow(NegativePriceError)
    })

    it('rejects two quotes for the same ticker', () => {
        expect(() => PriceBook.from({ goog: 150, GOOG: 151 })).toThrow(DuplicateQuoteError)
        expect(() => PriceBook.from([createStock('GOOG', 150), createStock(' goog ', 151)]))
            .toThrow('Duplicate quote for ticker: GOOG')
    })
})
