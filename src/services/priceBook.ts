import type { Stock } from '../types/index.js'
import type { NumericInput } from '../utils/decimal.js'
import { isIterable, normalizeTicker } from '../utils/allocationUtils.js'
import { DuplicateQuoteError, MissingPriceError } from '../utils/rebalanceErrors.js'
import { createStock } from './market.js'

export type PriceBookInput = PriceBook | Iterable<Stock> | Record<string, NumericInput>

/**
 * Quotes for tickers the portfolio needs to price but does not hold. Whatever
 * price feed exists lives outside the core; this is the snapshot it hands in.
 */
export class PriceBook {
    private readonly quotes: ReadonlyMap<string, Stock>

    private constructor(quotes: Map<string, Stock>) {
        this.quotes = quotes
        Object.freeze(this)
    }

    static empty(): PriceBook {
        return new PriceBook(new Map())
    }

    static from(input: PriceBookInput | undefined): PriceBook {
        if (input === undefined) return PriceBook.empty()
        if (input instanceof PriceBook) return input

        const quotes = new Map<string, Stock>()
        const add = (quote: Stock) => {
            if (quotes.has(quote.ticker)) {
                throw new DuplicateQuoteError(quote.ticker)
            }
            quotes.set(quote.ticker, quote)
        }

        if (isIterable<Stock>(input)) {
            for (const stock of input) {
                // Re-validate: Stock is a plain interface and may not come from createStock
                add(createStock(stock.ticker, stock.price))
            }
        } else {
            // Record keys can still collide once normalised ('goog' and 'GOOG')
            for (const [ticker, price] of Object.entries(input)) {
                add(createStock(ticker, price))
            }
        }
        return new PriceBook(quotes)
    }

    get size(): number {
        return this.quotes.size
    }

    find(ticker: string): Stock | undefined {
        return this.quotes.get(normalizeTicker(ticker))
    }

    require(ticker: string): Stock {
        const stock = this.find(ticker)
        if (!stock) {
            throw new MissingPriceError(normalizeTicker(ticker))
        }
        return stock
    }
}
