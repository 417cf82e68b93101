export type RebalanceErrorCode =
    | 'INVALID_NUMBER'
    | 'INVALID_TICKER'
    | 'DUPLICATE_TICKER'
    | 'INVALID_WEIGHT'
    | 'ALLOCATION_SUM'
    | 'DUPLICATE_HOLDING'
    | 'NEGATIVE_SHARES'
    | 'NEGATIVE_PRICE'
    | 'NEGATIVE_CASH'
    | 'DUPLICATE_QUOTE'
    | 'MISSING_PRICE'
    | 'INVALID_THRESHOLD'
    | 'EMPTY_PORTFOLIO'
    | 'INPUT_VALIDATION'
    | 'INTERNAL_ERROR'

export class RebalanceError extends Error {
    code: RebalanceErrorCode
    details?: unknown

    constructor(code: RebalanceErrorCode, message: string, details?: unknown, options?: { cause?: unknown }) {
        super(message, options)
        this.name = 'RebalanceError'
        this.code = code
        this.details = details
    }
}

export class InvalidNumberError extends RebalanceError {
    constructor(value: string, cause?: unknown) {
        super('INVALID_NUMBER', `Cannot convert '${value}' to a decimal`, { value }, { cause })
        this.name = 'InvalidNumberError'
    }
}

export class InvalidTickerError extends RebalanceError {
    constructor(ticker: string) {
        super('INVALID_TICKER', 'Ticker cannot be empty', { ticker })
        this.name = 'InvalidTickerError'
    }
}

export class DuplicateTickerError extends RebalanceError {
    constructor(ticker: string) {
        super('DUPLICATE_TICKER', `Duplicate ticker in allocation: ${ticker}`, { ticker })
        this.name = 'DuplicateTickerError'
    }
}

export class InvalidWeightError extends RebalanceError {
    constructor(ticker: string, weight: string) {
        super('INVALID_WEIGHT', `Allocation for ${ticker} must be between 0 and 1, got ${weight}`, { ticker, weight })
        this.name = 'InvalidWeightError'
    }
}

export class AllocationSumError extends RebalanceError {
    constructor(total: string) {
        super('ALLOCATION_SUM', `Allocation must sum to 1 (100%), got ${total}`, { total })
        this.name = 'AllocationSumError'
    }
}

export class DuplicateHoldingError extends RebalanceError {
    constructor(ticker: string) {
        super('DUPLICATE_HOLDING', `Duplicate holding for ticker: ${ticker}`, { ticker })
        this.name = 'DuplicateHoldingError'
    }
}

export class NegativeSharesError extends RebalanceError {
    constructor(ticker: string, shares: string) {
        super('NEGATIVE_SHARES', `Shares cannot be negative for ${ticker}, got ${shares}`, { ticker, shares })
        this.name = 'NegativeSharesError'
    }
}

export class NegativePriceError extends RebalanceError {
    constructor(ticker: string, price: string) {
        super('NEGATIVE_PRICE', `Price cannot be negative for ${ticker}, got ${price}`, { ticker, price })
        this.name = 'NegativePriceError'
    }
}

export class NegativeCashError extends RebalanceError {
    constructor(cash: string) {
        super('NEGATIVE_CASH', `Cash cannot be negative, got ${cash}`, { cash })
        this.name = 'NegativeCashError'
    }
}

export class DuplicateQuoteError extends RebalanceError {
    constructor(ticker: string) {
        super('DUPLICATE_QUOTE', `Duplicate quote for ticker: ${ticker}`, { ticker })
        this.name = 'DuplicateQuoteError'
    }
}

export class MissingPriceError extends RebalanceError {
    constructor(ticker: string) {
        super('MISSING_PRICE', `No price available for ${ticker}`, { ticker })
        this.name = 'MissingPriceError'
    }
}

export class InvalidThresholdError extends RebalanceError {
    constructor(threshold: string) {
        super('INVALID_THRESHOLD', `Threshold cannot be negative, got ${threshold}`, { threshold })
        this.name = 'InvalidThresholdError'
    }
}

export class EmptyPortfolioError extends RebalanceError {
    constructor() {
        super('EMPTY_PORTFOLIO', 'Portfolio has zero value. Nothing to rebalance.')
        this.name = 'EmptyPortfolioError'
    }
}

export interface InputIssue {
    field: string
    message: string
}

export class InputValidationError extends RebalanceError {
    declare details: InputIssue[]

    constructor(message: string, issues: InputIssue[]) {
        super('INPUT_VALIDATION', message, issues)
        this.name = 'InputValidationError'
    }
}

export const mapUnknownError = (error: unknown): RebalanceError => {
    if (error instanceof RebalanceError) return error

    if (error instanceof Error) {
        return new RebalanceError('INTERNAL_ERROR', error.message || 'Unexpected error', undefined, { cause: error })
    }

    return new RebalanceError('INTERNAL_ERROR', 'Unexpected error', { error })
}
