import type { Decimal } from 'decimal.js'
import { logger } from '../utils/logger.js'
import { SHARE_DECIMALS, ZERO, toDecimal } from '../utils/decimal.js'

export interface RebalancerConfig {
    /** Minimum monetary deviation before a trade is emitted */
    defaultThreshold: Decimal
    /** Decimal places kept on trade share quantities */
    shareDecimals: number
}

export const DEFAULT_CONFIG: Readonly<RebalancerConfig> = {
    defaultThreshold: ZERO,
    shareDecimals: SHARE_DECIMALS,
}

const MAX_SHARE_DECIMALS = 12

/**
 * Read the rebalancer settings from the environment. Every problem is
 * collected and reported together.
 */
export function loadRebalancerConfig(env: NodeJS.ProcessEnv = process.env): RebalancerConfig {
    const errors: string[] = []
    const warnings: string[] = []

    let defaultThreshold = DEFAULT_CONFIG.defaultThreshold
    const thresholdRaw = env.REBALANCE_DEFAULT_THRESHOLD?.trim()
    if (thresholdRaw) {
        try {
            defaultThreshold = toDecimal(thresholdRaw)
            if (defaultThreshold.lt(0)) {
                errors.push(`REBALANCE_DEFAULT_THRESHOLD '${thresholdRaw}' cannot be negative.`)
            }
        } catch {
            errors.push(`REBALANCE_DEFAULT_THRESHOLD '${thresholdRaw}' is not a number.`)
        }
    }

    let shareDecimals = DEFAULT_CONFIG.shareDecimals
    const shareDecimalsRaw = env.REBALANCE_SHARE_DECIMALS?.trim()
    if (shareDecimalsRaw) {
        const parsed = Number(shareDecimalsRaw)
        if (!Number.isInteger(parsed) || parsed < 0 || parsed > MAX_SHARE_DECIMALS) {
            errors.push(`REBALANCE_SHARE_DECIMALS '${shareDecimalsRaw}' is invalid. Provide an integer between 0 and ${MAX_SHARE_DECIMALS}.`)
        } else {
            shareDecimals = parsed
            if (parsed === 0) {
                warnings.push('REBALANCE_SHARE_DECIMALS is 0: fractional share trades will be rounded to whole shares.')
            }
        }
    }

    if (errors.length > 0) {
        const numberedErrors = errors.map((msg, idx) => `${idx + 1}. ${msg}`).join('\n')
        throw new Error(
            [
                '[REBALANCER-CONFIG] Validation failed.',
                numberedErrors,
            ].join('\n')
        )
    }

    if (warnings.length > 0) {
        logger.warn({ warnings }, '[REBALANCER-CONFIG] Warnings')
    }

    return {
        defaultThreshold,
        shareDecimals,
    }
}
