import { ValidationError } from '../../../common/exceptions/service.exception';

const DEFAULT_EXPONENT = 2;

// ISO 4217 currencies whose minor unit is not 1/100.
const CURRENCY_EXPONENTS: ReadonlyMap<string, number> = new Map([
    ['BHD', 3], ['IQD', 3], ['JOD', 3], ['KWD', 3], ['LYD', 3], ['OMR', 3], ['TND', 3],
    ['BIF', 0], ['CLP', 0], ['DJF', 0], ['GNF', 0], ['ISK', 0], ['JPY', 0], ['KMF', 0],
    ['KRW', 0], ['PYG', 0], ['RWF', 0], ['UGX', 0], ['VND', 0], ['VUV', 0], ['XAF', 0],
    ['XOF', 0], ['XPF', 0]
]);

const CURRENCY_CODE = /^[A-Z]{3}$/;

export function normalizeCurrency(currency: string): string {
    const code = (currency ?? '').trim().toUpperCase();
    if (!CURRENCY_CODE.test(code)) {
        throw new ValidationError(`Invalid currency code: ${currency}`);
    }
    return code;
}

export function getCurrencyExponent(currency: string): number {
    return CURRENCY_EXPONENTS.get(normalizeCurrency(currency)) ?? DEFAULT_EXPONENT;
}

/**
 * Converts a major-unit amount to the provider's integer minor unit
 * (150.00 INR -> 15000 paise). Rejects amounts finer than the currency's
 * minor unit instead of rounding them away.
 */
export function toMinorUnits(amount: number, currency: string): number {
    if (!Number.isFinite(amount) || amount < 0) {
        throw new ValidationError(`Invalid amount: ${amount}`);
    }

    const exponent = getCurrencyExponent(currency);
    const scaled = amount * 10 ** exponent;
    const minor = Math.round(scaled);

    if (Math.abs(scaled - minor) > 1e-6) {
        throw new ValidationError(
            `Amount ${amount} has more than ${exponent} decimal places for ${normalizeCurrency(currency)}`
        );
    }
    if (!Number.isSafeInteger(minor)) {
        throw new ValidationError(`Amount ${amount} is out of range`);
    }

    return minor;
}

export function fromMinorUnits(minor: number, currency: string): number {
    if (!Number.isSafeInteger(minor)) {
        throw new ValidationError(`Invalid minor-unit amount: ${minor}`);
    }
    return minor / 10 ** getCurrencyExponent(currency);
}
