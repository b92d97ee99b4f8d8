const MASK = '****';

/**
 * Masked display value for an instrument number: `****` plus the last four
 * digits. Returns undefined for anything shorter than four characters.
 */
export function maskCardNumber(cardNumber: string | null | undefined): string | undefined {
    const digits = (cardNumber ?? '').replace(/[\s-]/g, '');
    if (digits.length < 4) {
        return undefined;
    }
    return `${MASK}${digits.slice(-4)}`;
}

