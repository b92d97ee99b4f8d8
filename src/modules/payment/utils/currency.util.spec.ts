import { ValidationError } from '../../../common/exceptions/service.exception';
import { fromMinorUnits, getCurrencyExponent, normalizeCurrency, toMinorUnits } from './currency.util';

describe('currency.util', () => {
    describe('toMinorUnits', () => {
        it('converts rupees to paise', () => {
            expect(toMinorUnits(150.0, 'INR')).toBe(15000);
        });

        it('handles binary-unfriendly decimals', () => {
            expect(toMinorUnits(19.99, 'USD')).toBe(1999);
            expect(toMinorUnits(0.1 + 0.2, 'EUR')).toBe(30);
        });

        it('uses the currency exponent table', () => {
            expect(toMinorUnits(500, 'JPY')).toBe(500);
            expect(toMinorUnits(1.234, 'KWD')).toBe(1234);
        });

        it('accepts lower-case codes', () => {
            expect(toMinorUnits(2.5, 'inr')).toBe(250);
        });

        it('rejects amounts finer than the minor unit', () => {
            expect(() => toMinorUnits(0.001, 'INR')).toThrow(ValidationError);
            expect(() => toMinorUnits(0.001, 'INR')).toThrow('Amount 0.001 has more than 2 decimal places for INR');
            expect(() => toMinorUnits(10.5, 'JPY')).toThrow('Amount 10.5 has more than 0 decimal places for JPY');
        });

        it('rejects negative and non-finite amounts', () => {
            expect(() => toMinorUnits(-1, 'INR')).toThrow('Invalid amount: -1');
            expect(() => toMinorUnits(Number.NaN, 'INR')).toThrow('Invalid amount: NaN');
            expect(() => toMinorUnits(Number.POSITIVE_INFINITY, 'INR')).toThrow('Invalid amount: Infinity');
        });

        it('rejects malformed currency codes', () => {
            expect(() => toMinorUnits(10, 'RUPEE')).toThrow('Invalid currency code: RUPEE');
            expect(() => toMinorUnits(10, '')).toThrow('Invalid currency code: ');
        });
    });

    describe('fromMinorUnits', () => {
        it('converts paise back to rupees', () => {
            expect(fromMinorUnits(15000, 'INR')).toBe(150);
        });

        it('rejects fractional minor amounts', () => {
            expect(() => fromMinorUnits(1.5, 'INR')).toThrow('Invalid minor-unit amount: 1.5');
        });

        it.each([
            [0.01, 'INR'],
            [150, 'INR'],
            [19.99, 'USD'],
            [1234.56, 'EUR'],
            [500, 'JPY'],
            [1.234, 'KWD']
        ])('round-trips %p %s', (amount, currency) => {
            expect(fromMinorUnits(toMinorUnits(amount, currency), currency)).toBe(amount);
        });
    });

    describe('getCurrencyExponent', () => {
        it('defaults to two decimal places', () => {
            expect(getCurrencyExponent('INR')).toBe(2);
            expect(getCurrencyExponent('XYZ')).toBe(2);
        });

        it('knows zero- and three-decimal currencies', () => {
            expect(getCurrencyExponent('krw')).toBe(0);
            expect(getCurrencyExponent('BHD')).toBe(3);
        });
    });

    it('normalizes codes to upper case', () => {
        expect(normalizeCurrency(' usd ')).toBe('USD');
    });
});
