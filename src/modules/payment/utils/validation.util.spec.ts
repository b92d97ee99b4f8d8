import { ValidationError } from '../../../common/exceptions/service.exception';
import { RefundRequestDto } from '../dto/refund-request.dto';
import { validateRequest } from './validation.util';

describe('validateRequest', () => {
    it('returns the typed instance for a valid payload', () => {
        const dto = validateRequest(RefundRequestDto, { gatewayPaymentId: 'pay_1', amount: '50.5' }, 'refund request');

        expect(dto).toBeInstanceOf(RefundRequestDto);
        expect(dto.amount).toBe(50.5);
    });

    it('reports constraint messages without the rejected values', () => {
        let failure: unknown;
        try {
            validateRequest(RefundRequestDto, { gatewayPaymentId: 'pay_secret_ref', amount: -3 }, 'refund request');
        } catch (error) {
            failure = error;
        }

        expect(failure).toBeInstanceOf(ValidationError);
        expect(failure).toMatchObject({
            message: 'Invalid refund request: amount must be a positive number',
            details: [{ property: 'amount', constraints: { isPositive: 'amount must be a positive number' } }]
        });
        expect(JSON.stringify(failure)).not.toContain('pay_secret_ref');
    });
});
