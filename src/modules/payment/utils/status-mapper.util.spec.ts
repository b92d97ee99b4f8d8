import { PaymentStatus, RefundStatus } from '../types/payment.types';
import { createStatusMapper, razorpayStatusMapper } from './status-mapper.util';

describe('status-mapper.util', () => {
    describe('razorpay payment statuses', () => {
        it.each([
            ['created', PaymentStatus.PENDING],
            ['AUTHORIZED', PaymentStatus.PENDING],
            ['authorized', PaymentStatus.PENDING],
            ['captured', PaymentStatus.SUCCESS],
            ['CAPTURED', PaymentStatus.SUCCESS],
            ['Captured', PaymentStatus.SUCCESS],
            ['failed', PaymentStatus.FAILED],
            ['refunded', PaymentStatus.REFUNDED]
        ])('maps %s to %s', (raw, expected) => {
            expect(razorpayStatusMapper.toPaymentStatus(raw)).toBe(expected);
        });

        it.each(['unknown_code', 'paid', 'attempted', '', 'constructor', 'toString'])(
            'maps unrecognized %p to PROCESSING',
            raw => {
                expect(razorpayStatusMapper.toPaymentStatus(raw)).toBe(PaymentStatus.PROCESSING);
            }
        );

        it('maps missing values to PROCESSING', () => {
            expect(razorpayStatusMapper.toPaymentStatus(undefined)).toBe(PaymentStatus.PROCESSING);
            expect(razorpayStatusMapper.toPaymentStatus(null)).toBe(PaymentStatus.PROCESSING);
        });
    });

    describe('razorpay refund statuses', () => {
        it.each([
            ['pending', RefundStatus.PENDING],
            ['PENDING', RefundStatus.PENDING],
            ['processed', RefundStatus.SUCCESS],
            ['Processed', RefundStatus.SUCCESS],
            ['failed', RefundStatus.FAILED]
        ])('maps %s to %s', (raw, expected) => {
            expect(razorpayStatusMapper.toRefundStatus(raw)).toBe(expected);
        });

        it('maps unrecognized values to PROCESSING', () => {
            expect(razorpayStatusMapper.toRefundStatus('created')).toBe(RefundStatus.PROCESSING);
            expect(razorpayStatusMapper.toRefundStatus(null)).toBe(RefundStatus.PROCESSING);
        });
    });

    it('builds mappers from any provider table', () => {
        const mapper = createStatusMapper({
            payment: { success: PaymentStatus.SUCCESS, user_dropped: PaymentStatus.FAILED },
            refund: { success: RefundStatus.SUCCESS }
        });

        expect(mapper.toPaymentStatus('SUCCESS')).toBe(PaymentStatus.SUCCESS);
        expect(mapper.toPaymentStatus('user_dropped')).toBe(PaymentStatus.FAILED);
        expect(mapper.toPaymentStatus('captured')).toBe(PaymentStatus.PROCESSING);
        expect(mapper.toRefundStatus('success')).toBe(RefundStatus.SUCCESS);
    });
});
