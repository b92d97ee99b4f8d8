import { PaymentStatus, RefundStatus } from '../types/payment.types';

export interface ProviderStatusTable {
    payment: Readonly<Record<string, PaymentStatus>>;
    refund: Readonly<Record<string, RefundStatus>>;
}

export interface StatusMapper {
    toPaymentStatus(raw: string | null | undefined): PaymentStatus;
    toRefundStatus(raw: string | null | undefined): RefundStatus;
}

/** Raw provider statuses, keyed in lower case. */
export const STATUS_TABLES = {
    RAZORPAY: {
        payment: {
            created: PaymentStatus.PENDING,
            authorized: PaymentStatus.PENDING,
            captured: PaymentStatus.SUCCESS,
            failed: PaymentStatus.FAILED,
            refunded: PaymentStatus.REFUNDED
        },
        refund: {
            pending: RefundStatus.PENDING,
            processed: RefundStatus.SUCCESS,
            failed: RefundStatus.FAILED
        }
    }
} satisfies Record<string, ProviderStatusTable>;

function lookup<T>(table: ReadonlyMap<string, T>, raw: string | null | undefined, fallback: T): T {
    if (typeof raw !== 'string') {
        return fallback;
    }
    return table.get(raw.trim().toLowerCase()) ?? fallback;
}

/**
 * Unknown raw statuses map to PROCESSING: never dropped, never promoted to a
 * terminal state.
 */
export function createStatusMapper(table: ProviderStatusTable): StatusMapper {
    const payment = new Map(Object.entries(table.payment));
    const refund = new Map(Object.entries(table.refund));

    return {
        toPaymentStatus: raw => lookup(payment, raw, PaymentStatus.PROCESSING),
        toRefundStatus: raw => lookup(refund, raw, RefundStatus.PROCESSING)
    };
}

export const razorpayStatusMapper = createStatusMapper(STATUS_TABLES.RAZORPAY);
