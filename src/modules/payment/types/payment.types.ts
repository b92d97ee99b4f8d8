export enum PaymentMethodType {
    CARD = 'CARD',
    UPI = 'UPI',
    WALLET = 'WALLET',
    NET_BANKING = 'NET_BANKING'
}

export enum PaymentStatus {
    PENDING = 'PENDING',
    PROCESSING = 'PROCESSING',
    SUCCESS = 'SUCCESS',
    FAILED = 'FAILED',
    REFUNDED = 'REFUNDED'
}

export enum RefundStatus {
    PENDING = 'PENDING',
    PROCESSING = 'PROCESSING',
    SUCCESS = 'SUCCESS',
    FAILED = 'FAILED'
}

const TERMINAL_PAYMENT_STATUSES: ReadonlySet<PaymentStatus> = new Set([
    PaymentStatus.SUCCESS,
    PaymentStatus.FAILED,
    PaymentStatus.REFUNDED
]);

const TERMINAL_REFUND_STATUSES: ReadonlySet<RefundStatus> = new Set([
    RefundStatus.SUCCESS,
    RefundStatus.FAILED
]);

export function isTerminalPaymentStatus(status: PaymentStatus): boolean {
    return TERMINAL_PAYMENT_STATUSES.has(status);
}

export function isTerminalRefundStatus(status: RefundStatus): boolean {
    return TERMINAL_REFUND_STATUSES.has(status);
}

export interface PaymentRequest {
    /** Major currency units, e.g. rupees. */
    amount: number;
    currency: string;
    methodType: PaymentMethodType;
    upiId?: string;
    /** Saved card token issued by the provider. */
    token?: string;
    wallet?: string;
    bank?: string;
    orderId?: string;
}

export interface PaymentResponse {
    gatewayOrderId?: string;
    /** Equals the order id until the provider settles a payment against it. */
    gatewayPaymentId?: string;
    status: PaymentStatus;
    paymentLink?: string;
    qrCode?: string;
    errorMessage?: string;
}

export interface RefundRequest {
    gatewayPaymentId: string;
    amount: number;
    currency?: string;
    reason?: string;
}

export interface RefundResponse {
    gatewayRefundId?: string;
    status: RefundStatus;
    errorMessage?: string;
}

export interface PaymentMethodTokenizeRequest {
    methodType: PaymentMethodType;
    customerId?: string;
    cardNumber?: string;
    cardholderName?: string;
    expiryMonth?: number;
    expiryYear?: number;
    cvv?: string;
    /** Provider payment through which the cardholder completed card authentication. */
    authenticationPaymentId?: string;
    /** Reference number issued when that authentication was initiated. */
    authenticationReferenceNumber?: string;
}

export interface PaymentMethodTokenizeResponse {
    token: string;
    maskedCardNumber?: string;
    cardNetwork?: string;
    expiryMonth?: number;
    expiryYear?: number;
}
