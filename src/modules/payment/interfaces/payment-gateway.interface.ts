import {
    PaymentMethodTokenizeRequest,
    PaymentMethodTokenizeResponse,
    PaymentRequest,
    PaymentResponse,
    RefundRequest,
    RefundResponse
} from '../types/payment.types';

/**
 * Provider-agnostic payment gateway. Callers select an implementation by
 * provider name through the GatewayRegistry and never depend on a concrete
 * adapter.
 *
 * Payment, refund and status calls resolve with a FAILED result instead of
 * rejecting. Only tokenization rejects, with a TokenizationError.
 */
export interface PaymentGateway {
    processPayment(request: PaymentRequest): Promise<PaymentResponse>;

    processRefund(request: RefundRequest): Promise<RefundResponse>;

    tokenizePaymentMethod(request: PaymentMethodTokenizeRequest): Promise<PaymentMethodTokenizeResponse>;

    /** On failure the response still carries `transactionId` as its gatewayOrderId. */
    getPaymentStatus(transactionId: string): Promise<PaymentResponse>;

    /**
     * @param payload the raw request body exactly as received
     * @param signature the provider's signature header
     */
    verifyWebhookSignature(payload: string | Buffer, signature: string): boolean;

    getProviderName(): string;
}
