export type RazorpayNotes = Record<string, string>;

export interface RazorpayOrderPayload {
    /** Minor units. */
    amount: number;
    currency: string;
    receipt: string;
    notes: RazorpayNotes;
}

export interface RazorpayOrderEntity {
    id: string;
    status: string;
    shortUrl?: string;
}

export interface RazorpayPaymentEntity {
    id: string;
    status: string;
}

export interface RazorpayRefundPayload {
    /** Minor units. */
    amount: number;
    notes: RazorpayNotes;
}

export interface RazorpayRefundEntity {
    id: string;
    status: string;
}

export interface RazorpayTokenPayload {
    customer_id: string;
    method: 'card';
    card: {
        number: string;
        name: string;
        cvv: string;
        expiry_month: string;
        expiry_year: string;
    };
    authentication: {
        provider: 'razorpay';
        provider_reference_id: string;
        authentication_reference_number: string;
    };
}

export interface RazorpayTokenEntity {
    id: string;
    last4?: string;
    network?: string;
    expiryMonth?: number;
    expiryYear?: number;
}

/**
 * The slice of the Razorpay API the gateway uses. Implementations reject with
 * an IntegrationError for every provider-side or transport failure.
 */
export interface RazorpayApi {
    createOrder(payload: RazorpayOrderPayload): Promise<RazorpayOrderEntity>;
    fetchPayment(paymentId: string): Promise<RazorpayPaymentEntity>;
    createRefund(paymentId: string, payload: RazorpayRefundPayload): Promise<RazorpayRefundEntity>;
    createToken(payload: RazorpayTokenPayload): Promise<RazorpayTokenEntity>;
}
