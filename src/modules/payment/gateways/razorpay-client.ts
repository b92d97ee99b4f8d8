import { Inject, Injectable } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import Razorpay from 'razorpay';
import { defer, firstValueFrom, timeout } from 'rxjs';
import razorpayConfig from '../../../config/razorpay.config';
import { ConfigurationError, IntegrationError } from '../../../common/exceptions/service.exception';
import { toNumber } from '../../../common/utils/guards.util';
import {
    RazorpayApi,
    RazorpayOrderEntity,
    RazorpayOrderPayload,
    RazorpayPaymentEntity,
    RazorpayRefundEntity,
    RazorpayRefundPayload,
    RazorpayTokenEntity,
    RazorpayTokenPayload
} from '../interfaces/razorpay-api.interface';
import { RAZORPAY_SDK } from '../payment.constants';
import { PaymentErrorHandler } from '../utils/error-handler.util';

const PROVIDER = 'Razorpay';

interface RazorpayCredentials {
    keyId: string;
    keySecret: string;
}

function requireCredentials(config: ConfigType<typeof razorpayConfig>): RazorpayCredentials {
    if (!config.keyId || !config.keySecret) {
        throw new ConfigurationError('RAZORPAY_KEY_ID and RAZORPAY_KEY_SECRET must be configured');
    }
    return { keyId: config.keyId, keySecret: config.keySecret };
}

export function createRazorpaySdk(config: ConfigType<typeof razorpayConfig>): Razorpay {
    const { keyId, keySecret } = requireCredentials(config);
    return new Razorpay({ key_id: keyId, key_secret: keySecret });
}

/**
 * Razorpay access over the official SDK. Every call is bounded by the
 * configured timeout and every failure surfaces as an IntegrationError.
 */
@Injectable()
export class RazorpayClient implements RazorpayApi {
    constructor(
        @Inject(RAZORPAY_SDK) private readonly sdk: Razorpay,
        @Inject(razorpayConfig.KEY) private readonly config: ConfigType<typeof razorpayConfig>
    ) { }

    async createOrder(payload: RazorpayOrderPayload): Promise<RazorpayOrderEntity> {
        const order = await this.call('createOrder', () => this.sdk.orders.create({
            amount: payload.amount,
            currency: payload.currency,
            receipt: payload.receipt,
            notes: payload.notes
        }));

        return {
            id: order.id,
            status: order.status,
            shortUrl: 'short_url' in order && typeof order.short_url === 'string' ? order.short_url : undefined
        };
    }

    async fetchPayment(paymentId: string): Promise<RazorpayPaymentEntity> {
        const payment = await this.call('fetchPayment', () => this.sdk.payments.fetch(paymentId));

        return { id: payment.id, status: payment.status };
    }

    async createRefund(paymentId: string, payload: RazorpayRefundPayload): Promise<RazorpayRefundEntity> {
        const refund = await this.call('createRefund', () => this.sdk.payments.refund(paymentId, {
            amount: payload.amount,
            notes: payload.notes
        }));

        return { id: refund.id, status: refund.status };
    }

    async createToken(payload: RazorpayTokenPayload): Promise<RazorpayTokenEntity> {
        const token = await this.call('createToken', () => this.sdk.tokens.create(payload));

        if (!token.id) {
            throw new IntegrationError(`${PROVIDER} createToken returned no token id`, {
                provider: PROVIDER,
                operation: 'createToken'
            });
        }

        return {
            id: token.id,
            last4: token.card?.last4,
            network: token.card?.network,
            expiryMonth: toNumber(token.card?.expiry_month),
            expiryYear: toNumber(token.card?.expiry_year)
        };
    }

    private async call<T>(operation: string, request: () => Promise<T>): Promise<T> {
        try {
            return await firstValueFrom(defer(request).pipe(timeout(this.config.timeoutMs)));
        } catch (error) {
            throw PaymentErrorHandler.toIntegrationError(error, PROVIDER, operation);
        }
    }
}
