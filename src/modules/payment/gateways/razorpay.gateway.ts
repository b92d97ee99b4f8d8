import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { v4 as uuidv4 } from 'uuid';
import razorpayConfig from '../../../config/razorpay.config';
import { TokenizationError, ValidationError } from '../../../common/exceptions/service.exception';
import { PaymentRequestDto } from '../dto/payment-request.dto';
import { RefundRequestDto } from '../dto/refund-request.dto';
import { TokenizeRequestDto } from '../dto/tokenize-request.dto';
import { PaymentGateway } from '../interfaces/payment-gateway.interface';
import { RazorpayApi, RazorpayNotes } from '../interfaces/razorpay-api.interface';
import { RAZORPAY_API, RAZORPAY_PROVIDER } from '../payment.constants';
import {
    PaymentMethodTokenizeRequest,
    PaymentMethodTokenizeResponse,
    PaymentMethodType,
    PaymentRequest,
    PaymentResponse,
    PaymentStatus,
    RefundRequest,
    RefundResponse,
    RefundStatus
} from '../types/payment.types';
import { normalizeCurrency, toMinorUnits } from '../utils/currency.util';
import { PaymentErrorHandler } from '../utils/error-handler.util';
import { maskCardNumber } from '../utils/masking.util';
import { razorpayStatusMapper } from '../utils/status-mapper.util';
import { validateRequest } from '../utils/validation.util';
import { WebhookPayload, verifyWebhookSignature } from '../utils/webhook-signature.util';

const DEFAULT_REFUND_CURRENCY = 'INR';

const METHOD_NOTES: Record<PaymentMethodType, (request: PaymentRequestDto) => RazorpayNotes> = {
    [PaymentMethodType.UPI]: request => ({
        payment_method: 'upi',
        ...(request.upiId ? { upi_id: request.upiId } : {})
    }),
    [PaymentMethodType.CARD]: request => ({
        payment_method: 'card',
        ...(request.token ? { card_token: request.token } : {})
    }),
    [PaymentMethodType.WALLET]: request => ({
        payment_method: 'wallet',
        ...(request.wallet ? { wallet: request.wallet } : {})
    }),
    [PaymentMethodType.NET_BANKING]: request => ({
        payment_method: 'netbanking',
        ...(request.bank ? { bank: request.bank } : {})
    })
};

function generateReceipt(): string {
    return `rcpt_${uuidv4().replace(/-/g, '')}`;
}

function twoDigits(value: number): string {
    return String(value).padStart(2, '0');
}

interface CardTokenFields {
    customerId: string;
    cardNumber: string;
    cardholderName: string;
    cvv: string;
    expiryMonth: number;
    expiryYear: number;
    authenticationPaymentId: string;
    authenticationReferenceNumber: string;
}

const CARD_TOKEN_FIELDS: ReadonlyArray<keyof CardTokenFields> = [
    'customerId',
    'cardNumber',
    'cardholderName',
    'cvv',
    'expiryMonth',
    'expiryYear',
    'authenticationPaymentId',
    'authenticationReferenceNumber'
];

function requireCardFields(dto: TokenizeRequestDto): CardTokenFields {
    const {
        customerId,
        cardNumber,
        cardholderName,
        cvv,
        expiryMonth,
        expiryYear,
        authenticationPaymentId,
        authenticationReferenceNumber
    } = dto;

    if (
        customerId && cardNumber && cardholderName && cvv &&
        expiryMonth !== undefined && expiryYear !== undefined &&
        authenticationPaymentId && authenticationReferenceNumber
    ) {
        return {
            customerId,
            cardNumber,
            cardholderName,
            cvv,
            expiryMonth,
            expiryYear,
            authenticationPaymentId,
            authenticationReferenceNumber
        };
    }

    const missing = CARD_TOKEN_FIELDS.filter(field => dto[field] === undefined || dto[field] === '');
    throw new TokenizationError(`Card tokenization requires ${missing.join(', ')}`);
}

@Injectable()
export class RazorpayGateway implements PaymentGateway {
    private readonly logger = new Logger(RazorpayGateway.name);

    constructor(
        @Inject(RAZORPAY_API) private readonly razorpay: RazorpayApi,
        @Inject(razorpayConfig.KEY) private readonly config: ConfigType<typeof razorpayConfig>
    ) { }

    async processPayment(request: PaymentRequest): Promise<PaymentResponse> {
        try {
            const dto = validateRequest(PaymentRequestDto, request, 'payment request');
            const currency = normalizeCurrency(dto.currency);

            const order = await this.razorpay.createOrder({
                amount: toMinorUnits(dto.amount, currency),
                currency,
                receipt: dto.orderId ?? generateReceipt(),
                notes: METHOD_NOTES[dto.methodType](dto)
            });

            this.logger.log(`Razorpay order created: orderId=${order.id}, status=${order.status}`);

            return {
                gatewayOrderId: order.id,
                gatewayPaymentId: order.id,
                status: razorpayStatusMapper.toPaymentStatus(order.status),
                paymentLink: dto.methodType === PaymentMethodType.UPI ? order.shortUrl : undefined
            };
        } catch (error) {
            PaymentErrorHandler.logFailure(error, 'processPayment');
            return {
                status: PaymentStatus.FAILED,
                errorMessage: PaymentErrorHandler.failureMessage(error, 'Payment processing failed')
            };
        }
    }

    async processRefund(request: RefundRequest): Promise<RefundResponse> {
        try {
            const dto = validateRequest(RefundRequestDto, request, 'refund request');
            const currency = normalizeCurrency(dto.currency ?? DEFAULT_REFUND_CURRENCY);

            const refund = await this.razorpay.createRefund(dto.gatewayPaymentId, {
                amount: toMinorUnits(dto.amount, currency),
                notes: dto.reason ? { reason: dto.reason } : {}
            });

            this.logger.log(`Razorpay refund created: refundId=${refund.id}, status=${refund.status}`);

            return {
                gatewayRefundId: refund.id,
                status: razorpayStatusMapper.toRefundStatus(refund.status)
            };
        } catch (error) {
            PaymentErrorHandler.logFailure(error, 'processRefund');
            return {
                status: RefundStatus.FAILED,
                errorMessage: PaymentErrorHandler.failureMessage(error, 'Refund processing failed')
            };
        }
    }

    /**
     * Saves a card with Razorpay and returns the provider token. Rejects with
     * a TokenizationError: a card that cannot be saved blocks the caller's
     * save flow instead of being recorded as a failed result.
     */
    async tokenizePaymentMethod(request: PaymentMethodTokenizeRequest): Promise<PaymentMethodTokenizeResponse> {
        let dto: TokenizeRequestDto;
        try {
            dto = validateRequest(TokenizeRequestDto, request, 'tokenize request');
        } catch (error) {
            throw new TokenizationError(PaymentErrorHandler.failureMessage(error, 'Tokenization failed'), error);
        }

        if (dto.methodType !== PaymentMethodType.CARD) {
            throw new TokenizationError(`Tokenization is not supported for ${dto.methodType} on ${RAZORPAY_PROVIDER}`);
        }

        const card = requireCardFields(dto);

        try {
            const token = await this.razorpay.createToken({
                customer_id: card.customerId,
                method: 'card',
                card: {
                    number: card.cardNumber.replace(/[\s-]/g, ''),
                    name: card.cardholderName,
                    cvv: card.cvv,
                    expiry_month: twoDigits(card.expiryMonth),
                    expiry_year: String(card.expiryYear)
                },
                authentication: {
                    provider: 'razorpay',
                    provider_reference_id: card.authenticationPaymentId,
                    authentication_reference_number: card.authenticationReferenceNumber
                }
            });

            this.logger.log(`Razorpay card token created: customerId=${card.customerId}`);

            return {
                token: token.id,
                maskedCardNumber: maskCardNumber(token.last4) ?? maskCardNumber(card.cardNumber),
                cardNetwork: token.network,
                expiryMonth: token.expiryMonth ?? card.expiryMonth,
                expiryYear: token.expiryYear ?? card.expiryYear
            };
        } catch (error) {
            PaymentErrorHandler.logFailure(error, 'tokenizePaymentMethod');
            throw new TokenizationError(PaymentErrorHandler.failureMessage(error, 'Tokenization failed'), error);
        }
    }

    async getPaymentStatus(transactionId: string): Promise<PaymentResponse> {
        try {
            if (typeof transactionId !== 'string' || transactionId.trim().length === 0) {
                throw new ValidationError('Invalid status request: transaction id is required');
            }

            const payment = await this.razorpay.fetchPayment(transactionId);

            return {
                gatewayOrderId: transactionId,
                gatewayPaymentId: payment.id,
                status: razorpayStatusMapper.toPaymentStatus(payment.status)
            };
        } catch (error) {
            PaymentErrorHandler.logFailure(error, 'getPaymentStatus');
            return {
                gatewayOrderId: transactionId,
                status: PaymentStatus.FAILED,
                errorMessage: PaymentErrorHandler.failureMessage(error, 'Payment status lookup failed')
            };
        }
    }

    verifyWebhookSignature(payload: WebhookPayload, signature: string): boolean {
        const verified = verifyWebhookSignature(payload, signature, this.config.webhookSecret, error => {
            this.logger.error(
                `Webhook signature verification errored: ${PaymentErrorHandler.describe(error)}`,
                error instanceof Error ? error.stack : undefined
            );
        });

        if (!verified) {
            this.logger.warn('Rejected Razorpay webhook with an invalid signature');
        }
        return verified;
    }

    getProviderName(): string {
        return RAZORPAY_PROVIDER;
    }
}
