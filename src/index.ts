import 'reflect-metadata';

export * from './common/exceptions/service.exception';
export { default as paymentConfig } from './config/payment.config';
export { default as razorpayConfig } from './config/razorpay.config';
export { PaymentEnvironment, validatePaymentEnv } from './config/env.validation';
export { AppModule } from './modules/app/app.module';
export { PaymentModule } from './modules/payment/payment.module';
export { GatewayRegistry } from './modules/payment/gateway-registry.service';
export { RazorpayGateway } from './modules/payment/gateways/razorpay.gateway';
export { RazorpayClient, createRazorpaySdk } from './modules/payment/gateways/razorpay-client';
export { PaymentGateway } from './modules/payment/interfaces/payment-gateway.interface';
export * from './modules/payment/interfaces/razorpay-api.interface';
export * from './modules/payment/payment.constants';
export * from './modules/payment/types/payment.types';
export { PaymentRequestDto } from './modules/payment/dto/payment-request.dto';
export { RefundRequestDto } from './modules/payment/dto/refund-request.dto';
export { TokenizeRequestDto } from './modules/payment/dto/tokenize-request.dto';
export * from './modules/payment/utils/currency.util';
export * from './modules/payment/utils/status-mapper.util';
export { signWebhookPayload, verifyWebhookSignature, WebhookPayload } from './modules/payment/utils/webhook-signature.util';
export { maskCardNumber } from './modules/payment/utils/masking.util';
