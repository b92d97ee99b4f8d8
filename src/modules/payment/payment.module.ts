import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import paymentConfig from '../../config/payment.config';
import razorpayConfig from '../../config/razorpay.config';
import { GatewayRegistry } from './gateway-registry.service';
import { createRazorpaySdk, RazorpayClient } from './gateways/razorpay-client';
import { RazorpayGateway } from './gateways/razorpay.gateway';
import { PaymentGateway } from './interfaces/payment-gateway.interface';
import { PAYMENT_GATEWAYS, RAZORPAY_API, RAZORPAY_SDK } from './payment.constants';

@Module({
    imports: [
        ConfigModule.forFeature(razorpayConfig),
        ConfigModule.forFeature(paymentConfig)
    ],
    providers: [
        {
            provide: RAZORPAY_SDK,
            inject: [razorpayConfig.KEY],
            useFactory: createRazorpaySdk
        },
        {
            provide: RAZORPAY_API,
            useClass: RazorpayClient
        },
        RazorpayGateway,
        {
            provide: PAYMENT_GATEWAYS,
            inject: [RazorpayGateway],
            useFactory: (razorpay: RazorpayGateway): PaymentGateway[] => [razorpay]
        },
        GatewayRegistry
    ],
    exports: [GatewayRegistry, RazorpayGateway]
})
export class PaymentModule { }
