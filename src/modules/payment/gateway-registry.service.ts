import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import paymentConfig from '../../config/payment.config';
import { ConfigurationError, UnsupportedProviderError } from '../../common/exceptions/service.exception';
import { PaymentGateway } from './interfaces/payment-gateway.interface';
import { PAYMENT_GATEWAYS } from './payment.constants';

/**
 * Provider name -> gateway lookup. Names are matched case-insensitively.
 */
@Injectable()
export class GatewayRegistry {
    private readonly logger = new Logger(GatewayRegistry.name);
    private readonly gateways = new Map<string, PaymentGateway>();

    constructor(
        @Inject(PAYMENT_GATEWAYS) gateways: PaymentGateway[],
        @Inject(paymentConfig.KEY) private readonly config: ConfigType<typeof paymentConfig>
    ) {
        gateways.forEach(gateway => this.register(gateway));
    }

    register(gateway: PaymentGateway): void {
        const name = gateway.getProviderName().toUpperCase();
        if (this.gateways.has(name)) {
            throw new ConfigurationError(`Payment gateway already registered: ${name}`);
        }
        this.gateways.set(name, gateway);
        this.logger.log(`Registered payment gateway: ${name}`);
    }

    has(provider: string): boolean {
        return this.gateways.has(provider.toUpperCase());
    }

    get(provider: string): PaymentGateway {
        const gateway = this.gateways.get(provider.toUpperCase());
        if (!gateway) {
            throw new UnsupportedProviderError(provider);
        }
        return gateway;
    }

    getDefault(): PaymentGateway {
        return this.get(this.config.defaultProvider);
    }

    providers(): string[] {
        return [...this.gateways.keys()];
    }
}
