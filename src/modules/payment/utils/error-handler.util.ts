import { Logger } from '@nestjs/common';
import { TimeoutError } from 'rxjs';
import { IntegrationError, ServiceError } from '../../../common/exceptions/service.exception';
import { isRecord } from '../../../common/utils/guards.util';

interface ProviderErrorBody {
    description: string;
    code?: string;
    statusCode?: number;
}

/** Reads `{ statusCode?, error: { code?, description } }`, the shape of Razorpay SDK rejections. */
function readProviderError(value: unknown): ProviderErrorBody | undefined {
    if (!isRecord(value) || !isRecord(value.error)) {
        return undefined;
    }
    const { description, code } = value.error;
    if (typeof description !== 'string' || description.length === 0) {
        return undefined;
    }
    return {
        description,
        code: typeof code === 'string' ? code : undefined,
        statusCode: typeof value.statusCode === 'number' ? value.statusCode : undefined
    };
}

export class PaymentErrorHandler {
    private static readonly logger = new Logger('PaymentErrorHandler');

    static describe(error: unknown): string {
        if (error instanceof Error) {
            return error.message;
        }
        if (typeof error === 'string') {
            return error;
        }
        const providerError = readProviderError(error);
        if (providerError) {
            return providerError.description;
        }
        return String(error);
    }

    static toIntegrationError(error: unknown, provider: string, operation: string): IntegrationError {
        if (error instanceof IntegrationError) {
            return error;
        }

        if (error instanceof TimeoutError) {
            return new IntegrationError(`${provider} ${operation} timed out`, { provider, operation });
        }

        const body = readProviderError(error);
        if (body) {
            return new IntegrationError(body.description, {
                provider,
                operation,
                statusCode: body.statusCode,
                providerCode: body.code
            });
        }

        return new IntegrationError(`${provider} ${operation} failed: ${this.describe(error)}`, {
            provider,
            operation
        });
    }

    /**
     * Message for a FAILED result. Errors this layer raised on purpose keep
     * their own message; anything else gets `prefix`.
     */
    static failureMessage(error: unknown, prefix: string): string {
        if (error instanceof ServiceError) {
            return error.message;
        }
        return `${prefix}: ${this.describe(error)}`;
    }

    static logFailure(error: unknown, context: string): void {
        if (error instanceof IntegrationError) {
            this.logger.error(`Payment provider error in ${context}: ${error.message}`, error.stack);
            return;
        }
        if (error instanceof ServiceError) {
            this.logger.warn(`Rejected request in ${context}: ${error.message}`);
            return;
        }
        this.logger.error(
            `Unexpected error in ${context}: ${this.describe(error)}`,
            error instanceof Error ? error.stack : undefined
        );
    }
}
