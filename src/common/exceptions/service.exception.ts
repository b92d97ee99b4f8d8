export type ServiceErrorCode =
    | 'VALIDATION_ERROR'
    | 'INTEGRATION_ERROR'
    | 'CONFIGURATION_ERROR'
    | 'TOKENIZATION_ERROR'
    | 'UNSUPPORTED_PROVIDER';

export class ServiceError extends Error {
    constructor(
        message: string,
        public readonly code: ServiceErrorCode,
        public readonly details?: unknown,
        public readonly retryable: boolean = false
    ) {
        super(message);
        this.name = 'ServiceError';
    }
}

export class ValidationError extends ServiceError {
    constructor(message: string, details?: unknown) {
        super(message, 'VALIDATION_ERROR', details, false);
        this.name = 'ValidationError';
    }
}

export interface IntegrationErrorDetails {
    provider: string;
    operation: string;
    statusCode?: number;
    providerCode?: string;
}

/**
 * A failure reported by, or on the way to, a payment provider: business
 * errors, transport errors and timeouts all end up here.
 */
export class IntegrationError extends ServiceError {
    constructor(message: string, public readonly integration: IntegrationErrorDetails) {
        super(message, 'INTEGRATION_ERROR', integration, true);
        this.name = 'IntegrationError';
    }
}

export class ConfigurationError extends ServiceError {
    constructor(message: string, details?: unknown) {
        super(message, 'CONFIGURATION_ERROR', details, false);
        this.name = 'ConfigurationError';
    }
}

export class TokenizationError extends ServiceError {
    constructor(message: string, details?: unknown) {
        super(message, 'TOKENIZATION_ERROR', details, false);
        this.name = 'TokenizationError';
    }
}

export class UnsupportedProviderError extends ServiceError {
    constructor(provider: string) {
        super(`Unsupported payment provider: ${provider}`, 'UNSUPPORTED_PROVIDER', { provider }, false);
        this.name = 'UnsupportedProviderError';
    }
}
