import { plainToInstance, Type } from 'class-transformer';
import { IsInt, IsNotEmpty, IsOptional, IsString, Min, validateSync } from 'class-validator';
import { ConfigurationError } from '../common/exceptions/service.exception';

export class PaymentEnvironment {
    @IsString()
    @IsNotEmpty()
    RAZORPAY_KEY_ID!: string;

    @IsString()
    @IsNotEmpty()
    RAZORPAY_KEY_SECRET!: string;

    @IsString()
    @IsNotEmpty()
    RAZORPAY_WEBHOOK_SECRET!: string;

    @IsOptional()
    @IsInt()
    @Min(1)
    @Type(() => Number)
    RAZORPAY_TIMEOUT_MS?: number;

    @IsOptional()
    @IsString()
    PAYMENT_DEFAULT_PROVIDER?: string;
}

/**
 * `validate` hook for ConfigModule.forRoot. Unknown variables pass through
 * untouched.
 */
export function validatePaymentEnv(config: Record<string, unknown>): Record<string, unknown> {
    const validated = plainToInstance(PaymentEnvironment, config);
    const errors = validateSync(validated, { skipMissingProperties: false });

    if (errors.length > 0) {
        const problems = errors.map(error => error.property);
        throw new ConfigurationError(`Invalid payment configuration: ${problems.join(', ')}`, problems);
    }

    return { ...config, ...validated };
}
