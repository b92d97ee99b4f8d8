import { Type } from 'class-transformer';
import { IsEnum, IsInt, IsNotEmpty, IsOptional, IsString, Matches, Max, Min } from 'class-validator';
import { PaymentMethodTokenizeRequest, PaymentMethodType } from '../types/payment.types';

export class TokenizeRequestDto implements PaymentMethodTokenizeRequest {
    @IsEnum(PaymentMethodType)
    methodType!: PaymentMethodType;

    @IsOptional()
    @IsString()
    @IsNotEmpty()
    customerId?: string;

    @IsOptional()
    @IsString()
    @Matches(/^[\d\s-]+$/, { message: 'cardNumber must contain digits only' })
    cardNumber?: string;

    @IsOptional()
    @IsString()
    cardholderName?: string;

    @IsOptional()
    @IsInt()
    @Min(1)
    @Max(12)
    @Type(() => Number)
    expiryMonth?: number;

    @IsOptional()
    @IsInt()
    @Min(2000)
    @Max(2199)
    @Type(() => Number)
    expiryYear?: number;

    @IsOptional()
    @IsString()
    @Matches(/^\d{3,4}$/, { message: 'cvv must be 3 or 4 digits' })
    cvv?: string;

    @IsOptional()
    @IsString()
    @IsNotEmpty()
    authenticationPaymentId?: string;

    @IsOptional()
    @IsString()
    @IsNotEmpty()
    authenticationReferenceNumber?: string;
}
