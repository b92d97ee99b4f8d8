import { Type } from 'class-transformer';
import { IsEnum, IsNotEmpty, IsNumber, IsOptional, IsPositive, IsString, Matches, MaxLength } from 'class-validator';
import { PaymentMethodType, PaymentRequest } from '../types/payment.types';

export class PaymentRequestDto implements PaymentRequest {
    @IsNumber({ allowNaN: false, allowInfinity: false })
    @IsPositive()
    @Type(() => Number)
    amount!: number;

    @IsString()
    @Matches(/^[A-Za-z]{3}$/, { message: 'currency must be a three-letter ISO 4217 code' })
    currency!: string;

    @IsEnum(PaymentMethodType)
    methodType!: PaymentMethodType;

    @IsOptional()
    @IsString()
    @Matches(/^[\w.-]+@[\w.-]+$/, { message: 'upiId must be a valid VPA' })
    upiId?: string;

    @IsOptional()
    @IsString()
    @IsNotEmpty()
    token?: string;

    @IsOptional()
    @IsString()
    @IsNotEmpty()
    wallet?: string;

    @IsOptional()
    @IsString()
    @IsNotEmpty()
    bank?: string;

    // Razorpay caps receipts at 40 characters
    @IsOptional()
    @IsString()
    @IsNotEmpty()
    @MaxLength(40)
    orderId?: string;
}
