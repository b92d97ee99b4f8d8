import { Type } from 'class-transformer';
import { IsNotEmpty, IsNumber, IsOptional, IsPositive, IsString, Matches, MaxLength } from 'class-validator';
import { RefundRequest } from '../types/payment.types';

export class RefundRequestDto implements RefundRequest {
    @IsString()
    @IsNotEmpty()
    gatewayPaymentId!: string;

    @IsNumber({ allowNaN: false, allowInfinity: false })
    @IsPositive()
    @Type(() => Number)
    amount!: number;

    @IsOptional()
    @IsString()
    @Matches(/^[A-Za-z]{3}$/, { message: 'currency must be a three-letter ISO 4217 code' })
    currency?: string;

    @IsOptional()
    @IsString()
    @MaxLength(256)
    reason?: string;
}
