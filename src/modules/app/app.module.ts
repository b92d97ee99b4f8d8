import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { validatePaymentEnv } from '../../config/env.validation';
import { PaymentModule } from '../payment/payment.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: ['.env'],
      cache: false,
      expandVariables: true,
      ignoreEnvFile: false,
      validate: validatePaymentEnv,
    }),
    PaymentModule,
  ],
})
export class AppModule { }
