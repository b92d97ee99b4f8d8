import { registerAs } from '@nestjs/config';

export default registerAs('payment', () => ({
    defaultProvider: process.env.PAYMENT_DEFAULT_PROVIDER || 'RAZORPAY',
}));
