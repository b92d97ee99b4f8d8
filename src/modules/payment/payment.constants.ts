export const RAZORPAY_PROVIDER = 'RAZORPAY';

// Injection tokens
export const RAZORPAY_SDK = Symbol('RAZORPAY_SDK');
export const RAZORPAY_API = Symbol('RAZORPAY_API');
export const PAYMENT_GATEWAYS = Symbol('PAYMENT_GATEWAYS');
