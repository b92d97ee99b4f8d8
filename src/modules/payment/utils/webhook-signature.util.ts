import { createHmac, timingSafeEqual } from 'crypto';

export type WebhookPayload = string | Buffer;

/** Base64 HMAC-SHA256 of the raw payload bytes. */
export function signWebhookPayload(payload: WebhookPayload, secret: string): string {
    return createHmac('sha256', secret).update(payload).digest('base64');
}

/**
 * Constant-time check of `signature` against the digest of `payload`.
 * Fails closed: missing input or any error while hashing yields false.
 */
export function verifyWebhookSignature(
    payload: WebhookPayload | null | undefined,
    signature: string | null | undefined,
    secret: string | null | undefined,
    onError?: (error: unknown) => void
): boolean {
    try {
        if (!secret || !signature || payload === null || payload === undefined || payload.length === 0) {
            return false;
        }

        const expected = Buffer.from(signWebhookPayload(payload, secret), 'utf8');
        const received = Buffer.from(signature, 'utf8');

        if (expected.length !== received.length) {
            return false;
        }
        return timingSafeEqual(expected, received);
    } catch (error) {
        onError?.(error);
        return false;
    }
}
