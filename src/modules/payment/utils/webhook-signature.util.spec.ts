import { createHmac } from 'crypto';
import { signWebhookPayload, verifyWebhookSignature } from './webhook-signature.util';

describe('webhook-signature.util', () => {
    const payload = '{"event":"payment.captured"}';
    const secret = 'whsec_test';
    const signature = createHmac('sha256', secret).update(payload).digest('base64');

    it('signs with base64 HMAC-SHA256', () => {
        expect(signWebhookPayload(payload, secret)).toBe(signature);
    });

    it('accepts a payload signed with the same secret', () => {
        expect(verifyWebhookSignature(payload, signature, secret)).toBe(true);
    });

    it('accepts raw Buffer payloads', () => {
        expect(verifyWebhookSignature(Buffer.from(payload, 'utf8'), signature, secret)).toBe(true);
    });

    it('rejects a wrong secret', () => {
        expect(verifyWebhookSignature(payload, signature, 'wrong')).toBe(false);
    });

    it('rejects a mutated payload', () => {
        expect(verifyWebhookSignature('{"event":"payment.failed"}', signature, secret)).toBe(false);
        expect(verifyWebhookSignature(`${payload} `, signature, secret)).toBe(false);
    });

    it('rejects a mutated signature', () => {
        const mutated = `${signature.startsWith('A') ? 'B' : 'A'}${signature.slice(1)}`;
        expect(verifyWebhookSignature(payload, mutated, secret)).toBe(false);
        expect(verifyWebhookSignature(payload, signature.slice(0, -1), secret)).toBe(false);
    });

    it('rejects a hex digest of the right payload', () => {
        const hex = createHmac('sha256', secret).update(payload).digest('hex');
        expect(verifyWebhookSignature(payload, hex, secret)).toBe(false);
    });

    it('fails closed on missing input', () => {
        expect(verifyWebhookSignature('', signature, secret)).toBe(false);
        expect(verifyWebhookSignature(payload, '', secret)).toBe(false);
        expect(verifyWebhookSignature(payload, signature, '')).toBe(false);
        expect(verifyWebhookSignature(payload, signature, null)).toBe(false);
        expect(verifyWebhookSignature(payload, undefined, secret)).toBe(false);
        expect(verifyWebhookSignature(null, signature, secret)).toBe(false);
    });

    it('rejects an empty body even with the digest of an empty string', () => {
        const emptySignature = createHmac('sha256', secret).update('').digest('base64');

        expect(verifyWebhookSignature('', emptySignature, secret)).toBe(false);
        expect(verifyWebhookSignature(Buffer.alloc(0), emptySignature, secret)).toBe(false);
    });
});
