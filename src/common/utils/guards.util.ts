export function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null;
}

/** Numbers and numeric strings; anything else is undefined. */
export function toNumber(value: unknown): number | undefined {
    const parsed = typeof value === 'string' && value.trim().length > 0 ? Number(value) : value;
    return typeof parsed === 'number' && Number.isFinite(parsed) ? parsed : undefined;
}
