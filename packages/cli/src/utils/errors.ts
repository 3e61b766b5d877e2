import { WireErrorSchema } from '../ynab/schemas.js';

/**
 * Message for anything a step catches: Error instances, and the
 * `{ error: { detail } }` bodies the YNAB client rejects with as-is.
 */
export function describeError(err: unknown): string {
    if (err instanceof Error) {
        return err.message;
    }
    const body = WireErrorSchema.safeParse(err);
    if (body.success) {
        const { name, detail } = body.data.error;
        return name ? `${name}: ${detail}` : detail;
    }
    return String(err);
}
