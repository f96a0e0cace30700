import { z } from 'zod';
import { MalformedFrameError } from './errors';

/**
 * Zod schemas for replies from the desktop client.
 * Every decoded frame passes through here before the session reads it.
 */

const ErrorDataSchema = z.object({
    code: z.number().int().optional(),
    message: z.string().optional(),
});

export const ReplySchema = z.object({
    cmd: z.string().nullable().optional(),
    evt: z.string().nullable().optional(),
    nonce: z.string().nullable().optional(),
    data: z.record(z.unknown()).nullable().optional(),
    // Close frames carry the error at the top level instead of under `data`.
    code: z.number().int().optional(),
    message: z.string().optional(),
}).passthrough();

export type ProtocolReply = z.infer<typeof ReplySchema>;

export interface ReplyError {
    code: number | null;
    message: string;
}

/**
 * Validates a decoded frame body as a protocol reply.
 *
 * @throws {MalformedFrameError} If the body is not a JSON object of the expected shape
 */
export function parseReply(json: unknown): ProtocolReply {
    const result = ReplySchema.safeParse(json);

    if (!result.success) {
        const errorMessages = result.error.issues
            .map(e => `${e.path.join('.') || '(root)'}: ${e.message}`)
            .join(', ');

        throw new MalformedFrameError(
            `Invalid reply: ${errorMessages}`,
            truncate(safeStringify(json))
        );
    }

    return result.data;
}

/**
 * Pulls the error code and message out of a reply, from `data` or,
 * failing that, from the top level.
 */
export function extractError(reply: ProtocolReply): ReplyError {
    const fromData = ErrorDataSchema.safeParse(reply.data ?? {});
    const data = fromData.success ? fromData.data : {};

    const code = data.code ?? reply.code ?? null;
    const message = data.message ?? reply.message ?? `Unexpected reply event "${reply.evt ?? 'none'}"`;

    return { code, message };
}

const ACTIVITY_ERROR_PREFIX = 'child "activity" fails because [';
const ACTIVITY_ERROR_SUFFIX = ']';

/**
 * Strips the `child "activity" fails because [...]` wrapping from an
 * activity validation message. Messages without it come back unchanged.
 */
export function unwrapActivityMessage(message: string): string {
    if (
        message.length >= ACTIVITY_ERROR_PREFIX.length + ACTIVITY_ERROR_SUFFIX.length &&
        message.startsWith(ACTIVITY_ERROR_PREFIX) &&
        message.endsWith(ACTIVITY_ERROR_SUFFIX)
    ) {
        return message.slice(ACTIVITY_ERROR_PREFIX.length, message.length - ACTIVITY_ERROR_SUFFIX.length);
    }
    return message;
}

/**
 * Safely truncates a string for logging/error messages.
 */
export function truncate(str: string, maxLength: number = 200): string {
    if (str.length <= maxLength) return str;
    return str.substring(0, maxLength) + `... (${str.length - maxLength} more chars)`;
}

function safeStringify(value: unknown): string {
    try {
        return JSON.stringify(value) ?? String(value);
    } catch {
        return String(value);
    }
}
