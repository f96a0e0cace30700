/**
 * Core types for rich-presence-ipc.
 */

import type { Logger } from './utils/Logger';
import type { Transport } from './transport/Transport';

// =============================================================================
// JSON
// =============================================================================

export type JsonPrimitive = string | number | boolean | null;

/** Object members may be `undefined`; `JSON.stringify` drops them. */
export type JsonObject = { [key: string]: JsonValue | undefined };

export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;

// =============================================================================
// Activity
// =============================================================================

export type ActivityTimestamps = {
    /** Unix time (seconds or milliseconds) the activity started */
    start?: number;
    end?: number;
};

export type ActivityAssets = {
    large_image?: string;
    large_text?: string;
    small_image?: string;
    small_text?: string;
};

export type ActivityButton = {
    label: string;
    url: string;
};

/**
 * Activity payload relayed to the desktop client.
 *
 * The remote side owns the schema (one of `state`, `details` or
 * `timestamps.start` is required, at most two buttons); nothing here is
 * validated locally. Any other JSON field is passed through untouched.
 */
export type Activity = {
    state?: string;
    details?: string;
    timestamps?: ActivityTimestamps;
    assets?: ActivityAssets;
    buttons?: ActivityButton[];
    [key: string]: JsonValue | undefined;
};

// =============================================================================
// Session
// =============================================================================

/**
 * Session lifecycle. Transitions only move forward:
 * CONNECTING -> READY -> CLOSED, or CONNECTING -> CLOSED on a failed handshake.
 */
export type PresenceStatus = 'CONNECTING' | 'READY' | 'CLOSED';

export interface PresenceEvents {
    [key: string]: unknown[];
    status: [status: PresenceStatus];
}

export interface PresenceConfig {
    /** Enable debug logging (default: false) */
    debug: boolean;
    /** Logger to use instead of the package default */
    logger?: Logger;
    /** Process id reported with each activity (default: process.pid) */
    pid: number;
    /** Host platform used to pick the transport (default: process.platform) */
    platform: NodeJS.Platform;
    /** Environment used to resolve the Unix socket directory (default: process.env) */
    env: NodeJS.ProcessEnv;
    /** Transport factory, overrides platform selection */
    transport?: (config: TransportOptions) => Transport;
}

export interface TransportOptions {
    env: NodeJS.ProcessEnv;
    logger: Logger;
}
