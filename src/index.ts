/**
 * rich-presence-ipc - Set a rich presence activity on the local Discord client.
 *
 * @example
 * ```typescript
 * import { withPresence } from 'rich-presence-ipc';
 *
 * await withPresence('123456789012345678', async (presence) => {
 *   await presence.set({ state: 'In Game', timestamps: { start: Date.now() } });
 * });
 * ```
 *
 * @packageDocumentation
 */

export { PresenceClient, connect, withPresence } from './client';

// Types
export type {
    Activity,
    ActivityAssets,
    ActivityButton,
    ActivityTimestamps,
    JsonValue,
    JsonObject,
    PresenceConfig,
    PresenceEvents,
    PresenceStatus,
    TransportOptions,
} from './types';

// Errors
export {
    PresenceError,
    ConfigurationError,
    DiscoveryError,
    ConnectionError,
    ConnectionClosedError,
    MalformedFrameError,
    InvalidClientIdError,
    InvalidActivityError,
    ProtocolError,
    SessionClosedError,
} from './errors';

// Wire protocol
export { OpCode, CONSTANTS } from './protocol';
export { encodeFrame, decodeHeader, decodePayload, HEADER_SIZE } from './codec';
export type { FrameHeader } from './codec';

// Transports
export type { Transport, TransportStatus, TransportEvents } from './transport/Transport';
export { SocketTransport } from './transport/SocketTransport';
export { UnixSocketTransport, resolveUnixDirectory } from './transport/UnixSocketTransport';
export { NamedPipeTransport } from './transport/NamedPipeTransport';
export { createTransport } from './transport/createTransport';

// Logging
export { Logger, LogLevel } from './utils/Logger';
