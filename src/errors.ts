/**
 * Error types for the rich presence client.
 *
 * Every failure surfaces as a subclass of {@link PresenceError} so callers
 * can branch on `instanceof` or on the string `code`.
 */

/**
 * Base class for all presence errors.
 */
export class PresenceError extends Error {
    constructor(message: string, public readonly code: string) {
        super(message);
        this.name = 'PresenceError';
        // Maintains proper stack trace for where error was thrown (V8 only)
        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, PresenceError);
        }
    }
}

/**
 * Thrown when configuration is invalid.
 */
export class ConfigurationError extends PresenceError {
    constructor(message: string) {
        super(message, 'CONFIGURATION_ERROR');
        this.name = 'ConfigurationError';
    }
}

/**
 * Thrown when no IPC endpoint accepted a connection.
 */
export class DiscoveryError extends PresenceError {
    constructor(public readonly paths: readonly string[]) {
        super(
            `No IPC endpoint found (tried ${paths.length} paths, last: ${paths[paths.length - 1] ?? 'none'}). ` +
            'Is the desktop client running?',
            'DISCOVERY_ERROR'
        );
        this.name = 'DiscoveryError';
    }
}

/**
 * Thrown when a socket operation fails for a reason other than a missing endpoint.
 */
export class ConnectionError extends PresenceError {
    constructor(
        message: string,
        public readonly cause?: Error
    ) {
        super(message, 'CONNECTION_ERROR');
        this.name = 'ConnectionError';
    }
}

/**
 * Thrown when the stream ends before a read could be satisfied.
 */
export class ConnectionClosedError extends PresenceError {
    constructor(
        public readonly expected: number,
        public readonly received: number
    ) {
        super(
            `Connection closed prematurely (expected ${expected} bytes, received ${received})`,
            'CONNECTION_CLOSED'
        );
        this.name = 'ConnectionClosedError';
    }
}

/**
 * Thrown when a frame header or body fails to decode.
 */
export class MalformedFrameError extends PresenceError {
    constructor(
        message: string,
        public readonly rawMessage?: string
    ) {
        super(message, 'MALFORMED_FRAME');
        this.name = 'MalformedFrameError';
    }
}

/**
 * Thrown when the handshake is rejected because the client id is malformed or unknown.
 */
export class InvalidClientIdError extends PresenceError {
    constructor(public readonly clientId: string, remoteMessage: string) {
        super(`Invalid client id "${clientId}": ${remoteMessage}`, 'INVALID_CLIENT_ID');
        this.name = 'InvalidClientIdError';
    }
}

/**
 * Thrown when the remote side rejects an activity payload.
 * The session stays usable.
 */
export class InvalidActivityError extends PresenceError {
    constructor(message: string) {
        super(message, 'INVALID_ACTIVITY');
        this.name = 'InvalidActivityError';
    }
}

/**
 * Thrown for any other error reply. `remoteCode` is `null` when the reply carried none.
 */
export class ProtocolError extends PresenceError {
    constructor(
        message: string,
        public readonly remoteCode: number | null
    ) {
        super(message, 'PROTOCOL_ERROR');
        this.name = 'ProtocolError';
    }
}

/**
 * Thrown when an operation is attempted on a closed session.
 */
export class SessionClosedError extends PresenceError {
    constructor(operation: string) {
        super(`Cannot ${operation}: session is closed`, 'SESSION_CLOSED');
        this.name = 'SessionClosedError';
    }
}
