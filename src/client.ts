/**
 * rich-presence-ipc - Client
 *
 * One `PresenceClient` owns one IPC connection to the desktop client.
 * Every operation is a single request/reply round trip; await each call
 * before issuing the next one on the same client.
 */

import { randomUUID } from 'crypto';
import { encodeFrame, decodeHeader, decodePayload, HEADER_SIZE } from './codec';
import {
    ConfigurationError,
    InvalidActivityError,
    InvalidClientIdError,
    ProtocolError,
    SessionClosedError,
} from './errors';
import { CONSTANTS, Commands, Events, OpCode } from './protocol';
import { createTransport } from './transport/createTransport';
import type { Transport } from './transport/Transport';
import type { Activity, JsonValue, PresenceConfig, PresenceEvents, PresenceStatus } from './types';
import { EventEmitter } from './utils/EventEmitter';
import { Logger, logger as defaultLogger } from './utils/Logger';
import { extractError, parseReply, unwrapActivityMessage, type ProtocolReply } from './validation';

// =============================================================================
// Configuration
// =============================================================================

const DEFAULT_CONFIG: PresenceConfig = {
    debug: false,
    pid: process.pid,
    platform: process.platform,
    env: process.env,
};

function resolveConfig(overrides: Partial<PresenceConfig>): PresenceConfig {
    // Only override with defined values
    return {
        debug: overrides.debug ?? DEFAULT_CONFIG.debug,
        pid: overrides.pid ?? DEFAULT_CONFIG.pid,
        platform: overrides.platform ?? DEFAULT_CONFIG.platform,
        env: overrides.env ?? DEFAULT_CONFIG.env,
        logger: overrides.logger,
        transport: overrides.transport,
    };
}

interface Reply {
    op: OpCode;
    reply: ProtocolReply;
}

// =============================================================================
// Presence Client
// =============================================================================

export class PresenceClient extends EventEmitter<PresenceEvents> {
    private status: PresenceStatus = 'CONNECTING';
    private readonly transport: Transport;
    private readonly log: Logger;

    private constructor(
        public readonly clientId: string,
        private readonly config: PresenceConfig
    ) {
        super();
        this.log = config.logger ?? (config.debug ? new Logger('presence', true) : defaultLogger);

        const options = { env: config.env, logger: this.log };
        this.transport = config.transport
            ? config.transport(options)
            : createTransport(config.platform, options);
    }

    /**
     * Connects to the desktop client and performs the handshake.
     * Resolves only with a READY client; on failure the connection is released
     * before the error propagates.
     *
     * @throws {DiscoveryError} No endpoint answered
     * @throws {InvalidClientIdError} The handshake was rejected with code 4000
     * @throws {ProtocolError} The handshake was rejected for another reason
     */
    static async connect(clientId: string, config: Partial<PresenceConfig> = {}): Promise<PresenceClient> {
        if (!clientId) {
            throw new ConfigurationError('clientId is required');
        }

        const client = new PresenceClient(clientId, resolveConfig(config));
        try {
            await client.transport.connect();
            await client.handshake();
        } catch (error) {
            client.teardown();
            throw error;
        }
        return client;
    }

    // ---------------------------------------------------------------------------
    // Public API
    // ---------------------------------------------------------------------------

    /**
     * Sets the activity shown for this client. `null` clears it.
     *
     * @throws {InvalidActivityError} The activity was rejected; the client stays usable
     *   unless the rejection came on a CLOSE frame
     * @throws {ProtocolError} Any other rejection
     */
    async set(activity: Activity | null): Promise<void> {
        this.assertReady('set activity');

        const { op, reply } = await this.request(OpCode.FRAME, {
            cmd: Commands.SET_ACTIVITY,
            args: {
                pid: this.config.pid,
                activity,
            },
            nonce: randomUUID(),
        });

        // A CLOSE reply is a rejection; the remote side has hung up.
        if (op === OpCode.CLOSE) {
            this.teardown();
        } else if (reply.evt !== Events.ERROR) {
            this.log.debug(activity === null ? 'Activity cleared' : 'Activity set');
            return;
        }

        const { code, message } = extractError(reply);
        if (code === CONSTANTS.INVALID_PAYLOAD) {
            throw new InvalidActivityError(unwrapActivityMessage(message));
        }
        throw new ProtocolError(message, code);
    }

    /** Clears the current activity. Same as `set(null)`. */
    clear(): Promise<void> {
        return this.set(null);
    }

    /**
     * Sends a CLOSE frame and releases the connection. The connection is
     * released even when the frame cannot be sent. Calling again is a no-op.
     */
    async close(): Promise<void> {
        if (this.status === 'CLOSED') return;
        this.setStatus('CLOSED');

        try {
            await this.transport.writeAll(encodeFrame(OpCode.CLOSE, {}));
        } catch (error) {
            this.log.debug('Close frame not sent', error);
        } finally {
            this.teardown();
        }
    }

    getStatus(): PresenceStatus {
        return this.status;
    }

    /** Path of the connected IPC endpoint. */
    getEndpoint(): string | null {
        return this.transport.getPath();
    }

    // ---------------------------------------------------------------------------
    // Private
    // ---------------------------------------------------------------------------

    private async handshake(): Promise<void> {
        this.log.debug(`Handshaking with client id ${this.clientId} on ${this.transport.getPath() ?? 'endpoint'}`);

        const { op, reply } = await this.request(OpCode.HANDSHAKE, {
            v: CONSTANTS.RPC_VERSION,
            client_id: this.clientId,
        });

        if (op !== OpCode.CLOSE && reply.evt === Events.READY) {
            this.setStatus('READY');
            this.log.debug('Handshake complete');
            return;
        }

        const { code, message } = extractError(reply);
        if (code === CONSTANTS.INVALID_PAYLOAD) {
            throw new InvalidClientIdError(this.clientId, message);
        }
        throw new ProtocolError(message, code);
    }

    /**
     * One round trip: write a frame, read exactly one frame back.
     * A transport or decoding failure leaves the stream position unknown,
     * so the client is torn down before the error propagates.
     */
    private async request(op: OpCode, payload: JsonValue): Promise<Reply> {
        try {
            await this.transport.writeAll(encodeFrame(op, payload));
            const header = decodeHeader(await this.transport.readExact(HEADER_SIZE));
            const body = await this.transport.readExact(header.length);
            const reply = parseReply(decodePayload(body));
            this.log.debug(`Reply on ${OpCode[header.op]}: evt=${reply.evt ?? 'null'}`);
            return { op: header.op, reply };
        } catch (error) {
            this.teardown();
            throw error;
        }
    }

    private assertReady(operation: string): void {
        if (this.status !== 'READY') {
            throw new SessionClosedError(operation);
        }
    }

    private teardown(): void {
        this.transport.close();
        this.setStatus('CLOSED');
    }

    private setStatus(status: PresenceStatus): void {
        if (this.status === status) return;
        this.status = status;
        this.emit('status', status);
    }
}

/**
 * Connects and completes the handshake.
 *
 * @example
 * ```typescript
 * const presence = await connect('123456789012345678');
 * await presence.set({ state: 'In Game', details: 'Ranked' });
 * await presence.close();
 * ```
 */
export function connect(clientId: string, config: Partial<PresenceConfig> = {}): Promise<PresenceClient> {
    return PresenceClient.connect(clientId, config);
}

/**
 * Runs `fn` with a connected client and closes it afterwards, whether `fn`
 * resolves or throws.
 */
export async function withPresence<T>(
    clientId: string,
    fn: (presence: PresenceClient) => Promise<T> | T,
    config: Partial<PresenceConfig> = {}
): Promise<T> {
    const presence = await PresenceClient.connect(clientId, config);
    try {
        return await fn(presence);
    } finally {
        await presence.close();
    }
}
