import net from 'net';
import { ConnectionError, DiscoveryError } from '../errors';
import { CONSTANTS } from '../protocol';
import { EventEmitter } from '../utils/EventEmitter';
import type { Logger } from '../utils/Logger';
import { StreamReader } from './StreamReader';
import type { Transport, TransportEvents, TransportStatus } from './Transport';

/** Errors that mean "nothing is listening here, try the next index". */
const MISSING_ENDPOINT_CODES = new Set(['ENOENT', 'ECONNREFUSED']);

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
    return error instanceof Error && 'code' in error;
}

function openSocket(path: string): Promise<net.Socket> {
    return new Promise((resolve, reject) => {
        const socket = net.createConnection(path);
        const onError = (error: Error) => {
            socket.destroy();
            reject(error);
        };
        socket.once('error', onError);
        socket.once('connect', () => {
            socket.off('error', onError);
            resolve(socket);
        });
    });
}

/**
 * Stream transport over `net.Socket`. Unix domain sockets and Windows named
 * pipes share everything except how a candidate path is built.
 */
export abstract class SocketTransport extends EventEmitter<TransportEvents> implements Transport {
    private socket: net.Socket | null = null;
    private reader = new StreamReader();
    private status: TransportStatus = 'IDLE';
    private path: string | null = null;
    protected readonly log: Logger;

    constructor(logger: Logger) {
        super();
        this.log = logger.child('transport');
    }

    /** Endpoint path for discovery index `index`. */
    protected abstract endpointPath(index: number): string;

    public candidatePaths(): string[] {
        return Array.from({ length: CONSTANTS.MAX_ENDPOINTS }, (_, index) => this.endpointPath(index));
    }

    public getStatus(): TransportStatus {
        return this.status;
    }

    public getPath(): string | null {
        return this.path;
    }

    public async connect(): Promise<void> {
        if (this.status !== 'IDLE') {
            throw new ConnectionError(`Cannot connect: transport is ${this.status}`);
        }
        this.setStatus('CONNECTING');

        const tried: string[] = [];
        for (const candidate of this.candidatePaths()) {
            tried.push(candidate);
            try {
                const socket = await openSocket(candidate);
                this.attach(socket, candidate);
                this.log.conn(`Connected to ${candidate}`);
                this.setStatus('CONNECTED');
                return;
            } catch (error) {
                if (isErrnoException(error) && error.code !== undefined && MISSING_ENDPOINT_CODES.has(error.code)) {
                    this.log.conn(`No endpoint at ${candidate} (${error.code})`);
                    continue;
                }
                this.setStatus('CLOSED');
                throw new ConnectionError(
                    `Failed to connect to ${candidate}: ${error instanceof Error ? error.message : String(error)}`,
                    error instanceof Error ? error : undefined
                );
            }
        }

        this.setStatus('CLOSED');
        throw new DiscoveryError(tried);
    }

    public readExact(size: number): Promise<Uint8Array> {
        if (this.status === 'IDLE' || this.status === 'CONNECTING') {
            return Promise.reject(new ConnectionError(`Cannot read: transport is ${this.status}`));
        }
        return this.reader.read(size);
    }

    public async writeAll(data: Uint8Array): Promise<void> {
        const socket = this.socket;
        if (!socket || this.status !== 'CONNECTED') {
            throw new ConnectionError(`Cannot write: transport is ${this.status}`);
        }

        await new Promise<void>((resolve, reject) => {
            socket.write(data, (error?: Error | null) => {
                if (error) {
                    reject(new ConnectionError(`Write to ${this.path ?? 'endpoint'} failed: ${error.message}`, error));
                } else {
                    resolve();
                }
            });
        });
    }

    public close(): void {
        if (this.socket) {
            this.log.conn(`Closing ${this.path ?? 'endpoint'}`);
            this.socket.destroy();
            this.socket = null;
        }
        this.reader.end();
        this.setStatus('CLOSED');
    }

    private attach(socket: net.Socket, path: string): void {
        this.socket = socket;
        this.path = path;

        socket.on('data', (chunk: Buffer) => this.reader.push(chunk));
        socket.on('end', () => this.reader.end());
        socket.on('error', (error: Error) => {
            this.log.conn(`Socket error on ${path}: ${error.message}`);
            this.reader.fail(new ConnectionError(`Socket error on ${path}: ${error.message}`, error));
        });
        socket.on('close', () => {
            this.socket = null;
            this.reader.end();
            this.setStatus('CLOSED');
        });
    }

    private setStatus(status: TransportStatus): void {
        if (this.status === status) return;
        this.status = status;
        this.emit('status', status);
    }
}
