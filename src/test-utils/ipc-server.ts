import net from 'net';
import { encodeFrame, decodeHeader, decodePayload, HEADER_SIZE } from '../codec';
import { ConnectionClosedError } from '../errors';
import { OpCode } from '../protocol';
import { StreamReader } from '../transport/StreamReader';
import type { JsonValue } from '../types';
import type { DecodedFrame } from './wire-utils';

export interface ServerReply {
    op: OpCode;
    payload: JsonValue;
}

export type FrameHandler = (frame: DecodedFrame) => ServerReply | null;

/**
 * In-process stand-in for the desktop client, listening on a Unix socket.
 * Each received frame is recorded and answered by `handler`.
 */
export class MockIpcServer {
    public readonly frames: DecodedFrame[] = [];
    public readonly errors: Error[] = [];
    private readonly server: net.Server;
    private readonly sockets = new Set<net.Socket>();
    private closed: Promise<void> | null = null;

    constructor(private readonly handler: FrameHandler) {
        this.server = net.createServer((socket) => this.serve(socket));
    }

    public listen(path: string): Promise<void> {
        return new Promise((resolve, reject) => {
            this.server.once('error', reject);
            this.server.listen(path, () => {
                this.server.off('error', reject);
                resolve();
            });
        });
    }

    /** Resolves once the client side has closed its connection. */
    public waitForDisconnect(): Promise<void> {
        return this.closed ?? Promise.resolve();
    }

    public close(): Promise<void> {
        for (const socket of this.sockets) socket.destroy();
        return new Promise((resolve, reject) => {
            this.server.close((error) => (error ? reject(error) : resolve()));
        });
    }

    private serve(socket: net.Socket): void {
        this.sockets.add(socket);
        const reader = new StreamReader();
        socket.on('data', (chunk: Buffer) => reader.push(chunk));
        socket.on('end', () => reader.end());
        socket.on('error', (error) => this.errors.push(error));

        this.closed = new Promise((resolve) => {
            socket.on('close', () => {
                this.sockets.delete(socket);
                reader.end();
                resolve();
            });
        });

        this.loop(socket, reader).catch((error: unknown) => {
            if (!(error instanceof ConnectionClosedError) && error instanceof Error) {
                this.errors.push(error);
            }
        });
    }

    private async loop(socket: net.Socket, reader: StreamReader): Promise<void> {
        for (;;) {
            const { op, length } = decodeHeader(await reader.read(HEADER_SIZE));
            const body = decodePayload(await reader.read(length));
            const frame = { op, body };
            this.frames.push(frame);

            // The client releases its end right after a CLOSE frame.
            if (op === OpCode.CLOSE) return;

            const reply = this.handler(frame);
            if (reply) {
                socket.write(encodeFrame(reply.op, reply.payload));
            }
        }
    }
}
