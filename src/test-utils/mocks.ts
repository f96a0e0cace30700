import { encodeFrame } from '../codec';
import { ConnectionError } from '../errors';
import { OpCode } from '../protocol';
import { StreamReader } from '../transport/StreamReader';
import type { Transport, TransportEvents, TransportStatus } from '../transport/Transport';
import type { JsonValue } from '../types';
import { EventEmitter } from '../utils/EventEmitter';
import { unpackFrames, type DecodedFrame } from './wire-utils';

interface QueuedReply {
    chunks: Uint8Array[];
    hangUp: boolean;
}

/**
 * In-memory transport. Queued replies are delivered one per write, the way
 * the desktop client answers each request.
 */
export class FakeTransport extends EventEmitter<TransportEvents> implements Transport {
    public readonly written: Uint8Array[] = [];
    public connectError: Error | null = null;
    public writeError: Error | null = null;
    public closeCount = 0;

    private readonly reader = new StreamReader();
    private readonly replies: QueuedReply[] = [];
    private status: TransportStatus = 'IDLE';

    constructor(private readonly path: string = '/fake/discord-ipc-0') {
        super();
    }

    /** Queues `payload` as the reply to the next unanswered write. */
    public reply(op: OpCode, payload: JsonValue): this {
        return this.replyRaw(encodeFrame(op, payload));
    }

    /** Queues raw bytes, delivered in the given chunks, as the next reply. */
    public replyRaw(...chunks: Uint8Array[]): this {
        this.replies.push({ chunks, hangUp: false });
        return this;
    }

    /** Queues `chunks` as the next reply, then ends the stream. */
    public replyThenHangUp(...chunks: Uint8Array[]): this {
        this.replies.push({ chunks, hangUp: true });
        return this;
    }

    public frames(): DecodedFrame[] {
        return this.written.flatMap((bytes) => unpackFrames(bytes));
    }

    public async connect(): Promise<void> {
        if (this.connectError) throw this.connectError;
        this.setStatus('CONNECTED');
    }

    public readExact(size: number): Promise<Uint8Array> {
        return this.reader.read(size);
    }

    public async writeAll(data: Uint8Array): Promise<void> {
        if (this.status !== 'CONNECTED') {
            throw new ConnectionError(`Cannot write: transport is ${this.status}`);
        }
        if (this.writeError) throw this.writeError;

        this.written.push(data);
        const next = this.replies.shift();
        if (next) {
            for (const chunk of next.chunks) this.reader.push(chunk);
            if (next.hangUp) this.reader.end();
        }
    }

    public close(): void {
        this.closeCount++;
        this.reader.end();
        this.setStatus('CLOSED');
    }

    public getStatus(): TransportStatus {
        return this.status;
    }

    public getPath(): string | null {
        return this.status === 'IDLE' ? null : this.path;
    }

    private setStatus(status: TransportStatus): void {
        if (this.status === status) return;
        this.status = status;
        this.emit('status', status);
    }
}
