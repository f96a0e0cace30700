import { ConnectionClosedError, ConnectionError } from '../errors';

interface PendingRead {
    size: number;
    resolve: (bytes: Uint8Array) => void;
    reject: (error: Error) => void;
}

/**
 * Buffers incoming socket chunks and serves exact-size reads.
 *
 * Chunks may arrive split or coalesced in any way; `read(n)` waits until
 * `n` bytes are buffered. Bytes past `n` stay queued for the next read.
 * Only one read may be pending at a time.
 */
export class StreamReader {
    private chunks: Uint8Array[] = [];
    private buffered = 0;
    private ended = false;
    private failure: Error | null = null;
    private pending: PendingRead | null = null;

    public get bufferedLength(): number {
        return this.buffered;
    }

    public get isEnded(): boolean {
        return this.ended;
    }

    public push(chunk: Uint8Array): void {
        if (this.ended || chunk.length === 0) return;
        this.chunks.push(chunk);
        this.buffered += chunk.length;
        this.drain();
    }

    /** Marks end of stream. A pending read that cannot be satisfied rejects. */
    public end(): void {
        this.ended = true;
        this.drain();
    }

    /** Fails the pending read, and every later one, with `error`. */
    public fail(error: Error): void {
        if (this.failure) return;
        this.failure = error;
        this.drain();
    }

    public read(size: number): Promise<Uint8Array> {
        if (this.pending) {
            return Promise.reject(new ConnectionError('Concurrent reads are not supported'));
        }
        if (size === 0) {
            return Promise.resolve(new Uint8Array(0));
        }

        return new Promise((resolve, reject) => {
            this.pending = { size, resolve, reject };
            this.drain();
        });
    }

    private drain(): void {
        const pending = this.pending;
        if (!pending) return;

        if (this.buffered >= pending.size) {
            this.pending = null;
            pending.resolve(this.take(pending.size));
        } else if (this.failure) {
            this.pending = null;
            pending.reject(this.failure);
        } else if (this.ended) {
            this.pending = null;
            pending.reject(new ConnectionClosedError(pending.size, this.buffered));
        }
    }

    private take(size: number): Uint8Array {
        const out = new Uint8Array(size);
        let offset = 0;

        while (offset < size) {
            const head = this.chunks[0];
            const n = Math.min(head.length, size - offset);
            out.set(head.subarray(0, n), offset);
            offset += n;

            if (n === head.length) {
                this.chunks.shift();
            } else {
                this.chunks[0] = head.subarray(n);
            }
        }

        this.buffered -= size;
        return out;
    }
}
