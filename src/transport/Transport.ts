/**
 * Byte-stream contract between the session and a local IPC endpoint.
 * This decouples the 'How' (Unix socket, named pipe) from the 'What' (frames).
 */
export type TransportStatus = 'IDLE' | 'CONNECTING' | 'CONNECTED' | 'CLOSED';

export interface TransportEvents {
    [key: string]: unknown[];
    status: [status: TransportStatus];
}

export interface Transport {
    /** Tries the candidate endpoints in order and connects to the first that answers. */
    connect(): Promise<void>;
    /** Resolves with exactly `size` bytes, waiting across partial reads. */
    readExact(size: number): Promise<Uint8Array>;
    /** Resolves once the whole buffer has been flushed to the endpoint. */
    writeAll(data: Uint8Array): Promise<void>;
    /** Releases the endpoint. Safe to call more than once. */
    close(): void;

    getStatus(): TransportStatus;
    /** Path of the connected endpoint, or null before connect. */
    getPath(): string | null;

    on<K extends keyof TransportEvents>(
        event: K,
        handler: (...args: TransportEvents[K]) => void
    ): () => void;
}
