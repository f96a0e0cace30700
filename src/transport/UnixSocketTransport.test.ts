import fs from 'fs';
import net from 'net';
import os from 'os';
import path from 'path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { ConnectionClosedError, ConnectionError, DiscoveryError } from '../errors';
import { Logger, LogLevel } from '../utils/Logger';
import { UnixSocketTransport, resolveUnixDirectory } from './UnixSocketTransport';

const quietLogger = new Logger('test');
quietLogger.setLogLevel(LogLevel.NONE);

describe('resolveUnixDirectory', () => {
    it('prefers XDG_RUNTIME_DIR', () => {
        expect(resolveUnixDirectory({ XDG_RUNTIME_DIR: '/run/user/1000', TMPDIR: '/var/tmp' })).toBe('/run/user/1000');
    });

    it('checks TMPDIR, TMP and TEMP in order', () => {
        expect(resolveUnixDirectory({ TMP: '/b', TEMP: '/c', TMPDIR: '/a' })).toBe('/a');
        expect(resolveUnixDirectory({ TEMP: '/c', TMP: '/b' })).toBe('/b');
        expect(resolveUnixDirectory({ TEMP: '/c' })).toBe('/c');
    });

    it('treats an empty value as set', () => {
        expect(resolveUnixDirectory({ XDG_RUNTIME_DIR: '', TMPDIR: '/a' })).toBe('');
    });

    it('defaults to /tmp/', () => {
        expect(resolveUnixDirectory({ HOME: '/home/user' })).toBe('/tmp/');
    });
});

describe('UnixSocketTransport', () => {
    it('builds ten candidate paths in ascending order', () => {
        const transport = new UnixSocketTransport({ env: {}, logger: quietLogger });
        const paths = transport.candidatePaths();

        expect(paths).toHaveLength(10);
        expect(paths[0]).toBe('/tmp/discord-ipc-0');
        expect(paths[9]).toBe('/tmp/discord-ipc-9');
    });

    it('joins the resolved directory without doubling separators', () => {
        const transport = new UnixSocketTransport({ env: { XDG_RUNTIME_DIR: '/run/user/1000/' }, logger: quietLogger });
        expect(transport.candidatePaths()[3]).toBe('/run/user/1000/discord-ipc-3');
    });

    it('starts idle with no path', () => {
        const transport = new UnixSocketTransport({ env: {}, logger: quietLogger });
        expect(transport.getStatus()).toBe('IDLE');
        expect(transport.getPath()).toBeNull();
    });

    it('rejects reads and writes before connect', async () => {
        const transport = new UnixSocketTransport({ env: {}, logger: quietLogger });

        await expect(transport.readExact(1)).rejects.toThrow('Cannot read: transport is IDLE');
        await expect(transport.writeAll(new Uint8Array([1]))).rejects.toThrow('Cannot write: transport is IDLE');
    });
});

describe.skipIf(process.platform === 'win32')('UnixSocketTransport over a local socket', () => {
    let dir: string;
    let server: net.Server | null;
    let serverSockets: net.Socket[];
    let transport: UnixSocketTransport;

    function listen(index: number, onConnection: (socket: net.Socket) => void = () => { }): Promise<void> {
        server = net.createServer((socket) => {
            serverSockets.push(socket);
            onConnection(socket);
        });
        const listening = server;
        return new Promise((resolve) => listening.listen(path.join(dir, `discord-ipc-${index}`), resolve));
    }

    beforeEach(() => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), 'rpc-'));
        server = null;
        serverSockets = [];
        transport = new UnixSocketTransport({ env: { XDG_RUNTIME_DIR: dir }, logger: quietLogger });
    });

    afterEach(async () => {
        transport.close();
        serverSockets.forEach((socket) => socket.destroy());
        const running = server;
        if (running) {
            await new Promise<void>((resolve) => running.close(() => resolve()));
        }
        fs.rmSync(dir, { recursive: true, force: true });
    });

    it('connects to the first index that has a listener', async () => {
        await listen(2);
        const statuses: string[] = [];
        transport.on('status', (status) => statuses.push(status));

        await transport.connect();

        expect(transport.getPath()).toBe(path.join(dir, 'discord-ipc-2'));
        expect(transport.getStatus()).toBe('CONNECTED');
        expect(statuses).toEqual(['CONNECTING', 'CONNECTED']);
    });

    it('fails discovery when no index has a listener', async () => {
        const connecting = transport.connect();

        await expect(connecting).rejects.toBeInstanceOf(DiscoveryError);
        await expect(connecting).rejects.toMatchObject({
            code: 'DISCOVERY_ERROR',
            paths: Array.from({ length: 10 }, (_, i) => path.join(dir, `discord-ipc-${i}`)),
        });
        expect(transport.getStatus()).toBe('CLOSED');
        expect(transport.getPath()).toBeNull();
    });

    it('skips a stale socket file that refuses connections', async () => {
        fs.writeFileSync(path.join(dir, 'discord-ipc-0'), '');
        await listen(1);

        await transport.connect();

        expect(transport.getPath()).toBe(path.join(dir, 'discord-ipc-1'));
        expect(transport.getStatus()).toBe('CONNECTED');
    });

    it('stops discovery with ConnectionError on any other failure', async () => {
        const notADirectory = path.join(dir, 'runtime');
        fs.writeFileSync(notADirectory, '');
        const blocked = new UnixSocketTransport({ env: { XDG_RUNTIME_DIR: notADirectory }, logger: quietLogger });

        const connecting = blocked.connect();

        await expect(connecting).rejects.toBeInstanceOf(ConnectionError);
        await expect(connecting).rejects.not.toBeInstanceOf(DiscoveryError);
        await expect(connecting).rejects.toMatchObject({ cause: { code: 'ENOTDIR' } });
        expect(blocked.getStatus()).toBe('CLOSED');
    });

    it('refuses a second connect', async () => {
        await listen(0);
        await transport.connect();

        await expect(transport.connect()).rejects.toBeInstanceOf(ConnectionError);
    });

    it('writes all bytes and reads exactly what was asked', async () => {
        const received: Buffer[] = [];
        await listen(0, (socket) => {
            socket.on('data', (chunk: Buffer) => {
                received.push(chunk);
                // Answer in two separate writes to split the reply.
                socket.write(Buffer.from([1, 2, 3]));
                setTimeout(() => socket.write(Buffer.from([4, 5, 6, 7])), 5);
            });
        });
        await transport.connect();

        await transport.writeAll(new Uint8Array([9, 8, 7]));
        const reply = await transport.readExact(6);

        expect(Array.from(Buffer.concat(received))).toEqual([9, 8, 7]);
        expect(Array.from(reply)).toEqual([1, 2, 3, 4, 5, 6]);
        expect(Array.from(await transport.readExact(1))).toEqual([7]);
    });

    it('fails a pending read when the peer closes early', async () => {
        await listen(0, (socket) => {
            socket.end(Buffer.from([1, 2]));
        });
        await transport.connect();

        const read = transport.readExact(8);

        await expect(read).rejects.toBeInstanceOf(ConnectionClosedError);
        await expect(read).rejects.toMatchObject({ expected: 8, received: 2 });
    });

    it('closes idempotently and rejects later writes', async () => {
        await listen(0);
        await transport.connect();

        transport.close();
        transport.close();

        expect(transport.getStatus()).toBe('CLOSED');
        await expect(transport.writeAll(new Uint8Array([1]))).rejects.toThrow('Cannot write: transport is CLOSED');
        await expect(transport.readExact(1)).rejects.toBeInstanceOf(ConnectionClosedError);
    });
});
