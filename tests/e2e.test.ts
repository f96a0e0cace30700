/**
 * End-to-end: a real Unix socket, an in-process stand-in for the desktop
 * client, and the public API.
 */

import fs from 'fs';
import os from 'os';
import path from 'path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
    connect,
    withPresence,
    DiscoveryError,
    InvalidActivityError,
    InvalidClientIdError,
    Logger,
    LogLevel,
    OpCode,
    type PresenceConfig,
} from '../src';
import { MockIpcServer, type FrameHandler } from '../src/test-utils/ipc-server';

const CLIENT_ID = '123456789012345678';

const quietLogger = new Logger('e2e');
quietLogger.setLogLevel(LogLevel.NONE);

const readyThen = (onCommand: FrameHandler): FrameHandler => (frame) =>
    frame.op === OpCode.HANDSHAKE
        ? { op: OpCode.FRAME, payload: { cmd: 'DISPATCH', evt: 'READY', data: { v: 1 } } }
        : onCommand(frame);

describe.skipIf(process.platform === 'win32')('rich presence over a Unix socket', () => {
    let dir: string;
    let server: MockIpcServer | null;
    let config: Partial<PresenceConfig>;

    async function startServer(handler: FrameHandler, index: number = 0): Promise<MockIpcServer> {
        const started = new MockIpcServer(handler);
        await started.listen(path.join(dir, `discord-ipc-${index}`));
        server = started;
        return started;
    }

    beforeEach(() => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), 'rpc-e2e-'));
        server = null;
        config = { platform: 'linux', env: { XDG_RUNTIME_DIR: dir }, logger: quietLogger, pid: 31337 };
    });

    afterEach(async () => {
        await server?.close();
        fs.rmSync(dir, { recursive: true, force: true });
    });

    it('reaches READY and surfaces the unwrapped activity error', async () => {
        const ipc = await startServer(readyThen(() => ({
            op: OpCode.FRAME,
            payload: {
                evt: 'ERROR',
                data: { message: 'child "activity" fails because ["details" is required]', code: 4000 },
            },
        })));

        const presence = await connect(CLIENT_ID, config);
        expect(presence.getStatus()).toBe('READY');

        const setting = presence.set({ state: 'x' });
        await expect(setting).rejects.toBeInstanceOf(InvalidActivityError);
        await expect(setting).rejects.toMatchObject({ message: '"details" is required' });

        await presence.close();
        await ipc.waitForDisconnect();

        expect(ipc.frames.map((frame) => frame.op)).toEqual([OpCode.HANDSHAKE, OpCode.FRAME, OpCode.CLOSE]);
        expect(ipc.frames[0].body).toEqual({ v: 1, client_id: CLIENT_ID });
        expect(ipc.frames[1].body).toMatchObject({
            cmd: 'SET_ACTIVITY',
            args: { pid: 31337, activity: { state: 'x' } },
        });
        expect(ipc.frames[2].body).toEqual({});
    });

    it('fails discovery when no socket exists at indices 0-9', async () => {
        const connecting = connect(CLIENT_ID, config);

        await expect(connecting).rejects.toBeInstanceOf(DiscoveryError);
        await expect(connecting).rejects.toMatchObject({
            paths: Array.from({ length: 10 }, (_, i) => path.join(dir, `discord-ipc-${i}`)),
        });
    });

    it('finds the endpoint at a later index', async () => {
        await startServer(readyThen(() => null), 4);

        const presence = await connect(CLIENT_ID, config);

        expect(presence.getEndpoint()).toBe(path.join(dir, 'discord-ipc-4'));
        await presence.close();
    });

    it('rejects an unknown client id sent back on a CLOSE frame', async () => {
        await startServer(() => ({ op: OpCode.CLOSE, payload: { code: 4000, message: 'Invalid Client ID' } }));

        await expect(connect('not-a-client', config)).rejects.toBeInstanceOf(InvalidClientIdError);
    });

    it('sets and clears an activity inside withPresence', async () => {
        const ipc = await startServer(readyThen(() => ({
            op: OpCode.FRAME,
            payload: { cmd: 'SET_ACTIVITY', evt: null, data: null },
        })));

        await withPresence(CLIENT_ID, async (presence) => {
            await presence.set({
                details: 'Ranked',
                assets: { large_image: 'logo', large_text: 'Logo' },
                buttons: [{ label: 'Join', url: 'https://example.com' }],
            });
            await presence.clear();
        }, config);
        await ipc.waitForDisconnect();

        expect(ipc.frames.map((frame) => frame.op)).toEqual([
            OpCode.HANDSHAKE,
            OpCode.FRAME,
            OpCode.FRAME,
            OpCode.CLOSE,
        ]);
        expect(ipc.frames[2].body).toMatchObject({ args: { activity: null } });
    });
});
