import path from 'path';
import { CONSTANTS, UNIX_DIR_ENV_VARS, socketName } from '../protocol';
import type { TransportOptions } from '../types';
import { SocketTransport } from './SocketTransport';

/**
 * Directory holding the IPC sockets: the first of XDG_RUNTIME_DIR, TMPDIR,
 * TMP, TEMP that is set (even to an empty string), else /tmp/.
 */
export function resolveUnixDirectory(env: NodeJS.ProcessEnv): string {
    for (const name of UNIX_DIR_ENV_VARS) {
        const value = env[name];
        if (value !== undefined) return value;
    }
    return CONSTANTS.DEFAULT_UNIX_DIR;
}

export class UnixSocketTransport extends SocketTransport {
    private readonly directory: string;

    constructor(options: TransportOptions) {
        super(options.logger);
        this.directory = resolveUnixDirectory(options.env);
    }

    protected endpointPath(index: number): string {
        return path.join(this.directory, socketName(index));
    }
}
