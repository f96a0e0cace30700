import { CONSTANTS, socketName } from '../protocol';
import type { TransportOptions } from '../types';
import { SocketTransport } from './SocketTransport';

/**
 * Windows transport: `\\.\pipe\discord-ipc-N`, opened as a duplex stream.
 */
export class NamedPipeTransport extends SocketTransport {
    constructor(options: TransportOptions) {
        super(options.logger);
    }

    protected endpointPath(index: number): string {
        return `${CONSTANTS.PIPE_PREFIX}${socketName(index)}`;
    }
}
