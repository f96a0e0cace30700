import type { TransportOptions } from '../types';
import { NamedPipeTransport } from './NamedPipeTransport';
import type { Transport } from './Transport';
import { UnixSocketTransport } from './UnixSocketTransport';

/**
 * Picks the transport variant for `platform`: named pipes on Windows,
 * Unix domain sockets everywhere else.
 */
export function createTransport(platform: NodeJS.Platform, options: TransportOptions): Transport {
    return platform === 'win32'
        ? new NamedPipeTransport(options)
        : new UnixSocketTransport(options);
}
