/**
 * @file protocol.ts
 * @brief IPC Wire Protocol Definition
 *
 * # Frame Layout
 *
 * Every message exchanged with the desktop client is a single frame:
 *
 * ```
 * [OpCode (i32 LE)] [Length (i32 LE)] [JSON body (Length bytes, UTF-8)]
 * ```
 *
 * The body is always JSON. There is no padding between frames and no
 * framing beyond the 8-byte header.
 */

/**
 * IPC OpCodes.
 */
export enum OpCode {
    /** Opens the session, carries the client id */
    HANDSHAKE = 0,
    /** RPC command or reply */
    FRAME = 1,
    /** Orderly shutdown, or a rejection sent by the remote side */
    CLOSE = 2,
    /** Reserved */
    PING = 3,
    /** Reserved */
    PONG = 4,
}

export function isOpCode(value: number): value is OpCode {
    return Number.isInteger(value) && value >= OpCode.HANDSHAKE && value <= OpCode.PONG;
}

/**
 * Common Protocol Constants
 */
export const CONSTANTS = {
    /** Header size in bytes: opcode + length, both i32 */
    HEADER_SIZE: 8,
    /** Protocol version sent in the handshake */
    RPC_VERSION: 1,
    /** Endpoint indices tried during discovery: [0, MAX_ENDPOINTS) */
    MAX_ENDPOINTS: 10,
    /** Remote error code for a payload the client rejected */
    INVALID_PAYLOAD: 4000,
    /** Unix base directory when none of the environment variables are set */
    DEFAULT_UNIX_DIR: '/tmp/',
    /** Named pipe namespace on Windows */
    PIPE_PREFIX: '\\\\.\\pipe\\',
};

/** Environment variables checked, in order, for the Unix socket directory. */
export const UNIX_DIR_ENV_VARS = ['XDG_RUNTIME_DIR', 'TMPDIR', 'TMP', 'TEMP'] as const;

export const Commands = {
    SET_ACTIVITY: 'SET_ACTIVITY',
} as const;

export const Events = {
    READY: 'READY',
    ERROR: 'ERROR',
} as const;

export function socketName(index: number): string {
    return `discord-ipc-${index}`;
}
