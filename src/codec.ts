/**
 * @file codec.ts
 * @brief Frame encoding/decoding for the IPC wire protocol.
 *
 * A frame is an 8-byte header (opcode, body length; both little-endian
 * signed 32-bit integers) followed by a UTF-8 JSON body.
 *
 * @example
 * ```typescript
 * import { encodeFrame, decodeHeader, OpCode } from 'rich-presence-ipc';
 *
 * const frame = encodeFrame(OpCode.HANDSHAKE, { v: 1, client_id: '123' });
 * const { op, length } = decodeHeader(frame.subarray(0, 8));
 * ```
 */

import { MalformedFrameError } from './errors';
import { CONSTANTS, OpCode, isOpCode } from './protocol';
import type { JsonValue } from './types';
import { truncate } from './validation';

const textEncoder = new TextEncoder();
const textDecoder = new TextDecoder('utf-8', { fatal: true });

export const HEADER_SIZE = CONSTANTS.HEADER_SIZE;

export interface FrameHeader {
    op: OpCode;
    length: number;
}

/**
 * Serializes `payload` as JSON and prefixes it with the frame header.
 */
export function encodeFrame(op: OpCode, payload: JsonValue): Uint8Array {
    const body = textEncoder.encode(JSON.stringify(payload));
    const frame = new Uint8Array(HEADER_SIZE + body.length);
    const view = new DataView(frame.buffer);

    view.setInt32(0, op, true);
    view.setInt32(4, body.length, true);
    frame.set(body, HEADER_SIZE);

    return frame;
}

/**
 * Reads the opcode and body length from the first 8 bytes of `bytes`.
 *
 * @throws {MalformedFrameError} On a short buffer, unknown opcode or negative length
 */
export function decodeHeader(bytes: Uint8Array): FrameHeader {
    if (bytes.length < HEADER_SIZE) {
        throw new MalformedFrameError(`Frame header needs ${HEADER_SIZE} bytes, got ${bytes.length}`);
    }

    const view = new DataView(bytes.buffer, bytes.byteOffset, HEADER_SIZE);
    const op = view.getInt32(0, true);
    const length = view.getInt32(4, true);

    if (!isOpCode(op)) {
        throw new MalformedFrameError(`Unknown opcode ${op}`);
    }
    if (length < 0) {
        throw new MalformedFrameError(`Negative frame length ${length}`);
    }

    return { op, length };
}

/**
 * Decodes a frame body. Invalid UTF-8 and invalid JSON are both hard failures.
 *
 * @throws {MalformedFrameError}
 */
export function decodePayload(bytes: Uint8Array): unknown {
    let raw: string;
    try {
        raw = textDecoder.decode(bytes);
    } catch (error) {
        throw new MalformedFrameError(
            `Frame body is not valid UTF-8: ${error instanceof Error ? error.message : 'Unknown error'}`
        );
    }

    try {
        return JSON.parse(raw);
    } catch (error) {
        throw new MalformedFrameError(
            `Failed to parse frame body as JSON: ${error instanceof Error ? error.message : 'Unknown error'}`,
            truncate(raw)
        );
    }
}
