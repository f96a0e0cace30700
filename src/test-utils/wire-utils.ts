import { decodeHeader, decodePayload, HEADER_SIZE } from '../codec';
import { OpCode } from '../protocol';

export interface DecodedFrame {
    op: OpCode;
    body: unknown;
}

/**
 * Splits a byte buffer into decoded frames. Delegates to the production codec
 * so tests and client agree on the layout.
 */
export function unpackFrames(bytes: Uint8Array): DecodedFrame[] {
    const frames: DecodedFrame[] = [];
    let offset = 0;
    while (offset < bytes.length) {
        const { op, length } = decodeHeader(bytes.subarray(offset, offset + HEADER_SIZE));
        const start = offset + HEADER_SIZE;
        frames.push({ op, body: decodePayload(bytes.subarray(start, start + length)) });
        offset = start + length;
    }
    return frames;
}

/**
 * Builds a frame by hand, for bodies the production encoder would never emit.
 */
export function packRaw(op: number, body: Uint8Array, declaredLength: number = body.length): Uint8Array {
    const frame = new Uint8Array(HEADER_SIZE + body.length);
    const view = new DataView(frame.buffer);
    view.setInt32(0, op, true);
    view.setInt32(4, declaredLength, true);
    frame.set(body, HEADER_SIZE);
    return frame;
}
