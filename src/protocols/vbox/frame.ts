/**
 * vBox frame codec and stream splitter.
 * @module vbox/frame
 *
 * Layout: `VTU | direction | code | length(2, BE) | message id | payload | checksum`.
 * `length` counts the message id, payload and checksum bytes.
 */
import {
    FRAME_CODE_OFFSET,
    FRAME_DIRECTION_OFFSET,
    FRAME_HEADER_SIZE,
    FRAME_LENGTH_OFFSET,
    FRAME_MAX_PAYLOAD,
    FRAME_MESSAGE_ID_OFFSET,
    FRAME_MIN_SIZE,
    FRAME_PAYLOAD_OFFSET,
    FRAME_PREFIX,
    FrameDirection,
} from './constants';
import {MalformedFrameError} from './errors';

export type FrameOptions = {
    direction?: FrameDirection;
    /** Request opcode or response code. */
    code: number;
    messageId: number;
    payload?: Buffer | Uint8Array;
};

export type Frame = {
    direction: FrameDirection;
    code: number;
    messageId: number;
    payload: Buffer;
    checksum: number;
    raw: Buffer;
};

/** Sum of all bytes modulo 256. */
export const computeChecksum = (bytes: Uint8Array): number => {
    let sum = 0;
    for (const byte of bytes) sum += byte;
    return sum & 0xff;
};

/** Colon separated upper-case hex, e.g. `56:54:55`. */
export const toHex = (bytes: Uint8Array): string =>
    Array.from(bytes, (byte) => byte.toString(16).toUpperCase().padStart(2, '0')).join(':');

const isDirection = (value: number): value is FrameDirection =>
    value === FrameDirection.Outgoing || value === FrameDirection.Incoming;

const hasPrefixAt = (buffer: Uint8Array, offset: number): boolean =>
    buffer[offset] === FRAME_PREFIX[0]
    && buffer[offset + 1] === FRAME_PREFIX[1]
    && buffer[offset + 2] === FRAME_PREFIX[2];

/**
 * Build one frame. The checksum is appended last.
 */
export const encodeFrame = ({direction = FrameDirection.Outgoing, code, messageId, payload}: FrameOptions): Buffer => {
    if (!Number.isInteger(code) || code < 0 || code > 0xff) {
        throw new RangeError(`Frame code must be 0-255, got ${code}`);
    }
    if (!Number.isInteger(messageId) || messageId < 0 || messageId > 0xff) {
        throw new RangeError(`Message id must be 0-255, got ${messageId}`);
    }
    const data = payload ? Buffer.from(payload) : Buffer.alloc(0);
    if (data.length > FRAME_MAX_PAYLOAD) {
        throw new RangeError(`Frame payload must be at most ${FRAME_MAX_PAYLOAD} bytes, got ${data.length}`);
    }

    const buffer = Buffer.alloc(FRAME_MIN_SIZE + data.length);
    FRAME_PREFIX.copy(buffer, 0);
    buffer.writeUInt8(direction, FRAME_DIRECTION_OFFSET);
    buffer.writeUInt8(code, FRAME_CODE_OFFSET);
    buffer.writeUInt16BE(data.length + 2, FRAME_LENGTH_OFFSET);
    buffer.writeUInt8(messageId, FRAME_MESSAGE_ID_OFFSET);
    data.copy(buffer, FRAME_PAYLOAD_OFFSET);
    buffer.writeUInt8(computeChecksum(buffer.subarray(0, buffer.length - 1)), buffer.length - 1);
    return buffer;
};

/**
 * Decode exactly one frame.
 * Throws {@link MalformedFrameError} on any marker, direction, length or checksum mismatch.
 */
export const decodeFrame = (bytes: Buffer | Uint8Array): Frame => {
    const buffer = Buffer.from(bytes);
    if (buffer.length < FRAME_MIN_SIZE) {
        throw new MalformedFrameError(`Frame too short: expected at least ${FRAME_MIN_SIZE} bytes, got ${buffer.length}`, {
            raw: toHex(buffer),
        });
    }
    if (!hasPrefixAt(buffer, 0)) {
        throw new MalformedFrameError('Frame does not start with the VTU marker', {raw: toHex(buffer)});
    }
    const direction = buffer.readUInt8(FRAME_DIRECTION_OFFSET);
    if (!isDirection(direction)) {
        throw new MalformedFrameError(`Invalid frame direction 0x${direction.toString(16)}`, {raw: toHex(buffer)});
    }
    const declared = buffer.readUInt16BE(FRAME_LENGTH_OFFSET);
    if (FRAME_HEADER_SIZE + declared !== buffer.length) {
        throw new MalformedFrameError(
            `Declared length ${declared} disagrees with ${buffer.length - FRAME_HEADER_SIZE} available bytes`,
            {raw: toHex(buffer)},
        );
    }
    const checksum = buffer.readUInt8(buffer.length - 1);
    const expected = computeChecksum(buffer.subarray(0, buffer.length - 1));
    if (checksum !== expected) {
        throw new MalformedFrameError(
            `Checksum mismatch: expected 0x${expected.toString(16)}, got 0x${checksum.toString(16)}`,
            {raw: toHex(buffer)},
        );
    }

    return {
        direction,
        code: buffer.readUInt8(FRAME_CODE_OFFSET),
        messageId: buffer.readUInt8(FRAME_MESSAGE_ID_OFFSET),
        payload: Buffer.from(buffer.subarray(FRAME_PAYLOAD_OFFSET, buffer.length - 1)),
        checksum,
        raw: buffer,
    };
};

/**
 * Index of the next start marker at or after `from`. When there is none, the index of a
 * partial marker at the very end of the buffer, else the buffer length.
 */
const nextFrameStart = (stream: Buffer, from: number): number => {
    const found = stream.indexOf(FRAME_PREFIX, from);
    if (found !== -1) return found;
    for (let keep = Math.min(FRAME_PREFIX.length - 1, stream.length - from); keep > 0; keep -= 1) {
        const tail = stream.subarray(stream.length - keep);
        if (tail.equals(FRAME_PREFIX.subarray(0, keep))) return stream.length - keep;
    }
    return stream.length;
};

export type ExtractedFrames = {
    frames: Frame[];
    errors: MalformedFrameError[];
    remainder: Buffer;
};

/**
 * Extract every complete frame from the front of a TCP stream buffer.
 * Garbage before a marker and malformed frames are skipped and reported in `errors`;
 * incomplete trailing bytes are returned as `remainder`.
 *
 * A frame declaring more than `maxFrameBytes` in total is reported with code
 * `BUFFER_OVERFLOW` and skipped, so the remainder never grows past the limit.
 */
export const extractFrames = (stream: Buffer, maxFrameBytes = FRAME_HEADER_SIZE + 0xffff): ExtractedFrames => {
    const frames: Frame[] = [];
    const errors: MalformedFrameError[] = [];
    let offset = 0;

    while (offset < stream.length) {
        const start = nextFrameStart(stream, offset);
        if (start > offset) {
            errors.push(new MalformedFrameError(`Discarded ${start - offset} bytes without a frame marker`, {
                raw: toHex(stream.subarray(offset, start)),
            }));
            offset = start;
        }
        if (offset + FRAME_HEADER_SIZE > stream.length) break;

        const declared = stream.readUInt16BE(offset + FRAME_LENGTH_OFFSET);
        if (declared < 2) {
            errors.push(new MalformedFrameError(`Invalid declared length ${declared} at offset ${offset}`));
            offset = nextFrameStart(stream, offset + 1);
            continue;
        }
        const total = FRAME_HEADER_SIZE + declared;
        if (total > maxFrameBytes) {
            errors.push(new MalformedFrameError(
                `Declared frame of ${total} bytes exceeds the ${maxFrameBytes} byte limit`,
                {declared, limit: maxFrameBytes},
                'BUFFER_OVERFLOW',
            ));
            offset = nextFrameStart(stream, offset + 1);
            continue;
        }
        if (offset + total > stream.length) break;

        try {
            frames.push(decodeFrame(stream.subarray(offset, offset + total)));
            offset += total;
        } catch (err) {
            if (!(err instanceof MalformedFrameError)) throw err;
            errors.push(err);
            offset = nextFrameStart(stream, offset + 1);
        }
    }

    return {
        frames,
        errors,
        remainder: Buffer.from(stream.subarray(offset)),
    };
};
