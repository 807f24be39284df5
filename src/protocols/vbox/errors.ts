/**
 * Structured vBox error taxonomy.
 * @module vbox/errors
 */
export type VBoxErrorDomain = 'frame' | 'transport' | 'timeout' | 'protocol' | 'config';

export type VBoxErrorCode =
    | 'MALFORMED_FRAME'
    | 'RESPONSE_TIMEOUT'
    | 'NO_CONNECTION'
    | 'CONNECTION_EXISTS'
    | 'CONNECTION_LOST'
    | 'MESSAGE_ID_IN_USE'
    | 'UNEXPECTED_RESPONSE'
    | 'BUFFER_OVERFLOW'
    | 'INVALID_CONFIG'
    | 'PROTOCOL_ERROR';

export class VBoxError extends Error {
    public readonly domain: VBoxErrorDomain;
    public readonly code: VBoxErrorCode;
    public readonly details?: Record<string, unknown>;

    constructor(params: {
        message: string;
        domain: VBoxErrorDomain;
        code: VBoxErrorCode;
        details?: Record<string, unknown>;
    }) {
        super(params.message);
        this.name = 'VBoxError';
        this.domain = params.domain;
        this.code = params.code;
        this.details = params.details;
    }
}

/** Checksum, marker or length mismatch. The frame is dropped. */
export class MalformedFrameError extends VBoxError {
    constructor(
        message: string,
        details?: Record<string, unknown>,
        code: 'MALFORMED_FRAME' | 'BUFFER_OVERFLOW' = 'MALFORMED_FRAME',
    ) {
        super({message, domain: 'frame', code, details});
        this.name = 'MalformedFrameError';
    }
}

export class RequestTimeoutError extends VBoxError {
    constructor(message: string, details?: Record<string, unknown>) {
        super({message, domain: 'timeout', code: 'RESPONSE_TIMEOUT', details});
        this.name = 'RequestTimeoutError';
    }
}

export class NoConnectionError extends VBoxError {
    constructor(message = 'No socket connection established', details?: Record<string, unknown>) {
        super({message, domain: 'transport', code: 'NO_CONNECTION', details});
        this.name = 'NoConnectionError';
    }
}

export class ConnectionExistsError extends VBoxError {
    constructor(message = 'Socket connection already exists', details?: Record<string, unknown>) {
        super({message, domain: 'transport', code: 'CONNECTION_EXISTS', details});
        this.name = 'ConnectionExistsError';
    }
}

export class ConnectionLostError extends VBoxError {
    constructor(message = 'Socket connection lost', details?: Record<string, unknown>) {
        super({message, domain: 'transport', code: 'CONNECTION_LOST', details});
        this.name = 'ConnectionLostError';
    }
}

/** Normalises anything thrown into an `Error` for logging and events. */
export const toError = (err: unknown): Error => (err instanceof Error ? err : new Error(String(err)));
