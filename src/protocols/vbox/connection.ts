/**
 * vBox TCP connection: session handshake, request correlation, keepalive and reconnect.
 * @module vbox/connection
 */
import * as net from 'net';
import type {Socket} from 'net';
import {EventEmitter} from 'events';

import {createLogger, type Logger} from '../../core/logger';
import {
    ConnectionState,
    ProtocolVersion,
    RequestOpcode,
    VBOX_DEFAULT_CONNECT_TIMEOUT_MS,
    VBOX_DEFAULT_HEARTBEAT_MS,
    VBOX_DEFAULT_HOST,
    VBOX_DEFAULT_MAX_BUFFER_BYTES,
    VBOX_DEFAULT_PORT,
    VBOX_DEFAULT_RECONNECT_DELAY_MS,
    VBOX_DEFAULT_RECONNECT_MAX_DELAY_MS,
    VBOX_DEFAULT_REQUEST_BUFFER_MS,
    VBOX_DEFAULT_REQUEST_TIMEOUT_MS,
} from './constants';
import {KeyStatusDispatcher, type KeyStatusListener} from './dispatcher';
import {
    ConnectionExistsError,
    ConnectionLostError,
    type MalformedFrameError,
    NoConnectionError,
    toError,
    VBoxError,
} from './errors';
import {extractFrames, type Frame, toHex} from './frame';
import {HeartbeatScheduler} from './heartbeat';
import {MessageIdAllocator} from './message-id';
import {PendingRequestTable} from './pending';
import {ReconnectSupervisor, type ReconnectStrategy} from './reconnect';
import {describeRequest, encodeRequest, expectedResponseCode, type VBoxRequest} from './requests';
import {responseFromFrame, type VBoxResponse} from './responses';

/**
 * Configuration for a {@link VBoxConnection}.
 */
export type VBoxConnectionOptions = {
    /** Box hostname or IP address. Defaults to {@link VBOX_DEFAULT_HOST}. */
    host?: string;
    /** Box TCP port. Defaults to {@link VBOX_DEFAULT_PORT}. */
    port?: number;
    /** Login is skipped when empty. */
    username?: string;
    password?: string;
    /** Response layout to decode. Default: V2. */
    version?: ProtocolVersion;
    /** Per-request reply deadline. */
    requestTimeoutMs?: number;
    /** Deadline for the TCP connect itself. */
    connectTimeoutMs?: number;
    /** Minimum spacing between two outbound frames. `0` disables pacing. */
    requestBufferMs?: number;
    /** Idle time before a heartbeat is sent. `0` disables heartbeats. */
    heartbeatIntervalMs?: number;
    /** Reconnect after an unexpected loss. Default: `true`. */
    autoReconnect?: boolean;
    reconnectStrategy?: ReconnectStrategy;
    reconnectDelayMs?: number;
    reconnectMaxDelayMs?: number;
    /** `0` retries forever. */
    reconnectMaxAttempts?: number;
    /** Largest frame accepted from the box; bigger declarations are discarded. */
    maxBufferBytes?: number;
    /** Do not log correlated acknowledgement and generic responses. */
    ignoreAckLogs?: boolean;
    logger?: Logger;
};

export type SendOptions = {
    /** Overrides the connection's `requestTimeoutMs`. */
    timeoutMs?: number;
};

/**
 * Typed event map emitted by {@link VBoxConnection}.
 */
export interface VBoxConnectionEvents {
    /** Session established (handshake done). */
    connect: [];
    disconnect: [hadError: boolean];
    reconnecting: [attempt: number, delayMs: number];
    state: [state: ConnectionState];
    /** A heartbeat frame was written. */
    heartbeat: [];
    /** Every decoded inbound frame. */
    frame: [frame: Frame];
    /** Responses that completed a pending request. */
    response: [response: VBoxResponse];
    /** Responses nobody was waiting for. */
    unsolicited: [response: VBoxResponse];
    malformedFrame: [error: MalformedFrameError];
    /** Only emitted while a listener is attached. */
    error: [error: Error];
}

const sleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

export class VBoxConnection extends EventEmitter<VBoxConnectionEvents> {
    public readonly host: string;
    public readonly port: number;
    public readonly version: ProtocolVersion;

    private readonly username: string;
    private readonly password: string;
    private readonly requestTimeoutMs: number;
    private readonly connectTimeoutMs: number;
    private readonly requestBufferMs: number;
    private readonly heartbeatIntervalMs: number;
    private readonly maxBufferBytes: number;
    private readonly ignoreAckLogs: boolean;
    private readonly logger: Logger;

    private readonly messageIds = new MessageIdAllocator();
    private readonly pending = new PendingRequestTable();
    private readonly keyStatus: KeyStatusDispatcher;
    private readonly heartbeat: HeartbeatScheduler;
    private readonly reconnector: ReconnectSupervisor;

    private state: ConnectionState = ConnectionState.Disconnected;
    private socket: Socket | null = null;
    private streamBuffer: Buffer = Buffer.alloc(0);
    private writeChain: Promise<void> = Promise.resolve();
    private lastWriteAt = 0;
    private manualClose = false;

    constructor(options: VBoxConnectionOptions = {}) {
        super();
        this.host = options.host ?? VBOX_DEFAULT_HOST;
        this.port = options.port ?? VBOX_DEFAULT_PORT;
        this.version = options.version ?? ProtocolVersion.V2;
        this.username = options.username ?? '';
        this.password = options.password ?? '';
        this.requestTimeoutMs = options.requestTimeoutMs ?? VBOX_DEFAULT_REQUEST_TIMEOUT_MS;
        this.connectTimeoutMs = options.connectTimeoutMs ?? VBOX_DEFAULT_CONNECT_TIMEOUT_MS;
        this.requestBufferMs = options.requestBufferMs ?? VBOX_DEFAULT_REQUEST_BUFFER_MS;
        this.heartbeatIntervalMs = options.heartbeatIntervalMs ?? VBOX_DEFAULT_HEARTBEAT_MS;
        this.maxBufferBytes = options.maxBufferBytes ?? VBOX_DEFAULT_MAX_BUFFER_BYTES;
        this.ignoreAckLogs = options.ignoreAckLogs ?? false;
        this.logger = options.logger ?? createLogger('info', 'vbox-connection');

        this.keyStatus = new KeyStatusDispatcher(this.logger);
        this.heartbeat = new HeartbeatScheduler({
            intervalMs: this.heartbeatIntervalMs,
            beat: () => this.sendHeartbeat(),
            onError: (err) => {
                this.logger.error({err}, 'Heartbeat failed');
                this.emitError(err);
            },
        });
        this.reconnector = new ReconnectSupervisor(
            {
                enabled: options.autoReconnect ?? true,
                strategy: options.reconnectStrategy ?? 'backoff',
                delayMs: options.reconnectDelayMs ?? VBOX_DEFAULT_RECONNECT_DELAY_MS,
                maxDelayMs: options.reconnectMaxDelayMs ?? VBOX_DEFAULT_RECONNECT_MAX_DELAY_MS,
                maxAttempts: options.reconnectMaxAttempts ?? 0,
            },
            () => this.reconnect(),
            {
                onAttempt: (attempt, delayMs) => {
                    this.logger.info({attempt, delayMs}, 'Reconnecting');
                    this.emit('reconnecting', attempt, delayMs);
                },
                onError: (err, attempt) => {
                    this.logger.warn({err, attempt}, 'Reconnect attempt failed');
                },
                onGiveUp: (attempts) => {
                    this.logger.error({attempts}, 'Giving up reconnecting');
                    this.setState(ConnectionState.Disconnected);
                },
            },
        );
    }

    public getState(): ConnectionState {
        return this.state;
    }

    /** Returns `true` once the handshake completed and until the session is lost. */
    public isConnected(): boolean {
        return this.state === ConnectionState.Connected;
    }

    /** Number of requests awaiting a reply. */
    public get pendingCount(): number {
        return this.pending.size;
    }

    /**
     * Opens the socket and runs the session handshake (ToggleHeartbeat, then Login
     * when a username is configured). Rejects with {@link ConnectionExistsError}
     * unless the connection is disconnected.
     */
    public async connect(): Promise<void> {
        if (this.state !== ConnectionState.Disconnected) {
            throw new ConnectionExistsError(undefined, {state: this.state});
        }
        this.manualClose = false;
        this.setState(ConnectionState.Connecting);
        try {
            await this.establish();
        } catch (err) {
            this.teardown();
            this.setState(ConnectionState.Disconnected);
            throw err;
        }
    }

    /** Closes the session. Pending requests fail with {@link ConnectionLostError}. Idempotent. */
    public disconnect(): void {
        this.manualClose = true;
        this.reconnector.cancel();
        this.heartbeat.stop();
        const socket = this.socket;
        const wasConnected = this.state === ConnectionState.Connected;
        this.socket = null;
        this.streamBuffer = Buffer.alloc(0);
        this.writeChain = Promise.resolve();
        const released = this.pending.invalidateAll(new ConnectionLostError('Connection closed by client'));
        if (socket) {
            if (wasConnected) socket.end();
            else socket.destroy();
            this.logger.info({host: this.host, port: this.port, released}, 'Disconnected');
            this.emit('disconnect', false);
        }
        this.setState(ConnectionState.Disconnected);
    }

    /**
     * Sends a request and resolves with its correlated response.
     * Rejects with {@link NoConnectionError} unless connected, and with
     * {@link RequestTimeoutError} when no reply arrives in time.
     */
    public async send(request: VBoxRequest, options: SendOptions = {}): Promise<VBoxResponse> {
        this.assertConnected(request);
        return this.transact(request, options.timeoutMs ?? this.requestTimeoutMs);
    }

    /** Writes a request without waiting for a reply; resolves with the message id used. */
    public async post(request: VBoxRequest): Promise<number> {
        this.assertConnected(request);
        const messageId = this.messageIds.next();
        await this.enqueueWrite(encodeRequest(request, messageId));
        return messageId;
    }

    /** Subscribe to unsolicited key-status pushes; returns the unsubscribe function. */
    public onKeyStatus(listener: KeyStatusListener): () => void {
        return this.keyStatus.add(listener);
    }

    private assertConnected(request: VBoxRequest): void {
        if (this.state !== ConnectionState.Connected) {
            throw new NoConnectionError(undefined, {request: describeRequest(request), state: this.state});
        }
    }

    private async establish(): Promise<void> {
        const socket = net.createConnection({host: this.host, port: this.port});
        this.socket = socket;
        this.streamBuffer = Buffer.alloc(0);
        this.messageIds.reset();

        socket.on('data', (chunk: Buffer) => {
            if (socket !== this.socket) return;
            try {
                this.handleData(chunk);
            } catch (err) {
                this.logger.error({err: toError(err)}, 'Failed to process inbound data');
                this.emitError(toError(err));
            }
        });
        socket.on('error', (err: Error) => {
            this.logger.warn({err, host: this.host, port: this.port}, 'Socket error');
            this.emitError(new VBoxError({
                message: err.message,
                domain: 'transport',
                code: 'PROTOCOL_ERROR',
                details: {host: this.host, port: this.port},
            }));
        });
        socket.on('close', (hadError: boolean) => this.handleClose(socket, hadError));

        await this.waitForSocket(socket);
        await this.handshake();

        this.setState(ConnectionState.Connected);
        this.heartbeat.start();
        this.logger.info({host: this.host, port: this.port, version: this.version}, 'Connected');
        this.emit('connect');
    }

    private async reconnect(): Promise<void> {
        try {
            await this.establish();
        } catch (err) {
            this.teardown();
            throw err;
        }
    }

    private waitForSocket(socket: Socket): Promise<void> {
        return new Promise<void>((resolve, reject) => {
            const details = {host: this.host, port: this.port};
            const timer = setTimeout(() => {
                cleanup();
                socket.destroy();
                reject(new NoConnectionError(`Connection to ${this.host}:${this.port} timed out after ${this.connectTimeoutMs}ms`, details));
            }, this.connectTimeoutMs);
            const onConnect = (): void => {
                cleanup();
                resolve();
            };
            const onError = (err: Error): void => {
                cleanup();
                reject(new NoConnectionError(`Unable to connect to ${this.host}:${this.port}: ${err.message}`, details));
            };
            const onClose = (): void => {
                cleanup();
                reject(new NoConnectionError(`Connection to ${this.host}:${this.port} closed while connecting`, details));
            };
            const cleanup = (): void => {
                clearTimeout(timer);
                socket.off('connect', onConnect);
                socket.off('error', onError);
                socket.off('close', onClose);
            };
            socket.once('connect', onConnect);
            socket.once('error', onError);
            socket.once('close', onClose);
        });
    }

    private async handshake(): Promise<void> {
        await this.transact({
            opcode: RequestOpcode.ToggleHeartbeat,
            enable: this.heartbeatIntervalMs > 0,
            unsolicited: true,
        }, this.requestTimeoutMs);
        if (this.username) {
            await this.transact({
                opcode: RequestOpcode.Login,
                username: this.username,
                password: this.password,
            }, this.requestTimeoutMs);
        }
    }

    private async transact(request: VBoxRequest, timeoutMs: number): Promise<VBoxResponse> {
        if (!this.socket) throw new NoConnectionError(undefined, {request: describeRequest(request)});
        const messageId = this.messageIds.next();
        const frame = encodeRequest(request, messageId);
        const reply = this.pending.register(messageId, expectedResponseCode(request), timeoutMs, describeRequest(request));
        const written = this.enqueueWrite(frame, () => this.pending.has(messageId)).catch((err: unknown) => {
            this.pending.fail(messageId, toError(err));
        });
        const [response] = await Promise.all([reply, written]);
        return response;
    }

    private async sendHeartbeat(): Promise<void> {
        await this.post({opcode: RequestOpcode.Heartbeat});
        this.logger.debug('Heartbeat sent');
        this.emit('heartbeat');
    }

    /**
     * Queue a frame for the current socket. The frame is dropped with
     * {@link ConnectionLostError} if that socket is gone by the time its turn comes,
     * and skipped when `wanted` returns `false` (its request already settled).
     */
    private enqueueWrite(data: Buffer, wanted: () => boolean = () => true): Promise<void> {
        const socket = this.socket;
        if (!socket) return Promise.reject(new NoConnectionError());
        const run = this.writeChain.then(() => this.writeRaw(socket, data, wanted));
        // failures reach the caller through `run`
        this.writeChain = run.catch(() => undefined);
        return run;
    }

    private async writeRaw(socket: Socket, data: Buffer, wanted: () => boolean): Promise<void> {
        const wait = this.lastWriteAt + this.requestBufferMs - Date.now();
        if (this.requestBufferMs > 0 && wait > 0) await sleep(wait);
        if (socket !== this.socket) throw new ConnectionLostError('Connection lost before the frame was written');
        if (!wanted()) {
            this.logger.debug({raw: toHex(data)}, 'Skipped frame of a settled request');
            return;
        }
        await new Promise<void>((resolve, reject) => {
            socket.write(data, (err) => {
                if (err) reject(err);
                else resolve();
            });
        });
        this.lastWriteAt = Date.now();
        this.heartbeat.touch();
        this.logger.debug({raw: toHex(data)}, 'Frame sent');
    }

    private handleData(chunk: Buffer): void {
        this.streamBuffer = Buffer.concat([this.streamBuffer, chunk]);
        const {frames, errors, remainder} = extractFrames(this.streamBuffer, this.maxBufferBytes);
        this.streamBuffer = remainder;
        for (const error of errors) {
            if (error.code === 'BUFFER_OVERFLOW') {
                this.logger.error({err: error, ...error.details}, 'Frame exceeds the stream buffer limit, discarding it');
                this.emitError(error);
            } else {
                this.logger.warn({err: error, ...error.details}, 'Dropped malformed frame');
            }
            this.guard(() => this.emit('malformedFrame', error));
        }
        for (const frame of frames) {
            this.guard(() => this.handleFrame(frame));
        }
    }

    private handleFrame(frame: Frame): void {
        this.logger.debug({raw: toHex(frame.raw)}, 'Frame received');
        const response = responseFromFrame(frame, this.version);
        const matched = this.pending.resolve(response);
        if (matched) {
            const quiet = this.ignoreAckLogs && (response.kind === 'Acknowledgement' || response.kind === 'GenericUnused');
            if (!quiet) this.logger.info({kind: response.kind, messageId: response.messageId}, 'Response received');
            this.emit('frame', frame);
            this.emit('response', response);
            return;
        }
        this.handleUnsolicited(frame, response);
    }

    private handleUnsolicited(frame: Frame, response: VBoxResponse): void {
        this.logger.debug({kind: response.kind, messageId: response.messageId}, 'Unsolicited frame');
        if (response.kind === 'KeyStatus') this.keyStatus.dispatch(response);
        this.emit('frame', frame);
        this.emit('unsolicited', response);
    }

    private handleClose(socket: Socket, hadError: boolean): void {
        if (socket !== this.socket) return;
        this.socket = null;
        this.streamBuffer = Buffer.alloc(0);
        this.writeChain = Promise.resolve();
        this.heartbeat.stop();
        const lost = this.pending.invalidateAll(new ConnectionLostError());
        this.emit('disconnect', hadError);

        // connect() and reconnect() settle the states below through their own rejection
        if (this.state !== ConnectionState.Connected) return;
        this.logger.error({host: this.host, port: this.port, hadError, pending: lost}, 'Connection lost');
        if (!this.manualClose && this.reconnector.isEnabled()) {
            this.setState(ConnectionState.Reconnecting);
            if (this.reconnector.schedule()) return;
        }
        this.setState(ConnectionState.Disconnected);
    }

    private teardown(): void {
        this.heartbeat.stop();
        const socket = this.socket;
        this.socket = null;
        this.streamBuffer = Buffer.alloc(0);
        this.writeChain = Promise.resolve();
        socket?.destroy();
    }

    private setState(next: ConnectionState): void {
        if (next === this.state) return;
        this.logger.debug({from: this.state, to: next}, 'Connection state changed');
        this.state = next;
        this.emit('state', next);
    }

    private guard(action: () => void): void {
        try {
            action();
        } catch (err) {
            this.logger.error({err: toError(err)}, 'Event listener failed');
        }
    }

    private emitError(error: Error): void {
        if (this.listenerCount('error') > 0) this.emit('error', error);
    }
}
