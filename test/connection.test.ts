import {afterEach, beforeEach, describe, expect, it, vi} from 'vitest';

import {ack, flush, lastSocket, MockSocket, reply, sockets} from './helpers/mock-socket';

vi.mock('net', () => ({
    createConnection: vi.fn(() => {
        const socket = new MockSocket();
        sockets.push(socket);
        return socket;
    }),
}));

import {
    ConnectionLostError,
    ConnectionState,
    createLogger,
    decodeFrame,
    encodeRequest,
    KeyPowerStatus,
    type KeyStatusResponse,
    NoConnectionError,
    RequestOpcode,
    RequestTimeoutError,
    ResponseCode,
    VBoxConnection,
    type VBoxConnectionOptions,
} from '../src';

const logger = createLogger('silent');

const createConnection = (options: VBoxConnectionOptions = {}): VBoxConnection => new VBoxConnection({
    host: '127.0.0.1',
    port: 11501,
    heartbeatIntervalMs: 0,
    requestBufferMs: 0,
    autoReconnect: false,
    logger,
    ...options,
});

/** Connect and acknowledge the heartbeat toggle. */
const openConnection = async (options: VBoxConnectionOptions = {}): Promise<{
    connection: VBoxConnection;
    socket: MockSocket;
}> => {
    const connection = createConnection(options);
    const connecting = connection.connect();
    const socket = lastSocket();
    socket.emit('connect');
    await flush();
    socket.emit('data', ack(1));
    await connecting;
    return {connection, socket};
};

const written = (socket: MockSocket, index: number) => {
    const raw = socket.writes[index];
    if (!raw) throw new Error(`no write #${index}`);
    return decodeFrame(raw);
};

beforeEach(() => {
    sockets.length = 0;
});

afterEach(() => {
    vi.useRealTimers();
});

describe('VBoxConnection session', () => {
    it('toggles heartbeat and unsolicited updates on connect', async () => {
        const {connection, socket} = await openConnection();
        expect(connection.getState()).toBe(ConnectionState.Connected);
        expect(socket.writes[0]).toEqual(encodeRequest({
            opcode: RequestOpcode.ToggleHeartbeat,
            enable: false,
            unsolicited: true,
        }, 1));
        connection.disconnect();
    });

    it('logs in when a username is configured', async () => {
        const connection = createConnection({username: 'test-user', password: 'test-secret', heartbeatIntervalMs: 3000});
        const connecting = connection.connect();
        const socket = lastSocket();
        socket.emit('connect');
        await flush();
        expect(Array.from(written(socket, 0).payload)).toEqual([1, 1]);
        socket.emit('data', ack(1));
        await flush();

        expect(socket.writes[1]).toEqual(encodeRequest({
            opcode: RequestOpcode.Login,
            username: 'test-user',
            password: 'test-secret',
        }, 2));
        expect(connection.isConnected()).toBe(false);
        socket.emit('data', ack(2));
        await connecting;
        expect(connection.isConnected()).toBe(true);
        connection.disconnect();
    });

    it('emits state changes in order', async () => {
        const connection = createConnection();
        const states: ConnectionState[] = [];
        connection.on('state', (state) => states.push(state));
        const connecting = connection.connect();
        const socket = lastSocket();
        socket.emit('connect');
        await flush();
        socket.emit('data', ack(1));
        await connecting;
        connection.disconnect();

        expect(states).toEqual([ConnectionState.Connecting, ConnectionState.Connected, ConnectionState.Disconnected]);
    });

    it('refuses a second connect', async () => {
        const {connection} = await openConnection();
        await expect(connection.connect()).rejects.toMatchObject({code: 'CONNECTION_EXISTS'});
        expect(sockets.length).toBe(1);
        connection.disconnect();
    });

    it('rejects when the socket cannot connect', async () => {
        const connection = createConnection();
        const connecting = connection.connect();
        lastSocket().emit('error', new Error('ECONNREFUSED'));

        await expect(connecting).rejects.toMatchObject({
            code: 'NO_CONNECTION',
            message: 'Unable to connect to 127.0.0.1:11501: ECONNREFUSED',
        });
        expect(connection.getState()).toBe(ConnectionState.Disconnected);
    });

    it('gives up connecting after the connect timeout', async () => {
        vi.useFakeTimers();
        const connection = createConnection({connectTimeoutMs: 1000});
        const connecting = connection.connect();
        const assertion = expect(connecting).rejects.toBeInstanceOf(NoConnectionError);

        await vi.advanceTimersByTimeAsync(1000);
        await assertion;
        expect(lastSocket().destroyed).toBe(true);
        expect(connection.getState()).toBe(ConnectionState.Disconnected);
    });

    it('fails the connect when the handshake is not acknowledged', async () => {
        vi.useFakeTimers();
        const connection = createConnection({requestTimeoutMs: 500});
        const connecting = connection.connect();
        const assertion = expect(connecting).rejects.toBeInstanceOf(RequestTimeoutError);
        const socket = lastSocket();
        socket.emit('connect');

        await vi.advanceTimersByTimeAsync(500);
        await assertion;
        expect(socket.destroyed).toBe(true);
        expect(connection.getState()).toBe(ConnectionState.Disconnected);
    });

    it('disconnects idempotently and releases pending requests', async () => {
        const {connection, socket} = await openConnection();
        const onDisconnect = vi.fn();
        connection.on('disconnect', onDisconnect);
        const pending = connection.send({opcode: RequestOpcode.RoomCount});
        await flush();

        connection.disconnect();
        connection.disconnect();

        await expect(pending).rejects.toBeInstanceOf(ConnectionLostError);
        expect(socket.ended).toBe(true);
        expect(onDisconnect).toHaveBeenCalledTimes(1);
        expect(connection.getState()).toBe(ConnectionState.Disconnected);
        expect(connection.pendingCount).toBe(0);
    });
});

describe('VBoxConnection requests', () => {
    it('refuses to send while disconnected', async () => {
        const connection = createConnection();
        await expect(connection.send({opcode: RequestOpcode.RoomCount})).rejects.toBeInstanceOf(NoConnectionError);
        await expect(connection.post({opcode: RequestOpcode.Heartbeat})).rejects.toMatchObject({code: 'NO_CONNECTION'});
        expect(sockets.length).toBe(0);
    });

    it('answers a room count query', async () => {
        const {connection, socket} = await openConnection();
        const pending = connection.send({opcode: RequestOpcode.RoomCount});
        await flush();

        expect(socket.writes[1]).toEqual(encodeRequest({opcode: RequestOpcode.RoomCount}, 2));
        socket.emit('data', reply(ResponseCode.RoomCount, 2, [0x07]));
        await expect(pending).resolves.toMatchObject({kind: 'RoomCount', messageId: 2, count: 7});
        connection.disconnect();
    });

    it('correlates replies arriving out of order', async () => {
        const {connection, socket} = await openConnection();
        const rooms = connection.send({opcode: RequestOpcode.RoomCount});
        const nodes = connection.send({opcode: RequestOpcode.NodeCount});
        await flush();

        expect(written(socket, 1).messageId).toBe(2);
        expect(written(socket, 2).messageId).toBe(3);
        socket.emit('data', reply(ResponseCode.NodeCount, 3, [2, 10, 11]));
        socket.emit('data', reply(ResponseCode.RoomCount, 2, [1, 5]));

        await expect(nodes).resolves.toMatchObject({kind: 'NodeCount', messageId: 3, nodeIds: [10, 11]});
        await expect(rooms).resolves.toMatchObject({kind: 'RoomCount', messageId: 2, roomIds: [5]});
        connection.disconnect();
    });

    it('reassembles replies split across chunks', async () => {
        const {connection, socket} = await openConnection();
        const pending = connection.send({opcode: RequestOpcode.RoomMetaData, roomId: 4});
        await flush();

        const frame = reply(ResponseCode.RoomMetaData, 2, [4, ...Buffer.from('Hall', 'utf16le')]);
        socket.emit('data', frame.subarray(0, 5));
        socket.emit('data', frame.subarray(5, 11));
        socket.emit('data', frame.subarray(11));

        await expect(pending).resolves.toMatchObject({kind: 'RoomMetaData', roomId: 4, name: 'Hall'});
        connection.disconnect();
    });

    it('treats a reply with the wrong code as unsolicited', async () => {
        const {connection, socket} = await openConnection();
        const unsolicited = vi.fn();
        connection.on('unsolicited', unsolicited);
        const pending = connection.send({opcode: RequestOpcode.RoomCount});
        await flush();

        socket.emit('data', reply(ResponseCode.NodeCount, 2, [0]));
        expect(unsolicited).toHaveBeenCalledWith(expect.objectContaining({kind: 'NodeCount', messageId: 2}));
        expect(connection.pendingCount).toBe(1);

        socket.emit('data', reply(ResponseCode.RoomCount, 2, [0]));
        await expect(pending).resolves.toMatchObject({kind: 'RoomCount'});
        connection.disconnect();
    });

    it('times out a request at its deadline', async () => {
        vi.useFakeTimers();
        const {connection} = await openConnection({requestTimeoutMs: 1000});
        const pending = connection.send({opcode: RequestOpcode.NodeCount});
        const assertion = expect(pending).rejects.toMatchObject({code: 'RESPONSE_TIMEOUT'});

        await vi.advanceTimersByTimeAsync(999);
        expect(connection.pendingCount).toBe(1);
        await vi.advanceTimersByTimeAsync(1);
        await assertion;
        expect(connection.pendingCount).toBe(0);
        connection.disconnect();
    });

    it('honours a per-request timeout', async () => {
        vi.useFakeTimers();
        const {connection} = await openConnection({requestTimeoutMs: 10_000});
        const pending = connection.send({opcode: RequestOpcode.NodeCount}, {timeoutMs: 50});
        const assertion = expect(pending).rejects.toBeInstanceOf(RequestTimeoutError);

        await vi.advanceTimersByTimeAsync(50);
        await assertion;
        connection.disconnect();
    });

    it('rejects invalid arguments before writing', async () => {
        const {connection, socket} = await openConnection();
        await expect(connection.send({
            opcode: RequestOpcode.ToggleKeyStatus,
            nodeId: 1,
            keyId: 1,
            status: KeyPowerStatus.On,
            dimmerRatio: 150,
        })).rejects.toBeInstanceOf(RangeError);
        expect(socket.writes.length).toBe(1);
        expect(connection.pendingCount).toBe(0);
        connection.disconnect();
    });

    it('spaces consecutive writes by the request buffer', async () => {
        vi.useFakeTimers();
        const {connection, socket} = await openConnection({requestBufferMs: 250});
        void connection.post({opcode: RequestOpcode.RoomCount});
        void connection.post({opcode: RequestOpcode.NodeCount});
        await flush();
        expect(socket.writes.length).toBe(1);

        await vi.advanceTimersByTimeAsync(250);
        await flush();
        expect(socket.writes.length).toBe(2);
        await vi.advanceTimersByTimeAsync(249);
        await flush();
        expect(socket.writes.length).toBe(2);
        await vi.advanceTimersByTimeAsync(1);
        await flush();
        expect(socket.writes.length).toBe(3);
        expect(written(socket, 2).code).toBe(RequestOpcode.NodeCount);
        connection.disconnect();
    });

    it('skips queued frames whose request already timed out', async () => {
        vi.useFakeTimers();
        const {connection, socket} = await openConnection({requestBufferMs: 250, requestTimeoutMs: 300});
        const toggles = [1, 2, 3].map((keyId) => connection.send({
            opcode: RequestOpcode.ToggleKeyStatus,
            nodeId: 4,
            keyId,
            status: KeyPowerStatus.On,
        }));
        const outcomes = Promise.allSettled(toggles);

        await vi.advanceTimersByTimeAsync(1000);
        await flush();

        const results = await outcomes;
        for (const result of results) {
            expect(result.status).toBe('rejected');
            if (result.status === 'rejected') expect(result.reason).toBeInstanceOf(RequestTimeoutError);
        }
        expect(socket.writes.map((raw) => [decodeFrame(raw).code, decodeFrame(raw).messageId])).toEqual([
            [RequestOpcode.ToggleHeartbeat, 1],
            [RequestOpcode.ToggleKeyStatus, 2],
        ]);
        expect(connection.pendingCount).toBe(0);
        connection.disconnect();
    });
});

describe('VBoxConnection inbound stream', () => {
    it('dispatches unsolicited key status pushes', async () => {
        const {connection, socket} = await openConnection();
        const statuses: KeyStatusResponse[] = [];
        connection.onKeyStatus((status) => {
            statuses.push(status);
        });
        const inFlight = connection.send({opcode: RequestOpcode.KeyStatus, nodeId: 1, keyId: 2});
        await flush();

        socket.emit('data', reply(ResponseCode.KeyStatus, 0x33, [1, 2, KeyPowerStatus.On]));

        expect(statuses.length).toBe(1);
        expect(statuses[0]).toMatchObject({nodeId: 1, keyId: 2, power: 0x4f, isOn: true});
        expect(connection.pendingCount).toBe(1);

        socket.emit('data', reply(ResponseCode.KeyStatus, 2, [1, 2, KeyPowerStatus.On]));
        await expect(inFlight).resolves.toMatchObject({kind: 'KeyStatus', messageId: 2});
        expect(statuses.length).toBe(1);
        connection.disconnect();
    });

    it('keeps dispatching after a listener throws', async () => {
        const {connection, socket} = await openConnection();
        const second = vi.fn();
        connection.onKeyStatus(() => {
            throw new Error('listener broke');
        });
        connection.onKeyStatus(second);

        socket.emit('data', reply(ResponseCode.KeyStatus, 0x34, [1, 2, KeyPowerStatus.Off]));
        socket.emit('data', reply(ResponseCode.KeyStatus, 0x35, [1, 2, KeyPowerStatus.On]));

        expect(second).toHaveBeenCalledTimes(2);
        connection.disconnect();
    });

    it('drops malformed frames and keeps reading', async () => {
        const {connection, socket} = await openConnection();
        const malformed = vi.fn();
        const statuses = vi.fn();
        connection.on('malformedFrame', malformed);
        connection.onKeyStatus(statuses);

        const broken = reply(ResponseCode.KeyStatus, 0x36, [1, 1, KeyPowerStatus.On]);
        broken[broken.length - 1] = (broken[broken.length - 1] ?? 0) ^ 0xff;
        socket.emit('data', Buffer.concat([broken, reply(ResponseCode.KeyStatus, 0x37, [1, 3, KeyPowerStatus.On])]));

        expect(malformed).toHaveBeenCalledTimes(1);
        expect(malformed.mock.calls[0]?.[0]).toMatchObject({code: 'MALFORMED_FRAME'});
        expect(statuses).toHaveBeenCalledTimes(1);
        expect(statuses).toHaveBeenCalledWith(expect.objectContaining({keyId: 3}));
        connection.disconnect();
    });

    it('keeps complete frames of a read larger than the buffer limit', async () => {
        const {connection, socket} = await openConnection({maxBufferBytes: 64});
        const errors: Error[] = [];
        connection.on('error', (err) => errors.push(err));
        const statuses = vi.fn();
        connection.onKeyStatus(statuses);

        const pushes = Array.from({length: 10}, (_, index) => reply(ResponseCode.KeyStatus, 0x40 + index, [1, index, KeyPowerStatus.On]));
        socket.emit('data', Buffer.concat(pushes));

        expect(statuses).toHaveBeenCalledTimes(10);
        expect(errors).toEqual([]);
        connection.disconnect();
    });

    it('discards a frame declaring more than the buffer limit', async () => {
        const {connection, socket} = await openConnection({maxBufferBytes: 64});
        const errors: Error[] = [];
        connection.on('error', (err) => errors.push(err));

        socket.emit('data', Buffer.concat([Buffer.from([0x56, 0x54, 0x55, 0x3c, 0x60, 0x00, 0xff]), Buffer.alloc(58)]));

        expect(errors.length).toBe(1);
        expect(errors[0]).toMatchObject({code: 'BUFFER_OVERFLOW'});

        const statuses = vi.fn();
        connection.onKeyStatus(statuses);
        socket.emit('data', reply(ResponseCode.KeyStatus, 0x38, [2, 2, KeyPowerStatus.On]));
        expect(statuses).toHaveBeenCalledTimes(1);
        connection.disconnect();
    });

    it('survives a throwing event listener', async () => {
        const {connection, socket} = await openConnection();
        connection.on('unsolicited', () => {
            throw new Error('listener broke');
        });
        const pending = connection.send({opcode: RequestOpcode.RoomCount});
        await flush();

        expect(() => socket.emit('data', ack(0x50))).not.toThrow();
        socket.emit('data', reply(ResponseCode.RoomCount, 2, [0]));
        await expect(pending).resolves.toMatchObject({kind: 'RoomCount'});
        connection.disconnect();
    });
});

describe('VBoxConnection keepalive and recovery', () => {
    it('sends a heartbeat after the idle interval', async () => {
        vi.useFakeTimers();
        const {connection, socket} = await openConnection({heartbeatIntervalMs: 1000});
        const beats = vi.fn();
        connection.on('heartbeat', beats);
        expect(Array.from(written(socket, 0).payload)).toEqual([1, 1]);

        await vi.advanceTimersByTimeAsync(500);
        void connection.post({opcode: RequestOpcode.RoomCount});
        await flush();
        await vi.advanceTimersByTimeAsync(999);
        expect(socket.writes.length).toBe(2);

        await vi.advanceTimersByTimeAsync(1);
        await flush();
        expect(socket.writes.length).toBe(3);
        expect(written(socket, 2).code).toBe(RequestOpcode.Heartbeat);
        expect(beats).toHaveBeenCalledTimes(1);
        connection.disconnect();
    });

    it('reconnects after the socket drops and fails pending requests', async () => {
        vi.useFakeTimers();
        const {connection, socket} = await openConnection({
            autoReconnect: true,
            reconnectStrategy: 'fixed',
            reconnectDelayMs: 100,
        });
        const reconnecting = vi.fn();
        const connected = vi.fn();
        connection.on('reconnecting', reconnecting);
        connection.on('connect', connected);
        const pending = connection.send({opcode: RequestOpcode.RoomCount});
        const lost = expect(pending).rejects.toBeInstanceOf(ConnectionLostError);
        await flush();

        socket.destroy(new Error('connection reset'));
        await lost;
        expect(connection.getState()).toBe(ConnectionState.Reconnecting);
        expect(reconnecting).toHaveBeenCalledWith(1, 100);
        await expect(connection.send({opcode: RequestOpcode.RoomCount})).rejects.toBeInstanceOf(NoConnectionError);

        await vi.advanceTimersByTimeAsync(100);
        expect(sockets.length).toBe(2);
        const next = lastSocket();
        next.emit('connect');
        await flush();
        expect(written(next, 0)).toMatchObject({code: RequestOpcode.ToggleHeartbeat, messageId: 1});
        next.emit('data', ack(1));
        await flush();

        expect(connection.getState()).toBe(ConnectionState.Connected);
        expect(connected).toHaveBeenCalledTimes(1);

        const after = connection.send({opcode: RequestOpcode.RoomCount});
        await flush();
        expect(written(next, 1).messageId).toBe(2);
        next.emit('data', reply(ResponseCode.RoomCount, 2, [0x07]));
        await expect(after).resolves.toMatchObject({kind: 'RoomCount', count: 7});
        connection.disconnect();
    });

    it('never writes frames queued on a lost session to the next one', async () => {
        vi.useFakeTimers();
        const {connection, socket} = await openConnection({
            autoReconnect: true,
            reconnectStrategy: 'fixed',
            reconnectDelayMs: 100,
            requestBufferMs: 250,
        });
        const toggles = [1, 2, 3, 4].map((keyId) => connection.send({
            opcode: RequestOpcode.ToggleKeyStatus,
            nodeId: 4,
            keyId,
            status: KeyPowerStatus.On,
        }));
        const outcomes = Promise.allSettled(toggles);
        await flush();

        socket.destroy(new Error('connection reset'));
        for (const result of await outcomes) {
            expect(result.status).toBe('rejected');
            if (result.status === 'rejected') expect(result.reason).toBeInstanceOf(ConnectionLostError);
        }

        await vi.advanceTimersByTimeAsync(100);
        const next = lastSocket();
        expect(next).not.toBe(socket);
        next.emit('connect');
        await flush();
        await vi.advanceTimersByTimeAsync(150);
        expect(next.writes.length).toBe(1);
        expect(written(next, 0)).toMatchObject({code: RequestOpcode.ToggleHeartbeat, messageId: 1});
        next.emit('data', ack(1));
        await flush();
        expect(connection.getState()).toBe(ConnectionState.Connected);

        await vi.advanceTimersByTimeAsync(2000);
        await flush();
        expect(next.writes.length).toBe(1);
        expect(socket.writes.length).toBe(1);
        connection.disconnect();
    });

    it('returns to disconnected after the reconnect budget is spent', async () => {
        vi.useFakeTimers();
        const {connection, socket} = await openConnection({
            autoReconnect: true,
            reconnectStrategy: 'fixed',
            reconnectDelayMs: 100,
            reconnectMaxAttempts: 1,
        });
        socket.destroy();
        expect(connection.getState()).toBe(ConnectionState.Reconnecting);

        await vi.advanceTimersByTimeAsync(100);
        lastSocket().emit('error', new Error('ECONNREFUSED'));
        await flush();

        expect(connection.getState()).toBe(ConnectionState.Disconnected);
        await vi.advanceTimersByTimeAsync(1000);
        expect(sockets.length).toBe(2);
    });

    it('stays down after a drop when reconnect is off', async () => {
        const {connection, socket} = await openConnection();
        socket.destroy();
        expect(connection.getState()).toBe(ConnectionState.Disconnected);
        await expect(connection.send({opcode: RequestOpcode.RoomCount})).rejects.toBeInstanceOf(NoConnectionError);
    });

    it('stops reconnecting on disconnect', async () => {
        vi.useFakeTimers();
        const {connection, socket} = await openConnection({autoReconnect: true, reconnectDelayMs: 100});
        socket.destroy();
        connection.disconnect();

        await vi.advanceTimersByTimeAsync(1000);
        expect(sockets.length).toBe(1);
        expect(connection.getState()).toBe(ConnectionState.Disconnected);
    });
});
