/**
 * vBox response model and the code-to-variant factory.
 * @module vbox/responses
 */
import {KeyPowerStatus, LockStatus, ProtocolVersion, ResponseCode} from './constants';
import {VBoxError} from './errors';
import {type Frame, toHex} from './frame';

type ResponseBase = {
    /** Response code as found on the wire. */
    code: number;
    /** Message id carried by the frame. */
    messageId: number;
    /** Raw payload bytes. */
    payload: Buffer;
};

export type AcknowledgementResponse = ResponseBase & {kind: 'Acknowledgement'};

export type RoomCountResponse = ResponseBase & {
    kind: 'RoomCount';
    count: number;
    roomIds: number[];
};

export type NodeCountResponse = ResponseBase & {
    kind: 'NodeCount';
    count: number;
    nodeIds: number[];
};

export type RoomMetaDataResponse = ResponseBase & {
    kind: 'RoomMetaData';
    roomId: number;
    name: string;
};

export type NodeKey = {
    id: number;
    type: number;
};

export type NodeMetaDataResponse = ResponseBase & {
    kind: 'NodeMetaData';
    nodeId: number;
    /** Eight bytes, colon separated hex. */
    macAddress: string;
    totalKeys: number;
    keys: NodeKey[];
    lockStatus: number;
    isLocked: boolean;
    /** {@link LedBackgroundBrightness} value. */
    ledLevel: number;
    version: string;
    roomId: number;
};

export type NodeMetaDataV2Response = ResponseBase & {kind: 'NodeMetaDataV2'};

export type KeyStatusResponse = ResponseBase & {
    kind: 'KeyStatus';
    nodeId: number;
    keyId: number;
    /** {@link KeyPowerStatus} value. */
    power: number;
    isOn: boolean;
    isOff: boolean;
    isReleased: boolean;
};

export type KeyParametersResponse = ResponseBase & {
    kind: 'KeyParameters';
    nodeId: number;
    keyId: number;
    /** {@link KeyCategory} value. */
    category: number;
    dimmerRatio: number;
    name: string;
};

export type KeyParametersV2Response = ResponseBase & {kind: 'KeyParametersV2'};

export type InternalUnitStatusesResponse = ResponseBase & {kind: 'InternalUnitStatuses'};

/** Any code without a dedicated model, or a payload too short for its parser. */
export type GenericUnusedResponse = ResponseBase & {kind: 'GenericUnused'};

export type VBoxResponse =
    | AcknowledgementResponse
    | RoomCountResponse
    | NodeCountResponse
    | RoomMetaDataResponse
    | NodeMetaDataResponse
    | NodeMetaDataV2Response
    | KeyStatusResponse
    | KeyParametersResponse
    | KeyParametersV2Response
    | InternalUnitStatusesResponse
    | GenericUnusedResponse;

export type ResponseKind = VBoxResponse['kind'];

export type ResponseOfKind<K extends ResponseKind> = Extract<VBoxResponse, {kind: K}>;

type ResponseParser = {
    /** Minimum payload length the parser reads. */
    minLength: number;
    parse: (base: ResponseBase) => VBoxResponse;
};

const KEY_PARAMETERS_NAME_OFFSET = 12;
const NODE_MAC_OFFSET = 1;
const NODE_MAC_LENGTH = 8;
const NODE_TOTAL_KEYS_OFFSET = 10;
const NODE_KEY_TYPES_OFFSET = 11;
const NODE_LOCK_OFFSET = 0;
const NODE_LED_OFFSET = 1;
const NODE_VERSION_OFFSET = 3;
const NODE_ROOM_OFFSET = 7;

const byteAt = (payload: Buffer, index: number): number => (index < payload.length ? payload.readUInt8(index) : 0);

/** UTF-16LE text with NUL padding stripped. */
const readText = (payload: Buffer, offset: number): string =>
    offset < payload.length ? payload.subarray(offset).toString('utf16le').replace(/\0+$/, '') : '';

const countAndIds = (payload: Buffer): {count: number; ids: number[]} => ({
    count: byteAt(payload, 0),
    ids: Array.from(payload.subarray(1)),
});

const parseNodeMetaData = (base: ResponseBase): NodeMetaDataResponse => {
    const {payload} = base;
    const totalKeys = byteAt(payload, NODE_TOTAL_KEYS_OFFSET);
    const status = NODE_KEY_TYPES_OFFSET + totalKeys;
    const versionAt = status + NODE_VERSION_OFFSET;
    const lockStatus = byteAt(payload, status + NODE_LOCK_OFFSET);
    const keys: NodeKey[] = [];
    for (let id = 0; id < totalKeys; id += 1) {
        keys.push({id, type: byteAt(payload, NODE_KEY_TYPES_OFFSET + id)});
    }
    return {
        ...base,
        kind: 'NodeMetaData',
        nodeId: byteAt(payload, 0),
        macAddress: toHex(payload.subarray(NODE_MAC_OFFSET, NODE_MAC_OFFSET + NODE_MAC_LENGTH)),
        totalKeys,
        keys,
        lockStatus,
        isLocked: lockStatus === LockStatus.Locked,
        ledLevel: byteAt(payload, status + NODE_LED_OFFSET),
        version: versionAt + 2 < payload.length
            ? `${payload[versionAt]}.${payload[versionAt + 1]}${payload[versionAt + 2]}`
            : '0.0.0',
        roomId: byteAt(payload, status + NODE_ROOM_OFFSET),
    };
};

const V1_PARSERS = new Map<number, ResponseParser>([
    [ResponseCode.Acknowledgement, {minLength: 0, parse: (base) => ({...base, kind: 'Acknowledgement'})}],
    [ResponseCode.RoomCount, {
        minLength: 1,
        parse: (base) => {
            const {count, ids} = countAndIds(base.payload);
            return {...base, kind: 'RoomCount', count, roomIds: ids};
        },
    }],
    [ResponseCode.NodeCount, {
        minLength: 1,
        parse: (base) => {
            const {count, ids} = countAndIds(base.payload);
            return {...base, kind: 'NodeCount', count, nodeIds: ids};
        },
    }],
    [ResponseCode.RoomMetaData, {
        minLength: 1,
        parse: (base) => ({
            ...base,
            kind: 'RoomMetaData',
            roomId: byteAt(base.payload, 0),
            name: readText(base.payload, 1),
        }),
    }],
    [ResponseCode.NodeMetaData, {minLength: NODE_KEY_TYPES_OFFSET, parse: parseNodeMetaData}],
    [ResponseCode.KeyStatus, {
        minLength: 3,
        parse: (base) => {
            const power = byteAt(base.payload, 2);
            return {
                ...base,
                kind: 'KeyStatus',
                nodeId: byteAt(base.payload, 0),
                keyId: byteAt(base.payload, 1),
                power,
                isOn: power === KeyPowerStatus.On,
                isOff: power === KeyPowerStatus.Off,
                isReleased: power === KeyPowerStatus.Released,
            };
        },
    }],
    [ResponseCode.KeyParameters, {
        minLength: 4,
        parse: (base) => ({
            ...base,
            kind: 'KeyParameters',
            nodeId: byteAt(base.payload, 0),
            keyId: byteAt(base.payload, 1),
            category: byteAt(base.payload, 2),
            dimmerRatio: byteAt(base.payload, 3),
            name: readText(base.payload, KEY_PARAMETERS_NAME_OFFSET),
        }),
    }],
    [ResponseCode.InternalUnitStatuses, {minLength: 0, parse: (base) => ({...base, kind: 'InternalUnitStatuses'})}],
    [ResponseCode.NodeExistenceStatus, {minLength: 0, parse: (base) => ({...base, kind: 'GenericUnused'})}],
]);

const V2_PARSERS = new Map<number, ResponseParser>([
    ...V1_PARSERS,
    [ResponseCode.NodeMetaData, {minLength: 0, parse: (base) => ({...base, kind: 'NodeMetaDataV2'})}],
    [ResponseCode.KeyParameters, {minLength: 0, parse: (base) => ({...base, kind: 'KeyParametersV2'})}],
]);

const PARSERS: Record<ProtocolVersion, ReadonlyMap<number, ResponseParser>> = {
    [ProtocolVersion.V1]: V1_PARSERS,
    [ProtocolVersion.V2]: V2_PARSERS,
};

/**
 * Map a decoded frame to its response variant. Total: unknown codes and payloads
 * too short for their parser yield `GenericUnused`.
 */
export const responseFromFrame = (frame: Frame, version: ProtocolVersion = ProtocolVersion.V2): VBoxResponse => {
    const base: ResponseBase = {code: frame.code, messageId: frame.messageId, payload: frame.payload};
    const parser = PARSERS[version].get(frame.code);
    if (!parser || frame.payload.length < parser.minLength) {
        return {...base, kind: 'GenericUnused'};
    }
    return parser.parse(base);
};

export const isResponseKind = <K extends ResponseKind>(
    response: VBoxResponse,
    kinds: readonly K[],
): response is ResponseOfKind<K> => kinds.some((kind) => kind === response.kind);

/**
 * Narrow a response to one of `kinds`, throwing `UNEXPECTED_RESPONSE` otherwise.
 */
export const expectResponseKind = <K extends ResponseKind>(response: VBoxResponse, ...kinds: K[]): ResponseOfKind<K> => {
    if (isResponseKind(response, kinds)) return response;
    throw new VBoxError({
        message: `Expected ${kinds.join(' or ')} response, got ${response.kind}`,
        domain: 'protocol',
        code: 'UNEXPECTED_RESPONSE',
        details: {code: response.code, messageId: response.messageId},
    });
};
