/**
 * vBox request model and payload encoders.
 * @module vbox/requests
 */
import {FrameDirection, KeyPowerStatus, LOGIN_FIELD_MARKER, RequestOpcode, ResponseCode} from './constants';
import {encodeFrame} from './frame';

export type LoginRequest = {opcode: RequestOpcode.Login; username: string; password: string};
export type HeartbeatRequest = {opcode: RequestOpcode.Heartbeat};
export type ToggleHeartbeatRequest = {
    opcode: RequestOpcode.ToggleHeartbeat;
    /** Ask the box to expect heartbeats. */
    enable: boolean;
    /** Ask the box to push unsolicited key-status updates. */
    unsolicited: boolean;
};
export type RoomMetaDataRequest = {opcode: RequestOpcode.RoomMetaData; roomId: number};
export type RoomCountRequest = {opcode: RequestOpcode.RoomCount};
export type NodeMetaDataRequest = {opcode: RequestOpcode.NodeMetaData; nodeId: number};
export type NodeCountRequest = {opcode: RequestOpcode.NodeCount};
export type NodeStatusRequest = {opcode: RequestOpcode.NodeStatus; nodeId: number};
export type ToggleKeyStatusRequest = {
    opcode: RequestOpcode.ToggleKeyStatus;
    nodeId: number;
    keyId: number;
    status: KeyPowerStatus;
    /** 0-100. Defaults to 0. */
    dimmerRatio?: number;
    /** Seconds, 0-65535. Defaults to 0. */
    timer?: number;
};
export type KeyStatusRequest = {opcode: RequestOpcode.KeyStatus; nodeId: number; keyId: number};
export type KeyParametersRequest = {opcode: RequestOpcode.KeyParameters; nodeId: number; keyId: number};
export type InternalUnitStatusesRequest = {opcode: RequestOpcode.InternalUnitStatuses};

export type VBoxRequest =
    | LoginRequest
    | HeartbeatRequest
    | ToggleHeartbeatRequest
    | RoomMetaDataRequest
    | RoomCountRequest
    | NodeMetaDataRequest
    | NodeCountRequest
    | NodeStatusRequest
    | ToggleKeyStatusRequest
    | KeyStatusRequest
    | KeyParametersRequest
    | InternalUnitStatusesRequest;

const assertRange = (name: string, value: number, min: number, max: number): number => {
    if (!Number.isInteger(value) || value < min || value > max) {
        throw new RangeError(`${name} must be ${min}-${max}, got ${value}`);
    }
    return value;
};

const byte = (name: string, value: number): number => assertRange(name, value, 0, 0xff);

/**
 * Serialize the payload (the bytes after the message id) of a request.
 */
export const encodeRequestPayload = (request: VBoxRequest): Buffer => {
    switch (request.opcode) {
        case RequestOpcode.Login:
            return Buffer.concat([
                Buffer.from([LOGIN_FIELD_MARKER]),
                Buffer.from(request.username, 'utf16le'),
                Buffer.from([LOGIN_FIELD_MARKER]),
                Buffer.from(request.password, 'utf16le'),
            ]);
        case RequestOpcode.ToggleHeartbeat:
            return Buffer.from([request.enable ? 1 : 0, request.unsolicited ? 1 : 0]);
        case RequestOpcode.RoomMetaData:
            return Buffer.from([byte('roomId', request.roomId)]);
        case RequestOpcode.NodeMetaData:
        case RequestOpcode.NodeStatus:
            return Buffer.from([byte('nodeId', request.nodeId)]);
        case RequestOpcode.KeyStatus:
        case RequestOpcode.KeyParameters:
            return Buffer.from([byte('nodeId', request.nodeId), byte('keyId', request.keyId)]);
        case RequestOpcode.ToggleKeyStatus: {
            const timer = assertRange('timer', request.timer ?? 0, 0, 0xffff);
            return Buffer.from([
                byte('nodeId', request.nodeId),
                byte('keyId', request.keyId),
                byte('status', request.status),
                assertRange('dimmerRatio', request.dimmerRatio ?? 0, 0, 100),
                (timer >> 8) & 0xff,
                timer & 0xff,
            ]);
        }
        case RequestOpcode.Heartbeat:
        case RequestOpcode.RoomCount:
        case RequestOpcode.NodeCount:
        case RequestOpcode.InternalUnitStatuses:
            return Buffer.alloc(0);
    }
};

/**
 * Response code the box answers a request with. Commands are acknowledged,
 * queries are answered with a frame carrying the request's own opcode.
 */
export const expectedResponseCode = (request: VBoxRequest): number => {
    switch (request.opcode) {
        case RequestOpcode.Login:
        case RequestOpcode.Heartbeat:
        case RequestOpcode.ToggleHeartbeat:
        case RequestOpcode.ToggleKeyStatus:
            return ResponseCode.Acknowledgement;
        default:
            return request.opcode;
    }
};

/** Human-readable request name for logs. */
export const describeRequest = (request: VBoxRequest): string => RequestOpcode[request.opcode];

/** Encode a request as an outgoing frame. */
export const encodeRequest = (request: VBoxRequest, messageId: number): Buffer =>
    encodeFrame({
        direction: FrameDirection.Outgoing,
        code: request.opcode,
        messageId,
        payload: encodeRequestPayload(request),
    });
