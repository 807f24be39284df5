/**
 * vBox protocol constants.
 * @module vbox/constants
 */
export const VBOX_DEFAULT_HOST = '192.168.1.23';
export const VBOX_DEFAULT_PORT = 11501;
export const VBOX_DEFAULT_HEARTBEAT_MS = 3000;
export const VBOX_DEFAULT_REQUEST_TIMEOUT_MS = 10000;
export const VBOX_DEFAULT_CONNECT_TIMEOUT_MS = 10000;
export const VBOX_DEFAULT_REQUEST_BUFFER_MS = 250;
export const VBOX_DEFAULT_RECONNECT_DELAY_MS = 500;
export const VBOX_DEFAULT_RECONNECT_MAX_DELAY_MS = 10000;
export const VBOX_DEFAULT_MAX_BUFFER_BYTES = 64 * 1024;

/** "VTU" start marker opening every frame. */
export const FRAME_PREFIX = Buffer.from([0x56, 0x54, 0x55]);
export const FRAME_DIRECTION_OFFSET = 3;
export const FRAME_CODE_OFFSET = 4;
export const FRAME_LENGTH_OFFSET = 5;
export const FRAME_MESSAGE_ID_OFFSET = 7;
export const FRAME_PAYLOAD_OFFSET = 8;
/** Marker, direction, code and length field. */
export const FRAME_HEADER_SIZE = 7;
/** Header plus message id and checksum. */
export const FRAME_MIN_SIZE = 9;
export const FRAME_MAX_PAYLOAD = 0xffff - 2;

export const MESSAGE_ID_MIN = 0x01;
export const MESSAGE_ID_MAX = 0xff;

export const LOGIN_FIELD_MARKER = 0x0a;

export enum FrameDirection {
    Outgoing = 0x3e,
    Incoming = 0x3c,
}

export enum ProtocolVersion {
    V1 = 'v1',
    V2 = 'v2',
}

/** Opcodes of client requests. */
export enum RequestOpcode {
    Login = 0x01,
    Heartbeat = 0x07,
    ToggleHeartbeat = 0x08,
    RoomMetaData = 0x1a,
    RoomCount = 0x1d,
    NodeMetaData = 0x1f,
    NodeCount = 0x24,
    NodeStatus = 0x25,
    ToggleKeyStatus = 0x28,
    KeyStatus = 0x29,
    KeyParameters = 0x2b,
    InternalUnitStatuses = 0x60,
}

/** Codes of frames sent by the box. */
export enum ResponseCode {
    Acknowledgement = 0x00,
    RoomMetaData = 0x1a,
    RoomCount = 0x1d,
    NodeMetaData = 0x1f,
    NodeCount = 0x24,
    KeyStatus = 0x29,
    KeyParameters = 0x2b,
    InternalUnitStatuses = 0x60,
    NodeExistenceStatus = 0xc8,
}

export enum KeyPowerStatus {
    On = 0x4f,
    Off = 0x46,
    Long = 0x4c,
    Short = 0x53,
    Released = 0x52,
}

export enum KeyCategory {
    Undefined = 0,
    Light = 1,
    Fan = 6,
    Boiler = 7,
}

export enum LockStatus {
    Unlocked = 0,
    Locked = 1,
}

export enum LedBackgroundBrightness {
    Off = 0,
    Low = 1,
    High = 2,
    Max = 3,
}

export enum ConnectionState {
    Disconnected = 'disconnected',
    Connecting = 'connecting',
    Connected = 'connected',
    Reconnecting = 'reconnecting',
}
