/**
 * High-level vBox client: one connection plus typed convenience queries and commands.
 * @module core/VBoxClient
 */
import {
    type ConnectionState,
    KeyPowerStatus,
    RequestOpcode,
} from '../protocols/vbox/constants';
import {VBoxConnection, type SendOptions, type VBoxConnectionOptions} from '../protocols/vbox/connection';
import type {KeyStatusListener} from '../protocols/vbox/dispatcher';
import type {VBoxRequest} from '../protocols/vbox/requests';
import {
    expectResponseKind,
    type AcknowledgementResponse,
    type GenericUnusedResponse,
    type InternalUnitStatusesResponse,
    type KeyParametersResponse,
    type KeyParametersV2Response,
    type KeyStatusResponse,
    type NodeCountResponse,
    type NodeMetaDataResponse,
    type NodeMetaDataV2Response,
    type RoomCountResponse,
    type RoomMetaDataResponse,
    type VBoxResponse,
} from '../protocols/vbox/responses';
import {describeConfig, resolveConfig, type VBoxConfigInput} from './config';
import {createLogger} from './logger';

export type ToggleKeyOptions = {
    /** 0-100. */
    dimmerRatio?: number;
    /** Seconds until the box reverts the key, 0-65535. */
    timer?: number;
};

/** Commands are acknowledged with an `Acknowledgement` frame. */
export class VBoxClient {
    public readonly connection: VBoxConnection;

    /**
     * @param connection An existing connection, or options to create one.
     */
    constructor(connection: VBoxConnection | VBoxConnectionOptions = {}) {
        this.connection = connection instanceof VBoxConnection ? connection : new VBoxConnection(connection);
    }

    /**
     * Build a client from overrides, `VBOX_*` environment variables and defaults.
     */
    public static create(overrides: Partial<VBoxConfigInput> = {}, env: NodeJS.ProcessEnv = process.env): VBoxClient {
        const {logLevel, ...config} = resolveConfig(overrides, env);
        const logger = createLogger(logLevel, 'vbox');
        logger.debug({config: describeConfig({...config, logLevel})}, 'Resolved configuration');
        return new VBoxClient({...config, logger});
    }

    public connect(): Promise<void> {
        return this.connection.connect();
    }

    public disconnect(): void {
        this.connection.disconnect();
    }

    public getState(): ConnectionState {
        return this.connection.getState();
    }

    public send(request: VBoxRequest, options?: SendOptions): Promise<VBoxResponse> {
        return this.connection.send(request, options);
    }

    /** Subscribe to key presses and state changes pushed by the box. */
    public onKeyStatus(listener: KeyStatusListener): () => void {
        return this.connection.onKeyStatus(listener);
    }

    public async getRoomCount(): Promise<RoomCountResponse> {
        return expectResponseKind(await this.send({opcode: RequestOpcode.RoomCount}), 'RoomCount');
    }

    public async getNodeCount(): Promise<NodeCountResponse> {
        return expectResponseKind(await this.send({opcode: RequestOpcode.NodeCount}), 'NodeCount');
    }

    public async getRoomMetaData(roomId: number): Promise<RoomMetaDataResponse> {
        return expectResponseKind(await this.send({opcode: RequestOpcode.RoomMetaData, roomId}), 'RoomMetaData');
    }

    /** V1 boxes answer with a parsed `NodeMetaData`, V2 boxes with the raw variant. */
    public async getNodeMetaData(nodeId: number): Promise<NodeMetaDataResponse | NodeMetaDataV2Response> {
        const response = await this.send({opcode: RequestOpcode.NodeMetaData, nodeId});
        return expectResponseKind(response, 'NodeMetaData', 'NodeMetaDataV2');
    }

    public async getKeyStatus(nodeId: number, keyId: number): Promise<KeyStatusResponse> {
        return expectResponseKind(await this.send({opcode: RequestOpcode.KeyStatus, nodeId, keyId}), 'KeyStatus');
    }

    public async getKeyParameters(nodeId: number, keyId: number): Promise<KeyParametersResponse | KeyParametersV2Response> {
        const response = await this.send({opcode: RequestOpcode.KeyParameters, nodeId, keyId});
        return expectResponseKind(response, 'KeyParameters', 'KeyParametersV2');
    }

    public async getNodeStatus(nodeId: number): Promise<GenericUnusedResponse> {
        return expectResponseKind(await this.send({opcode: RequestOpcode.NodeStatus, nodeId}), 'GenericUnused');
    }

    public async getInternalUnitStatuses(): Promise<InternalUnitStatusesResponse> {
        const response = await this.send({opcode: RequestOpcode.InternalUnitStatuses});
        return expectResponseKind(response, 'InternalUnitStatuses');
    }

    public async toggleKey(
        nodeId: number,
        keyId: number,
        status: KeyPowerStatus,
        options: ToggleKeyOptions = {},
    ): Promise<AcknowledgementResponse> {
        const response = await this.send({
            opcode: RequestOpcode.ToggleKeyStatus,
            nodeId,
            keyId,
            status,
            dimmerRatio: options.dimmerRatio,
            timer: options.timer,
        });
        return expectResponseKind(response, 'Acknowledgement');
    }

    public turnKeyOn(nodeId: number, keyId: number, options?: ToggleKeyOptions): Promise<AcknowledgementResponse> {
        return this.toggleKey(nodeId, keyId, KeyPowerStatus.On, options);
    }

    public turnKeyOff(nodeId: number, keyId: number, options?: ToggleKeyOptions): Promise<AcknowledgementResponse> {
        return this.toggleKey(nodeId, keyId, KeyPowerStatus.Off, options);
    }

    public releaseKey(nodeId: number, keyId: number): Promise<AcknowledgementResponse> {
        return this.toggleKey(nodeId, keyId, KeyPowerStatus.Released);
    }

    /** Explicit heartbeat, awaiting the box's acknowledgement. */
    public async sendHeartbeat(): Promise<AcknowledgementResponse> {
        return expectResponseKind(await this.send({opcode: RequestOpcode.Heartbeat}), 'Acknowledgement');
    }
}
