import { MessageSecurityMode, NodeClass, SecurityPolicy } from 'node-opcua';

export type EnumMode = 'all' | 'enum-objects' | 'show-object';

export const ENUM_MODES: readonly EnumMode[] = ['all', 'enum-objects', 'show-object'];

export type EnumRequest =
    | { mode: 'all' }
    | { mode: 'enum-objects'; depth: number }
    | { mode: 'show-object'; nodeId: string };

export interface ConnectionSettings {
    endpointUrl: string;
    securityMode: MessageSecurityMode;
    securityPolicy: SecurityPolicy;
    username?: string;
    password?: string;
}

export interface EnumOptions {
    connection: ConnectionSettings;
    request: EnumRequest;
}

export interface NodeSummary {
    nodeId: string;
    browseName: string;
    nodeClass: NodeClass;
}

export type AccessLabel = 'Writable' | 'Read-only' | 'Unknown';

/**
 * What the enumerator needs from a server. Implemented on top of a
 * node-opcua session by `SessionAddressSpace`.
 */
export interface AddressSpace {
    readonly objectsFolderId: string;
    /** Throws when `nodeId` is not a valid, existing node. */
    readSummary(nodeId: string): Promise<NodeSummary>;
    browseMethods(nodeId: string): Promise<NodeSummary[]>;
    /** Hierarchical children, excluding methods. */
    browseChildren(nodeId: string): Promise<NodeSummary[]>;
    /** `null` when the server does not return an access level. */
    readAccessLevel(nodeId: string): Promise<number | null>;
    readDataTypeName(nodeId: string): Promise<string>;
    readValue(nodeId: string): Promise<unknown>;
}

export interface Reporter {
    log(message: string): void;
    warn(message: string): void;
    error(message: string): void;
}

export interface EnumerationSession {
    addressSpace: AddressSpace;
    close(): Promise<void>;
}

export type SessionOpener = (settings: ConnectionSettings, reporter: Reporter) => Promise<EnumerationSession>;
