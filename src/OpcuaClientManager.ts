import {
    OPCUAClient,
    OPCUAClientOptions,
    UserIdentityInfo,
    UserTokenType,
} from 'node-opcua';

import Config from './config';
import { errorMessage } from './opcua/opcua-helpers';
import { type BrowsingSession, SessionAddressSpace } from './opcua/SessionAddressSpace';
import type { ConnectionSettings, EnumerationSession, Reporter } from './types';

// --- State Machine Definition ---
enum OpcuaState {
    Disconnected,
    Connecting,
    Connected,
    Disconnecting,
}

export interface ManagedSession extends BrowsingSession {
    close(): Promise<void>;
}

/**
 * The part of a node-opcua `OPCUAClient` the manager drives.
 */
export interface ManagedClient {
    connect(endpointUrl: string): Promise<void>;
    createSession(userIdentityInfo: UserIdentityInfo): Promise<ManagedSession>;
    disconnect(): Promise<void>;
    on(event: 'backoff', listener: (retry: number, delay: number) => void): unknown;
    on(event: 'connection_lost', listener: () => void): unknown;
}

export type ClientFactory = (options: OPCUAClientOptions) => ManagedClient;

const createOpcuaClient: ClientFactory = (options) => OPCUAClient.create(options);

export function buildClientOptions(settings: ConnectionSettings): OPCUAClientOptions {
    return {
        applicationName: Config.APPLICATION_NAME,
        securityMode: settings.securityMode,
        securityPolicy: settings.securityPolicy,
        endpointMustExist: false, // dial the URL as given even if GetEndpoints reports another host
        requestedSessionTimeout: Config.SESSION_TIMEOUT_MS,
        connectionStrategy: {
            initialDelay: Config.CONNECT_INITIAL_DELAY_MS,
            maxDelay: Config.CONNECT_MAX_DELAY_MS,
            maxRetry: Config.CONNECT_MAX_RETRY,
        },
    };
}

export function buildUserIdentity(settings: ConnectionSettings): UserIdentityInfo {
    if (settings.username && settings.password) {
        return {
            type: UserTokenType.UserName,
            userName: settings.username,
            password: settings.password,
        };
    }
    return { type: UserTokenType.Anonymous };
}

/**
 * Owns the single OPC UA client and session used for one enumeration run.
 */
export default class OpcuaClientManager {
    private state: OpcuaState = OpcuaState.Disconnected;
    private client: ManagedClient | null = null;
    private session: ManagedSession | null = null;

    constructor(
        private readonly settings: ConnectionSettings,
        private readonly reporter: Reporter = console,
        private readonly createClient: ClientFactory = createOpcuaClient,
    ) {}

    public async connect(): Promise<ManagedSession> {
        this.setState(OpcuaState.Connecting);
        const client = this.createClient(buildClientOptions(this.settings));
        this.client = client;
        client.on('backoff', (retry: number, delay: number) => {
            this.reporter.warn(`[OPCUA] connection failed, retrying #${retry} in ${delay}ms`);
        });
        client.on('connection_lost', () => this.reporter.warn('[OPCUA] connection lost'));

        try {
            await client.connect(this.settings.endpointUrl);
            this.reporter.log('[OPCUA] ✅ client connected');
            const session = await client.createSession(buildUserIdentity(this.settings));
            this.session = session;
            this.reporter.log('[OPCUA] ✅ session created');
            this.setState(OpcuaState.Connected);
            return session;
        } catch (err) {
            this.reporter.error(`[OPCUA] ❌ failed to connect/create session: ${errorMessage(err)}`);
            try {
                await this.disconnect();
            } catch (cleanupErr) {
                this.reporter.warn(`[OPCUA] ❌ cleanup after failed connect: ${errorMessage(cleanupErr)}`);
            }
            throw err;
        }
    }

    public async disconnect(): Promise<void> {
        if (this.state === OpcuaState.Disconnected && !this.client) {
            return;
        }
        this.setState(OpcuaState.Disconnecting);
        try {
            if (this.session) {
                const session = this.session;
                this.session = null;
                await session.close();
                this.reporter.log('[OPCUA] ✅ session closed');
            }
        } finally {
            try {
                if (this.client) {
                    const client = this.client;
                    this.client = null;
                    await client.disconnect();
                    this.reporter.log('[OPCUA] ✅ client disconnected');
                }
            } finally {
                this.setState(OpcuaState.Disconnected);
            }
        }
    }

    private setState(next: OpcuaState): void {
        if (next !== this.state) {
            this.reporter.log(`[OPCUA] STATE: ${OpcuaState[this.state]} → ${OpcuaState[next]}`);
            this.state = next;
        }
    }
}

/**
 * Connects with {@link OpcuaClientManager} and exposes the session as an
 * address space for the enumerator.
 */
export async function openOpcuaSession(settings: ConnectionSettings, reporter: Reporter): Promise<EnumerationSession> {
    const manager = new OpcuaClientManager(settings, reporter);
    const session = await manager.connect();
    return {
        addressSpace: new SessionAddressSpace(session),
        close: () => manager.disconnect(),
    };
}
