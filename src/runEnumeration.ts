import { openOpcuaSession } from './OpcuaClientManager';
import { OpcuaEnumerator } from './OpcuaEnumerator';
import { errorMessage } from './opcua/opcua-helpers';
import type { EnumerationSession, EnumOptions, EnumRequest, Reporter, SessionOpener } from './types';

async function dispatch(enumerator: OpcuaEnumerator, request: EnumRequest): Promise<number> {
    switch (request.mode) {
        case 'all':
            await enumerator.browseAll();
            return 0;
        case 'enum-objects':
            await enumerator.enumerateObjects(request.depth);
            return 0;
        case 'show-object':
            return (await enumerator.showObject(request.nodeId)) ? 0 : 1;
    }
}

/**
 * Remembers the session of the run in progress so a signal handler can
 * close it before the process exits.
 */
export class SessionTracker {
    private active: EnumerationSession | null = null;

    constructor(private readonly openSession: SessionOpener = openOpcuaSession) {}

    readonly open: SessionOpener = async (settings, reporter) => {
        const session = await this.openSession(settings, reporter);
        const tracked: EnumerationSession = {
            addressSpace: session.addressSpace,
            close: async () => {
                if (this.active === tracked) {
                    this.active = null;
                }
                await session.close();
            },
        };
        this.active = tracked;
        return tracked;
    };

    /** Closes the open session, if any. Resolves to whether one was open. */
    async closeActive(): Promise<boolean> {
        const session = this.active;
        if (!session) {
            return false;
        }
        await session.close();
        return true;
    }
}

/**
 * Connects, runs the requested enumeration and disconnects.
 * Resolves to the process exit code.
 */
export async function runEnumeration(
    options: EnumOptions,
    reporter: Reporter = console,
    openSession: SessionOpener = openOpcuaSession,
): Promise<number> {
    reporter.log(`Connecting to OPC UA server at ${options.connection.endpointUrl}...`);

    let session: EnumerationSession | null = null;
    try {
        session = await openSession(options.connection, reporter);
        reporter.log('Connected successfully.');
        return await dispatch(new OpcuaEnumerator(session.addressSpace, reporter), options.request);
    } catch (err) {
        reporter.error(`Failed during browsing: ${errorMessage(err)}`);
        return 1;
    } finally {
        if (session) {
            try {
                await session.close();
            } catch (err) {
                reporter.warn(`Error during disconnect: ${errorMessage(err)}`);
            }
        }
    }
}
