import yargs from 'yargs';
import { coerceMessageSecurityMode, coerceSecurityPolicy, MessageSecurityMode, SecurityPolicy } from 'node-opcua';

import Config, { type CliDefaults } from './config';
import { UsageError } from './errors';
import { ENUM_MODES, type EnumMode, type EnumOptions, type EnumRequest } from './types';

function isEnumMode(value: string): value is EnumMode {
    return ENUM_MODES.some((mode) => mode === value);
}

export function buildEndpointUrl(ip: string, port: number): string {
    const host = ip.includes(':') && !ip.startsWith('[') ? `[${ip}]` : ip;
    return `opc.tcp://${host}:${port}`;
}

function parsePort(raw: string | undefined): number {
    if (raw === undefined || raw === '') {
        throw new UsageError('Missing server port');
    }
    const port = Number(raw);
    if (!Number.isInteger(port) || port < 1 || port > 65535) {
        throw new UsageError(`Invalid port: ${raw}`);
    }
    return port;
}

function buildRequest(mode: EnumMode, depth: number, nodeId: string | undefined): EnumRequest {
    switch (mode) {
        case 'all':
            return { mode };
        case 'enum-objects':
            if (!Number.isInteger(depth) || depth < 0) {
                throw new UsageError(`Invalid depth: ${depth}`);
            }
            return { mode, depth };
        case 'show-object':
            if (!nodeId) {
                throw new UsageError('--nodeid is required for show-object mode');
            }
            return { mode, nodeId };
    }
}

/**
 * Parses `<ip> <port> [--mode ...] [--depth N] [--nodeid ID]` plus the
 * connection options. The positionals fall back to the environment.
 */
export function parseCliArgs(argv: string[], defaults: CliDefaults = Config, exitOnHelp = true): EnumOptions {
    const parsed = yargs(argv)
        .scriptName('opcua-enum')
        .usage('$0 <ip> <port> [options]\n\nEnumerate the address space of an OPC UA server.')
        .parserConfiguration({ 'parse-positional-numbers': false })
        .option('mode', {
            type: 'string',
            choices: ENUM_MODES,
            default: 'all',
            describe: 'Enumeration mode',
        })
        .option('depth', {
            type: 'number',
            default: 0,
            describe: 'Depth limit for enum-objects mode',
        })
        .option('nodeid', {
            type: 'string',
            describe: 'NodeId or Object name for show-object mode',
        })
        .option('security-mode', {
            type: 'string',
            default: defaults.OPCUA_SECURITY_MODE,
            describe: 'Message security mode (None | Sign | SignAndEncrypt)',
        })
        .option('security-policy', {
            type: 'string',
            default: defaults.OPCUA_SECURITY_POLICY,
            describe: 'Security policy, e.g. None or Basic256Sha256',
        })
        .option('username', {
            type: 'string',
            default: defaults.OPCUA_USERNAME,
            describe: 'User name for a UserNameIdentityToken',
        })
        .option('password', {
            type: 'string',
            default: defaults.OPCUA_PASSWORD,
            describe: 'Password for a UserNameIdentityToken',
        })
        .example('$0 192.168.0.10 4840', 'Browse everything below Objects')
        .example('$0 192.168.0.10 4840 --mode enum-objects --depth 2', 'List objects two levels deep')
        .example('$0 192.168.0.10 4840 --mode show-object --nodeid "ns=2;s=Pump1"', 'Browse one object')
        .version(false)
        .strict()
        .exitProcess(exitOnHelp)
        .fail((message: string, err: Error | undefined) => {
            throw err ?? new UsageError(message);
        })
        .parseSync();

    const [rawIp, rawPort, ...extra] = parsed._.map(String);
    if (extra.length > 0) {
        throw new UsageError(`Unexpected argument: ${extra[0]}`);
    }
    const ip = rawIp ?? defaults.OPCUA_SERVER_IP_ADDRESS;
    if (!ip) {
        throw new UsageError('Missing server IP address');
    }
    const port = parsePort(rawPort ?? defaults.OPCUA_PORT);

    const mode = parsed.mode;
    if (!isEnumMode(mode)) {
        throw new UsageError(`Invalid mode: ${mode}`);
    }

    const securityMode = coerceMessageSecurityMode(parsed['security-mode']);
    if (securityMode === MessageSecurityMode.Invalid) {
        throw new UsageError(`Invalid security mode: ${parsed['security-mode']}`);
    }
    const securityPolicy = coerceSecurityPolicy(parsed['security-policy']);
    if (securityPolicy === SecurityPolicy.Invalid) {
        throw new UsageError(`Invalid security policy: ${parsed['security-policy']}`);
    }

    const { username, password } = parsed;
    if (Boolean(username) !== Boolean(password)) {
        throw new UsageError('--username and --password must be given together');
    }

    return {
        connection: {
            endpointUrl: buildEndpointUrl(ip, port),
            securityMode,
            securityPolicy,
            username: username || undefined,
            password: password || undefined,
        },
        request: buildRequest(mode, parsed.depth, parsed.nodeid),
    };
}
