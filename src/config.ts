// config.ts
import 'dotenv/config'; // Load .env FIRST

function intFromEnv(name: string, fallback: number): number {
    const raw = process.env[name];
    if (raw === undefined || raw.trim() === '') {
        return fallback;
    }
    const parsed = Number(raw);
    return Number.isInteger(parsed) ? parsed : fallback;
}

// Centralized configuration object
export const Config = {
    OPCUA_SERVER_IP_ADDRESS: process.env.OPCUA_SERVER_IP_ADDRESS,
    OPCUA_PORT: process.env.OPCUA_PORT,
    OPCUA_SECURITY_MODE: process.env.OPCUA_SECURITY_MODE || 'None',
    OPCUA_SECURITY_POLICY: process.env.OPCUA_SECURITY_POLICY || 'None',
    OPCUA_USERNAME: process.env.OPCUA_USERNAME,
    OPCUA_PASSWORD: process.env.OPCUA_PASSWORD,

    APPLICATION_NAME: process.env.OPCUA_APPLICATION_NAME || 'OpcuaEnum',
    CONNECT_MAX_RETRY: intFromEnv('OPCUA_CONNECT_MAX_RETRY', 0), // node-opcua retries forever unless bounded
    CONNECT_INITIAL_DELAY_MS: 1000,
    CONNECT_MAX_DELAY_MS: 4000,
    SESSION_TIMEOUT_MS: intFromEnv('OPCUA_SESSION_TIMEOUT_MS', 60000),
};

export type AppConfig = typeof Config;

/**
 * The subset of {@link Config} the command line falls back on.
 */
export type CliDefaults = Pick<
    AppConfig,
    | 'OPCUA_SERVER_IP_ADDRESS'
    | 'OPCUA_PORT'
    | 'OPCUA_SECURITY_MODE'
    | 'OPCUA_SECURITY_POLICY'
    | 'OPCUA_USERNAME'
    | 'OPCUA_PASSWORD'
>;

export default Config;
