import { ArgumentError } from './escrow/errors';

// Levels understood by the fabric-shim logger.
const LOG_LEVELS = ['critical', 'error', 'warning', 'notice', 'info', 'debug'] as const;

export type LogLevel = typeof LOG_LEVELS[number];

export interface ChaincodeConfig {
    logLevel: LogLevel;
    /** Only clients of this MSP may initialize the ledger; unset, nobody may. */
    adminMspId?: string;
}

function isLogLevel(value: string): value is LogLevel {
    return LOG_LEVELS.some(level => level === value);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ChaincodeConfig {
    const logLevel = (env.ESCROW_LOG_LEVEL ?? 'info').trim().toLowerCase();
    if (!isLogLevel(logLevel)) {
        throw new ArgumentError(`ESCROW_LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}, got "${env.ESCROW_LOG_LEVEL}"`);
    }

    const adminMspId = env.ESCROW_ADMIN_MSP?.trim();
    return {
        logLevel,
        adminMspId: adminMspId ? adminMspId : undefined
    };
}
