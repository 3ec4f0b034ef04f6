import fs from 'fs';
import type { AmmConfig, LogLevel } from '../types/index.js';

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

/**
 * Builds the config from defaults, environment variables and an optional
 * JSON file, in increasing order of precedence.
 */
export function loadConfig(configPath?: string, env: NodeJS.ProcessEnv = process.env): AmmConfig {
    const fromEnv: Record<string, unknown> = {
        owner: env.AMM_OWNER ?? '',
        tokenA: env.AMM_TOKEN_A ?? '',
        tokenB: env.AMM_TOKEN_B ?? '',
        ledgerHost: env.LEDGER_HOST ?? '127.0.0.1',
        ledgerPort: parseInt(env.LEDGER_PORT ?? '3030'),
        apiPort: parseInt(env.API_PORT ?? '3000'),
        callTimeoutMs: parseInt(env.CALL_TIMEOUT_MS ?? '10000'),
        swapHistoryLimit: parseInt(env.SWAP_HISTORY_LIMIT ?? '1000'),
        logLevel: env.LOG_LEVEL ?? 'info',
    };

    const fromFile = configPath ? readConfigFile(configPath) : {};
    return validateConfig({ ...fromEnv, ...fromFile });
}

function readConfigFile(configPath: string): Record<string, unknown> {
    const raw = fs.readFileSync(configPath, 'utf-8');
    const parsed: unknown = JSON.parse(raw);
    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
        throw new Error(`Config file ${configPath} must contain a JSON object`);
    }
    return Object.fromEntries(Object.entries(parsed));
}

export function validateConfig(raw: Record<string, unknown>): AmmConfig {
    const owner = requireString(raw, 'owner');
    const tokenA = requireString(raw, 'tokenA');
    const tokenB = requireString(raw, 'tokenB');
    if (tokenA === tokenB) {
        throw new Error(`Config: tokenA and tokenB must differ (both are ${tokenA})`);
    }

    const logLevel = raw.logLevel;
    if (!isLogLevel(logLevel)) {
        throw new Error(`Config: logLevel must be one of ${LOG_LEVELS.join(', ')}`);
    }

    return {
        owner,
        tokenA,
        tokenB,
        ledgerHost: requireString(raw, 'ledgerHost'),
        ledgerPort: requirePositiveInt(raw, 'ledgerPort'),
        apiPort: requirePositiveInt(raw, 'apiPort'),
        callTimeoutMs: requirePositiveInt(raw, 'callTimeoutMs'),
        swapHistoryLimit: requirePositiveInt(raw, 'swapHistoryLimit'),
        logLevel,
    };
}

function requireString(raw: Record<string, unknown>, key: string): string {
    const value = raw[key];
    if (typeof value !== 'string' || value.length === 0) {
        throw new Error(`Config: ${key} is required`);
    }
    return value;
}

function requirePositiveInt(raw: Record<string, unknown>, key: string): number {
    const value = raw[key];
    if (typeof value !== 'number' || !Number.isInteger(value) || value <= 0) {
        throw new Error(`Config: ${key} must be a positive integer`);
    }
    return value;
}

function isLogLevel(value: unknown): value is LogLevel {
    return typeof value === 'string' && LOG_LEVELS.some((level) => level === value);
}
