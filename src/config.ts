import 'dotenv/config';

import path from 'node:path';

import { Logger, logger, normalizeAddress, parseLogLevel, type LogLevel } from '@escrow-ledger/backend';

export interface ChainCustodyConfig {
  rpcUrl: string;
  privateKey: string;
  confirmations: number;
}

export interface ServiceConfig {
  port: number;
  adminAddress: string;
  primaryTokenAddress: string;
  dataFilePath: string;
  useMemoryStore: boolean;
  custody?: ChainCustodyConfig;
  watchdogIntervalSeconds: number;
  logLevel: LogLevel;
}

type Env = Record<string, string | undefined>;

function getBooleanEnv(env: Env, key: string, defaultValue: boolean): boolean {
  const raw = env[key];
  if (!raw) return defaultValue;
  return ['1', 'true', 'yes', 'on'].includes(raw.toLowerCase());
}

function getIntegerEnv(env: Env, key: string, defaultValue: number, min = 0): number {
  const raw = env[key];
  if (!raw) return defaultValue;
  const value = Number(raw);
  if (!Number.isSafeInteger(value) || value < min) {
    throw new Error(`Invalid integer env value for ${key}: ${raw}`);
  }
  return value;
}

function required(env: Env, key: string, log: Logger): string {
  const value = env[key];
  if (!value) {
    log.warn(`Missing required environment variable: ${key}`);
    throw new Error(`Missing required environment variable: ${key}`);
  }
  return value.trim();
}

function requiredAddress(env: Env, key: string, log: Logger): string {
  const raw = required(env, key, log);
  const address = normalizeAddress(raw);
  if (!address) {
    throw new Error(`${key} must be a non-zero EVM address`);
  }
  return address;
}

export function loadConfig(log: Logger = logger, env: Env = process.env): ServiceConfig {
  const rpcUrl = env.ESCROW_RPC_URL?.trim();
  const privateKey = env.ESCROW_CUSTODY_PRIVATE_KEY?.trim();
  if (Boolean(rpcUrl) !== Boolean(privateKey)) {
    throw new Error('ESCROW_RPC_URL and ESCROW_CUSTODY_PRIVATE_KEY must be set together');
  }

  return {
    port: getIntegerEnv(env, 'PORT', 3000, 1),
    adminAddress: requiredAddress(env, 'ESCROW_ADMIN_ADDRESS', log),
    primaryTokenAddress: requiredAddress(env, 'PRIMARY_TOKEN_ADDRESS', log),
    dataFilePath: path.resolve(env.ESCROW_DATA_FILE ?? path.join('data', 'escrows.json')),
    useMemoryStore: getBooleanEnv(env, 'ESCROW_USE_MEMORY_STORE', false),
    custody:
      rpcUrl && privateKey
        ? {
            rpcUrl,
            privateKey,
            confirmations: getIntegerEnv(env, 'ESCROW_CONFIRMATIONS', 1, 1),
          }
        : undefined,
    watchdogIntervalSeconds: getIntegerEnv(env, 'WATCHDOG_INTERVAL_SECONDS', 0),
    logLevel: parseLogLevel(env.LOG_LEVEL),
  };
}
