#!/usr/bin/env node

import { AutomatedMarketMaker } from './amm/AutomatedMarketMaker.js';
import { ApiServer } from './api/ApiServer.js';
import { loadConfig } from './config/index.js';
import { HttpFungibleTokenClientBuilder } from './token/FungibleTokenClient.js';
import { createLogger } from './utils/logger.js';

async function main(): Promise<void> {
    const args = process.argv.slice(2);
    const command = args[0];

    if (!command || command === 'help' || command === '--help') {
        console.log(`
Two-token AMM pool

Usage:
  amm start [--config config.json]   Start the pool and its HTTP API

Environment:
  AMM_OWNER, AMM_TOKEN_A, AMM_TOKEN_B, LEDGER_HOST, LEDGER_PORT,
  API_PORT, CALL_TIMEOUT_MS, SWAP_HISTORY_LIMIT, LOG_LEVEL
        `.trim());
        process.exit(0);
    }

    if (command === 'start') {
        const configIdx = args.indexOf('--config');
        const configPath = configIdx !== -1 ? args[configIdx + 1] : undefined;
        const config = loadConfig(configPath);
        const logger = createLogger(config.logLevel, 'cli');

        const client = new HttpFungibleTokenClientBuilder()
            .withHost(config.ledgerHost)
            .withPort(config.ledgerPort)
            .withLogger(createLogger(config.logLevel, 'token-client'))
            .build();

        const amm = AutomatedMarketMaker.create({
            owner: config.owner,
            tokenA: config.tokenA,
            tokenB: config.tokenB,
            client,
            callTimeoutMs: config.callTimeoutMs,
            swapHistoryLimit: config.swapHistoryLimit,
            logLevel: config.logLevel,
        });

        const api = new ApiServer(amm, createLogger(config.logLevel, 'api'));
        await api.start(config.apiPort);
        logger.info(`AMM started`, { owner: config.owner, tokens: amm.tokens, port: api.port });

        const shutdown = async () => {
            logger.info('Shutting down');
            await api.stop();
            process.exit(0);
        };
        process.on('SIGINT', () => void shutdown());
        process.on('SIGTERM', () => void shutdown());

        await amm.ready();
        return;
    }

    console.error(`Unknown command: ${command}`);
    process.exit(1);
}

main().catch((err) => {
    console.error('Fatal error:', err);
    process.exit(1);
});
