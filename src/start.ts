import 'dotenv/config';

import { bootstrap } from './bootstrap';
import logger from './utils/logger';

/**
 * Quote every configured pool once and exit.
 */
async function main(): Promise<void> {
    const hook = bootstrap();
    const pools = hook.registry.listPools();

    if (pools.length === 0) {
        logger.warn('[STARTUP] No pools configured, nothing to quote');
        return;
    }

    for (const poolId of pools) {
        const quote = await hook.orchestrator.quote(poolId);
        if (quote.source === 'BASE_FEE') {
            logger.info(`[STARTUP] ${poolId}: fee=${quote.fee} (base)`);
        } else {
            logger.info(
                `[STARTUP] ${poolId}: fee=${quote.fee} path=${quote.source} trend=${quote.trend} ` +
                `alpha=${quote.alpha} beta=${quote.beta}`
            );
        }
    }
}

main().catch((error: unknown) => {
    const message = error instanceof Error ? error.message : String(error);
    logger.error(`[STARTUP] 🚨 FATAL: ${message}`);
    process.exitCode = 1;
});
