import { createLedger } from "../../../libs/bootstrap/startup.js";
import { ConfigurationError } from "../../../libs/bootstrap/config-guard.js";
import { loadDatabaseConfig } from "../../../libs/bootstrap/config/db-config.js";
import { loadLedgerConfig } from "../../../libs/bootstrap/config/ledger-config.js";
import { createPool } from "../../../libs/db/pool.js";
import { LoggedTransferGateway } from "../../../libs/funding/loggedTransferGateway.js";
import { logger } from "../../../libs/logging/logger.js";

async function main() {
    logger.info({ serviceName: "ledger-service" }, "Bootstrapping service");

    const config = loadLedgerConfig();
    const dbConfig = loadDatabaseConfig();
    const pool = dbConfig ? createPool(dbConfig) : null;

    if (pool) {
        // Fail at startup rather than on the first event.
        await pool.query("SELECT 1");
    }

    const ledger = createLedger(config, {
        transfers: new LoggedTransferGateway(),
        outboxClient: pool ?? undefined
    });

    logger.info({
        authority: config.authorityId,
        poolBalance: ledger.lifecycle.getPoolBalance().toString()
    }, "Ledger service ready");

    const stop = async (signal: string) => {
        logger.info({ signal }, "Shutting down ledger service");
        ledger.shutdown();
        if (pool) {
            await pool.end();
        }
        process.exit(0);
    };

    const onSignal = (signal: string) => {
        stop(signal).catch(err => {
            logger.fatal(err);
            process.exit(1);
        });
    };
    process.once("SIGTERM", onSignal);
    process.once("SIGINT", onSignal);
}

main().catch(err => {
    if (err instanceof ConfigurationError) {
        logger.fatal({ violations: err.violations }, "Ledger service refused to start");
    } else {
        logger.fatal(err);
    }
    process.exit(1);
});
