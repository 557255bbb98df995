import { logger } from "../logging/logger.js";
import { ConfigGuard } from "./config-guard.js";
import { DB_CONFIG_GUARDS } from "./config/db-config.js";
import { REGISTRY_CONFIG_GUARDS, RegistryConfig } from "./config/registry-config.js";
import { createPool, probeSchema } from "../db/index.js";
import { IdentityRegistry } from "../registry/registry.js";
import { MemoryRecordStore } from "../registry/memoryStore.js";
import { PgRecordStore } from "../registry/pgStore.js";
import type { RecordStore } from "../registry/store.js";

export interface RegistryRuntime {
    registry: IdentityRegistry;
    store: RecordStore;
}

/**
 * Builds the configured record store and registry.
 * Call after ConfigGuard has passed and configuration has been loaded.
 */
export async function bootstrap(serviceName: string, config: RegistryConfig): Promise<RegistryRuntime> {
    logger.info({ serviceName, store: config.store, orphanPolicy: config.orphanPolicy }, "Bootstrapping service");

    let store: RecordStore;
    if (config.store === 'postgres') {
        const pool = createPool(config.database, config.nodeEnv);
        await probeSchema(pool);
        store = new PgRecordStore(pool);
    } else {
        store = new MemoryRecordStore();
    }

    const registry = new IdentityRegistry({ store, orphanPolicy: config.orphanPolicy });

    logger.info({ serviceName }, "Startup checks passed");
    return { registry, store };
}

/**
 * Fail-closed guards for the environment the service is about to run in.
 */
export function enforceStartupGuards(env = process.env): void {
    ConfigGuard.enforce(REGISTRY_CONFIG_GUARDS, env);
    if (env.REGISTRY_STORE === 'postgres') {
        ConfigGuard.enforce(DB_CONFIG_GUARDS, env);
    }
}
