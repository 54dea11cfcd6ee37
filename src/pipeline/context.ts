import { join } from 'node:path';
import { BronzeStorage } from '../cache/bronze-storage.js';
import { DownloadManager } from '../cache/download-manager.js';
import { defaultLoaders, type LoaderRegistry } from '../loaders/registry.js';
import { CacheInventory } from '../storage/cache-inventory.js';
import type { BiostrataConfig } from '../types/index.js';
import { HttpClient } from '../utils/http-client.js';
import { getLogger, type Logger } from '../utils/logger.js';

/**
 * Everything a dataset run needs: configuration, the cache layers and
 * the loaders. One context may serve several runs; `close()` releases
 * the inventory database.
 */
export interface IngestContext {
    config: BiostrataConfig;
    logger: Logger;
    http: HttpClient;
    inventory: CacheInventory;
    downloads: DownloadManager;
    bronze: BronzeStorage;
    loaders: LoaderRegistry;
    close(): void;
}

export interface IngestContextOverrides {
    logger?: Logger;
    http?: HttpClient;
    loaders?: LoaderRegistry;
}

export function createIngestContext(config: BiostrataConfig, overrides: IngestContextOverrides = {}): IngestContext {
    const logger = overrides.logger ?? getLogger();
    const http = overrides.http ?? new HttpClient({ ...config.http, rateLimits: config.rateLimits, logger });
    const inventory = new CacheInventory(join(config.cacheDir, 'inventory.db'), logger);

    return {
        config,
        logger,
        http,
        inventory,
        downloads: new DownloadManager({
            cacheDir: config.cacheDir,
            inventory,
            http,
            logger,
            revalidateAfterHours: config.revalidateAfterHours,
        }),
        bronze: new BronzeStorage({ cacheDir: config.cacheDir, inventory, logger }),
        loaders: overrides.loaders ?? defaultLoaders(),
        close: () => inventory.close(),
    };
}
