import * as fs from 'fs';
import * as path from 'path';
import { BioMartFetcher } from '../biomart/biomart-client.js';
import { DatasetDefinition } from '../biomart/datasets.js';
import { loadQuery } from '../biomart/query-loader.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('dataset-cache');

export type DatasetOrigin = 'cache' | 'remote';

export interface DatasetText {
    text: string;
    origin: DatasetOrigin;
}

export interface DatasetSource {
    getDataset(dataset: DatasetDefinition): Promise<DatasetText>;
}

export interface CacheFileStatus {
    dataset: string;
    path: string;
    exists: boolean;
    size?: string;
}

/**
 * Whole-dataset cache in front of BioMart. A cache file is either there or
 * not; nothing expires.
 */
export class DatasetCache implements DatasetSource {
    private cacheDir: string | null;

    constructor(
        private readonly fetcher: BioMartFetcher,
        cacheDir?: string,
        private readonly queryDir?: string
    ) {
        this.cacheDir = cacheDir ? cacheDir : null;
    }

    isEnabled(): boolean {
        return this.cacheDir !== null;
    }

    /**
     * Create the cache directory if needed. Called once at startup.
     */
    ensureCacheDir(): void {
        if (this.cacheDir === null) return;

        if (!fs.existsSync(this.cacheDir)) {
            logger.info('Creating output directory...');
            fs.mkdirSync(this.cacheDir, { recursive: true });
        } else {
            logger.info('Output directory already exists. Will attempt to load data from cache.');
        }
    }

    cachePath(dataset: DatasetDefinition): string | null {
        return this.cacheDir === null ? null : path.join(this.cacheDir, dataset.cacheFile);
    }

    async getDataset(dataset: DatasetDefinition): Promise<DatasetText> {
        const cachePath = this.cachePath(dataset);

        if (cachePath !== null && fs.existsSync(cachePath)) {
            logger.info(`Loading ${dataset.label} data from cache...`);
            const text = await fs.promises.readFile(cachePath, 'utf8');
            return { text, origin: 'cache' };
        }

        logger.info(`Downloading ${dataset.label} data from Ensembl...`);
        const payload = await loadQuery(dataset.queryFile, this.queryDir);
        const text = await this.fetcher.query(payload);

        if (cachePath !== null) {
            logger.info(`Caching ${dataset.label} data in output directory...`);
            await fs.promises.writeFile(cachePath, text, 'utf8');
        }

        return { text, origin: 'remote' };
    }

    status(datasets: DatasetDefinition[]): CacheFileStatus[] {
        return datasets.map(dataset => {
            const cachePath = this.cachePath(dataset) ?? dataset.cacheFile;
            const exists = this.cacheDir !== null && fs.existsSync(cachePath);

            let size: string | undefined;
            if (exists) {
                const stats = fs.statSync(cachePath);
                size = `${(stats.size / 1024 / 1024).toFixed(1)} MB`;
            }

            return { dataset: dataset.name, path: cachePath, exists, size };
        });
    }
}
