#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import { BioMartClient } from '../biomart/biomart-client.js';
import { DATASETS } from '../biomart/datasets.js';
import { DatasetCache } from '../cache/dataset-cache.js';
import { config } from '../config/index.js';
import { MySqlReferenceStore } from '../db/mysql-store.js';
import { errorMessage } from '../errors.js';
import { ReferenceLoader } from '../loader/reference-loader.js';
import { createLogger } from '../utils/logger.js';
import { LoadProgressDisplay } from '../utils/progress.js';

const logger = createLogger('cli');

interface CacheOptions {
    cacheDir: string;
}

interface LoadOptions extends CacheOptions {
    port: string;
    progress: boolean;
}

function fail(error: unknown): never {
    console.error(chalk.red('❌ Error:'), errorMessage(error));
    process.exit(1);
}

export function createProgram(): Command {
    const program = new Command();

    program
        .name('ensembl-loader')
        .description('Loads Ensembl reference data (genes, transcripts, exons, proteins) into the database')
        .version('1.0.0');

    program
        .command('load')
        .description('Download (or reload from cache) Ensembl reference data and load it into MySQL')
        .argument('<db_host>', 'Database server host')
        .argument('<db_user>', 'Database user')
        .argument('<db_password>', 'Password for user')
        .argument('<db_name>', 'Name of target database')
        .option('-o, --cache-dir <dir>', 'Directory for caching/reloading data', config.cache.dir)
        .option('-p, --port <number>', 'Database server port', config.database.port.toString())
        .option('--no-progress', 'Disable progress bars')
        .action(async (host: string, user: string, password: string, database: string, options: LoadOptions) => {
            logger.info('Initializing script...');
            const store = await MySqlReferenceStore.connect({
                host,
                user,
                password,
                database,
                port: parseInt(options.port),
            }).catch(fail);

            try {
                await store.createTables();

                const cache = new DatasetCache(new BioMartClient(), options.cacheDir);
                cache.ensureCacheDir();

                const loader = new ReferenceLoader(store, cache);
                if (options.progress) {
                    new LoadProgressDisplay().attach(loader);
                }

                const stats = await loader.run();

                console.log(chalk.green('✅ Load complete!'));
                console.log(chalk.gray(`   Genes: ${stats.genes.toLocaleString()}`));
                console.log(chalk.gray(`   Transcripts: ${stats.transcripts.toLocaleString()} (${stats.emptyTranscripts.toLocaleString()} without coding exons skipped)`));
                console.log(chalk.gray(`   Exons: ${stats.exons.toLocaleString()} (${stats.droppedExons.toLocaleString()} non-coding dropped)`));
                console.log(chalk.gray(`   Proteins: ${stats.proteins.toLocaleString()} (${stats.skippedProteins.toLocaleString()} rows without peptide skipped)`));
                console.log(chalk.gray(`   Time: ${Math.round(stats.elapsedTime / 1000)}s`));
            } catch (error) {
                await store.close();
                fail(error);
            }

            await store.close();
        });

    program
        .command('fetch')
        .description('Download all datasets into the cache directory without touching the database')
        .option('-o, --cache-dir <dir>', 'Directory for caching/reloading data', config.cache.dir)
        .action(async (options: CacheOptions) => {
            try {
                if (!options.cacheDir) {
                    throw new Error('A cache directory is required (--cache-dir or CACHE_DIR)');
                }

                const cache = new DatasetCache(new BioMartClient(), options.cacheDir);
                cache.ensureCacheDir();

                for (const dataset of Object.values(DATASETS)) {
                    const { text, origin } = await cache.getDataset(dataset);
                    const lines = text.split('\n').filter(line => line !== '').length;
                    console.log(chalk.green(`✅ ${dataset.label}: ${lines.toLocaleString()} rows (${origin})`));
                }
            } catch (error) {
                fail(error);
            }
        });

    program
        .command('cache-status')
        .description('Show which datasets are present in the cache directory')
        .option('-o, --cache-dir <dir>', 'Directory for caching/reloading data', config.cache.dir)
        .action((options: CacheOptions) => {
            const cache = new DatasetCache(new BioMartClient(), options.cacheDir);
            if (!cache.isEnabled()) {
                console.log(chalk.yellow('Caching is disabled (no cache directory configured).'));
                return;
            }

            console.log(chalk.blue(`📁 Cache directory: ${options.cacheDir}`));
            console.log(chalk.gray(`   Release ${config.biomart.release} (${config.biomart.assembly})`));
            for (const status of cache.status(Object.values(DATASETS))) {
                const marker = status.exists ? chalk.green('✓') : chalk.gray('✗');
                const size = status.size ? ` ${chalk.gray(status.size)}` : '';
                console.log(`  ${marker} ${status.path}${size}`);
            }
        });

    return program;
}

if (require.main === module) {
    createProgram().parseAsync(process.argv).catch(fail);
}
