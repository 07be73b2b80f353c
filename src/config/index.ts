import dotenv from 'dotenv';
import * as fs from 'fs';
import path from 'path';

dotenv.config();

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

interface Config {
    biomart: {
        url: string;
        release: string;
        assembly: string;
        queryDir: string;
        timeoutMs: number;
    };
    cache: {
        dir: string;
    };
    database: {
        port: number;
    };
    loader: {
        progressUpdateInterval: number;
    };
    logging: {
        level: LogLevel;
    };
}

/**
 * Nearest directory above `start` holding a package.json. The same walk works
 * from src/ under ts-jest and from dist/src/ once built.
 */
export function findPackageRoot(start: string): string {
    let dir = start;
    while (!fs.existsSync(path.join(dir, 'package.json'))) {
        const parent = path.dirname(dir);
        if (parent === dir) {
            throw new Error(`No package.json found above ${start}`);
        }
        dir = parent;
    }
    return dir;
}

export const PACKAGE_ROOT = findPackageRoot(__dirname);

function parseLogLevel(value: string | undefined): LogLevel {
    switch (value) {
        case 'debug':
        case 'info':
        case 'warn':
        case 'error':
        case 'silent':
            return value;
        default:
            return 'info';
    }
}

export const config: Config = {
    biomart: {
        url: process.env.BIOMART_URL || 'http://grch37.ensembl.org/biomart/martservice/',
        release: process.env.ENSEMBL_RELEASE || '78',
        assembly: process.env.ENSEMBL_ASSEMBLY || 'GRCh37',
        queryDir: process.env.BIOMART_QUERY_DIR || path.join(PACKAGE_ROOT, 'queries'),
        timeoutMs: parseInt(process.env.BIOMART_TIMEOUT_MS || '600000'),
    },
    cache: {
        dir: process.env.CACHE_DIR || '',
    },
    database: {
        port: parseInt(process.env.MYSQL_PORT || '3306'),
    },
    loader: {
        progressUpdateInterval: parseInt(process.env.PROGRESS_UPDATE_INTERVAL || '1000'),
    },
    logging: {
        level: parseLogLevel(process.env.LOG_LEVEL),
    },
};
