import { eq, sql } from 'drizzle-orm';
import { drizzle, MySql2Database } from 'drizzle-orm/mysql2';
import { MySqlTable } from 'drizzle-orm/mysql-core';
import { createConnection, Connection } from 'mysql2/promise';
import { promises as fs } from 'fs';
import path from 'path';
import { config, PACKAGE_ROOT } from '../config/index.js';
import { createLogger } from '../utils/logger.js';
import {
    NewExon,
    NewGene,
    NewProtein,
    NewTranscript,
    ReferenceStore,
    RowCounts,
    StoredId,
    TranscriptRef,
} from './reference-store.js';
import { exons, genes, proteins, transcripts } from './schema.js';

const logger = createLogger('mysql-store');

export interface MySqlConnectionOptions {
    host: string;
    user: string;
    password: string;
    database: string;
    port?: number;
}

export const SCHEMA_FILE = path.join(PACKAGE_ROOT, 'sql', 'schema.sql');

/**
 * Split a DDL script into statements. Comment lines are dropped.
 */
export function splitStatements(script: string): string[] {
    return script
        .split('\n')
        .filter(line => !line.trim().startsWith('--'))
        .join('\n')
        .split(';')
        .map(statement => statement.trim())
        .filter(statement => statement.length > 0);
}

/**
 * ReferenceStore on a single MySQL connection. Everything runs inside one
 * open transaction; commit() ends it and starts the next.
 */
export class MySqlReferenceStore implements ReferenceStore {
    private db: MySql2Database;

    private constructor(
        private readonly connection: Connection,
        private readonly schemaFile: string
    ) {
        this.db = drizzle(connection);
    }

    static async connect(options: MySqlConnectionOptions, schemaFile: string = SCHEMA_FILE): Promise<MySqlReferenceStore> {
        logger.info(`Connecting to database ${options.database} on ${options.host}...`);
        const connection = await createConnection({
            host: options.host,
            user: options.user,
            password: options.password,
            database: options.database,
            port: options.port ?? config.database.port,
        });
        await connection.beginTransaction();
        return new MySqlReferenceStore(connection, schemaFile);
    }

    async createTables(): Promise<void> {
        const script = await fs.readFile(this.schemaFile, 'utf8');
        for (const statement of splitStatements(script)) {
            await this.db.execute(sql.raw(statement));
        }
    }

    async getOrCreateGene(gene: NewGene): Promise<StoredId> {
        const existing = await this.findGeneId(gene.geneEnsemblId);
        if (existing !== null) {
            return { id: existing, created: false };
        }

        const [header] = await this.db.insert(genes).values(gene);
        return { id: header.insertId, created: true };
    }

    async findGeneId(geneEnsemblId: string): Promise<number | null> {
        const rows = await this.db
            .select({ id: genes.id })
            .from(genes)
            .where(eq(genes.geneEnsemblId, geneEnsemblId))
            .limit(1);
        return rows.length > 0 ? rows[0].id : null;
    }

    async getOrCreateTranscript(transcript: NewTranscript): Promise<StoredId> {
        const existing = await this.findTranscript(transcript.transcriptEnsemblId);
        if (existing !== null) {
            return { id: existing.id, created: false };
        }

        const [header] = await this.db.insert(transcripts).values(transcript);
        return { id: header.insertId, created: true };
    }

    async findTranscript(transcriptEnsemblId: string): Promise<TranscriptRef | null> {
        const rows = await this.db
            .select({ id: transcripts.id, geneId: transcripts.geneId })
            .from(transcripts)
            .where(eq(transcripts.transcriptEnsemblId, transcriptEnsemblId))
            .limit(1);
        return rows.length > 0 ? rows[0] : null;
    }

    async getOrCreateExon(exon: NewExon): Promise<StoredId> {
        const rows = await this.db
            .select({ id: exons.id })
            .from(exons)
            .where(eq(exons.exonEnsemblId, exon.exonEnsemblId))
            .limit(1);
        if (rows.length > 0) {
            return { id: rows[0].id, created: false };
        }

        const [header] = await this.db.insert(exons).values(exon);
        return { id: header.insertId, created: true };
    }

    async getOrCreateProtein(protein: NewProtein): Promise<StoredId> {
        const rows = await this.db
            .select({ id: proteins.id })
            .from(proteins)
            .where(eq(proteins.proteinEnsemblId, protein.proteinEnsemblId))
            .limit(1);
        if (rows.length > 0) {
            return { id: rows[0].id, created: false };
        }

        const [header] = await this.db.insert(proteins).values(protein);
        return { id: header.insertId, created: true };
    }

    async commit(): Promise<void> {
        await this.connection.commit();
        await this.connection.beginTransaction();
    }

    async countRows(): Promise<RowCounts> {
        const countOf = async (table: MySqlTable): Promise<number> => {
            const rows = await this.db.select({ value: sql<number>`count(*)` }).from(table);
            return Number(rows[0].value);
        };

        return {
            genes: await countOf(genes),
            transcripts: await countOf(transcripts),
            exons: await countOf(exons),
            proteins: await countOf(proteins),
        };
    }

    async close(): Promise<void> {
        // Uncommitted work is rolled back by the server when the connection ends
        await this.connection.end();
    }
}
