import { index, int, mysqlTable, tinyint, uniqueIndex, varchar } from 'drizzle-orm/mysql-core';

// Mirrors sql/schema.sql, which creates the tables

export const genes = mysqlTable(
    'gene',
    {
        id: int('id').autoincrement().primaryKey(),
        geneEnsemblId: varchar('gene_ensembl_id', { length: 32 }).notNull(),
        geneSymbol: varchar('gene_symbol', { length: 64 }).notNull(),
        biotype: varchar('biotype', { length: 64 }).notNull(),
        chrom: varchar('chrom', { length: 64 }).notNull(),
        startPos: int('start_pos').notNull(),
        endPos: int('end_pos').notNull(),
        length: int('length').notNull(),
    },
    (table) => ({
        geneEnsemblIdIdx: uniqueIndex('gene_ensembl_id_idx').on(table.geneEnsemblId),
    }),
);

export const transcripts = mysqlTable(
    'transcript',
    {
        id: int('id').autoincrement().primaryKey(),
        transcriptEnsemblId: varchar('transcript_ensembl_id', { length: 32 }).notNull(),
        geneId: int('gene_id').notNull().references(() => genes.id),
        cdsStartPos: int('cds_start_pos').notNull(),
        cdsEndPos: int('cds_end_pos').notNull(),
        length: int('length').notNull(),
    },
    (table) => ({
        transcriptEnsemblIdIdx: uniqueIndex('transcript_ensembl_id_idx').on(table.transcriptEnsemblId),
        geneIdIdx: index('transcript_gene_id_idx').on(table.geneId),
    }),
);

export const exons = mysqlTable(
    'exon',
    {
        id: int('id').autoincrement().primaryKey(),
        exonEnsemblId: varchar('exon_ensembl_id', { length: 32 }).notNull(),
        geneId: int('gene_id').notNull().references(() => genes.id),
        transcriptId: int('transcript_id').notNull().references(() => transcripts.id),
        strand: tinyint('strand').notNull(),
        phase: tinyint('phase').notNull(),
        endPhase: tinyint('end_phase').notNull(),
        length: int('length').notNull(),
        transcriptStartPos: int('transcript_start_pos').notNull(),
        transcriptEndPos: int('transcript_end_pos').notNull(),
        genomeStartPos: int('genome_start_pos').notNull(),
        genomeEndPos: int('genome_end_pos').notNull(),
    },
    (table) => ({
        exonEnsemblIdIdx: uniqueIndex('exon_ensembl_id_idx').on(table.exonEnsemblId),
        transcriptIdIdx: index('exon_transcript_id_idx').on(table.transcriptId),
    }),
);

export const proteins = mysqlTable(
    'protein',
    {
        id: int('id').autoincrement().primaryKey(),
        proteinEnsemblId: varchar('protein_ensembl_id', { length: 32 }).notNull(),
        transcriptId: int('transcript_id').notNull().references(() => transcripts.id),
        geneId: int('gene_id').notNull().references(() => genes.id),
        cdsLength: int('cds_length').notNull(),
    },
    (table) => ({
        proteinEnsemblIdIdx: uniqueIndex('protein_ensembl_id_idx').on(table.proteinEnsemblId),
        transcriptIdIdx: index('protein_transcript_id_idx').on(table.transcriptId),
    }),
);

export type GeneRow = typeof genes.$inferSelect;
export type TranscriptRow = typeof transcripts.$inferSelect;
export type ExonRow = typeof exons.$inferSelect;
export type ProteinRow = typeof proteins.$inferSelect;
