import { ExonRow, GeneRow, ProteinRow, TranscriptRow } from './schema.js';

export type NewGene = Omit<GeneRow, 'id'>;
export type NewTranscript = Omit<TranscriptRow, 'id'>;
export type NewExon = Omit<ExonRow, 'id'>;
export type NewProtein = Omit<ProteinRow, 'id'>;

export interface StoredId {
    id: number;
    created: boolean;
}

export interface TranscriptRef {
    id: number;
    geneId: number;
}

export interface RowCounts {
    genes: number;
    transcripts: number;
    exons: number;
    proteins: number;
}

/**
 * Session over the reference tables. Writes become durable on commit().
 *
 * The getOrCreate* methods look a row up by its Ensembl ID and insert it only
 * when it is missing; an existing row is returned untouched.
 */
export interface ReferenceStore {
    createTables(): Promise<void>;
    getOrCreateGene(gene: NewGene): Promise<StoredId>;
    findGeneId(geneEnsemblId: string): Promise<number | null>;
    getOrCreateTranscript(transcript: NewTranscript): Promise<StoredId>;
    findTranscript(transcriptEnsemblId: string): Promise<TranscriptRef | null>;
    getOrCreateExon(exon: NewExon): Promise<StoredId>;
    getOrCreateProtein(protein: NewProtein): Promise<StoredId>;
    commit(): Promise<void>;
    countRows(): Promise<RowCounts>;
    close(): Promise<void>;
}
