import { config } from '../config/index.js';

export type DatasetName = 'genes' | 'transcripts_and_exons' | 'proteins';

export interface DatasetDefinition {
    name: DatasetName;
    label: string;
    queryFile: string;
    cacheFile: string;
    fieldNames: readonly string[];
}

export const GENE_FIELDNAMES = [
    'ensembl_gene_id', 'hgnc_symbol', 'gene_biotype', 'external_gene_name', 'chromosome_name',
    'start_position', 'end_position',
] as const;

export const EXON_FIELDNAMES = [
    'ensembl_exon_id', 'ensembl_transcript_id', 'ensembl_gene_id', 'strand', 'phase',
    '5_utr_start', '5_utr_end', 'cdna_coding_start', 'cdna_coding_end', '3_utr_start',
    '3_utr_end', 'cds_start', 'cds_end', 'genomic_coding_start', 'genomic_coding_end',
    'exon_chrom_start', 'exon_chrom_end',
] as const;

export const PROTEIN_FIELDNAMES = ['ensembl_peptide_id', 'ensembl_transcript_id', 'cds_length'] as const;

export type GeneField = typeof GENE_FIELDNAMES[number];
export type ExonField = typeof EXON_FIELDNAMES[number];
export type ProteinField = typeof PROTEIN_FIELDNAMES[number];

/**
 * Cache file names carry the Ensembl release and assembly, e.g.
 * ensembl_genes_78.homo_sapiens.GRCh37.tsv
 */
export function cacheFileName(prefix: string, release: string, assembly: string): string {
    return `ensembl_${prefix}_${release}.homo_sapiens.${assembly}.tsv`;
}

export function buildDatasets(
    release: string = config.biomart.release,
    assembly: string = config.biomart.assembly
): Record<DatasetName, DatasetDefinition> {
    return {
        genes: {
            name: 'genes',
            label: 'gene',
            queryFile: 'gene_query.xml',
            cacheFile: cacheFileName('genes', release, assembly),
            fieldNames: GENE_FIELDNAMES,
        },
        transcripts_and_exons: {
            name: 'transcripts_and_exons',
            label: 'transcript and exon',
            queryFile: 'exon_query.xml',
            cacheFile: cacheFileName('transcripts_and_exons', release, assembly),
            fieldNames: EXON_FIELDNAMES,
        },
        proteins: {
            name: 'proteins',
            label: 'protein',
            queryFile: 'protein_query.xml',
            cacheFile: cacheFileName('proteins', release, assembly),
            fieldNames: PROTEIN_FIELDNAMES,
        },
    };
}

export const DATASETS = buildDatasets();
