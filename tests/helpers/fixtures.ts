import { EXON_FIELDNAMES, ExonField, GENE_FIELDNAMES, GeneField, PROTEIN_FIELDNAMES, ProteinField } from '../../src/biomart/datasets';

function tsvLine<F extends string>(fieldNames: readonly F[], values: Partial<Record<F, string>>): string {
  return fieldNames.map(field => values[field] ?? '').join('\t');
}

export const geneLine = (values: Partial<Record<GeneField, string>>): string =>
  tsvLine(GENE_FIELDNAMES, values);

export const exonLine = (values: Partial<Record<ExonField, string>>): string =>
  tsvLine(EXON_FIELDNAMES, values);

export const proteinLine = (values: Partial<Record<ProteinField, string>>): string =>
  tsvLine(PROTEIN_FIELDNAMES, values);

export const GENE_TSV = [
  geneLine({
    ensembl_gene_id: 'ENSG00000000001', hgnc_symbol: 'GENEA', gene_biotype: 'protein_coding',
    external_gene_name: 'GENEA', chromosome_name: '17', start_position: '41196312', end_position: '41277500',
  }),
  geneLine({
    ensembl_gene_id: 'ENSG00000000002', hgnc_symbol: 'GENEB', gene_biotype: 'protein_coding',
    external_gene_name: 'GENEB', chromosome_name: '17', start_position: '7565097', end_position: '7590856',
  }),
  '',
  geneLine({
    ensembl_gene_id: 'ENSG00000000003', hgnc_symbol: '', gene_biotype: 'lincRNA',
    external_gene_name: 'LINC0001', chromosome_name: '1', start_position: '1000', end_position: '5000',
  }),
  '',
].join('\n');

export const EXON_TSV = [
  // 5' UTR + coding: start 1, end 200, end phase 0
  exonLine({
    ensembl_exon_id: 'ENSE00000000001', ensembl_transcript_id: 'ENST00000000001', ensembl_gene_id: 'ENSG00000000001',
    strand: '1', phase: '0', '5_utr_start': '1', '5_utr_end': '50', cdna_coding_start: '51', cdna_coding_end: '200',
    exon_chrom_start: '1000', exon_chrom_end: '1200',
  }),
  // coding + 3' UTR: start 201, end 400, end phase -1
  exonLine({
    ensembl_exon_id: 'ENSE00000000002', ensembl_transcript_id: 'ENST00000000001', ensembl_gene_id: 'ENSG00000000001',
    strand: '1', phase: '0', cdna_coding_start: '201', cdna_coding_end: '350', '3_utr_start': '351', '3_utr_end': '400',
    exon_chrom_start: '2000', exon_chrom_end: '2199',
  }),
  // coding only: start 1, end 99, end phase 0
  exonLine({
    ensembl_exon_id: 'ENSE00000000003', ensembl_transcript_id: 'ENST00000000002', ensembl_gene_id: 'ENSG00000000002',
    strand: '-1', phase: '0', cdna_coding_start: '1', cdna_coding_end: '99',
    exon_chrom_start: '5000', exon_chrom_end: '5098',
  }),
  // Non-coding transcript: both exons are dropped
  exonLine({
    ensembl_exon_id: 'ENSE00000000004', ensembl_transcript_id: 'ENST00000000003', ensembl_gene_id: 'ENSG00000000003',
    strand: '1', phase: '-1', '3_utr_start': '1', '3_utr_end': '300',
    exon_chrom_start: '9000', exon_chrom_end: '9299',
  }),
  exonLine({
    ensembl_exon_id: 'ENSE00000000005', ensembl_transcript_id: 'ENST00000000003', ensembl_gene_id: 'ENSG00000000003',
    strand: '1', phase: '-1', '5_utr_start': '1', '5_utr_end': '100',
    exon_chrom_start: '8000', exon_chrom_end: '8099',
  }),
  '',
].join('\n');

export const PROTEIN_TSV = [
  proteinLine({ ensembl_peptide_id: 'ENSP00000000001', ensembl_transcript_id: 'ENST00000000001', cds_length: '300' }),
  proteinLine({ ensembl_peptide_id: '', ensembl_transcript_id: 'ENST00000000003', cds_length: '' }),
  proteinLine({ ensembl_peptide_id: 'ENSP00000000002', ensembl_transcript_id: 'ENST00000000002', cds_length: '99' }),
  '',
].join('\n');
