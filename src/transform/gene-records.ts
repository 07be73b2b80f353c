import { RawRow, fieldValue } from '../parser/row-parser.js';
import { requiredInt } from './coerce.js';

export interface GeneRecord {
    geneEnsemblId: string;
    geneSymbol: string;
    biotype: string;
    chrom: string;
    startPos: number;
    endPos: number;
    length: number;
}

export function toGeneRecord(row: RawRow): GeneRecord {
    const startPos = requiredInt('gene', row, 'start_position');
    const endPos = requiredInt('gene', row, 'end_position');

    return {
        geneEnsemblId: fieldValue(row, 'ensembl_gene_id'),
        geneSymbol: fieldValue(row, 'hgnc_symbol'),
        biotype: fieldValue(row, 'gene_biotype'),
        chrom: fieldValue(row, 'chromosome_name'),
        startPos,
        endPos,
        length: endPos - startPos + 1,
    };
}
