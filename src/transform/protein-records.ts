import { RawRow, fieldValue } from '../parser/row-parser.js';
import { requiredInt } from './coerce.js';

export interface ProteinRecord {
    proteinEnsemblId: string;
    transcriptEnsemblId: string;
    cdsLength: number;
}

/**
 * Most BioMart protein rows are transcripts without a peptide; those yield null.
 */
export function toProteinRecord(row: RawRow): ProteinRecord | null {
    const proteinEnsemblId = fieldValue(row, 'ensembl_peptide_id');
    if (proteinEnsemblId === '' || fieldValue(row, 'cds_length') === '') {
        return null;
    }

    return {
        proteinEnsemblId,
        transcriptEnsemblId: fieldValue(row, 'ensembl_transcript_id'),
        cdsLength: requiredInt('protein', row, 'cds_length'),
    };
}
