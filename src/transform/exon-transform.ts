import { RowFormatError } from '../errors.js';
import { RawRow, fieldValue } from '../parser/row-parser.js';
import { optionalInt, requiredInt } from './coerce.js';

/**
 * End phase for an exon whose coding region runs into a 3' UTR.
 */
export const NO_END_PHASE = -1;

export interface Span {
    start: number;
    end: number;
}

/**
 * One coding BioMart exon row with "not applicable" spelled as null.
 * Coordinates in utr5/utr3/coding are cDNA (transcript-relative).
 */
export interface ExonFields {
    exonEnsemblId: string;
    transcriptEnsemblId: string;
    geneEnsemblId: string;
    strand: number | null;
    phase: number | null;
    utr5: Span | null;
    utr3: Span | null;
    coding: Span;
    genomeStart: number;
    genomeEnd: number;
}

export type DropReason = 'utr_only' | 'no_annotation';

export interface ExonTransformResult {
    transcriptStart: number;
    transcriptEnd: number;
    endPhase: number;
    length: number;
    utr5Length: number;
    utr3Length: number;
}

export interface ExonRecord {
    exonEnsemblId: string;
    transcriptEnsemblId: string;
    geneEnsemblId: string;
    strand: number;
    phase: number;
    endPhase: number;
    length: number;
    transcriptStartPos: number;
    transcriptEndPos: number;
    genomeStartPos: number;
    genomeEndPos: number;
    cdnaCodingStart: number;
    cdnaCodingEnd: number;
}

export interface ExonEntry {
    transcriptEnsemblId: string;
    geneEnsemblId: string;
    exon: ExonRecord | null;
    dropReason?: DropReason;
}

const DATASET = 'exon';

function isFilled(row: RawRow, field: string): boolean {
    return fieldValue(row, field).trim() !== '';
}

// A region counts as present when its start field is filled in
function readSpan(row: RawRow, startField: string, endField: string): Span | null {
    const start = optionalInt(DATASET, row, startField);
    if (start === null) return null;
    return { start, end: requiredInt(DATASET, row, endField) };
}

function spanLength(span: Span): number {
    return span.end - span.start + 1;
}

function mod3(value: number): number {
    return ((value % 3) + 3) % 3;
}

/**
 * Why a row has no exon to store, or null when it has a coding region.
 * Only the start fields are looked at; nothing else on a dropped row is read.
 */
export function classifyExonRow(row: RawRow): DropReason | null {
    if (isFilled(row, 'cdna_coding_start')) return null;
    return isFilled(row, '5_utr_start') || isFilled(row, '3_utr_start') ? 'utr_only' : 'no_annotation';
}

export function readExonFields(row: RawRow): ExonFields {
    return {
        exonEnsemblId: fieldValue(row, 'ensembl_exon_id'),
        transcriptEnsemblId: fieldValue(row, 'ensembl_transcript_id'),
        geneEnsemblId: fieldValue(row, 'ensembl_gene_id'),
        strand: optionalInt(DATASET, row, 'strand'),
        phase: optionalInt(DATASET, row, 'phase'),
        utr5: readSpan(row, '5_utr_start', '5_utr_end'),
        utr3: readSpan(row, '3_utr_start', '3_utr_end'),
        coding: {
            start: requiredInt(DATASET, row, 'cdna_coding_start'),
            end: requiredInt(DATASET, row, 'cdna_coding_end'),
        },
        genomeStart: requiredInt(DATASET, row, 'exon_chrom_start'),
        genomeEnd: requiredInt(DATASET, row, 'exon_chrom_end'),
    };
}

/**
 * Derive transcript-relative bounds and end phase for a coding exon.
 *
 * The end phase is only tracked when the coding region reaches the 3' end of
 * the exon; an exon that carries a 3' UTR gets NO_END_PHASE.
 */
export function transformExon(fields: ExonFields): ExonTransformResult {
    const length = fields.genomeEnd - fields.genomeStart + 1;
    const { utr5, utr3, coding } = fields;

    const utr5Length = utr5 === null ? 0 : spanLength(utr5);
    const utr3Length = utr3 === null ? 0 : spanLength(utr3);

    let endPhase = NO_END_PHASE;
    if (utr3 === null) {
        if (fields.phase === null) {
            throw new RowFormatError(DATASET, 'phase', '');
        }
        endPhase = mod3(fields.phase + length);
    }

    return {
        transcriptStart: coding.start - utr5Length,
        transcriptEnd: coding.end + utr3Length,
        endPhase,
        length,
        utr5Length,
        utr3Length,
    };
}

export function toExonEntry(row: RawRow): ExonEntry {
    const dropReason = classifyExonRow(row);
    if (dropReason !== null) {
        return {
            transcriptEnsemblId: fieldValue(row, 'ensembl_transcript_id'),
            geneEnsemblId: fieldValue(row, 'ensembl_gene_id'),
            exon: null,
            dropReason,
        };
    }

    const fields = readExonFields(row);
    const result = transformExon(fields);

    if (fields.strand === null) {
        throw new RowFormatError(DATASET, 'strand', '');
    }
    if (fields.phase === null) {
        throw new RowFormatError(DATASET, 'phase', '');
    }

    return {
        transcriptEnsemblId: fields.transcriptEnsemblId,
        geneEnsemblId: fields.geneEnsemblId,
        exon: {
            exonEnsemblId: fields.exonEnsemblId,
            transcriptEnsemblId: fields.transcriptEnsemblId,
            geneEnsemblId: fields.geneEnsemblId,
            strand: fields.strand,
            phase: fields.phase,
            endPhase: result.endPhase,
            length: result.length,
            transcriptStartPos: result.transcriptStart,
            transcriptEndPos: result.transcriptEnd,
            genomeStartPos: fields.genomeStart,
            genomeEndPos: fields.genomeEnd,
            cdnaCodingStart: fields.coding.start,
            cdnaCodingEnd: fields.coding.end,
        },
    };
}

export function* exonEntries(rows: Iterable<RawRow>): Generator<ExonEntry> {
    for (const row of rows) {
        yield toExonEntry(row);
    }
}
