import { ExonEntry, ExonRecord } from './exon-transform.js';

export interface TranscriptRecord {
    transcriptEnsemblId: string;
    geneEnsemblId: string;
    cdsStartPos: number;
    cdsEndPos: number;
    length: number;
    exons: ExonRecord[];
}

export interface AggregationResult {
    transcripts: TranscriptRecord[];
    droppedExons: number;
    emptyTranscripts: number;
}

interface TranscriptGroup {
    geneEnsemblId: string;
    exons: ExonRecord[];
}

/**
 * Group exon rows by transcript and summarise each transcript from the exons
 * it kept. A transcript seen only through dropped exons is left out.
 */
export function aggregateTranscripts(entries: Iterable<ExonEntry>): AggregationResult {
    const groups = new Map<string, TranscriptGroup>();
    let droppedExons = 0;

    for (const entry of entries) {
        let group = groups.get(entry.transcriptEnsemblId);
        if (!group) {
            group = { geneEnsemblId: entry.geneEnsemblId, exons: [] };
            groups.set(entry.transcriptEnsemblId, group);
        }

        if (entry.exon === null) {
            droppedExons++;
        } else {
            group.exons.push(entry.exon);
        }
    }

    const transcripts: TranscriptRecord[] = [];
    let emptyTranscripts = 0;

    for (const [transcriptEnsemblId, group] of groups) {
        if (group.exons.length === 0) {
            emptyTranscripts++;
            continue;
        }

        transcripts.push({
            transcriptEnsemblId,
            geneEnsemblId: group.geneEnsemblId,
            cdsStartPos: Math.min(...group.exons.map(exon => exon.cdnaCodingStart)),
            cdsEndPos: Math.max(...group.exons.map(exon => exon.cdnaCodingEnd)),
            length: group.exons.reduce((sum, exon) => sum + exon.length, 0),
            exons: group.exons,
        });
    }

    return { transcripts, droppedExons, emptyTranscripts };
}
