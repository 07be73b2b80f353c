/**
 * Unit tests for grouping exons into transcripts
 */

import { describe, it, expect } from '@jest/globals';
import { ExonEntry, ExonRecord } from '../../src/transform/exon-transform';
import { aggregateTranscripts } from '../../src/transform/record-aggregator';

const createExon = (overrides: Partial<ExonRecord> = {}): ExonRecord => ({
  exonEnsemblId: 'ENSE1',
  transcriptEnsemblId: 'ENST1',
  geneEnsemblId: 'ENSG1',
  strand: 1,
  phase: 0,
  endPhase: 0,
  length: 100,
  transcriptStartPos: 1,
  transcriptEndPos: 100,
  genomeStartPos: 1000,
  genomeEndPos: 1099,
  cdnaCodingStart: 1,
  cdnaCodingEnd: 100,
  ...overrides,
});

const kept = (exon: ExonRecord): ExonEntry => ({
  transcriptEnsemblId: exon.transcriptEnsemblId,
  geneEnsemblId: exon.geneEnsemblId,
  exon,
});

const dropped = (transcriptEnsemblId: string, geneEnsemblId: string): ExonEntry => ({
  transcriptEnsemblId,
  geneEnsemblId,
  exon: null,
  dropReason: 'utr_only',
});

describe('aggregateTranscripts', () => {
  it('should derive coding span and length from the kept exons', () => {
    const first = createExon({ exonEnsemblId: 'ENSE1', length: 201, cdnaCodingStart: 51, cdnaCodingEnd: 200 });
    const second = createExon({ exonEnsemblId: 'ENSE2', length: 150, cdnaCodingStart: 201, cdnaCodingEnd: 350 });

    const result = aggregateTranscripts([kept(second), kept(first)]);

    expect(result.transcripts).toEqual([{
      transcriptEnsemblId: 'ENST1',
      geneEnsemblId: 'ENSG1',
      cdsStartPos: 51,
      cdsEndPos: 350,
      length: 351,
      exons: [second, first],
    }]);
  });

  it('should leave out transcripts whose exons were all dropped', () => {
    const result = aggregateTranscripts([
      dropped('ENST9', 'ENSG9'),
      kept(createExon({ transcriptEnsemblId: 'ENST1' })),
      dropped('ENST9', 'ENSG9'),
    ]);

    expect(result.transcripts.map(transcript => transcript.transcriptEnsemblId)).toEqual(['ENST1']);
    expect(result.droppedExons).toBe(2);
    expect(result.emptyTranscripts).toBe(1);
  });

  it('should keep the transcripts in first-seen order', () => {
    const result = aggregateTranscripts([
      kept(createExon({ exonEnsemblId: 'ENSE1', transcriptEnsemblId: 'ENST2' })),
      kept(createExon({ exonEnsemblId: 'ENSE2', transcriptEnsemblId: 'ENST1' })),
      kept(createExon({ exonEnsemblId: 'ENSE3', transcriptEnsemblId: 'ENST2' })),
    ]);

    expect(result.transcripts.map(transcript => transcript.transcriptEnsemblId)).toEqual(['ENST2', 'ENST1']);
    expect(result.transcripts[0].exons.map(exon => exon.exonEnsemblId)).toEqual(['ENSE1', 'ENSE3']);
  });

  it('should keep the first gene seen for a transcript', () => {
    const result = aggregateTranscripts([
      dropped('ENST1', 'ENSG1'),
      kept(createExon({ transcriptEnsemblId: 'ENST1', geneEnsemblId: 'ENSG2' })),
    ]);

    expect(result.transcripts[0].geneEnsemblId).toBe('ENSG1');
  });

  it('should return nothing for no input', () => {
    expect(aggregateTranscripts([])).toEqual({ transcripts: [], droppedExons: 0, emptyTranscripts: 0 });
  });
});
