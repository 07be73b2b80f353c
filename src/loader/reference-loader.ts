import { EventEmitter } from 'events';
import { DATASETS, DatasetDefinition, DatasetName } from '../biomart/datasets.js';
import { DatasetOrigin, DatasetSource } from '../cache/dataset-cache.js';
import { config } from '../config/index.js';
import { ReferenceStore } from '../db/reference-store.js';
import { ReferentialIntegrityError } from '../errors.js';
import { iterRows } from '../parser/row-parser.js';
import { exonEntries } from '../transform/exon-transform.js';
import { toGeneRecord } from '../transform/gene-records.js';
import { toProteinRecord } from '../transform/protein-records.js';
import { aggregateTranscripts } from '../transform/record-aggregator.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('reference-loader');

export interface StageEvent {
    dataset: DatasetName;
    origin: DatasetOrigin;
}

export interface LoadProgress {
    dataset: DatasetName;
    processed: number;
    total?: number;
}

export interface TranscriptStageStats {
    transcripts: number;
    exons: number;
    droppedExons: number;
    emptyTranscripts: number;
}

export interface ProteinStageStats {
    proteins: number;
    skippedProteins: number;
}

export interface LoadStats extends TranscriptStageStats, ProteinStageStats {
    genes: number;
    elapsedTime: number;
}

/**
 * Loads genes, then transcripts with their exons, then proteins. Each stage
 * commits before the next one starts so children always find their parents.
 *
 * Events: 'start', 'stage' (StageEvent), 'progress' (LoadProgress),
 * 'complete' (LoadStats), 'error'.
 */
export class ReferenceLoader extends EventEmitter {
    constructor(
        private readonly store: ReferenceStore,
        private readonly source: DatasetSource,
        private readonly datasets: Record<DatasetName, DatasetDefinition> = DATASETS,
        private readonly progressInterval: number = config.loader.progressUpdateInterval
    ) {
        super();
    }

    async run(): Promise<LoadStats> {
        const startTime = Date.now();
        this.emit('start');

        try {
            const genes = await this.loadGenes();
            const transcriptStats = await this.loadTranscriptsAndExons();
            const proteinStats = await this.loadProteins();

            logger.warn('Did not load data into the protein_region table. Not implemented yet.');
            logger.info('Finished loading Ensembl reference data into database.');

            const stats: LoadStats = {
                genes,
                ...transcriptStats,
                ...proteinStats,
                elapsedTime: Date.now() - startTime,
            };
            this.emit('complete', stats);
            return stats;
        } catch (error) {
            if (this.listenerCount('error') > 0) {
                this.emit('error', error);
            }
            throw error;
        }
    }

    async loadGenes(): Promise<number> {
        const dataset = this.datasets.genes;
        const text = await this.openStage(dataset);

        logger.info('Loading gene data into database...');
        let geneCounter = 0;
        for (const row of iterRows(text, dataset.fieldNames)) {
            await this.store.getOrCreateGene(toGeneRecord(row));
            geneCounter++;
            this.reportProgress(dataset.name, geneCounter);
        }
        await this.store.commit();

        this.finishStage(dataset.name, geneCounter);
        logger.info(`Finished loading ${geneCounter} genes into the database.`);
        return geneCounter;
    }

    async loadTranscriptsAndExons(): Promise<TranscriptStageStats> {
        const dataset = this.datasets.transcripts_and_exons;
        const text = await this.openStage(dataset);

        logger.info('Loading transcript and exon data into database...');
        const { transcripts, droppedExons, emptyTranscripts } = aggregateTranscripts(
            exonEntries(iterRows(text, dataset.fieldNames))
        );
        logger.debug(`Dropped ${droppedExons} exons without a coding region; skipping ${emptyTranscripts} transcripts left without exons.`);

        let transcriptCounter = 0;
        let exonCounter = 0;
        for (const transcript of transcripts) {
            const geneId = await this.store.findGeneId(transcript.geneEnsemblId);
            if (geneId === null) {
                throw new ReferentialIntegrityError('gene', transcript.geneEnsemblId, `transcript ${transcript.transcriptEnsemblId}`);
            }

            const { id: transcriptId } = await this.store.getOrCreateTranscript({
                transcriptEnsemblId: transcript.transcriptEnsemblId,
                geneId,
                cdsStartPos: transcript.cdsStartPos,
                cdsEndPos: transcript.cdsEndPos,
                length: transcript.length,
            });
            // Exons reference the transcript, so it goes in first
            await this.store.commit();
            transcriptCounter++;

            for (const exon of transcript.exons) {
                await this.store.getOrCreateExon({
                    exonEnsemblId: exon.exonEnsemblId,
                    geneId,
                    transcriptId,
                    strand: exon.strand,
                    phase: exon.phase,
                    endPhase: exon.endPhase,
                    length: exon.length,
                    transcriptStartPos: exon.transcriptStartPos,
                    transcriptEndPos: exon.transcriptEndPos,
                    genomeStartPos: exon.genomeStartPos,
                    genomeEndPos: exon.genomeEndPos,
                });
                exonCounter++;
            }
            this.reportProgress(dataset.name, transcriptCounter, transcripts.length);
        }
        await this.store.commit();

        this.finishStage(dataset.name, transcriptCounter, transcripts.length);
        logger.info(`Finished loading ${transcriptCounter} transcripts into the database.`);
        logger.info(`Finished loading ${exonCounter} exons into the database.`);
        return { transcripts: transcriptCounter, exons: exonCounter, droppedExons, emptyTranscripts };
    }

    async loadProteins(): Promise<ProteinStageStats> {
        const dataset = this.datasets.proteins;
        const text = await this.openStage(dataset);

        logger.info('Loading protein data into database...');
        let proteinCounter = 0;
        let skippedProteins = 0;
        for (const row of iterRows(text, dataset.fieldNames)) {
            const protein = toProteinRecord(row);
            if (protein === null) {
                skippedProteins++;
                continue;
            }

            const transcript = await this.store.findTranscript(protein.transcriptEnsemblId);
            if (transcript === null) {
                throw new ReferentialIntegrityError('transcript', protein.transcriptEnsemblId, `protein ${protein.proteinEnsemblId}`);
            }

            await this.store.getOrCreateProtein({
                proteinEnsemblId: protein.proteinEnsemblId,
                cdsLength: protein.cdsLength,
                transcriptId: transcript.id,
                geneId: transcript.geneId,
            });
            proteinCounter++;
            this.reportProgress(dataset.name, proteinCounter);
        }
        await this.store.commit();

        this.finishStage(dataset.name, proteinCounter);
        logger.info(`Finished loading ${proteinCounter} proteins into the database.`);
        return { proteins: proteinCounter, skippedProteins };
    }

    private async openStage(dataset: DatasetDefinition): Promise<string> {
        const { text, origin } = await this.source.getDataset(dataset);
        const event: StageEvent = { dataset: dataset.name, origin };
        this.emit('stage', event);
        return text;
    }

    private reportProgress(dataset: DatasetName, processed: number, total?: number): void {
        if (this.progressInterval > 0 && processed % this.progressInterval === 0) {
            const progress: LoadProgress = { dataset, processed, total };
            this.emit('progress', progress);
        }
    }

    private finishStage(dataset: DatasetName, processed: number, total?: number): void {
        const progress: LoadProgress = { dataset, processed, total: total ?? processed };
        this.emit('progress', progress);
    }
}
