import cliProgress from 'cli-progress';
import chalk from 'chalk';
import { DatasetName } from '../biomart/datasets.js';
import { LoadProgress, ReferenceLoader, StageEvent } from '../loader/reference-loader.js';

export interface ProgressConfig {
    title: string;
    total?: number;
    showRate: boolean;
    format?: string;
}

interface BarStats {
    startTime: number;
    lastUpdate: number;
    lastValue: number;
    rate: number;
    title: string;
}

export class ProgressTracker {
    private bars: Map<string, cliProgress.SingleBar> = new Map();
    private stats: Map<string, BarStats> = new Map();
    private multiBar: cliProgress.MultiBar;

    constructor() {
        this.multiBar = new cliProgress.MultiBar({
            clearOnComplete: false,
            hideCursor: true,
            format: ' {status} {bar} | {value}/{total} | Rate: {rate}',
            barCompleteChar: '█',
            barIncompleteChar: '░',
        }, cliProgress.Presets.shades_grey);
    }

    createProgressBar(id: string, config: ProgressConfig): void {
        const format = config.format || this.buildFormat(config);

        const bar = this.multiBar.create(config.total || 0, 0, {
            status: config.title,
            rate: '0/s',
        }, {
            format: format
        });

        this.bars.set(id, bar);
        this.stats.set(id, {
            startTime: Date.now(),
            lastUpdate: Date.now(),
            lastValue: 0,
            rate: 0,
            title: config.title
        });
    }

    private buildFormat(config: ProgressConfig): string {
        let format = ` ${chalk.cyan('{status}')} {bar} | {value}/{total}`;

        if (config.showRate) {
            format += ' | Rate: {rate}';
        }

        return format;
    }

    hasProgress(id: string): boolean {
        return this.bars.has(id);
    }

    updateProgress(id: string, current: number, total?: number): void {
        const bar = this.bars.get(id);
        const stats = this.stats.get(id);

        if (!bar || !stats) {
            throw new Error(`Progress bar '${id}' not found`);
        }

        const now = Date.now();
        const timeDiff = (now - stats.lastUpdate) / 1000;
        if (timeDiff > 0) {
            stats.rate = (current - stats.lastValue) / timeDiff;
            stats.lastUpdate = now;
            stats.lastValue = current;
        }

        // Row counts are unknown until a stage finishes parsing
        const barTotal = total ?? Math.max(bar.getTotal(), current);
        if (barTotal !== bar.getTotal()) {
            bar.setTotal(barTotal);
        }

        bar.update(current, {
            status: stats.title,
            rate: `${Math.round(stats.rate)}/s`,
        });
    }

    completeProgress(id: string, message?: string): void {
        const bar = this.bars.get(id);
        const stats = this.stats.get(id);

        if (!bar || !stats) return;

        const elapsed = Math.max((Date.now() - stats.startTime) / 1000, 0.001);
        const total = bar.getTotal();

        bar.update(total, {
            status: message || `${stats.title} - Complete!`,
            rate: `${Math.round(total / elapsed)}/s`,
        });
    }

    failProgress(id: string, error: string): void {
        const bar = this.bars.get(id);
        const stats = this.stats.get(id);

        if (!bar || !stats) return;

        bar.update(stats.lastValue, {
            status: chalk.red(`${stats.title} - Failed: ${error}`),
            rate: '0/s',
        });
    }

    stop(): void {
        this.multiBar.stop();
    }
}

const STAGE_TITLES: Record<DatasetName, string> = {
    genes: 'Genes',
    transcripts_and_exons: 'Transcripts',
    proteins: 'Proteins',
};

/**
 * One progress bar per loader stage.
 */
export class LoadProgressDisplay {
    private tracker = new ProgressTracker();
    private current: DatasetName | null = null;

    attach(loader: ReferenceLoader): void {
        loader.on('stage', (event: StageEvent) => {
            this.finishCurrent();
            this.current = event.dataset;
            this.tracker.createProgressBar(event.dataset, {
                title: `${STAGE_TITLES[event.dataset]} (${event.origin})`,
                showRate: true,
            });
        });

        loader.on('progress', (progress: LoadProgress) => {
            if (this.tracker.hasProgress(progress.dataset)) {
                this.tracker.updateProgress(progress.dataset, progress.processed, progress.total);
            }
        });

        loader.on('complete', () => {
            this.finishCurrent();
            this.tracker.stop();
        });

        loader.on('error', (error: unknown) => {
            if (this.current !== null) {
                this.tracker.failProgress(this.current, error instanceof Error ? error.message : String(error));
            }
            this.tracker.stop();
        });
    }

    private finishCurrent(): void {
        if (this.current !== null) {
            this.tracker.completeProgress(this.current);
            this.current = null;
        }
    }
}
