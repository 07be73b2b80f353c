export { BioMartClient, BioMartFetcher } from './biomart/biomart-client.js';
export { DATASETS, DatasetDefinition, DatasetName, buildDatasets } from './biomart/datasets.js';
export { loadQuery } from './biomart/query-loader.js';
export { DatasetCache, DatasetSource, DatasetText } from './cache/dataset-cache.js';
export { MySqlReferenceStore } from './db/mysql-store.js';
export { ReferenceStore, RowCounts } from './db/reference-store.js';
export { ReferenceLoader, LoadStats } from './loader/reference-loader.js';
export { iterRows, RawRow } from './parser/row-parser.js';
export { classifyExonRow, transformExon, readExonFields, ExonTransformResult } from './transform/exon-transform.js';
export { aggregateTranscripts, TranscriptRecord } from './transform/record-aggregator.js';
export { ReferenceLoaderError, TransportError, ReferentialIntegrityError, RowFormatError } from './errors.js';
export { config } from './config/index.js';
