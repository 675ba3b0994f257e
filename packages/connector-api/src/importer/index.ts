export { ContentImporter } from './content-importer.js';
export type { ContentImporterOptions, SaveOptions, SaveResult, ImportSummary } from './content-importer.js';
