export { PdfIngestionPipeline, planNameFromDocument, type FieldParser } from './pipeline';
