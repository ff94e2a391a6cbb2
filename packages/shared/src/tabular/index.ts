export { COLUMN_ALIASES, canonicalColumn } from './aliases';
export {
  parseTabularFile,
  parseQuoteRows,
  canonicalizeRow,
  detectTabularFormat,
  worksheetRows,
  safeNumber,
  type TabularRow,
  type TabularFormat,
} from './parser';
