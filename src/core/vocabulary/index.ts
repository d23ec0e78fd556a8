export {
  VocabularyService,
  parseVocabulary,
  exportFileName,
  type VocabularyServiceOptions,
  type RejectedRow,
  type ParsedVocabulary,
  type ImportResult,
  type ExportFile,
  type ClearResult,
} from './vocabulary-service';
export { parseCsv, writeCsv, detectDelimiter, stripBom, type Delimiter, type CsvRecord } from './csv';
