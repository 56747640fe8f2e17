export {
  CsvExporter,
  escapeCsvField,
  toCsvRow,
  type CsvExportResult,
} from './csv-exporter';
