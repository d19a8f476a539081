export { parseCsv, toCsv, type CsvCell } from './table.js';
