export {
  buildTable,
  groupTableColumns,
  formatDateStamp,
  TABLE_HEADER,
} from './table-builder.js';
export { renderTableCsv, writeTableCsv } from './csv-writer.js';
