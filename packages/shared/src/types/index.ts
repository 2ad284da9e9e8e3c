export type { CellValue, Row, Table } from './table';
