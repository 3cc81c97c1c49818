/**
 * Table Module
 *
 * Tabular inspection of both players' hands.
 */
export type { TableCell, HandColumn, HandTable, TableSource } from './HandTable';
export { combinedHand, toTable, renderTable } from './HandTable';
