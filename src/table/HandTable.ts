/**
 * Tabular view of both players' cards.
 *
 * Each column is one player's combined hand: the cards in hand followed
 * by the discard pile in the order the configured recycle mode would
 * append it. Columns are ordered longest first and the shorter one is
 * padded with `null` so both have the same length.
 */

import type { Card } from '../card-system/Card';
import { UnsupportedOperationError } from '../core-engine/errors';
import type { RecycleMode } from '../rule-engine/WarRules';
import { isDeterministicRecycle, RECYCLE_STRATEGIES } from '../rule-engine/WarRules';

/** A table cell: a card, or `null` for padding. */
export type TableCell = Card | null;

/** One named column of the table. */
export interface HandColumn {
  readonly name: string;
  readonly cells: readonly TableCell[];
}

/** Both players' combined hands, laid out as equal-length columns. */
export interface HandTable {
  readonly columns: readonly HandColumn[];
  readonly rowCount: number;
}

/** A player's cards as seen by the table. */
export interface TableSource {
  readonly name: string;
  readonly hand: readonly Card[];
  readonly discard: readonly Card[];
}

/**
 * A player's cards in the order they would be drawn once the discard
 * pile is recycled.
 *
 * @throws {UnsupportedOperationError} In `shuffled` mode, where that
 *         order is not known until the shuffle happens.
 */
export function combinedHand(
  source: TableSource,
  mode: RecycleMode,
): Card[] {
  assertTabular(mode);
  const recycled = RECYCLE_STRATEGIES[mode](source.discard, () => 0);
  return [...source.hand, ...recycled];
}

/**
 * Build the table for the given players.
 *
 * @throws {UnsupportedOperationError} In `shuffled` mode.
 */
export function toTable(
  sources: readonly TableSource[],
  mode: RecycleMode,
): HandTable {
  assertTabular(mode);

  const combined = sources.map((source) => ({
    name: source.name,
    cards: combinedHand(source, mode),
  }));
  // Array.prototype.sort is stable, so equal lengths keep seating order
  combined.sort((a, b) => b.cards.length - a.cards.length);

  const rowCount = combined.reduce(
    (max, column) => Math.max(max, column.cards.length),
    0,
  );

  const columns = combined.map((column): HandColumn => {
    const cells: TableCell[] = [...column.cards];
    while (cells.length < rowCount) {
      cells.push(null);
    }
    return { name: column.name, cells };
  });

  return { columns, rowCount };
}

/**
 * Render a table as aligned text.
 *
 * The first line holds the column names; each following line is one
 * row. Cards print as integers, padding cells as a single blank, and
 * every column is right-aligned to its widest entry with one space
 * between columns.
 */
export function renderTable(table: HandTable): string {
  const text = table.columns.map((column) => [
    column.name,
    ...column.cells.map(formatCell),
  ]);
  const widths = text.map((entries) =>
    entries.reduce((max, entry) => Math.max(max, entry.length), 0),
  );

  const lines: string[] = [];
  for (let row = 0; row <= table.rowCount; row++) {
    lines.push(
      text.map((entries, col) => entries[row].padStart(widths[col])).join(' '),
    );
  }
  return lines.join('\n');
}

function formatCell(cell: TableCell): string {
  return cell === null ? ' ' : cell.toFixed(0);
}

function assertTabular(mode: RecycleMode): void {
  if (!isDeterministicRecycle(mode)) {
    throw new UnsupportedOperationError(
      'Cannot lay out a table for a game with shuffled discard recycling',
      'toTable',
    );
  }
}
