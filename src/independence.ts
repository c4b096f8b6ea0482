import { logger } from "./common/logger";
import { env } from "./config/env";
import { expectedDistribution } from "./pmf";
import type { PValueMethod } from "./stats/chiSquare";
import { chiSquarePValue, resolvePValueMethod } from "./stats/chiSquare";
import type { BinLayout, OutcomeBinning } from "./tally";
import { binOutcomes, EXACT_BINNING } from "./tally";
import type {
  ContingencyReport,
  ContingencyTable,
  DieSet,
  PValueMethodName,
  RollLog,
} from "./types";

export interface IndependenceOptions {
  /** Column grouping; one column per achievable sum by default. */
  binning?: OutcomeBinning;
  pValueMethod?: PValueMethodName | PValueMethod;
}

/** Players (in order of first appearance) by outcome bins (ascending). */
export function buildContingencyTable(
  rolls: RollLog,
  layout: BinLayout
): ContingencyTable {
  const rowIndex = new Map<string, number>();
  const counts: number[][] = [];
  let unbinned = 0;

  for (const roll of rolls) {
    let row = rowIndex.get(roll.playerId);
    if (row === undefined) {
      row = counts.length;
      rowIndex.set(roll.playerId, row);
      counts.push(layout.bins.map(() => 0));
    }
    const column = layout.indexOf(roll.sum);
    if (column === undefined) {
      unbinned += 1;
      continue;
    }
    counts[row][column] += 1;
  }

  const rowTotals = counts.map((row) => row.reduce((s, c) => s + c, 0));
  const columnTotals = layout.bins.map((_, j) =>
    counts.reduce((s, row) => s + row[j], 0)
  );
  return {
    rows: [...rowIndex.keys()],
    columns: layout.bins,
    counts,
    rowTotals,
    columnTotals,
    grandTotal: rowTotals.reduce((s, t) => s + t, 0),
    unbinned,
  };
}

/**
 * Cramér's V for an r × c table. Undefined unless min(r, c) ≥ 2 and n > 0.
 */
export function cramersV(
  chiSquare: number,
  n: number,
  rows: number,
  columns: number
): number | undefined {
  const k = Math.min(rows, columns);
  if (k < 2 || n <= 0 || Number.isNaN(chiSquare)) return undefined;
  return Math.sqrt(chiSquare / (n * (k - 1)));
}

/**
 * Chi-square test of independence between player and rolled outcome.
 *
 * All-zero columns (outcomes nobody rolled) are left out of the test and
 * listed in `droppedColumns`; players with no binned rolls are left out and
 * listed in `droppedRows`. Degrees of freedom are therefore
 * (rows - 1) x (columns - 1) over the remaining rows and columns, not over
 * the full bin definition. Fewer than two rows or columns left gives a
 * "not-computable" report; an empty log gives "insufficient-data".
 */
export function testIndependence(
  rolls: RollLog,
  set: DieSet,
  options: IndependenceOptions = {}
): ContingencyReport {
  const method = resolvePValueMethod(options.pValueMethod ?? env.PVALUE_METHOD);
  const support = expectedDistribution(set).support();
  const layout = binOutcomes(options.binning ?? EXACT_BINNING, support);
  const table = buildContingencyTable(rolls, layout);

  const activeRows = table.rowTotals.flatMap((t, i) => (t > 0 ? [i] : []));
  const activeColumns = table.columnTotals.flatMap((t, j) => (t > 0 ? [j] : []));
  const droppedRows = table.rows.filter((_, i) => table.rowTotals[i] === 0);
  const droppedColumns = table.columns
    .filter((_, j) => table.columnTotals[j] === 0)
    .map((bin) => bin.label);

  const unavailable = (status: ContingencyReport["status"]): ContingencyReport => ({
    status,
    table,
    expected: [],
    droppedRows,
    droppedColumns,
    chiSquare: NaN,
    degreesOfFreedom: 0,
    pValue: NaN,
    method: method.name,
    cramersV: undefined,
  });

  if (table.grandTotal === 0) return unavailable("insufficient-data");
  if (activeRows.length < 2 || activeColumns.length < 2) {
    logger.debug(
      { rows: activeRows.length, columns: activeColumns.length },
      "contingency table too small for an independence test"
    );
    return unavailable("not-computable");
  }

  const n = table.grandTotal;
  let chiSquare = 0;
  const expected = activeRows.map((i) =>
    activeColumns.map((j) => {
      const e = (table.rowTotals[i] * table.columnTotals[j]) / n;
      chiSquare += (table.counts[i][j] - e) ** 2 / e;
      return e;
    })
  );

  const degreesOfFreedom = (activeRows.length - 1) * (activeColumns.length - 1);
  const { pValue, method: used } = chiSquarePValue(chiSquare, degreesOfFreedom, method);

  return {
    status: "ok",
    table,
    expected,
    droppedRows,
    droppedColumns,
    chiSquare,
    degreesOfFreedom,
    pValue,
    method: used,
    cramersV: cramersV(chiSquare, n, activeRows.length, activeColumns.length),
  };
}
