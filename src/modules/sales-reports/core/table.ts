/**
 * Tabular projection of report results.
 *
 * Turns typed rows into plain JSON cells in catalogue column order.
 * Decimals become plain-notation strings so no precision is lost.
 */

import { Decimal } from 'decimal.js';

import { getSalesReportDefinition } from './catalogue.js';

import type { ReportCell, SalesReportResult, SalesReportTable } from './types.js';

/**
 * Converts a single value to a JSON cell.
 */
export const toReportCell = (value: unknown): ReportCell => {
  if (value === null || value === undefined) {
    return null;
  }
  if (Decimal.isDecimal(value)) {
    return value.toFixed();
  }
  if (typeof value === 'number' || typeof value === 'string') {
    return value;
  }
  return String(value);
};

const toCells = (record: object): Map<string, ReportCell> =>
  new Map(Object.entries(record).map(([key, value]) => [key, toReportCell(value)]));

/**
 * Projects a report result onto columns and rows.
 */
export const toReportTable = (result: SalesReportResult): SalesReportTable => {
  const { columns } = getSalesReportDefinition(result.report);

  const resultRows: readonly object[] = result.rows;
  const rows = resultRows.map((row) => {
    const cells = toCells(row);
    return Object.fromEntries(columns.map((column) => [column.name, cells.get(column.name) ?? null]));
  });

  return {
    report: result.report,
    parameters: Object.fromEntries(toCells(result.parameters)),
    columns,
    rows,
  };
};
