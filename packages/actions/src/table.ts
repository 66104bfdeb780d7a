import { ReasonCodes, Result, isRecord, selectorKey, type ActionHandler, type JSONSchema } from '@deskpilot/core';
import type { TableBackend, TableRow } from './backends';
import { defineAction } from './define-action';

export type RowCriteria = Record<string, string | number | boolean>;

/** Every criterion must equal the cell's text */
export function rowMatches(row: TableRow, criteria: RowCriteria): boolean {
  return Object.entries(criteria).every(([column, expected]) => row.cells[column] === String(expected));
}

/**
 * Parse a wizard query such as `name=Alice&dept=Ops` into row criteria.
 * Pairs split on `&`, then on the first `=`; both sides are trimmed and
 * taken literally (no `+` or `%xx` decoding).
 */
export function parseRowQuery(query: string): RowCriteria {
  const criteria: RowCriteria = {};
  for (const pair of query.split('&')) {
    const eq = pair.indexOf('=');
    if (eq < 0) continue;
    const column = pair.slice(0, eq).trim();
    if (column) criteria[column] = pair.slice(eq + 1).trim();
  }
  return criteria;
}

function isTableRow(value: unknown): value is TableRow {
  return isRecord(value) && typeof value.index === 'number' && isRecord(value.cells);
}

interface FindRowParams {
  criteria: RowCriteria;
}

interface SelectRowParams {
  row?: TableRow;
  index?: number;
}

interface WizardParams {
  query: string;
  select?: boolean;
}

const criteriaSchema: JSONSchema = {
  type: 'object',
  minProperties: 1,
  additionalProperties: { type: ['string', 'number', 'boolean'] },
};

export function createTableActions(tables: TableBackend): ActionHandler[] {
  return [
    defineAction<FindRowParams>({
      name: 'find_row',
      title: 'Find table row',
      description: 'Return the first row whose cells equal every criterion',
      category: 'table',
      requiresSelector: true,
      paramsSchema: {
        type: 'object',
        required: ['criteria'],
        properties: { criteria: criteriaSchema },
      },
      async run({ criteria }, { selector = '' }) {
        const rows = await tables.rows(selector);
        const row = rows.find(r => rowMatches(r, criteria));
        if (!row) {
          return Result.failure(ReasonCodes.RowNotFound, `No row in ${selectorKey(selector)} matches the criteria`, {
            criteria,
          });
        }
        return Result.success(row);
      },
    }),

    defineAction<SelectRowParams>({
      name: 'row.select',
      title: 'Select table row',
      description: 'Select a row given by index or by a row found earlier',
      category: 'table',
      requiresSelector: true,
      paramsSchema: {
        type: 'object',
        properties: {
          row: {
            type: 'object',
            required: ['index', 'cells'],
            properties: { index: { type: 'integer', minimum: 0 }, cells: { type: 'object' } },
          },
          index: { type: 'integer', minimum: 0 },
        },
      },
      async run(params, { selector = '' }) {
        const index = params.row?.index ?? params.index;
        if (index === undefined) {
          return Result.failure(ReasonCodes.InvalidParams, 'row.select needs "row" or "index"');
        }
        await tables.selectRow(selector, index);
        return Result.success(params.row ?? { index });
      },
    }),

    defineAction<WizardParams>({
      name: 'table.wizard',
      title: 'Table wizard',
      description: 'Find a row from a query like "name=Alice&dept=Ops" and optionally select it',
      category: 'table',
      requiresSelector: true,
      paramsSchema: {
        type: 'object',
        required: ['query'],
        properties: {
          query: { type: 'string', minLength: 1 },
          select: { type: 'boolean', default: true },
        },
      },
      async run({ query, select = true }, { selector, invoke }) {
        const criteria = parseRowQuery(query);
        if (Object.keys(criteria).length === 0) {
          return Result.failure(ReasonCodes.InvalidParams, `Query "${query}" has no column=value pairs`);
        }

        const found = await invoke('find_row', selector, { criteria });
        if (found.outcome === 'failure' || !select) return found;

        if (!isTableRow(found.output)) {
          return Result.failure(ReasonCodes.ActionError, 'find_row returned no row');
        }
        return invoke('row.select', selector, { row: found.output });
      },
    }),
  ];
}
