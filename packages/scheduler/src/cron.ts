import { parseExpression } from 'cron-parser';
import { DeskpilotError } from '@deskpilot/core';

export class InvalidCronError extends DeskpilotError {
  constructor(
    public readonly expression: string,
    reason: string
  ) {
    super('INVALID_CRON', `Invalid cron expression "${expression}": ${reason}`);
    this.name = 'InvalidCronError';
  }
}

const DAY_PART = /^(\*|(\d+)(?:-(\d+))?)(?:\/(\d+))?$/;

/**
 * Rewrite the day-of-week field (always the last) from Monday = 0 ... Sunday = 6
 * numbering to cron-parser's Sunday = 0. Lists, ranges and steps are expanded;
 * day names (`MON`, `sun`) pass through unchanged.
 *
 * @throws InvalidCronError for day numbers outside 0-6
 */
export function toSundayBased(expression: string): string {
  const fields = expression.trim().split(/\s+/);
  const field = fields[fields.length - 1];
  if (field === '*' || field === '?') return fields.join(' ');

  const days = new Set<number>();
  const names: string[] = [];
  for (const part of field.split(',')) {
    const match = part.match(DAY_PART);
    if (!match) {
      names.push(part);
      continue;
    }
    const [, range, first, last, every] = match;
    const step = every === undefined ? 1 : Number(every);
    const from = range === '*' ? 0 : Number(first);
    const to = range === '*' || (last === undefined && every !== undefined) ? 6 : Number(last ?? first);
    if (from > 6 || to > 6 || from > to || step < 1) {
      throw new InvalidCronError(expression, `day-of-week "${part}" must stay within 0-6 (0 = Monday)`);
    }
    for (let day = from; day <= to; day += step) days.add((day + 1) % 7);
  }

  fields[fields.length - 1] = [...[...days].sort((a, b) => a - b), ...names].join(',');
  return fields.join(' ');
}

/**
 * Check that `expression` has 5 fields (minute first) or 6 (second first)
 * and that cron-parser accepts it.
 *
 * @throws InvalidCronError
 */
export function validateCron(expression: string, timezone?: string): void {
  const fields = expression.trim().split(/\s+/).filter(Boolean);
  if (fields.length !== 5 && fields.length !== 6) {
    throw new InvalidCronError(expression, `expected 5 or 6 fields, got ${fields.length}`);
  }
  const translated = toSundayBased(expression);
  try {
    parseExpression(translated, { tz: timezone });
  } catch (err) {
    throw new InvalidCronError(expression, err instanceof Error ? err.message : String(err));
  }
}

/**
 * Next firing strictly after `from` (epoch ms). Day-of-week 0 is Monday.
 */
export function computeNextRun(expression: string, from: number, timezone?: string): number {
  const interval = parseExpression(toSundayBased(expression), { currentDate: new Date(from), tz: timezone });
  return interval.next().getTime();
}
