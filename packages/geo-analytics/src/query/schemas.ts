import { z } from 'zod';
import { AGG_FUNCTIONS } from '../types';

const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
const TIME_PATTERN = /^(\d{2}):(\d{2})(?::(\d{2}))?$/;

function isCalendarDate(value: string): boolean {
  const match = DATE_PATTERN.exec(value);
  if (!match) {
    return false;
  }
  const [year, month, day] = [Number(match[1]), Number(match[2]), Number(match[3])];
  const date = new Date(Date.UTC(year, month - 1, day));
  return date.getUTCFullYear() === year && date.getUTCMonth() === month - 1 && date.getUTCDate() === day;
}

export const localDateSchema = z
  .string()
  .trim()
  .refine(isCalendarDate, { message: 'dates must use YYYY-MM-DD' });

/** Accepts `HH:mm` or `HH:mm:ss`, normalized to `HH:mm:ss`. */
export const timeOfDaySchema = z
  .string()
  .trim()
  .transform((value, ctx) => {
    const match = TIME_PATTERN.exec(value);
    const hours = match ? Number(match[1]) : Number.NaN;
    const minutes = match ? Number(match[2]) : Number.NaN;
    const seconds = match?.[3] ? Number(match[3]) : 0;
    if (!match || hours > 23 || minutes > 59 || seconds > 59) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'times must use HH:mm or HH:mm:ss' });
      return z.NEVER;
    }
    return [hours, minutes, seconds].map((part) => String(part).padStart(2, '0')).join(':');
  });

export const dateRangeSchema = z
  .object({
    start: localDateSchema,
    end: localDateSchema
  })
  .refine((range) => range.start <= range.end, {
    message: 'dateRange.start must be on or before dateRange.end',
    path: ['start']
  });

export const timeRangeSchema = z.object({
  start: timeOfDaySchema,
  end: timeOfDaySchema
});

export const valueRangeSchema = z
  .object({
    min: z.number().finite(),
    max: z.number().finite()
  })
  .refine((range) => range.min <= range.max, {
    message: 'valueFilter.min must not exceed valueFilter.max',
    path: ['min']
  });

/** Blank input or `All` selects every cell. */
export const cellFilterSchema = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value && value.length > 0 && value.toLowerCase() !== 'all' ? value : undefined));

export const aggregationSpecSchema = z.object({
  dataset: z.string().trim().min(1),
  dimension: z.string().trim().min(1),
  metric: z.string().trim().min(1),
  resolution: z.number().int(),
  /** Exact names only; `sum` is not `SUM`. */
  aggFunction: z.string().pipe(z.enum(AGG_FUNCTIONS)),
  dateRange: dateRangeSchema.optional(),
  timeRange: timeRangeSchema.optional(),
  cellFilter: cellFilterSchema,
  valueFilter: valueRangeSchema.optional()
});

export type AggregationSpecInput = z.input<typeof aggregationSpecSchema>;
