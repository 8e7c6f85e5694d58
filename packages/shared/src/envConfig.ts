import { z } from 'zod';

const TRUE_VALUES = new Set(['1', 'true', 'yes', 'on']);
const FALSE_VALUES = new Set(['0', 'false', 'no', 'off']);
const DEFAULT_LIST_SEPARATOR = /[,\s]+/;

export type EnvSource = Record<string, string | undefined>;

export type LoadEnvConfigOptions = {
  env?: EnvSource;
  context?: string;
};

export class EnvConfigError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[]) {
    super(message);
    this.name = 'EnvConfigError';
    this.issues = issues;
  }
}

function formatIssue(path: (string | number)[], message: string): string {
  const location = path.length > 0 ? path.join('.') : '<root>';
  return `${location}: ${message}`;
}

/**
 * Parses `env` (defaults to `process.env`) with the given schema. Every failing
 * variable is reported in a single {@link EnvConfigError}.
 */
export function loadEnvConfig<TSchema extends z.ZodTypeAny>(
  schema: TSchema,
  options?: LoadEnvConfigOptions
): z.output<TSchema> {
  const envSource: EnvSource = { ...(options?.env ?? process.env) };
  const context = options?.context ?? 'hexcast';

  const result = schema.safeParse(envSource);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => formatIssue(issue.path, issue.message));
    const details = issues.map((issue) => `  - ${issue}`).join('\n');
    throw new EnvConfigError(`[${context}] Invalid environment configuration\n${details}`, issues);
  }

  return result.data;
}

type CommonOptions<T> = {
  required?: boolean;
  defaultValue?: T;
  description?: string;
};

type RawValue = string | number | boolean | string[] | null | undefined;

type Parsed<T> = { ok: true; value: T } | { ok: false; message: string };

function ok<T>(value: T): Parsed<T> {
  return { ok: true, value };
}

function fail<T>(message: string): Parsed<T> {
  return { ok: false, message };
}

function variableName(ctx: z.RefinementCtx, description?: string): string {
  if (description) {
    return description;
  }
  const last = ctx.path.length > 0 ? ctx.path[ctx.path.length - 1] : undefined;
  return last === undefined ? 'value' : String(last);
}

/**
 * Shared wrapper for every variable parser: blank input resolves to the
 * default, a missing required variable is an issue, anything else goes
 * through `parse`.
 */
function envVariable<TInput extends RawValue, TOutput>(
  input: z.ZodType<TInput>,
  options: CommonOptions<TOutput> | undefined,
  parse: (value: NonNullable<TInput>, name: string) => Parsed<TOutput>,
  fallback?: TOutput
) {
  return input.transform((value, ctx): TOutput | undefined => {
    const name = variableName(ctx, options?.description);

    const missing = (): TOutput | undefined => {
      if (options?.defaultValue !== undefined) {
        return options.defaultValue;
      }
      if (options?.required) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Missing required ${name}` });
        return z.NEVER;
      }
      return fallback;
    };

    if (value === null || value === undefined) {
      return missing();
    }
    if (typeof value === 'string' && value.trim() === '') {
      return missing();
    }

    const parsed = parse(value, name);
    if (!parsed.ok) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: parsed.message });
      return z.NEVER;
    }
    return parsed.value;
  });
}

function withinBounds(value: number, name: string, min?: number, max?: number): Parsed<number> {
  if (min !== undefined && value < min) {
    return fail(`${name} must be >= ${min}`);
  }
  if (max !== undefined && value > max) {
    return fail(`${name} must be <= ${max}`);
  }
  return ok(value);
}

export type BooleanVarOptions = CommonOptions<boolean>;

export function booleanVar(options?: BooleanVarOptions) {
  return envVariable(
    z.union([z.string(), z.boolean()]).nullable().optional(),
    options,
    (value, name): Parsed<boolean> => {
      if (typeof value === 'boolean') {
        return ok(value);
      }
      const normalized = value.trim().toLowerCase();
      if (TRUE_VALUES.has(normalized)) {
        return ok(true);
      }
      if (FALSE_VALUES.has(normalized)) {
        return ok(false);
      }
      const accepted = [...TRUE_VALUES, ...FALSE_VALUES].map((entry) => `'${entry}'`).join(', ');
      return fail(`Invalid ${name}. Accepted boolean values: ${accepted}`);
    }
  );
}

export type NumberVarOptions = CommonOptions<number> & {
  min?: number;
  max?: number;
};

export function integerVar(options?: NumberVarOptions) {
  return envVariable(z.union([z.string(), z.number()]).nullable().optional(), options, (value, name): Parsed<number> => {
    const parsed = typeof value === 'number' ? value : Number(value.trim());
    if (!Number.isInteger(parsed)) {
      return fail(`Expected ${name} to be an integer`);
    }
    return withinBounds(parsed, name, options?.min, options?.max);
  });
}

export function numberVar(options?: NumberVarOptions) {
  return envVariable(z.union([z.string(), z.number()]).nullable().optional(), options, (value, name): Parsed<number> => {
    const parsed = typeof value === 'number' ? value : Number.parseFloat(value);
    if (!Number.isFinite(parsed)) {
      return fail(`Expected ${name} to be a number`);
    }
    return withinBounds(parsed, name, options?.min, options?.max);
  });
}

export type StringVarOptions = CommonOptions<string> & {
  lowercase?: boolean;
  allowed?: readonly string[];
};

export function stringVar(options?: StringVarOptions) {
  return envVariable(z.string().optional(), options, (value, name): Parsed<string> => {
    const trimmed = value.trim();
    const normalized = options?.lowercase ? trimmed.toLowerCase() : trimmed;
    if (options?.allowed && !options.allowed.includes(normalized)) {
      return fail(`${name} must be one of ${options.allowed.join(', ')}`);
    }
    return ok(normalized);
  });
}

export type StringListVarOptions = CommonOptions<string[]> & {
  separator?: RegExp | string;
  minLength?: number;
};

export function stringListVar(options?: StringListVarOptions) {
  return envVariable(
    z.union([z.string(), z.array(z.string())]).nullable().optional(),
    options,
    (value, name): Parsed<string[]> => {
      const list = (Array.isArray(value) ? value : value.split(options?.separator ?? DEFAULT_LIST_SEPARATOR))
        .map((entry) => entry.trim())
        .filter((entry) => entry.length > 0);
      if (options?.minLength !== undefined && list.length < options.minLength) {
        return fail(`${name} must list at least ${options.minLength} entries`);
      }
      return ok(list);
    },
    []
  );
}
