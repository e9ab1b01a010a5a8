import { z } from 'zod';

const TRUE_VALUES = new Set(['1', 'true', 'yes', 'on']);
const FALSE_VALUES = new Set(['0', 'false', 'no', 'off']);

export type EnvSource = Record<string, string | undefined>;

export type LoadEnvConfigOptions = {
  env?: EnvSource;
  context?: string;
};

export class EnvConfigError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message);
    this.name = 'EnvConfigError';
    this.issues = issues;
  }
}

type EnvIssueTarget = {
  path: (string | number)[];
  message: string;
};

function formatIssue({ path, message }: EnvIssueTarget): string {
  const location = path.length > 0 ? path.join('.') : '<root>';
  return `${location}: ${message}`;
}

export function loadEnvConfig<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, options?: LoadEnvConfigOptions): T {
  const envSource: EnvSource = { ...(options?.env ?? process.env) };
  const context = options?.context ?? 'nightlight';

  const result = schema.safeParse(envSource);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => formatIssue({ path: issue.path, message: issue.message }));
    const header = `[${context}] Invalid environment configuration`;
    throw new EnvConfigError(`${header}\n${issues.map((issue) => `  - ${issue}`).join('\n')}`, issues);
  }

  return result.data;
}

function describe(name: string | number | undefined, description?: string): string {
  if (description) {
    return description;
  }
  if (typeof name === 'string' && name.length > 0) {
    return name;
  }
  if (typeof name === 'number') {
    return name.toString();
  }
  return 'value';
}

function isBlank(value: unknown): value is null | undefined | '' {
  return value === null || value === undefined || (typeof value === 'string' && value.trim() === '');
}

type VarOptions<T> = {
  required?: boolean;
  defaultValue?: T;
  description?: string;
};

type Resolution<T> = { kind: 'value'; value: T } | { kind: 'missing' } | { kind: 'invalid' };

/**
 * Shared handling for blank input: default, required issue, or undefined.
 */
function resolveBlank<T>(options: VarOptions<T> | undefined, ctx: z.RefinementCtx, description: string): Resolution<T> {
  if (options?.defaultValue !== undefined) {
    return { kind: 'value', value: options.defaultValue };
  }
  if (options?.required) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Missing required ${description}` });
    return { kind: 'invalid' };
  }
  return { kind: 'missing' };
}

function pathDescription(ctx: z.RefinementCtx, description?: string): string {
  const pathName = ctx.path.length > 0 ? ctx.path[ctx.path.length - 1] : undefined;
  return describe(pathName, description);
}

export type BooleanVarOptions = VarOptions<boolean>;

export function booleanVar(options?: BooleanVarOptions) {
  return z.union([z.string(), z.boolean()]).nullable().optional().transform((value, ctx) => {
    const description = pathDescription(ctx, options?.description);

    if (isBlank(value)) {
      const resolved = resolveBlank(options, ctx, description);
      if (resolved.kind === 'invalid') {
        return z.NEVER;
      }
      return resolved.kind === 'value' ? resolved.value : undefined;
    }

    if (typeof value === 'boolean') {
      return value;
    }

    const normalized = value.trim().toLowerCase();
    if (TRUE_VALUES.has(normalized)) {
      return true;
    }
    if (FALSE_VALUES.has(normalized)) {
      return false;
    }

    const accepted = [...TRUE_VALUES, ...FALSE_VALUES].map((entry) => `'${entry}'`).join(', ');
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `Invalid ${description}. Accepted boolean values: ${accepted}`
    });
    return z.NEVER;
  });
}

export type NumberVarOptions = VarOptions<number> & {
  min?: number;
  max?: number;
};

function numericVar(options: NumberVarOptions | undefined, integer: boolean) {
  return z.union([z.string(), z.number()]).nullable().optional().transform((value, ctx) => {
    const description = pathDescription(ctx, options?.description);

    if (isBlank(value)) {
      const resolved = resolveBlank(options, ctx, description);
      if (resolved.kind === 'invalid') {
        return z.NEVER;
      }
      return resolved.kind === 'value' ? resolved.value : undefined;
    }

    let parsed: number;
    if (typeof value === 'number') {
      parsed = integer ? Math.trunc(value) : value;
    } else {
      const trimmed = value.trim();
      parsed = integer && /^[-+]?\d+$/.test(trimmed) ? Number.parseInt(trimmed, 10) : Number(trimmed);
      if (integer && !Number.isInteger(parsed)) {
        parsed = Number.NaN;
      }
    }

    if (!Number.isFinite(parsed)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Expected ${description} to be ${integer ? 'an integer' : 'a number'}`
      });
      return z.NEVER;
    }

    if (options?.min !== undefined && parsed < options.min) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${description} must be >= ${options.min}` });
      return z.NEVER;
    }

    if (options?.max !== undefined && parsed > options.max) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${description} must be <= ${options.max}` });
      return z.NEVER;
    }

    return parsed;
  });
}

export type IntegerVarOptions = NumberVarOptions;

export function integerVar(options?: IntegerVarOptions) {
  return numericVar(options, true);
}

export function numberVar(options?: NumberVarOptions) {
  return numericVar(options, false);
}

export type StringVarOptions = VarOptions<string> & {
  lowercase?: boolean;
  pattern?: RegExp;
};

export function stringVar(options?: StringVarOptions) {
  return z.string().nullable().optional().transform((value, ctx) => {
    const description = pathDescription(ctx, options?.description);

    if (isBlank(value)) {
      const resolved = resolveBlank(options, ctx, description);
      if (resolved.kind === 'invalid') {
        return z.NEVER;
      }
      if (resolved.kind === 'missing') {
        return undefined;
      }
      return options?.lowercase ? resolved.value.toLowerCase() : resolved.value;
    }

    const trimmed = value.trim();
    const normalized = options?.lowercase ? trimmed.toLowerCase() : trimmed;

    if (options?.pattern && !options.pattern.test(normalized)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `${description} does not match expected pattern`
      });
      return z.NEVER;
    }

    return normalized;
  });
}

export type EnumVarOptions<T extends string> = VarOptions<T> & {
  values: readonly T[];
};

export function enumVar<T extends string>(options: EnumVarOptions<T>) {
  return z.string().nullable().optional().transform((value, ctx): T | undefined => {
    const description = pathDescription(ctx, options.description);

    if (isBlank(value)) {
      const resolved = resolveBlank(options, ctx, description);
      if (resolved.kind === 'invalid') {
        return z.NEVER;
      }
      return resolved.kind === 'value' ? resolved.value : undefined;
    }

    const normalized = value.trim().toLowerCase();
    const match = options.values.find((candidate) => candidate === normalized);
    if (!match) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `${description} must be one of ${options.values.join(', ')}`
      });
      return z.NEVER;
    }
    return match;
  });
}
