import path from 'path';
import fs from 'fs-extra';
import { z } from 'zod';
import { ConfigError } from './errors';

export const CONFIG_FILE_NAME = '.pydelta.json';

const positiveInt = z.number().int().positive();

export const SmellThresholdsSchema = z
  .object({
    long_function_lines: positiveInt,
    too_many_params: positiveInt,
    deep_nesting_level: positiveInt,
    god_class_methods: positiveInt,
  })
  .strict();

const regexSource = z.string().min(1).refine((src) => {
  try {
    new RegExp(src, 'i');
    return true;
  } catch {
    return false;
  }
}, { message: 'Invalid regular expression' });

export const ShellRuleSchema = z
  .object({
    module: z.string().min(1),
    functions: z.array(z.string().min(1)),
    keyword: z.string().min(1),
  })
  .strict();

export const SecurityPatternSetSchema = z
  .object({
    dangerous_calls: z.array(z.string().min(1)),
    risky_modules: z.record(z.array(z.string().min(1))),
    secret_patterns: z.array(regexSource),
    min_secret_length: positiveInt,
    shell_rule: ShellRuleSchema,
  })
  .strict();

export const AnalysisConfigFileSchema = z
  .object({
    smells: SmellThresholdsSchema.partial().optional(),
    security: SecurityPatternSetSchema.partial().optional(),
  })
  .strict();

type DeepReadonly<T> = T extends (infer U)[]
  ? ReadonlyArray<DeepReadonly<U>>
  : T extends object
    ? { readonly [K in keyof T]: DeepReadonly<T[K]> }
    : T;

export type SmellThresholds = DeepReadonly<z.infer<typeof SmellThresholdsSchema>>;
export type ShellRule = DeepReadonly<z.infer<typeof ShellRuleSchema>>;
export type SecurityPatternSet = DeepReadonly<z.infer<typeof SecurityPatternSetSchema>>;
export type AnalysisConfigInput = z.input<typeof AnalysisConfigFileSchema>;

export interface AnalysisConfig {
  readonly smells: SmellThresholds;
  readonly security: SecurityPatternSet;
}

export function defaultSmellThresholds(): z.infer<typeof SmellThresholdsSchema> {
  return {
    long_function_lines: 50,
    too_many_params: 5,
    deep_nesting_level: 4,
    god_class_methods: 20,
  };
}

export function defaultSecurityPatterns(): z.infer<typeof SecurityPatternSetSchema> {
  return {
    dangerous_calls: ['eval', 'exec', 'compile', '__import__', 'getattr', 'setattr', 'delattr'],
    risky_modules: {
      pickle: ['load', 'loads', 'Unpickler'],
      marshal: ['load', 'loads'],
      shelve: ['open'],
      subprocess: ['call', 'run', 'Popen', 'check_output', 'check_call'],
      os: ['system', 'popen', 'spawn', 'exec'],
      commands: ['getoutput', 'getstatusoutput'],
    },
    secret_patterns: [
      'api[_-]?key|apikey',
      'secret[_-]?key|secretkey',
      'password|passwd|pwd',
      'token|auth[_-]?token',
      'private[_-]?key',
      'access[_-]?key',
      'credentials?',
    ],
    min_secret_length: 6,
    shell_rule: { module: 'subprocess', functions: ['run', 'call', 'Popen'], keyword: 'shell' },
  };
}

function definedOnly(value: object | undefined): Record<string, unknown> {
  if (!value) return {};
  return Object.fromEntries(Object.entries(value).filter(([, v]) => v !== undefined));
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const v of Object.values(value)) deepFreeze(v);
  }
  return value;
}

/**
 * Build the immutable configuration passed to every detector. Overrides
 * replace defaults field by field; unknown keys are rejected.
 */
export function createAnalysisConfig(overrides: unknown = {}): AnalysisConfig {
  const parsed = AnalysisConfigFileSchema.safeParse(overrides);
  if (!parsed.success) {
    throw new ConfigError('Invalid analysis configuration', parsed.error.issues);
  }
  const smells = SmellThresholdsSchema.parse({ ...defaultSmellThresholds(), ...definedOnly(parsed.data.smells) });
  const security = SecurityPatternSetSchema.parse({ ...defaultSecurityPatterns(), ...definedOnly(parsed.data.security) });
  return deepFreeze({ smells, security });
}

export const DEFAULT_CONFIG: AnalysisConfig = createAnalysisConfig();

export async function loadAnalysisConfig(filePath: string, overrides: AnalysisConfigInput = {}): Promise<AnalysisConfig> {
  let raw: unknown;
  try {
    raw = await fs.readJSON(filePath);
  } catch (e) {
    const message = e instanceof Error ? e.message : String(e);
    throw new ConfigError(`Cannot read config file ${filePath}: ${message}`);
  }
  const fileConfig = AnalysisConfigFileSchema.safeParse(raw);
  if (!fileConfig.success) {
    throw new ConfigError(`Invalid config file ${filePath}`, fileConfig.error.issues);
  }
  return createAnalysisConfig({
    smells: { ...definedOnly(fileConfig.data.smells), ...definedOnly(overrides.smells) },
    security: { ...definedOnly(fileConfig.data.security), ...definedOnly(overrides.security) },
  });
}

/** The explicit config path, else `.pydelta.json` in `searchDir` when present. */
export async function findConfigFile(searchDir: string, explicit?: string): Promise<string | null> {
  if (explicit) return path.resolve(explicit);
  const candidate = path.join(searchDir, CONFIG_FILE_NAME);
  return (await fs.pathExists(candidate)) ? candidate : null;
}
