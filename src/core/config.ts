import * as fs from 'node:fs';
import * as path from 'node:path';
import { z } from 'zod';
import type { FinalClassModifier, RuleOptions } from './types.js';

export const CONFIG_FILENAME = '.classfinal.json';

export const SeveritySchema = z.enum(['warning', 'error']);

// `final` is shorthand for the `final class` replacement
export const FinalClassModifierSchema = z
  .enum(['final', 'final class', 'static'])
  .transform((v): FinalClassModifier => (v === 'static' ? 'static' : 'final class'));

export const RuleConfigurationSchema = z
  .object({
    severity: SeveritySchema.default('warning'),
    final_class_modifier: FinalClassModifierSchema.default('final'),
  })
  .strict();

export const ConfigFileSchema = z
  .object({
    include: z.array(z.string()).optional(),
    exclude: z.array(z.string()).optional(),
    gitignore: z.boolean().optional(),
    non_overridable_class_declaration: RuleConfigurationSchema.optional(),
  })
  .strict();

export type RuleConfiguration = z.infer<typeof RuleConfigurationSchema>;
export type ConfigFile = z.infer<typeof ConfigFileSchema>;

export const defaultRuleOptions: RuleOptions = { severity: 'warning', finalClassModifier: 'final class' };

export class ConfigError extends Error {
  constructor(message: string, readonly issues: string[] = []) {
    super(issues.length > 0 ? `${message}\n${issues.map((i) => `  - ${i}`).join('\n')}` : message);
    this.name = 'ConfigError';
  }
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${where}: ${issue.message}`;
  });
}

export function toRuleOptions(config: RuleConfiguration | undefined): RuleOptions {
  if (!config) return { ...defaultRuleOptions };
  return { severity: config.severity, finalClassModifier: config.final_class_modifier };
}

export function parseConfig(raw: unknown, source = 'configuration'): ConfigFile {
  const res = ConfigFileSchema.safeParse(raw);
  if (!res.success) throw new ConfigError(`Invalid ${source}`, formatIssues(res.error));
  return res.data;
}

export function loadConfigFile(file: string): ConfigFile {
  let text: string;
  try {
    text = fs.readFileSync(file, 'utf8');
  } catch (e) {
    throw new ConfigError(`Cannot read ${file}: ${(e as Error).message}`);
  }
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (e) {
    throw new ConfigError(`Invalid JSON in ${file}: ${(e as Error).message}`);
  }
  return parseConfig(raw, file);
}

// Looks for the config file in `dir` only; returns undefined when there is none.
export function findConfigFile(dir: string): string | undefined {
  const candidate = path.join(dir, CONFIG_FILENAME);
  return fs.existsSync(candidate) ? candidate : undefined;
}

export function resolveRuleOptions(options: Partial<RuleOptions> = {}): RuleOptions {
  return {
    severity: options.severity ?? defaultRuleOptions.severity,
    finalClassModifier: options.finalClassModifier ?? defaultRuleOptions.finalClassModifier,
  };
}
