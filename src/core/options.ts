import type { OutputFormat } from './format.js';
import { ConfigError, FinalClassModifierSchema, SeveritySchema, toRuleOptions, type ConfigFile } from './config.js';
import type { RuleOptions } from './types.js';

export interface CliOptions {
    format: OutputFormat;
    fix: boolean;
    dryRun: boolean;
    printFixed: boolean;
    configPath?: string;
    severity?: RuleOptions['severity'];
    finalClassModifier?: RuleOptions['finalClassModifier'];
    includeGlobs: string[];
    excludeGlobs: string[];
    useGitignore?: boolean;
    help: boolean;
    positionals: string[];
}

function splitGlobs(v: string): string[] {
    return v.split(',').map(s => s.trim()).filter(Boolean);
}

// Flags taking a value consume the next argument; unknown flags are ignored.
export function parseCliArgs(args: string[]): CliOptions {
    const opts: CliOptions = {
        format: 'text',
        fix: false,
        dryRun: false,
        printFixed: false,
        includeGlobs: [],
        excludeGlobs: [],
        help: false,
        positionals: [],
    };
    for (let i = 0; i < args.length; i++) {
        const a = args[i] ?? '';
        const next = args[i + 1];
        if (a === '-h' || a === '--help') { opts.help = true; continue; }
        if (a === '--format' || a === '-f') {
            const v = (next ?? '').toLowerCase();
            if (v === 'json' || v === 'text') { opts.format = v; i++; continue; }
            throw new ConfigError(`Unknown output format: ${next ?? '(missing)'}`);
        }
        if (a === '--fix') { opts.fix = true; continue; }
        if (a === '--dry-run' || a === '-n') { opts.dryRun = true; continue; }
        if (a === '--print-fixed') { opts.printFixed = true; continue; }
        if (a === '--config' || a === '-c') {
            if (!next) throw new ConfigError('--config requires a path');
            opts.configPath = next; i++; continue;
        }
        if (a === '--severity') {
            const res = SeveritySchema.safeParse(next);
            if (!res.success) throw new ConfigError(`Invalid --severity: ${next ?? '(missing)'} (expected warning|error)`);
            opts.severity = res.data; i++; continue;
        }
        if (a === '--final-class-modifier') {
            const res = FinalClassModifierSchema.safeParse(next);
            if (!res.success) throw new ConfigError(`Invalid --final-class-modifier: ${next ?? '(missing)'} (expected final|static)`);
            opts.finalClassModifier = res.data; i++; continue;
        }
        if (a === '--include' || a === '-I') {
            if (next) { opts.includeGlobs.push(...splitGlobs(next)); i++; continue; }
        }
        if (a === '--exclude' || a === '-E') {
            if (next) { opts.excludeGlobs.push(...splitGlobs(next)); i++; continue; }
        }
        if (a === '--no-gitignore') { opts.useGitignore = false; continue; }
        if (a === '--gitignore') { opts.useGitignore = true; continue; }
        if (a === '-' || !a.startsWith('-')) opts.positionals.push(a);
    }
    return opts;
}

export interface EffectiveSettings {
    rule: RuleOptions;
    includeGlobs: string[];
    excludeGlobs: string[];
    useGitignore: boolean;
}

/** Command-line flags win over the config file; the config file wins over defaults. */
export function resolveSettings(cli: CliOptions, config: ConfigFile | undefined): EffectiveSettings {
    const fromFile = toRuleOptions(config?.non_overridable_class_declaration);
    return {
        rule: {
            severity: cli.severity ?? fromFile.severity,
            finalClassModifier: cli.finalClassModifier ?? fromFile.finalClassModifier,
        },
        includeGlobs: cli.includeGlobs.length > 0 ? cli.includeGlobs : (config?.include ?? []),
        excludeGlobs: [...(config?.exclude ?? []), ...cli.excludeGlobs],
        useGitignore: cli.useGitignore ?? config?.gitignore ?? true,
    };
}
