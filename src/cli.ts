#!/usr/bin/env node

import * as fs from 'node:fs';
import * as path from 'node:path';
import { globby } from 'globby';
import { ConfigError, findConfigFile, loadConfigFile, type ConfigFile } from './core/config.js';
import { correctionReport, groupViolations, textReport, toJsonResult } from './core/format.js';
import { parseCliArgs, resolveSettings, type CliOptions, type EffectiveSettings } from './core/options.js';
import { correctDocument, detectDocumentKind, validateDocument } from './core/router.js';
import type { Correction, Violation } from './core/types.js';

function printUsage() {
    console.log('Usage: classfinal <file>');
    console.log('       cat file.swift | classfinal -');
    console.log('       classfinal <directory>');
    console.log('  - Checks .swift files and Markdown with ```swift fences');
    console.log('  - When a directory is given, scans recursively for .swift/.md/.markdown/.mdx');
    console.log('Options:');
    console.log('  --include, -I              Glob(s) to include (repeatable or comma-separated)');
    console.log('  --exclude, -E              Glob(s) to exclude (repeatable or comma-separated)');
    console.log('  --no-gitignore             Do not respect .gitignore when scanning directories');
    console.log('  --format, -f               Output format: text|json (default: text)');
    console.log('  --config, -c               Path to a config file (default: ./.classfinal.json)');
    console.log('  --severity                 warning|error (default: warning)');
    console.log('  --final-class-modifier     final|static replacement for --fix (default: final)');
    console.log('  --fix                      Rewrite redundant `class` modifiers');
    console.log('  --dry-run, -n              Do not write files (useful with --fix)');
    console.log('  --print-fixed              With --fix, print fixed content for a single file/stdin');
}

function readInput(arg: string): { content: string; filename: string } {
    if (arg === '-') {
        return { content: fs.readFileSync(0, 'utf8'), filename: '<stdin>' };
    }
    if (!fs.existsSync(arg)) {
        console.error(`File not found: ${arg}`);
        process.exit(1);
    }
    return { content: fs.readFileSync(arg, 'utf8'), filename: arg };
}

function isDirectory(p: string) {
    try { return fs.statSync(p).isDirectory(); } catch { return false; }
}

const DEFAULT_INCLUDE_GLOBS = [
    '**/*.swift',
    '**/*.md',
    '**/*.markdown',
    '**/*.mdx',
];

const DEFAULT_IGNORE_DIRS = [
    '**/.git/**',
    '**/node_modules/**',
    '**/.build/**',
    '**/build/**',
    '**/DerivedData/**',
    '**/Pods/**',
    '**/Carthage/**',
    '**/.swiftpm/**',
];

async function listCandidateFiles(root: string, settings: EffectiveSettings): Promise<string[]> {
    const patterns = settings.includeGlobs.length > 0 ? settings.includeGlobs : DEFAULT_INCLUDE_GLOBS;
    const ignore = [
        ...settings.excludeGlobs,
        ...(settings.useGitignore ? [] : DEFAULT_IGNORE_DIRS),
    ];
    const files = await globby(patterns, {
        cwd: path.resolve(root),
        absolute: true,
        dot: true,
        gitignore: settings.useGitignore,
        ignore,
        followSymbolicLinks: false,
    });
    return files.sort();
}

function loadConfig(cli: CliOptions, root: string): ConfigFile | undefined {
    if (cli.configPath) return loadConfigFile(cli.configPath);
    const found = findConfigFile(root);
    return found ? loadConfigFile(found) : undefined;
}

interface FileOutcome {
    file: string;
    content: string;
    violations: Violation[];
    corrections: Correction[];
    snippetCount: number;
    fixed?: string;
}

function processFile(file: string, content: string, cli: CliOptions, settings: EffectiveSettings): FileOutcome {
    const kind = detectDocumentKind(file, content);
    if (!cli.fix) {
        const report = validateDocument(content, kind, settings.rule);
        return { file, content, violations: report.violations, corrections: [], snippetCount: report.snippetCount };
    }
    const res = correctDocument(content, kind, settings.rule);
    return {
        file,
        content: res.contents,
        violations: res.violations,
        corrections: res.corrections,
        snippetCount: res.snippetCount,
        fixed: res.contents,
    };
}

async function runDirectory(root: string, cli: CliOptions, settings: EffectiveSettings) {
    const files = await listCandidateFiles(root, settings);
    const outcomes: FileOutcome[] = [];
    let snippetCount = 0;
    let modifiedCount = 0;
    for (const file of files) {
        const content = fs.readFileSync(file, 'utf8');
        const outcome = processFile(file, content, cli, settings);
        snippetCount += outcome.snippetCount;
        if (outcome.fixed !== undefined && outcome.fixed !== content) {
            if (!cli.dryRun) fs.writeFileSync(file, outcome.fixed, 'utf8');
            modifiedCount++;
        }
        outcomes.push(outcome);
    }

    const all = outcomes.flatMap(o => o.violations);
    const { errs } = groupViolations(all);
    if (cli.format === 'json') {
        const jsonFiles = outcomes.map(o => toJsonResult(o.file, o.violations, o.corrections));
        const payload = {
            valid: errs.length === 0,
            files: jsonFiles,
            errorCount: errs.length,
            warningCount: all.length - errs.length,
            correctionCount: jsonFiles.reduce((n, jf) => n + jf.correctionCount, 0),
            snippetCount,
        };
        console.log(JSON.stringify(payload, null, 2));
        process.exit(errs.length === 0 ? 0 : 1);
    }

    for (const o of outcomes) {
        if (o.corrections.length > 0) console.log(correctionReport(o.file, o.corrections));
    }
    const withViolations = outcomes.filter(o => o.violations.length > 0);
    if (withViolations.length === 0) {
        if (snippetCount === 0) console.log('No Swift sources found.');
        else console.log(modifiedCount > 0 ? `No violations after fixes. Modified ${modifiedCount} file(s).` : 'No violations.');
        process.exit(0);
    }
    for (const o of withViolations) {
        const report = textReport(o.file, o.content, o.violations, { color: process.stderr.isTTY === true });
        console.error(report.trimEnd());
    }
    process.exit(errs.length > 0 ? 1 : 0);
}

function runSingle(target: string, cli: CliOptions, settings: EffectiveSettings) {
    const { content, filename } = readInput(target);
    const outcome = processFile(filename, content, cli, settings);
    const isStdin = filename === '<stdin>';
    if (outcome.fixed !== undefined) {
        if (!cli.dryRun && !isStdin && outcome.fixed !== content) fs.writeFileSync(filename, outcome.fixed, 'utf8');
        if (cli.printFixed || isStdin) process.stdout.write(outcome.fixed);
    }

    const { errs } = groupViolations(outcome.violations);
    if (cli.format === 'json') {
        const json = { ...toJsonResult(filename, outcome.violations, outcome.corrections), snippetCount: outcome.snippetCount };
        console.log(JSON.stringify(json, null, 2));
        process.exit(json.valid ? 0 : 1);
    }

    // fixed content already went to stdout; keep reports off it
    const quietStdout = outcome.fixed !== undefined && (cli.printFixed || isStdin);
    if (outcome.corrections.length > 0) {
        const report = correctionReport(filename, outcome.corrections);
        if (quietStdout) console.error(report); else console.log(report);
    }
    if (outcome.snippetCount === 0) {
        if (!quietStdout) console.log('No Swift sources found.');
    } else if (outcome.violations.length > 0 || !quietStdout) {
        const report = textReport(filename, outcome.content, outcome.violations, { color: process.stderr.isTTY === true });
        if (errs.length > 0 || quietStdout) console.error(report); else console.log(report);
    }
    process.exit(errs.length > 0 ? 1 : 0);
}

async function main() {
    const args = process.argv.slice(2);
    const cli = parseCliArgs(args);
    if (args.length === 0 || cli.help) {
        printUsage();
        process.exit(args.length === 0 ? 1 : 0);
    }
    const target = cli.positionals[0];
    if (!target) {
        printUsage();
        process.exit(1);
    }

    const root = isDirectory(target) ? target : process.cwd();
    const settings = resolveSettings(cli, loadConfig(cli, root));

    if (isDirectory(target)) {
        await runDirectory(target, cli, settings);
        return;
    }
    runSingle(target, cli, settings);
}

main().catch((err: unknown) => {
    if (err instanceof ConfigError) {
        console.error(err.message);
        process.exit(2);
    }
    console.error(err instanceof Error ? (err.stack ?? err.message) : String(err));
    process.exit(1);
});
