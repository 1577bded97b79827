#!/usr/bin/env node

import * as fs from 'node:fs';
import * as path from 'node:path';
import { globby } from 'globby';
import { toJsonResult, textReport, type OutputFormat } from './core/format.js';
import { compileDescriptorText, translateExpression, type CompileResult } from './core/service.js';
import type { Diagnostic } from './core/types.js';

function printUsage() {
    console.log('Usage: chart2jani <model.json> [-o out.jani]');
    console.log('       cat model.json | chart2jani - [-o out.jani]');
    console.log('       chart2jani <directory>');
    console.log('       chart2jani expr "<expression>" [--expand]');
    console.log('  - Compiles a model descriptor and the charts it names into a JANI model');
    console.log('  - When a directory is given, compiles every **/*.model.json next to itself as <name>.jani');
    console.log('  - "chart2jani expr" prints the JANI JSON of one expression');
    console.log('Options:');
    console.log('  --output, -o    Output file (default: stdout; "-" for stdout)');
    console.log('  --include, -I   Glob(s) to include in directory mode (repeatable or comma-separated)');
    console.log('  --exclude, -E   Glob(s) to exclude in directory mode (repeatable or comma-separated)');
    console.log('  --no-gitignore  Do not respect .gitignore when scanning directories');
    console.log('  --format, -f    Diagnostics format: text|json (default: text)');
    console.log('  --expand        With expr, rewrite macros into primitive operators');
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

const DEFAULT_INCLUDE_GLOBS = ['**/*.model.json'];

const DEFAULT_IGNORE_DIRS = [
  '**/.git/**',
  '**/node_modules/**',
  '**/dist/**',
  '**/build/**',
  '**/out/**',
  '**/.cache/**',
  '**/coverage/**'
];

async function listCandidateFiles(root: string, includes: string[], excludes: string[], useGitignore: boolean): Promise<string[]> {
    const patterns = includes.length > 0 ? includes : DEFAULT_INCLUDE_GLOBS;
    const ignore = [
      ...excludes,
      ...(useGitignore ? [] : DEFAULT_IGNORE_DIRS),
    ];
    const cwdAbs = path.resolve(root);
    const files = await globby(patterns, {
      cwd: cwdAbs,
      absolute: true,
      dot: true,
      gitignore: useGitignore,
      ignore,
      followSymbolicLinks: false,
    });
    return files.sort();
}

/** Chart references resolve against the descriptor's directory. */
function chartReader(baseDir: string) {
    return (reference: string) => {
        const file = path.resolve(baseDir, reference);
        return fs.existsSync(file) ? fs.readFileSync(file, 'utf8') : undefined;
    };
}

function compileFile(content: string, filename: string): CompileResult {
    const baseDir = filename === '<stdin>' ? process.cwd() : path.dirname(filename);
    return compileDescriptorText(content, chartReader(baseDir));
}

/** `robot.model.json` → `robot.jani`, beside the descriptor. */
function defaultOutputPath(file: string) {
    const base = path.basename(file).replace(/\.model\.json$/i, '').replace(/\.json$/i, '');
    return path.join(path.dirname(file), `${base}.jani`);
}

function reportErrors(filename: string, content: string, errors: Diagnostic[]) {
    // Only JSON syntax errors point into the descriptor text itself.
    const snippetSource = errors.some((e) => e.code === 'IN-JSON') ? content : '';
    console.error(textReport(filename, snippetSource, errors).trimEnd());
}

function handleExprCommand(args: string[]) {
    const expand = args.includes('--expand');
    const source = args.find((a) => !a.startsWith('--'));
    if (source === undefined) {
        console.error('Error: No expression given');
        process.exit(1);
    }
    const result = translateExpression(source, { expand });
    if (result.errors.length > 0) {
        console.error(textReport('<expression>', source, result.errors).trimEnd());
        process.exit(1);
    }
    console.log(JSON.stringify(result.expression, null, 2));
}

function splitGlobs(value: string) {
    return value.split(',').map(s => s.trim()).filter(Boolean);
}

async function main() {
    const args = process.argv.slice(2);

    if (args[0] === 'expr') {
        handleExprCommand(args.slice(1));
        return;
    }

    if (args.length === 0 || args[0] === '-h' || args[0] === '--help') {
        printUsage();
        process.exit(args.length === 0 ? 1 : 0);
    }

    // simple arg parsing: --format json|text (consume flag + value), --output/-o <file>,
    // directory options: --include/-I, --exclude/-E, --no-gitignore
    let format: OutputFormat = 'text';
    let output: string | undefined;
    const includeGlobs: string[] = [];
    const excludeGlobs: string[] = [];
    let useGitignore = true;
    const positionals: string[] = [];
    for (let i = 0; i < args.length; i++) {
        const a = args[i] ?? '';
        const next = args[i + 1];
        if (a === '--format' || a === '-f') {
            const v = (next ?? '').toLowerCase();
            if (v === 'json' || v === 'text') { format = v; i++; continue; }
        }
        if ((a === '--output' || a === '-o') && next !== undefined) { output = next; i++; continue; }
        if ((a === '--include' || a === '-I') && next) { includeGlobs.push(...splitGlobs(next)); i++; continue; }
        if ((a === '--exclude' || a === '-E') && next) { excludeGlobs.push(...splitGlobs(next)); i++; continue; }
        if (a === '--no-gitignore') { useGitignore = false; continue; }
        if (a === '--gitignore') { useGitignore = true; continue; }
        if (a === '-' || !a.startsWith('-')) positionals.push(a);
    }
    const target = positionals[0] ?? args[0] ?? '-';

    // Directory mode
    if (isDirectory(target)) {
        const files = await listCandidateFiles(target, includeGlobs, excludeGlobs, useGitignore);
        const results = files.map((file) => {
            const content = fs.readFileSync(file, 'utf8');
            const result = compileFile(content, file);
            if (result.model) fs.writeFileSync(defaultOutputPath(file), JSON.stringify(result.model, null, 2) + '\n', 'utf8');
            return { file, content, errors: result.errors };
        });
        const failed = results.filter((r) => r.errors.length > 0);
        if (format === 'json') {
            const jsonFiles = results.map((r) => toJsonResult(r.file, r.errors));
            const errorCount = jsonFiles.reduce((n, jf) => n + jf.errorCount, 0);
            console.log(JSON.stringify({ valid: errorCount === 0, files: jsonFiles, errorCount, modelCount: files.length }, null, 2));
            process.exit(errorCount === 0 ? 0 : 1);
        }
        if (files.length === 0) {
            console.log('No model descriptors found.');
            process.exit(0);
        }
        for (const r of failed) reportErrors(r.file, r.content, r.errors);
        console.log(`Compiled ${files.length - failed.length} of ${files.length} model(s).`);
        process.exit(failed.length === 0 ? 0 : 1);
    }

    // Single-file or stdin mode
    const { content, filename } = readInput(target);
    const result = compileFile(content, filename);
    const text = result.model ? JSON.stringify(result.model, null, 2) + '\n' : undefined;
    if (text !== undefined && output !== undefined && output !== '-') {
        fs.writeFileSync(output, text, 'utf8');
        console.error(`Wrote ${output}`);
    }
    const toStdout = output === undefined || output === '-';

    if (format === 'json') {
        const json = toJsonResult(filename, result.errors);
        console.log(JSON.stringify(toStdout && result.model ? { ...json, model: result.model } : json, null, 2));
        process.exit(json.valid ? 0 : 1);
    }
    if (result.errors.length > 0) {
        reportErrors(filename, content, result.errors);
        process.exit(1);
    }
    if (toStdout && text !== undefined) process.stdout.write(text);
}

main().catch((err: unknown) => {
    console.error(err instanceof Error ? err.stack ?? err.message : String(err));
    process.exit(1);
});
