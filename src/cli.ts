#!/usr/bin/env node

import * as fs from 'node:fs';
import * as path from 'node:path';
import { globby } from 'globby';
import { renderDocument } from './core/document.js';
import { textReport, toJsonResult, type DiagramJson, type OutputFormat } from './core/format.js';

const WIDTH_ENV = 'ASCII_DIAGRAMS_WIDTH';

function printUsage() {
    console.log('Usage: ascii-diagrams <file>');
    console.log('       cat file | ascii-diagrams -');
    console.log('       ascii-diagrams <directory>');
    console.log('  - Renders sequence, flowchart/graph and ER diagrams as box-drawing text');
    console.log('  - Markdown files render every ```mermaid fence');
    console.log('  - When a directory is given, scans recursively for .md/.markdown/.mdx/.mmd/.mermaid');
    console.log('Options:');
    console.log(`  --width, -w     Maximum output width in columns (default: $${WIDTH_ENV}, else unlimited)`);
    console.log('  --format, -f    Output format: text|json (default: text)');
    console.log('  --include, -I   Glob(s) to include (repeatable or comma-separated)');
    console.log('  --exclude, -E   Glob(s) to exclude (repeatable or comma-separated)');
    console.log('  --no-gitignore  Do not respect .gitignore when scanning directories');
}

const DEFAULT_INCLUDE_GLOBS = [
    '**/*.md',
    '**/*.markdown',
    '**/*.mdx',
    '**/*.mmd',
    '**/*.mermaid',
];

const DEFAULT_IGNORE_DIRS = [
    '**/.git/**',
    '**/node_modules/**',
    '**/dist/**',
    '**/build/**',
    '**/coverage/**',
];

const MARKDOWN_EXTS = new Set(['.md', '.markdown', '.mdx']);

interface CliOptions {
    format: OutputFormat;
    width?: number;
    include: string[];
    exclude: string[];
    gitignore: boolean;
    positionals: string[];
}

function parseWidth(raw: string | undefined, source: string): number | undefined {
    if (raw === undefined || raw === '') return undefined;
    const n = Number(raw);
    if (!Number.isInteger(n) || n < 1) {
        console.error(`\x1b[31mERROR\x1b[0m: ${source} must be a positive integer, got '${raw}'`);
        process.exit(1);
    }
    return n;
}

function parseArgs(args: string[]): CliOptions {
    const opts: CliOptions = {
        format: 'text',
        width: parseWidth(process.env[WIDTH_ENV], WIDTH_ENV),
        include: [],
        exclude: [],
        gitignore: true,
        positionals: [],
    };
    const globs = (v: string | undefined) => (v ?? '').split(',').map((s) => s.trim()).filter(Boolean);

    for (let i = 0; i < args.length; i++) {
        const a = args[i];
        if (a === '--format' || a === '-f') {
            const v = (args[++i] ?? '').toLowerCase();
            if (v !== 'json' && v !== 'text') {
                console.error(`\x1b[31mERROR\x1b[0m: unknown format '${v}'`);
                process.exit(1);
            }
            opts.format = v;
        } else if (a === '--width' || a === '-w') {
            opts.width = parseWidth(args[++i], a);
        } else if (a.startsWith('--width=')) {
            opts.width = parseWidth(a.slice('--width='.length), '--width');
        } else if (a === '--include' || a === '-I') {
            opts.include.push(...globs(args[++i]));
        } else if (a === '--exclude' || a === '-E') {
            opts.exclude.push(...globs(args[++i]));
        } else if (a === '--no-gitignore') {
            opts.gitignore = false;
        } else if (a === '-' || !a.startsWith('-')) {
            opts.positionals.push(a);
        }
    }
    return opts;
}

async function listCandidateFiles(root: string, opts: CliOptions): Promise<string[]> {
    const files = await globby(opts.include.length > 0 ? opts.include : DEFAULT_INCLUDE_GLOBS, {
        cwd: path.resolve(root),
        absolute: true,
        dot: true,
        gitignore: opts.gitignore,
        ignore: [...opts.exclude, ...(opts.gitignore ? [] : DEFAULT_IGNORE_DIRS)],
        followSymbolicLinks: false,
    });
    return files.sort();
}

function readInput(arg: string): { content: string; filename: string } {
    if (arg === '-') {
        return { content: fs.readFileSync(0, 'utf8'), filename: '<stdin>' };
    }
    if (!fs.existsSync(arg)) {
        console.error(`\x1b[31mERROR\x1b[0m: file not found: ${arg}`);
        process.exit(1);
    }
    return { content: fs.readFileSync(arg, 'utf8'), filename: arg };
}

function isDirectory(p: string) {
    return fs.existsSync(p) && fs.statSync(p).isDirectory();
}

function renderFile(filename: string, content: string, width: number | undefined): DiagramJson[] {
    const markdown = MARKDOWN_EXTS.has(path.extname(filename).toLowerCase());
    return renderDocument(content, { maxWidth: width, markdown });
}

/** Print one file's diagrams; returns whether any failed. */
function printText(filename: string, content: string, diagrams: DiagramJson[], header: boolean): boolean {
    let failed = false;
    if (header) console.log(`\x1b[1m${filename}\x1b[0m`);
    for (const d of diagrams) {
        if (d.ok) {
            if (d.output !== undefined) console.log(d.output);
            if (d.warnings.length > 0) console.error(textReport(filename, content, d.warnings));
        } else {
            failed = true;
            console.error(textReport(filename, content, [...d.errors, ...d.warnings]));
        }
        if (diagrams.length > 1 || header) console.log('');
    }
    return failed;
}

async function main() {
    const args = process.argv.slice(2);
    if (args.length === 0 || args[0] === '-h' || args[0] === '--help') {
        printUsage();
        process.exit(args.length === 0 ? 1 : 0);
    }

    const opts = parseArgs(args);
    const target = opts.positionals[0];
    if (!target) {
        printUsage();
        process.exit(1);
    }

    const inputs: Array<{ filename: string; content: string }> = [];
    if (isDirectory(target)) {
        for (const file of await listCandidateFiles(target, opts)) {
            inputs.push({ filename: file, content: fs.readFileSync(file, 'utf8') });
        }
    } else {
        inputs.push(readInput(target));
    }
    const directoryMode = isDirectory(target);

    const results = inputs.map(({ filename, content }) => ({
        filename,
        content,
        diagrams: renderFile(filename, content, opts.width),
    }));

    if (opts.format === 'json') {
        const files = results.map((r) => toJsonResult(r.filename, r.diagrams));
        const ok = files.every((f) => f.ok);
        console.log(JSON.stringify(directoryMode ? { ok, files } : files[0], null, 2));
        process.exit(ok ? 0 : 1);
    }

    let failed = false;
    let diagramCount = 0;
    for (const r of results) {
        if (r.diagrams.length === 0) continue;
        diagramCount += r.diagrams.length;
        failed = printText(r.filename, r.content, r.diagrams, directoryMode) || failed;
    }
    if (diagramCount === 0) console.log('No diagrams found.');
    process.exit(failed ? 1 : 0);
}

main().catch((err: unknown) => {
    console.error(err instanceof Error ? err.stack ?? err.message : String(err));
    process.exit(1);
});
