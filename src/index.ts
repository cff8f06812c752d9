#!/usr/bin/env node
import { Command } from 'commander';
import { readFileSync, writeFileSync, existsSync, statSync } from 'fs';
import path from 'path';
import { ConfigError, defaultConfig, loadConfig, ResolvedConfig } from './core/config.js';
import { VarDocument } from './core/document.js';
import { ParseError, PathLookupError, UnsupportedSegmentError } from './core/errors.js';
import { parsePathOrThrow, PathSyntaxError } from './core/path/parser.js';
import { ColorMode, OutputFormat, Reporter } from './core/reporter.js';
import { Workspace } from './core/workspace.js';
import { decodeValue } from './parser/yaml.js';

const pkg: unknown = JSON.parse(readFileSync(new URL('../package.json', import.meta.url), 'utf8'));
const version = typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string' ? pkg.version : '0.0.0';

interface CheckOptions {
    format: OutputFormat;
    color: ColorMode;
    config?: string;
    profile?: string;
    ignore: string[];
    strict: boolean;
    warningsAsErrors: boolean;
    maxWarnings: string;
}

const collect = (val: string, memo: string[]) => { memo.push(val); return memo; };

function fail(message: string): never {
    console.error(`Error: ${message}`);
    process.exit(1);
}

/** Library errors a command reports as a one-line failure instead of a stack trace. */
function isUserError(e: unknown): e is Error {
    return e instanceof ParseError
        || e instanceof PathLookupError
        || e instanceof PathSyntaxError
        || e instanceof UnsupportedSegmentError
        || e instanceof ConfigError;
}

function run(action: () => void): void {
    try {
        action();
    } catch (e) {
        if (isUserError(e)) fail(e.message);
        throw e;
    }
}

function readDocument(file: string): VarDocument {
    if (!existsSync(file)) fail(`File not found: ${file}`);
    return VarDocument.load(readFileSync(file, 'utf8'));
}

function configFor(file: string, options: { config?: string; profile?: string }): ResolvedConfig {
    return loadConfig(path.dirname(path.resolve(file)), { configPath: options.config, profile: options.profile });
}

const program = new Command();

program
    .name('varyaml')
    .description('Read, lint and rewrite YAML documents with duplicate keys and inline own values')
    .version(version);

program
    .command('check')
    .description('Lint a document, or every matching document under a directory')
    .argument('<path>', 'File or directory to check')
    .option('--format <pretty|plain|json|compact>', 'Output format', 'pretty')
    .option('--color <auto|always|never>', 'Color output', 'auto')
    .option('--config <path>', `Path to a config file (defaults to .varyaml.yml in the checked directory)`)
    .option('--profile <name>', 'Use a named profile from the config file')
    .option('--ignore <glob>', 'Ignore files matching the glob (repeatable)', collect, [])
    .option('--strict', 'Treat warnings as errors', false)
    .option('--warnings-as-errors', 'Treat warnings as errors', false)
    .option('--max-warnings <number>', 'Maximum number of warnings allowed', '-1')
    .action(async (targetPath: string, options: CheckOptions) => {
        const reporter = new Reporter({
            color: options.color,
            format: options.format,
            warningsAsErrors: options.strict || options.warningsAsErrors
        });

        if (!existsSync(targetPath)) {
            reporter.printError(`Path not found: ${targetPath}`);
            process.exit(1);
        }
        const root = statSync(targetPath).isDirectory() ? targetPath : path.dirname(targetPath);

        let config: ResolvedConfig;
        try {
            config = loadConfig(root, { configPath: options.config, profile: options.profile });
        } catch (e) {
            if (!(e instanceof ConfigError)) throw e;
            reporter.printWarning(`${e.message} (${e.file}); using defaults`);
            config = defaultConfig();
        }

        const workspace = new Workspace(targetPath, {
            include: config.include,
            ignore: [...config.ignore, ...options.ignore],
            rules: config.rules
        });
        const files = await workspace.load();

        reporter.printBanner(version, files.length);
        for (const file of files) {
            reporter.printFileReport({ file: path.relative(process.cwd(), file.file) || file.file, diagnostics: file.diagnostics });
        }

        const { stats, errors, warnings } = reporter.summarize(files);
        reporter.printSummary(stats, errors, warnings);

        if (errors === 0 && warnings === 0) {
            reporter.printSuccess();
        }

        if (errors > 0) process.exit(1);

        const maxWarnings = parseInt(options.maxWarnings, 10);
        if (maxWarnings >= 0 && warnings > maxWarnings) {
            reporter.printError(`Failing due to exceeding max warnings (${warnings} > ${maxWarnings}).`);
            process.exit(1);
        }
    });

program
    .command('get')
    .description('Print the value at a path as JSON, e.g. "task[1].val(action)"')
    .argument('<file>', 'Document to read')
    .argument('<path>', 'Path expression')
    .action((file: string, pathText: string) => run(() => {
        const doc = readDocument(file);
        console.log(JSON.stringify(doc.get(parsePathOrThrow(pathText)), null, 2));
    }));

program
    .command('set')
    .description('Assign a value at a path and print (or write) the re-serialized document')
    .argument('<file>', 'Document to update')
    .argument('<path>', 'Path expression')
    .argument('<value>', 'New value, as a YAML scalar or flow collection')
    .option('--write', 'Write the result back to the file', false)
    .option('--config <path>', 'Path to a config file')
    .option('--profile <name>', 'Use a named profile from the config file')
    .action((file: string, pathText: string, valueText: string, options: { write: boolean; config?: string; profile?: string }) => run(() => {
        const config = configFor(file, options);
        const doc = readDocument(file);
        doc.set(parsePathOrThrow(pathText), decodeValue(valueText));
        const text = doc.dump({ indent: config.indent });
        if (options.write) {
            writeFileSync(file, text + '\n', 'utf8');
        } else {
            console.log(text);
        }
    }));

program
    .command('dump')
    .description('Print the re-serialized document, or its data as JSON')
    .argument('<file>', 'Document to read')
    .option('--json', 'Print the repacked data as JSON', false)
    .option('--indent <number>', 'Spaces per level (overrides the config file)')
    .option('--config <path>', 'Path to a config file')
    .option('--profile <name>', 'Use a named profile from the config file')
    .action((file: string, options: { json: boolean; indent?: string; config?: string; profile?: string }) => run(() => {
        const doc = readDocument(file);
        if (options.json) {
            console.log(JSON.stringify(doc.data, null, 2));
            return;
        }
        const indent = options.indent !== undefined ? parseInt(options.indent, 10) : configFor(file, options).indent;
        if (!Number.isInteger(indent) || indent <= 0) fail(`Invalid indent: ${options.indent}`);
        console.log(doc.dump({ indent }));
    }));

program.parseAsync().catch((e: unknown) => {
    console.error(e);
    process.exit(1);
});
