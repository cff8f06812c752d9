import { Diagnostic, Severity, FileStats } from '../types/diagnostic.js';
import ansis from 'ansis';

export type OutputFormat = 'pretty' | 'plain' | 'json' | 'compact';
export type ColorMode = 'auto' | 'always' | 'never';

export interface ReporterOptions {
    color: ColorMode;
    format: OutputFormat;
    warningsAsErrors: boolean;
}

export interface FileReport {
    file: string;
    diagnostics: Diagnostic[];
}

export type Print = (line: string) => void;

export class Reporter {
    private options: ReporterOptions;
    private shouldColor: boolean;
    private startTime: number;
    private out: Print;
    private err: Print;

    constructor(options: ReporterOptions, out: Print = console.log, err: Print = console.error) {
        this.options = options;
        this.shouldColor = this.shouldUseColor();
        this.startTime = Date.now();
        this.out = out;
        this.err = err;
    }

    private shouldUseColor(): boolean {
        if (this.options.color === 'never') return false;
        if (this.options.color === 'always') return true;
        if (this.options.format === 'plain') return false; // Plain format never uses color

        const hasColorEnv = process.env.NO_COLOR !== undefined;
        const hasForceColor = process.env.FORCE_COLOR !== undefined;
        const isTTY = process.stdout.isTTY;

        return !hasColorEnv && (hasForceColor || isTTY);
    }

    private getElapsedTime(): string {
        const elapsed = Date.now() - this.startTime;
        return (elapsed / 1000).toFixed(2);
    }

    private colorize(text: string, color: (text: string) => string): string {
        return this.shouldColor ? color(text) : text;
    }

    private getSeverityIcon(severity: Severity): string {
        return severity === 'error' ? '✖' : '⚠';
    }

    private getSeverityColor(severity: Severity): (text: string) => string {
        return severity === 'error' ? ansis.red : ansis.yellow;
    }

    effectiveSeverity(diagnostic: Diagnostic): Severity {
        return this.options.warningsAsErrors ? 'error' : diagnostic.severity;
    }

    formatDiagnostic(diagnostic: Diagnostic): string {
        const { file, code, message, range } = diagnostic;
        const severity = this.effectiveSeverity(diagnostic);
        const location = range ? `:${range.start.line}:${range.start.col}` : '';

        if (this.options.format === 'json') {
            return JSON.stringify({ ...diagnostic, severity });
        }

        if (this.options.format === 'compact') {
            const severityChar = severity === 'error' ? 'E' : 'W';
            return `${file}${location} [${code}] ${severityChar}: ${message}`;
        }

        const icon = this.colorize(this.getSeverityIcon(severity), this.getSeverityColor(severity));
        const severityText = this.colorize(severity.toUpperCase(), this.getSeverityColor(severity));
        const coloredCode = this.colorize(`[${code}]`, ansis.cyan);
        const coloredLocation = this.colorize(`${file}${location}`, ansis.bold);

        return `  ${icon} ${severityText}  ${coloredCode}  ${coloredLocation}  ${message}`;
    }

    printBanner(version: string, fileCount: number): void {
        if (this.options.format === 'json' || this.options.format === 'compact') {
            return;
        }

        const header = this.colorize(`┌ varyaml ${version}  •  Checking ${fileCount} file${fileCount === 1 ? '' : 's'}`, ansis.bold);
        const divider = this.colorize('└────────────────────────────────────────────────────────', ansis.dim);

        this.out(header);
        this.out(divider);
        this.out('');
    }

    printFileReport(report: FileReport): void {
        if (this.options.format === 'json' || this.options.format === 'compact') {
            report.diagnostics.forEach(d => this.out(this.formatDiagnostic(d)));
            return;
        }

        this.out(this.colorize(report.file, ansis.bold));

        if (report.diagnostics.length === 0) {
            this.out(`  ${this.colorize('✓', ansis.green)} ${this.colorize('No issues found', ansis.green)}`);
            return;
        }

        report.diagnostics.forEach(diagnostic => {
            this.out(this.formatDiagnostic(diagnostic));

            if (diagnostic.path && diagnostic.path.length > 0) {
                this.out(this.colorize(`    ↳ ${diagnostic.path.join(' → ')}`, ansis.dim));
            }
        });
    }

    summarize(reports: FileReport[]): { stats: FileStats; errors: number; warnings: number } {
        const stats: FileStats = { total: reports.length, passed: 0, warned: 0, failed: 0 };
        let errors = 0;
        let warnings = 0;

        for (const report of reports) {
            const severities = report.diagnostics.map(d => this.effectiveSeverity(d));
            const fileErrors = severities.filter(s => s === 'error').length;
            const fileWarnings = severities.length - fileErrors;
            errors += fileErrors;
            warnings += fileWarnings;

            if (fileErrors > 0) stats.failed++;
            else if (fileWarnings > 0) stats.warned++;
            else stats.passed++;
        }
        return { stats, errors, warnings };
    }

    printSummary(stats: FileStats, totalErrors: number, totalWarnings: number): void {
        if (this.options.format === 'json') {
            this.out(JSON.stringify({
                summary: { files: stats },
                totals: { errors: totalErrors, warnings: totalWarnings },
                timing: { elapsedSeconds: this.getElapsedTime() }
            }, null, 2));
            return;
        }

        if (this.options.format === 'compact') {
            this.out(`Summary: ${totalErrors} errors, ${totalWarnings} warnings (${this.getElapsedTime()}s)`);
            return;
        }

        this.out('');
        this.out(this.colorize('────────────────────────────────────────────────────────', ansis.dim));
        this.out(this.colorize('Summary', ansis.bold));
        this.out('');

        this.out(this.colorize('Files:', ansis.cyan) + ` ${stats.total}`);
        const passedStr = this.colorize(`Passed: ${stats.passed}`, ansis.green);
        const warnedStr = this.colorize(`Warned: ${stats.warned}`, stats.warned > 0 ? ansis.yellow : ansis.dim);
        const failedStr = this.colorize(`Failed: ${stats.failed}`, stats.failed > 0 ? ansis.red : ansis.dim);
        this.out(`  ${passedStr}  ${warnedStr}  ${failedStr}`);
        this.out('');

        this.out(this.colorize(`Checked ${stats.total} files in ${this.getElapsedTime()}s`, ansis.dim));

        const exitCode = totalErrors > 0 ? 1 : 0;
        this.out(this.colorize(`Exit code: ${exitCode}`, exitCode === 0 ? ansis.green : ansis.red));
    }

    printSuccess(): void {
        if (this.options.format === 'json' || this.options.format === 'compact') {
            return;
        }

        this.out('');
        this.out(`${this.colorize('✓', ansis.green)} ${this.colorize('All checks passed!', ansis.green.bold)}`);
    }

    printError(message: string): void {
        if (this.options.format === 'json') {
            this.err(JSON.stringify({ error: message }));
            return;
        }

        this.err(this.colorize(`Error: ${message}`, ansis.red));
    }

    printWarning(message: string): void {
        if (this.options.format === 'json') {
            this.err(JSON.stringify({ warning: message }));
            return;
        }

        this.err(this.colorize(`Warning: ${message}`, ansis.yellow));
    }
}
