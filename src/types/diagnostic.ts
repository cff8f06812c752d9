export type Severity = 'error' | 'warning';

export type RuleLevel = Severity | 'off';

export interface Location {
    line: number;
    col: number;
    offset: number;
}

export interface Range {
    start: Location;
    end: Location;
}

export interface Diagnostic {
    code: string;
    message: string;
    severity: Severity;
    file: string;
    range?: Range;
    path?: string[]; // Key path within the document (e.g. ['task', 'action'])
}

export interface FileStats {
    total: number;
    passed: number;
    warned: number;
    failed: number;
}
