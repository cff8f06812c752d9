export { VarDocument, parseVariants } from './core/document.js';
export type { ParsedVariants } from './core/document.js';
export { PathAccessor, resolvePath, assignPath, normalizePath } from './core/accessor.js';
export { val, keyRef, isSegment } from './core/path/ast.js';
export type { Segment, KeySegment, IndexSegment, ValueSegment, PathInput, PathLike } from './core/path/ast.js';
export { parsePath, parsePathOrThrow, formatPath, PathSyntaxError } from './core/path/parser.js';
export { rewriteDuplicates } from './core/rewrite/rewriter.js';
export type { RewriteResult, SourceLine, SyntheticRename } from './core/rewrite/rewriter.js';
export { computeIndentUnit, classifyLine } from './core/rewrite/indent.js';
export type { LineShape } from './core/rewrite/indent.js';
export { KeyRegistry, SYNTHETIC_PREFIX } from './core/registry.js';
export { repack, mergeMappings } from './core/repack.js';
export { dumps, DEFAULT_INDENT } from './core/serializer.js';
export type { DumpOptions } from './core/serializer.js';
export { decodeRewritten } from './parser/yaml.js';
export { ParseError, PathLookupError, KeyNotFoundError, IndexOutOfRangeError, UnsupportedSegmentError } from './core/errors.js';
export { OWN_VALUE_KEY, isMapping, isSequence } from './core/value/types.js';
export type { VarValue, VarMapping, VarSequence, VarScalar } from './core/value/types.js';
export { Workspace } from './core/workspace.js';
export type { CheckedFile, WorkspaceOptions } from './core/workspace.js';
export { loadConfig, resolveConfig, ConfigError } from './core/config.js';
export type { ResolvedConfig } from './core/config.js';
export type { Diagnostic, Severity, Range, Location } from './types/diagnostic.js';
