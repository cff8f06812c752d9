import { decodeRewritten, stripBom } from '../parser/yaml.js';
import { PathAccessor } from './accessor.js';
import type { PathLike } from './path/ast.js';
import { repack } from './repack.js';
import { rewriteDuplicates, RewriteResult } from './rewrite/rewriter.js';
import { dumps, DumpOptions } from './serializer.js';
import type { VarMapping, VarValue } from './value/types.js';

export interface ParsedVariants {
    data: VarMapping;
    rewrite: RewriteResult;
}

/** Runs the whole pipeline: rewrite, decode, repack. Throws `ParseError` if decoding fails. */
export function parseVariants(text: string): ParsedVariants {
    const rewrite = rewriteDuplicates(stripBom(text));
    const decoded = decodeRewritten(rewrite);
    return { data: repack(decoded, rewrite.registry), rewrite };
}

/**
 * A parsed document.
 *
 * ```
 * val1: 1
 * val2: 2
 *     val3: 3
 *     val3: 4
 *         val5: 5
 * ```
 *
 * loads as
 *
 * ```json
 * { "val1": 1, "val2": { "__val__": 2, "val3": [3, { "__val__": 4, "val5": 5 }] } }
 * ```
 *
 * so `get(['val2', val('val3')])` is `[3, 4]` and `get(['val2', 'val3[1]'])`
 * is `{ "__val__": 4, "val5": 5 }`.
 */
export class VarDocument {
    private accessor: PathAccessor;

    constructor(private readonly root: VarMapping) {
        this.accessor = new PathAccessor(root);
    }

    static load(text: string): VarDocument {
        return new VarDocument(parseVariants(text).data);
    }

    static parse(text: string): VarMapping {
        return parseVariants(text).data;
    }

    get(path: PathLike): VarValue {
        return this.accessor.get(path);
    }

    has(path: PathLike): boolean {
        return this.accessor.has(path);
    }

    set(path: PathLike, value: VarValue): void {
        this.accessor.set(path, value);
    }

    /** Live, read-only view of the repacked data. */
    get data(): Readonly<VarMapping> {
        return this.root;
    }

    copy(): VarMapping {
        return structuredClone(this.root);
    }

    dump(options?: DumpOptions): string {
        return dumps(this.root, options);
    }
}
