export const SYNTHETIC_PREFIX = '__dup';

const SYNTHETIC_PATTERN = new RegExp(`^${SYNTHETIC_PREFIX}_(\\d+)$`);

export interface RegistryEntry {
    id: number;
    /** Path of the duplicated key, from the root; may pass through other synthetic names. */
    path: string[];
}

/**
 * Maps synthetic key ids back to the path of the key they replaced. Filled by
 * the rewriter, read once by the repacker.
 */
export class KeyRegistry {
    private byId = new Map<number, string[]>();
    private nextId = 0;

    register(path: readonly string[]): number {
        const id = this.nextId++;
        this.byId.set(id, [...path]);
        return id;
    }

    get(id: number): string[] | undefined {
        return this.byId.get(id);
    }

    get size(): number {
        return this.byId.size;
    }

    entries(): RegistryEntry[] {
        return Array.from(this.byId, ([id, path]) => ({ id, path }));
    }

    dottedPath(id: number): string | undefined {
        return this.byId.get(id)?.join('.');
    }

    static syntheticName(id: number): string {
        return `${SYNTHETIC_PREFIX}_${id}`;
    }

    static isSyntheticName(name: string): boolean {
        return SYNTHETIC_PATTERN.test(name);
    }
}
