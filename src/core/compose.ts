/**
 * Prototype Composer
 *
 * Builds new object trees from one or more source records. Used by the
 * factories to stamp entities, components and scenes out of shared,
 * frozen prototypes without ever aliasing their nested state.
 *
 * - Plain records are deep-merged
 * - Arrays, Maps and Sets are replaced by a fresh deep copy
 * - Dates and typed arrays are cloned
 * - Functions and other class instances are shared, not copied
 * - Keys whose value is undefined are treated as absent
 * - `__proto__` keys are skipped
 */

/**
 * Keys to skip while composing. A single key or a list of keys.
 */
export type ExcludeKeys = string | readonly string[];

/**
 * Check whether a value is a plain record (object literal or
 * `Object.create(null)`), as opposed to an array or a class instance.
 */
export function isPlainRecord(value: unknown): value is Record<string, unknown> {
    if (typeof value !== 'object' || value === null || Array.isArray(value)) {
        return false;
    }
    const proto: unknown = Object.getPrototypeOf(value);
    return proto === Object.prototype || proto === null;
}

function toKeySet(excludeKeys: ExcludeKeys): ReadonlySet<string> {
    return new Set(typeof excludeKeys === 'string' ? [excludeKeys] : excludeKeys);
}

function checkSource(source: unknown, position: number, caller: string): void {
    if (source === null || typeof source !== 'object') {
        throw new TypeError(
            `${caller}: source at position ${position} must be an object, got ${source === null ? 'null' : typeof source}`
        );
    }
}

/**
 * Copy a nested value so the result shares no mutable structure with it.
 */
function copyValue(value: unknown): unknown {
    if (Array.isArray(value)) {
        return value.map(copyValue);
    }
    if (isPlainRecord(value)) {
        return mergeRecord({}, value, EMPTY_KEYS);
    }
    if (value instanceof Map) {
        const copy = new Map<unknown, unknown>();
        value.forEach((entry: unknown, key: unknown) => copy.set(key, copyValue(entry)));
        return copy;
    }
    if (value instanceof Set) {
        const copy = new Set<unknown>();
        value.forEach((entry: unknown) => copy.add(copyValue(entry)));
        return copy;
    }
    if (value instanceof Date) {
        return new Date(value.getTime());
    }
    if (ArrayBuffer.isView(value)) {
        return structuredClone(value);
    }
    return value;
}

const EMPTY_KEYS: ReadonlySet<string> = new Set();

/** Writing this key through a setter would swap the target's prototype */
const PROTO_KEY = '__proto__';

function mergeRecord(target: object, source: object, exclude: ReadonlySet<string>): object {
    for (const key of Object.keys(source)) {
        if (key === PROTO_KEY || exclude.has(key)) continue;

        const value: unknown = Reflect.get(source, key);
        if (value === undefined) continue;

        const existing: unknown = Reflect.get(target, key);

        if (isPlainRecord(value) && isPlainRecord(existing)) {
            mergeRecord(existing, value, EMPTY_KEYS);
        } else {
            Reflect.set(target, key, copyValue(value));
        }
    }
    return target;
}

/**
 * Deep-compose `sources` into `target`, in order, and return `target`.
 *
 * Later sources win on overlapping scalar keys; nested records are merged
 * key by key rather than replaced. After composition no nested field of the
 * target is shared with any source.
 *
 * @param excludeKeys - Top-level keys of every source to skip
 * @throws TypeError if a source is null, undefined or not an object
 *
 * @example
 * const pos = compose({}, [{ x: 0, y: 0 }, { y: 5 }]);
 * // pos = { x: 0, y: 5 }
 */
export function compose<T extends object>(
    target: T,
    sources: readonly object[],
    excludeKeys: ExcludeKeys = []
): T {
    const exclude = toKeySet(excludeKeys);

    sources.forEach((source, position) => {
        checkSource(source, position, 'compose');
        mergeRecord(target, source, exclude);
    });

    return target;
}

/**
 * Shallow variant of {@link compose}: top-level keys are copied, nested
 * values are shared with the source.
 *
 * @throws TypeError if a source is null, undefined or not an object
 */
export function assign<T extends object>(
    target: T,
    sources: readonly object[],
    excludeKeys: ExcludeKeys = []
): T {
    const exclude = toKeySet(excludeKeys);

    sources.forEach((source, position) => {
        checkSource(source, position, 'assign');
        for (const key of Object.keys(source)) {
            if (key === PROTO_KEY || exclude.has(key)) continue;

            const value: unknown = Reflect.get(source, key);
            if (value !== undefined) {
                Reflect.set(target, key, value);
            }
        }
    });

    return target;
}
