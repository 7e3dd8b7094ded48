/**
 * Shape-agnostic traversal of parser output.
 *
 * The walker knows nothing about node types: every object is a map, every
 * array a sequence, anything else a leaf. Whatever the parser version emits,
 * all nested nodes are reached.
 */

export type TreeMap = Readonly<Record<string, unknown>>;

export type TreeValue =
    | { kind: 'map'; value: TreeMap }
    | { kind: 'sequence'; value: readonly unknown[] }
    | { kind: 'scalar' };

export function isTreeMap(value: unknown): value is TreeMap {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function classify(node: unknown): TreeValue {
    if (Array.isArray(node)) {
        return { kind: 'sequence', value: node };
    }
    if (isTreeMap(node)) {
        return { kind: 'map', value: node };
    }
    return { kind: 'scalar' };
}

/**
 * Yields every non-empty map reachable from `node`, `node` included, before
 * descending into its values. Deeply nested input can exhaust the stack; the
 * resulting RangeError is left to the caller.
 */
export function* walkTree(node: unknown): Generator<TreeMap> {
    const tree = classify(node);

    switch (tree.kind) {
        case 'map': {
            const values = Object.values(tree.value);
            if (values.length === 0) return;
            yield tree.value;
            for (const child of values) {
                yield* walkTree(child);
            }
            return;
        }
        case 'sequence':
            for (const child of tree.value) {
                yield* walkTree(child);
            }
            return;
        case 'scalar':
            return;
    }
}

/** The string `type` field of a node, if it has one. */
export function nodeType(node: TreeMap): string | undefined {
    const type = node['type'];
    return typeof type === 'string' ? type : undefined;
}
