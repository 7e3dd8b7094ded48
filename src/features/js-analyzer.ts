import { parse, type ParserOptions } from '@babel/parser';
import { logger } from '../core/logger.js';
import { charLength, truncate } from './text.js';
import { isTreeMap, nodeType, walkTree, type TreeMap } from './tree-walker.js';
import type { FragmentRecord, IdentifierCatalog } from './types.js';

// Script goal, keep going after recoverable errors, and expose the token stream.
// Event handlers are function bodies, so a bare `return` is legal there.
// ESTree shapes: methods wrap a FunctionExpression, optional calls are CallExpressions.
const PARSER_OPTIONS: ParserOptions = {
    sourceType: 'script',
    errorRecovery: true,
    tokens: true,
    allowReturnOutsideFunction: true,
    plugins: ['estree'],
};

const FUNCTION_DECLARATION_TYPES = new Set(['FunctionDeclaration']);
// Function expressions are counted with calls: payloads wrap most code in IIFEs.
const CALL_LIKE_TYPES = new Set(['CallExpression', 'FunctionExpression']);

const IDENTIFIER_TOKEN = 'name';
// Text between the backquotes of a template literal, without the quotes
const TEMPLATE_TOKEN = 'template';

/*
 * Tokens whose source text equals this marker are collected for
 * `js_string_max_length`. A string literal's text includes its quotes, so real
 * literals never match and the feature stays 0 on almost every page. Existing
 * datasets were produced this way; see DESIGN.md before changing it.
 */
const STRING_TOKEN_MARKER = 'string';

type Bucket = 'domObjects' | 'properties' | 'methods';

// Checked in this order; a name listed in several catalogs counts only once.
const BUCKET_PRIORITY: readonly Bucket[] = ['domObjects', 'properties', 'methods'];

function zeroCounts(names: readonly string[]): Record<string, number> {
    const counts: Record<string, number> = {};
    for (const name of names) {
        counts[name] = 0;
    }
    return counts;
}

function tokenLabel(token: TreeMap): string | undefined {
    const type = token['type'];
    if (typeof type === 'string') return type;
    // Babel 7 exposes token types as objects carrying a label
    const label = isTreeMap(type) ? type['label'] : undefined;
    return typeof label === 'string' ? label : undefined;
}

function tokenText(token: TreeMap, source: string): string | undefined {
    const { start, end } = token;
    if (typeof start !== 'number' || typeof end !== 'number') return undefined;
    return source.slice(start, end);
}

export class JsFragmentAnalyzer {
    private readonly buckets: ReadonlyArray<{ bucket: Bucket; names: ReadonlySet<string> }>;

    constructor(readonly catalogs: IdentifierCatalog) {
        this.buckets = BUCKET_PRIORITY.map(bucket => ({ bucket, names: new Set(catalogs[bucket]) }));
    }

    /**
     * Features of one fragment, or `null` when it cannot be parsed at all.
     * Failed fragments must be left out of aggregation, not zero-filled.
     */
    analyze(source: string, origin = 'unknown'): FragmentRecord | null {
        try {
            return this.analyzeUnchecked(source);
        } catch (error) {
            if (error instanceof SyntaxError || error instanceof RangeError) {
                logger.warn(`Invalid JS in ${origin}, on code: ${truncate(source)}`, {
                    error: error.message,
                });
                return null;
            }
            throw error;
        }
    }

    private analyzeUnchecked(source: string): FragmentRecord {
        const ast = parse(source, PARSER_OPTIONS);

        const record: FragmentRecord = {
            length: charLength(source),
            domObjects: zeroCounts(this.catalogs.domObjects),
            properties: zeroCounts(this.catalogs.properties),
            methods: zeroCounts(this.catalogs.methods),
            functionDeclarations: 0,
            calls: 0,
            maxStringLength: 0,
        };

        // Syntactic pass
        for (const node of walkTree(ast.program.body)) {
            const type = nodeType(node);
            if (type === undefined) continue;

            if (FUNCTION_DECLARATION_TYPES.has(type)) {
                record.functionDeclarations++;
            } else if (CALL_LIKE_TYPES.has(type)) {
                record.calls++;
            }
        }

        // Lexical pass: aliasing (`var f = alert; f()`) still shows up as identifier tokens
        const tokens: unknown[] = ast.tokens ?? [];
        const strings: string[] = [];

        for (const token of tokens) {
            if (!isTreeMap(token)) continue;

            const label = tokenLabel(token);
            if (label === IDENTIFIER_TOKEN) {
                const name = token['value'];
                if (typeof name === 'string') {
                    this.countIdentifier(record, name);
                }
                continue;
            }
            if (label === TEMPLATE_TOKEN) continue;

            const text = tokenText(token, source);
            if (text === STRING_TOKEN_MARKER) {
                strings.push(text);
            }
        }

        record.maxStringLength = strings.reduce((max, text) => Math.max(max, charLength(text)), 0);

        return record;
    }

    private countIdentifier(record: FragmentRecord, name: string): void {
        for (const { bucket, names } of this.buckets) {
            if (names.has(name)) {
                record[bucket][name]++;
                return;
            }
        }
    }
}
