/******************************************************************************
 * Copyright 2024 TypeFox GmbH
 * This program and the accompanying materials are made available under the
 * terms of the MIT License, which is available in the project root.
 ******************************************************************************/

import type { SyntaxNode, TreeRoot } from '../syntax/syntax-node.js';
import type { GreenBranch } from '../syntax/green-node.js';
import type { AtomEdit } from './atom-edit.js';
import type { ParseDiagnostic } from './parse-diagnostic.js';
import type { Grammar, Reparser, Token, Tokenizer } from './parser-services.js';
import { GreenBuilder } from '../syntax/green-builder.js';
import { greenText } from '../syntax/green-node.js';
import { findCoveringNode, nextLeaf, previousLeaf } from '../utils/syntax-node-utils.js';
import { replaceRange } from './atom-edit.js';
import { compareDiagnostics, shiftDiagnostic } from './parse-diagnostic.js';

/**
 * The outcome of a successful incremental reparse.
 */
export interface ReparseResult {
    readonly green: GreenBranch;
    readonly errors: ParseDiagnostic[];
}

/**
 * Finds the innermost node enclosing `edit` that has a dedicated grammar entry
 * point, together with that entry point.
 */
export function findReparsableNode<R extends TreeRoot>(
    root: SyntaxNode<R>,
    edit: AtomEdit,
    grammar: Grammar
): { node: SyntaxNode<R>, reparser: Reparser } | undefined {
    const covering = findCoveringNode(root, edit.delete);
    for (const node of covering.ancestors()) {
        const reparser = grammar.reparser(node.kind);
        if (reparser) {
            return { node, reparser };
        }
    }
    return undefined;
}

/**
 * Checks that `tokens` form exactly one delimited unit: the first token opens,
 * the last token closes, and the nesting depth stays positive in between.
 */
export function isBalanced(tokens: readonly Token[], open: Reparser['open'], close: Reparser['close']): boolean {
    if (tokens.length < 2 || tokens[0].kind !== open || tokens[tokens.length - 1].kind !== close) {
        return false;
    }
    let depth = 0;
    for (let i = 0; i < tokens.length; i++) {
        const kind = tokens[i].kind;
        if (kind === open) {
            depth++;
        } else if (kind === close) {
            depth--;
            if (depth < 0 || (depth === 0 && i !== tokens.length - 1)) {
                return false;
            }
        }
    }
    return depth === 0;
}

/**
 * Attempts to reflect `edit` by reparsing only the innermost reparsable node
 * around it. Returns `undefined` whenever that cannot be done safely; the caller
 * then falls back to a full reparse.
 */
export function incrementalReparse<R extends TreeRoot>(
    root: SyntaxNode<R>,
    errors: readonly ParseDiagnostic[],
    edit: AtomEdit,
    tokenizer: Tokenizer,
    grammar: Grammar
): ReparseResult | undefined {
    const found = findReparsableNode(root, edit, grammar);
    if (!found) {
        return undefined;
    }
    const { node, reparser } = found;
    // An unclosed node may own diagnostics sitting on its end offset.
    if (node.firstChild()?.kind !== reparser.open || node.lastChild()?.kind !== reparser.close) {
        return undefined;
    }
    const text = replaceRange(node.text(), edit.delete.shift(-node.offset), edit.insert);
    const tokens = relexInContext(node, text, tokenizer);
    if (!tokens || !isBalanced(tokens, reparser.open, reparser.close)) {
        return undefined;
    }

    const builder = new GreenBuilder();
    reparser.parse(text, tokens, builder);
    const { green, errors: localErrors } = builder.finish();
    if (green.kind !== reparser.kind || green.width !== text.length || greenText(green) !== text) {
        return undefined;
    }

    return {
        green: node.replaceWith(green),
        errors: mergeErrors(errors, localErrors, node.offset, node.end, edit.delta)
    };
}

/**
 * Tokenizes the new text of `node` together with the tokens around it: back to
 * the last token on an earlier line and forward to the next token. Returns the
 * tokens of `text` only if its ends are still token boundaries and the
 * surrounding tokens come out as before the edit.
 */
function relexInContext<R extends TreeRoot>(node: SyntaxNode<R>, text: string, tokenizer: Tokenizer): Token[] | undefined {
    let prefix = '';
    for (let leaf = previousLeaf(node); leaf; leaf = previousLeaf(leaf)) {
        const leafText = leaf.leafText() ?? '';
        prefix = leafText + prefix;
        // Tokens ending before a line break are lexed without looking past it.
        if (/[\n\r]/.test(leafText)) {
            break;
        }
    }
    const suffix = nextLeaf(node)?.leafText() ?? '';
    const before = splitTokens(tokenizer.tokenize(prefix + node.text() + suffix), prefix.length, node.length);
    const after = splitTokens(tokenizer.tokenize(prefix + text + suffix), prefix.length, text.length);
    if (!before || !after || !sameTokens(before.outside, after.outside)) {
        return undefined;
    }
    return after.inside;
}

/**
 * Splits `tokens` into those covering `[start, start + length)` and the others,
 * or returns `undefined` if a token crosses either end.
 */
function splitTokens(tokens: readonly Token[], start: number, length: number): { inside: Token[], outside: Token[] } | undefined {
    const inside: Token[] = [];
    const outside: Token[] = [];
    const end = start + length;
    let offset = 0;
    for (const token of tokens) {
        const tokenEnd = offset + token.len;
        if ((offset < start && tokenEnd > start) || (offset < end && tokenEnd > end)) {
            return undefined;
        }
        if (offset >= start && tokenEnd <= end) {
            inside.push(token);
        } else {
            outside.push(token);
        }
        offset = tokenEnd;
    }
    return { inside, outside };
}

function sameTokens(a: readonly Token[], b: readonly Token[]): boolean {
    return a.length === b.length && a.every((token, i) => token.kind === b[i].kind && token.len === b[i].len);
}

/**
 * Replaces the diagnostics strictly inside the old node `[start, end)` with the
 * diagnostics of the local parse, and moves the ones after it by `delta`.
 */
function mergeErrors(
    errors: readonly ParseDiagnostic[],
    localErrors: readonly ParseDiagnostic[],
    start: number,
    end: number,
    delta: number
): ParseDiagnostic[] {
    const merged: ParseDiagnostic[] = [];
    for (const error of errors) {
        if (error.offset + error.length <= start) {
            merged.push(error);
        } else if (error.offset >= end) {
            merged.push(shiftDiagnostic(error, delta));
        } else if (error.offset <= start || error.offset + error.length > end) {
            // Overlaps the node boundary: owned by an enclosing node, which
            // keeps its start; only the end moves.
            merged.push({ ...error, length: Math.max(0, error.length + delta) });
        }
    }
    for (const error of localErrors) {
        merged.push(shiftDiagnostic(error, start));
    }
    return merged.sort(compareDiagnostics);
}
