/******************************************************************************
 * Copyright 2024 TypeFox GmbH
 * This program and the accompanying materials are made available under the
 * terms of the MIT License, which is available in the project root.
 ******************************************************************************/

import type { ParseDiagnostic } from '../parser/parse-diagnostic.js';
import type { SyntaxNode, TreeRoot } from '../syntax/syntax-node.js';
import { syntaxKindName } from '../syntax/syntax-kind.js';
import { walk } from './syntax-node-utils.js';

/**
 * Renders a subtree as one line per node, indented by depth:
 *
 * ```
 * BLOCK@[0; 5)
 *   L_CURLY@[0; 1) "{"
 * ```
 *
 * Diagnostics, if given, are listed after the tree.
 */
export function dumpTree<R extends TreeRoot>(node: SyntaxNode<R>, errors: readonly ParseDiagnostic[] = []): string {
    const lines: string[] = [];
    let depth = 0;
    for (const event of walk(node)) {
        if (event.type === 'leave') {
            depth--;
            continue;
        }
        const current = event.node;
        const text = current.leafText();
        const suffix = text === undefined ? '' : ` ${JSON.stringify(text)}`;
        lines.push(`${'  '.repeat(depth)}${syntaxKindName(current.kind)}@${current.range}${suffix}`);
        depth++;
    }
    for (const error of errors) {
        lines.push(`error@${error.offset}: ${error.message}`);
    }
    return lines.join('\n');
}

/**
 * The preorder sequence of kind names: the shape of a tree without its text.
 */
export function kindShape<R extends TreeRoot>(node: SyntaxNode<R>): string[] {
    const shape: string[] = [];
    for (const event of walk(node)) {
        if (event.type === 'enter') {
            shape.push(syntaxKindName(event.node.kind));
        }
    }
    return shape;
}
