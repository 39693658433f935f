/******************************************************************************
 * Copyright 2024 TypeFox GmbH
 * This program and the accompanying materials are made available under the
 * terms of the MIT License, which is available in the project root.
 ******************************************************************************/

import type { SyntaxNode, TreeRoot } from '../syntax/syntax-node.js';
import { SyntaxKind } from '../syntax/syntax-kind.js';
import { dumpTree } from '../utils/dump-tree.js';
import { preorder } from '../utils/syntax-node-utils.js';

/**
 * Asserts that every `{` and the `}` matching it are the first and last child of
 * the same parent. A violation means a grammar built a broken tree, so it throws
 * instead of producing a diagnostic.
 *
 * Unmatched braces are fine: they are what malformed input looks like.
 */
export function validateBlockStructure<R extends TreeRoot>(root: SyntaxNode<R>): void {
    const stack: Array<SyntaxNode<R>> = [];
    for (const node of preorder(root)) {
        if (node.kind === SyntaxKind.L_CURLY) {
            stack.push(node);
        } else if (node.kind === SyntaxKind.R_CURLY) {
            const pair = stack.pop();
            if (!pair) {
                continue;
            }
            const parent = node.parent();
            const pairParent = pair.parent();
            if (!parent || !pairParent || !parent.equals(pairParent)) {
                throw new Error(`Unpaired curlies: ${pair} and ${node} have different parents\n${dumpTree(root)}`);
            }
            if (node.nextSibling() || pair.prevSibling()) {
                throw new Error(`Floating curlies at ${node}\nfile:\n${root.text()}\nnode:\n${parent.text()}`);
            }
        }
    }
}
