/******************************************************************************
 * Copyright 2024 TypeFox GmbH
 * This program and the accompanying materials are made available under the
 * terms of the MIT License, which is available in the project root.
 ******************************************************************************/

import type { ParseDiagnostic } from '../parser/parse-diagnostic.js';
import type { SyntaxKind } from './syntax-kind.js';
import type { GreenNode } from './green-node.js';
import type { TreeSink } from './tree-sink.js';
import { GreenBranch, GreenLeaf } from './green-node.js';
import { syntaxKindName } from './syntax-kind.js';

export interface GreenBuildResult {
    readonly green: GreenBranch;
    readonly errors: ParseDiagnostic[];
}

interface OpenNode {
    readonly kind: SyntaxKind;
    readonly children: GreenNode[];
}

/**
 * Materializes a balanced sequence of {@link TreeSink} calls into a green tree.
 */
export class GreenBuilder implements TreeSink {

    private readonly stack: OpenNode[] = [];
    private readonly errors: ParseDiagnostic[] = [];
    private root: GreenBranch | undefined;
    private offset = 0;

    startNode(kind: SyntaxKind): void {
        if (this.root) {
            throw new Error(`Cannot start ${syntaxKindName(kind)}: the root node is already finished`);
        }
        this.stack.push({ kind, children: [] });
    }

    token(kind: SyntaxKind, text: string): void {
        this.current('token').children.push(new GreenLeaf(kind, text));
        this.offset += text.length;
    }

    finishNode(): void {
        const node = this.stack.pop();
        if (!node) {
            throw new Error('Unbalanced finishNode: no node is open');
        }
        const green = new GreenBranch(node.kind, node.children);
        const parent = this.stack.at(-1);
        if (parent) {
            parent.children.push(green);
        } else {
            this.root = green;
        }
    }

    error(message: string): void {
        this.errors.push({
            message,
            offset: this.offset,
            length: 0,
            severity: 'error',
            source: 'parser'
        });
    }

    /**
     * Returns the finished tree. Throws if the call sequence was not balanced.
     */
    finish(): GreenBuildResult {
        if (this.stack.length > 0) {
            const open = this.stack.map(node => syntaxKindName(node.kind)).join(' > ');
            throw new Error(`Unbalanced tree: ${open} still open`);
        }
        if (!this.root) {
            throw new Error('No node was built');
        }
        return { green: this.root, errors: [...this.errors] };
    }

    private current(operation: string): OpenNode {
        const node = this.stack.at(-1);
        if (!node) {
            throw new Error(`Cannot add ${operation} outside of a node`);
        }
        return node;
    }
}
