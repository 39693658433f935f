/******************************************************************************
 * Copyright 2024 TypeFox GmbH
 * This program and the accompanying materials are made available under the
 * terms of the MIT License, which is available in the project root.
 ******************************************************************************/

import { SyntaxKind, isNodeKind, syntaxKindName } from './syntax-kind.js';

/**
 * An immutable, position-free node of the syntax tree.
 *
 * Green nodes know their kind and width but neither their offset nor their parent,
 * so a subtree can be shared by any number of trees. Offsets are always derived by
 * the navigable view in `syntax-node.ts`.
 */
export type GreenNode = GreenBranch | GreenLeaf;

/**
 * A token leaf. Its width is the length of its text.
 */
export class GreenLeaf {
    readonly isLeaf = true;
    readonly kind: SyntaxKind;
    readonly text: string;

    constructor(kind: SyntaxKind, text: string) {
        if (isNodeKind(kind)) {
            throw new Error(`Cannot create a token of node kind ${syntaxKindName(kind)}`);
        }
        this.kind = kind;
        this.text = text;
        Object.freeze(this);
    }

    get width(): number {
        return this.text.length;
    }

    get children(): readonly GreenNode[] {
        return EMPTY_CHILDREN;
    }

    collectText(parts: string[]): void {
        parts.push(this.text);
    }
}

/**
 * A composite node with an ordered child list fixed at construction.
 */
export class GreenBranch {
    readonly isLeaf = false;
    readonly kind: SyntaxKind;
    readonly children: readonly GreenNode[];
    readonly width: number;

    constructor(kind: SyntaxKind, children: readonly GreenNode[]) {
        this.kind = kind;
        this.children = Object.freeze([...children]);
        let width = 0;
        for (const child of this.children) {
            width += child.width;
        }
        this.width = width;
        Object.freeze(this);
    }

    /**
     * Returns a new branch of the same kind with the child at `index` replaced.
     * All other children are shared with this branch.
     */
    replaceChild(index: number, child: GreenNode): GreenBranch {
        if (index < 0 || index >= this.children.length) {
            throw new RangeError(`Child index ${index} out of bounds for ${syntaxKindName(this.kind)} with ${this.children.length} children`);
        }
        const children = [...this.children];
        children[index] = child;
        return new GreenBranch(this.kind, children);
    }

    collectText(parts: string[]): void {
        for (const child of this.children) {
            child.collectText(parts);
        }
    }
}

const EMPTY_CHILDREN: readonly GreenNode[] = Object.freeze([]);

/**
 * Concatenates the token texts of a green subtree in document order.
 */
export function greenText(node: GreenNode): string {
    if (node.isLeaf) {
        return node.text;
    }
    const parts: string[] = [];
    node.collectText(parts);
    return parts.join('');
}
