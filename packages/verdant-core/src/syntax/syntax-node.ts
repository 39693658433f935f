/******************************************************************************
 * Copyright 2024 TypeFox GmbH
 * This program and the accompanying materials are made available under the
 * terms of the MIT License, which is available in the project root.
 ******************************************************************************/

import type { ParseDiagnostic } from '../parser/parse-diagnostic.js';
import type { GreenBranch, GreenNode } from './green-node.js';
import type { SyntaxKind } from './syntax-kind.js';
import { greenText } from './green-node.js';
import { syntaxKindName } from './syntax-kind.js';
import { TextRange } from './text-range.js';

/**
 * A green root together with the diagnostics produced while building it.
 */
export class SyntaxRoot {
    readonly green: GreenBranch;
    readonly errors: readonly ParseDiagnostic[];

    constructor(green: GreenBranch, errors: readonly ParseDiagnostic[]) {
        this.green = green;
        this.errors = Object.freeze([...errors]);
        Object.freeze(this);
    }
}

/**
 * The handle a navigable node keeps to the tree it points into.
 */
export interface TreeRoot {
    readonly syntaxRoot: SyntaxRoot;
    owned(): OwnedRoot;
    borrowed(): RefRoot;
}

/**
 * Keeps its tree alive on its own. Nodes over an owned root may outlive the
 * value they were obtained from.
 */
export class OwnedRoot implements TreeRoot {
    readonly syntaxRoot: SyntaxRoot;

    constructor(syntaxRoot: SyntaxRoot) {
        this.syntaxRoot = syntaxRoot;
    }

    owned(): OwnedRoot {
        return this;
    }

    borrowed(): RefRoot {
        return new RefRoot(this);
    }
}

/**
 * Borrows the tree of a caller-held {@link OwnedRoot}. Nodes over a borrowed root
 * are meant to be used while that owner is in hand; call `owned()` to keep one.
 */
export class RefRoot implements TreeRoot {
    private readonly owner: OwnedRoot;

    constructor(owner: OwnedRoot) {
        this.owner = owner;
    }

    get syntaxRoot(): SyntaxRoot {
        return this.owner.syntaxRoot;
    }

    owned(): OwnedRoot {
        return this.owner;
    }

    borrowed(): RefRoot {
        return this;
    }
}

/**
 * A navigable, position-aware view of a green node.
 *
 * A node is the pair (root handle, path), where the path is the chain of parent
 * views with the child index at each step. Views are created on demand and never
 * stored in the green tree, so navigating never creates cycles in shared data.
 * Both ownership flavors expose the same contract; use {@link SyntaxNodeRef} for
 * borrowed views.
 */
export class SyntaxNode<R extends TreeRoot = OwnedRoot> {

    readonly root: R;
    readonly green: GreenNode;
    /** Absolute start offset in the source text. */
    readonly offset: number;
    private readonly parentNode: SyntaxNode<R> | undefined;
    private readonly indexInParent: number;

    private constructor(root: R, green: GreenNode, parent: SyntaxNode<R> | undefined, indexInParent: number, offset: number) {
        this.root = root;
        this.green = green;
        this.parentNode = parent;
        this.indexInParent = indexInParent;
        this.offset = offset;
    }

    /**
     * Creates the view of the root node of a tree.
     */
    static forRoot<R extends TreeRoot>(root: R): SyntaxNode<R> {
        return new SyntaxNode(root, root.syntaxRoot.green, undefined, 0, 0);
    }

    // --- Kind and position ---

    get kind(): SyntaxKind {
        return this.green.kind;
    }

    get end(): number {
        return this.offset + this.green.width;
    }

    get length(): number {
        return this.green.width;
    }

    get range(): TextRange {
        return TextRange.ofLength(this.offset, this.green.width);
    }

    get isLeaf(): boolean {
        return this.green.isLeaf;
    }

    get isRoot(): boolean {
        return this.parentNode === undefined;
    }

    // --- Text ---

    text(): string {
        return greenText(this.green);
    }

    /** The token text; only defined for token leaves. */
    leafText(): string | undefined {
        return this.green.isLeaf ? this.green.text : undefined;
    }

    // --- Tree structure ---

    parent(): SyntaxNode<R> | undefined {
        return this.parentNode;
    }

    children(): Array<SyntaxNode<R>> {
        const result: Array<SyntaxNode<R>> = [];
        let offset = this.offset;
        this.green.children.forEach((child, index) => {
            result.push(new SyntaxNode(this.root, child, this, index, offset));
            offset += child.width;
        });
        return result;
    }

    firstChild(): SyntaxNode<R> | undefined {
        return this.childAt(0, this.offset);
    }

    lastChild(): SyntaxNode<R> | undefined {
        const children = this.green.children;
        const last = children.length - 1;
        if (last < 0) {
            return undefined;
        }
        return this.childAt(last, this.end - children[last].width);
    }

    nextSibling(): SyntaxNode<R> | undefined {
        const parent = this.parentNode;
        if (!parent) {
            return undefined;
        }
        return parent.childAt(this.indexInParent + 1, this.end);
    }

    prevSibling(): SyntaxNode<R> | undefined {
        const parent = this.parentNode;
        if (!parent || this.indexInParent === 0) {
            return undefined;
        }
        const previous = parent.green.children[this.indexInParent - 1];
        return parent.childAt(this.indexInParent - 1, this.offset - previous.width);
    }

    /**
     * This node followed by its parent, grandparent, and so on up to the root.
     */
    *ancestors(): Generator<SyntaxNode<R>> {
        let current: SyntaxNode<R> | undefined = this;
        while (current) {
            yield current;
            current = current.parentNode;
        }
    }

    // --- Identity and ownership ---

    /**
     * Two views are equal when they denote the same position in the same tree,
     * regardless of which ownership flavor they use.
     */
    equals(other: SyntaxNode<TreeRoot>): boolean {
        return this.root.syntaxRoot === other.root.syntaxRoot
            && this.green === other.green
            && this.offset === other.offset;
    }

    borrowed(): SyntaxNode<RefRoot> {
        return this.withRoot(this.root.borrowed());
    }

    owned(): SyntaxNode<OwnedRoot> {
        return this.withRoot(this.root.owned());
    }

    /**
     * Returns the green root of a new tree in which this node's subtree is
     * replaced by `replacement`. Every subtree off the path to the root is
     * shared with the current tree, which itself is left untouched.
     */
    replaceWith(replacement: GreenNode): GreenBranch {
        let node: SyntaxNode<R> = this;
        let green: GreenNode = replacement;
        for (let parent = node.parentNode; parent; parent = node.parentNode) {
            if (parent.green.isLeaf) {
                throw new Error(`Corrupt path: ${syntaxKindName(parent.kind)} is a token`);
            }
            green = parent.green.replaceChild(node.indexInParent, green);
            node = parent;
        }
        if (green.isLeaf) {
            throw new Error(`Cannot replace the root with token ${syntaxKindName(green.kind)}`);
        }
        return green;
    }

    toString(): string {
        return `${syntaxKindName(this.kind)}@${this.range}`;
    }

    private childAt(index: number, offset: number): SyntaxNode<R> | undefined {
        const child = this.green.children[index];
        return child ? new SyntaxNode(this.root, child, this, index, offset) : undefined;
    }

    private withRoot<T extends TreeRoot>(root: T): SyntaxNode<T> {
        const parent = this.parentNode?.withRoot(root);
        return new SyntaxNode(root, this.green, parent, this.indexInParent, this.offset);
    }
}

/** A navigable node over a borrowed root. */
export type SyntaxNodeRef = SyntaxNode<RefRoot>;
