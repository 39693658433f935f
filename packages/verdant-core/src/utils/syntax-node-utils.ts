/******************************************************************************
 * Copyright 2024 TypeFox GmbH
 * This program and the accompanying materials are made available under the
 * terms of the MIT License, which is available in the project root.
 ******************************************************************************/

import type { SyntaxNode, TreeRoot } from '../syntax/syntax-node.js';
import type { TextRange } from '../syntax/text-range.js';

// --- Tree streaming ---

export type WalkEvent<R extends TreeRoot> =
    | { readonly type: 'enter'; readonly node: SyntaxNode<R> }
    | { readonly type: 'leave'; readonly node: SyntaxNode<R> };

/**
 * Walks the subtree rooted at `node`, yielding an `enter` event before a node's
 * children and a `leave` event after them.
 */
export function* walk<R extends TreeRoot>(node: SyntaxNode<R>): Generator<WalkEvent<R>> {
    yield { type: 'enter', node };
    let current: SyntaxNode<R> | undefined = node.firstChild();
    if (!current) {
        yield { type: 'leave', node };
        return;
    }
    // Iterative to keep deep trees off the call stack.
    for (;;) {
        yield { type: 'enter', node: current };
        const child: SyntaxNode<R> | undefined = current.firstChild();
        if (child) {
            current = child;
            continue;
        }
        yield { type: 'leave', node: current };
        let next: SyntaxNode<R> | undefined = current.nextSibling();
        while (!next) {
            const parent: SyntaxNode<R> | undefined = current.parent();
            if (!parent || parent.equals(node)) {
                yield { type: 'leave', node };
                return;
            }
            yield { type: 'leave', node: parent };
            current = parent;
            next = current.nextSibling();
        }
        current = next;
    }
}

/**
 * All nodes of the subtree in document order, including the root node itself.
 */
export function* preorder<R extends TreeRoot>(node: SyntaxNode<R>): Generator<SyntaxNode<R>> {
    for (const event of walk(node)) {
        if (event.type === 'enter') {
            yield event.node;
        }
    }
}

/**
 * All nodes of the subtree except the root node itself.
 */
export function* descendants<R extends TreeRoot>(node: SyntaxNode<R>): Generator<SyntaxNode<R>> {
    const iterator = preorder(node);
    iterator.next();
    yield* iterator;
}

/**
 * The token leaves of the subtree in document order.
 */
export function* leaves<R extends TreeRoot>(node: SyntaxNode<R>): Generator<SyntaxNode<R>> {
    for (const each of preorder(node)) {
        if (each.isLeaf) {
            yield each;
        }
    }
}

/**
 * The node followed by its ancestors up to the root.
 */
export function ancestors<R extends TreeRoot>(node: SyntaxNode<R>): Generator<SyntaxNode<R>> {
    return node.ancestors();
}

// --- Positional lookup ---

/**
 * The leaves touching an offset: none (empty tree), one, or two when the offset
 * sits exactly between two leaves.
 */
export type LeafAtOffset<R extends TreeRoot> =
    | { readonly type: 'none' }
    | { readonly type: 'single'; readonly leaf: SyntaxNode<R> }
    | { readonly type: 'between'; readonly left: SyntaxNode<R>; readonly right: SyntaxNode<R> };

export function findLeafAtOffset<R extends TreeRoot>(node: SyntaxNode<R>, offset: number): LeafAtOffset<R> {
    if (!node.range.contains(offset)) {
        throw new RangeError(`Offset ${offset} is outside of ${node}`);
    }
    if (node.isLeaf) {
        return { type: 'single', leaf: node };
    }
    const touching = node.children().filter(child => !child.range.isEmpty() && child.range.contains(offset));
    if (touching.length === 0) {
        return { type: 'none' };
    }
    if (touching.length === 1) {
        return findLeafAtOffset(touching[0], offset);
    }
    const left = rightmostLeaf(touching[0]);
    const right = leftmostLeaf(touching[1]);
    if (left && right) {
        return { type: 'between', left, right };
    }
    const single = left ?? right;
    return single ? { type: 'single', leaf: single } : { type: 'none' };
}

/**
 * The smallest node whose range contains `range`. For an empty range on the
 * boundary between two nodes, the node on the left is preferred.
 */
export function findCoveringNode<R extends TreeRoot>(root: SyntaxNode<R>, range: TextRange): SyntaxNode<R> {
    if (!root.range.containsRange(range)) {
        throw new RangeError(`Range ${range} is outside of ${root}`);
    }
    let current = root;
    for (;;) {
        const child = current.children().find(each => each.range.containsRange(range));
        if (!child) {
            return current;
        }
        current = child;
    }
}

/**
 * Finds the innermost node at `offset` that `cast` accepts, e.g. `FnDef.cast`.
 */
export function findNodeAtOffset<R extends TreeRoot, T>(root: SyntaxNode<R>, offset: number, cast: (node: SyntaxNode<R>) => T | undefined): T | undefined {
    const found = findLeafAtOffset(root, offset);
    const candidates = found.type === 'single' ? [found.leaf]
        : found.type === 'between' ? [found.left, found.right]
            : [];
    for (const leaf of candidates) {
        for (const ancestor of leaf.ancestors()) {
            const result = cast(ancestor);
            if (result !== undefined) {
                return result;
            }
        }
    }
    return undefined;
}

function leftmostLeaf<R extends TreeRoot>(node: SyntaxNode<R>): SyntaxNode<R> | undefined {
    for (const leaf of leaves(node)) {
        return leaf;
    }
    return undefined;
}

function rightmostLeaf<R extends TreeRoot>(node: SyntaxNode<R>): SyntaxNode<R> | undefined {
    if (node.isLeaf) {
        return node;
    }
    const children = node.children();
    for (let i = children.length - 1; i >= 0; i--) {
        const leaf = rightmostLeaf(children[i]);
        if (leaf) {
            return leaf;
        }
    }
    return undefined;
}

/**
 * The leaf ending where `node` starts, if any.
 */
export function previousLeaf<R extends TreeRoot>(node: SyntaxNode<R>): SyntaxNode<R> | undefined {
    for (let current: SyntaxNode<R> | undefined = node; current; current = current.parent()) {
        for (let sibling = current.prevSibling(); sibling; sibling = sibling.prevSibling()) {
            const leaf = rightmostLeaf(sibling);
            if (leaf) {
                return leaf;
            }
        }
    }
    return undefined;
}

/**
 * The leaf starting where `node` ends, if any.
 */
export function nextLeaf<R extends TreeRoot>(node: SyntaxNode<R>): SyntaxNode<R> | undefined {
    for (let current: SyntaxNode<R> | undefined = node; current; current = current.parent()) {
        for (let sibling = current.nextSibling(); sibling; sibling = sibling.nextSibling()) {
            const leaf = leftmostLeaf(sibling);
            if (leaf) {
                return leaf;
            }
        }
    }
    return undefined;
}
