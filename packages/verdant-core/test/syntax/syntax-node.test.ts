/******************************************************************************
 * Copyright 2024 TypeFox GmbH
 * This program and the accompanying materials are made available under the
 * terms of the MIT License, which is available in the project root.
 ******************************************************************************/

import { describe, test, expect } from 'vitest';
import type { OwnedRoot, SyntaxNode } from 'verdant-core';
import { GreenBranch, GreenLeaf, RefRoot, SyntaxKind, greenText } from 'verdant-core';
import { buildTree } from '../test-helper.js';

/** `a {b} c` */
function sampleTree(): SyntaxNode<OwnedRoot> {
    return buildTree(sink => {
        sink.startNode(SyntaxKind.ROOT);
        sink.token(SyntaxKind.IDENT, 'a');
        sink.token(SyntaxKind.WHITESPACE, ' ');
        sink.startNode(SyntaxKind.BLOCK);
        sink.token(SyntaxKind.L_CURLY, '{');
        sink.token(SyntaxKind.IDENT, 'b');
        sink.token(SyntaxKind.R_CURLY, '}');
        sink.finishNode();
        sink.token(SyntaxKind.WHITESPACE, ' ');
        sink.token(SyntaxKind.IDENT, 'c');
        sink.finishNode();
    });
}

describe('SyntaxNode', () => {

    test('root covers the whole text', () => {
        const root = sampleTree();
        expect(root.kind).toBe(SyntaxKind.ROOT);
        expect(root.range.toString()).toBe('[0; 7)');
        expect(root.isRoot).toBe(true);
        expect(root.parent()).toBeUndefined();
        expect(root.text()).toBe('a {b} c');
        expect(root.leafText()).toBeUndefined();
    });

    test('children carry absolute offsets', () => {
        const children = sampleTree().children();
        expect(children.map(child => child.offset)).toEqual([0, 1, 2, 5, 6]);
        expect(children.map(child => child.kind)).toEqual([
            SyntaxKind.IDENT, SyntaxKind.WHITESPACE, SyntaxKind.BLOCK, SyntaxKind.WHITESPACE, SyntaxKind.IDENT
        ]);
    });

    test('first and last child', () => {
        const block = sampleTree().children()[2];
        expect(block.firstChild()?.toString()).toBe('L_CURLY@[2; 3)');
        expect(block.lastChild()?.toString()).toBe('R_CURLY@[4; 5)');
        expect(block.firstChild()?.firstChild()).toBeUndefined();
        expect(block.firstChild()?.lastChild()).toBeUndefined();
    });

    test('siblings', () => {
        const root = sampleTree();
        const block = root.children()[2];
        expect(block.nextSibling()?.toString()).toBe('WHITESPACE@[5; 6)');
        expect(block.prevSibling()?.toString()).toBe('WHITESPACE@[1; 2)');
        expect(root.firstChild()?.prevSibling()).toBeUndefined();
        expect(root.lastChild()?.nextSibling()).toBeUndefined();
        expect(root.nextSibling()).toBeUndefined();
    });

    test('parent and ancestors', () => {
        const root = sampleTree();
        const leaf = root.children()[2].children()[1];
        expect(leaf.leafText()).toBe('b');
        expect(leaf.parent()?.kind).toBe(SyntaxKind.BLOCK);
        expect([...leaf.ancestors()].map(node => node.kind)).toEqual([SyntaxKind.IDENT, SyntaxKind.BLOCK, SyntaxKind.ROOT]);
    });

    test('views of the same position are equal', () => {
        const root = sampleTree();
        const viaChildren = root.children()[2];
        const viaSibling = root.children()[1].nextSibling();
        expect(viaSibling).toBeDefined();
        expect(viaSibling && viaChildren.equals(viaSibling)).toBe(true);
        expect(viaChildren.equals(root)).toBe(false);
        expect(sampleTree().equals(root)).toBe(false);
    });

    test('borrowed and owned views', () => {
        const root = sampleTree();
        const block = root.children()[2];
        const borrowed = block.borrowed();
        expect(borrowed.root).toBeInstanceOf(RefRoot);
        expect(borrowed.equals(block)).toBe(true);
        expect(borrowed.parent()?.equals(root)).toBe(true);
        expect(borrowed.owned().root).toBe(root.root);
        expect(borrowed.owned().equals(block)).toBe(true);
    });

    test('replaceWith shares everything off the path', () => {
        const root = sampleTree();
        const leaf = root.children()[2].children()[1];

        const newRoot = leaf.replaceWith(new GreenLeaf(SyntaxKind.IDENT, 'xyz'));

        expect(greenText(newRoot)).toBe('a {xyz} c');
        expect(newRoot.width).toBe(9);
        expect(root.text()).toBe('a {b} c');
        const oldGreen = root.green;
        expect(oldGreen.isLeaf).toBe(false);
        expect(newRoot.children[0]).toBe(oldGreen.children[0]);
        expect(newRoot.children[4]).toBe(oldGreen.children[4]);
        expect(newRoot.children[2]).not.toBe(oldGreen.children[2]);
        expect(newRoot.children[2].children[0]).toBe(oldGreen.children[2].children[0]);
    });

    test('replaceWith at the root returns the replacement', () => {
        const replacement = new GreenBranch(SyntaxKind.ROOT, []);
        expect(sampleTree().replaceWith(replacement)).toBe(replacement);
        expect(() => sampleTree().replaceWith(new GreenLeaf(SyntaxKind.IDENT, 'a'))).toThrow('Cannot replace the root with token IDENT');
    });
});
