/******************************************************************************
 * Copyright 2024 TypeFox GmbH
 * This program and the accompanying materials are made available under the
 * terms of the MIT License, which is available in the project root.
 ******************************************************************************/

import { describe, test, expect } from 'vitest';
import type { OwnedRoot, SyntaxNode } from 'verdant-core';
import {
    SyntaxKind, TextRange, descendants, dumpTree, findCoveringNode, findLeafAtOffset, findNodeAtOffset,
    kindShape, leaves, nextLeaf, preorder, previousLeaf, syntaxKindName, walk
} from 'verdant-core';
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

describe('Tree streaming', () => {

    test('walk emits balanced enter and leave events', () => {
        const events = [...walk(sampleTree().children()[2])].map(event => `${event.type} ${syntaxKindName(event.node.kind)}`);
        expect(events).toEqual([
            'enter BLOCK',
            'enter L_CURLY', 'leave L_CURLY',
            'enter IDENT', 'leave IDENT',
            'enter R_CURLY', 'leave R_CURLY',
            'leave BLOCK'
        ]);
    });

    test('walk over a leaf', () => {
        const events = [...walk(sampleTree().children()[0])].map(event => event.type);
        expect(events).toEqual(['enter', 'leave']);
    });

    test('preorder includes the start node, descendants does not', () => {
        const root = sampleTree();
        expect([...preorder(root)]).toHaveLength(9);
        expect([...descendants(root)]).toHaveLength(8);
        expect([...preorder(root)][0].equals(root)).toBe(true);
    });

    test('leaves concatenate to the text', () => {
        const root = sampleTree();
        expect([...leaves(root)].map(leaf => leaf.leafText()).join('')).toBe(root.text());
    });

    test('kindShape lists kinds in preorder', () => {
        expect(kindShape(sampleTree().children()[2])).toEqual(['BLOCK', 'L_CURLY', 'IDENT', 'R_CURLY']);
    });

    test('dumpTree renders one line per node', () => {
        const root = sampleTree();
        expect(dumpTree(root.children()[2], [{ message: 'oops', offset: 3, length: 0, severity: 'error', source: 'parser' }])).toBe([
            'BLOCK@[2; 5)',
            '  L_CURLY@[2; 3) "{"',
            '  IDENT@[3; 4) "b"',
            '  R_CURLY@[4; 5) "}"',
            'error@3: oops'
        ].join('\n'));
    });
});

describe('Positional lookup', () => {

    test('an offset inside a leaf finds that leaf', () => {
        const inside = findLeafAtOffset(buildTree(sink => {
            sink.startNode(SyntaxKind.ROOT);
            sink.token(SyntaxKind.IDENT, 'abc');
            sink.finishNode();
        }), 1);
        expect(inside.type === 'single' && inside.leaf.leafText()).toBe('abc');
    });

    test('an offset between two leaves finds both', () => {
        const found = findLeafAtOffset(sampleTree(), 2);
        expect(found.type).toBe('between');
        if (found.type === 'between') {
            expect(found.left.toString()).toBe('WHITESPACE@[1; 2)');
            expect(found.right.toString()).toBe('L_CURLY@[2; 3)');
        }
    });

    test('the text boundaries find a single leaf', () => {
        const root = sampleTree();
        const start = findLeafAtOffset(root, 0);
        expect(start.type === 'single' && start.leaf.toString()).toBe('IDENT@[0; 1)');
        const end = findLeafAtOffset(root, 7);
        expect(end.type === 'single' && end.leaf.toString()).toBe('IDENT@[6; 7)');
    });

    test('an empty tree has no leaf', () => {
        const empty = buildTree(sink => {
            sink.startNode(SyntaxKind.ROOT);
            sink.finishNode();
        });
        expect(findLeafAtOffset(empty, 0)).toEqual({ type: 'none' });
    });

    test('offsets outside the node are rejected', () => {
        expect(() => findLeafAtOffset(sampleTree(), 8)).toThrow(RangeError);
    });

    test('findCoveringNode finds the smallest enclosing node', () => {
        const root = sampleTree();
        expect(findCoveringNode(root, new TextRange(2, 4)).toString()).toBe('BLOCK@[2; 5)');
        expect(findCoveringNode(root, new TextRange(3, 4)).toString()).toBe('IDENT@[3; 4)');
        expect(findCoveringNode(root, new TextRange(0, 7)).toString()).toBe('ROOT@[0; 7)');
    });

    test('findCoveringNode prefers the left node on a boundary', () => {
        const root = sampleTree();
        expect(findCoveringNode(root, TextRange.empty(2)).toString()).toBe('WHITESPACE@[1; 2)');
        expect(findCoveringNode(root, TextRange.empty(4)).toString()).toBe('IDENT@[3; 4)');
    });

    test('findNodeAtOffset returns the innermost accepted ancestor', () => {
        const root = sampleTree();
        const asBlock = (node: SyntaxNode<OwnedRoot>) => node.kind === SyntaxKind.BLOCK ? node : undefined;
        expect(findNodeAtOffset(root, 3, asBlock)?.toString()).toBe('BLOCK@[2; 5)');
        expect(findNodeAtOffset(root, 0, asBlock)).toBeUndefined();
    });
});

describe('Neighbouring leaves', () => {

    test('leaves around a node', () => {
        const block = sampleTree().children()[2];
        expect(previousLeaf(block)?.toString()).toBe('WHITESPACE@[1; 2)');
        expect(nextLeaf(block)?.toString()).toBe('WHITESPACE@[5; 6)');
    });

    test('leaves across node boundaries', () => {
        const [, , block] = sampleTree().children();
        const [open, , close] = block.children();
        expect(previousLeaf(open)?.toString()).toBe('WHITESPACE@[1; 2)');
        expect(nextLeaf(close)?.toString()).toBe('WHITESPACE@[5; 6)');
    });

    test('nothing before the first leaf or after the last one', () => {
        const root = sampleTree();
        const children = root.children();
        expect(previousLeaf(children[0])).toBeUndefined();
        expect(nextLeaf(children[children.length - 1])).toBeUndefined();
        expect(nextLeaf(root)).toBeUndefined();
    });
});
