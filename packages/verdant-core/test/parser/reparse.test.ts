/******************************************************************************
 * Copyright 2024 TypeFox GmbH
 * This program and the accompanying materials are made available under the
 * terms of the MIT License, which is available in the project root.
 ******************************************************************************/

import { describe, test, expect } from 'vitest';
import type { Token } from 'verdant-core';
import { AtomEdit, SourceFile, SyntaxKind, TextRange, findReparsableNode, isBalanced, replaceRange } from 'verdant-core';
import { BraceGrammar, braceServices } from '../test-helper.js';

const { L_CURLY, R_CURLY, IDENT } = SyntaxKind;

function tokens(...kinds: SyntaxKind[]): Token[] {
    return kinds.map(kind => ({ kind, len: 1 }));
}

describe('isBalanced', () => {

    test('accepts a single delimited unit', () => {
        expect(isBalanced(tokens(L_CURLY, R_CURLY), L_CURLY, R_CURLY)).toBe(true);
        expect(isBalanced(tokens(L_CURLY, L_CURLY, IDENT, R_CURLY, R_CURLY), L_CURLY, R_CURLY)).toBe(true);
    });

    test('rejects units closed before the last token', () => {
        expect(isBalanced(tokens(L_CURLY, R_CURLY, L_CURLY, R_CURLY), L_CURLY, R_CURLY)).toBe(false);
    });

    test('rejects units that are never closed', () => {
        expect(isBalanced(tokens(L_CURLY, L_CURLY, R_CURLY), L_CURLY, R_CURLY)).toBe(false);
        expect(isBalanced(tokens(L_CURLY, IDENT), L_CURLY, R_CURLY)).toBe(false);
    });

    test('rejects inputs not starting with the opening delimiter', () => {
        expect(isBalanced(tokens(IDENT, L_CURLY, R_CURLY), L_CURLY, R_CURLY)).toBe(false);
        expect(isBalanced(tokens(R_CURLY, L_CURLY), L_CURLY, R_CURLY)).toBe(false);
        expect(isBalanced(tokens(L_CURLY), L_CURLY, R_CURLY)).toBe(false);
        expect(isBalanced([], L_CURLY, R_CURLY)).toBe(false);
    });
});

describe('findReparsableNode', () => {

    const grammar = new BraceGrammar();
    const file = SourceFile.parse('a {b {c} d}', braceServices());

    test('finds the innermost block around the edit', () => {
        const found = findReparsableNode(file.syntax(), AtomEdit.insert(6, 'x'), grammar);
        expect(found?.node.toString()).toBe('BLOCK@[5; 8)');
        expect(found?.reparser.kind).toBe(SyntaxKind.BLOCK);
    });

    test('an edit spanning the inner block picks the outer one', () => {
        const found = findReparsableNode(file.syntax(), AtomEdit.delete(new TextRange(4, 9)), grammar);
        expect(found?.node.toString()).toBe('BLOCK@[2; 11)');
    });

    test('finds nothing outside of any block', () => {
        expect(findReparsableNode(file.syntax(), AtomEdit.insert(0, 'x'), grammar)).toBeUndefined();
    });
});

describe('AtomEdit', () => {

    test('applies replacements, deletions and insertions', () => {
        expect(AtomEdit.replace(new TextRange(1, 3), 'XY').apply('abcd')).toBe('aXYd');
        expect(AtomEdit.delete(new TextRange(0, 2)).apply('abcd')).toBe('cd');
        expect(AtomEdit.insert(4, '!').apply('abcd')).toBe('abcd!');
    });

    test('delta is the change in length', () => {
        expect(AtomEdit.replace(new TextRange(1, 3), 'XYZ').delta).toBe(1);
        expect(AtomEdit.delete(new TextRange(0, 2)).delta).toBe(-2);
    });

    test('rejects ranges past the end of the text', () => {
        expect(() => replaceRange('ab', new TextRange(1, 3), '')).toThrow('Range [1; 3) is outside of a text of length 2');
    });
});
