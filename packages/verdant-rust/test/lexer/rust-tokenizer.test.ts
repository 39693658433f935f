/******************************************************************************
 * Copyright 2024 TypeFox GmbH
 * This program and the accompanying materials are made available under the
 * terms of the MIT License, which is available in the project root.
 ******************************************************************************/

import { describe, test, expect } from 'vitest';
import { SyntaxKind } from 'verdant-core';
import { RustTokenizer } from 'verdant-rust';
import { tokenKinds } from '../test-helper.js';

describe('RustTokenizer', () => {

    test('keywords and identifiers', () => {
        expect(tokenKinds('fn main() {}')).toEqual([
            'FN_KW', 'WHITESPACE', 'IDENT', 'L_PAREN', 'R_PAREN', 'WHITESPACE', 'L_CURLY', 'R_CURLY'
        ]);
        expect(tokenKinds('struct Foo true')).toEqual(['STRUCT_KW', 'WHITESPACE', 'IDENT', 'WHITESPACE', 'TRUE_KW']);
    });

    test('a lone underscore is not an identifier', () => {
        expect(tokenKinds('_ _x')).toEqual(['UNDERSCORE', 'WHITESPACE', 'IDENT']);
    });

    test('character literals and lifetimes', () => {
        expect(tokenKinds(`'a' 'a 'static '\\n'`)).toEqual([
            'CHAR', 'WHITESPACE', 'LIFETIME', 'WHITESPACE', 'LIFETIME', 'WHITESPACE', 'CHAR'
        ]);
    });

    test('numbers', () => {
        expect(tokenKinds('1 1.5 0x1F 2u8 1e10')).toEqual([
            'INT_NUMBER', 'WHITESPACE', 'FLOAT_NUMBER', 'WHITESPACE', 'INT_NUMBER', 'WHITESPACE', 'INT_NUMBER', 'WHITESPACE', 'FLOAT_NUMBER'
        ]);
        expect(tokenKinds('1..2')).toEqual(['INT_NUMBER', 'DOTDOT', 'INT_NUMBER']);
    });

    test('string literals', () => {
        expect(tokenKinds(`"a\\"b" r"raw" b'x' b"bytes"`)).toEqual([
            'STRING', 'WHITESPACE', 'RAW_STRING', 'WHITESPACE', 'BYTE', 'WHITESPACE', 'BYTE_STRING'
        ]);
    });

    test('comments are single tokens', () => {
        expect(tokenKinds('// line\n/* block */ x')).toEqual(['COMMENT', 'WHITESPACE', 'COMMENT', 'WHITESPACE', 'IDENT']);
    });

    test('unterminated literals run to the end of input', () => {
        expect(tokenKinds('/* open { x')).toEqual(['COMMENT']);
        expect(tokenKinds('x "open } y')).toEqual(['IDENT', 'WHITESPACE', 'STRING']);
    });

    test('angle brackets stay separate', () => {
        expect(tokenKinds('a >= b >>= c')).toEqual([
            'IDENT', 'WHITESPACE', 'R_ANGLE', 'EQ', 'WHITESPACE', 'IDENT', 'WHITESPACE', 'R_ANGLE', 'R_ANGLE', 'EQ', 'WHITESPACE', 'IDENT'
        ]);
    });

    test('longer operators win over their prefixes', () => {
        expect(tokenKinds('..= ... :: -> => == != += ..')).toEqual([
            'DOTDOTEQ', 'WHITESPACE', 'DOTDOTDOT', 'WHITESPACE', 'COLONCOLON', 'WHITESPACE', 'THIN_ARROW', 'WHITESPACE',
            'FAT_ARROW', 'WHITESPACE', 'EQEQ', 'WHITESPACE', 'NEQ', 'WHITESPACE', 'PLUSEQ', 'WHITESPACE', 'DOTDOT'
        ]);
    });

    test('unknown characters become error tokens', () => {
        expect(tokenKinds('a § b')).toEqual(['IDENT', 'WHITESPACE', 'ERROR', 'WHITESPACE', 'IDENT']);
    });

    test.each([
        ["'"],
        ['`'],
        ['\\'],
        ['\u0000']
    ])('a stray %j is an error token', text => {
        expect(tokenKinds(text)).toEqual(['ERROR']);
    });

    test('a character outside the basic plane is a single error token', () => {
        expect(new RustTokenizer().tokenize('\u{1F600}')).toEqual([{ kind: SyntaxKind.ERROR, len: 2 }]);
    });

    test('broken character literals fall apart into error tokens', () => {
        expect(tokenKinds(`'\\q'`)).toEqual(['ERROR', 'ERROR', 'IDENT', 'ERROR']);
        expect(tokenKinds(`x ' }`)).toEqual(['IDENT', 'WHITESPACE', 'ERROR', 'WHITESPACE', 'R_CURLY']);
    });

    test('tokens cover the input without gaps', () => {
        const text = 'fn f<\'a>(x: &\'a str) -> u8 { /* c */ x.len() as u8 § }';
        const tokens = new RustTokenizer().tokenize(text);
        expect(tokens.reduce((sum, token) => sum + token.len, 0)).toBe(text.length);
    });
});

