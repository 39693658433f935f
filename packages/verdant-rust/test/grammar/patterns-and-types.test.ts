/******************************************************************************
 * Copyright 2024 TypeFox GmbH
 * This program and the accompanying materials are made available under the
 * terms of the MIT License, which is available in the project root.
 ******************************************************************************/

import { describe, test, expect } from 'vitest';
import { PathType, TypeDef } from 'verdant-core';
import { PATH_EXPR, PATH_TYPE, exprOutline, parseRust, typeOutline } from '../test-helper.js';

function letPattern(pattern: string): string {
    return exprOutline(`let ${pattern} = x;`);
}

describe('Patterns', () => {

    test('bindings, tuples and placeholders', () => {
        expect(letPattern('(a, ref mut b, _)')).toBe(`LET_STMT(TUPLE_PAT(BIND_PAT(NAME) BIND_PAT(NAME) PLACEHOLDER_PAT) ${PATH_EXPR})`);
    });

    test('struct patterns', () => {
        expect(letPattern('S { x, y: 1, .. }')).toBe(
            `LET_STMT(STRUCT_PAT(PATH(PATH_SEGMENT(NAME_REF)) FIELD_PAT_LIST(BIND_PAT(NAME) LITERAL_PAT(LITERAL))) ${PATH_EXPR})`
        );
    });

    test('references and sub-patterns', () => {
        expect(letPattern('&(a, _)')).toBe(`LET_STMT(REF_PAT(TUPLE_PAT(BIND_PAT(NAME) PLACEHOLDER_PAT)) ${PATH_EXPR})`);
        expect(letPattern('x @ Some(_)')).toBe(
            `LET_STMT(BIND_PAT(NAME TUPLE_STRUCT_PAT(PATH(PATH_SEGMENT(NAME_REF)) PLACEHOLDER_PAT)) ${PATH_EXPR})`
        );
    });

    test('literals and paths', () => {
        expect(letPattern('-1')).toBe(`LET_STMT(LITERAL_PAT(LITERAL) ${PATH_EXPR})`);
        expect(letPattern('a::B')).toBe(`LET_STMT(PATH_PAT(PATH(PATH(PATH_SEGMENT(NAME_REF)) PATH_SEGMENT(NAME_REF))) ${PATH_EXPR})`);
    });
});

describe('Types', () => {

    test('references, slices and arrays', () => {
        expect(typeOutline(`&'a mut [u8]`)).toBe(`TYPE_DEF(NAME REFERENCE_TYPE(SLICE_TYPE(${PATH_TYPE})))`);
        expect(typeOutline('[u8; 4]')).toBe(`TYPE_DEF(NAME ARRAY_TYPE(${PATH_TYPE} LITERAL))`);
        expect(typeOutline('*const u8')).toBe(`TYPE_DEF(NAME POINTER_TYPE(${PATH_TYPE}))`);
    });

    test('parentheses and tuples', () => {
        expect(typeOutline('(u8)')).toBe(`TYPE_DEF(NAME PAREN_TYPE(${PATH_TYPE}))`);
        expect(typeOutline('(u8,)')).toBe(`TYPE_DEF(NAME TUPLE_TYPE(${PATH_TYPE}))`);
        expect(typeOutline('()')).toBe('TYPE_DEF(NAME TUPLE_TYPE)');
    });

    test('never and placeholder', () => {
        expect(typeOutline('!')).toBe('TYPE_DEF(NAME NEVER_TYPE)');
        expect(typeOutline('_')).toBe('TYPE_DEF(NAME PLACEHOLDER_TYPE)');
    });

    test('function pointers', () => {
        expect(typeOutline('fn(u8) -> !')).toBe(`TYPE_DEF(NAME FN_POINTER_TYPE(PARAM_LIST(PARAM(${PATH_TYPE})) RET_TYPE(NEVER_TYPE)))`);
    });

    test('trait objects and bounds', () => {
        expect(typeOutline(`impl Clone + 'a`)).toBe(`TYPE_DEF(NAME IMPL_TRAIT_TYPE(TYPE_BOUND_LIST(TYPE_BOUND(${PATH_TYPE}) TYPE_BOUND)))`);
        expect(typeOutline('dyn Fn(u8) -> u8')).toBe(
            `TYPE_DEF(NAME DYN_TRAIT_TYPE(TYPE_BOUND_LIST(TYPE_BOUND(PATH_TYPE(PATH(PATH_SEGMENT(NAME_REF PARAM_LIST(PARAM(${PATH_TYPE})) RET_TYPE(${PATH_TYPE}))))))))`
        );
    });

    test('nested generic arguments close with separate angle brackets', () => {
        const file = parseRust('type T = Vec<Vec<u8>>;');
        expect(file.errors()).toEqual([]);
        expect(typeOutline('Vec<Vec<u8>>')).toBe(
            `TYPE_DEF(NAME PATH_TYPE(PATH(PATH_SEGMENT(NAME_REF TYPE_ARG_LIST(TYPE_ARG(PATH_TYPE(PATH(PATH_SEGMENT(NAME_REF TYPE_ARG_LIST(TYPE_ARG(${PATH_TYPE})))))))))))`
        );
    });

    test('qualified paths nest to the left', () => {
        const alias = TypeDef.cast(parseRust('type T = a::b::C;').syntax().children()[0]);
        const type = alias?.typeRef();
        const path = type ? PathType.cast(type.syntax)?.path() : undefined;
        expect(path?.segment()?.syntax.text()).toBe('C');
        expect(path?.qualifier()?.syntax.text()).toBe('a::b');
        expect(path?.qualifier()?.qualifier()?.syntax.text()).toBe('a');
    });
});
