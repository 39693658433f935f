/******************************************************************************
 * Copyright 2024 TypeFox GmbH
 * This program and the accompanying materials are made available under the
 * terms of the MIT License, which is available in the project root.
 ******************************************************************************/

import { describe, test, expect } from 'vitest';
import { StaticDef, SyntaxKind, TraitDef, UseItem } from 'verdant-core';
import { itemOutline, parseRust } from '../test-helper.js';

describe('Functions', () => {

    test('attributes, visibility and return type', () => {
        const file = parseRust('#![allow(dead_code)]\n#[inline] pub(crate) fn f() -> u8 { 1 }');
        expect(file.errors()).toEqual([]);
        const root = file.ast();
        const [inner] = root.attrs();
        expect(inner.isInner()).toBe(true);
        expect(inner.asCall()?.name).toBe('allow');
        const [fn] = root.functions();
        expect(fn.hasAtomAttr('inline')).toBe(true);
        expect(fn.visibility()?.syntax.text()).toBe('pub(crate)');
        expect(fn.retType()?.typeRef()?.syntax.text()).toBe('u8');
    });

    test('parameters and self', () => {
        const file = parseRust('trait T: Clone { fn f(&self, x: u8); }');
        expect(file.errors()).toEqual([]);
        const trait = TraitDef.cast(file.syntax().children()[0]);
        const params = trait?.itemList()?.functions()[0].paramList();
        expect(params?.selfParam()?.isRef()).toBe(true);
        expect(params?.params().map(param => param.pat()?.syntax.text())).toEqual(['x']);
    });

    test('qualified functions', () => {
        const file = parseRust('const fn a() {}\nunsafe fn b() {}\nextern "C" fn c();');
        expect(file.errors()).toEqual([]);
        expect(file.ast().functions().map(fn => fn.name()?.text())).toEqual(['a', 'b', 'c']);
    });
});

describe('Structs and enums', () => {

    test('named fields', () => {
        const file = parseRust('struct S { a: u32, pub b: T }');
        expect(file.errors()).toEqual([]);
        const [s] = file.ast().structs();
        expect(s.fields().map(field => field.name()?.text())).toEqual(['a', 'b']);
        expect(s.fields().map(field => field.visibility() !== undefined)).toEqual([false, true]);
    });

    test('tuple structs', () => {
        const file = parseRust('struct P(u8, pub u16);');
        expect(file.errors()).toEqual([]);
        const [p] = file.ast().structs();
        expect(p.fields()).toEqual([]);
        expect(p.posFieldList()?.fields().map(field => field.typeRef()?.syntax.text())).toEqual(['u8', 'u16']);
    });

    test('enum variants of every shape', () => {
        const file = parseRust('enum E { A, B(u8), C { x: i32 }, D = 1 }');
        expect(file.errors()).toEqual([]);
        const [e] = file.ast().enums();
        expect(e.variants().map(variant => variant.name()?.text())).toEqual(['A', 'B', 'C', 'D']);
        expect(e.variants()[2].namedFieldDefList()?.fields()).toHaveLength(1);
        expect(e.variants()[3].expr()?.kind).toBe(SyntaxKind.LITERAL);
    });
});

describe('Impls, traits and modules', () => {

    test('trait impls with generics and where clauses', () => {
        const file = parseRust('impl<T> Tr for S<T> where T: Clone {}');
        expect(file.errors()).toEqual([]);
        const [impl] = file.ast().impls();
        expect(impl.targetTrait()?.syntax.text()).toBe('Tr');
        expect(impl.targetType()?.syntax.text()).toBe('S<T>');
        expect(impl.typeParamList()?.typeParams().map(param => param.name()?.text())).toEqual(['T']);
        expect(impl.whereClause()?.predicates()).toHaveLength(1);
    });

    test('inherent impls', () => {
        const [impl] = parseRust('unsafe impl S {}').ast().impls();
        expect(impl.targetTrait()).toBeUndefined();
        expect(impl.targetType()?.syntax.text()).toBe('S');
    });

    test('inline and out-of-line modules', () => {
        const file = parseRust('mod m;\nmod n { fn f() {} }');
        expect(file.errors()).toEqual([]);
        const [m, n] = file.ast().modules();
        expect(m.hasSemi()).toBe(true);
        expect(n.hasSemi()).toBe(false);
        expect(n.functions().map(fn => fn.name()?.text())).toEqual(['f']);
    });
});

describe('Other items', () => {

    test('use trees', () => {
        expect(itemOutline('use a::{b, c::*};')).toBe(
            'USE_ITEM(USE_TREE(PATH(PATH_SEGMENT(NAME_REF)) USE_TREE_LIST(USE_TREE(PATH(PATH_SEGMENT(NAME_REF))) USE_TREE(PATH(PATH_SEGMENT(NAME_REF))))))'
        );
        expect(itemOutline('use a as b;')).toBe('USE_ITEM(USE_TREE(PATH(PATH_SEGMENT(NAME_REF)) ALIAS(NAME)))');
        const glob = UseItem.cast(parseRust('use a::*;').syntax().children()[0]);
        expect(glob?.useTree()?.isGlob()).toBe(true);
    });

    test('constants, statics, type aliases and extern crates', () => {
        const file = parseRust('const X: u8 = 1;\nstatic mut Y: u8 = 2;\ntype Z = u8;\nextern crate foo as bar;');
        expect(file.errors()).toEqual([]);
        expect(file.ast().items().map(item => item.kind)).toEqual([
            SyntaxKind.CONST_DEF, SyntaxKind.STATIC_DEF, SyntaxKind.TYPE_DEF, SyntaxKind.EXTERN_CRATE_ITEM
        ]);
        expect(StaticDef.cast(file.syntax().children()[2])?.isMutable()).toBe(true);
    });

    test('macro definitions and calls', () => {
        const file = parseRust('macro_rules! m { () => {} }\nm!(1);');
        expect(file.errors()).toEqual([]);
        expect(file.ast().items().map(item => item.kind)).toEqual([SyntaxKind.MACRO_CALL, SyntaxKind.MACRO_CALL]);
    });
});
