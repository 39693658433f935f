/******************************************************************************
 * Copyright 2024 TypeFox GmbH
 * This program and the accompanying materials are made available under the
 * terms of the MIT License, which is available in the project root.
 ******************************************************************************/

import { describe, test, expect } from 'vitest';
import type { AttrsOwner, GreenBuilder, NameOwner, SyntaxNodeRef, TypeParamsOwner } from 'verdant-core';
import { Attr, Expr, FnDef, ModuleItem, NominalDef, Root, StructDef, SyntaxKind, astUnion, preorder } from 'verdant-core';
import { buildTree } from '../test-helper.js';

function attr(sink: GreenBuilder, build: () => void): void {
    sink.startNode(SyntaxKind.ATTR);
    sink.token(SyntaxKind.POUND, '#');
    sink.startNode(SyntaxKind.TOKEN_TREE);
    sink.token(SyntaxKind.L_BRACK, '[');
    build();
    sink.token(SyntaxKind.R_BRACK, ']');
    sink.finishNode();
    sink.finishNode();
}

/** `#[test] #[derive(Debug)] fn f() {}` */
function sampleRoot(): SyntaxNodeRef {
    return buildTree(sink => {
        sink.startNode(SyntaxKind.ROOT);
        sink.startNode(SyntaxKind.FN_DEF);
        attr(sink, () => sink.token(SyntaxKind.IDENT, 'test'));
        sink.token(SyntaxKind.WHITESPACE, ' ');
        attr(sink, () => {
            sink.token(SyntaxKind.IDENT, 'derive');
            sink.startNode(SyntaxKind.TOKEN_TREE);
            sink.token(SyntaxKind.L_PAREN, '(');
            sink.token(SyntaxKind.IDENT, 'Debug');
            sink.token(SyntaxKind.R_PAREN, ')');
            sink.finishNode();
        });
        sink.token(SyntaxKind.WHITESPACE, ' ');
        sink.token(SyntaxKind.FN_KW, 'fn');
        sink.token(SyntaxKind.WHITESPACE, ' ');
        sink.startNode(SyntaxKind.NAME);
        sink.token(SyntaxKind.IDENT, 'f');
        sink.finishNode();
        sink.startNode(SyntaxKind.PARAM_LIST);
        sink.token(SyntaxKind.L_PAREN, '(');
        sink.token(SyntaxKind.R_PAREN, ')');
        sink.finishNode();
        sink.token(SyntaxKind.WHITESPACE, ' ');
        sink.startNode(SyntaxKind.BLOCK);
        sink.token(SyntaxKind.L_CURLY, '{');
        sink.token(SyntaxKind.R_CURLY, '}');
        sink.finishNode();
        sink.finishNode();
        sink.finishNode();
    }).borrowed();
}

describe('Typed casts', () => {

    test('cast succeeds exactly for the matching kind', () => {
        for (const node of preorder(sampleRoot())) {
            expect(FnDef.cast(node) !== undefined).toBe(node.kind === SyntaxKind.FN_DEF);
            expect(Root.cast(node) !== undefined).toBe(node.kind === SyntaxKind.ROOT);
        }
    });

    test('wrappers expose their kind and node', () => {
        const root = sampleRoot();
        const fn = FnDef.cast(root.children()[0]);
        expect(fn?.kind).toBe(SyntaxKind.FN_DEF);
        expect(fn?.syntax.equals(root.children()[0])).toBe(true);
    });

    test('accessors read direct children', () => {
        const root = Root.cast(sampleRoot());
        const [fn] = root?.functions() ?? [];
        expect(fn.name()?.text()).toBe('f');
        expect(fn.paramList()?.params()).toEqual([]);
        expect(fn.body()?.statements()).toEqual([]);
        expect(fn.body()?.expr()).toBeUndefined();
        expect(fn.retType()).toBeUndefined();
        expect(fn.typeParamList()).toBeUndefined();
        expect(root?.structs()).toEqual([]);
    });
});

describe('Attributes', () => {

    test('atoms and calls', () => {
        const [fn] = Root.cast(sampleRoot())?.functions() ?? [];
        const [atom, call] = fn.attrs();
        expect(atom.asAtom()).toBe('test');
        expect(atom.asCall()).toBeUndefined();
        expect(atom.isInner()).toBe(false);
        expect(call.asAtom()).toBeUndefined();
        expect(call.asCall()?.name).toBe('derive');
        expect(call.asCall()?.args.syntax.text()).toBe('(Debug)');
    });

    test('hasAtomAttr', () => {
        const [fn] = Root.cast(sampleRoot())?.functions() ?? [];
        expect(fn.hasAtomAttr('test')).toBe(true);
        expect(fn.hasAtomAttr('derive')).toBe(false);
    });
});

describe('Tagged unions', () => {

    test('cast picks the variant of the node kind', () => {
        const fnNode = sampleRoot().children()[0];
        const item = ModuleItem.cast(fnNode);
        expect(item).toBeInstanceOf(FnDef);
        expect(item?.kind).toBe(SyntaxKind.FN_DEF);
        expect(Expr.cast(fnNode)).toBeUndefined();
        expect(NominalDef.cast(fnNode)).toBeUndefined();
    });

    test('is narrows to the union', () => {
        const fn = FnDef.cast(sampleRoot().children()[0]);
        expect(fn && ModuleItem.is(fn)).toBe(true);
        expect(fn && Expr.is(fn)).toBe(false);
    });

    test('kind lists are exhaustive', () => {
        expect(NominalDef.kinds).toEqual([SyntaxKind.STRUCT_DEF, SyntaxKind.ENUM_DEF]);
        expect(ModuleItem.kinds).toContain(SyntaxKind.MACRO_CALL);
        expect(Expr.kinds).toContain(SyntaxKind.MACRO_CALL);
        expect(Expr.kinds).toHaveLength(27);
    });

    test('a kind claimed twice is rejected', () => {
        expect(() => astUnion<FnDef | StructDef>('Broken', [FnDef, StructDef, FnDef])).toThrow('Broken: more than one variant accepts FN_DEF');
    });
});

describe('Capabilities', () => {

    test('items share name, generics and attribute accessors', () => {
        const [fn] = Root.cast(sampleRoot())?.functions() ?? [];
        const named: NameOwner = fn;
        const generic: TypeParamsOwner = fn;
        const attributed: AttrsOwner = fn;
        expect(named.name()?.text()).toBe('f');
        expect(generic.whereClause()).toBeUndefined();
        expect(attributed.attrs().map(each => each.kind)).toEqual([Attr.KIND, Attr.KIND]);
    });
});
