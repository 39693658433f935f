/******************************************************************************
 * Copyright 2024 TypeFox GmbH
 * This program and the accompanying materials are made available under the
 * terms of the MIT License, which is available in the project root.
 ******************************************************************************/

import type { Marker, Parser } from '../parser/parser.js';
import { SyntaxKind } from 'verdant-core';
import { atTokenTree, innerAttributes, outerAttributes, tokenTree } from './attributes.js';
import { block, expr } from './expressions.js';
import { name, nameRef, path } from './paths.js';
import { isPatStart, pattern } from './patterns.js';
import { bounds, optTypeParamList, optWhereClause } from './type-params.js';
import { isTypeStart, typeRef } from './types.js';

// --- Module contents ---

/**
 * Items up to the end of input, or up to the closing `}` of an item list.
 * At the top level a stray `}` becomes an `ERROR` node of its own.
 */
export function modContents(p: Parser, stopOnRCurly: boolean): void {
    while (!p.at(SyntaxKind.EOF) && !(stopOnRCurly && p.at(SyntaxKind.R_CURLY))) {
        if (p.at(SyntaxKind.R_CURLY)) {
            const m = p.start();
            p.error('unmatched `}`');
            p.bump();
            m.complete(p, SyntaxKind.ERROR);
        } else {
            item(p);
        }
    }
}

function item(p: Parser): void {
    const m = p.start();
    const start = p.position;
    outerAttributes(p);
    if (optItem(p, m)) {
        return;
    }
    if (p.at(SyntaxKind.IDENT) && p.nth(1) === SyntaxKind.EXCL) {
        path(p, 'expr');
        const braced = macroCallBody(p);
        if (!p.eat(SyntaxKind.SEMI) && !braced) {
            p.error('expected SEMI');
        }
        m.complete(p, SyntaxKind.MACRO_CALL);
        return;
    }
    if (p.position !== start) {
        p.error('expected an item after attributes');
        m.complete(p, SyntaxKind.ERROR);
        return;
    }
    m.abandon(p);
    p.errSkip('expected an item');
}

/**
 * Parses an item if one starts here, completing `m`, which may already cover
 * its outer attributes. Consumes nothing and returns false otherwise.
 */
export function optItem(p: Parser, m: Marker): boolean {
    const start = p.position;
    const kind = itemBody(p);
    if (kind !== undefined) {
        m.complete(p, kind);
        return true;
    }
    if (p.position !== start) {
        p.error('expected an item');
        m.complete(p, SyntaxKind.ERROR);
        return true;
    }
    return false;
}

/** True where a statement of a block is an item rather than an expression. */
export function isItemStart(p: Parser): boolean {
    switch (p.current()) {
        case SyntaxKind.FN_KW:
        case SyntaxKind.STRUCT_KW:
        case SyntaxKind.ENUM_KW:
        case SyntaxKind.TRAIT_KW:
        case SyntaxKind.IMPL_KW:
        case SyntaxKind.MOD_KW:
        case SyntaxKind.USE_KW:
        case SyntaxKind.TYPE_KW:
        case SyntaxKind.STATIC_KW:
        case SyntaxKind.CONST_KW:
        case SyntaxKind.EXTERN_KW:
        case SyntaxKind.PUB_KW:
            return true;
        case SyntaxKind.UNSAFE_KW:
            return isUnsafeItem(p);
        default:
            return false;
    }
}

function isUnsafeItem(p: Parser): boolean {
    const next = p.nth(1);
    return next === SyntaxKind.FN_KW || next === SyntaxKind.TRAIT_KW || next === SyntaxKind.IMPL_KW || next === SyntaxKind.EXTERN_KW;
}

function itemBody(p: Parser): SyntaxKind | undefined {
    optVisibility(p);
    switch (p.current()) {
        case SyntaxKind.USE_KW:
            useItem(p);
            return SyntaxKind.USE_ITEM;
        case SyntaxKind.FN_KW:
            fnDef(p);
            return SyntaxKind.FN_DEF;
        case SyntaxKind.STRUCT_KW:
            structDef(p);
            return SyntaxKind.STRUCT_DEF;
        case SyntaxKind.ENUM_KW:
            enumDef(p);
            return SyntaxKind.ENUM_DEF;
        case SyntaxKind.TRAIT_KW:
            traitDef(p);
            return SyntaxKind.TRAIT_DEF;
        case SyntaxKind.IMPL_KW:
            implItem(p);
            return SyntaxKind.IMPL_ITEM;
        case SyntaxKind.MOD_KW:
            module(p);
            return SyntaxKind.MODULE;
        case SyntaxKind.TYPE_KW:
            typeDef(p);
            return SyntaxKind.TYPE_DEF;
        case SyntaxKind.STATIC_KW:
            constOrStatic(p);
            return SyntaxKind.STATIC_DEF;
        case SyntaxKind.CONST_KW: {
            const next = p.nth(1);
            if (next === SyntaxKind.FN_KW || next === SyntaxKind.UNSAFE_KW || next === SyntaxKind.EXTERN_KW) {
                p.bump();
                return qualifiedItem(p);
            }
            constOrStatic(p);
            return SyntaxKind.CONST_DEF;
        }
        case SyntaxKind.UNSAFE_KW:
            return isUnsafeItem(p) ? qualifiedItem(p) : undefined;
        case SyntaxKind.EXTERN_KW:
            if (p.nth(1) === SyntaxKind.CRATE_KW) {
                externCrate(p);
                return SyntaxKind.EXTERN_CRATE_ITEM;
            }
            return qualifiedItem(p);
        default:
            return undefined;
    }
}

/** Items after `unsafe` or an `extern "ABI"` qualifier. */
function qualifiedItem(p: Parser): SyntaxKind {
    p.eat(SyntaxKind.UNSAFE_KW);
    if (p.eat(SyntaxKind.EXTERN_KW)) {
        p.eat(SyntaxKind.STRING);
    }
    switch (p.current()) {
        case SyntaxKind.TRAIT_KW:
            traitDef(p);
            return SyntaxKind.TRAIT_DEF;
        case SyntaxKind.IMPL_KW:
            implItem(p);
            return SyntaxKind.IMPL_ITEM;
        default:
            fnDef(p);
            return SyntaxKind.FN_DEF;
    }
}

/** `pub`, `pub(crate)`, `pub(super)`, `pub(self)` or `pub(in path)`. */
export function optVisibility(p: Parser): void {
    if (!p.at(SyntaxKind.PUB_KW)) {
        return;
    }
    const m = p.start();
    p.bump();
    if (p.at(SyntaxKind.L_PAREN)) {
        switch (p.nth(1)) {
            case SyntaxKind.CRATE_KW:
            case SyntaxKind.SUPER_KW:
            case SyntaxKind.SELF_KW:
                p.bump();
                p.bump();
                p.expect(SyntaxKind.R_PAREN);
                break;
            case SyntaxKind.IN_KW:
                p.bump();
                p.bump();
                path(p, 'use');
                p.expect(SyntaxKind.R_PAREN);
                break;
        }
    }
    m.complete(p, SyntaxKind.VISIBILITY);
}

// --- Macro calls ---

/**
 * The `!`, optional name and token tree after a macro path. Returns whether
 * the tree is delimited by curly braces.
 */
export function macroCallBody(p: Parser): boolean {
    p.expect(SyntaxKind.EXCL);
    p.eat(SyntaxKind.IDENT);
    if (!atTokenTree(p)) {
        p.error('expected a delimited token tree');
        return false;
    }
    const braced = p.at(SyntaxKind.L_CURLY);
    tokenTree(p);
    return braced;
}

// --- Functions ---

export function fnDef(p: Parser): void {
    p.expect(SyntaxKind.FN_KW);
    name(p);
    optTypeParamList(p);
    if (p.at(SyntaxKind.L_PAREN)) {
        paramList(p, 'fn');
    } else {
        p.error('expected function arguments');
    }
    optRetType(p);
    optWhereClause(p);
    if (p.at(SyntaxKind.L_CURLY)) {
        block(p);
    } else {
        p.expect(SyntaxKind.SEMI);
    }
}

/**
 * Function parameters take `pat: Type`, closure parameters `pat` with an
 * optional type between pipes, and function pointer types and `Fn(..)` bounds
 * a bare type or `name: Type`.
 */
export type ParamFlavor = 'fn' | 'closure' | 'fnPointer';

export function paramList(p: Parser, flavor: ParamFlavor): void {
    const m = p.start();
    const close = flavor === 'closure' ? SyntaxKind.PIPE : SyntaxKind.R_PAREN;
    p.bump();
    if (flavor === 'fn') {
        optSelfParam(p);
    }
    while (!p.at(SyntaxKind.EOF) && !p.at(close)) {
        if (!isPatStart(p) && !(flavor === 'fnPointer' && isTypeStart(p))) {
            p.error('expected a parameter');
            break;
        }
        param(p, flavor);
        if (!p.at(close) && !p.expect(SyntaxKind.COMMA)) {
            break;
        }
    }
    p.expect(close);
    m.complete(p, SyntaxKind.PARAM_LIST);
}

function param(p: Parser, flavor: ParamFlavor): void {
    const m = p.start();
    if (flavor === 'fnPointer') {
        if ((p.at(SyntaxKind.IDENT) || p.at(SyntaxKind.UNDERSCORE)) && p.nth(1) === SyntaxKind.COLON) {
            pattern(p);
            p.bump();
        }
        typeRef(p);
    } else {
        pattern(p);
        if (p.eat(SyntaxKind.COLON)) {
            typeRef(p);
        } else if (flavor === 'fn') {
            p.error('expected COLON');
        }
    }
    m.complete(p, SyntaxKind.PARAM);
}

/** `self`, `mut self`, `&self`, `&'a mut self` or `self: Type`. */
function optSelfParam(p: Parser): void {
    const length = selfParamLength(p);
    if (length === 0) {
        return;
    }
    const m = p.start();
    for (let i = 0; i < length; i++) {
        p.bump();
    }
    if (p.eat(SyntaxKind.COLON)) {
        typeRef(p);
    }
    m.complete(p, SyntaxKind.SELF_PARAM);
    if (!p.at(SyntaxKind.R_PAREN)) {
        p.expect(SyntaxKind.COMMA);
    }
}

function selfParamLength(p: Parser): number {
    let i = 0;
    if (p.nth(i) === SyntaxKind.AMP) {
        i++;
        if (p.nth(i) === SyntaxKind.LIFETIME) {
            i++;
        }
    }
    if (p.nth(i) === SyntaxKind.MUT_KW) {
        i++;
    }
    return p.nth(i) === SyntaxKind.SELF_KW ? i + 1 : 0;
}

export function optRetType(p: Parser): void {
    if (p.at(SyntaxKind.THIN_ARROW)) {
        const m = p.start();
        p.bump();
        typeRef(p);
        m.complete(p, SyntaxKind.RET_TYPE);
    }
}

// --- Structs and enums ---

function structDef(p: Parser): void {
    p.bump();
    name(p);
    optTypeParamList(p);
    if (p.at(SyntaxKind.L_PAREN)) {
        posFieldList(p);
        optWhereClause(p);
        p.expect(SyntaxKind.SEMI);
        return;
    }
    optWhereClause(p);
    if (p.at(SyntaxKind.L_CURLY)) {
        namedFieldDefList(p);
    } else if (!p.eat(SyntaxKind.SEMI)) {
        p.error('expected `;`, `{`, or `(`');
    }
}

/** `{ pub a: u32, b: T }`, on its own also a reparsing entry point. */
export function namedFieldDefList(p: Parser): void {
    const m = p.start();
    p.expect(SyntaxKind.L_CURLY);
    while (!p.at(SyntaxKind.EOF) && !p.at(SyntaxKind.R_CURLY)) {
        const field = p.start();
        const start = p.position;
        outerAttributes(p);
        optVisibility(p);
        if (p.at(SyntaxKind.IDENT)) {
            name(p);
            p.expect(SyntaxKind.COLON);
            typeRef(p);
            field.complete(p, SyntaxKind.NAMED_FIELD_DEF);
        } else if (p.position !== start) {
            p.error('expected a field declaration');
            field.complete(p, SyntaxKind.ERROR);
        } else {
            field.abandon(p);
            p.errSkip('expected a field declaration');
        }
        if (!p.at(SyntaxKind.R_CURLY)) {
            p.expect(SyntaxKind.COMMA);
        }
    }
    p.expect(SyntaxKind.R_CURLY);
    m.complete(p, SyntaxKind.NAMED_FIELD_DEF_LIST);
}

function posFieldList(p: Parser): void {
    const m = p.start();
    p.bump();
    while (!p.at(SyntaxKind.EOF) && !p.at(SyntaxKind.R_PAREN)) {
        const field = p.start();
        outerAttributes(p);
        optVisibility(p);
        if (!isTypeStart(p)) {
            p.error('expected a field type');
            field.complete(p, SyntaxKind.POS_FIELD);
            break;
        }
        typeRef(p);
        field.complete(p, SyntaxKind.POS_FIELD);
        if (!p.at(SyntaxKind.R_PAREN) && !p.expect(SyntaxKind.COMMA)) {
            break;
        }
    }
    p.expect(SyntaxKind.R_PAREN);
    m.complete(p, SyntaxKind.POS_FIELD_LIST);
}

function enumDef(p: Parser): void {
    p.bump();
    name(p);
    optTypeParamList(p);
    optWhereClause(p);
    if (p.at(SyntaxKind.L_CURLY)) {
        enumVariantList(p);
    } else {
        p.error('expected `{`');
    }
}

function enumVariantList(p: Parser): void {
    const m = p.start();
    p.bump();
    while (!p.at(SyntaxKind.EOF) && !p.at(SyntaxKind.R_CURLY)) {
        const variant = p.start();
        const start = p.position;
        outerAttributes(p);
        if (p.at(SyntaxKind.IDENT)) {
            name(p);
            if (p.at(SyntaxKind.L_CURLY)) {
                namedFieldDefList(p);
            } else if (p.at(SyntaxKind.L_PAREN)) {
                posFieldList(p);
            } else if (p.eat(SyntaxKind.EQ)) {
                expr(p);
            }
            variant.complete(p, SyntaxKind.ENUM_VARIANT);
        } else if (p.position !== start) {
            p.error('expected an enum variant');
            variant.complete(p, SyntaxKind.ERROR);
        } else {
            variant.abandon(p);
            p.errSkip('expected an enum variant');
        }
        if (!p.at(SyntaxKind.R_CURLY)) {
            p.expect(SyntaxKind.COMMA);
        }
    }
    p.expect(SyntaxKind.R_CURLY);
    m.complete(p, SyntaxKind.ENUM_VARIANT_LIST);
}

// --- Traits, impls and modules ---

function traitDef(p: Parser): void {
    p.bump();
    name(p);
    optTypeParamList(p);
    if (p.eat(SyntaxKind.COLON)) {
        bounds(p);
    }
    optWhereClause(p);
    if (p.at(SyntaxKind.L_CURLY)) {
        itemList(p);
    } else {
        p.error('expected `{`');
    }
}

/** `impl<T> Trait for Type where ... { ... }` or an inherent `impl Type { ... }`. */
function implItem(p: Parser): void {
    p.bump();
    optTypeParamList(p);
    p.eat(SyntaxKind.EXCL);
    typeRef(p);
    if (p.eat(SyntaxKind.FOR_KW)) {
        typeRef(p);
    }
    optWhereClause(p);
    if (p.at(SyntaxKind.L_CURLY)) {
        itemList(p);
    } else {
        p.error('expected `{`');
    }
}

function module(p: Parser): void {
    p.bump();
    name(p);
    if (p.at(SyntaxKind.L_CURLY)) {
        itemList(p);
    } else {
        p.expect(SyntaxKind.SEMI);
    }
}

function itemList(p: Parser): void {
    const m = p.start();
    p.bump();
    innerAttributes(p);
    modContents(p, true);
    p.expect(SyntaxKind.R_CURLY);
    m.complete(p, SyntaxKind.ITEM_LIST);
}

// --- Use declarations ---

function useItem(p: Parser): void {
    p.bump();
    if (atUseTreeStart(p)) {
        useTree(p);
    } else {
        p.error('expected a use path');
    }
    p.expect(SyntaxKind.SEMI);
}

function atUseTreeStart(p: Parser): boolean {
    switch (p.current()) {
        case SyntaxKind.STAR:
        case SyntaxKind.L_CURLY:
        case SyntaxKind.IDENT:
        case SyntaxKind.SELF_KW:
        case SyntaxKind.SUPER_KW:
        case SyntaxKind.CRATE_KW:
        case SyntaxKind.COLONCOLON:
            return true;
        default:
            return false;
    }
}

/** `a::b`, `a::b as c`, `a::*`, `a::{b, c}`, `*` or `{b, c}`. */
function useTree(p: Parser): void {
    const m = p.start();
    if (p.at(SyntaxKind.STAR)) {
        p.bump();
    } else if (p.at(SyntaxKind.COLONCOLON) && p.nth(1) === SyntaxKind.STAR) {
        p.bump();
        p.bump();
    } else if (p.at(SyntaxKind.L_CURLY)) {
        useTreeList(p);
    } else if (p.at(SyntaxKind.COLONCOLON) && p.nth(1) === SyntaxKind.L_CURLY) {
        p.bump();
        useTreeList(p);
    } else {
        path(p, 'use');
        if (p.at(SyntaxKind.AS_KW)) {
            alias(p);
        } else if (p.at(SyntaxKind.COLONCOLON)) {
            p.bump();
            if (p.at(SyntaxKind.STAR)) {
                p.bump();
            } else if (p.at(SyntaxKind.L_CURLY)) {
                useTreeList(p);
            } else {
                p.error('expected `{` or `*`');
            }
        }
    }
    m.complete(p, SyntaxKind.USE_TREE);
}

function useTreeList(p: Parser): void {
    const m = p.start();
    p.bump();
    while (!p.at(SyntaxKind.EOF) && !p.at(SyntaxKind.R_CURLY)) {
        if (atUseTreeStart(p)) {
            useTree(p);
        } else {
            p.errSkip('expected a use tree');
        }
        if (!p.at(SyntaxKind.R_CURLY)) {
            p.expect(SyntaxKind.COMMA);
        }
    }
    p.expect(SyntaxKind.R_CURLY);
    m.complete(p, SyntaxKind.USE_TREE_LIST);
}

function alias(p: Parser): void {
    const m = p.start();
    p.bump();
    if (!p.eat(SyntaxKind.UNDERSCORE)) {
        name(p);
    }
    m.complete(p, SyntaxKind.ALIAS);
}

// --- Other items ---

function constOrStatic(p: Parser): void {
    if (p.eat(SyntaxKind.STATIC_KW)) {
        p.eat(SyntaxKind.MUT_KW);
    } else {
        p.bump();
    }
    name(p);
    if (p.expect(SyntaxKind.COLON)) {
        typeRef(p);
    }
    if (p.eat(SyntaxKind.EQ)) {
        expr(p);
    }
    p.expect(SyntaxKind.SEMI);
}

function typeDef(p: Parser): void {
    p.bump();
    name(p);
    optTypeParamList(p);
    if (p.eat(SyntaxKind.COLON)) {
        bounds(p);
    }
    optWhereClause(p);
    if (p.eat(SyntaxKind.EQ)) {
        typeRef(p);
    }
    p.expect(SyntaxKind.SEMI);
}

function externCrate(p: Parser): void {
    p.bump();
    p.bump();
    if (!p.eat(SyntaxKind.SELF_KW)) {
        nameRef(p);
    }
    if (p.at(SyntaxKind.AS_KW)) {
        alias(p);
    }
    p.expect(SyntaxKind.SEMI);
}
