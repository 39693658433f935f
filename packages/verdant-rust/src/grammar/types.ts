/******************************************************************************
 * Copyright 2024 TypeFox GmbH
 * This program and the accompanying materials are made available under the
 * terms of the MIT License, which is available in the project root.
 ******************************************************************************/

import type { Parser } from '../parser/parser.js';
import { SyntaxKind } from 'verdant-core';
import { TokenSet } from '../parser/token-set.js';
import { expr } from './expressions.js';
import { paramList, optRetType } from './items.js';
import { isPathStart, path } from './paths.js';
import { bounds, optTypeParamList } from './type-params.js';

// Spelled out rather than derived from PATH_FIRST: the grammar modules import
// each other, so their constants must not depend on one another at load time.
export const TYPE_FIRST = TokenSet.of(
    SyntaxKind.IDENT, SyntaxKind.SELF_KW, SyntaxKind.SUPER_KW, SyntaxKind.CRATE_KW, SyntaxKind.COLONCOLON,
    SyntaxKind.L_PAREN, SyntaxKind.EXCL, SyntaxKind.STAR, SyntaxKind.L_BRACK, SyntaxKind.AMP,
    SyntaxKind.AMPAMP, SyntaxKind.UNDERSCORE, SyntaxKind.FN_KW, SyntaxKind.UNSAFE_KW,
    SyntaxKind.EXTERN_KW, SyntaxKind.FOR_KW, SyntaxKind.IMPL_KW, SyntaxKind.DYN_KW
);

const TYPE_RECOVERY = TokenSet.of(
    SyntaxKind.R_PAREN, SyntaxKind.COMMA, SyntaxKind.SEMI, SyntaxKind.EQ, SyntaxKind.R_ANGLE, SyntaxKind.R_BRACK
);

export function isTypeStart(p: Parser): boolean {
    return p.atSet(TYPE_FIRST);
}

export function typeRef(p: Parser): void {
    switch (p.current()) {
        case SyntaxKind.L_PAREN:
            parenOrTupleType(p);
            break;
        case SyntaxKind.EXCL:
            neverType(p);
            break;
        case SyntaxKind.STAR:
            pointerType(p);
            break;
        case SyntaxKind.L_BRACK:
            arrayOrSliceType(p);
            break;
        case SyntaxKind.AMP:
        case SyntaxKind.AMPAMP:
            referenceType(p);
            break;
        case SyntaxKind.UNDERSCORE:
            placeholderType(p);
            break;
        case SyntaxKind.FN_KW:
        case SyntaxKind.UNSAFE_KW:
        case SyntaxKind.EXTERN_KW:
            fnPointerType(p);
            break;
        case SyntaxKind.FOR_KW:
            forType(p);
            break;
        case SyntaxKind.IMPL_KW:
            boundedType(p, SyntaxKind.IMPL_TRAIT_TYPE);
            break;
        case SyntaxKind.DYN_KW:
            boundedType(p, SyntaxKind.DYN_TRAIT_TYPE);
            break;
        default:
            if (isPathStart(p)) {
                pathType(p);
            } else {
                p.errRecover('expected type', TYPE_RECOVERY);
            }
    }
}

/** `(T)` is a parenthesized type, `()` and `(T,)` are tuples. */
function parenOrTupleType(p: Parser): void {
    const m = p.start();
    p.bump();
    let count = 0;
    let trailingComma = false;
    while (!p.at(SyntaxKind.EOF) && !p.at(SyntaxKind.R_PAREN)) {
        if (!isTypeStart(p)) {
            p.error('expected type');
            break;
        }
        typeRef(p);
        count++;
        trailingComma = false;
        if (!p.at(SyntaxKind.R_PAREN)) {
            if (!p.expect(SyntaxKind.COMMA)) {
                break;
            }
            trailingComma = true;
        }
    }
    p.expect(SyntaxKind.R_PAREN);
    m.complete(p, count === 1 && !trailingComma ? SyntaxKind.PAREN_TYPE : SyntaxKind.TUPLE_TYPE);
}

function neverType(p: Parser): void {
    const m = p.start();
    p.bump();
    m.complete(p, SyntaxKind.NEVER_TYPE);
}

function pointerType(p: Parser): void {
    const m = p.start();
    p.bump();
    if (!p.eat(SyntaxKind.MUT_KW) && !p.eat(SyntaxKind.CONST_KW)) {
        p.error('expected mut or const in raw pointer type');
    }
    typeRef(p);
    m.complete(p, SyntaxKind.POINTER_TYPE);
}

function arrayOrSliceType(p: Parser): void {
    const m = p.start();
    p.bump();
    typeRef(p);
    if (p.eat(SyntaxKind.SEMI)) {
        expr(p);
        p.expect(SyntaxKind.R_BRACK);
        m.complete(p, SyntaxKind.ARRAY_TYPE);
    } else {
        p.expect(SyntaxKind.R_BRACK);
        m.complete(p, SyntaxKind.SLICE_TYPE);
    }
}

function referenceType(p: Parser): void {
    const m = p.start();
    p.bump();
    p.eat(SyntaxKind.LIFETIME);
    p.eat(SyntaxKind.MUT_KW);
    typeRef(p);
    m.complete(p, SyntaxKind.REFERENCE_TYPE);
}

function placeholderType(p: Parser): void {
    const m = p.start();
    p.bump();
    m.complete(p, SyntaxKind.PLACEHOLDER_TYPE);
}

/** `unsafe extern "C" fn(u32) -> u8` */
function fnPointerType(p: Parser): void {
    const m = p.start();
    p.eat(SyntaxKind.UNSAFE_KW);
    if (p.eat(SyntaxKind.EXTERN_KW)) {
        p.eat(SyntaxKind.STRING);
    }
    if (!p.eat(SyntaxKind.FN_KW)) {
        p.error('expected fn');
        m.complete(p, SyntaxKind.FN_POINTER_TYPE);
        return;
    }
    if (p.at(SyntaxKind.L_PAREN)) {
        paramList(p, 'fnPointer');
    } else {
        p.error('expected parameters');
    }
    optRetType(p);
    m.complete(p, SyntaxKind.FN_POINTER_TYPE);
}

/** Higher-ranked `for<'a> fn(&'a u8)`. */
function forType(p: Parser): void {
    const m = p.start();
    p.bump();
    optTypeParamList(p);
    typeRef(p);
    m.complete(p, SyntaxKind.FOR_TYPE);
}

function boundedType(p: Parser, kind: SyntaxKind): void {
    const m = p.start();
    p.bump();
    bounds(p);
    m.complete(p, kind);
}

function pathType(p: Parser): void {
    const m = p.start();
    path(p, 'type');
    m.complete(p, SyntaxKind.PATH_TYPE);
}
