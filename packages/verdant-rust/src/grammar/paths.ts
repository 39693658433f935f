/******************************************************************************
 * Copyright 2024 TypeFox GmbH
 * This program and the accompanying materials are made available under the
 * terms of the MIT License, which is available in the project root.
 ******************************************************************************/

import type { Parser } from '../parser/parser.js';
import { SyntaxKind } from 'verdant-core';
import { TokenSet } from '../parser/token-set.js';
import { optRetType, paramList } from './items.js';
import { typeArgList } from './type-params.js';

/**
 * How generic arguments are written: not at all in `use` paths, `Vec<T>` in
 * types and `Vec::<T>` in expressions.
 */
export type PathMode = 'use' | 'type' | 'expr';

export const PATH_FIRST = TokenSet.of(
    SyntaxKind.IDENT, SyntaxKind.SELF_KW, SyntaxKind.SUPER_KW, SyntaxKind.CRATE_KW, SyntaxKind.COLONCOLON
);

const SEGMENT_RECOVERY = TokenSet.of(
    SyntaxKind.SEMI, SyntaxKind.COMMA, SyntaxKind.EQ, SyntaxKind.R_PAREN, SyntaxKind.R_BRACK, SyntaxKind.R_ANGLE
);

export function isPathStart(p: Parser): boolean {
    return p.atSet(PATH_FIRST);
}

export function name(p: Parser): void {
    if (p.at(SyntaxKind.IDENT)) {
        const m = p.start();
        p.bump();
        m.complete(p, SyntaxKind.NAME);
    } else {
        p.error('expected a name');
    }
}

export function nameRef(p: Parser): void {
    if (p.at(SyntaxKind.IDENT)) {
        const m = p.start();
        p.bump();
        m.complete(p, SyntaxKind.NAME_REF);
    } else {
        p.error('expected an identifier');
    }
}

/**
 * `a::b::c` nests as `PATH(PATH(PATH(a) :: b) :: c)`: the qualifier is the
 * inner path, the segment the last one.
 */
export function path(p: Parser, mode: PathMode): void {
    const m = p.start();
    pathSegment(p, mode, true);
    let qualifier = m.complete(p, SyntaxKind.PATH);
    while (p.at(SyntaxKind.COLONCOLON)) {
        const next = p.nth(1);
        if (mode === 'use' && (next === SyntaxKind.L_CURLY || next === SyntaxKind.STAR)) {
            break;
        }
        const outer = qualifier.precede(p);
        p.bump();
        pathSegment(p, mode, false);
        qualifier = outer.complete(p, SyntaxKind.PATH);
    }
}

function pathSegment(p: Parser, mode: PathMode, first: boolean): void {
    const m = p.start();
    if (first) {
        p.eat(SyntaxKind.COLONCOLON);
    }
    switch (p.current()) {
        case SyntaxKind.IDENT:
            nameRef(p);
            optSegmentArgs(p, mode);
            break;
        case SyntaxKind.SELF_KW:
        case SyntaxKind.SUPER_KW:
        case SyntaxKind.CRATE_KW:
            p.bump();
            break;
        default:
            p.errRecover('expected an identifier', SEGMENT_RECOVERY);
    }
    m.complete(p, SyntaxKind.PATH_SEGMENT);
}

function optSegmentArgs(p: Parser, mode: PathMode): void {
    if (mode === 'type') {
        if (p.at(SyntaxKind.L_ANGLE)) {
            typeArgList(p, false);
        } else if (p.at(SyntaxKind.L_PAREN)) {
            // `Fn(A, B) -> C`
            paramList(p, 'fnPointer');
            optRetType(p);
        }
    } else if (mode === 'expr' && p.at(SyntaxKind.COLONCOLON) && p.nth(1) === SyntaxKind.L_ANGLE) {
        typeArgList(p, true);
    }
}
