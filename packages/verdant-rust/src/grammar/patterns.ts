/******************************************************************************
 * Copyright 2024 TypeFox GmbH
 * This program and the accompanying materials are made available under the
 * terms of the MIT License, which is available in the project root.
 ******************************************************************************/

import type { Parser } from '../parser/parser.js';
import { SyntaxKind, isLiteralKind } from 'verdant-core';
import { TokenSet } from '../parser/token-set.js';
import { literal } from './expressions.js';
import { name, path } from './paths.js';

export const PAT_FIRST = TokenSet.of(
    SyntaxKind.UNDERSCORE, SyntaxKind.AMP, SyntaxKind.AMPAMP, SyntaxKind.L_PAREN, SyntaxKind.REF_KW,
    SyntaxKind.MUT_KW, SyntaxKind.IDENT, SyntaxKind.SELF_KW, SyntaxKind.SUPER_KW, SyntaxKind.CRATE_KW,
    SyntaxKind.COLONCOLON, SyntaxKind.MINUS, SyntaxKind.INT_NUMBER, SyntaxKind.FLOAT_NUMBER,
    SyntaxKind.CHAR, SyntaxKind.BYTE, SyntaxKind.STRING, SyntaxKind.RAW_STRING, SyntaxKind.BYTE_STRING,
    SyntaxKind.TRUE_KW, SyntaxKind.FALSE_KW
);

const PAT_RECOVERY = TokenSet.of(
    SyntaxKind.LET_KW, SyntaxKind.R_PAREN, SyntaxKind.COMMA, SyntaxKind.EQ, SyntaxKind.COLON,
    SyntaxKind.FAT_ARROW, SyntaxKind.PIPE, SyntaxKind.IN_KW, SyntaxKind.SEMI
);

export function pattern(p: Parser): void {
    const kind = p.current();
    if (kind === SyntaxKind.UNDERSCORE) {
        const m = p.start();
        p.bump();
        m.complete(p, SyntaxKind.PLACEHOLDER_PAT);
    } else if (kind === SyntaxKind.AMP || kind === SyntaxKind.AMPAMP) {
        refPat(p);
    } else if (kind === SyntaxKind.L_PAREN) {
        const m = p.start();
        patList(p);
        m.complete(p, SyntaxKind.TUPLE_PAT);
    } else if (kind === SyntaxKind.REF_KW || kind === SyntaxKind.MUT_KW) {
        bindPat(p);
    } else if (kind === SyntaxKind.IDENT) {
        const next = p.nth(1);
        if (next === SyntaxKind.COLONCOLON || next === SyntaxKind.L_PAREN || next === SyntaxKind.L_CURLY) {
            pathPat(p);
        } else {
            bindPat(p);
        }
    } else if (kind === SyntaxKind.SELF_KW || kind === SyntaxKind.SUPER_KW || kind === SyntaxKind.CRATE_KW || kind === SyntaxKind.COLONCOLON) {
        pathPat(p);
    } else if (kind === SyntaxKind.MINUS || isLiteralKind(kind)) {
        literalPat(p);
    } else {
        p.errRecover('expected pattern', PAT_RECOVERY);
    }
}

export function isPatStart(p: Parser): boolean {
    return p.atSet(PAT_FIRST);
}

function refPat(p: Parser): void {
    const m = p.start();
    p.bump();
    p.eat(SyntaxKind.MUT_KW);
    pattern(p);
    m.complete(p, SyntaxKind.REF_PAT);
}

/** `ref mut name @ subpattern` */
function bindPat(p: Parser): void {
    const m = p.start();
    p.eat(SyntaxKind.REF_KW);
    p.eat(SyntaxKind.MUT_KW);
    name(p);
    if (p.eat(SyntaxKind.AT)) {
        pattern(p);
    }
    m.complete(p, SyntaxKind.BIND_PAT);
}

function literalPat(p: Parser): void {
    const m = p.start();
    p.eat(SyntaxKind.MINUS);
    if (isLiteralKind(p.current())) {
        literal(p);
    } else {
        p.error('expected literal');
    }
    m.complete(p, SyntaxKind.LITERAL_PAT);
}

function pathPat(p: Parser): void {
    const m = p.start();
    path(p, 'expr');
    if (p.at(SyntaxKind.L_PAREN)) {
        patList(p);
        m.complete(p, SyntaxKind.TUPLE_STRUCT_PAT);
    } else if (p.at(SyntaxKind.L_CURLY)) {
        fieldPatList(p);
        m.complete(p, SyntaxKind.STRUCT_PAT);
    } else {
        m.complete(p, SyntaxKind.PATH_PAT);
    }
}

/** `(a, .., b)` */
function patList(p: Parser): void {
    p.bump();
    while (!p.at(SyntaxKind.EOF) && !p.at(SyntaxKind.R_PAREN)) {
        if (!p.eat(SyntaxKind.DOTDOT)) {
            if (!isPatStart(p)) {
                p.error('expected pattern');
                break;
            }
            pattern(p);
        }
        if (!p.at(SyntaxKind.R_PAREN) && !p.expect(SyntaxKind.COMMA)) {
            break;
        }
    }
    p.expect(SyntaxKind.R_PAREN);
}

/** `{ x, ref y, z: pat, .. }` */
function fieldPatList(p: Parser): void {
    const m = p.start();
    p.bump();
    while (!p.at(SyntaxKind.EOF) && !p.at(SyntaxKind.R_CURLY)) {
        if (p.at(SyntaxKind.DOTDOT)) {
            p.bump();
        } else if (p.at(SyntaxKind.IDENT) && p.nth(1) === SyntaxKind.COLON) {
            p.bump();
            p.bump();
            pattern(p);
        } else if (p.at(SyntaxKind.IDENT) || p.at(SyntaxKind.REF_KW) || p.at(SyntaxKind.MUT_KW)) {
            bindPat(p);
        } else {
            p.errSkip('expected a field pattern');
        }
        if (!p.at(SyntaxKind.R_CURLY)) {
            p.expect(SyntaxKind.COMMA);
        }
    }
    p.expect(SyntaxKind.R_CURLY);
    m.complete(p, SyntaxKind.FIELD_PAT_LIST);
}
