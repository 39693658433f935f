/******************************************************************************
 * Copyright 2024 TypeFox GmbH
 * This program and the accompanying materials are made available under the
 * terms of the MIT License, which is available in the project root.
 ******************************************************************************/

import type { Parser } from '../parser/parser.js';
import { SyntaxKind } from 'verdant-core';
import { isPathStart, name, nameRef } from './paths.js';
import { isTypeStart, typeRef } from './types.js';

// --- Declarations: `<'a, T: Bound = Default>` ---

export function optTypeParamList(p: Parser): void {
    if (!p.at(SyntaxKind.L_ANGLE)) {
        return;
    }
    const m = p.start();
    p.bump();
    while (!p.at(SyntaxKind.EOF) && !p.at(SyntaxKind.R_ANGLE)) {
        if (p.at(SyntaxKind.LIFETIME)) {
            lifetimeParam(p);
        } else if (p.at(SyntaxKind.IDENT)) {
            typeParam(p);
        } else {
            p.error('expected a type parameter');
            break;
        }
        if (!p.at(SyntaxKind.R_ANGLE) && !p.expect(SyntaxKind.COMMA)) {
            break;
        }
    }
    p.expect(SyntaxKind.R_ANGLE);
    m.complete(p, SyntaxKind.TYPE_PARAM_LIST);
}

function lifetimeParam(p: Parser): void {
    const m = p.start();
    p.bump();
    if (p.eat(SyntaxKind.COLON)) {
        lifetimeBounds(p);
    }
    m.complete(p, SyntaxKind.LIFETIME_PARAM);
}

function typeParam(p: Parser): void {
    const m = p.start();
    name(p);
    if (p.at(SyntaxKind.COLON)) {
        p.bump();
        bounds(p);
    }
    if (p.eat(SyntaxKind.EQ)) {
        typeRef(p);
    }
    m.complete(p, SyntaxKind.TYPE_PARAM);
}

function lifetimeBounds(p: Parser): void {
    while (p.eat(SyntaxKind.LIFETIME)) {
        if (!p.eat(SyntaxKind.PLUS)) {
            break;
        }
    }
}

// --- Bounds: `Clone + 'a + ?Sized` ---

export function bounds(p: Parser): void {
    const m = p.start();
    if (typeBound(p)) {
        while (p.eat(SyntaxKind.PLUS)) {
            if (!typeBound(p)) {
                break;
            }
        }
    }
    m.complete(p, SyntaxKind.TYPE_BOUND_LIST);
}

function typeBound(p: Parser): boolean {
    const m = p.start();
    if (p.eat(SyntaxKind.LIFETIME)) {
        m.complete(p, SyntaxKind.TYPE_BOUND);
        return true;
    }
    const parenthesized = p.eat(SyntaxKind.L_PAREN);
    p.eat(SyntaxKind.QUESTION);
    if (p.at(SyntaxKind.FOR_KW) || isPathStart(p)) {
        typeRef(p);
    } else if (parenthesized) {
        p.error('expected a trait bound');
    } else {
        m.abandon(p);
        return false;
    }
    if (parenthesized) {
        p.expect(SyntaxKind.R_PAREN);
    }
    m.complete(p, SyntaxKind.TYPE_BOUND);
    return true;
}

// --- Where clauses ---

export function optWhereClause(p: Parser): void {
    if (!p.at(SyntaxKind.WHERE_KW)) {
        return;
    }
    const m = p.start();
    p.bump();
    while (p.at(SyntaxKind.LIFETIME) || isTypeStart(p)) {
        wherePredicate(p);
        if (!p.eat(SyntaxKind.COMMA)) {
            break;
        }
    }
    m.complete(p, SyntaxKind.WHERE_CLAUSE);
}

function wherePredicate(p: Parser): void {
    const m = p.start();
    if (p.eat(SyntaxKind.LIFETIME)) {
        p.expect(SyntaxKind.COLON);
        lifetimeBounds(p);
    } else {
        typeRef(p);
        if (p.eat(SyntaxKind.COLON)) {
            bounds(p);
        } else {
            p.error('expected COLON');
        }
    }
    m.complete(p, SyntaxKind.WHERE_PRED);
}

// --- Arguments: `<'a, T, Item = U>` ---

/**
 * Generic arguments; `colons` for the turbofish form `::<...>` of expressions.
 */
export function typeArgList(p: Parser, colons: boolean): void {
    const m = p.start();
    if (colons) {
        p.bump();
    }
    p.bump();
    while (!p.at(SyntaxKind.EOF) && !p.at(SyntaxKind.R_ANGLE)) {
        if (!typeArg(p)) {
            p.error('expected a generic argument');
            break;
        }
        if (!p.at(SyntaxKind.R_ANGLE) && !p.expect(SyntaxKind.COMMA)) {
            break;
        }
    }
    p.expect(SyntaxKind.R_ANGLE);
    m.complete(p, SyntaxKind.TYPE_ARG_LIST);
}

function typeArg(p: Parser): boolean {
    const m = p.start();
    if (p.eat(SyntaxKind.LIFETIME)) {
        m.complete(p, SyntaxKind.LIFETIME_ARG);
    } else if (p.at(SyntaxKind.IDENT) && p.nth(1) === SyntaxKind.EQ) {
        // Associated type binding, `Item = T`.
        nameRef(p);
        p.bump();
        typeRef(p);
        m.complete(p, SyntaxKind.TYPE_ARG);
    } else if (isTypeStart(p)) {
        typeRef(p);
        m.complete(p, SyntaxKind.TYPE_ARG);
    } else {
        m.abandon(p);
        return false;
    }
    return true;
}
