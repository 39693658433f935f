/******************************************************************************
 * Copyright 2024 TypeFox GmbH
 * This program and the accompanying materials are made available under the
 * terms of the MIT License, which is available in the project root.
 ******************************************************************************/

import type { CompletedMarker, Marker, Parser } from '../parser/parser.js';
import { SyntaxKind, isLiteralKind } from 'verdant-core';
import { TokenSet } from '../parser/token-set.js';
import { innerAttributes, outerAttributes } from './attributes.js';
import { isItemStart, macroCallBody, optItem, optRetType, paramList } from './items.js';
import { isPathStart, nameRef, path } from './paths.js';
import { isPatStart, pattern } from './patterns.js';
import { typeArgList } from './type-params.js';
import { typeRef } from './types.js';

export const EXPR_FIRST = TokenSet.of(
    SyntaxKind.INT_NUMBER, SyntaxKind.FLOAT_NUMBER, SyntaxKind.CHAR, SyntaxKind.BYTE, SyntaxKind.STRING,
    SyntaxKind.RAW_STRING, SyntaxKind.BYTE_STRING, SyntaxKind.TRUE_KW, SyntaxKind.FALSE_KW,
    SyntaxKind.IDENT, SyntaxKind.SELF_KW, SyntaxKind.SUPER_KW, SyntaxKind.CRATE_KW, SyntaxKind.COLONCOLON,
    SyntaxKind.L_PAREN, SyntaxKind.L_BRACK, SyntaxKind.L_CURLY, SyntaxKind.PIPE, SyntaxKind.PIPEPIPE,
    SyntaxKind.MOVE_KW, SyntaxKind.IF_KW, SyntaxKind.WHILE_KW, SyntaxKind.LOOP_KW, SyntaxKind.FOR_KW,
    SyntaxKind.MATCH_KW, SyntaxKind.UNSAFE_KW, SyntaxKind.RETURN_KW, SyntaxKind.BREAK_KW,
    SyntaxKind.CONTINUE_KW, SyntaxKind.LIFETIME, SyntaxKind.AMP, SyntaxKind.AMPAMP, SyntaxKind.STAR,
    SyntaxKind.EXCL, SyntaxKind.MINUS, SyntaxKind.DOTDOT, SyntaxKind.DOTDOTEQ
);

/**
 * Context that changes how far an expression extends.
 *
 * `forbidStructs`: a `{` after a path opens the following block, as in
 * `if x {}`, rather than a struct literal.
 * `statement`: the expression starts a statement, so a block-like expression
 * such as `match x {}` ends it.
 */
interface Restrictions {
    readonly forbidStructs: boolean;
    readonly statement: boolean;
}

const DEFAULT: Restrictions = { forbidStructs: false, statement: false };
const NO_STRUCT: Restrictions = { forbidStructs: true, statement: false };
const STATEMENT: Restrictions = { forbidStructs: false, statement: true };

/** A parsed expression; block-like ones need no `;` as statements. */
interface ParsedExpr {
    readonly cm: CompletedMarker;
    readonly blockLike: boolean;
}

export function atExprStart(p: Parser): boolean {
    return p.atSet(EXPR_FIRST);
}

export function expr(p: Parser): void {
    if (!exprBp(p, DEFAULT, 1)) {
        p.error('expected expression');
    }
}

function exprNoStruct(p: Parser): void {
    if (!exprBp(p, NO_STRUCT, 1)) {
        p.error('expected expression');
    }
}

// --- Blocks and statements ---

/** `{ statements; tail }`, on its own also a reparsing entry point. */
export function block(p: Parser): void {
    if (!p.at(SyntaxKind.L_CURLY)) {
        p.error('expected a block');
        return;
    }
    const m = p.start();
    p.bump();
    innerAttributes(p);
    while (!p.at(SyntaxKind.EOF) && !p.at(SyntaxKind.R_CURLY)) {
        statement(p);
    }
    p.expect(SyntaxKind.R_CURLY);
    m.complete(p, SyntaxKind.BLOCK);
}

function statement(p: Parser): void {
    if (p.at(SyntaxKind.SEMI)) {
        p.bump();
        return;
    }
    const m = p.start();
    const start = p.position;
    outerAttributes(p);
    if (p.at(SyntaxKind.LET_KW)) {
        letStmt(p, m);
        return;
    }
    if (isItemStart(p) && optItem(p, m)) {
        return;
    }
    const parsed = exprBp(p, STATEMENT, 1);
    if (!parsed) {
        if (p.position !== start) {
            p.error('expected a statement after attributes');
            m.complete(p, SyntaxKind.ERROR);
        } else {
            m.abandon(p);
            p.errSkip('expected a statement');
        }
        return;
    }
    if (p.eat(SyntaxKind.SEMI)) {
        m.complete(p, SyntaxKind.EXPR_STMT);
    } else if (p.at(SyntaxKind.R_CURLY)) {
        // The trailing expression stays a direct child of the block.
        m.abandon(p);
    } else {
        if (!parsed.blockLike) {
            p.error('expected SEMI');
        }
        m.complete(p, SyntaxKind.EXPR_STMT);
    }
}

function letStmt(p: Parser, m: Marker): void {
    p.bump();
    pattern(p);
    if (p.eat(SyntaxKind.COLON)) {
        typeRef(p);
    }
    if (p.eat(SyntaxKind.EQ)) {
        expr(p);
    }
    p.expect(SyntaxKind.SEMI);
    m.complete(p, SyntaxKind.LET_STMT);
}

// --- Binary operators ---

/** Compound operators glued from several tokens; checked before their prefixes. */
const GLUED_OPS: ReadonlyArray<[SyntaxKind, number]> = [
    [SyntaxKind.SHLEQ, 1],
    [SyntaxKind.SHREQ, 1],
    [SyntaxKind.SHL, 9],
    [SyntaxKind.SHR, 9],
    [SyntaxKind.LTEQ, 5],
    [SyntaxKind.GTEQ, 5]
];

/** Binding power of the operator at the cursor, 0 if there is none. */
function currentOp(p: Parser): [SyntaxKind, number] {
    for (const [kind, bp] of GLUED_OPS) {
        if (p.at(kind)) {
            return [kind, bp];
        }
    }
    const kind = p.current();
    switch (kind) {
        case SyntaxKind.EQ:
        case SyntaxKind.PLUSEQ:
        case SyntaxKind.MINUSEQ:
        case SyntaxKind.STAREQ:
        case SyntaxKind.SLASHEQ:
        case SyntaxKind.PERCENTEQ:
        case SyntaxKind.AMPEQ:
        case SyntaxKind.PIPEEQ:
        case SyntaxKind.CARETEQ:
            return [kind, 1];
        case SyntaxKind.DOTDOT:
        case SyntaxKind.DOTDOTEQ:
            return [kind, 2];
        case SyntaxKind.PIPEPIPE:
            return [kind, 3];
        case SyntaxKind.AMPAMP:
            return [kind, 4];
        case SyntaxKind.EQEQ:
        case SyntaxKind.NEQ:
        case SyntaxKind.L_ANGLE:
        case SyntaxKind.R_ANGLE:
            return [kind, 5];
        case SyntaxKind.PIPE:
            return [kind, 6];
        case SyntaxKind.CARET:
            return [kind, 7];
        case SyntaxKind.AMP:
            return [kind, 8];
        case SyntaxKind.PLUS:
        case SyntaxKind.MINUS:
            return [kind, 10];
        case SyntaxKind.STAR:
        case SyntaxKind.SLASH:
        case SyntaxKind.PERCENT:
            return [kind, 11];
        case SyntaxKind.AS_KW:
            return [kind, 12];
        default:
            return [kind, 0];
    }
}

/**
 * Parses an expression whose operators bind at least as tightly as `minBp`.
 * Assignments associate to the right, everything else to the left.
 */
function exprBp(p: Parser, r: Restrictions, minBp: number): ParsedExpr | undefined {
    const lhs = lhsExpr(p, r);
    if (!lhs || (lhs.blockLike && r.statement)) {
        return lhs;
    }
    const operand: Restrictions = { forbidStructs: r.forbidStructs, statement: false };
    let cm = lhs.cm;
    let blockLike = lhs.blockLike;
    for (;;) {
        const [op, bp] = currentOp(p);
        if (bp === 0 || bp < minBp) {
            break;
        }
        const m = cm.precede(p);
        p.eat(op);
        if (op === SyntaxKind.AS_KW) {
            typeRef(p);
            cm = m.complete(p, SyntaxKind.CAST_EXPR);
        } else if (op === SyntaxKind.DOTDOT || op === SyntaxKind.DOTDOTEQ) {
            if (atExprStart(p) && !(r.forbidStructs && p.at(SyntaxKind.L_CURLY))) {
                exprBp(p, operand, bp + 1);
            }
            cm = m.complete(p, SyntaxKind.RANGE_EXPR);
        } else {
            if (!exprBp(p, operand, bp === 1 ? 1 : bp + 1)) {
                p.error('expected expression');
            }
            cm = m.complete(p, SyntaxKind.BIN_EXPR);
        }
        blockLike = false;
    }
    return { cm, blockLike };
}

// --- Unary and postfix operators ---

function lhsExpr(p: Parser, r: Restrictions): ParsedExpr | undefined {
    const operand: Restrictions = { forbidStructs: r.forbidStructs, statement: false };
    let kind: SyntaxKind;
    const m = p.start();
    switch (p.current()) {
        case SyntaxKind.AMP:
        case SyntaxKind.AMPAMP:
            p.bump();
            p.eat(SyntaxKind.MUT_KW);
            kind = SyntaxKind.REF_EXPR;
            break;
        case SyntaxKind.STAR:
        case SyntaxKind.EXCL:
        case SyntaxKind.MINUS:
            p.bump();
            kind = SyntaxKind.PREFIX_EXPR;
            break;
        case SyntaxKind.DOTDOT:
        case SyntaxKind.DOTDOTEQ:
            p.bump();
            if (atExprStart(p) && !(r.forbidStructs && p.at(SyntaxKind.L_CURLY))) {
                exprBp(p, operand, 3);
            }
            return { cm: m.complete(p, SyntaxKind.RANGE_EXPR), blockLike: false };
        default: {
            m.abandon(p);
            const atom = atomExpr(p, r);
            if (!atom || (atom.blockLike && r.statement)) {
                return atom;
            }
            return postfixExpr(p, atom);
        }
    }
    if (!lhsExpr(p, operand)) {
        p.error('expected expression');
    }
    return { cm: m.complete(p, kind), blockLike: false };
}

function postfixExpr(p: Parser, atom: ParsedExpr): ParsedExpr {
    let cm = atom.cm;
    let blockLike = atom.blockLike;
    for (;;) {
        switch (p.current()) {
            case SyntaxKind.L_PAREN: {
                const m = cm.precede(p);
                argList(p);
                cm = m.complete(p, SyntaxKind.CALL_EXPR);
                break;
            }
            case SyntaxKind.L_BRACK: {
                const m = cm.precede(p);
                p.bump();
                expr(p);
                p.expect(SyntaxKind.R_BRACK);
                cm = m.complete(p, SyntaxKind.INDEX_EXPR);
                break;
            }
            case SyntaxKind.QUESTION: {
                const m = cm.precede(p);
                p.bump();
                cm = m.complete(p, SyntaxKind.TRY_EXPR);
                break;
            }
            case SyntaxKind.DOT:
                cm = p.nth(1) === SyntaxKind.IDENT && (p.nth(2) === SyntaxKind.L_PAREN || p.nth(2) === SyntaxKind.COLONCOLON)
                    ? methodCall(p, cm)
                    : fieldExpr(p, cm);
                break;
            default:
                return { cm, blockLike };
        }
        blockLike = false;
    }
}

/** `.name::<T>(args)` */
function methodCall(p: Parser, lhs: CompletedMarker): CompletedMarker {
    const m = lhs.precede(p);
    p.bump();
    nameRef(p);
    if (p.at(SyntaxKind.COLONCOLON) && p.nth(1) === SyntaxKind.L_ANGLE) {
        typeArgList(p, true);
    }
    if (p.at(SyntaxKind.L_PAREN)) {
        argList(p);
    } else {
        p.error('expected argument list');
    }
    return m.complete(p, SyntaxKind.METHOD_CALL_EXPR);
}

/** `.name`, or `.0` for tuple fields. */
function fieldExpr(p: Parser, lhs: CompletedMarker): CompletedMarker {
    const m = lhs.precede(p);
    p.bump();
    if (p.at(SyntaxKind.IDENT)) {
        nameRef(p);
    } else if (!p.eat(SyntaxKind.INT_NUMBER) && !p.eat(SyntaxKind.FLOAT_NUMBER)) {
        p.error('expected field name or number');
    }
    return m.complete(p, SyntaxKind.FIELD_EXPR);
}

function argList(p: Parser): void {
    const m = p.start();
    p.bump();
    while (!p.at(SyntaxKind.EOF) && !p.at(SyntaxKind.R_PAREN)) {
        if (!atExprStart(p)) {
            p.error('expected expression');
            break;
        }
        expr(p);
        if (!p.at(SyntaxKind.R_PAREN) && !p.expect(SyntaxKind.COMMA)) {
            break;
        }
    }
    p.expect(SyntaxKind.R_PAREN);
    m.complete(p, SyntaxKind.ARG_LIST);
}

// --- Atoms ---

export function literal(p: Parser): CompletedMarker {
    const m = p.start();
    p.bump();
    return m.complete(p, SyntaxKind.LITERAL);
}

function atomExpr(p: Parser, r: Restrictions): ParsedExpr | undefined {
    const kind = p.current();
    if (isLiteralKind(kind)) {
        return { cm: literal(p), blockLike: false };
    }
    if (isPathStart(p)) {
        return pathExpr(p, r);
    }
    switch (kind) {
        case SyntaxKind.L_PAREN:
            return { cm: parenOrTupleExpr(p), blockLike: false };
        case SyntaxKind.L_BRACK:
            return { cm: arrayExpr(p), blockLike: false };
        case SyntaxKind.PIPE:
        case SyntaxKind.PIPEPIPE:
        case SyntaxKind.MOVE_KW:
            return { cm: lambdaExpr(p, r), blockLike: false };
        case SyntaxKind.IF_KW:
            return { cm: ifExpr(p), blockLike: true };
        case SyntaxKind.LIFETIME:
            if (p.nth(1) === SyntaxKind.COLON) {
                return loopLike(p);
            }
            return undefined;
        case SyntaxKind.LOOP_KW:
        case SyntaxKind.WHILE_KW:
        case SyntaxKind.FOR_KW:
            return loopLike(p);
        case SyntaxKind.MATCH_KW:
            return { cm: matchExpr(p), blockLike: true };
        case SyntaxKind.UNSAFE_KW:
        case SyntaxKind.L_CURLY:
            if (kind === SyntaxKind.UNSAFE_KW && p.nth(1) !== SyntaxKind.L_CURLY) {
                return undefined;
            }
            return { cm: blockExpr(p), blockLike: true };
        case SyntaxKind.RETURN_KW:
            return { cm: jumpExpr(p, r, SyntaxKind.RETURN_EXPR), blockLike: false };
        case SyntaxKind.BREAK_KW:
            return { cm: jumpExpr(p, r, SyntaxKind.BREAK_EXPR), blockLike: false };
        case SyntaxKind.CONTINUE_KW: {
            const m = p.start();
            p.bump();
            p.eat(SyntaxKind.LIFETIME);
            return { cm: m.complete(p, SyntaxKind.CONTINUE_EXPR), blockLike: false };
        }
        default:
            return undefined;
    }
}

/** `a::b`, `S { .. }` or `m!(..)`. */
function pathExpr(p: Parser, r: Restrictions): ParsedExpr {
    const m = p.start();
    path(p, 'expr');
    if (p.at(SyntaxKind.EXCL)) {
        const braced = macroCallBody(p);
        return { cm: m.complete(p, SyntaxKind.MACRO_CALL), blockLike: braced };
    }
    if (p.at(SyntaxKind.L_CURLY) && !r.forbidStructs) {
        namedFieldList(p);
        return { cm: m.complete(p, SyntaxKind.STRUCT_LIT), blockLike: false };
    }
    return { cm: m.complete(p, SyntaxKind.PATH_EXPR), blockLike: false };
}

/** `{ a, b: 1, ..base }` */
function namedFieldList(p: Parser): void {
    const m = p.start();
    p.bump();
    while (!p.at(SyntaxKind.EOF) && !p.at(SyntaxKind.R_CURLY)) {
        if (p.at(SyntaxKind.DOTDOT)) {
            p.bump();
            expr(p);
        } else if (p.at(SyntaxKind.IDENT)) {
            const field = p.start();
            nameRef(p);
            if (p.eat(SyntaxKind.COLON)) {
                expr(p);
            }
            field.complete(p, SyntaxKind.NAMED_FIELD);
        } else {
            p.errSkip('expected a field');
        }
        if (!p.at(SyntaxKind.R_CURLY)) {
            p.expect(SyntaxKind.COMMA);
        }
    }
    p.expect(SyntaxKind.R_CURLY);
    m.complete(p, SyntaxKind.NAMED_FIELD_LIST);
}

/** `(a)` is parenthesized, `()` and `(a,)` are tuples. */
function parenOrTupleExpr(p: Parser): CompletedMarker {
    const m = p.start();
    p.bump();
    let count = 0;
    let trailingComma = false;
    while (!p.at(SyntaxKind.EOF) && !p.at(SyntaxKind.R_PAREN)) {
        if (!atExprStart(p)) {
            p.error('expected expression');
            break;
        }
        expr(p);
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
    return m.complete(p, count === 1 && !trailingComma ? SyntaxKind.PAREN_EXPR : SyntaxKind.TUPLE_EXPR);
}

/** `[a, b]` or `[value; count]` */
function arrayExpr(p: Parser): CompletedMarker {
    const m = p.start();
    p.bump();
    while (!p.at(SyntaxKind.EOF) && !p.at(SyntaxKind.R_BRACK)) {
        if (!atExprStart(p)) {
            p.error('expected expression');
            break;
        }
        expr(p);
        if (p.eat(SyntaxKind.SEMI)) {
            expr(p);
            break;
        }
        if (!p.at(SyntaxKind.R_BRACK) && !p.expect(SyntaxKind.COMMA)) {
            break;
        }
    }
    p.expect(SyntaxKind.R_BRACK);
    return m.complete(p, SyntaxKind.ARRAY_EXPR);
}

/** `move |a, b: u32| body`; with a return type the body must be a block. */
function lambdaExpr(p: Parser, r: Restrictions): CompletedMarker {
    const m = p.start();
    p.eat(SyntaxKind.MOVE_KW);
    if (p.at(SyntaxKind.PIPEPIPE)) {
        const params = p.start();
        p.bump();
        params.complete(p, SyntaxKind.PARAM_LIST);
    } else if (p.at(SyntaxKind.PIPE)) {
        paramList(p, 'closure');
    } else {
        p.error('expected `|`');
    }
    if (p.at(SyntaxKind.THIN_ARROW)) {
        optRetType(p);
        if (p.at(SyntaxKind.L_CURLY)) {
            blockExpr(p);
        } else {
            p.error('expected a block');
        }
    } else if (!exprBp(p, { forbidStructs: r.forbidStructs, statement: false }, 1)) {
        p.error('expected expression');
    }
    return m.complete(p, SyntaxKind.LAMBDA_EXPR);
}

function ifExpr(p: Parser): CompletedMarker {
    const m = p.start();
    p.bump();
    condition(p);
    block(p);
    if (p.eat(SyntaxKind.ELSE_KW)) {
        if (p.at(SyntaxKind.IF_KW)) {
            ifExpr(p);
        } else {
            block(p);
        }
    }
    return m.complete(p, SyntaxKind.IF_EXPR);
}

/** `cond` or `let pat = expr` */
function condition(p: Parser): void {
    const m = p.start();
    if (p.eat(SyntaxKind.LET_KW)) {
        pattern(p);
        p.expect(SyntaxKind.EQ);
    }
    exprNoStruct(p);
    m.complete(p, SyntaxKind.CONDITION);
}

/** `loop`, `while` and `for`, each with an optional `'label:`. */
function loopLike(p: Parser): ParsedExpr | undefined {
    const m = p.start();
    if (p.at(SyntaxKind.LIFETIME)) {
        const label = p.start();
        p.bump();
        p.bump();
        label.complete(p, SyntaxKind.LABEL);
    }
    let kind: SyntaxKind;
    switch (p.current()) {
        case SyntaxKind.LOOP_KW:
            p.bump();
            kind = SyntaxKind.LOOP_EXPR;
            break;
        case SyntaxKind.WHILE_KW:
            p.bump();
            condition(p);
            kind = SyntaxKind.WHILE_EXPR;
            break;
        case SyntaxKind.FOR_KW:
            p.bump();
            if (isPatStart(p)) {
                pattern(p);
            } else {
                p.error('expected pattern');
            }
            p.expect(SyntaxKind.IN_KW);
            exprNoStruct(p);
            kind = SyntaxKind.FOR_EXPR;
            break;
        default:
            p.error('expected a loop after the label');
            return { cm: m.complete(p, SyntaxKind.ERROR), blockLike: false };
    }
    block(p);
    return { cm: m.complete(p, kind), blockLike: true };
}

function matchExpr(p: Parser): CompletedMarker {
    const m = p.start();
    p.bump();
    exprNoStruct(p);
    if (p.at(SyntaxKind.L_CURLY)) {
        matchArmList(p);
    } else {
        p.error('expected `{`');
    }
    return m.complete(p, SyntaxKind.MATCH_EXPR);
}

function matchArmList(p: Parser): void {
    const m = p.start();
    p.bump();
    innerAttributes(p);
    while (!p.at(SyntaxKind.EOF) && !p.at(SyntaxKind.R_CURLY)) {
        if (!isPatStart(p) && !p.at(SyntaxKind.PIPE) && !p.at(SyntaxKind.POUND)) {
            p.errSkip('expected a match arm');
            continue;
        }
        const blockLike = matchArm(p);
        if (!p.at(SyntaxKind.R_CURLY) && !p.eat(SyntaxKind.COMMA) && !blockLike) {
            p.error('expected COMMA');
        }
    }
    p.expect(SyntaxKind.R_CURLY);
    m.complete(p, SyntaxKind.MATCH_ARM_LIST);
}

/** `A | B if guard => body`; returns whether the body is block-like. */
function matchArm(p: Parser): boolean {
    const m = p.start();
    outerAttributes(p);
    p.eat(SyntaxKind.PIPE);
    pattern(p);
    while (p.eat(SyntaxKind.PIPE)) {
        pattern(p);
    }
    if (p.at(SyntaxKind.IF_KW)) {
        const guard = p.start();
        p.bump();
        expr(p);
        guard.complete(p, SyntaxKind.MATCH_GUARD);
    }
    p.expect(SyntaxKind.FAT_ARROW);
    const body = exprBp(p, STATEMENT, 1);
    if (!body) {
        p.error('expected expression');
    }
    m.complete(p, SyntaxKind.MATCH_ARM);
    return body?.blockLike ?? false;
}

/** `{ .. }` or `unsafe { .. }` as an expression. */
function blockExpr(p: Parser): CompletedMarker {
    const m = p.start();
    p.eat(SyntaxKind.UNSAFE_KW);
    block(p);
    return m.complete(p, SyntaxKind.BLOCK_EXPR);
}

/** `return expr` and `break 'label expr`. */
function jumpExpr(p: Parser, r: Restrictions, kind: SyntaxKind): CompletedMarker {
    const m = p.start();
    p.bump();
    if (kind === SyntaxKind.BREAK_EXPR) {
        p.eat(SyntaxKind.LIFETIME);
    }
    if (atExprStart(p) && !(r.forbidStructs && p.at(SyntaxKind.L_CURLY))) {
        exprBp(p, { forbidStructs: r.forbidStructs, statement: false }, 1);
    }
    return m.complete(p, kind);
}
