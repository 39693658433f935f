/******************************************************************************
 * Copyright 2024 TypeFox GmbH
 * This program and the accompanying materials are made available under the
 * terms of the MIT License, which is available in the project root.
 ******************************************************************************/

import type { Parser } from '../parser/parser.js';
import { SyntaxKind } from 'verdant-core';

export function innerAttributes(p: Parser): void {
    while (p.at(SyntaxKind.POUND) && p.nth(1) === SyntaxKind.EXCL) {
        attribute(p, true);
    }
}

export function outerAttributes(p: Parser): void {
    while (p.at(SyntaxKind.POUND)) {
        attribute(p, false);
    }
}

function attribute(p: Parser, inner: boolean): void {
    const m = p.start();
    p.bump();
    if (inner) {
        p.bump();
    }
    if (p.at(SyntaxKind.L_BRACK)) {
        tokenTree(p);
    } else {
        p.error('expected `[`');
    }
    m.complete(p, SyntaxKind.ATTR);
}

const CLOSING = new Map<SyntaxKind, SyntaxKind>([
    [SyntaxKind.L_PAREN, SyntaxKind.R_PAREN],
    [SyntaxKind.L_BRACK, SyntaxKind.R_BRACK],
    [SyntaxKind.L_CURLY, SyntaxKind.R_CURLY]
]);

export function atTokenTree(p: Parser): boolean {
    return CLOSING.has(p.current());
}

/**
 * A delimited group of arbitrary tokens, as found in attributes and macro
 * calls. Nested groups become nested trees.
 */
export function tokenTree(p: Parser): void {
    const close = CLOSING.get(p.current());
    if (close === undefined) {
        p.error('expected a delimited token tree');
        return;
    }
    const m = p.start();
    p.bump();
    while (!p.at(SyntaxKind.EOF) && !p.at(close)) {
        const kind = p.current();
        if (CLOSING.has(kind)) {
            tokenTree(p);
        } else if (kind === SyntaxKind.R_CURLY) {
            // Left to the enclosing `{` group.
            break;
        } else if (kind === SyntaxKind.R_PAREN || kind === SyntaxKind.R_BRACK) {
            p.error('unmatched closing delimiter');
            p.bump();
        } else {
            p.bump();
        }
    }
    p.expect(close);
    m.complete(p, SyntaxKind.TOKEN_TREE);
}
