/******************************************************************************
 * Copyright 2024 TypeFox GmbH
 * This program and the accompanying materials are made available under the
 * terms of the MIT License, which is available in the project root.
 ******************************************************************************/

import type { SyntaxKind } from 'verdant-core';

/**
 * An immutable set of token kinds, used for lookahead and error recovery.
 */
export class TokenSet {

    static readonly EMPTY = new TokenSet([]);

    private readonly kinds: ReadonlySet<SyntaxKind>;

    constructor(kinds: Iterable<SyntaxKind>) {
        this.kinds = new Set(kinds);
    }

    static of(...kinds: SyntaxKind[]): TokenSet {
        return new TokenSet(kinds);
    }

    union(other: TokenSet): TokenSet {
        return new TokenSet([...this.kinds, ...other.kinds]);
    }

    contains(kind: SyntaxKind): boolean {
        return this.kinds.has(kind);
    }
}
