/******************************************************************************
 * Copyright 2024 TypeFox GmbH
 * This program and the accompanying materials are made available under the
 * terms of the MIT License, which is available in the project root.
 ******************************************************************************/

import type { Grammar, Reparser, Token, TreeSink } from 'verdant-core';
import { SyntaxKind } from 'verdant-core';
import { innerAttributes } from '../grammar/attributes.js';
import { block } from '../grammar/expressions.js';
import { modContents, namedFieldDefList } from '../grammar/items.js';
import { processEvents } from './event.js';
import { Parser } from './parser.js';

export type GrammarEntry = (p: Parser) => void;

/**
 * The Rust grammar: a whole-file entry point and the curly-delimited entry
 * points used for incremental reparsing.
 */
export class RustGrammar implements Grammar {

    protected readonly reparsers = new Map<SyntaxKind, Reparser>();

    constructor() {
        this.addReparser(SyntaxKind.BLOCK, block);
        this.addReparser(SyntaxKind.NAMED_FIELD_DEF_LIST, namedFieldDefList);
    }

    parseFile(text: string, tokens: readonly Token[], sink: TreeSink): void {
        this.run(text, tokens, sink, p => {
            const m = p.start();
            innerAttributes(p);
            modContents(p, false);
            m.complete(p, SyntaxKind.ROOT);
        });
    }

    reparser(kind: SyntaxKind): Reparser | undefined {
        return this.reparsers.get(kind);
    }

    protected addReparser(kind: SyntaxKind, entry: GrammarEntry): void {
        this.reparsers.set(kind, {
            kind,
            open: SyntaxKind.L_CURLY,
            close: SyntaxKind.R_CURLY,
            parse: (text, tokens, sink) => this.run(text, tokens, sink, p => {
                const m = p.start();
                entry(p);
                if (p.at(SyntaxKind.EOF)) {
                    m.abandon(p);
                    return;
                }
                // Leftover input: the result is not a single node of `kind`,
                // which makes the caller fall back to a full reparse.
                while (!p.at(SyntaxKind.EOF)) {
                    p.bump();
                }
                m.complete(p, SyntaxKind.ERROR);
            })
        });
    }

    protected run(text: string, tokens: readonly Token[], sink: TreeSink, entry: GrammarEntry): void {
        const parser = new Parser(tokens);
        entry(parser);
        processEvents(text, tokens, parser.events, sink);
    }
}
