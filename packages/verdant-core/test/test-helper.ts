/******************************************************************************
 * Copyright 2024 TypeFox GmbH
 * This program and the accompanying materials are made available under the
 * terms of the MIT License, which is available in the project root.
 ******************************************************************************/

import type { Grammar, Reparser, SyntaxMode, SyntaxServices, Token, Tokenizer, TreeRoot, TreeSink } from 'verdant-core';
import { GreenBuilder, OwnedRoot, SyntaxKind, SyntaxNode, SyntaxRoot, syntaxKindName } from 'verdant-core';

/*
 * A minimal brace language for exercising the core without a real backend:
 * words, `;`, whitespace and `{ ... }` groups, which become BLOCK nodes.
 */

export class BraceTokenizer implements Tokenizer {
    tokenize(text: string): Token[] {
        const tokens: Token[] = [];
        let i = 0;
        while (i < text.length) {
            const start = i;
            const ch = text[i];
            let kind: SyntaxKind;
            if (/\s/.test(ch)) {
                while (i < text.length && /\s/.test(text[i])) {
                    i++;
                }
                kind = SyntaxKind.WHITESPACE;
            } else if (/[a-z]/.test(ch)) {
                while (i < text.length && /[a-z]/.test(text[i])) {
                    i++;
                }
                kind = SyntaxKind.IDENT;
            } else {
                i++;
                kind = ch === '{' ? SyntaxKind.L_CURLY
                    : ch === '}' ? SyntaxKind.R_CURLY
                        : ch === ';' ? SyntaxKind.SEMI
                            : SyntaxKind.ERROR;
            }
            tokens.push({ kind, len: i - start });
        }
        return tokens;
    }
}

/**
 * Writes tokens straight into a sink. Trivia goes into whatever node is open.
 */
export class BraceCursor {
    private index = 0;
    private offset = 0;

    constructor(private readonly text: string, private readonly tokens: readonly Token[], private readonly sink: TreeSink) { }

    peek(): SyntaxKind {
        return this.index < this.tokens.length ? this.tokens[this.index].kind : SyntaxKind.EOF;
    }

    bump(): void {
        const token = this.tokens[this.index++];
        this.sink.token(token.kind, this.text.slice(this.offset, this.offset + token.len));
        this.offset += token.len;
    }
}

export class BraceGrammar implements Grammar {

    parseFile(text: string, tokens: readonly Token[], sink: TreeSink): void {
        const cursor = new BraceCursor(text, tokens, sink);
        sink.startNode(SyntaxKind.ROOT);
        while (cursor.peek() !== SyntaxKind.EOF) {
            if (cursor.peek() === SyntaxKind.R_CURLY) {
                sink.startNode(SyntaxKind.ERROR);
                sink.error('unmatched `}`');
                cursor.bump();
                sink.finishNode();
            } else {
                this.element(cursor, sink);
            }
        }
        sink.finishNode();
    }

    reparser(kind: SyntaxKind): Reparser | undefined {
        if (kind !== SyntaxKind.BLOCK) {
            return undefined;
        }
        return {
            kind,
            open: SyntaxKind.L_CURLY,
            close: SyntaxKind.R_CURLY,
            parse: (text, tokens, sink) => this.block(new BraceCursor(text, tokens, sink), sink)
        };
    }

    protected element(cursor: BraceCursor, sink: TreeSink): void {
        switch (cursor.peek()) {
            case SyntaxKind.L_CURLY:
                this.block(cursor, sink);
                break;
            case SyntaxKind.ERROR:
                sink.error('unexpected character');
                cursor.bump();
                break;
            default:
                cursor.bump();
        }
    }

    protected block(cursor: BraceCursor, sink: TreeSink): void {
        sink.startNode(SyntaxKind.BLOCK);
        cursor.bump();
        this.blockContents(cursor, sink);
        this.closeBlock(cursor, sink);
    }

    protected blockContents(cursor: BraceCursor, sink: TreeSink): void {
        while (cursor.peek() !== SyntaxKind.EOF && cursor.peek() !== SyntaxKind.R_CURLY) {
            this.element(cursor, sink);
        }
    }

    protected closeBlock(cursor: BraceCursor, sink: TreeSink): void {
        if (cursor.peek() === SyntaxKind.R_CURLY) {
            cursor.bump();
        } else {
            sink.error('expected R_CURLY');
        }
        sink.finishNode();
    }
}

/**
 * Deliberately broken: the closing `}` of a block lands in the enclosing node.
 */
export class SplitBraceGrammar extends BraceGrammar {
    protected override closeBlock(cursor: BraceCursor, sink: TreeSink): void {
        sink.finishNode();
        if (cursor.peek() === SyntaxKind.R_CURLY) {
            cursor.bump();
        }
    }
}

export function braceServices(mode: SyntaxMode = 'development', grammar: Grammar = new BraceGrammar()): SyntaxServices {
    return {
        parser: {
            Tokenizer: new BraceTokenizer(),
            Grammar: grammar
        },
        config: { mode }
    };
}

/**
 * Builds a tree by hand and returns its root view.
 */
export function buildTree(build: (sink: GreenBuilder) => void): SyntaxNode<OwnedRoot> {
    const builder = new GreenBuilder();
    build(builder);
    const { green, errors } = builder.finish();
    return SyntaxNode.forRoot(new OwnedRoot(new SyntaxRoot(green, errors)));
}

/**
 * Compares two trees node by node: kinds, ranges and leaf texts.
 */
export function assertTreesStructurallyEqual(a: SyntaxNode<TreeRoot>, b: SyntaxNode<TreeRoot>, path = 'root'): void {
    if (a.kind !== b.kind) {
        throw new Error(`Kind mismatch at ${path}: ${syntaxKindName(a.kind)} vs ${syntaxKindName(b.kind)}`);
    }
    if (!a.range.equals(b.range)) {
        throw new Error(`Range mismatch at ${path} (${syntaxKindName(a.kind)}): ${a.range} vs ${b.range}`);
    }
    if (a.leafText() !== b.leafText()) {
        throw new Error(`Text mismatch at ${path} (${syntaxKindName(a.kind)}): '${a.leafText()}' vs '${b.leafText()}'`);
    }
    const aChildren = a.children();
    const bChildren = b.children();
    if (aChildren.length !== bChildren.length) {
        throw new Error(
            `Children count mismatch at ${path} (${syntaxKindName(a.kind)}): ${aChildren.length} vs ${bChildren.length}\n` +
            `  A children: [${aChildren.map(c => syntaxKindName(c.kind)).join(', ')}]\n` +
            `  B children: [${bChildren.map(c => syntaxKindName(c.kind)).join(', ')}]`
        );
    }
    for (let i = 0; i < aChildren.length; i++) {
        assertTreesStructurallyEqual(aChildren[i], bChildren[i], `${path}.children[${i}]`);
    }
}
