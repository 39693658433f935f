/******************************************************************************
 * Copyright 2024 TypeFox GmbH
 * This program and the accompanying materials are made available under the
 * terms of the MIT License, which is available in the project root.
 ******************************************************************************/

import type { Token, TreeSink } from 'verdant-core';
import { SyntaxKind, isTrivia } from 'verdant-core';

/**
 * Starts a node. `forwardParent` is the distance to the start event of a node
 * that was later wrapped around this one with `precede`.
 */
export interface StartEvent {
    readonly type: 'start';
    kind: SyntaxKind;
    forwardParent: number | undefined;
}

export type ParserEvent =
    | StartEvent
    | { readonly type: 'finish' }
    /** Consumes `nRaw` adjacent non-trivia tokens, glued into one of `kind`. */
    | { readonly type: 'token', readonly kind: SyntaxKind, readonly nRaw: number }
    | { readonly type: 'error', readonly message: string };

/**
 * Replays parser events into a {@link TreeSink}, reinserting the trivia the
 * parser skipped over.
 *
 * Trivia between tokens lands in the innermost node open at that point; trivia
 * before a node start lands in the parent. Leading and trailing trivia of the
 * input belong to the outermost node.
 */
export function processEvents(text: string, tokens: readonly Token[], events: ParserEvent[], sink: TreeSink): void {
    const replay = new EventReplay(text, tokens, sink);
    const forwardKinds: SyntaxKind[] = [];
    for (let i = 0; i < events.length; i++) {
        const event = events[i];
        switch (event.type) {
            case 'start': {
                if (event.kind === SyntaxKind.TOMBSTONE && event.forwardParent === undefined) {
                    break;
                }
                forwardKinds.length = 0;
                forwardKinds.push(event.kind);
                let index = i;
                let forwardParent = event.forwardParent;
                while (forwardParent !== undefined) {
                    index += forwardParent;
                    const parent = events[index];
                    if (parent.type !== 'start') {
                        throw new Error(`Forward parent of event ${i} is not a start event`);
                    }
                    forwardKinds.push(parent.kind);
                    forwardParent = parent.forwardParent;
                    parent.kind = SyntaxKind.TOMBSTONE;
                    parent.forwardParent = undefined;
                }
                for (let k = forwardKinds.length - 1; k >= 0; k--) {
                    if (forwardKinds[k] !== SyntaxKind.TOMBSTONE) {
                        replay.startNode(forwardKinds[k]);
                    }
                }
                break;
            }
            case 'finish':
                replay.finishNode();
                break;
            case 'token':
                replay.token(event.kind, event.nRaw);
                break;
            case 'error':
                sink.error(event.message);
                break;
        }
    }
}

class EventReplay {

    private rawPos = 0;
    private offset = 0;
    private depth = 0;

    constructor(
        private readonly text: string,
        private readonly tokens: readonly Token[],
        private readonly sink: TreeSink
    ) { }

    startNode(kind: SyntaxKind): void {
        if (this.depth > 0) {
            this.flushTrivia();
        }
        this.depth++;
        this.sink.startNode(kind);
    }

    finishNode(): void {
        this.depth--;
        if (this.depth === 0) {
            this.flushTrivia();
            if (this.rawPos < this.tokens.length) {
                throw new Error(`The outermost node finished before the end of input at offset ${this.offset}`);
            }
        }
        this.sink.finishNode();
    }

    token(kind: SyntaxKind, nRaw: number): void {
        this.flushTrivia();
        let len = 0;
        for (let i = 0; i < nRaw; i++) {
            len += this.tokens[this.rawPos + i].len;
        }
        this.rawPos += nRaw;
        this.sink.token(kind, this.text.slice(this.offset, this.offset + len));
        this.offset += len;
    }

    private flushTrivia(): void {
        while (this.rawPos < this.tokens.length && isTrivia(this.tokens[this.rawPos].kind)) {
            const token = this.tokens[this.rawPos++];
            this.sink.token(token.kind, this.text.slice(this.offset, this.offset + token.len));
            this.offset += token.len;
        }
    }
}
