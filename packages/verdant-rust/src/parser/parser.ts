/******************************************************************************
 * Copyright 2024 TypeFox GmbH
 * This program and the accompanying materials are made available under the
 * terms of the MIT License, which is available in the project root.
 ******************************************************************************/

import type { Token } from 'verdant-core';
import type { ParserEvent, StartEvent } from './event.js';
import { SyntaxKind, isTrivia, syntaxKindName } from 'verdant-core';
import { TokenSet } from './token-set.js';

/** Steps without consuming a token after which the grammar counts as stuck. */
const STEP_LIMIT = 100_000;

/**
 * Compound operators the tokenizer leaves split, and the pieces they are
 * glued from when adjacent.
 */
const GLUED: ReadonlyMap<SyntaxKind, readonly SyntaxKind[]> = new Map([
    [SyntaxKind.LTEQ, [SyntaxKind.L_ANGLE, SyntaxKind.EQ]],
    [SyntaxKind.GTEQ, [SyntaxKind.R_ANGLE, SyntaxKind.EQ]],
    [SyntaxKind.SHL, [SyntaxKind.L_ANGLE, SyntaxKind.L_ANGLE]],
    [SyntaxKind.SHR, [SyntaxKind.R_ANGLE, SyntaxKind.R_ANGLE]],
    [SyntaxKind.SHLEQ, [SyntaxKind.L_ANGLE, SyntaxKind.L_ANGLE, SyntaxKind.EQ]],
    [SyntaxKind.SHREQ, [SyntaxKind.R_ANGLE, SyntaxKind.R_ANGLE, SyntaxKind.EQ]]
]);

/**
 * The non-trivia tokens of the input, and whether each one is immediately
 * followed by the next.
 */
class ParserInput {

    readonly kinds: SyntaxKind[] = [];
    readonly joint: boolean[] = [];

    constructor(tokens: readonly Token[]) {
        let previousWasTrivia = false;
        for (const token of tokens) {
            if (isTrivia(token.kind)) {
                previousWasTrivia = true;
            } else {
                if (this.joint.length > 0) {
                    this.joint[this.joint.length - 1] = !previousWasTrivia;
                }
                this.kinds.push(token.kind);
                this.joint.push(false);
                previousWasTrivia = false;
            }
        }
    }

    kind(index: number): SyntaxKind {
        return index < this.kinds.length ? this.kinds[index] : SyntaxKind.EOF;
    }
}

/**
 * A started node that still has to be completed or abandoned.
 */
export class Marker {
    private settled = false;

    constructor(readonly pos: number) { }

    complete(p: Parser, kind: SyntaxKind): CompletedMarker {
        this.settle();
        p.startEvent(this.pos).kind = kind;
        p.pushEvent({ type: 'finish' });
        return new CompletedMarker(this.pos, kind);
    }

    /**
     * Drops the node; its children become children of the enclosing node.
     */
    abandon(p: Parser): void {
        this.settle();
        p.abandonStart(this.pos);
    }

    private settle(): void {
        if (this.settled) {
            throw new Error('Marker was already completed or abandoned');
        }
        this.settled = true;
    }
}

export class CompletedMarker {

    constructor(private readonly startPos: number, readonly kind: SyntaxKind) { }

    /**
     * Starts a new node that will enclose this completed one, e.g. turning
     * `a` into the left operand of `a + b` after seeing `+`.
     */
    precede(p: Parser): Marker {
        const marker = p.start();
        p.startEvent(this.startPos).forwardParent = marker.pos - this.startPos;
        return marker;
    }
}

/**
 * A cursor over the non-trivia tokens of an input that records what the grammar
 * does as a flat list of events.
 */
export class Parser {

    readonly events: ParserEvent[] = [];
    private readonly input: ParserInput;
    private pos = 0;
    private steps = 0;

    constructor(tokens: readonly Token[]) {
        this.input = new ParserInput(tokens);
    }

    /** Index of the current non-trivia token; grows whenever a token is consumed. */
    get position(): number {
        return this.pos;
    }

    // --- Lookahead ---

    current(): SyntaxKind {
        return this.nth(0);
    }

    nth(n: number): SyntaxKind {
        if (++this.steps > STEP_LIMIT) {
            throw new Error(`The parser seems stuck at ${syntaxKindName(this.input.kind(this.pos))} (token ${this.pos})`);
        }
        return this.input.kind(this.pos + n);
    }

    /**
     * Checks the current token. Compound operators are recognized from
     * their adjacent pieces.
     */
    at(kind: SyntaxKind): boolean {
        const pieces = GLUED.get(kind);
        if (!pieces) {
            return this.current() === kind;
        }
        for (let i = 0; i < pieces.length; i++) {
            if (this.nth(i) !== pieces[i] || (i > 0 && !this.input.joint[this.pos + i - 1])) {
                return false;
            }
        }
        return true;
    }

    atSet(set: TokenSet): boolean {
        return set.contains(this.current());
    }

    // --- Consuming ---

    bump(): void {
        const kind = this.current();
        if (kind === SyntaxKind.EOF) {
            return;
        }
        this.doBump(kind, 1);
    }

    /**
     * Consumes `kind` if it is next, gluing compound operators.
     */
    eat(kind: SyntaxKind): boolean {
        if (!this.at(kind)) {
            return false;
        }
        this.doBump(kind, GLUED.get(kind)?.length ?? 1);
        return true;
    }

    expect(kind: SyntaxKind): boolean {
        if (this.eat(kind)) {
            return true;
        }
        this.error(`expected ${syntaxKindName(kind)}`);
        return false;
    }

    // --- Nodes and errors ---

    start(): Marker {
        const pos = this.events.length;
        this.events.push({ type: 'start', kind: SyntaxKind.TOMBSTONE, forwardParent: undefined });
        return new Marker(pos);
    }

    error(message: string): void {
        this.events.push({ type: 'error', message });
    }

    /**
     * Reports `message` and wraps the current token in an `ERROR` node, unless
     * the token is in `recovery` or is a curly brace. Braces are never consumed
     * alone so that every `{` stays paired with its `}` in the same node.
     */
    errRecover(message: string, recovery: TokenSet): void {
        if (this.atSet(recovery) || this.at(SyntaxKind.L_CURLY) || this.at(SyntaxKind.R_CURLY) || this.at(SyntaxKind.EOF)) {
            this.error(message);
            return;
        }
        const m = this.start();
        this.error(message);
        this.bump();
        m.complete(this, SyntaxKind.ERROR);
    }

    /**
     * Wraps a brace-delimited group in an `ERROR` node, keeping its braces
     * together.
     */
    errBalanced(message: string): void {
        const m = this.start();
        this.error(message);
        this.bumpBalanced();
        m.complete(this, SyntaxKind.ERROR);
    }

    /**
     * Skips the current token inside a brace-delimited list, or a whole
     * `{...}` group. Stops short of the list's own `}`.
     */
    errSkip(message: string): void {
        if (this.at(SyntaxKind.L_CURLY)) {
            this.errBalanced(message);
        } else {
            this.errRecover(message, TokenSet.EMPTY);
        }
    }

    /**
     * Consumes the current token; for a `{`, everything up to and including its
     * matching `}`. Nested groups become `ERROR` nodes of their own, so each
     * `{` shares a parent with its `}`.
     */
    bumpBalanced(): void {
        if (!this.at(SyntaxKind.L_CURLY)) {
            this.bump();
            return;
        }
        this.bump();
        while (!this.at(SyntaxKind.EOF) && !this.at(SyntaxKind.R_CURLY)) {
            if (this.at(SyntaxKind.L_CURLY)) {
                const m = this.start();
                this.bumpBalanced();
                m.complete(this, SyntaxKind.ERROR);
            } else {
                this.bump();
            }
        }
        this.eat(SyntaxKind.R_CURLY);
    }

    // --- Event access for markers ---

    pushEvent(event: ParserEvent): void {
        this.events.push(event);
    }

    startEvent(pos: number): StartEvent {
        const event = this.events[pos];
        if (event.type !== 'start') {
            throw new Error(`Event ${pos} is not a start event`);
        }
        return event;
    }

    abandonStart(pos: number): void {
        if (pos === this.events.length - 1) {
            this.events.pop();
            return;
        }
        const event = this.startEvent(pos);
        event.kind = SyntaxKind.TOMBSTONE;
        event.forwardParent = undefined;
    }

    private doBump(kind: SyntaxKind, nRaw: number): void {
        this.pos += nRaw;
        this.steps = 0;
        this.events.push({ type: 'token', kind, nRaw });
    }
}
