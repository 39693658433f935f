/******************************************************************************
 * Copyright 2024 TypeFox GmbH
 * This program and the accompanying materials are made available under the
 * terms of the MIT License, which is available in the project root.
 ******************************************************************************/

import type { SyntaxConfig } from '../config.js';
import type { SyntaxKind } from '../syntax/syntax-kind.js';
import type { TreeSink } from '../syntax/tree-sink.js';

/**
 * A token of the flat token stream. Tokens carry no offsets: the stream covers
 * the whole input without gaps, so offsets are running sums of lengths.
 */
export interface Token {
    readonly kind: SyntaxKind;
    /** Length in UTF-16 code units. */
    readonly len: number;
}

/**
 * Turns raw text into a token stream covering every character of it,
 * including whitespace, comments and unrecognized characters.
 */
export interface Tokenizer {
    tokenize(text: string): Token[];
}

/**
 * A grammar entry point able to parse the content of a single node kind in
 * isolation. The text handed to it must start with `open` and end with `close`.
 */
export interface Reparser {
    /** The node kind this entry point produces. */
    readonly kind: SyntaxKind;
    readonly open: SyntaxKind;
    readonly close: SyntaxKind;
    parse(text: string, tokens: readonly Token[], sink: TreeSink): void;
}

/**
 * The grammar of a language, driving a {@link TreeSink}.
 *
 * Grammars never fail: malformed input is reported through `sink.error` and
 * still ends up in the tree.
 */
export interface Grammar {
    /** Parses a whole file; the outermost node is `ROOT`. */
    parseFile(text: string, tokens: readonly Token[], sink: TreeSink): void;

    /** The dedicated entry point for a reparsable kind, if the kind has one. */
    reparser(kind: SyntaxKind): Reparser | undefined;
}

export type SyntaxParserServices = {
    readonly parser: {
        readonly Tokenizer: Tokenizer
        readonly Grammar: Grammar
    }
}

/**
 * Everything a {@link SourceFile} needs to parse and reparse.
 */
export type SyntaxServices = SyntaxParserServices & {
    readonly config: SyntaxConfig
}
