/******************************************************************************
 * Copyright 2024 TypeFox GmbH
 * This program and the accompanying materials are made available under the
 * terms of the MIT License, which is available in the project root.
 ******************************************************************************/

import type { SyntaxParserServices } from 'verdant-core';
import { RustTokenizer } from '../lexer/rust-tokenizer.js';
import { RustGrammar } from './rust-grammar.js';

/**
 * Creates the Rust parser services. Merge with a configuration to obtain the
 * services a `SourceFile` is parsed with.
 */
export function createRustParserModule(): SyntaxParserServices {
    return {
        parser: {
            Tokenizer: new RustTokenizer(),
            Grammar: new RustGrammar()
        }
    };
}
