/******************************************************************************
 * Copyright 2024 TypeFox GmbH
 * This program and the accompanying materials are made available under the
 * terms of the MIT License, which is available in the project root.
 ******************************************************************************/

// verdant-rust: Rust tokenizer and error-recovering grammar for verdant

export * from './lexer/rust-tokenizer.js';
export * from './parser/event.js';
export * from './parser/parser.js';
export * from './parser/rust-grammar.js';
export * from './parser/rust-module.js';
export * from './parser/token-set.js';
