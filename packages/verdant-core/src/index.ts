/******************************************************************************
 * Copyright 2024 TypeFox GmbH
 * This program and the accompanying materials are made available under the
 * terms of the MIT License, which is available in the project root.
 ******************************************************************************/

// verdant-core: lossless syntax trees with incremental reparsing

export * from './ast/index.js';
export * from './config.js';
export * from './parser/atom-edit.js';
export * from './parser/parse-diagnostic.js';
export * from './parser/parser-services.js';
export * from './parser/reparse.js';
export * from './parser/source-file.js';
export * from './syntax/green-builder.js';
export * from './syntax/green-node.js';
export * from './syntax/syntax-kind.js';
export * from './syntax/syntax-node.js';
export * from './syntax/text-range.js';
export * from './syntax/tree-sink.js';
export * from './utils/dump-tree.js';
export * from './utils/line-index.js';
export * from './utils/syntax-node-utils.js';
export * from './validation/block-structure.js';
