/******************************************************************************
 * Copyright 2024 TypeFox GmbH
 * This program and the accompanying materials are made available under the
 * terms of the MIT License, which is available in the project root.
 ******************************************************************************/

import type { SyntaxKind } from './syntax-kind.js';

/**
 * The builder contract a grammar drives while parsing.
 *
 * A grammar emits a balanced sequence of `startNode`/`finishNode` calls with
 * `token` calls in between; `error` records a diagnostic at the current position
 * without interrupting the parse.
 */
export interface TreeSink {
    startNode(kind: SyntaxKind): void;
    token(kind: SyntaxKind, text: string): void;
    finishNode(): void;
    error(message: string): void;
}
