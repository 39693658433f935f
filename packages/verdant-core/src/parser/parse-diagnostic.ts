/******************************************************************************
 * Copyright 2024 TypeFox GmbH
 * This program and the accompanying materials are made available under the
 * terms of the MIT License, which is available in the project root.
 ******************************************************************************/

import { TextRange } from '../syntax/text-range.js';

/**
 * A recoverable syntax problem found while parsing.
 * Diagnostics belong to a parse result, never to an individual node.
 */
export interface ParseDiagnostic {
    readonly message: string;
    /** Start offset in the source text. */
    readonly offset: number;
    /** Length of the owning range; zero for a position. */
    readonly length: number;
    readonly severity: 'error' | 'warning';
    readonly source: 'lexer' | 'parser';
}

export function diagnosticRange(diagnostic: ParseDiagnostic): TextRange {
    return TextRange.ofLength(diagnostic.offset, diagnostic.length);
}

export function shiftDiagnostic(diagnostic: ParseDiagnostic, delta: number): ParseDiagnostic {
    return { ...diagnostic, offset: diagnostic.offset + delta };
}

export function compareDiagnostics(a: ParseDiagnostic, b: ParseDiagnostic): number {
    return a.offset - b.offset || a.length - b.length;
}
