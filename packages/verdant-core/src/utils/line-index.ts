/******************************************************************************
 * Copyright 2024 TypeFox GmbH
 * This program and the accompanying materials are made available under the
 * terms of the MIT License, which is available in the project root.
 ******************************************************************************/

import type { Diagnostic, Position, Range } from 'vscode-languageserver-types';
import { DiagnosticSeverity, Range as LspRange } from 'vscode-languageserver-types';
import { TextDocument } from 'vscode-languageserver-textdocument';
import type { ParseDiagnostic } from '../parser/parse-diagnostic.js';
import type { TextRange } from '../syntax/text-range.js';
import { diagnosticRange } from '../parser/parse-diagnostic.js';

/**
 * Converts offsets of one text into LSP line/character positions.
 */
export class LineIndex {

    private readonly document: TextDocument;

    constructor(text: string) {
        this.document = TextDocument.create('inmemory:/source', 'plaintext', 0, text);
    }

    get lineCount(): number {
        return this.document.lineCount;
    }

    /** Offsets outside the text are clamped to it. */
    positionAt(offset: number): Position {
        return this.document.positionAt(offset);
    }

    offsetAt(position: Position): number {
        return this.document.offsetAt(position);
    }

    rangeOf(range: TextRange): Range {
        return LspRange.create(this.positionAt(range.start), this.positionAt(range.end));
    }
}

/**
 * Converts parse diagnostics into LSP diagnostics for `text`.
 */
export function toLspDiagnostics(text: string, diagnostics: readonly ParseDiagnostic[]): Diagnostic[] {
    const index = new LineIndex(text);
    return diagnostics.map(diagnostic => ({
        range: index.rangeOf(diagnosticRange(diagnostic)),
        message: diagnostic.message,
        severity: diagnostic.severity === 'error' ? DiagnosticSeverity.Error : DiagnosticSeverity.Warning,
        source: diagnostic.source
    }));
}
