/******************************************************************************
 * Copyright 2024 TypeFox GmbH
 * This program and the accompanying materials are made available under the
 * terms of the MIT License, which is available in the project root.
 ******************************************************************************/

import { describe, test, expect } from 'vitest';
import { DiagnosticSeverity } from 'vscode-languageserver-types';
import { LineIndex, TextRange, toLspDiagnostics } from 'verdant-core';

describe('LineIndex', () => {

    const index = new LineIndex('ab\ncd\n');

    test('counts lines', () => {
        expect(index.lineCount).toBe(3);
    });

    test('positionAt', () => {
        expect(index.positionAt(0)).toEqual({ line: 0, character: 0 });
        expect(index.positionAt(2)).toEqual({ line: 0, character: 2 });
        expect(index.positionAt(4)).toEqual({ line: 1, character: 1 });
        expect(index.positionAt(6)).toEqual({ line: 2, character: 0 });
    });

    test('positionAt clamps to the text', () => {
        expect(index.positionAt(-5)).toEqual({ line: 0, character: 0 });
        expect(index.positionAt(100)).toEqual({ line: 2, character: 0 });
    });

    test('offsetAt', () => {
        expect(index.offsetAt({ line: 1, character: 1 })).toBe(4);
        expect(index.offsetAt({ line: 5, character: 0 })).toBe(6);
    });

    test('carriage returns end lines too', () => {
        const crlf = new LineIndex('a\r\nb\rc');
        expect(crlf.lineCount).toBe(3);
        expect(crlf.positionAt(3)).toEqual({ line: 1, character: 0 });
        expect(crlf.positionAt(5)).toEqual({ line: 2, character: 0 });
        expect(crlf.offsetAt({ line: 2, character: 1 })).toBe(6);
    });

    test('rangeOf', () => {
        expect(index.rangeOf(new TextRange(1, 4))).toEqual({
            start: { line: 0, character: 1 },
            end: { line: 1, character: 1 }
        });
    });
});

describe('toLspDiagnostics', () => {

    test('converts offsets and severities', () => {
        const diagnostics = toLspDiagnostics('ab\ncd', [
            { message: 'expected SEMI', offset: 4, length: 1, severity: 'error', source: 'parser' },
            { message: 'unused', offset: 0, length: 0, severity: 'warning', source: 'lexer' }
        ]);
        expect(diagnostics).toEqual([
            {
                range: { start: { line: 1, character: 1 }, end: { line: 1, character: 2 } },
                message: 'expected SEMI',
                severity: DiagnosticSeverity.Error,
                source: 'parser'
            },
            {
                range: { start: { line: 0, character: 0 }, end: { line: 0, character: 0 } },
                message: 'unused',
                severity: DiagnosticSeverity.Warning,
                source: 'lexer'
            }
        ]);
    });
});
