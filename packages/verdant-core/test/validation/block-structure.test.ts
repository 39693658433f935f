/******************************************************************************
 * Copyright 2024 TypeFox GmbH
 * This program and the accompanying materials are made available under the
 * terms of the MIT License, which is available in the project root.
 ******************************************************************************/

import { describe, test, expect } from 'vitest';
import { SyntaxKind, validateBlockStructure } from 'verdant-core';
import { buildTree } from '../test-helper.js';

describe('validateBlockStructure', () => {

    test('accepts nested blocks', () => {
        const root = buildTree(sink => {
            sink.startNode(SyntaxKind.ROOT);
            sink.startNode(SyntaxKind.BLOCK);
            sink.token(SyntaxKind.L_CURLY, '{');
            sink.startNode(SyntaxKind.BLOCK);
            sink.token(SyntaxKind.L_CURLY, '{');
            sink.token(SyntaxKind.R_CURLY, '}');
            sink.finishNode();
            sink.token(SyntaxKind.R_CURLY, '}');
            sink.finishNode();
            sink.finishNode();
        });
        expect(() => validateBlockStructure(root)).not.toThrow();
    });

    test('accepts unmatched braces', () => {
        const root = buildTree(sink => {
            sink.startNode(SyntaxKind.ROOT);
            sink.startNode(SyntaxKind.ERROR);
            sink.token(SyntaxKind.R_CURLY, '}');
            sink.finishNode();
            sink.startNode(SyntaxKind.BLOCK);
            sink.token(SyntaxKind.L_CURLY, '{');
            sink.token(SyntaxKind.IDENT, 'x');
            sink.finishNode();
            sink.finishNode();
        });
        expect(() => validateBlockStructure(root)).not.toThrow();
    });

    test('rejects braces with different parents', () => {
        const root = buildTree(sink => {
            sink.startNode(SyntaxKind.ROOT);
            sink.startNode(SyntaxKind.BLOCK);
            sink.token(SyntaxKind.L_CURLY, '{');
            sink.token(SyntaxKind.IDENT, 'x');
            sink.finishNode();
            sink.token(SyntaxKind.R_CURLY, '}');
            sink.finishNode();
        });
        expect(() => validateBlockStructure(root)).toThrow('Unpaired curlies: L_CURLY@[0; 1) and R_CURLY@[2; 3) have different parents');
        expect(() => validateBlockStructure(root)).toThrow('ROOT@[0; 3)\n  BLOCK@[0; 2)');
    });

    test('rejects a node continuing after its closing brace', () => {
        const root = buildTree(sink => {
            sink.startNode(SyntaxKind.BLOCK);
            sink.token(SyntaxKind.L_CURLY, '{');
            sink.token(SyntaxKind.IDENT, 'x');
            sink.token(SyntaxKind.R_CURLY, '}');
            sink.token(SyntaxKind.IDENT, 'y');
            sink.finishNode();
        });
        expect(() => validateBlockStructure(root)).toThrow('Floating curlies at R_CURLY@[2; 3)\nfile:\n{x}y\nnode:\n{x}y');
    });

    test('rejects a node starting before its opening brace', () => {
        const root = buildTree(sink => {
            sink.startNode(SyntaxKind.BLOCK);
            sink.token(SyntaxKind.IDENT, 'y');
            sink.token(SyntaxKind.L_CURLY, '{');
            sink.token(SyntaxKind.R_CURLY, '}');
            sink.finishNode();
        });
        expect(() => validateBlockStructure(root)).toThrow('Floating curlies at R_CURLY@[2; 3)');
    });
});
