/******************************************************************************
 * Copyright 2024 TypeFox GmbH
 * This program and the accompanying materials are made available under the
 * terms of the MIT License, which is available in the project root.
 ******************************************************************************/

import type { SyntaxNodeRef, SyntaxServices } from 'verdant-core';
import { SourceFile, SyntaxKind, createSyntaxConfig, syntaxKindName } from 'verdant-core';
import { RustTokenizer, createRustParserModule } from 'verdant-rust';

const services: SyntaxServices = {
    ...createRustParserModule(),
    config: createSyntaxConfig({ mode: 'development' })
};

const tokenizer = new RustTokenizer();

/**
 * Parses with the block structure check enabled.
 */
export function parseRust(text: string): SourceFile {
    return SourceFile.parse(text, services);
}

export function tokenKinds(text: string): string[] {
    return tokenizer.tokenize(text).map(token => syntaxKindName(token.kind));
}

/**
 * The nesting of composite nodes, leaving out tokens: `a + 1` becomes
 * `BIN_EXPR(PATH_EXPR(PATH(PATH_SEGMENT(NAME_REF))) LITERAL)`.
 */
export function outline(node: SyntaxNodeRef): string {
    const branches = node.children().filter(child => !child.isLeaf).map(outline);
    const kind = syntaxKindName(node.kind);
    return branches.length === 0 ? kind : `${kind}(${branches.join(' ')})`;
}

function firstOfKind(node: SyntaxNodeRef, kind: SyntaxKind): SyntaxNodeRef {
    const found = node.children().find(child => child.kind === kind);
    if (!found) {
        throw new Error(`No ${syntaxKindName(kind)} in ${node}`);
    }
    return found;
}

/**
 * The outline of the tail expression of `fn f() { <source> }`.
 */
export function exprOutline(source: string): string {
    const block = firstOfKind(firstOfKind(parseRust(`fn f() { ${source} }`).syntax(), SyntaxKind.FN_DEF), SyntaxKind.BLOCK);
    const branches = block.children().filter(child => !child.isLeaf);
    return branches.map(outline).join(' ');
}

/**
 * The outline of `T` in `type T = <source>;`, with the leading `NAME`.
 */
export function typeOutline(source: string): string {
    return outline(firstOfKind(parseRust(`type T = ${source};`).syntax(), SyntaxKind.TYPE_DEF));
}

/** The outline of the only item of `source`. */
export function itemOutline(source: string): string {
    const items = parseRust(source).syntax().children().filter(child => !child.isLeaf);
    return items.map(outline).join(' ');
}

/** Shorthand for the outline of a single-segment path type such as `u8`. */
export const PATH_TYPE = 'PATH_TYPE(PATH(PATH_SEGMENT(NAME_REF)))';

/** Shorthand for the outline of a single-segment path expression such as `a`. */
export const PATH_EXPR = 'PATH_EXPR(PATH(PATH_SEGMENT(NAME_REF)))';
