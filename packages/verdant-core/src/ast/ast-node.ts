/******************************************************************************
 * Copyright 2024 TypeFox GmbH
 * This program and the accompanying materials are made available under the
 * terms of the MIT License, which is available in the project root.
 ******************************************************************************/

import type { SyntaxKind } from '../syntax/syntax-kind.js';
import type { SyntaxNodeRef } from '../syntax/syntax-node.js';
import type { Attr, Name, TypeParamList, WhereClause } from './nodes.js';
import { syntaxKindName } from '../syntax/syntax-kind.js';

/**
 * A typed view of exactly one syntax node. Typed views add no data of their
 * own; everything is read from `syntax` on demand.
 */
export interface AstNode {
    readonly syntax: SyntaxNodeRef;
    readonly kind: SyntaxKind;
}

/**
 * A checked narrowing from an untyped node: defined iff the node's kind matches.
 */
export type AstCast<T extends AstNode> = (syntax: SyntaxNodeRef) => T | undefined;

/**
 * The static side of a typed wrapper class.
 */
export interface AstNodeType<T extends AstNode> {
    readonly KIND: SyntaxKind;
    readonly cast: AstCast<T>;
}

/**
 * The first direct child of `parent` that `type` accepts.
 */
export function childOpt<T extends AstNode>(parent: AstNode, type: { readonly cast: AstCast<T> }): T | undefined {
    for (const child of parent.syntax.children()) {
        const result = type.cast(child);
        if (result) {
            return result;
        }
    }
    return undefined;
}

/**
 * All direct children of `parent` that `type` accepts, in document order.
 */
export function children<T extends AstNode>(parent: AstNode, type: { readonly cast: AstCast<T> }): T[] {
    const result: T[] = [];
    for (const child of parent.syntax.children()) {
        const node = type.cast(child);
        if (node) {
            result.push(node);
        }
    }
    return result;
}

// --- Tagged unions ---

/**
 * A closed set of alternative node shapes accepted at one grammar position.
 * The variants are discriminated by their `kind`.
 */
export interface AstUnion<T extends AstNode> {
    /** Every kind one of the variants accepts. */
    readonly kinds: readonly SyntaxKind[];
    readonly cast: AstCast<T>;
    /** True if `node` is one of the variants. */
    is(node: AstNode): node is T;
}

/**
 * The union of the instances produced by a variant table.
 */
export type VariantOf<C extends ReadonlyArray<AstNodeType<AstNode>>> = NonNullable<ReturnType<C[number]['cast']>>;

/**
 * Builds a union from its variant table. Throws if two variants claim the
 * same kind.
 */
export function astUnion<T extends AstNode>(name: string, variants: ReadonlyArray<AstNodeType<T>>): AstUnion<T> {
    const casts = new Map<SyntaxKind, AstCast<T>>();
    for (const variant of variants) {
        if (casts.has(variant.KIND)) {
            throw new Error(`${name}: more than one variant accepts ${syntaxKindName(variant.KIND)}`);
        }
        casts.set(variant.KIND, variant.cast);
    }
    return {
        kinds: [...casts.keys()],
        cast: syntax => casts.get(syntax.kind)?.(syntax),
        is: (node: AstNode): node is T => casts.get(node.kind)?.(node.syntax) !== undefined
    };
}

// --- Capabilities ---

export interface NameOwner extends AstNode {
    name(): Name | undefined;
}

export interface TypeParamsOwner extends AstNode {
    typeParamList(): TypeParamList | undefined;
    whereClause(): WhereClause | undefined;
}

export interface AttrsOwner extends AstNode {
    attrs(): Attr[];
}
