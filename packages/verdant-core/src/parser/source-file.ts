/******************************************************************************
 * Copyright 2024 TypeFox GmbH
 * This program and the accompanying materials are made available under the
 * terms of the MIT License, which is available in the project root.
 ******************************************************************************/

import type { GreenBranch } from '../syntax/green-node.js';
import type { SyntaxNodeRef } from '../syntax/syntax-node.js';
import type { AtomEdit } from './atom-edit.js';
import type { ParseDiagnostic } from './parse-diagnostic.js';
import type { SyntaxServices } from './parser-services.js';
import { Root } from '../ast/nodes.js';
import { isDevelopmentMode } from '../config.js';
import { GreenBuilder } from '../syntax/green-builder.js';
import { OwnedRoot, SyntaxNode, SyntaxRoot } from '../syntax/syntax-node.js';
import { validateBlockStructure } from '../validation/block-structure.js';
import { compareDiagnostics } from './parse-diagnostic.js';
import { incrementalReparse } from './reparse.js';

/**
 * An immutable parsed file: the tree, its diagnostics, and the services it was
 * parsed with. Edits produce new files.
 */
export class SourceFile {

    readonly services: SyntaxServices;
    private readonly root: SyntaxNode<OwnedRoot>;

    private constructor(green: GreenBranch, errors: readonly ParseDiagnostic[], services: SyntaxServices) {
        this.services = services;
        this.root = SyntaxNode.forRoot(new OwnedRoot(new SyntaxRoot(green, errors)));
        if (isDevelopmentMode(services.config)) {
            validateBlockStructure(this.root);
        }
    }

    /**
     * Parses `text` from scratch. Never fails: malformed input ends up in the
     * tree and in {@link errors}.
     */
    static parse(text: string, services: SyntaxServices): SourceFile {
        const { Tokenizer, Grammar } = services.parser;
        const builder = new GreenBuilder();
        Grammar.parseFile(text, Tokenizer.tokenize(text), builder);
        const { green, errors } = builder.finish();
        return new SourceFile(green, errors.sort(compareDiagnostics), services);
    }

    /**
     * Applies `edit`, reparsing only the smallest enclosing block when possible.
     */
    reparse(edit: AtomEdit): SourceFile {
        return this.incrementalReparse(edit) ?? this.fullReparse(edit);
    }

    /**
     * Reparses the innermost reparsable node around the edit, or returns
     * `undefined` if the edit cannot be confined to one.
     */
    incrementalReparse(edit: AtomEdit): SourceFile | undefined {
        const { Tokenizer, Grammar } = this.services.parser;
        const result = incrementalReparse(this.root, this.root.root.syntaxRoot.errors, edit, Tokenizer, Grammar);
        return result && new SourceFile(result.green, result.errors, this.services);
    }

    fullReparse(edit: AtomEdit): SourceFile {
        return SourceFile.parse(edit.apply(this.text()), this.services);
    }

    ast(): Root {
        const root = Root.cast(this.syntax());
        if (!root) {
            throw new Error(`Expected a ROOT node, got ${this.root}`);
        }
        return root;
    }

    syntax(): SyntaxNodeRef {
        return this.root.borrowed();
    }

    errors(): ParseDiagnostic[] {
        return [...this.root.root.syntaxRoot.errors];
    }

    text(): string {
        return this.root.text();
    }
}
