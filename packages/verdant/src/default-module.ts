/******************************************************************************
 * Copyright 2024 TypeFox GmbH
 * This program and the accompanying materials are made available under the
 * terms of the MIT License, which is available in the project root.
 ******************************************************************************/

import type { SyntaxConfig, SyntaxServices } from 'verdant-core';
import { SourceFile, createSyntaxConfig } from 'verdant-core';
import { createRustParserModule } from 'verdant-rust';

/**
 * Creates the services for parsing Rust sources. The mode defaults to the one
 * derived from `NODE_ENV`.
 */
export function createRustServices(config: Partial<SyntaxConfig> = {}): SyntaxServices {
    return {
        ...createRustParserModule(),
        config: createSyntaxConfig(config)
    };
}

let defaultServices: SyntaxServices | undefined;

/**
 * Parses `text` with the shared default Rust services, or with `services`
 * when given.
 */
export function parse(text: string, services?: SyntaxServices): SourceFile {
    return SourceFile.parse(text, services ?? (defaultServices ??= createRustServices()));
}
