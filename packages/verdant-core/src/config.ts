/******************************************************************************
 * Copyright 2024 TypeFox GmbH
 * This program and the accompanying materials are made available under the
 * terms of the MIT License, which is available in the project root.
 ******************************************************************************/

/**
 * `development` runs the expensive whole-tree invariant checks after every
 * parse and reparse; `production` skips them.
 */
export type SyntaxMode = 'development' | 'production';

export interface SyntaxConfig {
    readonly mode: SyntaxMode;
}

/**
 * Creates a configuration, taking the mode from `NODE_ENV` unless overridden:
 * `production` selects production mode, anything else development mode.
 */
export function createSyntaxConfig(overrides: Partial<SyntaxConfig> = {}): SyntaxConfig {
    return {
        mode: process.env.NODE_ENV === 'production' ? 'production' : 'development',
        ...overrides
    };
}

export function isDevelopmentMode(config: SyntaxConfig): boolean {
    return config.mode === 'development';
}
