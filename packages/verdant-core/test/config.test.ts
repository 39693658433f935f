/******************************************************************************
 * Copyright 2024 TypeFox GmbH
 * This program and the accompanying materials are made available under the
 * terms of the MIT License, which is available in the project root.
 ******************************************************************************/

import { afterEach, describe, test, expect } from 'vitest';
import { createSyntaxConfig, isDevelopmentMode } from 'verdant-core';

describe('createSyntaxConfig', () => {

    const nodeEnv = process.env.NODE_ENV;

    afterEach(() => {
        if (nodeEnv === undefined) {
            delete process.env.NODE_ENV;
        } else {
            process.env.NODE_ENV = nodeEnv;
        }
    });

    test('production NODE_ENV selects production mode', () => {
        process.env.NODE_ENV = 'production';
        expect(createSyntaxConfig().mode).toBe('production');
        expect(isDevelopmentMode(createSyntaxConfig())).toBe(false);
    });

    test('any other NODE_ENV selects development mode', () => {
        process.env.NODE_ENV = 'test';
        expect(createSyntaxConfig().mode).toBe('development');
        delete process.env.NODE_ENV;
        expect(isDevelopmentMode(createSyntaxConfig())).toBe(true);
    });

    test('overrides win over the environment', () => {
        process.env.NODE_ENV = 'production';
        expect(createSyntaxConfig({ mode: 'development' }).mode).toBe('development');
    });
});
