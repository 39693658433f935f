/******************************************************************************
 * Copyright 2024 TypeFox GmbH
 * This program and the accompanying materials are made available under the
 * terms of the MIT License, which is available in the project root.
 *
 * @module verdant
 ******************************************************************************/

// Re-export the core and the Rust backend
export * from 'verdant-core';
export * from 'verdant-rust';

export { createRustServices, parse } from './default-module.js';
