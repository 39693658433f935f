/******************************************************************************
 * Copyright 2024 TypeFox GmbH
 * This program and the accompanying materials are made available under the
 * terms of the MIT License, which is available in the project root.
 ******************************************************************************/

import { TextRange } from '../syntax/text-range.js';

/**
 * A single contiguous text edit: delete `delete`, then insert `insert` at its start.
 */
export class AtomEdit {
    readonly delete: TextRange;
    readonly insert: string;

    private constructor(deleteRange: TextRange, insert: string) {
        this.delete = deleteRange;
        this.insert = insert;
    }

    static replace(range: TextRange, text: string): AtomEdit {
        return new AtomEdit(range, text);
    }

    static delete(range: TextRange): AtomEdit {
        return new AtomEdit(range, '');
    }

    static insert(offset: number, text: string): AtomEdit {
        return new AtomEdit(TextRange.empty(offset), text);
    }

    /** Change in text length caused by this edit. */
    get delta(): number {
        return this.insert.length - this.delete.length;
    }

    /**
     * Applies the edit to `text`, whose offsets the delete range refers to.
     */
    apply(text: string): string {
        return replaceRange(text, this.delete, this.insert);
    }
}

export function replaceRange(text: string, range: TextRange, replaceWith: string): string {
    if (range.end > text.length) {
        throw new RangeError(`Range ${range} is outside of a text of length ${text.length}`);
    }
    return text.slice(0, range.start) + replaceWith + text.slice(range.end);
}
