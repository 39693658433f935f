/******************************************************************************
 * Copyright 2024 TypeFox GmbH
 * This program and the accompanying materials are made available under the
 * terms of the MIT License, which is available in the project root.
 ******************************************************************************/

/**
 * A half-open range `[start, end)` of UTF-16 code unit offsets.
 */
export class TextRange {

    readonly start: number;
    readonly end: number;

    constructor(start: number, end: number) {
        if (!Number.isInteger(start) || !Number.isInteger(end) || start < 0 || end < start) {
            throw new RangeError(`Invalid text range [${start}, ${end})`);
        }
        this.start = start;
        this.end = end;
    }

    static ofLength(offset: number, length: number): TextRange {
        return new TextRange(offset, offset + length);
    }

    static empty(offset: number): TextRange {
        return new TextRange(offset, offset);
    }

    get length(): number {
        return this.end - this.start;
    }

    isEmpty(): boolean {
        return this.start === this.end;
    }

    /** Inclusive at both ends, so an offset right after the range is still contained. */
    contains(offset: number): boolean {
        return this.start <= offset && offset <= this.end;
    }

    containsRange(other: TextRange): boolean {
        return this.start <= other.start && other.end <= this.end;
    }

    shift(delta: number): TextRange {
        return new TextRange(this.start + delta, this.end + delta);
    }

    equals(other: TextRange): boolean {
        return this.start === other.start && this.end === other.end;
    }

    toString(): string {
        return `[${this.start}; ${this.end})`;
    }
}
