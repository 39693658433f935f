/******************************************************************************
 * Copyright 2024 TypeFox GmbH
 * This program and the accompanying materials are made available under the
 * terms of the MIT License, which is available in the project root.
 ******************************************************************************/

import type { TokenType } from 'chevrotain';
import type { Token, Tokenizer } from 'verdant-core';
import { createToken, Lexer } from 'chevrotain';
import { SyntaxKind, keywordKind } from 'verdant-core';

interface TokenDefinition {
    readonly name: string;
    readonly pattern: RegExp | string;
    readonly kind: SyntaxKind;
    readonly lineBreaks?: boolean;
}

// Order matters: chevrotain picks the first definition that matches, so longer
// operators precede their prefixes. `<` and `>` are never combined here; the
// parser glues `<=`, `<<`, `>>=` and friends from adjacent tokens.
const DEFINITIONS: readonly TokenDefinition[] = [
    { name: 'Whitespace', pattern: /\s+/, kind: SyntaxKind.WHITESPACE, lineBreaks: true },
    { name: 'LineComment', pattern: /\/\/[^\n\r]*/, kind: SyntaxKind.COMMENT },
    { name: 'BlockComment', pattern: /\/\*[^*]*\*+(?:[^/*][^*]*\*+)*\//, kind: SyntaxKind.COMMENT, lineBreaks: true },
    { name: 'UnterminatedBlockComment', pattern: /\/\*[\s\S]*/, kind: SyntaxKind.COMMENT, lineBreaks: true },

    { name: 'Float', pattern: /\d[\d_]*(?:\.\d[\d_]*(?:[eE][+-]?[\d_]+)?|[eE][+-]?[\d_]+)(?:f32|f64)?/, kind: SyntaxKind.FLOAT_NUMBER },
    { name: 'Int', pattern: /(?:0x[\da-fA-F_]+|0o[0-7_]+|0b[01_]+|\d[\d_]*)(?:[a-zA-Z_][\w]*)?/, kind: SyntaxKind.INT_NUMBER },

    { name: 'Char', pattern: /'(?:[^'\\\n\r\uD800-\uDFFF]|[\uD800-\uDBFF][\uDC00-\uDFFF]|\\(?:[nrt\\0'"]|x[\da-fA-F]{2}|u\{[\da-fA-F]{1,6}\}))'/, kind: SyntaxKind.CHAR },
    { name: 'Lifetime', pattern: /'[a-zA-Z_]\w*/, kind: SyntaxKind.LIFETIME },
    { name: 'Byte', pattern: /b'(?:[^'\\\n\r]|\\(?:[nrt\\0'"]|x[\da-fA-F]{2}))'/, kind: SyntaxKind.BYTE },
    { name: 'ByteString', pattern: /b"(?:[^"\\]|\\[\s\S]?)*"?/, kind: SyntaxKind.BYTE_STRING, lineBreaks: true },
    { name: 'RawString', pattern: /r"[^"]*"?/, kind: SyntaxKind.RAW_STRING, lineBreaks: true },
    { name: 'String', pattern: /"(?:[^"\\]|\\[\s\S]?)*"?/, kind: SyntaxKind.STRING, lineBreaks: true },

    // Keywords and `_` are told apart from identifiers after matching.
    { name: 'Ident', pattern: /[a-zA-Z_]\w*/, kind: SyntaxKind.IDENT },

    { name: 'DotDotDot', pattern: '...', kind: SyntaxKind.DOTDOTDOT },
    { name: 'DotDotEq', pattern: '..=', kind: SyntaxKind.DOTDOTEQ },
    { name: 'DotDot', pattern: '..', kind: SyntaxKind.DOTDOT },
    { name: 'ColonColon', pattern: '::', kind: SyntaxKind.COLONCOLON },
    { name: 'ThinArrow', pattern: '->', kind: SyntaxKind.THIN_ARROW },
    { name: 'FatArrow', pattern: '=>', kind: SyntaxKind.FAT_ARROW },
    { name: 'EqEq', pattern: '==', kind: SyntaxKind.EQEQ },
    { name: 'Neq', pattern: '!=', kind: SyntaxKind.NEQ },
    { name: 'AmpAmp', pattern: '&&', kind: SyntaxKind.AMPAMP },
    { name: 'PipePipe', pattern: '||', kind: SyntaxKind.PIPEPIPE },
    { name: 'PlusEq', pattern: '+=', kind: SyntaxKind.PLUSEQ },
    { name: 'MinusEq', pattern: '-=', kind: SyntaxKind.MINUSEQ },
    { name: 'StarEq', pattern: '*=', kind: SyntaxKind.STAREQ },
    { name: 'SlashEq', pattern: '/=', kind: SyntaxKind.SLASHEQ },
    { name: 'PercentEq', pattern: '%=', kind: SyntaxKind.PERCENTEQ },
    { name: 'CaretEq', pattern: '^=', kind: SyntaxKind.CARETEQ },
    { name: 'AmpEq', pattern: '&=', kind: SyntaxKind.AMPEQ },
    { name: 'PipeEq', pattern: '|=', kind: SyntaxKind.PIPEEQ },

    { name: 'Semi', pattern: ';', kind: SyntaxKind.SEMI },
    { name: 'Comma', pattern: ',', kind: SyntaxKind.COMMA },
    { name: 'LParen', pattern: '(', kind: SyntaxKind.L_PAREN },
    { name: 'RParen', pattern: ')', kind: SyntaxKind.R_PAREN },
    { name: 'LCurly', pattern: '{', kind: SyntaxKind.L_CURLY },
    { name: 'RCurly', pattern: '}', kind: SyntaxKind.R_CURLY },
    { name: 'LBrack', pattern: '[', kind: SyntaxKind.L_BRACK },
    { name: 'RBrack', pattern: ']', kind: SyntaxKind.R_BRACK },
    { name: 'LAngle', pattern: '<', kind: SyntaxKind.L_ANGLE },
    { name: 'RAngle', pattern: '>', kind: SyntaxKind.R_ANGLE },
    { name: 'At', pattern: '@', kind: SyntaxKind.AT },
    { name: 'Pound', pattern: '#', kind: SyntaxKind.POUND },
    { name: 'Tilde', pattern: '~', kind: SyntaxKind.TILDE },
    { name: 'Question', pattern: '?', kind: SyntaxKind.QUESTION },
    { name: 'Dollar', pattern: '$', kind: SyntaxKind.DOLLAR },
    { name: 'Amp', pattern: '&', kind: SyntaxKind.AMP },
    { name: 'Pipe', pattern: '|', kind: SyntaxKind.PIPE },
    { name: 'Plus', pattern: '+', kind: SyntaxKind.PLUS },
    { name: 'Star', pattern: '*', kind: SyntaxKind.STAR },
    { name: 'Slash', pattern: '/', kind: SyntaxKind.SLASH },
    { name: 'Caret', pattern: '^', kind: SyntaxKind.CARET },
    { name: 'Percent', pattern: '%', kind: SyntaxKind.PERCENT },
    { name: 'Dot', pattern: '.', kind: SyntaxKind.DOT },
    { name: 'Colon', pattern: ':', kind: SyntaxKind.COLON },
    { name: 'Eq', pattern: '=', kind: SyntaxKind.EQ },
    { name: 'Excl', pattern: '!', kind: SyntaxKind.EXCL },
    { name: 'Minus', pattern: '-', kind: SyntaxKind.MINUS },

    // Anything else becomes a one-character error token. A surrogate pair
    // counts as one character.
    { name: 'Error', pattern: /[\uD800-\uDBFF][\uDC00-\uDFFF]|[\s\S]/, kind: SyntaxKind.ERROR, lineBreaks: true }
];

/**
 * Tokenizes Rust source text with a chevrotain lexer. The result covers the
 * input without gaps; unrecognized characters become `ERROR` tokens.
 */
export class RustTokenizer implements Tokenizer {

    protected readonly lexer: Lexer;
    protected readonly kinds = new Map<TokenType, SyntaxKind>();
    protected readonly identType: TokenType;

    constructor() {
        const tokenTypes: TokenType[] = [];
        for (const definition of DEFINITIONS) {
            const tokenType = createToken({
                name: definition.name,
                pattern: definition.pattern,
                line_breaks: definition.lineBreaks
            });
            tokenTypes.push(tokenType);
            this.kinds.set(tokenType, definition.kind);
        }
        const identType = tokenTypes.find(tokenType => this.kinds.get(tokenType) === SyntaxKind.IDENT);
        if (!identType) {
            throw new Error('No identifier token defined');
        }
        this.identType = identType;
        this.lexer = new Lexer(tokenTypes, {
            positionTracking: 'onlyOffset',
            ensureOptimizations: false,
            // Without it, chevrotain's first-character lookup skips the catch-all.
            safeMode: true
        });
    }

    tokenize(text: string): Token[] {
        const result = this.lexer.tokenize(text);
        const tokens: Token[] = [];
        let offset = 0;
        for (const token of result.tokens) {
            // Input the lexer skipped over is kept as an error token.
            if (token.startOffset > offset) {
                tokens.push({ kind: SyntaxKind.ERROR, len: token.startOffset - offset });
            }
            tokens.push({ kind: this.kindOf(token.tokenType, token.image), len: token.image.length });
            offset = token.startOffset + token.image.length;
        }
        if (offset < text.length) {
            tokens.push({ kind: SyntaxKind.ERROR, len: text.length - offset });
        }
        return tokens;
    }

    protected kindOf(tokenType: TokenType, image: string): SyntaxKind {
        if (tokenType === this.identType) {
            return image === '_' ? SyntaxKind.UNDERSCORE : keywordKind(image) ?? SyntaxKind.IDENT;
        }
        const kind = this.kinds.get(tokenType);
        if (kind === undefined) {
            throw new Error(`Unknown token type ${tokenType.name}`);
        }
        return kind;
    }
}
