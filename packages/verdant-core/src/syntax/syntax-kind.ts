/******************************************************************************
 * Copyright 2024 TypeFox GmbH
 * This program and the accompanying materials are made available under the
 * terms of the MIT License, which is available in the project root.
 ******************************************************************************/

/**
 * The closed catalogue of token and node kinds.
 *
 * Token kinds come first, node kinds start at {@link SyntaxKind.ROOT}.
 * Keyword kinds are named `<KEYWORD>_KW`; their source text is derived from the name.
 */
export enum SyntaxKind {
    // --- Special ---
    TOMBSTONE,
    EOF,
    ERROR,

    // --- Trivia ---
    WHITESPACE,
    COMMENT,

    // --- Punctuation ---
    SEMI,
    COMMA,
    L_PAREN,
    R_PAREN,
    L_CURLY,
    R_CURLY,
    L_BRACK,
    R_BRACK,
    L_ANGLE,
    R_ANGLE,
    AT,
    POUND,
    TILDE,
    QUESTION,
    DOLLAR,
    AMP,
    PIPE,
    PLUS,
    STAR,
    SLASH,
    CARET,
    PERCENT,
    DOT,
    DOTDOT,
    DOTDOTDOT,
    DOTDOTEQ,
    COLON,
    COLONCOLON,
    EQ,
    EQEQ,
    FAT_ARROW,
    EXCL,
    NEQ,
    MINUS,
    THIN_ARROW,
    LTEQ,
    GTEQ,
    PLUSEQ,
    MINUSEQ,
    PIPEEQ,
    AMPEQ,
    CARETEQ,
    SLASHEQ,
    STAREQ,
    PERCENTEQ,
    AMPAMP,
    PIPEPIPE,
    SHL,
    SHR,
    SHLEQ,
    SHREQ,

    // --- Literals and names ---
    IDENT,
    UNDERSCORE,
    LIFETIME,
    INT_NUMBER,
    FLOAT_NUMBER,
    CHAR,
    BYTE,
    STRING,
    RAW_STRING,
    BYTE_STRING,

    // --- Keywords ---
    AS_KW,
    BREAK_KW,
    CONST_KW,
    CONTINUE_KW,
    CRATE_KW,
    DYN_KW,
    ELSE_KW,
    ENUM_KW,
    EXTERN_KW,
    FALSE_KW,
    FN_KW,
    FOR_KW,
    IF_KW,
    IMPL_KW,
    IN_KW,
    LET_KW,
    LOOP_KW,
    MATCH_KW,
    MOD_KW,
    MOVE_KW,
    MUT_KW,
    PUB_KW,
    REF_KW,
    RETURN_KW,
    SELF_KW,
    STATIC_KW,
    STRUCT_KW,
    SUPER_KW,
    TRAIT_KW,
    TRUE_KW,
    TYPE_KW,
    UNSAFE_KW,
    USE_KW,
    WHERE_KW,
    WHILE_KW,

    // --- Nodes ---
    ROOT,

    // items
    FN_DEF,
    STRUCT_DEF,
    ENUM_DEF,
    TRAIT_DEF,
    IMPL_ITEM,
    MODULE,
    USE_ITEM,
    CONST_DEF,
    STATIC_DEF,
    TYPE_DEF,
    EXTERN_CRATE_ITEM,
    MACRO_CALL,
    ITEM_LIST,
    VISIBILITY,
    ATTR,
    TOKEN_TREE,
    ALIAS,
    USE_TREE,
    USE_TREE_LIST,

    // fields and variants
    NAMED_FIELD_DEF_LIST,
    NAMED_FIELD_DEF,
    POS_FIELD_LIST,
    POS_FIELD,
    ENUM_VARIANT_LIST,
    ENUM_VARIANT,

    // generics
    TYPE_PARAM_LIST,
    TYPE_PARAM,
    LIFETIME_PARAM,
    TYPE_BOUND_LIST,
    TYPE_BOUND,
    WHERE_CLAUSE,
    WHERE_PRED,
    TYPE_ARG_LIST,
    TYPE_ARG,
    LIFETIME_ARG,

    // functions
    PARAM_LIST,
    PARAM,
    SELF_PARAM,
    RET_TYPE,

    // types
    PAREN_TYPE,
    TUPLE_TYPE,
    NEVER_TYPE,
    PATH_TYPE,
    POINTER_TYPE,
    ARRAY_TYPE,
    SLICE_TYPE,
    REFERENCE_TYPE,
    PLACEHOLDER_TYPE,
    FN_POINTER_TYPE,
    FOR_TYPE,
    IMPL_TRAIT_TYPE,
    DYN_TRAIT_TYPE,

    // patterns
    BIND_PAT,
    PLACEHOLDER_PAT,
    REF_PAT,
    TUPLE_PAT,
    PATH_PAT,
    TUPLE_STRUCT_PAT,
    STRUCT_PAT,
    FIELD_PAT_LIST,
    LITERAL_PAT,

    // statements
    BLOCK,
    LET_STMT,
    EXPR_STMT,

    // expressions
    TUPLE_EXPR,
    ARRAY_EXPR,
    PAREN_EXPR,
    PATH_EXPR,
    LAMBDA_EXPR,
    IF_EXPR,
    CONDITION,
    WHILE_EXPR,
    LOOP_EXPR,
    FOR_EXPR,
    CONTINUE_EXPR,
    BREAK_EXPR,
    LABEL,
    BLOCK_EXPR,
    RETURN_EXPR,
    MATCH_EXPR,
    MATCH_ARM_LIST,
    MATCH_ARM,
    MATCH_GUARD,
    STRUCT_LIT,
    NAMED_FIELD_LIST,
    NAMED_FIELD,
    CALL_EXPR,
    INDEX_EXPR,
    METHOD_CALL_EXPR,
    FIELD_EXPR,
    TRY_EXPR,
    CAST_EXPR,
    REF_EXPR,
    PREFIX_EXPR,
    RANGE_EXPR,
    BIN_EXPR,
    LITERAL,
    ARG_LIST,

    // names and paths
    NAME,
    NAME_REF,
    PATH,
    PATH_SEGMENT,
}

const KEYWORD_SUFFIX = '_KW';

const keywordsByText = new Map<string, SyntaxKind>();
const keywordTexts = new Map<SyntaxKind, string>();

for (const [name, value] of Object.entries(SyntaxKind)) {
    if (typeof value === 'number' && name.endsWith(KEYWORD_SUFFIX)) {
        const text = name.slice(0, -KEYWORD_SUFFIX.length).toLowerCase();
        keywordsByText.set(text, value);
        keywordTexts.set(value, text);
    }
}

/**
 * Returns the symbolic name of a kind, e.g. `"FN_DEF"`.
 */
export function syntaxKindName(kind: SyntaxKind): string {
    return SyntaxKind[kind];
}

/**
 * Returns the keyword kind spelled by `text`, if any.
 */
export function keywordKind(text: string): SyntaxKind | undefined {
    return keywordsByText.get(text);
}

/**
 * Returns the source text of a keyword kind.
 */
export function keywordText(kind: SyntaxKind): string | undefined {
    return keywordTexts.get(kind);
}

export function isKeyword(kind: SyntaxKind): boolean {
    return keywordTexts.has(kind);
}

/** Whitespace and comments: tokens the grammar never looks at. */
export function isTrivia(kind: SyntaxKind): boolean {
    return kind === SyntaxKind.WHITESPACE || kind === SyntaxKind.COMMENT;
}

/** True for kinds that denote composite nodes rather than tokens. */
export function isNodeKind(kind: SyntaxKind): boolean {
    return kind >= SyntaxKind.ROOT;
}

export function isLiteralKind(kind: SyntaxKind): boolean {
    switch (kind) {
        case SyntaxKind.INT_NUMBER:
        case SyntaxKind.FLOAT_NUMBER:
        case SyntaxKind.CHAR:
        case SyntaxKind.BYTE:
        case SyntaxKind.STRING:
        case SyntaxKind.RAW_STRING:
        case SyntaxKind.BYTE_STRING:
        case SyntaxKind.TRUE_KW:
        case SyntaxKind.FALSE_KW:
            return true;
        default:
            return false;
    }
}
