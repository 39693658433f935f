/******************************************************************************
 * Copyright 2024 TypeFox GmbH
 * This program and the accompanying materials are made available under the
 * terms of the MIT License, which is available in the project root.
 ******************************************************************************/

import type { SyntaxNodeRef } from '../syntax/syntax-node.js';
import type { AstNode, AstUnion, AttrsOwner, NameOwner, TypeParamsOwner, VariantOf } from './ast-node.js';
import { SyntaxKind, isTrivia } from '../syntax/syntax-kind.js';
import { astUnion, childOpt, children } from './ast-node.js';

/*
 * One wrapper class per meaningful node kind. Every accessor scans the direct
 * children of the wrapped node only; the grammar puts each child kind in a
 * fixed position, so the first match is the right one.
 *
 * The tagged unions are defined at the end of this file, after all variants.
 */

function tokenChild(node: AstNode, kind: SyntaxKind): SyntaxNodeRef | undefined {
    return node.syntax.children().find(child => child.kind === kind);
}

// --- File and items ---

export class Root implements AttrsOwner {
    static readonly KIND = SyntaxKind.ROOT;
    static readonly cast = (syntax: SyntaxNodeRef): Root | undefined => syntax.kind === Root.KIND ? new Root(syntax) : undefined;
    private constructor(readonly syntax: SyntaxNodeRef) { }
    get kind(): typeof Root.KIND { return Root.KIND; }

    attrs(): Attr[] { return children(this, Attr); }
    items(): ModuleItem[] { return children(this, ModuleItem); }
    functions(): FnDef[] { return children(this, FnDef); }
    modules(): Module[] { return children(this, Module); }
    structs(): StructDef[] { return children(this, StructDef); }
    enums(): EnumDef[] { return children(this, EnumDef); }
    impls(): ImplItem[] { return children(this, ImplItem); }
}

export class FnDef implements NameOwner, TypeParamsOwner, AttrsOwner {
    static readonly KIND = SyntaxKind.FN_DEF;
    static readonly cast = (syntax: SyntaxNodeRef): FnDef | undefined => syntax.kind === FnDef.KIND ? new FnDef(syntax) : undefined;
    private constructor(readonly syntax: SyntaxNodeRef) { }
    get kind(): typeof FnDef.KIND { return FnDef.KIND; }

    name(): Name | undefined { return childOpt(this, Name); }
    typeParamList(): TypeParamList | undefined { return childOpt(this, TypeParamList); }
    whereClause(): WhereClause | undefined { return childOpt(this, WhereClause); }
    attrs(): Attr[] { return children(this, Attr); }
    visibility(): Visibility | undefined { return childOpt(this, Visibility); }
    paramList(): ParamList | undefined { return childOpt(this, ParamList); }
    retType(): RetType | undefined { return childOpt(this, RetType); }
    body(): Block | undefined { return childOpt(this, Block); }

    /**
     * True if one of the attributes is the bare identifier `atom`, as in `#[test]`.
     */
    hasAtomAttr(atom: string): boolean {
        return this.attrs().some(attr => attr.asAtom() === atom);
    }
}

export class Attr implements AstNode {
    static readonly KIND = SyntaxKind.ATTR;
    static readonly cast = (syntax: SyntaxNodeRef): Attr | undefined => syntax.kind === Attr.KIND ? new Attr(syntax) : undefined;
    private constructor(readonly syntax: SyntaxNodeRef) { }
    get kind(): typeof Attr.KIND { return Attr.KIND; }

    /** The bracketed token tree after `#`. */
    value(): TokenTree | undefined { return childOpt(this, TokenTree); }

    /** `#![...]` rather than `#[...]`. */
    isInner(): boolean {
        return tokenChild(this, SyntaxKind.EXCL) !== undefined;
    }

    /**
     * The identifier of an attribute of the exact shape `#[ident]`.
     */
    asAtom(): string | undefined {
        const parts = this.value()?.syntax.children() ?? [];
        if (parts.length !== 3 || parts[1].kind !== SyntaxKind.IDENT) {
            return undefined;
        }
        return parts[1].leafText();
    }

    /**
     * The identifier and argument tree of an attribute of the exact shape
     * `#[ident(args)]`.
     */
    asCall(): { name: string, args: TokenTree } | undefined {
        const parts = this.value()?.syntax.children() ?? [];
        if (parts.length !== 4 || parts[1].kind !== SyntaxKind.IDENT) {
            return undefined;
        }
        const name = parts[1].leafText();
        const args = TokenTree.cast(parts[2]);
        return name !== undefined && args ? { name, args } : undefined;
    }
}

export class TokenTree implements AstNode {
    static readonly KIND = SyntaxKind.TOKEN_TREE;
    static readonly cast = (syntax: SyntaxNodeRef): TokenTree | undefined => syntax.kind === TokenTree.KIND ? new TokenTree(syntax) : undefined;
    private constructor(readonly syntax: SyntaxNodeRef) { }
    get kind(): typeof TokenTree.KIND { return TokenTree.KIND; }
}

export class Visibility implements AstNode {
    static readonly KIND = SyntaxKind.VISIBILITY;
    static readonly cast = (syntax: SyntaxNodeRef): Visibility | undefined => syntax.kind === Visibility.KIND ? new Visibility(syntax) : undefined;
    private constructor(readonly syntax: SyntaxNodeRef) { }
    get kind(): typeof Visibility.KIND { return Visibility.KIND; }
}

export class StructDef implements NameOwner, TypeParamsOwner, AttrsOwner {
    static readonly KIND = SyntaxKind.STRUCT_DEF;
    static readonly cast = (syntax: SyntaxNodeRef): StructDef | undefined => syntax.kind === StructDef.KIND ? new StructDef(syntax) : undefined;
    private constructor(readonly syntax: SyntaxNodeRef) { }
    get kind(): typeof StructDef.KIND { return StructDef.KIND; }

    name(): Name | undefined { return childOpt(this, Name); }
    typeParamList(): TypeParamList | undefined { return childOpt(this, TypeParamList); }
    whereClause(): WhereClause | undefined { return childOpt(this, WhereClause); }
    attrs(): Attr[] { return children(this, Attr); }
    visibility(): Visibility | undefined { return childOpt(this, Visibility); }
    namedFieldDefList(): NamedFieldDefList | undefined { return childOpt(this, NamedFieldDefList); }
    posFieldList(): PosFieldList | undefined { return childOpt(this, PosFieldList); }

    /** The named fields; empty for tuple and unit structs. */
    fields(): NamedFieldDef[] {
        return this.namedFieldDefList()?.fields() ?? [];
    }
}

export class EnumDef implements NameOwner, TypeParamsOwner, AttrsOwner {
    static readonly KIND = SyntaxKind.ENUM_DEF;
    static readonly cast = (syntax: SyntaxNodeRef): EnumDef | undefined => syntax.kind === EnumDef.KIND ? new EnumDef(syntax) : undefined;
    private constructor(readonly syntax: SyntaxNodeRef) { }
    get kind(): typeof EnumDef.KIND { return EnumDef.KIND; }

    name(): Name | undefined { return childOpt(this, Name); }
    typeParamList(): TypeParamList | undefined { return childOpt(this, TypeParamList); }
    whereClause(): WhereClause | undefined { return childOpt(this, WhereClause); }
    attrs(): Attr[] { return children(this, Attr); }
    visibility(): Visibility | undefined { return childOpt(this, Visibility); }
    variantList(): EnumVariantList | undefined { return childOpt(this, EnumVariantList); }

    variants(): EnumVariant[] {
        return this.variantList()?.variants() ?? [];
    }
}

export class TraitDef implements NameOwner, TypeParamsOwner, AttrsOwner {
    static readonly KIND = SyntaxKind.TRAIT_DEF;
    static readonly cast = (syntax: SyntaxNodeRef): TraitDef | undefined => syntax.kind === TraitDef.KIND ? new TraitDef(syntax) : undefined;
    private constructor(readonly syntax: SyntaxNodeRef) { }
    get kind(): typeof TraitDef.KIND { return TraitDef.KIND; }

    name(): Name | undefined { return childOpt(this, Name); }
    typeParamList(): TypeParamList | undefined { return childOpt(this, TypeParamList); }
    whereClause(): WhereClause | undefined { return childOpt(this, WhereClause); }
    attrs(): Attr[] { return children(this, Attr); }
    itemList(): ItemList | undefined { return childOpt(this, ItemList); }
}

export class ImplItem implements TypeParamsOwner, AttrsOwner {
    static readonly KIND = SyntaxKind.IMPL_ITEM;
    static readonly cast = (syntax: SyntaxNodeRef): ImplItem | undefined => syntax.kind === ImplItem.KIND ? new ImplItem(syntax) : undefined;
    private constructor(readonly syntax: SyntaxNodeRef) { }
    get kind(): typeof ImplItem.KIND { return ImplItem.KIND; }

    typeParamList(): TypeParamList | undefined { return childOpt(this, TypeParamList); }
    whereClause(): WhereClause | undefined { return childOpt(this, WhereClause); }
    attrs(): Attr[] { return children(this, Attr); }
    itemList(): ItemList | undefined { return childOpt(this, ItemList); }

    /** `T` in both `impl T {}` and `impl Trait for T {}`. */
    targetType(): TypeRef | undefined {
        const [first, second] = children(this, TypeRef);
        return second ?? first;
    }

    /** `Trait` in `impl Trait for T {}`. */
    targetTrait(): TypeRef | undefined {
        const [first, second] = children(this, TypeRef);
        return second ? first : undefined;
    }
}

export class Module implements NameOwner, AttrsOwner {
    static readonly KIND = SyntaxKind.MODULE;
    static readonly cast = (syntax: SyntaxNodeRef): Module | undefined => syntax.kind === Module.KIND ? new Module(syntax) : undefined;
    private constructor(readonly syntax: SyntaxNodeRef) { }
    get kind(): typeof Module.KIND { return Module.KIND; }

    name(): Name | undefined { return childOpt(this, Name); }
    attrs(): Attr[] { return children(this, Attr); }
    visibility(): Visibility | undefined { return childOpt(this, Visibility); }
    itemList(): ItemList | undefined { return childOpt(this, ItemList); }

    /** True for an out-of-line module declaration, `mod foo;`. */
    hasSemi(): boolean {
        return this.syntax.lastChild()?.kind === SyntaxKind.SEMI;
    }

    items(): ModuleItem[] { return this.itemList()?.items() ?? []; }
    modules(): Module[] { return this.itemList()?.modules() ?? []; }
    functions(): FnDef[] { return this.itemList()?.functions() ?? []; }
}

export class ItemList implements AttrsOwner {
    static readonly KIND = SyntaxKind.ITEM_LIST;
    static readonly cast = (syntax: SyntaxNodeRef): ItemList | undefined => syntax.kind === ItemList.KIND ? new ItemList(syntax) : undefined;
    private constructor(readonly syntax: SyntaxNodeRef) { }
    get kind(): typeof ItemList.KIND { return ItemList.KIND; }

    attrs(): Attr[] { return children(this, Attr); }
    items(): ModuleItem[] { return children(this, ModuleItem); }
    modules(): Module[] { return children(this, Module); }
    functions(): FnDef[] { return children(this, FnDef); }
}

export class UseItem implements AttrsOwner {
    static readonly KIND = SyntaxKind.USE_ITEM;
    static readonly cast = (syntax: SyntaxNodeRef): UseItem | undefined => syntax.kind === UseItem.KIND ? new UseItem(syntax) : undefined;
    private constructor(readonly syntax: SyntaxNodeRef) { }
    get kind(): typeof UseItem.KIND { return UseItem.KIND; }

    attrs(): Attr[] { return children(this, Attr); }
    useTree(): UseTree | undefined { return childOpt(this, UseTree); }
}

export class UseTree implements AstNode {
    static readonly KIND = SyntaxKind.USE_TREE;
    static readonly cast = (syntax: SyntaxNodeRef): UseTree | undefined => syntax.kind === UseTree.KIND ? new UseTree(syntax) : undefined;
    private constructor(readonly syntax: SyntaxNodeRef) { }
    get kind(): typeof UseTree.KIND { return UseTree.KIND; }

    path(): Path | undefined { return childOpt(this, Path); }
    useTreeList(): UseTreeList | undefined { return childOpt(this, UseTreeList); }
    alias(): Alias | undefined { return childOpt(this, Alias); }

    /** `use foo::*;` */
    isGlob(): boolean {
        return tokenChild(this, SyntaxKind.STAR) !== undefined;
    }
}

export class UseTreeList implements AstNode {
    static readonly KIND = SyntaxKind.USE_TREE_LIST;
    static readonly cast = (syntax: SyntaxNodeRef): UseTreeList | undefined => syntax.kind === UseTreeList.KIND ? new UseTreeList(syntax) : undefined;
    private constructor(readonly syntax: SyntaxNodeRef) { }
    get kind(): typeof UseTreeList.KIND { return UseTreeList.KIND; }

    useTrees(): UseTree[] { return children(this, UseTree); }
}

export class Alias implements NameOwner {
    static readonly KIND = SyntaxKind.ALIAS;
    static readonly cast = (syntax: SyntaxNodeRef): Alias | undefined => syntax.kind === Alias.KIND ? new Alias(syntax) : undefined;
    private constructor(readonly syntax: SyntaxNodeRef) { }
    get kind(): typeof Alias.KIND { return Alias.KIND; }

    name(): Name | undefined { return childOpt(this, Name); }
}

export class ConstDef implements NameOwner, TypeParamsOwner, AttrsOwner {
    static readonly KIND = SyntaxKind.CONST_DEF;
    static readonly cast = (syntax: SyntaxNodeRef): ConstDef | undefined => syntax.kind === ConstDef.KIND ? new ConstDef(syntax) : undefined;
    private constructor(readonly syntax: SyntaxNodeRef) { }
    get kind(): typeof ConstDef.KIND { return ConstDef.KIND; }

    name(): Name | undefined { return childOpt(this, Name); }
    typeParamList(): TypeParamList | undefined { return childOpt(this, TypeParamList); }
    whereClause(): WhereClause | undefined { return childOpt(this, WhereClause); }
    attrs(): Attr[] { return children(this, Attr); }
    typeRef(): TypeRef | undefined { return childOpt(this, TypeRef); }
    body(): Expr | undefined { return childOpt(this, Expr); }
}

export class StaticDef implements NameOwner, TypeParamsOwner, AttrsOwner {
    static readonly KIND = SyntaxKind.STATIC_DEF;
    static readonly cast = (syntax: SyntaxNodeRef): StaticDef | undefined => syntax.kind === StaticDef.KIND ? new StaticDef(syntax) : undefined;
    private constructor(readonly syntax: SyntaxNodeRef) { }
    get kind(): typeof StaticDef.KIND { return StaticDef.KIND; }

    name(): Name | undefined { return childOpt(this, Name); }
    typeParamList(): TypeParamList | undefined { return childOpt(this, TypeParamList); }
    whereClause(): WhereClause | undefined { return childOpt(this, WhereClause); }
    attrs(): Attr[] { return children(this, Attr); }
    typeRef(): TypeRef | undefined { return childOpt(this, TypeRef); }
    body(): Expr | undefined { return childOpt(this, Expr); }

    isMutable(): boolean {
        return tokenChild(this, SyntaxKind.MUT_KW) !== undefined;
    }
}

export class TypeDef implements NameOwner, TypeParamsOwner, AttrsOwner {
    static readonly KIND = SyntaxKind.TYPE_DEF;
    static readonly cast = (syntax: SyntaxNodeRef): TypeDef | undefined => syntax.kind === TypeDef.KIND ? new TypeDef(syntax) : undefined;
    private constructor(readonly syntax: SyntaxNodeRef) { }
    get kind(): typeof TypeDef.KIND { return TypeDef.KIND; }

    name(): Name | undefined { return childOpt(this, Name); }
    typeParamList(): TypeParamList | undefined { return childOpt(this, TypeParamList); }
    whereClause(): WhereClause | undefined { return childOpt(this, WhereClause); }
    attrs(): Attr[] { return children(this, Attr); }
    typeRef(): TypeRef | undefined { return childOpt(this, TypeRef); }
}

export class ExternCrateItem implements AttrsOwner {
    static readonly KIND = SyntaxKind.EXTERN_CRATE_ITEM;
    static readonly cast = (syntax: SyntaxNodeRef): ExternCrateItem | undefined => syntax.kind === ExternCrateItem.KIND ? new ExternCrateItem(syntax) : undefined;
    private constructor(readonly syntax: SyntaxNodeRef) { }
    get kind(): typeof ExternCrateItem.KIND { return ExternCrateItem.KIND; }

    attrs(): Attr[] { return children(this, Attr); }
    nameRef(): NameRef | undefined { return childOpt(this, NameRef); }
    alias(): Alias | undefined { return childOpt(this, Alias); }
}

export class MacroCall implements AttrsOwner {
    static readonly KIND = SyntaxKind.MACRO_CALL;
    static readonly cast = (syntax: SyntaxNodeRef): MacroCall | undefined => syntax.kind === MacroCall.KIND ? new MacroCall(syntax) : undefined;
    private constructor(readonly syntax: SyntaxNodeRef) { }
    get kind(): typeof MacroCall.KIND { return MacroCall.KIND; }

    attrs(): Attr[] { return children(this, Attr); }
    path(): Path | undefined { return childOpt(this, Path); }
    tokenTree(): TokenTree | undefined { return childOpt(this, TokenTree); }
}

// --- Fields and variants ---

export class NamedFieldDefList implements AstNode {
    static readonly KIND = SyntaxKind.NAMED_FIELD_DEF_LIST;
    static readonly cast = (syntax: SyntaxNodeRef): NamedFieldDefList | undefined => syntax.kind === NamedFieldDefList.KIND ? new NamedFieldDefList(syntax) : undefined;
    private constructor(readonly syntax: SyntaxNodeRef) { }
    get kind(): typeof NamedFieldDefList.KIND { return NamedFieldDefList.KIND; }

    fields(): NamedFieldDef[] { return children(this, NamedFieldDef); }
}

export class NamedFieldDef implements NameOwner, AttrsOwner {
    static readonly KIND = SyntaxKind.NAMED_FIELD_DEF;
    static readonly cast = (syntax: SyntaxNodeRef): NamedFieldDef | undefined => syntax.kind === NamedFieldDef.KIND ? new NamedFieldDef(syntax) : undefined;
    private constructor(readonly syntax: SyntaxNodeRef) { }
    get kind(): typeof NamedFieldDef.KIND { return NamedFieldDef.KIND; }

    name(): Name | undefined { return childOpt(this, Name); }
    attrs(): Attr[] { return children(this, Attr); }
    visibility(): Visibility | undefined { return childOpt(this, Visibility); }
    typeRef(): TypeRef | undefined { return childOpt(this, TypeRef); }
}

export class PosFieldList implements AstNode {
    static readonly KIND = SyntaxKind.POS_FIELD_LIST;
    static readonly cast = (syntax: SyntaxNodeRef): PosFieldList | undefined => syntax.kind === PosFieldList.KIND ? new PosFieldList(syntax) : undefined;
    private constructor(readonly syntax: SyntaxNodeRef) { }
    get kind(): typeof PosFieldList.KIND { return PosFieldList.KIND; }

    fields(): PosField[] { return children(this, PosField); }
}

export class PosField implements AttrsOwner {
    static readonly KIND = SyntaxKind.POS_FIELD;
    static readonly cast = (syntax: SyntaxNodeRef): PosField | undefined => syntax.kind === PosField.KIND ? new PosField(syntax) : undefined;
    private constructor(readonly syntax: SyntaxNodeRef) { }
    get kind(): typeof PosField.KIND { return PosField.KIND; }

    attrs(): Attr[] { return children(this, Attr); }
    visibility(): Visibility | undefined { return childOpt(this, Visibility); }
    typeRef(): TypeRef | undefined { return childOpt(this, TypeRef); }
}

export class EnumVariantList implements AstNode {
    static readonly KIND = SyntaxKind.ENUM_VARIANT_LIST;
    static readonly cast = (syntax: SyntaxNodeRef): EnumVariantList | undefined => syntax.kind === EnumVariantList.KIND ? new EnumVariantList(syntax) : undefined;
    private constructor(readonly syntax: SyntaxNodeRef) { }
    get kind(): typeof EnumVariantList.KIND { return EnumVariantList.KIND; }

    variants(): EnumVariant[] { return children(this, EnumVariant); }
}

export class EnumVariant implements NameOwner, AttrsOwner {
    static readonly KIND = SyntaxKind.ENUM_VARIANT;
    static readonly cast = (syntax: SyntaxNodeRef): EnumVariant | undefined => syntax.kind === EnumVariant.KIND ? new EnumVariant(syntax) : undefined;
    private constructor(readonly syntax: SyntaxNodeRef) { }
    get kind(): typeof EnumVariant.KIND { return EnumVariant.KIND; }

    name(): Name | undefined { return childOpt(this, Name); }
    attrs(): Attr[] { return children(this, Attr); }
    namedFieldDefList(): NamedFieldDefList | undefined { return childOpt(this, NamedFieldDefList); }
    posFieldList(): PosFieldList | undefined { return childOpt(this, PosFieldList); }
    /** The explicit discriminant, `A = 1`. */
    expr(): Expr | undefined { return childOpt(this, Expr); }
}

// --- Generics ---

export class TypeParamList implements AstNode {
    static readonly KIND = SyntaxKind.TYPE_PARAM_LIST;
    static readonly cast = (syntax: SyntaxNodeRef): TypeParamList | undefined => syntax.kind === TypeParamList.KIND ? new TypeParamList(syntax) : undefined;
    private constructor(readonly syntax: SyntaxNodeRef) { }
    get kind(): typeof TypeParamList.KIND { return TypeParamList.KIND; }

    typeParams(): TypeParam[] { return children(this, TypeParam); }
    lifetimeParams(): LifetimeParam[] { return children(this, LifetimeParam); }
}

export class TypeParam implements NameOwner {
    static readonly KIND = SyntaxKind.TYPE_PARAM;
    static readonly cast = (syntax: SyntaxNodeRef): TypeParam | undefined => syntax.kind === TypeParam.KIND ? new TypeParam(syntax) : undefined;
    private constructor(readonly syntax: SyntaxNodeRef) { }
    get kind(): typeof TypeParam.KIND { return TypeParam.KIND; }

    name(): Name | undefined { return childOpt(this, Name); }
    typeBoundList(): TypeBoundList | undefined { return childOpt(this, TypeBoundList); }
    /** The default, `T = u32`. */
    defaultType(): TypeRef | undefined { return childOpt(this, TypeRef); }
}

export class LifetimeParam implements AstNode {
    static readonly KIND = SyntaxKind.LIFETIME_PARAM;
    static readonly cast = (syntax: SyntaxNodeRef): LifetimeParam | undefined => syntax.kind === LifetimeParam.KIND ? new LifetimeParam(syntax) : undefined;
    private constructor(readonly syntax: SyntaxNodeRef) { }
    get kind(): typeof LifetimeParam.KIND { return LifetimeParam.KIND; }

    /** The declared lifetime, e.g. `'a`. */
    lifetime(): string | undefined {
        return tokenChild(this, SyntaxKind.LIFETIME)?.leafText();
    }
}

export class TypeBoundList implements AstNode {
    static readonly KIND = SyntaxKind.TYPE_BOUND_LIST;
    static readonly cast = (syntax: SyntaxNodeRef): TypeBoundList | undefined => syntax.kind === TypeBoundList.KIND ? new TypeBoundList(syntax) : undefined;
    private constructor(readonly syntax: SyntaxNodeRef) { }
    get kind(): typeof TypeBoundList.KIND { return TypeBoundList.KIND; }

    bounds(): TypeBound[] { return children(this, TypeBound); }
}

export class TypeBound implements AstNode {
    static readonly KIND = SyntaxKind.TYPE_BOUND;
    static readonly cast = (syntax: SyntaxNodeRef): TypeBound | undefined => syntax.kind === TypeBound.KIND ? new TypeBound(syntax) : undefined;
    private constructor(readonly syntax: SyntaxNodeRef) { }
    get kind(): typeof TypeBound.KIND { return TypeBound.KIND; }

    typeRef(): TypeRef | undefined { return childOpt(this, TypeRef); }
}

export class WhereClause implements AstNode {
    static readonly KIND = SyntaxKind.WHERE_CLAUSE;
    static readonly cast = (syntax: SyntaxNodeRef): WhereClause | undefined => syntax.kind === WhereClause.KIND ? new WhereClause(syntax) : undefined;
    private constructor(readonly syntax: SyntaxNodeRef) { }
    get kind(): typeof WhereClause.KIND { return WhereClause.KIND; }

    predicates(): WherePred[] { return children(this, WherePred); }
}

export class WherePred implements AstNode {
    static readonly KIND = SyntaxKind.WHERE_PRED;
    static readonly cast = (syntax: SyntaxNodeRef): WherePred | undefined => syntax.kind === WherePred.KIND ? new WherePred(syntax) : undefined;
    private constructor(readonly syntax: SyntaxNodeRef) { }
    get kind(): typeof WherePred.KIND { return WherePred.KIND; }

    typeRef(): TypeRef | undefined { return childOpt(this, TypeRef); }
    typeBoundList(): TypeBoundList | undefined { return childOpt(this, TypeBoundList); }
}

export class TypeArgList implements AstNode {
    static readonly KIND = SyntaxKind.TYPE_ARG_LIST;
    static readonly cast = (syntax: SyntaxNodeRef): TypeArgList | undefined => syntax.kind === TypeArgList.KIND ? new TypeArgList(syntax) : undefined;
    private constructor(readonly syntax: SyntaxNodeRef) { }
    get kind(): typeof TypeArgList.KIND { return TypeArgList.KIND; }

    typeArgs(): TypeArg[] { return children(this, TypeArg); }
    lifetimeArgs(): LifetimeArg[] { return children(this, LifetimeArg); }
}

export class TypeArg implements AstNode {
    static readonly KIND = SyntaxKind.TYPE_ARG;
    static readonly cast = (syntax: SyntaxNodeRef): TypeArg | undefined => syntax.kind === TypeArg.KIND ? new TypeArg(syntax) : undefined;
    private constructor(readonly syntax: SyntaxNodeRef) { }
    get kind(): typeof TypeArg.KIND { return TypeArg.KIND; }

    typeRef(): TypeRef | undefined { return childOpt(this, TypeRef); }
}

export class LifetimeArg implements AstNode {
    static readonly KIND = SyntaxKind.LIFETIME_ARG;
    static readonly cast = (syntax: SyntaxNodeRef): LifetimeArg | undefined => syntax.kind === LifetimeArg.KIND ? new LifetimeArg(syntax) : undefined;
    private constructor(readonly syntax: SyntaxNodeRef) { }
    get kind(): typeof LifetimeArg.KIND { return LifetimeArg.KIND; }
}

// --- Functions ---

export class ParamList implements AstNode {
    static readonly KIND = SyntaxKind.PARAM_LIST;
    static readonly cast = (syntax: SyntaxNodeRef): ParamList | undefined => syntax.kind === ParamList.KIND ? new ParamList(syntax) : undefined;
    private constructor(readonly syntax: SyntaxNodeRef) { }
    get kind(): typeof ParamList.KIND { return ParamList.KIND; }

    params(): Param[] { return children(this, Param); }
    selfParam(): SelfParam | undefined { return childOpt(this, SelfParam); }
}

export class Param implements AstNode {
    static readonly KIND = SyntaxKind.PARAM;
    static readonly cast = (syntax: SyntaxNodeRef): Param | undefined => syntax.kind === Param.KIND ? new Param(syntax) : undefined;
    private constructor(readonly syntax: SyntaxNodeRef) { }
    get kind(): typeof Param.KIND { return Param.KIND; }

    pat(): Pat | undefined { return childOpt(this, Pat); }
    typeRef(): TypeRef | undefined { return childOpt(this, TypeRef); }
}

export class SelfParam implements AstNode {
    static readonly KIND = SyntaxKind.SELF_PARAM;
    static readonly cast = (syntax: SyntaxNodeRef): SelfParam | undefined => syntax.kind === SelfParam.KIND ? new SelfParam(syntax) : undefined;
    private constructor(readonly syntax: SyntaxNodeRef) { }
    get kind(): typeof SelfParam.KIND { return SelfParam.KIND; }

    /** `&self` or `&mut self`. */
    isRef(): boolean {
        return tokenChild(this, SyntaxKind.AMP) !== undefined;
    }

    isMutable(): boolean {
        return tokenChild(this, SyntaxKind.MUT_KW) !== undefined;
    }
}

export class RetType implements AstNode {
    static readonly KIND = SyntaxKind.RET_TYPE;
    static readonly cast = (syntax: SyntaxNodeRef): RetType | undefined => syntax.kind === RetType.KIND ? new RetType(syntax) : undefined;
    private constructor(readonly syntax: SyntaxNodeRef) { }
    get kind(): typeof RetType.KIND { return RetType.KIND; }

    typeRef(): TypeRef | undefined { return childOpt(this, TypeRef); }
}

// --- Types ---

export class ParenType implements AstNode {
    static readonly KIND = SyntaxKind.PAREN_TYPE;
    static readonly cast = (syntax: SyntaxNodeRef): ParenType | undefined => syntax.kind === ParenType.KIND ? new ParenType(syntax) : undefined;
    private constructor(readonly syntax: SyntaxNodeRef) { }
    get kind(): typeof ParenType.KIND { return ParenType.KIND; }

    typeRef(): TypeRef | undefined { return childOpt(this, TypeRef); }
}

export class TupleType implements AstNode {
    static readonly KIND = SyntaxKind.TUPLE_TYPE;
    static readonly cast = (syntax: SyntaxNodeRef): TupleType | undefined => syntax.kind === TupleType.KIND ? new TupleType(syntax) : undefined;
    private constructor(readonly syntax: SyntaxNodeRef) { }
    get kind(): typeof TupleType.KIND { return TupleType.KIND; }

    fields(): TypeRef[] { return children(this, TypeRef); }
}

export class NeverType implements AstNode {
    static readonly KIND = SyntaxKind.NEVER_TYPE;
    static readonly cast = (syntax: SyntaxNodeRef): NeverType | undefined => syntax.kind === NeverType.KIND ? new NeverType(syntax) : undefined;
    private constructor(readonly syntax: SyntaxNodeRef) { }
    get kind(): typeof NeverType.KIND { return NeverType.KIND; }
}

export class PathType implements AstNode {
    static readonly KIND = SyntaxKind.PATH_TYPE;
    static readonly cast = (syntax: SyntaxNodeRef): PathType | undefined => syntax.kind === PathType.KIND ? new PathType(syntax) : undefined;
    private constructor(readonly syntax: SyntaxNodeRef) { }
    get kind(): typeof PathType.KIND { return PathType.KIND; }

    path(): Path | undefined { return childOpt(this, Path); }
}

export class PointerType implements AstNode {
    static readonly KIND = SyntaxKind.POINTER_TYPE;
    static readonly cast = (syntax: SyntaxNodeRef): PointerType | undefined => syntax.kind === PointerType.KIND ? new PointerType(syntax) : undefined;
    private constructor(readonly syntax: SyntaxNodeRef) { }
    get kind(): typeof PointerType.KIND { return PointerType.KIND; }

    typeRef(): TypeRef | undefined { return childOpt(this, TypeRef); }
}

export class ArrayType implements AstNode {
    static readonly KIND = SyntaxKind.ARRAY_TYPE;
    static readonly cast = (syntax: SyntaxNodeRef): ArrayType | undefined => syntax.kind === ArrayType.KIND ? new ArrayType(syntax) : undefined;
    private constructor(readonly syntax: SyntaxNodeRef) { }
    get kind(): typeof ArrayType.KIND { return ArrayType.KIND; }

    typeRef(): TypeRef | undefined { return childOpt(this, TypeRef); }
    /** The length expression after `;`. */
    expr(): Expr | undefined { return childOpt(this, Expr); }
}

export class SliceType implements AstNode {
    static readonly KIND = SyntaxKind.SLICE_TYPE;
    static readonly cast = (syntax: SyntaxNodeRef): SliceType | undefined => syntax.kind === SliceType.KIND ? new SliceType(syntax) : undefined;
    private constructor(readonly syntax: SyntaxNodeRef) { }
    get kind(): typeof SliceType.KIND { return SliceType.KIND; }

    typeRef(): TypeRef | undefined { return childOpt(this, TypeRef); }
}

export class ReferenceType implements AstNode {
    static readonly KIND = SyntaxKind.REFERENCE_TYPE;
    static readonly cast = (syntax: SyntaxNodeRef): ReferenceType | undefined => syntax.kind === ReferenceType.KIND ? new ReferenceType(syntax) : undefined;
    private constructor(readonly syntax: SyntaxNodeRef) { }
    get kind(): typeof ReferenceType.KIND { return ReferenceType.KIND; }

    typeRef(): TypeRef | undefined { return childOpt(this, TypeRef); }

    isMutable(): boolean {
        return tokenChild(this, SyntaxKind.MUT_KW) !== undefined;
    }
}

export class PlaceholderType implements AstNode {
    static readonly KIND = SyntaxKind.PLACEHOLDER_TYPE;
    static readonly cast = (syntax: SyntaxNodeRef): PlaceholderType | undefined => syntax.kind === PlaceholderType.KIND ? new PlaceholderType(syntax) : undefined;
    private constructor(readonly syntax: SyntaxNodeRef) { }
    get kind(): typeof PlaceholderType.KIND { return PlaceholderType.KIND; }
}

export class FnPointerType implements AstNode {
    static readonly KIND = SyntaxKind.FN_POINTER_TYPE;
    static readonly cast = (syntax: SyntaxNodeRef): FnPointerType | undefined => syntax.kind === FnPointerType.KIND ? new FnPointerType(syntax) : undefined;
    private constructor(readonly syntax: SyntaxNodeRef) { }
    get kind(): typeof FnPointerType.KIND { return FnPointerType.KIND; }

    paramList(): ParamList | undefined { return childOpt(this, ParamList); }
    retType(): RetType | undefined { return childOpt(this, RetType); }
}

export class ForType implements AstNode {
    static readonly KIND = SyntaxKind.FOR_TYPE;
    static readonly cast = (syntax: SyntaxNodeRef): ForType | undefined => syntax.kind === ForType.KIND ? new ForType(syntax) : undefined;
    private constructor(readonly syntax: SyntaxNodeRef) { }
    get kind(): typeof ForType.KIND { return ForType.KIND; }

    typeParamList(): TypeParamList | undefined { return childOpt(this, TypeParamList); }
    typeRef(): TypeRef | undefined { return childOpt(this, TypeRef); }
}

export class ImplTraitType implements AstNode {
    static readonly KIND = SyntaxKind.IMPL_TRAIT_TYPE;
    static readonly cast = (syntax: SyntaxNodeRef): ImplTraitType | undefined => syntax.kind === ImplTraitType.KIND ? new ImplTraitType(syntax) : undefined;
    private constructor(readonly syntax: SyntaxNodeRef) { }
    get kind(): typeof ImplTraitType.KIND { return ImplTraitType.KIND; }

    typeBoundList(): TypeBoundList | undefined { return childOpt(this, TypeBoundList); }
}

export class DynTraitType implements AstNode {
    static readonly KIND = SyntaxKind.DYN_TRAIT_TYPE;
    static readonly cast = (syntax: SyntaxNodeRef): DynTraitType | undefined => syntax.kind === DynTraitType.KIND ? new DynTraitType(syntax) : undefined;
    private constructor(readonly syntax: SyntaxNodeRef) { }
    get kind(): typeof DynTraitType.KIND { return DynTraitType.KIND; }

    typeBoundList(): TypeBoundList | undefined { return childOpt(this, TypeBoundList); }
}

// --- Patterns ---

export class BindPat implements NameOwner {
    static readonly KIND = SyntaxKind.BIND_PAT;
    static readonly cast = (syntax: SyntaxNodeRef): BindPat | undefined => syntax.kind === BindPat.KIND ? new BindPat(syntax) : undefined;
    private constructor(readonly syntax: SyntaxNodeRef) { }
    get kind(): typeof BindPat.KIND { return BindPat.KIND; }

    name(): Name | undefined { return childOpt(this, Name); }
    /** The subpattern of `name @ pat`. */
    pat(): Pat | undefined { return childOpt(this, Pat); }

    isMutable(): boolean {
        return tokenChild(this, SyntaxKind.MUT_KW) !== undefined;
    }
}

export class PlaceholderPat implements AstNode {
    static readonly KIND = SyntaxKind.PLACEHOLDER_PAT;
    static readonly cast = (syntax: SyntaxNodeRef): PlaceholderPat | undefined => syntax.kind === PlaceholderPat.KIND ? new PlaceholderPat(syntax) : undefined;
    private constructor(readonly syntax: SyntaxNodeRef) { }
    get kind(): typeof PlaceholderPat.KIND { return PlaceholderPat.KIND; }
}

export class RefPat implements AstNode {
    static readonly KIND = SyntaxKind.REF_PAT;
    static readonly cast = (syntax: SyntaxNodeRef): RefPat | undefined => syntax.kind === RefPat.KIND ? new RefPat(syntax) : undefined;
    private constructor(readonly syntax: SyntaxNodeRef) { }
    get kind(): typeof RefPat.KIND { return RefPat.KIND; }

    pat(): Pat | undefined { return childOpt(this, Pat); }
}

export class TuplePat implements AstNode {
    static readonly KIND = SyntaxKind.TUPLE_PAT;
    static readonly cast = (syntax: SyntaxNodeRef): TuplePat | undefined => syntax.kind === TuplePat.KIND ? new TuplePat(syntax) : undefined;
    private constructor(readonly syntax: SyntaxNodeRef) { }
    get kind(): typeof TuplePat.KIND { return TuplePat.KIND; }

    args(): Pat[] { return children(this, Pat); }
}

export class PathPat implements AstNode {
    static readonly KIND = SyntaxKind.PATH_PAT;
    static readonly cast = (syntax: SyntaxNodeRef): PathPat | undefined => syntax.kind === PathPat.KIND ? new PathPat(syntax) : undefined;
    private constructor(readonly syntax: SyntaxNodeRef) { }
    get kind(): typeof PathPat.KIND { return PathPat.KIND; }

    path(): Path | undefined { return childOpt(this, Path); }
}

export class TupleStructPat implements AstNode {
    static readonly KIND = SyntaxKind.TUPLE_STRUCT_PAT;
    static readonly cast = (syntax: SyntaxNodeRef): TupleStructPat | undefined => syntax.kind === TupleStructPat.KIND ? new TupleStructPat(syntax) : undefined;
    private constructor(readonly syntax: SyntaxNodeRef) { }
    get kind(): typeof TupleStructPat.KIND { return TupleStructPat.KIND; }

    path(): Path | undefined { return childOpt(this, Path); }
    args(): Pat[] { return children(this, Pat); }
}

export class StructPat implements AstNode {
    static readonly KIND = SyntaxKind.STRUCT_PAT;
    static readonly cast = (syntax: SyntaxNodeRef): StructPat | undefined => syntax.kind === StructPat.KIND ? new StructPat(syntax) : undefined;
    private constructor(readonly syntax: SyntaxNodeRef) { }
    get kind(): typeof StructPat.KIND { return StructPat.KIND; }

    path(): Path | undefined { return childOpt(this, Path); }
    fieldPatList(): FieldPatList | undefined { return childOpt(this, FieldPatList); }
}

export class FieldPatList implements AstNode {
    static readonly KIND = SyntaxKind.FIELD_PAT_LIST;
    static readonly cast = (syntax: SyntaxNodeRef): FieldPatList | undefined => syntax.kind === FieldPatList.KIND ? new FieldPatList(syntax) : undefined;
    private constructor(readonly syntax: SyntaxNodeRef) { }
    get kind(): typeof FieldPatList.KIND { return FieldPatList.KIND; }

    pats(): Pat[] { return children(this, Pat); }
}

export class LiteralPat implements AstNode {
    static readonly KIND = SyntaxKind.LITERAL_PAT;
    static readonly cast = (syntax: SyntaxNodeRef): LiteralPat | undefined => syntax.kind === LiteralPat.KIND ? new LiteralPat(syntax) : undefined;
    private constructor(readonly syntax: SyntaxNodeRef) { }
    get kind(): typeof LiteralPat.KIND { return LiteralPat.KIND; }

    literal(): Literal | undefined { return childOpt(this, Literal); }
}

// --- Statements ---

export class Block implements AstNode {
    static readonly KIND = SyntaxKind.BLOCK;
    static readonly cast = (syntax: SyntaxNodeRef): Block | undefined => syntax.kind === Block.KIND ? new Block(syntax) : undefined;
    private constructor(readonly syntax: SyntaxNodeRef) { }
    get kind(): typeof Block.KIND { return Block.KIND; }

    statements(): Stmt[] { return children(this, Stmt); }
    /** The trailing expression that gives the block its value. */
    expr(): Expr | undefined { return childOpt(this, Expr); }
    /** Items declared inside the block. */
    items(): ModuleItem[] { return children(this, ModuleItem); }
}

export class LetStmt implements AstNode {
    static readonly KIND = SyntaxKind.LET_STMT;
    static readonly cast = (syntax: SyntaxNodeRef): LetStmt | undefined => syntax.kind === LetStmt.KIND ? new LetStmt(syntax) : undefined;
    private constructor(readonly syntax: SyntaxNodeRef) { }
    get kind(): typeof LetStmt.KIND { return LetStmt.KIND; }

    pat(): Pat | undefined { return childOpt(this, Pat); }
    typeRef(): TypeRef | undefined { return childOpt(this, TypeRef); }
    initializer(): Expr | undefined { return childOpt(this, Expr); }
}

export class ExprStmt implements AstNode {
    static readonly KIND = SyntaxKind.EXPR_STMT;
    static readonly cast = (syntax: SyntaxNodeRef): ExprStmt | undefined => syntax.kind === ExprStmt.KIND ? new ExprStmt(syntax) : undefined;
    private constructor(readonly syntax: SyntaxNodeRef) { }
    get kind(): typeof ExprStmt.KIND { return ExprStmt.KIND; }

    expr(): Expr | undefined { return childOpt(this, Expr); }
}

// --- Expressions ---

export class TupleExpr implements AstNode {
    static readonly KIND = SyntaxKind.TUPLE_EXPR;
    static readonly cast = (syntax: SyntaxNodeRef): TupleExpr | undefined => syntax.kind === TupleExpr.KIND ? new TupleExpr(syntax) : undefined;
    private constructor(readonly syntax: SyntaxNodeRef) { }
    get kind(): typeof TupleExpr.KIND { return TupleExpr.KIND; }

    exprs(): Expr[] { return children(this, Expr); }
}

export class ArrayExpr implements AstNode {
    static readonly KIND = SyntaxKind.ARRAY_EXPR;
    static readonly cast = (syntax: SyntaxNodeRef): ArrayExpr | undefined => syntax.kind === ArrayExpr.KIND ? new ArrayExpr(syntax) : undefined;
    private constructor(readonly syntax: SyntaxNodeRef) { }
    get kind(): typeof ArrayExpr.KIND { return ArrayExpr.KIND; }

    exprs(): Expr[] { return children(this, Expr); }
}

export class ParenExpr implements AstNode {
    static readonly KIND = SyntaxKind.PAREN_EXPR;
    static readonly cast = (syntax: SyntaxNodeRef): ParenExpr | undefined => syntax.kind === ParenExpr.KIND ? new ParenExpr(syntax) : undefined;
    private constructor(readonly syntax: SyntaxNodeRef) { }
    get kind(): typeof ParenExpr.KIND { return ParenExpr.KIND; }

    expr(): Expr | undefined { return childOpt(this, Expr); }
}

export class PathExpr implements AstNode {
    static readonly KIND = SyntaxKind.PATH_EXPR;
    static readonly cast = (syntax: SyntaxNodeRef): PathExpr | undefined => syntax.kind === PathExpr.KIND ? new PathExpr(syntax) : undefined;
    private constructor(readonly syntax: SyntaxNodeRef) { }
    get kind(): typeof PathExpr.KIND { return PathExpr.KIND; }

    path(): Path | undefined { return childOpt(this, Path); }
}

export class LambdaExpr implements AstNode {
    static readonly KIND = SyntaxKind.LAMBDA_EXPR;
    static readonly cast = (syntax: SyntaxNodeRef): LambdaExpr | undefined => syntax.kind === LambdaExpr.KIND ? new LambdaExpr(syntax) : undefined;
    private constructor(readonly syntax: SyntaxNodeRef) { }
    get kind(): typeof LambdaExpr.KIND { return LambdaExpr.KIND; }

    paramList(): ParamList | undefined { return childOpt(this, ParamList); }
    retType(): RetType | undefined { return childOpt(this, RetType); }
    body(): Expr | undefined { return childOpt(this, Expr); }
}

export class IfExpr implements AstNode {
    static readonly KIND = SyntaxKind.IF_EXPR;
    static readonly cast = (syntax: SyntaxNodeRef): IfExpr | undefined => syntax.kind === IfExpr.KIND ? new IfExpr(syntax) : undefined;
    private constructor(readonly syntax: SyntaxNodeRef) { }
    get kind(): typeof IfExpr.KIND { return IfExpr.KIND; }

    condition(): Condition | undefined { return childOpt(this, Condition); }
    /** The then block and, for a plain `else { }`, the else block. */
    blocks(): Block[] { return children(this, Block); }
    /** The nested `if` of an `else if`. */
    elseIf(): IfExpr | undefined { return childOpt(this, IfExpr); }
}

export class Condition implements AstNode {
    static readonly KIND = SyntaxKind.CONDITION;
    static readonly cast = (syntax: SyntaxNodeRef): Condition | undefined => syntax.kind === Condition.KIND ? new Condition(syntax) : undefined;
    private constructor(readonly syntax: SyntaxNodeRef) { }
    get kind(): typeof Condition.KIND { return Condition.KIND; }

    /** The pattern of `if let` and `while let`. */
    pat(): Pat | undefined { return childOpt(this, Pat); }
    expr(): Expr | undefined { return childOpt(this, Expr); }
}

export class WhileExpr implements AstNode {
    static readonly KIND = SyntaxKind.WHILE_EXPR;
    static readonly cast = (syntax: SyntaxNodeRef): WhileExpr | undefined => syntax.kind === WhileExpr.KIND ? new WhileExpr(syntax) : undefined;
    private constructor(readonly syntax: SyntaxNodeRef) { }
    get kind(): typeof WhileExpr.KIND { return WhileExpr.KIND; }

    label(): Label | undefined { return childOpt(this, Label); }
    condition(): Condition | undefined { return childOpt(this, Condition); }
    loopBody(): Block | undefined { return childOpt(this, Block); }
}

export class LoopExpr implements AstNode {
    static readonly KIND = SyntaxKind.LOOP_EXPR;
    static readonly cast = (syntax: SyntaxNodeRef): LoopExpr | undefined => syntax.kind === LoopExpr.KIND ? new LoopExpr(syntax) : undefined;
    private constructor(readonly syntax: SyntaxNodeRef) { }
    get kind(): typeof LoopExpr.KIND { return LoopExpr.KIND; }

    label(): Label | undefined { return childOpt(this, Label); }
    loopBody(): Block | undefined { return childOpt(this, Block); }
}

export class ForExpr implements AstNode {
    static readonly KIND = SyntaxKind.FOR_EXPR;
    static readonly cast = (syntax: SyntaxNodeRef): ForExpr | undefined => syntax.kind === ForExpr.KIND ? new ForExpr(syntax) : undefined;
    private constructor(readonly syntax: SyntaxNodeRef) { }
    get kind(): typeof ForExpr.KIND { return ForExpr.KIND; }

    label(): Label | undefined { return childOpt(this, Label); }
    pat(): Pat | undefined { return childOpt(this, Pat); }
    iterable(): Expr | undefined { return childOpt(this, Expr); }
    loopBody(): Block | undefined { return childOpt(this, Block); }
}

export class Label implements AstNode {
    static readonly KIND = SyntaxKind.LABEL;
    static readonly cast = (syntax: SyntaxNodeRef): Label | undefined => syntax.kind === Label.KIND ? new Label(syntax) : undefined;
    private constructor(readonly syntax: SyntaxNodeRef) { }
    get kind(): typeof Label.KIND { return Label.KIND; }

    lifetime(): string | undefined {
        return tokenChild(this, SyntaxKind.LIFETIME)?.leafText();
    }
}

export class ContinueExpr implements AstNode {
    static readonly KIND = SyntaxKind.CONTINUE_EXPR;
    static readonly cast = (syntax: SyntaxNodeRef): ContinueExpr | undefined => syntax.kind === ContinueExpr.KIND ? new ContinueExpr(syntax) : undefined;
    private constructor(readonly syntax: SyntaxNodeRef) { }
    get kind(): typeof ContinueExpr.KIND { return ContinueExpr.KIND; }
}

export class BreakExpr implements AstNode {
    static readonly KIND = SyntaxKind.BREAK_EXPR;
    static readonly cast = (syntax: SyntaxNodeRef): BreakExpr | undefined => syntax.kind === BreakExpr.KIND ? new BreakExpr(syntax) : undefined;
    private constructor(readonly syntax: SyntaxNodeRef) { }
    get kind(): typeof BreakExpr.KIND { return BreakExpr.KIND; }

    expr(): Expr | undefined { return childOpt(this, Expr); }
}

export class BlockExpr implements AstNode {
    static readonly KIND = SyntaxKind.BLOCK_EXPR;
    static readonly cast = (syntax: SyntaxNodeRef): BlockExpr | undefined => syntax.kind === BlockExpr.KIND ? new BlockExpr(syntax) : undefined;
    private constructor(readonly syntax: SyntaxNodeRef) { }
    get kind(): typeof BlockExpr.KIND { return BlockExpr.KIND; }

    block(): Block | undefined { return childOpt(this, Block); }
}

export class ReturnExpr implements AstNode {
    static readonly KIND = SyntaxKind.RETURN_EXPR;
    static readonly cast = (syntax: SyntaxNodeRef): ReturnExpr | undefined => syntax.kind === ReturnExpr.KIND ? new ReturnExpr(syntax) : undefined;
    private constructor(readonly syntax: SyntaxNodeRef) { }
    get kind(): typeof ReturnExpr.KIND { return ReturnExpr.KIND; }

    expr(): Expr | undefined { return childOpt(this, Expr); }
}

export class MatchExpr implements AstNode {
    static readonly KIND = SyntaxKind.MATCH_EXPR;
    static readonly cast = (syntax: SyntaxNodeRef): MatchExpr | undefined => syntax.kind === MatchExpr.KIND ? new MatchExpr(syntax) : undefined;
    private constructor(readonly syntax: SyntaxNodeRef) { }
    get kind(): typeof MatchExpr.KIND { return MatchExpr.KIND; }

    /** The scrutinee. */
    expr(): Expr | undefined { return childOpt(this, Expr); }
    matchArmList(): MatchArmList | undefined { return childOpt(this, MatchArmList); }
}

export class MatchArmList implements AstNode {
    static readonly KIND = SyntaxKind.MATCH_ARM_LIST;
    static readonly cast = (syntax: SyntaxNodeRef): MatchArmList | undefined => syntax.kind === MatchArmList.KIND ? new MatchArmList(syntax) : undefined;
    private constructor(readonly syntax: SyntaxNodeRef) { }
    get kind(): typeof MatchArmList.KIND { return MatchArmList.KIND; }

    arms(): MatchArm[] { return children(this, MatchArm); }
}

export class MatchArm implements AstNode {
    static readonly KIND = SyntaxKind.MATCH_ARM;
    static readonly cast = (syntax: SyntaxNodeRef): MatchArm | undefined => syntax.kind === MatchArm.KIND ? new MatchArm(syntax) : undefined;
    private constructor(readonly syntax: SyntaxNodeRef) { }
    get kind(): typeof MatchArm.KIND { return MatchArm.KIND; }

    /** The alternatives of `A | B => ...`. */
    pats(): Pat[] { return children(this, Pat); }
    guard(): MatchGuard | undefined { return childOpt(this, MatchGuard); }
    expr(): Expr | undefined { return childOpt(this, Expr); }
}

export class MatchGuard implements AstNode {
    static readonly KIND = SyntaxKind.MATCH_GUARD;
    static readonly cast = (syntax: SyntaxNodeRef): MatchGuard | undefined => syntax.kind === MatchGuard.KIND ? new MatchGuard(syntax) : undefined;
    private constructor(readonly syntax: SyntaxNodeRef) { }
    get kind(): typeof MatchGuard.KIND { return MatchGuard.KIND; }

    expr(): Expr | undefined { return childOpt(this, Expr); }
}

export class StructLit implements AstNode {
    static readonly KIND = SyntaxKind.STRUCT_LIT;
    static readonly cast = (syntax: SyntaxNodeRef): StructLit | undefined => syntax.kind === StructLit.KIND ? new StructLit(syntax) : undefined;
    private constructor(readonly syntax: SyntaxNodeRef) { }
    get kind(): typeof StructLit.KIND { return StructLit.KIND; }

    path(): Path | undefined { return childOpt(this, Path); }
    namedFieldList(): NamedFieldList | undefined { return childOpt(this, NamedFieldList); }
}

export class NamedFieldList implements AstNode {
    static readonly KIND = SyntaxKind.NAMED_FIELD_LIST;
    static readonly cast = (syntax: SyntaxNodeRef): NamedFieldList | undefined => syntax.kind === NamedFieldList.KIND ? new NamedFieldList(syntax) : undefined;
    private constructor(readonly syntax: SyntaxNodeRef) { }
    get kind(): typeof NamedFieldList.KIND { return NamedFieldList.KIND; }

    fields(): NamedField[] { return children(this, NamedField); }
    /** The base of a functional update, `..base`. */
    spread(): Expr | undefined { return childOpt(this, Expr); }
}

export class NamedField implements AstNode {
    static readonly KIND = SyntaxKind.NAMED_FIELD;
    static readonly cast = (syntax: SyntaxNodeRef): NamedField | undefined => syntax.kind === NamedField.KIND ? new NamedField(syntax) : undefined;
    private constructor(readonly syntax: SyntaxNodeRef) { }
    get kind(): typeof NamedField.KIND { return NamedField.KIND; }

    nameRef(): NameRef | undefined { return childOpt(this, NameRef); }
    /** Absent for the shorthand form `S { x }`. */
    expr(): Expr | undefined { return childOpt(this, Expr); }
}

export class CallExpr implements AstNode {
    static readonly KIND = SyntaxKind.CALL_EXPR;
    static readonly cast = (syntax: SyntaxNodeRef): CallExpr | undefined => syntax.kind === CallExpr.KIND ? new CallExpr(syntax) : undefined;
    private constructor(readonly syntax: SyntaxNodeRef) { }
    get kind(): typeof CallExpr.KIND { return CallExpr.KIND; }

    /** The callee. */
    expr(): Expr | undefined { return childOpt(this, Expr); }
    argList(): ArgList | undefined { return childOpt(this, ArgList); }
}

export class ArgList implements AstNode {
    static readonly KIND = SyntaxKind.ARG_LIST;
    static readonly cast = (syntax: SyntaxNodeRef): ArgList | undefined => syntax.kind === ArgList.KIND ? new ArgList(syntax) : undefined;
    private constructor(readonly syntax: SyntaxNodeRef) { }
    get kind(): typeof ArgList.KIND { return ArgList.KIND; }

    args(): Expr[] { return children(this, Expr); }
}

export class IndexExpr implements AstNode {
    static readonly KIND = SyntaxKind.INDEX_EXPR;
    static readonly cast = (syntax: SyntaxNodeRef): IndexExpr | undefined => syntax.kind === IndexExpr.KIND ? new IndexExpr(syntax) : undefined;
    private constructor(readonly syntax: SyntaxNodeRef) { }
    get kind(): typeof IndexExpr.KIND { return IndexExpr.KIND; }

    base(): Expr | undefined { return children(this, Expr)[0]; }
    index(): Expr | undefined { return children(this, Expr)[1]; }
}

export class MethodCallExpr implements AstNode {
    static readonly KIND = SyntaxKind.METHOD_CALL_EXPR;
    static readonly cast = (syntax: SyntaxNodeRef): MethodCallExpr | undefined => syntax.kind === MethodCallExpr.KIND ? new MethodCallExpr(syntax) : undefined;
    private constructor(readonly syntax: SyntaxNodeRef) { }
    get kind(): typeof MethodCallExpr.KIND { return MethodCallExpr.KIND; }

    /** The receiver. */
    expr(): Expr | undefined { return childOpt(this, Expr); }
    nameRef(): NameRef | undefined { return childOpt(this, NameRef); }
    typeArgList(): TypeArgList | undefined { return childOpt(this, TypeArgList); }
    argList(): ArgList | undefined { return childOpt(this, ArgList); }
}

export class FieldExpr implements AstNode {
    static readonly KIND = SyntaxKind.FIELD_EXPR;
    static readonly cast = (syntax: SyntaxNodeRef): FieldExpr | undefined => syntax.kind === FieldExpr.KIND ? new FieldExpr(syntax) : undefined;
    private constructor(readonly syntax: SyntaxNodeRef) { }
    get kind(): typeof FieldExpr.KIND { return FieldExpr.KIND; }

    expr(): Expr | undefined { return childOpt(this, Expr); }
    /** Absent for tuple fields such as `.0`. */
    nameRef(): NameRef | undefined { return childOpt(this, NameRef); }
}

export class TryExpr implements AstNode {
    static readonly KIND = SyntaxKind.TRY_EXPR;
    static readonly cast = (syntax: SyntaxNodeRef): TryExpr | undefined => syntax.kind === TryExpr.KIND ? new TryExpr(syntax) : undefined;
    private constructor(readonly syntax: SyntaxNodeRef) { }
    get kind(): typeof TryExpr.KIND { return TryExpr.KIND; }

    expr(): Expr | undefined { return childOpt(this, Expr); }
}

export class CastExpr implements AstNode {
    static readonly KIND = SyntaxKind.CAST_EXPR;
    static readonly cast = (syntax: SyntaxNodeRef): CastExpr | undefined => syntax.kind === CastExpr.KIND ? new CastExpr(syntax) : undefined;
    private constructor(readonly syntax: SyntaxNodeRef) { }
    get kind(): typeof CastExpr.KIND { return CastExpr.KIND; }

    expr(): Expr | undefined { return childOpt(this, Expr); }
    typeRef(): TypeRef | undefined { return childOpt(this, TypeRef); }
}

export class RefExpr implements AstNode {
    static readonly KIND = SyntaxKind.REF_EXPR;
    static readonly cast = (syntax: SyntaxNodeRef): RefExpr | undefined => syntax.kind === RefExpr.KIND ? new RefExpr(syntax) : undefined;
    private constructor(readonly syntax: SyntaxNodeRef) { }
    get kind(): typeof RefExpr.KIND { return RefExpr.KIND; }

    expr(): Expr | undefined { return childOpt(this, Expr); }

    isMutable(): boolean {
        return tokenChild(this, SyntaxKind.MUT_KW) !== undefined;
    }
}

export class PrefixExpr implements AstNode {
    static readonly KIND = SyntaxKind.PREFIX_EXPR;
    static readonly cast = (syntax: SyntaxNodeRef): PrefixExpr | undefined => syntax.kind === PrefixExpr.KIND ? new PrefixExpr(syntax) : undefined;
    private constructor(readonly syntax: SyntaxNodeRef) { }
    get kind(): typeof PrefixExpr.KIND { return PrefixExpr.KIND; }

    expr(): Expr | undefined { return childOpt(this, Expr); }

    /** `STAR`, `EXCL` or `MINUS`. */
    opKind(): SyntaxKind | undefined {
        return this.syntax.firstChild()?.kind;
    }
}

export class RangeExpr implements AstNode {
    static readonly KIND = SyntaxKind.RANGE_EXPR;
    static readonly cast = (syntax: SyntaxNodeRef): RangeExpr | undefined => syntax.kind === RangeExpr.KIND ? new RangeExpr(syntax) : undefined;
    private constructor(readonly syntax: SyntaxNodeRef) { }
    get kind(): typeof RangeExpr.KIND { return RangeExpr.KIND; }

    bounds(): Expr[] { return children(this, Expr); }
}

export class BinExpr implements AstNode {
    static readonly KIND = SyntaxKind.BIN_EXPR;
    static readonly cast = (syntax: SyntaxNodeRef): BinExpr | undefined => syntax.kind === BinExpr.KIND ? new BinExpr(syntax) : undefined;
    private constructor(readonly syntax: SyntaxNodeRef) { }
    get kind(): typeof BinExpr.KIND { return BinExpr.KIND; }

    lhs(): Expr | undefined { return children(this, Expr)[0]; }
    rhs(): Expr | undefined { return children(this, Expr)[1]; }

    /** The operator token kind, e.g. `PLUS` or `AMPAMP`. */
    opKind(): SyntaxKind | undefined {
        return this.syntax.children().find(child => child.isLeaf && !isTrivia(child.kind))?.kind;
    }
}

export class Literal implements AstNode {
    static readonly KIND = SyntaxKind.LITERAL;
    static readonly cast = (syntax: SyntaxNodeRef): Literal | undefined => syntax.kind === Literal.KIND ? new Literal(syntax) : undefined;
    private constructor(readonly syntax: SyntaxNodeRef) { }
    get kind(): typeof Literal.KIND { return Literal.KIND; }

    /** The literal token itself. */
    token(): SyntaxNodeRef | undefined {
        return this.syntax.firstChild();
    }
}

// --- Names and paths ---

export class Name implements AstNode {
    static readonly KIND = SyntaxKind.NAME;
    static readonly cast = (syntax: SyntaxNodeRef): Name | undefined => syntax.kind === Name.KIND ? new Name(syntax) : undefined;
    private constructor(readonly syntax: SyntaxNodeRef) { }
    get kind(): typeof Name.KIND { return Name.KIND; }

    text(): string {
        return this.syntax.text();
    }
}

export class NameRef implements AstNode {
    static readonly KIND = SyntaxKind.NAME_REF;
    static readonly cast = (syntax: SyntaxNodeRef): NameRef | undefined => syntax.kind === NameRef.KIND ? new NameRef(syntax) : undefined;
    private constructor(readonly syntax: SyntaxNodeRef) { }
    get kind(): typeof NameRef.KIND { return NameRef.KIND; }

    text(): string {
        return this.syntax.text();
    }
}

export class Path implements AstNode {
    static readonly KIND = SyntaxKind.PATH;
    static readonly cast = (syntax: SyntaxNodeRef): Path | undefined => syntax.kind === Path.KIND ? new Path(syntax) : undefined;
    private constructor(readonly syntax: SyntaxNodeRef) { }
    get kind(): typeof Path.KIND { return Path.KIND; }

    /** The last segment. */
    segment(): PathSegment | undefined { return childOpt(this, PathSegment); }
    /** Everything before the last segment: `a::b` in `a::b::c`. */
    qualifier(): Path | undefined { return childOpt(this, Path); }
}

export class PathSegment implements AstNode {
    static readonly KIND = SyntaxKind.PATH_SEGMENT;
    static readonly cast = (syntax: SyntaxNodeRef): PathSegment | undefined => syntax.kind === PathSegment.KIND ? new PathSegment(syntax) : undefined;
    private constructor(readonly syntax: SyntaxNodeRef) { }
    get kind(): typeof PathSegment.KIND { return PathSegment.KIND; }

    /** Absent for `self`, `super` and `crate` segments. */
    nameRef(): NameRef | undefined { return childOpt(this, NameRef); }
    typeArgList(): TypeArgList | undefined { return childOpt(this, TypeArgList); }
}

// --- Tagged unions ---

const EXPR_VARIANTS = [
    TupleExpr, ArrayExpr, ParenExpr, PathExpr, LambdaExpr, IfExpr, LoopExpr, ForExpr, WhileExpr,
    ContinueExpr, BreakExpr, BlockExpr, ReturnExpr, MatchExpr, StructLit, CallExpr, IndexExpr,
    MethodCallExpr, FieldExpr, TryExpr, CastExpr, RefExpr, PrefixExpr, RangeExpr, BinExpr, Literal,
    MacroCall
] as const;
export type Expr = VariantOf<typeof EXPR_VARIANTS>;
export const Expr: AstUnion<Expr> = astUnion<Expr>('Expr', EXPR_VARIANTS);

const TYPE_REF_VARIANTS = [
    ParenType, TupleType, NeverType, PathType, PointerType, ArrayType, SliceType, ReferenceType,
    PlaceholderType, FnPointerType, ForType, ImplTraitType, DynTraitType
] as const;
export type TypeRef = VariantOf<typeof TYPE_REF_VARIANTS>;
export const TypeRef: AstUnion<TypeRef> = astUnion<TypeRef>('TypeRef', TYPE_REF_VARIANTS);

const NOMINAL_DEF_VARIANTS = [StructDef, EnumDef] as const;
export type NominalDef = VariantOf<typeof NOMINAL_DEF_VARIANTS>;
export const NominalDef: AstUnion<NominalDef> = astUnion<NominalDef>('NominalDef', NOMINAL_DEF_VARIANTS);

const PAT_VARIANTS = [
    BindPat, PlaceholderPat, RefPat, TuplePat, PathPat, TupleStructPat, StructPat, LiteralPat
] as const;
export type Pat = VariantOf<typeof PAT_VARIANTS>;
export const Pat: AstUnion<Pat> = astUnion<Pat>('Pat', PAT_VARIANTS);

const MODULE_ITEM_VARIANTS = [
    FnDef, StructDef, EnumDef, TraitDef, ImplItem, Module, UseItem, ConstDef, StaticDef, TypeDef,
    ExternCrateItem, MacroCall
] as const;
export type ModuleItem = VariantOf<typeof MODULE_ITEM_VARIANTS>;
export const ModuleItem: AstUnion<ModuleItem> = astUnion<ModuleItem>('ModuleItem', MODULE_ITEM_VARIANTS);

const STMT_VARIANTS = [LetStmt, ExprStmt] as const;
export type Stmt = VariantOf<typeof STMT_VARIANTS>;
export const Stmt: AstUnion<Stmt> = astUnion<Stmt>('Stmt', STMT_VARIANTS);
