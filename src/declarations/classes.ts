import type * as AST from '../types.js';
import { AstSyntaxError, DiagnosticCode } from '../diagnostics/diagnostics.js';
import { finishNode } from '../ast/containers.js';
import { nodeBase } from '../ast/identity.js';

// 类、结构体与枚举声明

export interface ClassOptions extends AST.NodeOptions {
  readonly bases?: readonly string[];
  readonly visibility?: AST.VisibilityKind;
  readonly isAbstract?: boolean;
}

export interface TypeDeclOptions extends AST.NodeOptions {
  readonly visibility?: AST.VisibilityKind;
}

function memberName(member: AST.ClassMember): string {
  return member.kind === 'VariableDeclaration' ? member.name : member.prototype.name;
}

function memberVisibility(member: AST.ClassMember): AST.VisibilityKind {
  return member.kind === 'VariableDeclaration' ? member.visibility : member.prototype.visibility;
}

function duplicateMember(owner: string, name: string, span?: AST.Span): AstSyntaxError {
  return new AstSyntaxError(DiagnosticCode.S004_DuplicateMember, `${owner} has a duplicate member '${name}'`, {
    span,
    node: { kind: owner },
  });
}

/** 名称按 key 去重，key 由调用方决定是否包含可见性 */
function assertUniqueMembers<T>(
  owner: string,
  members: readonly T[],
  key: (member: T) => string,
  name: (member: T) => string,
  span?: AST.Span
): void {
  const seen = new Set<string>();
  for (const member of members) {
    const k = key(member);
    if (seen.has(k)) throw duplicateMember(owner, name(member), span);
    seen.add(k);
  }
}

export const Classes = {
  ClassDeclStmt: (name: string, opts: ClassOptions = {}): AST.ClassDeclStmt =>
    finishNode(
      {
        kind: 'ClassDeclStmt',
        ...nodeBase(opts),
        name,
        bases: [...(opts.bases ?? [])],
        visibility: opts.visibility ?? 'public',
        isAbstract: opts.isAbstract ?? false,
      },
      opts
    ),

  /** 同一可见性下成员名不可重复；不同可见性的同名成员允许共存 */
  ClassDefStmt: (name: string, members: readonly AST.ClassMember[], opts: ClassOptions = {}): AST.ClassDefStmt => {
    assertUniqueMembers(
      'ClassDefStmt',
      members,
      m => `${memberVisibility(m)}:${memberName(m)}`,
      memberName,
      opts.span
    );
    return finishNode(
      {
        kind: 'ClassDefStmt',
        ...nodeBase(opts),
        name,
        bases: [...(opts.bases ?? [])],
        visibility: opts.visibility ?? 'public',
        isAbstract: opts.isAbstract ?? false,
        members: [...members],
      },
      opts,
      members
    );
  },

  StructDeclStmt: (name: string, opts: TypeDeclOptions = {}): AST.StructDeclStmt =>
    finishNode({ kind: 'StructDeclStmt', ...nodeBase(opts), name, visibility: opts.visibility ?? 'public' }, opts),

  StructDefStmt: (
    name: string,
    attributes: readonly AST.VariableDeclaration[],
    methods: readonly AST.FunctionDef[] = [],
    opts: TypeDeclOptions = {}
  ): AST.StructDefStmt => {
    const names = [...attributes.map(a => a.name), ...methods.map(m => m.prototype.name)];
    assertUniqueMembers('StructDefStmt', names, n => n, n => n, opts.span);
    return finishNode(
      {
        kind: 'StructDefStmt',
        ...nodeBase(opts),
        name,
        visibility: opts.visibility ?? 'public',
        attributes: [...attributes],
        methods: [...methods],
      },
      opts,
      [...attributes, ...methods]
    );
  },

  EnumDeclStmt: (
    name: string,
    members: readonly AST.VariableDeclaration[],
    opts: TypeDeclOptions = {}
  ): AST.EnumDeclStmt => {
    assertUniqueMembers('EnumDeclStmt', members, m => m.name, m => m.name, opts.span);
    return finishNode(
      { kind: 'EnumDeclStmt', ...nodeBase(opts), name, visibility: opts.visibility ?? 'public', members: [...members] },
      opts,
      members
    );
  },
};
