import type * as AST from '../types.js';
import { AstIndexError, AstSyntaxError, DiagnosticCode } from '../diagnostics/diagnostics.js';
import { isDataType } from './guards.js';
import { setParent } from './identity.js';

/**
 * 可变容器（Block / Module / Arguments）的统一操作。
 *
 * 容器对子节点拥有所有权：追加或插入时建立子 → 容器的弱父链接。
 */

export type NodeSequence = AST.Block | AST.Module;
export type MutableContainer = NodeSequence | AST.Arguments;

function checkIndex(container: MutableContainer, index: number, limit: number): void {
  if (!Number.isInteger(index) || index < 0 || index >= limit) {
    throw new AstIndexError(
      DiagnosticCode.I001_IndexOutOfRange,
      `Index ${index} out of range for ${container.kind} of length ${container.nodes.length}`,
      { node: container }
    );
  }
}

/** 追加到末尾，返回追加后的长度 */
export function appendNode(container: NodeSequence, node: AST.AstNode): number {
  container.nodes.push(node);
  setParent(node, container);
  return container.nodes.length;
}

/** 在 index 处插入；index 等于长度时等价于追加 */
export function insertNode(container: NodeSequence, index: number, node: AST.AstNode): number {
  checkIndex(container, index, container.nodes.length + 1);
  container.nodes.splice(index, 0, node);
  setParent(node, container);
  return container.nodes.length;
}

export function nodeAt(container: AST.Arguments, index: number): AST.Argument;
export function nodeAt(container: NodeSequence, index: number): AST.AstNode;
export function nodeAt(container: MutableContainer, index: number): AST.AstNode {
  checkIndex(container, index, container.nodes.length);
  const node = container.nodes[index];
  if (node === undefined) {
    throw new AstIndexError(DiagnosticCode.I001_IndexOutOfRange, `Index ${index} out of range`, { node: container });
  }
  return node;
}

export function nodeCount(container: MutableContainer): number {
  return container.nodes.length;
}

/** 参数名在同一参数列表内必须唯一 */
export function assertUniqueArgumentNames(args: readonly AST.Argument[], owner: { readonly kind: string; readonly span?: AST.Span }): void {
  const seen = new Set<string>();
  for (const arg of args) {
    if (seen.has(arg.name)) {
      throw new AstSyntaxError(DiagnosticCode.S003_DuplicateArgument, `Duplicate argument '${arg.name}'`, {
        node: owner,
      });
    }
    seen.add(arg.name);
  }
}

export function appendArgument(args: AST.Arguments, arg: AST.Argument): number {
  assertUniqueArgumentNames([...args.nodes, arg], args);
  args.nodes.push(arg);
  setParent(arg, args);
  return args.nodes.length;
}

export function insertArgument(args: AST.Arguments, index: number, arg: AST.Argument): number {
  checkIndex(args, index, args.nodes.length + 1);
  assertUniqueArgumentNames([...args.nodes, arg], args);
  args.nodes.splice(index, 0, arg);
  setParent(arg, args);
  return args.nodes.length;
}

/** 为复合节点的直接子节点建立父链接；类型描述节点不参与 */
export function adopt<N extends AST.AstNode>(owner: N, children: ReadonlyArray<AST.AstNode | null>): N {
  for (const child of children) {
    if (child !== null && !isDataType(child)) setParent(child, owner);
  }
  return owner;
}

/** 工厂函数的收尾：建立子节点链接，并按需追加到 opts.parent */
export function finishNode<N extends AST.AstNode>(
  node: N,
  opts: AST.NodeOptions,
  children: ReadonlyArray<AST.AstNode | null> = []
): N {
  adopt(node, children);
  if (opts.parent !== undefined) appendNode(opts.parent, node);
  return node;
}
