import type * as AST from '../types.js';

/**
 * 节点身份与父链接。
 *
 * - 身份标识为进程内单调递增的整数，构造时分配一次
 * - 父链接保存在模块级 WeakMap 中，值为 WeakRef：节点本身保持纯数据，
 *   父节点被回收后 `parentOf` 返回 null，子节点不受影响
 */

let lastNodeId = 0;

export function nextNodeId(): number {
  lastNodeId += 1;
  return lastNodeId;
}

/** 每个工厂函数共享的基础字段 */
export function nodeBase(opts: AST.NodeOptions = {}): { id: number; span?: AST.Span } {
  const id = nextNodeId();
  return opts.span !== undefined ? { id, span: opts.span } : { id };
}

const parentLinks = new WeakMap<AST.AstNode, WeakRef<AST.AstNode>>();

export function setParent(child: AST.AstNode, parent: AST.AstNode): void {
  parentLinks.set(child, new WeakRef(parent));
}

export function parentOf(node: AST.AstNode): AST.AstNode | null {
  return parentLinks.get(node)?.deref() ?? null;
}
