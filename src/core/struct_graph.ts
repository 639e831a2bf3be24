import type * as AST from '../types.js';
import { AstValueError, DiagnosticCode } from '../diagnostics/diagnostics.js';
import { isReprList, isReprStruct, structEntry } from './struct.js';

// 结构化表示 → 顶点/边视图，供外部可视化后端消费。
// 顶点以 tag 为键，相同 tag 合并为同一顶点，因此可视化应使用简化模式（tag 带 #id）。

export interface GraphVertex {
  readonly key: string;
  /** 标量槽位 */
  readonly attributes: Record<string, AST.ReprValue>;
}

export interface GraphEdge {
  readonly from: string;
  readonly to: string;
  /** 槽位键；列表元素为 `key[i]` */
  readonly label: string;
}

export interface StructGraph {
  readonly root: string;
  readonly vertices: GraphVertex[];
  readonly edges: GraphEdge[];
}

export function structToGraph(struct: AST.ReprStruct): StructGraph {
  const vertices = new Map<string, GraphVertex>();
  const edges: GraphEdge[] = [];

  const visit = (node: AST.ReprStruct): string => {
    const entry = structEntry(node);
    if (entry === null) {
      throw new AstValueError(DiagnosticCode.V009_MalformedStruct, 'Struct must map exactly one tag to a slot object');
    }
    const { tag, body } = entry;
    let vertex = vertices.get(tag);
    if (vertex === undefined) {
      vertex = { key: tag, attributes: {} };
      vertices.set(tag, vertex);
    }

    for (const [key, value] of Object.entries(body)) {
      if (isReprStruct(value)) {
        edges.push({ from: tag, to: visit(value), label: key });
      } else if (isReprList(value) && value.some(isReprStruct)) {
        value.forEach((item, i) => {
          if (isReprStruct(item)) edges.push({ from: tag, to: visit(item), label: `${key}[${i}]` });
        });
      } else {
        vertex.attributes[key] = value;
      }
    }
    return tag;
  };

  const root = visit(struct);
  return { root, vertices: [...vertices.values()], edges };
}
