/**
 * @module serialization
 *
 * 节点树的 JSON / YAML 文本形式。
 *
 * **格式**：始终基于非简化的结构化表示（不含 `#id`），
 * 因此 JSON → 树 → JSON 在相同缩进配置下逐字节稳定。
 *
 * **解码**：先用 JSON Schema 校验整体形状，再经由工厂函数逐节点重建；
 * 任何形状问题都以 AstValueError(V009) 报告，未知节点以 AstNotImplementedError(N002) 报告。
 */

import { existsSync, readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import AjvModule, { type ErrorObject, type SchemaObject, type ValidateFunction } from 'ajv';
import { parse as parseYaml, stringify as stringifyYaml } from 'yaml';
import type * as AST from '../types.js';
import { AstValueError, DiagnosticCode } from '../diagnostics/diagnostics.js';
import { ConfigService } from '../config/config-service.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { getStruct } from './struct.js';
import { decodeStruct } from './decode.js';

const Ajv = AjvModule.default;
const logger = createLogger('serialization');

const SCHEMA_FILE = 'repr-struct.schema.json';

// 源码位于 src/core，编译产物位于 dist/src/core
function locateSchema(): string {
  const here = dirname(fileURLToPath(import.meta.url));
  const candidates = [join(here, '../../schema', SCHEMA_FILE), join(here, '../../../schema', SCHEMA_FILE)];
  const found = candidates.find(candidate => existsSync(candidate));
  if (found === undefined) {
    throw new Error(`Cannot locate ${SCHEMA_FILE} (looked in ${candidates.join(', ')})`);
  }
  return found;
}

function isSchemaObject(value: unknown): value is SchemaObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

let validator: ValidateFunction<AST.ReprStruct> | null = null;

function getValidator(): ValidateFunction<AST.ReprStruct> {
  if (validator === null) {
    const schema: unknown = JSON.parse(readFileSync(locateSchema(), 'utf8'));
    if (!isSchemaObject(schema)) {
      throw new Error(`${SCHEMA_FILE} does not contain a JSON object`);
    }
    const ajv = new Ajv({ strict: true, allErrors: true, allowUnionTypes: true });
    validator = ajv.compile<AST.ReprStruct>(schema);
  }
  return validator;
}

function formatSchemaErrors(errors: ErrorObject[] | null | undefined): string {
  if (!errors || errors.length === 0) return 'unknown schema violation';
  return errors
    .slice(0, 5)
    .map(error => `${error.instancePath || '/'} ${error.message ?? 'is invalid'}`)
    .join('; ');
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function toJson(node: AST.AstNode): string {
  return JSON.stringify(getStruct(node, false), null, ConfigService.getInstance().jsonIndent);
}

export function toYaml(node: AST.AstNode): string {
  return stringifyYaml(getStruct(node, false));
}

function decodeData(data: unknown, log: Logger): AST.AstNode {
  const validate = getValidator();
  if (!validate(data)) {
    throw new AstValueError(
      DiagnosticCode.V009_MalformedStruct,
      `Struct does not match the node schema: ${formatSchemaErrors(validate.errors)}`
    );
  }
  const node = decodeStruct(data);
  log.debug('Decoded node tree', { kind: node.kind, id: node.id });
  return node;
}

/** 校验并解码任意已解析的数据 */
export function fromStruct(data: unknown): AST.AstNode {
  return decodeData(data, logger);
}

export function fromJson(text: string): AST.AstNode {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (error) {
    throw new AstValueError(DiagnosticCode.V009_MalformedStruct, `Invalid JSON: ${errorMessage(error)}`);
  }
  return decodeData(data, logger.child('json', { format: 'json' }));
}

export function fromYaml(text: string): AST.AstNode {
  let data: unknown;
  try {
    data = parseYaml(text);
  } catch (error) {
    throw new AstValueError(DiagnosticCode.V009_MalformedStruct, `Invalid YAML: ${errorMessage(error)}`);
  }
  return decodeData(data, logger.child('yaml', { format: 'yaml' }));
}
