import fs from 'fs';
import jsonc from 'jsonc-parser';
import type { Node as JsonNode, ParseError } from 'jsonc-parser';
import { z } from 'zod';
import logger from './logger.js';
import { OutputWriteError } from './errors.js';
import { renderTreeText } from './tree/renderer.js';
import type { SummaryTree } from './types.js';

export const DEFAULT_JSON_OUTPUT = 'code_summary_tree.json';
export const DEFAULT_TEXT_OUTPUT = 'code_summary_tree.txt';

interface TreeJson {
  [name: string]: string | TreeJson;
}

const treeJsonSchema: z.ZodType<TreeJson> = z.lazy(() => z.record(z.union([z.string(), treeJsonSchema])));

/**
 * Two-space indented JSON in map insertion order. Unlike JSON.stringify on a
 * plain object, integer-like names such as `2024` keep their position.
 * Non-ASCII text is written as-is.
 */
export function serializeTree(tree: SummaryTree): string {
  return `${serializeNode(tree, '')}\n`;
}

function serializeNode(node: SummaryTree, indent: string): string {
  if (node.size === 0) return '{}';

  const inner = `${indent}  `;
  const entries = [...node].map(([name, value]) => {
    const rendered = typeof value === 'string' ? JSON.stringify(value) : serializeNode(value, inner);
    return `${inner}${JSON.stringify(name)}: ${rendered}`;
  });
  return `{\n${entries.join(',\n')}\n${indent}}`;
}

/**
 * Parses persisted JSON back into a tree. Names keep their document order,
 * so integer-like names stay where the writer put them.
 */
export function parseTree(json: string): SummaryTree {
  const errors: ParseError[] = [];
  const root = jsonc.parseTree(json, errors, { disallowComments: true, allowTrailingComma: false });
  const [first] = errors;
  if (first) {
    throw new SyntaxError(`Invalid JSON: ${jsonc.printParseErrorCode(first.error)} at offset ${first.offset}`);
  }
  if (!root) throw new SyntaxError('Invalid JSON: no value');

  treeJsonSchema.parse(jsonc.getNodeValue(root));
  return toTree(root);
}

// Only called on nodes the schema accepted: objects whose values are strings or objects.
function toTree(node: JsonNode): SummaryTree {
  const tree: SummaryTree = new Map();
  for (const property of node.children ?? []) {
    const [name, value] = property.children ?? [];
    if (!name || !value) continue;
    tree.set(String(name.value), value.type === 'string' ? String(value.value) : toTree(value));
  }
  return tree;
}

export function writeTreeJson(outputPath: string, tree: SummaryTree): void {
  writeText(outputPath, serializeTree(tree));
  logger.info({ outputPath }, 'Summary tree saved');
}

/**
 * An unreadable or malformed file is logged and yields an empty tree.
 */
export function loadTreeJson(jsonPath: string): SummaryTree {
  try {
    return parseTree(fs.readFileSync(jsonPath, 'utf8'));
  } catch (error) {
    logger.error({ err: error, jsonPath }, 'Failed to read summary tree JSON');
    return new Map();
  }
}

export function writeTreeText(outputPath: string, tree: SummaryTree): void {
  writeText(outputPath, renderTreeText(tree));
  logger.info({ outputPath }, 'Rendered tree saved');
}

export function printTree(tree: SummaryTree, write: (text: string) => void = text => process.stdout.write(text)): void {
  write(renderTreeText(tree));
}

function writeText(outputPath: string, content: string): void {
  try {
    fs.writeFileSync(outputPath, content, 'utf8');
  } catch (error) {
    throw new OutputWriteError(outputPath, error);
  }
}
