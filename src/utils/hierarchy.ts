import { ToolError, UiNode } from '../types';
import { formatFrame, parseBounds } from './geometry';

export const HIERARCHY_HEADER = 'Hierarchy';

const TOKEN_REGEX =
  /<!--[\s\S]*?-->|<\?[\s\S]*?\?>|<!\[CDATA\[[\s\S]*?\]\]>|<![A-Za-z][^>]*>|<(\/)?([A-Za-z_][\w.:-]*)((?:\s+[^\s=/>]+\s*=\s*(?:"[^"]*"|'[^']*'))*)\s*(\/)?>/g;
const ATTRIBUTE_REGEX = /([^\s=]+)\s*=\s*(?:"([^"]*)"|'([^']*)')/g;
const ENTITY_REGEX = /&(#x[0-9a-fA-F]+|#\d+|lt|gt|amp|quot|apos);/g;

const NAMED_ENTITIES: Record<string, string> = {
  lt: '<',
  gt: '>',
  amp: '&',
  quot: '"',
  apos: "'",
};

type Frame = {
  tag: string;
  container: UiNode[];
};

function decodeEntities(value: string): string {
  return value.replace(ENTITY_REGEX, (entity, name: string) => {
    if (name.startsWith('#x')) {
      return String.fromCodePoint(parseInt(name.slice(2), 16));
    }
    if (name.startsWith('#')) {
      return String.fromCodePoint(parseInt(name.slice(1), 10));
    }
    return NAMED_ENTITIES[name] ?? entity;
  });
}

function parseAttributes(source: string): Map<string, string> {
  const attributes = new Map<string, string>();
  for (const match of source.matchAll(ATTRIBUTE_REGEX)) {
    attributes.set(match[1], decodeEntities(match[2] ?? match[3] ?? ''));
  }
  return attributes;
}

function parseFailure(message: string): ToolError {
  return new ToolError('UI_HIERARCHY_PARSE_FAILED', `failed to parse UI hierarchy XML: ${message}`);
}

export function createRootNode(children: UiNode[] = []): UiNode {
  return {
    tag: 'node',
    className: 'Hierarchy',
    label: '',
    description: '',
    identifier: '',
    clickable: false,
    children,
  };
}

export function nodeFromAttributes(attributes: Map<string, string>): UiNode {
  const className = (attributes.get('class') ?? 'Node').split('.').pop() || 'Node';
  const text = (attributes.get('text') ?? '').trim();
  const description = (attributes.get('content-desc') ?? '').trim();
  const frame = parseBounds(attributes.get('bounds') ?? '');

  const node: UiNode = {
    tag: 'node',
    className,
    label: text || description,
    description,
    identifier: (attributes.get('resource-id') ?? '').trim(),
    clickable: (attributes.get('clickable') ?? '').trim() === 'true',
    children: [],
  };
  if (frame) {
    node.frame = frame;
  }
  return node;
}

/**
 * Build a node tree from a UiAutomator window dump. The returned root is synthetic;
 * elements other than `<node>` (such as `<hierarchy>`) are transparent and their
 * children attach to the nearest enclosing node.
 */
export function parseHierarchyXml(xml: string): UiNode {
  const root = createRootNode();
  const stack: Frame[] = [{ tag: '#root', container: root.children }];
  let elementCount = 0;

  for (const match of xml.matchAll(TOKEN_REGEX)) {
    const [, closing, tag, attributeSource, selfClosing] = match;
    if (!tag) {
      continue;
    }

    const parent = stack[stack.length - 1];

    if (closing) {
      if (stack.length === 1 || parent.tag !== tag) {
        throw parseFailure(`unexpected closing tag </${tag}>`);
      }
      stack.pop();
      continue;
    }

    elementCount += 1;
    let container = parent.container;
    if (tag === 'node') {
      const node = nodeFromAttributes(parseAttributes(attributeSource ?? ''));
      parent.container.push(node);
      container = node.children;
    }

    if (!selfClosing) {
      stack.push({ tag, container });
    }
  }

  if (elementCount === 0) {
    throw parseFailure('no elements found');
  }
  if (stack.length > 1) {
    throw parseFailure(`unclosed element <${stack[stack.length - 1].tag}>`);
  }

  return root;
}

export function formatNodeLine(node: UiNode): string {
  const parts = [node.className];

  if (node.label) {
    parts.push(`label: ${JSON.stringify(node.label)}`);
  }
  if (node.description && node.description !== node.label) {
    parts.push(`value: ${JSON.stringify(node.description)}`);
  }
  if (node.identifier) {
    parts.push(`identifier: ${JSON.stringify(node.identifier)}`);
  }
  if (node.frame) {
    parts.push(`frame: ${formatFrame(node.frame)}`);
  }
  if (node.clickable) {
    parts.push('clickable: true');
  }

  return parts.join(', ');
}

// Field order and omission rules here are what automation callers read; keep them stable.
export function buildHierarchyText(root: UiNode): string {
  const lines = [HIERARCHY_HEADER];

  const walk = (node: UiNode, depth: number): void => {
    lines.push(`${'  '.repeat(depth)}${formatNodeLine(node)}`);
    for (const child of node.children) {
      walk(child, depth + 1);
    }
  };

  for (const child of root.children) {
    walk(child, 0);
  }

  return lines.join('\n');
}

export function formatHierarchyXml(xml: string): string {
  return buildHierarchyText(parseHierarchyXml(xml));
}
