import { AstNode, ModelDescriptionNode } from './Ast';

function formatList(list: readonly AstNode[] | null, indent: number, lines: string[]): void {
  if (!list) return;
  for (const node of list) {
    formatInto(node, indent, lines);
  }
}

function formatInto(node: AstNode | null, indent: number, lines: string[]): void {
  if (!node) return;
  const attributes = node.attributes.map(a => ` ${a.name.name}=${a.value}`).join('');
  lines.push(' '.repeat(indent) + node.kind + attributes);
  const inner = indent + 2;
  switch (node.shape) {
    case 'element':
      break;
    case 'list':
      formatList(node.list, inner, lines);
      break;
    case 'scalarVariable':
      formatInto(node.typeSpec, inner, lines);
      formatList(node.directDependencies, inner, lines);
      break;
    case 'type':
      formatInto(node.typeSpec, inner, lines);
      break;
    case 'coSimulation':
      formatInto(node.capabilities, inner, lines);
      formatInto(node.model, inner, lines);
      break;
    case 'modelDescription':
      formatList(node.unitDefinitions, inner, lines);
      formatList(node.typeDefinitions, inner, lines);
      formatInto(node.defaultExperiment, inner, lines);
      formatList(node.vendorAnnotations, inner, lines);
      formatList(node.modelVariables, inner, lines);
      formatInto(node.coSimulation, inner, lines);
      break;
  }
}

/**
 * One line per node: `Kind name=value ...`, children indented by two.
 */
export function formatElement(node: AstNode, indent: number = 0): string[] {
  const lines: string[] = [];
  formatInto(node, indent, lines);
  return lines;
}

export function formatModelDescription(md: ModelDescriptionNode): string[] {
  return formatElement(md);
}
