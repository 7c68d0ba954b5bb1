import { getEnumValue, getString } from './Accessors';
import { ModelDescriptionNode, ScalarVariableNode } from './Ast';
import { DiagnosticsSink } from './Diagnostics';
import { getDeclaredType } from './Lookup';
import { att } from './Vocabulary';

function labelOf(sv: ScalarVariableNode): string {
  return getString(sv, att('name')) ?? `#${sv.id}`;
}

/**
 * Dependencies are only meaningful on outputs and may only name inputs.
 * Violations are reported as warnings and do not fail validation.
 */
function checkDirectDependencies(md: ModelDescriptionNode, diagnostics: DiagnosticsSink): void {
  const variables = md.modelVariables ?? [];
  const byName = new Map<string, ScalarVariableNode>();
  for (const sv of variables) {
    const name = getString(sv, att('name'));
    if (name !== undefined && !byName.has(name)) byName.set(name, sv);
  }
  for (const sv of variables) {
    if (!sv.directDependencies) continue;
    if (getEnumValue(sv, att('causality')).value !== 'output') {
      diagnostics.notify('warning', `Variable ${labelOf(sv)} declares direct dependencies but is not an output`);
    }
    for (const dependency of sv.directDependencies) {
      const name = getString(dependency, att('input')) ?? '';
      const input = byName.get(name);
      if (!input || getEnumValue(input, att('causality')).value !== 'input') {
        diagnostics.notify('warning', `Direct dependency ${name} of variable ${labelOf(sv)} is not an input variable`);
      }
    }
  }
}

/**
 * Cross-reference pass over a complete tree. Every `declaredType` of a
 * variable must name a Type of the same document; references may point
 * forward, so this only runs once the whole tree exists.
 * @returns the unchanged root, or null if any reference is unresolved
 */
export function validate(md: ModelDescriptionNode, diagnostics: DiagnosticsSink): ModelDescriptionNode | null {
  let errors = 0;
  for (const sv of md.modelVariables ?? []) {
    const declaredType = sv.typeSpec ? getString(sv.typeSpec, att('declaredType')) : undefined;
    if (declaredType !== undefined && !getDeclaredType(md, declaredType)) {
      diagnostics.notify('warning', `Declared type ${declaredType} of variable ${labelOf(sv)} not found in modelDescription.xml`);
      errors++;
    }
  }
  checkDirectDependencies(md, diagnostics);
  if (errors > 0) {
    diagnostics.notify('error', `Found ${errors} error(s) in modelDescription.xml`);
    return null;
  }
  return md;
}
