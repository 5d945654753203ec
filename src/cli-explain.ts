/**
 * `clex --explain <id>`: registry entry rendered as plain text
 */

import { ERROR_REGISTRY, templatePlaceholders } from './types.js';

/**
 * Ids are matched case-insensitively against the registry, so
 * `clex --explain clex-l003` works. Returns null for anything unregistered.
 */
export function explainError(errorId: string): string | null {
  const def = ERROR_REGISTRY.get(errorId.trim().toUpperCase());
  if (!def) return null;

  const out = [
    `${def.errorId} [${def.category}] ${def.description}`,
    `  message: ${def.messageTemplate}`,
  ];
  const fields = templatePlaceholders(def.messageTemplate);
  if (fields.length > 0) out.push(`  context: ${fields.join(', ')}`);

  if (def.cause) out.push('', def.cause);
  if (def.resolution) out.push('', `Fix: ${def.resolution}`);

  for (const example of def.examples ?? []) {
    out.push('', `${example.description}:`);
    out.push(...example.code.split('\n').map((line) => `    ${line}`));
  }

  return out.join('\n');
}

/** One line per registered id, for `clex --explain` without an id */
export function listErrors(): string {
  return Array.from(
    ERROR_REGISTRY.values(),
    (def) => `${def.errorId}  ${def.description}`
  ).join('\n');
}
