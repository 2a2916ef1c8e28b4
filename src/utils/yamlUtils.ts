import * as yaml from 'js-yaml';
import { isRecord } from './attributes';
import type { JsonValue } from './attributes';

/**
 * Copy of the value with every property named 'managedFields' removed.
 */
function withoutManagedFields(value: JsonValue): JsonValue {
  if (Array.isArray(value)) {
    return value.map(item => withoutManagedFields(item));
  }
  if (!isRecord(value)) {
    return value;
  }
  const result: { [key: string]: JsonValue } = {};
  for (const [key, child] of Object.entries(value)) {
    if (key === 'managedFields') {
      continue;
    }
    result[key] = withoutManagedFields(child);
  }
  return result;
}

/**
 * Deep copy of the resource without 'managedFields'; the input is left untouched.
 */
export function sanitizeResource(resource: JsonValue): JsonValue {
  return withoutManagedFields(resource);
}

/**
 * Render a resource as YAML for the detail view.
 */
export function resourceToYaml(resource: JsonValue): string {
  return yaml.dump(sanitizeResource(resource), { indent: 2, noRefs: true, lineWidth: -1 });
}
