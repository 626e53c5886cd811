/**
 * Values a template can reference and produce
 */

export type TemplateValue = string | number | boolean | ReadonlyMap<string, TemplateValue>;

export type TemplateMap = ReadonlyMap<string, TemplateValue>;

/** A template function; every parameter and result is a string */
export type TemplateFunction = (...args: string[]) => string;

export type FunctionMap = ReadonlyMap<string, TemplateFunction>;

export function isTemplateMap(value: TemplateValue): value is TemplateMap {
  return typeof value === 'object';
}

/**
 * Text of a value as printed by an action. Maps print as `map[k:v ...]`
 * with sorted keys.
 */
export function formatValue(value: TemplateValue): string {
  if (!isTemplateMap(value)) {
    return String(value);
  }
  const entries = [...value.keys()]
    .sort()
    .map(key => {
      const entry = value.get(key);
      return entry === undefined ? key : `${key}:${formatValue(entry)}`;
    });
  return `map[${entries.join(' ')}]`;
}

/**
 * Type name used in execution errors
 */
export function typeName(value: TemplateValue): string {
  switch (typeof value) {
    case 'string':
      return 'string';
    case 'number':
      return Number.isInteger(value) ? 'int' : 'float64';
    case 'boolean':
      return 'bool';
    default:
      return [...value.values()].every(entry => typeof entry === 'string')
        ? 'map[string]string'
        : 'map[string]interface {}';
  }
}
